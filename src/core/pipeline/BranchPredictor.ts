import { COUNTER_STATES, isPowerOfTwo, type CounterState, type PredictorConfig } from "../config/CoreConfig";
import type { BranchPrediction } from "./PipelineTypes";

export interface BranchOutcome {
  taken: boolean;
  target: number;
}

interface TargetEntry {
  tag: number;
  target: number;
}

const WEAKLY_TAKEN = COUNTER_STATES.indexOf("weakly-taken");
const STRONGEST = COUNTER_STATES.length - 1;

/**
 * Bimodal predictor: a table of 2-bit saturating counters plus a branch target
 * buffer tagged with the full PC. A taken prediction needs both a taken
 * counter and a target entry for this PC.
 */
export class BranchPredictor {
  private readonly entries: number;
  private readonly initialCounter: number;
  private readonly counters: Uint8Array;
  private readonly targets: Array<TargetEntry | null>;

  constructor(config: Partial<PredictorConfig> = {}) {
    this.entries = config.entries ?? 64;
    if (!isPowerOfTwo(this.entries)) {
      throw new RangeError(`Predictor entry count must be a power of two (got ${this.entries})`);
    }
    this.initialCounter = COUNTER_STATES.indexOf(config.initialState ?? "weakly-not-taken");
    this.counters = new Uint8Array(this.entries);
    this.targets = Array.from({ length: this.entries }, () => null);
    this.reset();
  }

  predict(pc: number): BranchPrediction {
    const index = this.indexOf(pc);
    const entry = this.targets[index];
    if (this.counters[index] >= WEAKLY_TAKEN && entry && entry.tag === pc >>> 0) {
      return { taken: true, nextPc: entry.target };
    }
    return { taken: false, nextPc: (pc + 4) >>> 0 };
  }

  update(pc: number, outcome: BranchOutcome): void {
    const index = this.indexOf(pc);
    const counter = this.counters[index];
    if (outcome.taken) {
      this.counters[index] = Math.min(counter + 1, STRONGEST);
      this.targets[index] = { tag: pc >>> 0, target: outcome.target >>> 0 };
    } else {
      this.counters[index] = Math.max(counter - 1, 0);
    }
  }

  invalidate(pc: number): void {
    const index = this.indexOf(pc);
    if (this.targets[index]?.tag === pc >>> 0) {
      this.targets[index] = null;
    }
  }

  reset(): void {
    this.counters.fill(this.initialCounter);
    this.targets.fill(null);
  }

  getState(pc: number): CounterState {
    return COUNTER_STATES[this.counters[this.indexOf(pc)]];
  }

  getEntryCount(): number {
    return this.entries;
  }

  private indexOf(pc: number): number {
    return (pc >>> 2) & (this.entries - 1);
  }
}
