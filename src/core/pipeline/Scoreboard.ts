export type ProducerStage = "execute" | "memory" | "writeback";

export interface ScoreboardEntry {
  register: number;
  stage: ProducerStage;
  /** Whether the value can be forwarded this cycle. */
  available: boolean;
  value: number;
  isLoad: boolean;
  sequence: number;
}

/**
 * In-flight destination registers, keyed by register. Rebuilt every cycle from
 * the latches; producers are recorded youngest first and the first entry for a
 * register wins.
 */
export class Scoreboard {
  private readonly byRegister = new Map<number, ScoreboardEntry>();

  record(entry: ScoreboardEntry): void {
    if (entry.register === 0 || this.byRegister.has(entry.register)) return;
    this.byRegister.set(entry.register, entry);
  }

  lookup(register: number): ScoreboardEntry | null {
    return this.byRegister.get(register) ?? null;
  }

  entries(): ScoreboardEntry[] {
    return Array.from(this.byRegister.values());
  }

  clear(): void {
    this.byRegister.clear();
  }
}
