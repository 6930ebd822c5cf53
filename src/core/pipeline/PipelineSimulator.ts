import { decodeInstruction, isHaltInstruction } from "../cpu/Instructions";
import { resolveCoreConfig, type ResolvedCoreConfig } from "../config/CoreConfig";
import type { CpuException } from "../exceptions/ExecutionExceptions";
import { MemorySystem } from "../memory/MemorySystem";
import { RegisterFile } from "../state/RegisterFile";
import {
  formatHex,
  formatPipelineSnapshot,
  publishPipelineSnapshot,
  type CoreStatus,
  type PipelineSnapshot,
  type PipelineStageState,
} from "../tools/pipelineEvents";
import { BranchPredictor } from "./BranchPredictor";
import { EXStage, type EXStageResult } from "./EXStage";
import { ForwardingUnit } from "./ForwardingUnit";
import { HazardUnit, type SourceHazard } from "./HazardUnit";
import { IDStage } from "./IDStage";
import { IFStage, type IFStageResult } from "./IFStage";
import { MEMStage, type MEMStageResult } from "./MEMStage";
import { PipelineRegister } from "./PipelineRegister";
import { PipelineStatistics, type PipelineStatisticsSnapshot } from "./PipelineStatistics";
import {
  BUBBLE_SLOT,
  EMPTY_SLOT,
  payloadOf,
  validSlot,
  type ExMemPayload,
  type IdExPayload,
  type IfIdPayload,
  type MemWbPayload,
  type PipelineLatchName,
  type PipelineSlot,
} from "./PipelineTypes";
import { Scoreboard } from "./Scoreboard";
import { WBStage, type RetiredInstruction, type WBStageResult } from "./WBStage";

export interface PipelineOptions {
  config?: ResolvedCoreConfig;
  registerFile?: RegisterFile;
  memorySystem?: MemorySystem;
  predictor?: BranchPredictor;
  /** Overrides the configured forwarding setting. */
  forwardingEnabled?: boolean;
  /** Receives one formatted line per cycle. */
  trace?: (line: string) => void;
  /** Called for every committed instruction, in program order. */
  onRetire?: (instruction: RetiredInstruction, cycle: number) => void;
  log?: (message: string) => void;
}

interface CycleControl {
  trap: boolean;
  memoryStall: boolean;
  mispredict: boolean;
  loadUseHazard: boolean;
  dataHazard: boolean;
  decodeStall: boolean;
  fetchStall: boolean;
  hazards: SourceHazard[];
}

const defaultLog = (message: string): void => console.warn(message);

/**
 * Forwards a stage result into the next latch, keeping bubbles and empty slots
 * as they are.
 */
function propagate<In, Out>(source: PipelineSlot<In>, output: Out | null): PipelineSlot<Out> {
  if (source.state === "valid" && output !== null) return validSlot(output);
  return source.state === "bubble" ? BUBBLE_SLOT : EMPTY_SLOT;
}

/**
 * Cycle-accurate five-stage pipeline. Each {@link step} evaluates the stages
 * from writeback back to fetch against the latched state, decides stalls and
 * flushes, then commits everything at one clock edge.
 */
export class PipelineSimulator {
  private readonly config: ResolvedCoreConfig;
  private readonly registerFile: RegisterFile;
  private readonly memorySystem: MemorySystem;
  private readonly predictor: BranchPredictor;
  private readonly ifId = new PipelineRegister<IfIdPayload>();
  private readonly idEx = new PipelineRegister<IdExPayload>();
  private readonly exMem = new PipelineRegister<ExMemPayload>();
  private readonly memWb = new PipelineRegister<MemWbPayload>();
  private readonly hazardUnit = new HazardUnit();
  private readonly forwardingUnit = new ForwardingUnit();
  private readonly scoreboard = new Scoreboard();
  private readonly ifStage = new IFStage();
  private readonly idStage = new IDStage();
  private readonly exStage = new EXStage();
  private readonly memStage = new MEMStage();
  private readonly wbStage = new WBStage();
  private readonly statistics = new PipelineStatistics();
  private readonly trace: ((line: string) => void) | null;
  private readonly onRetire: ((instruction: RetiredInstruction, cycle: number) => void) | null;
  private readonly log: (message: string) => void;
  private forwardingEnabled: boolean;
  private textAddresses = new Set<number>();
  private pc: number;
  private fetchHalted = false;
  private status: CoreStatus = "running";
  private fault: CpuException | null = null;
  private nextSequence = 0;

  constructor(options: PipelineOptions = {}) {
    this.config = options.config ?? resolveCoreConfig();
    this.registerFile = options.registerFile ?? new RegisterFile();
    this.memorySystem = options.memorySystem ?? new MemorySystem({ config: this.config });
    this.predictor = options.predictor ?? new BranchPredictor(this.config.predictor);
    this.forwardingEnabled = options.forwardingEnabled ?? this.config.forwardingEnabled;
    this.trace = options.trace ?? null;
    this.onRetire = options.onRetire ?? null;
    this.log = options.log ?? defaultLog;
    this.pc = this.config.resetVector;
  }

  /** Records which word addresses hold instructions and points fetch at the entry. */
  setProgram(entryPoint: number, textAddresses: Iterable<number>): void {
    this.textAddresses = new Set(Array.from(textAddresses, (address) => address >>> 0));
    this.pc = entryPoint >>> 0;
    this.fetchHalted = false;
    if (this.status === "halted") {
      this.status = "running";
    }
  }

  hasInstruction(address: number): boolean {
    return this.textAddresses.has(address >>> 0);
  }

  getPc(): number {
    return this.pc;
  }

  getStatus(): CoreStatus {
    return this.status;
  }

  getFault(): CpuException | null {
    return this.fault;
  }

  getStatistics(): PipelineStatisticsSnapshot {
    return this.statistics.getSnapshot();
  }

  getRegisterFile(): RegisterFile {
    return this.registerFile;
  }

  getMemorySystem(): MemorySystem {
    return this.memorySystem;
  }

  getPredictor(): BranchPredictor {
    return this.predictor;
  }

  getForwardingEnabled(): boolean {
    return this.forwardingEnabled;
  }

  setForwardingEnabled(enabled: boolean): void {
    this.forwardingEnabled = enabled;
  }

  getLatches(): {
    ifId: PipelineSlot<IfIdPayload>;
    idEx: PipelineSlot<IdExPayload>;
    exMem: PipelineSlot<ExMemPayload>;
    memWb: PipelineSlot<MemWbPayload>;
  } {
    return {
      ifId: this.ifId.getCurrent(),
      idEx: this.idEx.getCurrent(),
      exMem: this.exMem.getCurrent(),
      memWb: this.memWb.getCurrent(),
    };
  }

  isHalted(): boolean {
    return this.status !== "running";
  }

  step(): CoreStatus {
    if (this.status !== "running") return this.status;

    const cycle = this.statistics.getCycleCount() + 1;

    // Writeback
    const writeback = this.wbStage.run(payloadOf(this.memWb.getCurrent()));
    if (writeback.status === "fault") {
      return this.stopOnFault(writeback.fault, cycle);
    }

    // Memory
    const memoryInput = payloadOf(this.exMem.getCurrent());
    const memory = this.memStage.run({ memory: memoryInput, dataCache: this.memorySystem.dataCache });
    const trap =
      memory.status === "done" &&
      (memory.output.fault !== null || (memory.output.decoded !== null && isHaltInstruction(memory.output.decoded)));

    // Execute
    const execute = this.exStage.run({ executing: payloadOf(this.idEx.getCurrent()) });

    this.rebuildScoreboard(execute, memoryInput, memory, writeback);

    // Decode
    const decode = this.idStage.run({
      decoding: payloadOf(this.ifId.getCurrent()),
      scoreboard: this.scoreboard,
      registerFile: this.registerFile,
      hazardUnit: this.hazardUnit,
      forwardingUnit: this.forwardingUnit,
      forwardingEnabled: this.forwardingEnabled,
    });

    const memoryStall = memory.status === "stall";
    const mispredict = !memoryStall && !trap && execute.resolution?.mispredicted === true;
    const loadUseHazard = decode.hazards.loadUseHazard;
    const dataHazard = decode.hazards.dataHazard && !loadUseHazard;
    const decodeStall = !memoryStall && !trap && !mispredict && (loadUseHazard || dataHazard);
    const ifIdHeld = memoryStall || decodeStall;

    // Fetch. The wrong path is never sent to the instruction cache.
    const fetch: IFStageResult =
      this.fetchHalted || trap || ifIdHeld || mispredict
        ? { status: "idle" }
        : this.ifStage.run({
            fetchPc: this.pc,
            sequence: this.nextSequence,
            instructionCache: this.memorySystem.instructionCache,
            predictor: this.predictor,
            hasInstruction: (address) => this.hasInstruction(address),
          });

    const control: CycleControl = {
      trap,
      memoryStall,
      mispredict,
      loadUseHazard: decodeStall && loadUseHazard,
      dataHazard: decodeStall && dataHazard,
      decodeStall,
      fetchStall: fetch.status === "stall" && !mispredict,
      hazards: decode.hazards.sources,
    };

    let flushedInstructions = 0;
    if (mispredict) {
      flushedInstructions = Number(this.ifId.isOccupied()) + Number(!this.fetchHalted && this.hasInstruction(this.pc));
    } else if (trap) {
      flushedInstructions = Number(this.idEx.isOccupied()) + Number(this.ifId.isOccupied());
    }

    // Latch selection
    let bubblesInserted = 0;
    const insertBubble = (latch: { bubble(): void }): void => {
      latch.bubble();
      bubblesInserted += 1;
    };

    if (memoryStall) {
      insertBubble(this.memWb);
      this.exMem.hold();
      this.idEx.hold();
      this.ifId.hold();
    } else {
      this.memWb.setNext(propagate(this.exMem.getCurrent(), memory.status === "done" ? memory.output : null));

      if (trap) insertBubble(this.exMem);
      else this.exMem.setNext(propagate(this.idEx.getCurrent(), execute.executed));

      if (trap || mispredict || decodeStall) insertBubble(this.idEx);
      else this.idEx.setNext(propagate(this.ifId.getCurrent(), decode.decoded));

      if (trap || mispredict) insertBubble(this.ifId);
      else if (decodeStall) this.ifId.hold();
      else if (fetch.status === "stall") insertBubble(this.ifId);
      else if (fetch.status === "fetched") this.ifId.setNext(validSlot(fetch.payload));
      else this.ifId.setNext(EMPTY_SLOT);
    }

    // Commit
    let retired: RetiredInstruction | null = null;
    let halt = false;
    if (writeback.status === "retired") {
      retired = writeback.retired;
      halt = writeback.halt;
      if (retired.write) {
        this.registerFile.write(retired.write.register, retired.write.value);
      }
    }

    const resolution = execute.resolution;
    const resolved = resolution !== null && !memoryStall && !trap;
    if (resolved && resolution.isControl) {
      this.predictor.update(resolution.pc, { taken: resolution.taken, target: resolution.target });
    } else if (resolved && resolution.mispredicted) {
      this.predictor.invalidate(resolution.pc);
    }

    this.memorySystem.clock();

    this.memWb.advance();
    this.exMem.advance();
    this.idEx.advance();
    this.ifId.advance();

    if (trap) {
      this.fetchHalted = true;
    } else if (mispredict && resolution) {
      this.pc = resolution.actualNextPc;
    } else if (!ifIdHeld && fetch.status === "fetched") {
      this.pc = fetch.payload.prediction.nextPc;
      this.nextSequence += 1;
    }

    this.statistics.recordCycle({
      retired: retired !== null,
      loadUseStall: control.loadUseHazard,
      dataStall: control.dataHazard,
      fetchStall: control.fetchStall,
      memoryStall,
      bubblesInserted,
      flushed: mispredict || trap,
      flushedInstructions,
      branchResolved: resolved && resolution.isControl,
      mispredicted: mispredict,
    });

    if (retired) {
      this.onRetire?.(retired, cycle);
    }

    if (halt) {
      this.status = "halted";
    } else if (this.isDrained() && (this.fetchHalted || !this.hasInstruction(this.pc))) {
      this.status = "halted";
    }

    this.publish(cycle, control);
    return this.status;
  }

  run(maxCycles = Number.MAX_SAFE_INTEGER): CoreStatus {
    let cycles = 0;
    while (this.status === "running" && cycles < maxCycles) {
      this.step();
      cycles += 1;
    }
    return this.status;
  }

  /**
   * Empties every latch and returns fetch to the reset vector. The predictor,
   * caches and bus go cold; backing memory and the loaded program are kept.
   */
  reset(): void {
    this.ifId.clear();
    this.idEx.clear();
    this.exMem.clear();
    this.memWb.clear();
    this.scoreboard.clear();
    this.registerFile.reset();
    this.predictor.reset();
    this.memorySystem.reset();
    this.statistics.reset();
    this.pc = this.config.resetVector;
    this.fetchHalted = false;
    this.status = "running";
    this.fault = null;
    this.nextSequence = 0;
  }

  private rebuildScoreboard(
    execute: EXStageResult,
    memoryInput: ExMemPayload | null,
    memory: MEMStageResult,
    writeback: WBStageResult,
  ): void {
    this.scoreboard.clear();

    const executed = execute.executed;
    if (executed && !executed.fault && executed.decoded?.writesRd) {
      const isLoad = executed.decoded.kind === "load";
      this.scoreboard.record({
        register: executed.decoded.rd,
        stage: "execute",
        available: !isLoad,
        value: executed.result,
        isLoad,
        sequence: executed.sequence,
      });
    }

    if (memoryInput && !memoryInput.fault && memoryInput.decoded?.writesRd) {
      const done = memory.status === "done" && memory.output.fault === null;
      this.scoreboard.record({
        register: memoryInput.decoded.rd,
        stage: "memory",
        available: done,
        value: memory.status === "done" ? memory.output.value : 0,
        isLoad: memoryInput.decoded.kind === "load",
        sequence: memoryInput.sequence,
      });
    }

    if (writeback.status === "retired" && writeback.retired.write) {
      this.scoreboard.record({
        register: writeback.retired.write.register,
        stage: "writeback",
        available: true,
        value: writeback.retired.write.value,
        isLoad: false,
        sequence: writeback.retired.sequence,
      });
    }
  }

  private stopOnFault(fault: CpuException, cycle: number): CoreStatus {
    this.fault = fault;
    this.status = "fault";
    this.log(`[Pipeline] ${fault.name} at ${formatHex(fault.pc ?? this.pc)}: ${fault.message}`);

    this.statistics.recordCycle({
      retired: false,
      loadUseStall: false,
      dataStall: false,
      fetchStall: false,
      memoryStall: false,
      bubblesInserted: 0,
      flushed: false,
      flushedInstructions: 0,
      branchResolved: false,
      mispredicted: false,
    });
    this.publish(cycle, {
      trap: false,
      memoryStall: false,
      mispredict: false,
      loadUseHazard: false,
      dataHazard: false,
      decodeStall: false,
      fetchStall: false,
      hazards: [],
    });
    return this.status;
  }

  private isDrained(): boolean {
    return !this.ifId.isOccupied() && !this.idEx.isOccupied() && !this.exMem.isOccupied() && !this.memWb.isOccupied();
  }

  private publish(cycle: number, control: CycleControl): void {
    const stageState = <T extends { pc: number; word: number; fault: CpuException | null }>(
      slot: PipelineSlot<T>,
      name: (payload: T) => string | null,
      stalled: boolean,
      flushed: boolean,
    ): PipelineStageState => {
      const payload = payloadOf(slot);
      return {
        state: slot.state,
        pc: payload?.pc ?? null,
        instruction: payload?.word ?? null,
        decodedName: payload ? name(payload) : null,
        stalled,
        flushed,
        fault: payload?.fault?.message ?? null,
      };
    };

    const registers: Record<PipelineLatchName, PipelineStageState> = {
      ifId: stageState(
        this.ifId.getCurrent(),
        (payload) => decodeInstruction(payload.word)?.name ?? null,
        control.memoryStall || control.decodeStall,
        control.mispredict || control.trap,
      ),
      idEx: stageState(
        this.idEx.getCurrent(),
        (payload) => payload.decoded?.name ?? null,
        control.memoryStall,
        control.mispredict || control.trap,
      ),
      exMem: stageState(this.exMem.getCurrent(), (payload) => payload.decoded?.name ?? null, control.memoryStall, control.trap),
      memWb: stageState(this.memWb.getCurrent(), (payload) => payload.decoded?.name ?? null, false, false),
    };

    const snapshot: PipelineSnapshot = {
      cycle,
      pc: this.pc,
      status: this.status,
      registers,
      loadUseHazard: control.loadUseHazard,
      dataHazard: control.dataHazard,
      fetchStall: control.fetchStall,
      memoryStall: control.memoryStall,
      mispredict: control.mispredict,
      trap: control.trap,
      forwardingEnabled: this.forwardingEnabled,
      hazards: control.hazards,
      statistics: this.statistics.getSnapshot(),
    };

    publishPipelineSnapshot(snapshot);
    this.trace?.(formatPipelineSnapshot(snapshot));
  }
}
