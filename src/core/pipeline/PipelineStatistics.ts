export interface PipelineStatisticsSnapshot {
  cycles: number;
  instructions: number;
  cpi: number;
  loadUseStalls: number;
  dataStalls: number;
  fetchStallCycles: number;
  memoryStallCycles: number;
  bubbles: number;
  flushes: number;
  flushedInstructions: number;
  branches: number;
  mispredictions: number;
}

export interface CycleObservation {
  retired: boolean;
  loadUseStall: boolean;
  dataStall: boolean;
  fetchStall: boolean;
  memoryStall: boolean;
  bubblesInserted: number;
  flushed: boolean;
  flushedInstructions: number;
  branchResolved: boolean;
  mispredicted: boolean;
}

export class PipelineStatistics {
  private cycles = 0;
  private instructions = 0;
  private loadUseStalls = 0;
  private dataStalls = 0;
  private fetchStallCycles = 0;
  private memoryStallCycles = 0;
  private bubbles = 0;
  private flushes = 0;
  private flushedInstructions = 0;
  private branches = 0;
  private mispredictions = 0;

  recordCycle(observation: CycleObservation): void {
    this.cycles += 1;
    if (observation.retired) this.instructions += 1;
    if (observation.loadUseStall) this.loadUseStalls += 1;
    if (observation.dataStall) this.dataStalls += 1;
    if (observation.fetchStall) this.fetchStallCycles += 1;
    if (observation.memoryStall) this.memoryStallCycles += 1;
    this.bubbles += observation.bubblesInserted;
    if (observation.flushed) {
      this.flushes += 1;
      this.flushedInstructions += observation.flushedInstructions;
    }
    if (observation.branchResolved) this.branches += 1;
    if (observation.mispredicted) this.mispredictions += 1;
  }

  reset(): void {
    this.cycles = 0;
    this.instructions = 0;
    this.loadUseStalls = 0;
    this.dataStalls = 0;
    this.fetchStallCycles = 0;
    this.memoryStallCycles = 0;
    this.bubbles = 0;
    this.flushes = 0;
    this.flushedInstructions = 0;
    this.branches = 0;
    this.mispredictions = 0;
  }

  getCycleCount(): number {
    return this.cycles;
  }

  getSnapshot(): PipelineStatisticsSnapshot {
    return {
      cycles: this.cycles,
      instructions: this.instructions,
      cpi: this.instructions === 0 ? 0 : this.cycles / this.instructions,
      loadUseStalls: this.loadUseStalls,
      dataStalls: this.dataStalls,
      fetchStallCycles: this.fetchStallCycles,
      memoryStallCycles: this.memoryStallCycles,
      bubbles: this.bubbles,
      flushes: this.flushes,
      flushedInstructions: this.flushedInstructions,
      branches: this.branches,
      mispredictions: this.mispredictions,
    };
  }
}

export function createEmptyStatisticsSnapshot(): PipelineStatisticsSnapshot {
  return new PipelineStatistics().getSnapshot();
}
