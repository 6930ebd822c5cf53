import type { SourceHazard } from "../pipeline/HazardUnit";
import { createEmptyStatisticsSnapshot, type PipelineStatisticsSnapshot } from "../pipeline/PipelineStatistics";
import type { PipelineLatchName, SlotState } from "../pipeline/PipelineTypes";

export type CoreStatus = "running" | "halted" | "fault";

export interface PipelineStageState {
  state: SlotState;
  pc: number | null;
  instruction: number | null;
  decodedName: string | null;
  stalled: boolean;
  flushed: boolean;
  fault: string | null;
}

export interface PipelineSnapshot {
  cycle: number;
  /** Fetch address for the next cycle. */
  pc: number;
  status: CoreStatus;
  registers: Record<PipelineLatchName, PipelineStageState>;
  loadUseHazard: boolean;
  dataHazard: boolean;
  fetchStall: boolean;
  memoryStall: boolean;
  mispredict: boolean;
  trap: boolean;
  forwardingEnabled: boolean;
  hazards: SourceHazard[];
  statistics: PipelineStatisticsSnapshot;
}

type PipelineListener = (snapshot: PipelineSnapshot) => void;

const listeners = new Set<PipelineListener>();

const LATCH_LABELS: Record<PipelineLatchName, string> = {
  ifId: "IF/ID",
  idEx: "ID/EX",
  exMem: "EX/MEM",
  memWb: "MEM/WB",
};

export const PIPELINE_LATCHES: readonly PipelineLatchName[] = ["ifId", "idEx", "exMem", "memWb"];

function createStageState(): PipelineStageState {
  return {
    state: "empty",
    pc: null,
    instruction: null,
    decodedName: null,
    stalled: false,
    flushed: false,
    fault: null,
  };
}

export function createEmptyPipelineSnapshot(overrides: Partial<PipelineSnapshot> = {}): PipelineSnapshot {
  return {
    cycle: 0,
    pc: 0,
    status: "running",
    registers: {
      ifId: createStageState(),
      idEx: createStageState(),
      exMem: createStageState(),
      memWb: createStageState(),
    },
    loadUseHazard: false,
    dataHazard: false,
    fetchStall: false,
    memoryStall: false,
    mispredict: false,
    trap: false,
    forwardingEnabled: true,
    hazards: [],
    statistics: createEmptyStatisticsSnapshot(),
    ...overrides,
  };
}

let latestSnapshot: PipelineSnapshot = createEmptyPipelineSnapshot();

export function publishPipelineSnapshot(snapshot: PipelineSnapshot): void {
  latestSnapshot = snapshot;
  listeners.forEach((listener) => listener(snapshot));
}

export function subscribeToPipelineSnapshots(listener: PipelineListener): () => void {
  listeners.add(listener);
  listener(latestSnapshot);
  return () => listeners.delete(listener);
}

export function getLatestPipelineSnapshot(): PipelineSnapshot {
  return latestSnapshot;
}

export function hasPipelineListeners(): boolean {
  return listeners.size > 0;
}

export function formatHex(value: number): string {
  return `0x${(value >>> 0).toString(16).padStart(8, "0")}`;
}

function formatStage(stage: PipelineStageState): string {
  if (stage.state === "empty") return "-";
  if (stage.state === "bubble") return "bubble";
  const label = stage.decodedName ?? (stage.instruction === null ? "?" : formatHex(stage.instruction));
  const pc = stage.pc === null ? "" : `@${formatHex(stage.pc)}`;
  return stage.fault ? `${label}${pc}!` : `${label}${pc}`;
}

/**
 * One trace line per cycle, e.g.
 * `[5] pc=0x00000068 IF/ID=bubble ID/EX=bubble EX/MEM=beq@0x00000064 MEM/WB=addi@0x00000060 mispredict`.
 */
export function formatPipelineSnapshot(snapshot: PipelineSnapshot): string {
  const stages = PIPELINE_LATCHES.map((latch) => `${LATCH_LABELS[latch]}=${formatStage(snapshot.registers[latch])}`);
  const flags = [
    snapshot.loadUseHazard ? "load-use" : null,
    snapshot.dataHazard ? "data-stall" : null,
    snapshot.fetchStall ? "fetch-stall" : null,
    snapshot.memoryStall ? "mem-stall" : null,
    snapshot.mispredict ? "mispredict" : null,
    snapshot.trap ? "trap" : null,
  ].filter((flag): flag is string => flag !== null);

  const line = `[${snapshot.cycle}] pc=${formatHex(snapshot.pc)} ${stages.join(" ")}`;
  return flags.length > 0 ? `${line} ${flags.join(",")}` : line;
}
