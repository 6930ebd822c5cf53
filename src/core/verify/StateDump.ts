import { Assembler, type BinaryImage } from "../assembler/Assembler";
import { resolveCoreConfig, type CoreConfigOverrides } from "../config/CoreConfig";
import { ReferenceCpu } from "../cpu/ReferenceCpu";
import { PipelineSimulator } from "../pipeline/PipelineSimulator";
import { ProgramLoader } from "../loader/ProgramLoader";
import type { CoreStatus } from "../tools/pipelineEvents";

/** Index to lowercase 8-digit hex value. */
export type StateDump = Map<number, string>;

export interface DumpMismatch {
  index: number;
  /** `"MISSING"` when the index is absent from that side. */
  actual: string;
  expected: string;
}

export function formatDumpValue(value: number): string {
  return (value >>> 0).toString(16).padStart(8, "0");
}

export function formatRegisterDump(registers: readonly number[]): string {
  return registers.map((value, index) => `[${index}] ${formatDumpValue(value)}`).join("\n");
}

/** Dumps `count` consecutive words starting at `base`, indexed by word. */
export function formatMemoryDump(readWord: (address: number) => number, base: number, count: number): string {
  const lines: string[] = [];
  for (let index = 0; index < count; index++) {
    lines.push(`[${index}] ${formatDumpValue(readWord((base + index * 4) >>> 0))}`);
  }
  return lines.join("\n");
}

export function parseStateDump(text: string): StateDump {
  const dump: StateDump = new Map();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith("//")) continue;

    const match = /^\[(\d+)\]\s*(\S+)/.exec(line);
    if (!match) continue;
    dump.set(Number(match[1]), match[2].toLowerCase());
  }
  return dump;
}

export function compareStateDumps(actual: StateDump, expected: StateDump): DumpMismatch[] {
  const indices = new Set([...actual.keys(), ...expected.keys()]);
  return Array.from(indices)
    .sort((a, b) => a - b)
    .map((index) => ({
      index,
      actual: actual.get(index) ?? "MISSING",
      expected: expected.get(index) ?? "MISSING",
    }))
    .filter((entry) => entry.actual !== entry.expected);
}

export interface VerificationOptions {
  config?: CoreConfigOverrides;
  /** Data words compared, starting at `memoryBase`. */
  memoryWords?: number;
  /** Defaults to the lowest data address of the image, or 0 without data. */
  memoryBase?: number;
  maxCycles?: number;
  warmCaches?: boolean;
}

export interface VerificationReport {
  passed: boolean;
  pipelineStatus: CoreStatus;
  referenceStatus: CoreStatus;
  cycles: number;
  retired: number;
  registerMismatches: DumpMismatch[];
  memoryMismatches: DumpMismatch[];
  registerDump: string;
  memoryDump: string;
}

const DEFAULT_MEMORY_WORDS = 32;
const DEFAULT_MAX_CYCLES = 100_000;

/**
 * Runs one program on the pipeline and on the sequential reference, then
 * compares register and data-memory dumps.
 */
export function verifyAgainstReference(program: string | BinaryImage, options: VerificationOptions = {}): VerificationReport {
  const image = typeof program === "string" ? new Assembler().assemble(program) : program;
  const config = resolveCoreConfig(options.config);
  const maxCycles = options.maxCycles ?? DEFAULT_MAX_CYCLES;
  const memoryWords = options.memoryWords ?? DEFAULT_MEMORY_WORDS;
  const memoryBase = options.memoryBase ?? image.data[0]?.address ?? 0;
  // The window stops at the end of backing memory.
  const wordsInMemory = Math.max(0, Math.floor((config.memory.capacity - memoryBase) / 4));
  const dumpWords = Math.min(memoryWords, wordsInMemory);

  const pipeline = new PipelineSimulator({ config, log: () => undefined });
  new ProgramLoader(pipeline).load(image, { warmCaches: options.warmCaches });
  const pipelineStatus = pipeline.run(maxCycles);

  const reference = new ReferenceCpu({ config });
  reference.load(image);
  const referenceStatus = reference.run(maxCycles);

  const memorySystem = pipeline.getMemorySystem();
  const registerDump = formatRegisterDump(pipeline.getRegisterFile().snapshot());
  const memoryDump = formatMemoryDump((address) => memorySystem.debugReadWord(address), memoryBase, dumpWords);

  const registerMismatches = compareStateDumps(
    parseStateDump(registerDump),
    parseStateDump(formatRegisterDump(reference.getRegisters())),
  );
  const memoryMismatches = compareStateDumps(
    parseStateDump(memoryDump),
    parseStateDump(formatMemoryDump((address) => reference.readWord(address), memoryBase, dumpWords)),
  );

  const statistics = pipeline.getStatistics();
  return {
    passed: pipelineStatus === referenceStatus && registerMismatches.length === 0 && memoryMismatches.length === 0,
    pipelineStatus,
    referenceStatus,
    cycles: statistics.cycles,
    retired: statistics.instructions,
    registerMismatches,
    memoryMismatches,
    registerDump,
    memoryDump,
  };
}
