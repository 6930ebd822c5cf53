import { readFileSync } from "node:fs";
import path from "node:path";

import { Assembler, parseHexImage, verifyAgainstReference, type BinaryImage, type DumpMismatch } from "../src/core";

export interface CliOptions {
  file: string;
  memoryWords?: number;
  maxCycles?: number;
  forwarding: boolean;
  warmCaches: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function usage(reason: string): never {
  console.error(reason);
  console.error("Usage: verify-program <program.s|program.hex> [--words N] [--max-cycles N] [--no-forwarding] [--warm]");
  process.exit(2);
}

function positiveInteger(flag: string, value: string | undefined): number {
  const parsed = value === undefined || value.trim() === "" ? Number.NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new UsageError(`${flag} expects a positive integer (got ${value ?? "nothing"})`);
  }
  return parsed;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { file: "", forwarding: true, warmCaches: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--words":
        options.memoryWords = positiveInteger(arg, argv[++i]);
        break;
      case "--max-cycles":
        options.maxCycles = positiveInteger(arg, argv[++i]);
        break;
      case "--no-forwarding":
        options.forwarding = false;
        break;
      case "--warm":
        options.warmCaches = true;
        break;
      default:
        if (arg.startsWith("--")) throw new UsageError(`Unknown option ${arg}`);
        if (options.file) throw new UsageError(`Unexpected argument ${arg}`);
        options.file = arg;
    }
  }
  if (!options.file) throw new UsageError("Missing program file");
  return options;
}

function loadImage(file: string): BinaryImage {
  const source = readFileSync(file, "utf8");
  const extension = path.extname(file).toLowerCase();
  return extension === ".hex" || extension === ".dat" ? parseHexImage(source) : new Assembler().assemble(source);
}

function printMismatches(label: string, mismatches: DumpMismatch[]): void {
  if (mismatches.length === 0) {
    console.log(`${label}: PASS`);
    return;
  }
  console.log(`${label}: FAIL (${mismatches.length} mismatch(es))`);
  for (const { index, actual, expected } of mismatches) {
    console.log(`  [${index}] pipeline: ${actual.padEnd(10)} reference: ${expected}`);
  }
}

function readOptions(argv: string[]): CliOptions {
  try {
    return parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) usage(error.message);
    throw error;
  }
}

function main(): void {
  const options = readOptions(process.argv.slice(2));
  const report = verifyAgainstReference(loadImage(options.file), {
    config: { forwardingEnabled: options.forwarding },
    memoryWords: options.memoryWords,
    maxCycles: options.maxCycles,
    warmCaches: options.warmCaches,
  });

  console.log(`${path.basename(options.file)}: ${report.cycles} cycles, ${report.retired} retired`);
  console.log(`status: pipeline=${report.pipelineStatus} reference=${report.referenceStatus}`);
  printMismatches("registers", report.registerMismatches);
  printMismatches("data memory", report.memoryMismatches);
  process.exit(report.passed ? 0 : 1);
}

if (require.main === module) {
  main();
}
