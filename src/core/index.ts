import { Assembler, type BinaryImage } from "./assembler/Assembler";
import type { ReadyPolicy } from "./bus/MemorySlave";
import { resolveCoreConfig, type CoreConfigOverrides, type ResolvedCoreConfig } from "./config/CoreConfig";
import type { CpuException } from "./exceptions/ExecutionExceptions";
import { ProgramLoader, type ProgramLayout, type ProgramLoadOptions } from "./loader/ProgramLoader";
import { MemorySystem } from "./memory/MemorySystem";
import type { BranchPredictor } from "./pipeline/BranchPredictor";
import { PipelineSimulator } from "./pipeline/PipelineSimulator";
import type { PipelineStatisticsSnapshot } from "./pipeline/PipelineStatistics";
import type { RetiredInstruction } from "./pipeline/WBStage";
import type { CoreStatus } from "./tools/pipelineEvents";

export * from "./assembler/Assembler";
export * from "./assembler/Encoder";
export * from "./bus/BusAdapter";
export * from "./bus/BusMonitor";
export * from "./bus/Handshake";
export * from "./bus/MemorySlave";
export * from "./config/CoreConfig";
export * from "./cpu/ExecutionUnit";
export * from "./cpu/Instructions";
export * from "./cpu/ReferenceCpu";
export * from "./exceptions/AccessExceptions";
export * from "./exceptions/ExecutionExceptions";
export * from "./loader/ImageParser";
export * from "./loader/ProgramLoader";
export * from "./memory/Caches";
export * from "./memory/MemorySystem";
export * from "./pipeline/BranchPredictor";
export * from "./pipeline/PipelineSimulator";
export * from "./pipeline/PipelineStatistics";
export * from "./pipeline/PipelineTypes";
export * from "./pipeline/WBStage";
export * from "./state/RegisterFile";
export * from "./tools/pipelineEvents";
export * from "./verify/StateDump";

export interface CoreOptions {
  config?: CoreConfigOverrides;
  /** Overrides `config.forwardingEnabled`. */
  forwardingEnabled?: boolean;
  /** Back-pressure applied by the backing memory on its input channels. */
  readyPolicy?: ReadyPolicy;
  trace?: (line: string) => void;
  onRetire?: (instruction: RetiredInstruction, cycle: number) => void;
  log?: (message: string) => void;
}

export class Core {
  private readonly config: ResolvedCoreConfig;
  private readonly memorySystem: MemorySystem;
  private readonly pipeline: PipelineSimulator;
  private readonly loader: ProgramLoader;
  private lastImage: BinaryImage | null = null;
  private lastLoadOptions: ProgramLoadOptions = {};
  private lastLayout: ProgramLayout | null = null;

  constructor(options: CoreOptions = {}) {
    this.config = resolveCoreConfig(options.config);
    this.memorySystem = new MemorySystem({ config: this.config, readyPolicy: options.readyPolicy });
    this.pipeline = new PipelineSimulator({
      config: this.config,
      memorySystem: this.memorySystem,
      forwardingEnabled: options.forwardingEnabled,
      trace: options.trace,
      onRetire: options.onRetire,
      log: options.log,
    });
    this.loader = new ProgramLoader(this.pipeline);
  }

  getConfig(): ResolvedCoreConfig {
    return this.config;
  }

  load(image: BinaryImage, options: ProgramLoadOptions = {}): ProgramLayout {
    this.pipeline.reset();
    this.lastImage = image;
    this.lastLoadOptions = { ...options };
    this.lastLayout = this.loader.load(image, options);
    return this.lastLayout;
  }

  getProgramLayout(): ProgramLayout | null {
    return this.lastLayout;
  }

  step(): CoreStatus {
    return this.pipeline.step();
  }

  run(maxCycles?: number): CoreStatus {
    return this.pipeline.run(maxCycles);
  }

  /**
   * Returns to the state right after the last {@link load}: registers cleared,
   * caches and predictor cold unless the load warmed them, PC at the entry.
   */
  reset(): void {
    this.pipeline.reset();
    if (this.lastImage) {
      this.lastLayout = this.loader.load(this.lastImage, this.lastLoadOptions);
    }
  }

  getStatus(): CoreStatus {
    return this.pipeline.getStatus();
  }

  getPc(): number {
    return this.pipeline.getPc();
  }

  getRegisters(): number[] {
    return this.pipeline.getRegisterFile().snapshot();
  }

  getFault(): CpuException | null {
    return this.pipeline.getFault();
  }

  getStatistics(): PipelineStatisticsSnapshot {
    return this.pipeline.getStatistics();
  }

  getMemorySystem(): MemorySystem {
    return this.memorySystem;
  }

  getPredictor(): BranchPredictor {
    return this.pipeline.getPredictor();
  }

  getPipeline(): PipelineSimulator {
    return this.pipeline;
  }

  setForwardingEnabled(enabled: boolean): void {
    this.pipeline.setForwardingEnabled(enabled);
  }

  getForwardingEnabled(): boolean {
    return this.pipeline.getForwardingEnabled();
  }
}

export function createCore(options: CoreOptions = {}): Core {
  return new Core(options);
}

export function assemble(source: string): BinaryImage {
  return new Assembler().assemble(source);
}

export function assembleAndLoad(
  source: string,
  options: CoreOptions & { loadOptions?: ProgramLoadOptions } = {},
): { image: BinaryImage; layout: ProgramLayout; core: Core } {
  const { loadOptions, ...coreOptions } = options;
  const image = assemble(source);
  const core = new Core(coreOptions);
  const layout = core.load(image, loadOptions);
  return { image, layout, core };
}
