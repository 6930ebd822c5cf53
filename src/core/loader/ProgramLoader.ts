import type { BinaryImage } from "../assembler/Assembler";
import type { PipelineSimulator } from "../pipeline/PipelineSimulator";

export interface ProgramLoadOptions {
  /** Pre-fill both caches with the loaded lines, as block RAM initialised at power-on. */
  warmCaches?: boolean;
  /** Override the image entry point. */
  entryPoint?: number;
}

export interface ProgramLayout {
  entryPoint: number;
  textWords: number;
  dataWords: number;
  symbols: Record<string, number>;
}

export class ProgramLoader {
  constructor(private readonly pipeline: PipelineSimulator) {}

  load(image: BinaryImage, options: ProgramLoadOptions = {}): ProgramLayout {
    const memorySystem = this.pipeline.getMemorySystem();
    const { slave, instructionCache, dataCache } = memorySystem;

    // Stale lines would shadow the freshly written image, and a queued write-back would overwrite it.
    instructionCache.invalidateAll();
    dataCache.invalidateAll();
    memorySystem.cancelTransfers();

    for (const { address, word } of image.text) {
      slave.writeWord(address, word);
    }
    for (const { address, value } of image.data) {
      slave.writeWord(address, value);
    }

    if (options.warmCaches) {
      image.text.forEach(({ address }) => instructionCache.preload(address));
      image.data.forEach(({ address }) => dataCache.preload(address));
    }

    const entryPoint = (options.entryPoint ?? image.entryPoint) >>> 0;
    if (entryPoint % 4 !== 0) {
      throw new RangeError(`Entry point must be word aligned (got 0x${entryPoint.toString(16)})`);
    }
    this.pipeline.setProgram(
      entryPoint,
      image.text.map(({ address }) => address),
    );

    return {
      entryPoint,
      textWords: image.text.length,
      dataWords: image.data.length,
      symbols: { ...image.symbols },
    };
  }
}
