import assert from "node:assert";
import { describe, test } from "node:test";

import { Assembler } from "../../src/core/assembler/Assembler";
import { resolveCoreConfig } from "../../src/core/config/CoreConfig";
import { ProgramLoader } from "../../src/core/loader/ProgramLoader";
import { PipelineSimulator } from "../../src/core/pipeline/PipelineSimulator";

const SOURCE = [".data", "value: .word 42", ".text", "_start: nop", "lw a0, 0(zero)"].join("\n");

describe("ProgramLoader", () => {
  test("writes text and data to backing memory and points fetch at the entry", () => {
    const pipeline = new PipelineSimulator({ log: () => undefined });
    const image = new Assembler().assemble(SOURCE);
    const layout = new ProgramLoader(pipeline).load(image);
    const { slave, instructionCache, dataCache } = pipeline.getMemorySystem();

    assert.deepStrictEqual(layout, { entryPoint: 0, textWords: 2, dataWords: 1, symbols: { value: 0x8000, _start: 0 } });
    assert.strictEqual(slave.readWord(0), 0x13);
    assert.strictEqual(slave.readWord(0x8000), 42);
    assert.strictEqual(pipeline.getPc(), 0);
    assert.strictEqual(pipeline.hasInstruction(4), true);
    assert.strictEqual(pipeline.hasInstruction(8), false);
    assert.strictEqual(instructionCache.peekWord(0), null);
    assert.strictEqual(dataCache.peekWord(0x8000), null);
  });

  test("warms both caches on request", () => {
    const pipeline = new PipelineSimulator({ log: () => undefined });
    new ProgramLoader(pipeline).load(new Assembler().assemble(SOURCE), { warmCaches: true });
    const { instructionCache, dataCache } = pipeline.getMemorySystem();

    assert.strictEqual(instructionCache.peekWord(4), 0x00002503);
    assert.strictEqual(dataCache.peekWord(0x8000), 42);
  });

  test("rejects an unaligned entry point", () => {
    const pipeline = new PipelineSimulator({ log: () => undefined });
    const loader = new ProgramLoader(pipeline);
    assert.throws(() => loader.load(new Assembler().assemble(SOURCE), { entryPoint: 2 }), RangeError);
  });

  test("drops a queued dirty write-back so it cannot overwrite the new image", () => {
    const config = resolveCoreConfig({ dataCache: { sets: 1, ways: 1, lineSize: 4 } });
    const pipeline = new PipelineSimulator({ config, log: () => undefined });
    const memorySystem = pipeline.getMemorySystem();
    const { adapter, slave, dataCache } = memorySystem;

    dataCache.preload(0x100);
    dataCache.access({ address: 0x100, write: { data: 0xdead, byteMask: 0xf } });
    memorySystem.clock();
    // Conflicting miss: evicts the dirty line and queues its write-back ahead of the fill.
    dataCache.access({ address: 0x104 });
    memorySystem.clock();
    assert.strictEqual(adapter.pendingTransactions(), 2);

    new ProgramLoader(pipeline).load({
      entryPoint: 0,
      text: [{ address: 0, word: 0x13, line: 1 }],
      data: [{ address: 0x100, value: 7 }],
      symbols: {},
    });

    assert.strictEqual(adapter.isIdle(), true);
    assert.strictEqual(dataCache.getPhase(), "idle");
    for (let i = 0; i < 50; i++) {
      memorySystem.clock();
    }
    assert.strictEqual(slave.readWord(0x100), 7);
  });
});
