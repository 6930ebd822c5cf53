import assert from "node:assert";
import { describe, test } from "node:test";

import { assembleAndLoad, type CoreOptions } from "../../src/core";

function load(lines: string[], options: CoreOptions = {}, warmCaches = true) {
  return assembleAndLoad(lines.join("\n"), { log: () => undefined, ...options, loadOptions: { warmCaches } }).core;
}

describe("PipelineSimulator", () => {
  test("forwards ALU results and stalls once for a load-use dependency", () => {
    const core = load([
      ".data",
      ".org 8",
      ".word 7",
      ".text",
      ".org 0x1000",
      "add x3, x1, x2",
      "sub x4, x3, x1",
      "lw x5, 3(x4)",
      "add x6, x5, x5",
    ]);
    const registers = core.getPipeline().getRegisterFile();
    registers.write(1, 10);
    registers.write(2, 5);

    assert.strictEqual(core.run(100), "halted");

    const stats = core.getStatistics();
    assert.strictEqual(stats.cycles, 9);
    assert.strictEqual(stats.instructions, 4);
    assert.strictEqual(stats.loadUseStalls, 1);
    assert.strictEqual(stats.bubbles, 1);
    assert.deepStrictEqual(core.getRegisters().slice(3, 7), [15, 5, 7, 14]);
  });

  test("fills the pipeline in five cycles for independent instructions", () => {
    const core = load(["addi x1, x0, 5", "add x2, x1, x1"]);

    assert.strictEqual(core.step(), "running");
    assert.strictEqual(core.getPc(), 4);
    assert.strictEqual(core.run(100), "halted");

    assert.strictEqual(core.getStatistics().cycles, 6);
    assert.strictEqual(core.getStatistics().dataStalls, 0);
    assert.strictEqual(core.getRegisters()[2], 10);
  });

  test("flushes the wrong path after a mispredicted branch", () => {
    const trace: string[] = [];
    const core = load(
      [
        ".org 92",
        "addi x1, x0, 1",
        "addi x2, x0, 2",
        "beq x1, x2, target",
        "addi x3, x0, 3",
        "addi x4, x0, 4",
        ".org 200",
        "target: addi x5, x0, 5",
        "addi x6, x0, 6",
      ],
      { trace: (line) => trace.push(line) },
    );
    core.getPredictor().update(100, { taken: true, target: 200 });

    assert.strictEqual(core.run(100), "halted");

    assert.strictEqual(
      trace[4],
      "[5] pc=0x00000068 IF/ID=bubble ID/EX=bubble EX/MEM=beq@0x00000064 MEM/WB=addi@0x00000060 mispredict",
    );
    const stats = core.getStatistics();
    assert.strictEqual(stats.cycles, 11);
    assert.strictEqual(stats.instructions, 5);
    assert.strictEqual(stats.flushes, 1);
    assert.strictEqual(stats.flushedInstructions, 2);
    assert.strictEqual(stats.branches, 1);
    assert.strictEqual(stats.mispredictions, 1);
    assert.deepStrictEqual(core.getRegisters().slice(3, 7), [3, 4, 0, 0]);
    assert.strictEqual(core.getPredictor().getState(100), "weakly-not-taken");
  });

  test("does not touch the instruction cache on the wrong path of a mispredict", () => {
    const core = load(
      [
        ".org 92",
        "addi x1, x0, 1",
        "addi x2, x0, 2",
        "beq x1, x2, target",
        "addi x3, x0, 3",
        "addi x4, x0, 4",
        ".org 0xcc",
        "target: addi x5, x0, 5",
        "addi x6, x0, 6",
      ],
      {},
      false,
    );
    const { instructionCache } = core.getMemorySystem();
    // Every line except the one holding the second wrong-path instruction.
    [0x50, 0x60, 0xc0].forEach((address) => instructionCache.preload(address));
    core.getPredictor().update(100, { taken: true, target: 0xcc });

    assert.strictEqual(core.run(100), "halted");

    const stats = core.getStatistics();
    assert.strictEqual(stats.cycles, 11);
    assert.strictEqual(stats.mispredictions, 1);
    assert.strictEqual(stats.flushedInstructions, 2);
    assert.strictEqual(instructionCache.getStats().misses, 0);
    assert.deepStrictEqual(core.getRegisters().slice(3, 7), [3, 4, 0, 0]);
  });

  test("trains the predictor on a taken backward branch", () => {
    const core = load([
      "addi x1, x0, 3",
      "loop: addi x1, x1, -1",
      "bnez x1, loop",
      "addi x2, x0, 9",
    ]);

    assert.strictEqual(core.run(200), "halted");

    const stats = core.getStatistics();
    assert.strictEqual(stats.branches, 3);
    assert.strictEqual(stats.mispredictions, 2);
    assert.deepStrictEqual(core.getRegisters().slice(1, 3), [0, 9]);
    assert.strictEqual(core.getPredictor().getState(8), "weakly-taken");
  });

  test("stalls fetch while the instruction cache fills", () => {
    const core = load(["addi x1, x0, 1"], {}, false);

    assert.strictEqual(core.run(100), "halted");

    const stats = core.getStatistics();
    assert.strictEqual(stats.cycles, 11);
    assert.strictEqual(stats.fetchStallCycles, 6);
    assert.strictEqual(core.getRegisters()[1], 1);
  });

  test("stores land in the data cache", () => {
    const core = load(["addi x1, x0, 0x55", "sw x1, 0x20(x0)", "lbu x2, 0x20(x0)"], {}, false);

    assert.strictEqual(core.run(500), "halted");

    assert.strictEqual(core.getMemorySystem().debugReadWord(0x20), 0x55);
    assert.strictEqual(core.getRegisters()[2], 0x55);
  });

  test("reports each retired instruction in program order", () => {
    const retired: string[] = [];
    const core = load(["addi x1, x0, 1", "addi x2, x1, 1", "ecall"], {
      onRetire: (instruction, cycle) => retired.push(`${cycle}:${instruction.name}@${instruction.pc}`),
    });

    core.run(100);

    assert.deepStrictEqual(retired, ["5:addi@0", "6:addi@4", "7:ecall@8"]);
  });

  test("reset reloads the program and clears statistics", () => {
    const core = load(["addi x1, x0, 5", "add x2, x1, x1"]);
    core.run(100);

    core.reset();

    assert.strictEqual(core.getStatus(), "running");
    assert.strictEqual(core.getPc(), 0);
    assert.strictEqual(core.getStatistics().cycles, 0);
    assert.strictEqual(core.getRegisters()[2], 0);

    assert.strictEqual(core.run(100), "halted");
    assert.strictEqual(core.getStatistics().cycles, 6);
    assert.strictEqual(core.getRegisters()[2], 10);
  });
});
