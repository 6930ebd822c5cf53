import assert from "node:assert";
import { describe, test } from "node:test";

import {
  assemble,
  createCore,
  ReferenceCpu,
  resolveCoreConfig,
  subscribeToPipelineSnapshots,
  type CoreConfigOverrides,
  type CoreOptions,
  type PipelineSnapshot,
} from "../../src/core";

const COPY_AND_SUM = [
  ".data",
  "src: .word 1, 2, 3, 4, 5, 6, 7, 8",
  "dst: .word 0, 0, 0, 0, 0, 0, 0, 0",
  ".text",
  "_start:",
  "  la x10, src",
  "  la x11, dst",
  "  li x12, 8",
  "  li x13, 0",
  "loop:",
  "  lw x5, 0(x10)",
  "  add x13, x13, x5",
  "  slli x6, x5, 1",
  "  sw x6, 0(x11)",
  "  addi x10, x10, 4",
  "  addi x11, x11, 4",
  "  addi x12, x12, -1",
  "  bnez x12, loop",
  "  sw x13, 0(x11)",
  "  ecall",
].join("\n");

function runBoth(config: CoreConfigOverrides, options: CoreOptions = {}) {
  const image = assemble(COPY_AND_SUM);
  const core = createCore({ ...options, config });
  core.load(image);
  const status = core.run(20_000);

  const reference = new ReferenceCpu({ config: resolveCoreConfig(config) });
  reference.load(image);
  reference.run();

  return { core, reference, status };
}

describe("pipeline against the reference model", () => {
  const configurations: Array<[string, CoreConfigOverrides]> = [
    ["default caches", {}],
    ["tiny direct-mapped caches", { dataCache: { sets: 1, ways: 1, lineSize: 4 }, instructionCache: { sets: 2, ways: 1, lineSize: 8 } }],
    ["fifo replacement and slow memory", { dataCache: { sets: 2, ways: 2, replacement: "fifo" }, memory: { readLatency: 4, writeLatency: 3 } }],
    ["one outstanding read", { bus: { maxOutstandingReads: 1 } }],
    ["forwarding disabled", { forwardingEnabled: false }],
  ];

  for (const [label, config] of configurations) {
    test(`agrees on registers and memory with ${label}`, () => {
      const { core, reference, status } = runBoth(config);

      assert.strictEqual(status, "halted");
      assert.strictEqual(reference.getStatus(), "halted");
      assert.deepStrictEqual(core.getRegisters(), reference.getRegisters());
      assert.strictEqual(core.getRegisters()[13], 36);
      for (let i = 0; i < 9; i++) {
        const address = 0x8020 + i * 4;
        assert.strictEqual(core.getMemorySystem().debugReadWord(address), reference.readWord(address));
      }
      assert.strictEqual(reference.readWord(0x8040), 36);
      assert.strictEqual(core.getStatistics().instructions, reference.getRetiredCount());
    });
  }

  test("survives memory back-pressure without protocol violations", () => {
    const { core, reference, status } = runBoth({}, { readyPolicy: (_channel, cycle) => cycle % 4 === 1 });

    assert.strictEqual(status, "halted");
    assert.deepStrictEqual(core.getRegisters(), reference.getRegisters());
    assert.deepStrictEqual(core.getMemorySystem().monitor.getViolations(), []);
  });
});

describe("stepping", () => {
  test("single steps reach the same state as one run", () => {
    const image = assemble(COPY_AND_SUM);
    const stepped = createCore();
    stepped.load(image);
    let steps = 0;
    while (stepped.step() === "running") steps += 1;

    const ran = createCore();
    ran.load(image);
    ran.run();

    assert.strictEqual(steps + 1, ran.getStatistics().cycles);
    assert.deepStrictEqual(stepped.getStatistics(), ran.getStatistics());
    assert.deepStrictEqual(stepped.getRegisters(), ran.getRegisters());
  });

  test("publishes a snapshot every cycle", () => {
    const snapshots: PipelineSnapshot[] = [];
    const core = createCore();
    core.load(assemble(["addi x1, x0, 1", "addi x2, x0, 2"].join("\n")), { warmCaches: true });

    const unsubscribe = subscribeToPipelineSnapshots((snapshot) => snapshots.push(snapshot));
    core.run(100);
    unsubscribe();

    const published = snapshots.slice(1);
    assert.deepStrictEqual(
      published.map((snapshot) => snapshot.cycle),
      [1, 2, 3, 4, 5, 6],
    );
    const last = published[published.length - 1];
    assert.strictEqual(last.status, "halted");
    assert.strictEqual(last.statistics.instructions, 2);
  });
});
