import assert from "node:assert";
import { describe, test } from "node:test";

import { assembleAndLoad } from "../../src/core";

const DEPENDENT_PAIR = ["addi x1, x0, 5", "add x2, x1, x1"].join("\n");

describe("PipelineSimulator forwarding toggle", () => {
  test("waits for writeback when forwarding is disabled", () => {
    const trace: string[] = [];
    const { core } = assembleAndLoad(DEPENDENT_PAIR, {
      forwardingEnabled: false,
      trace: (line) => trace.push(line),
      loadOptions: { warmCaches: true },
    });

    assert.strictEqual(core.run(100), "halted");

    assert.strictEqual(trace[2], "[3] pc=0x00000008 IF/ID=add@0x00000004 ID/EX=bubble EX/MEM=addi@0x00000000 MEM/WB=- data-stall");
    assert.strictEqual(core.getStatistics().cycles, 8);
    assert.strictEqual(core.getStatistics().dataStalls, 2);
    assert.strictEqual(core.getRegisters()[2], 10);
  });

  test("takes effect between runs", () => {
    const { core } = assembleAndLoad(DEPENDENT_PAIR, { loadOptions: { warmCaches: true } });
    assert.strictEqual(core.getForwardingEnabled(), true);
    core.run(100);
    assert.strictEqual(core.getStatistics().cycles, 6);

    core.setForwardingEnabled(false);
    core.reset();
    core.run(100);

    assert.strictEqual(core.getForwardingEnabled(), false);
    assert.strictEqual(core.getStatistics().cycles, 8);
  });

  test("follows the configured default", () => {
    const { core } = assembleAndLoad(DEPENDENT_PAIR, { config: { forwardingEnabled: false } });
    assert.strictEqual(core.getForwardingEnabled(), false);
  });
});
