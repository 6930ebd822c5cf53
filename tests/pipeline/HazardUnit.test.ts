import assert from "node:assert";
import { describe, test } from "node:test";

import type { HazardInfo } from "../../src/core/cpu/Instructions";
import { ForwardingUnit } from "../../src/core/pipeline/ForwardingUnit";
import { HazardUnit } from "../../src/core/pipeline/HazardUnit";
import { Scoreboard, type ScoreboardEntry } from "../../src/core/pipeline/Scoreboard";
import { RegisterFile } from "../../src/core/state/RegisterFile";

function consumer(...sources: number[]): HazardInfo {
  return { sources, destination: 10, isLoad: false, isStore: false, isControl: false };
}

function producer(entry: Partial<ScoreboardEntry> & Pick<ScoreboardEntry, "register" | "stage">): ScoreboardEntry {
  return { available: true, value: 0, isLoad: false, sequence: 0, ...entry };
}

describe("Scoreboard", () => {
  test("keeps the youngest producer of a register and ignores x0", () => {
    const scoreboard = new Scoreboard();
    scoreboard.record(producer({ register: 5, stage: "execute", value: 1, sequence: 3 }));
    scoreboard.record(producer({ register: 5, stage: "memory", value: 2, sequence: 2 }));
    scoreboard.record(producer({ register: 0, stage: "execute", value: 9 }));

    assert.strictEqual(scoreboard.lookup(5)?.stage, "execute");
    assert.strictEqual(scoreboard.lookup(0), null);
    assert.strictEqual(scoreboard.entries().length, 1);
  });
});

describe("HazardUnit", () => {
  const hazardUnit = new HazardUnit();

  test("stalls a consumer of a load still in execute", () => {
    const scoreboard = new Scoreboard();
    scoreboard.record(producer({ register: 1, stage: "execute", available: false, isLoad: true }));

    const report = hazardUnit.detect(consumer(1, 2), scoreboard);

    assert.strictEqual(report.loadUseHazard, true);
    assert.strictEqual(report.dataHazard, false);
    assert.deepStrictEqual(report.sources, [
      { register: 1, kind: "load-use", producer: "execute" },
      { register: 2, kind: "none", producer: null },
    ]);
  });

  test("forwards available results", () => {
    const scoreboard = new Scoreboard();
    scoreboard.record(producer({ register: 1, stage: "execute" }));
    scoreboard.record(producer({ register: 2, stage: "memory" }));

    const report = hazardUnit.detect(consumer(1, 2), scoreboard);

    assert.deepStrictEqual(
      report.sources.map((source) => source.kind),
      ["forward", "forward"],
    );
    assert.strictEqual(report.loadUseHazard || report.dataHazard, false);
  });

  test("waits for commit when forwarding is off", () => {
    const scoreboard = new Scoreboard();
    scoreboard.record(producer({ register: 1, stage: "memory" }));
    scoreboard.record(producer({ register: 2, stage: "writeback" }));

    const report = hazardUnit.detect(consumer(1, 2), scoreboard, { forwardingEnabled: false });

    assert.strictEqual(report.dataHazard, true);
    assert.deepStrictEqual(report.sources, [
      { register: 1, kind: "data", producer: "memory" },
      { register: 2, kind: "forward", producer: "writeback" },
    ]);
  });

  test("never reports x0", () => {
    const scoreboard = new Scoreboard();
    const report = hazardUnit.detect(consumer(0), scoreboard);
    assert.deepStrictEqual(report.sources, [{ register: 0, kind: "none", producer: null }]);
  });
});

describe("ForwardingUnit", () => {
  const forwardingUnit = new ForwardingUnit();

  test("prefers an available in-flight value over the register file", () => {
    const registers = new RegisterFile();
    registers.write(3, 100);
    const scoreboard = new Scoreboard();
    scoreboard.record(producer({ register: 3, stage: "memory", value: 42 }));

    assert.deepStrictEqual(forwardingUnit.resolve(3, scoreboard, registers), { register: 3, value: 42, source: "memory" });
  });

  test("falls back to the register file while the producer is busy", () => {
    const registers = new RegisterFile();
    registers.write(3, 100);
    const scoreboard = new Scoreboard();
    scoreboard.record(producer({ register: 3, stage: "execute", available: false, isLoad: true, value: 42 }));

    assert.deepStrictEqual(forwardingUnit.resolve(3, scoreboard, registers), {
      register: 3,
      value: 100,
      source: "register-file",
    });
    assert.strictEqual(forwardingUnit.resolve(0, scoreboard, registers).value, 0);
  });
});
