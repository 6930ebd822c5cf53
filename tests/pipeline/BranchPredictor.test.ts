import assert from "node:assert";
import { describe, test } from "node:test";

import { BranchPredictor } from "../../src/core/pipeline/BranchPredictor";

describe("BranchPredictor", () => {
  test("predicts fall-through until a branch has been taken", () => {
    const predictor = new BranchPredictor();
    assert.deepStrictEqual(predictor.predict(0x40), { taken: false, nextPc: 0x44 });
    assert.strictEqual(predictor.getState(0x40), "weakly-not-taken");

    predictor.update(0x40, { taken: true, target: 0x80 });

    assert.strictEqual(predictor.getState(0x40), "weakly-taken");
    assert.deepStrictEqual(predictor.predict(0x40), { taken: true, nextPc: 0x80 });
  });

  test("saturates the counter in both directions", () => {
    const predictor = new BranchPredictor();
    for (let i = 0; i < 4; i++) predictor.update(0x10, { taken: true, target: 0x0 });
    assert.strictEqual(predictor.getState(0x10), "strongly-taken");

    predictor.update(0x10, { taken: false, target: 0x14 });
    assert.deepStrictEqual(predictor.predict(0x10), { taken: true, nextPc: 0x0 });

    for (let i = 0; i < 4; i++) predictor.update(0x10, { taken: false, target: 0x14 });
    assert.strictEqual(predictor.getState(0x10), "strongly-not-taken");
  });

  test("does not predict taken for an aliased PC with a different tag", () => {
    const predictor = new BranchPredictor({ entries: 4 });
    predictor.update(0x40, { taken: true, target: 0x100 });

    assert.strictEqual(predictor.getState(0x50), "weakly-taken");
    assert.deepStrictEqual(predictor.predict(0x50), { taken: false, nextPc: 0x54 });
  });

  test("needs a target entry even when the counter says taken", () => {
    const predictor = new BranchPredictor({ initialState: "strongly-taken" });
    assert.deepStrictEqual(predictor.predict(0x8), { taken: false, nextPc: 0xc });

    predictor.update(0x8, { taken: true, target: 0x20 });
    predictor.invalidate(0x8);
    assert.deepStrictEqual(predictor.predict(0x8), { taken: false, nextPc: 0xc });
  });

  test("reset restores the initial state", () => {
    const predictor = new BranchPredictor();
    predictor.update(0x4, { taken: true, target: 0x40 });
    predictor.reset();
    assert.strictEqual(predictor.getState(0x4), "weakly-not-taken");
    assert.deepStrictEqual(predictor.predict(0x4), { taken: false, nextPc: 0x8 });
  });

  test("rejects a table size that is not a power of two", () => {
    assert.throws(() => new BranchPredictor({ entries: 3 }), RangeError);
    assert.strictEqual(new BranchPredictor({ entries: 8 }).getEntryCount(), 8);
  });
});
