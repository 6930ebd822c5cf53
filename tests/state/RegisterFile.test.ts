import assert from "node:assert";
import { describe, test } from "node:test";

import { RegisterFile } from "../../src/core/state/RegisterFile";

describe("RegisterFile", () => {
  test("x0 stays zero", () => {
    const registers = new RegisterFile();
    registers.write(0, 123);
    assert.strictEqual(registers.read(0), 0);
  });

  test("stores signed 32-bit values", () => {
    const registers = new RegisterFile();
    registers.write(5, 0xffffffff);
    registers.write(6, 0x1_0000_0001);
    assert.strictEqual(registers.read(5), -1);
    assert.strictEqual(registers.read(6), 1);
  });

  test("snapshot copies all registers and reset clears them", () => {
    const registers = new RegisterFile();
    registers.write(31, 9);
    const snapshot = registers.snapshot();
    assert.strictEqual(snapshot.length, 32);
    assert.strictEqual(snapshot[31], 9);

    registers.reset();
    assert.strictEqual(registers.read(31), 0);
    assert.strictEqual(snapshot[31], 9);
  });

  test("rejects out-of-range indices", () => {
    const registers = new RegisterFile();
    assert.throws(() => registers.read(32), RangeError);
    assert.throws(() => registers.write(-1, 0), RangeError);
  });
});
