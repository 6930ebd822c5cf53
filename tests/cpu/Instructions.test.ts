import assert from "node:assert";
import { describe, test } from "node:test";

import { decodeHazardInfo, decodeInstruction, isControlTransfer, signExtend } from "../../src/core/cpu/Instructions";

function decode(word: number) {
  const decoded = decodeInstruction(word);
  assert.ok(decoded, `0x${word.toString(16)} should decode`);
  return decoded;
}

describe("Instruction decoding", () => {
  test("decodes register and immediate arithmetic", () => {
    const add = decode(0x002081b3); // add x3, x1, x2
    assert.strictEqual(add.name, "add");
    assert.deepStrictEqual([add.rd, add.rs1, add.rs2], [3, 1, 2]);
    assert.strictEqual(add.writesRd, true);

    const sub = decode(0x40118233); // sub x4, x3, x1
    assert.strictEqual(sub.name, "sub");
    assert.deepStrictEqual([sub.rd, sub.rs1, sub.rs2], [4, 3, 1]);

    const addi = decode(0x00500093); // addi x1, x0, 5
    assert.strictEqual(addi.name, "addi");
    assert.strictEqual(addi.imm, 5);
    assert.strictEqual(addi.usesRs2, false);

    const mul = decode(0x022081b3); // mul x3, x1, x2
    assert.strictEqual(mul.name, "mul");
  });

  test("sign-extends load, store, branch and jump immediates", () => {
    const lw = decode(0x00322283); // lw x5, 3(x4)
    assert.strictEqual(lw.name, "lw");
    assert.strictEqual(lw.kind, "load");
    assert.strictEqual(lw.imm, 3);
    assert.strictEqual(lw.width, 4);

    const sw = decode(0xfe20ae23); // sw x2, -4(x1)
    assert.strictEqual(sw.name, "sw");
    assert.strictEqual(sw.imm, -4);
    assert.strictEqual(sw.writesRd, false);

    const beq = decode(0x06208263); // beq x1, x2, +100
    assert.strictEqual(beq.name, "beq");
    assert.strictEqual(beq.imm, 100);

    const jal = decode(0xff9ff0ef); // jal x1, -8
    assert.strictEqual(jal.name, "jal");
    assert.strictEqual(jal.imm, -8);
    assert.strictEqual(jal.rd, 1);
  });

  test("places the upper immediate in bits 31..12", () => {
    const lui = decode(0x123452b7); // lui x5, 0x12345
    assert.strictEqual(lui.name, "lui");
    assert.strictEqual(lui.imm, 0x12345000);
  });

  test("distinguishes shift-immediate variants by funct7", () => {
    const srai = decode(0x40315093); // srai x1, x2, 3
    assert.strictEqual(srai.name, "srai");
    assert.strictEqual(srai.imm, 3);
    assert.strictEqual(decodeInstruction(0x40311093), null);
  });

  test("recognises system instructions", () => {
    assert.strictEqual(decode(0x00000073).name, "ecall");
    assert.strictEqual(decode(0x00100073).name, "ebreak");
    assert.strictEqual(decode(0x0ff0000f).name, "fence");
  });

  test("returns null for words outside RV32IM", () => {
    assert.strictEqual(decodeInstruction(0xffffffff), null);
    assert.strictEqual(decodeInstruction(0x00000000), null);
  });

  test("x0 destinations do not write", () => {
    const nop = decode(0x00000013); // addi x0, x0, 0
    assert.strictEqual(nop.writesRd, false);
  });
});

describe("Hazard information", () => {
  test("lists sources and destination", () => {
    assert.deepStrictEqual(decodeHazardInfo(decode(0x002081b3)), {
      sources: [1, 2],
      destination: 3,
      isLoad: false,
      isStore: false,
      isControl: false,
    });
  });

  test("flags loads, stores and control transfers", () => {
    const load = decodeHazardInfo(decode(0x00322283));
    assert.deepStrictEqual(load.sources, [4]);
    assert.strictEqual(load.destination, 5);
    assert.strictEqual(load.isLoad, true);

    const store = decodeHazardInfo(decode(0xfe20ae23));
    assert.strictEqual(store.destination, null);
    assert.strictEqual(store.isStore, true);

    assert.strictEqual(isControlTransfer(decode(0x06208263)), true);
    assert.strictEqual(decodeHazardInfo(null).destination, null);
  });

  test("signExtend treats the top bit as the sign", () => {
    assert.strictEqual(signExtend(0xfff, 12), -1);
    assert.strictEqual(signExtend(0x7ff, 12), 2047);
    assert.strictEqual(signExtend(0x80, 8), -128);
  });
});
