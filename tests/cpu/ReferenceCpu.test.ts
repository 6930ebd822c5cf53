import assert from "node:assert";
import { describe, test } from "node:test";

import { Assembler } from "../../src/core/assembler/Assembler";
import { resolveCoreConfig } from "../../src/core/config/CoreConfig";
import { ReferenceCpu } from "../../src/core/cpu/ReferenceCpu";
import {
  InvalidInstruction,
  MemoryAccessFault,
  MisalignedAccess,
} from "../../src/core/exceptions/ExecutionExceptions";

function runProgram(lines: string[], cpu = new ReferenceCpu()): ReferenceCpu {
  cpu.load(new Assembler().assemble(lines.join("\n")));
  cpu.run(1000);
  return cpu;
}

describe("ReferenceCpu", () => {
  test("runs a counted loop to ecall", () => {
    const cpu = runProgram([
      "li t0, 5",
      "li a0, 0",
      "loop: add a0, a0, t0",
      "addi t0, t0, -1",
      "bnez t0, loop",
      "ecall",
    ]);

    assert.strictEqual(cpu.getStatus(), "halted");
    assert.strictEqual(cpu.getRegisters()[10], 15);
    assert.strictEqual(cpu.getRetiredCount(), 18);
    assert.strictEqual(cpu.getPc(), 24);
  });

  test("stores and loads sub-word values little-endian", () => {
    const cpu = runProgram([
      "li t0, 0x8000",
      "li t1, -2",
      "sb t1, 1(t0)",
      "lbu a0, 1(t0)",
      "lb a1, 1(t0)",
      "lw a2, 0(t0)",
    ]);

    const registers = cpu.getRegisters();
    assert.strictEqual(cpu.getStatus(), "halted");
    assert.strictEqual(registers[10], 0xfe);
    assert.strictEqual(registers[11], -2);
    assert.strictEqual(registers[12], 0xfe00);
    assert.strictEqual(cpu.readWord(0x8000), 0xfe00);
  });

  test("stops with a fault on a misaligned load", () => {
    const cpu = runProgram(["addi x1, x0, 2", "lw x2, 0(x1)", "addi x3, x0, 1"]);

    assert.strictEqual(cpu.getStatus(), "fault");
    const fault = cpu.getFault();
    assert.ok(fault instanceof MisalignedAccess);
    assert.strictEqual(fault.address, 2);
    assert.strictEqual(fault.pc, 4);
    assert.strictEqual(cpu.getRegisters()[3], 0);
  });

  test("stops with a fault on an invalid instruction word", () => {
    const cpu = runProgram(["addi x1, x0, 1", ".word 0xffffffff"]);

    assert.strictEqual(cpu.getStatus(), "fault");
    assert.ok(cpu.getFault() instanceof InvalidInstruction);
    assert.strictEqual(cpu.getRegisters()[1], 1);
  });

  test("reports accesses to fault ranges", () => {
    const config = resolveCoreConfig({ memory: { faultRanges: [{ start: 0x100, end: 0x110 }] } });
    const cpu = runProgram(["addi x1, x0, 0x104", "sw x1, 0(x1)"], new ReferenceCpu({ config }));

    const fault = cpu.getFault();
    assert.ok(fault instanceof MemoryAccessFault);
    assert.strictEqual(fault.address, 0x104);
    assert.strictEqual(fault.access, "write");
  });
});
