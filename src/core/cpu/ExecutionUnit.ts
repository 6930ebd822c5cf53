import type { BranchName, DecodedInstruction, InstructionName, MulDivName } from "./Instructions";

export type AluOperation =
  | "add"
  | "sub"
  | "sll"
  | "slt"
  | "sltu"
  | "xor"
  | "srl"
  | "sra"
  | "or"
  | "and"
  | MulDivName;

export interface AluInputs {
  operation: AluOperation;
  left: number;
  right: number;
}

const INT32_MIN = -0x80000000;

function toInt32(value: number): number {
  return value | 0;
}

function highWord(product: bigint): number {
  return Number(BigInt.asIntN(32, product >> 32n));
}

function divide(left: number, right: number): number {
  if (right === 0) return -1;
  if (left === INT32_MIN && right === -1) return INT32_MIN;
  return toInt32(Math.trunc(left / right));
}

function divideUnsigned(left: number, right: number): number {
  const dividend = left >>> 0;
  const divisor = right >>> 0;
  if (divisor === 0) return -1;
  return toInt32(Math.floor(dividend / divisor));
}

function remainder(left: number, right: number): number {
  if (right === 0) return left;
  if (left === INT32_MIN && right === -1) return 0;
  return toInt32(left % right);
}

function remainderUnsigned(left: number, right: number): number {
  const dividend = left >>> 0;
  const divisor = right >>> 0;
  if (divisor === 0) return left;
  return toInt32(dividend % divisor);
}

/**
 * Combinational execution unit: one operation over two 32-bit operands.
 * Inputs and the result are signed 32-bit integers.
 */
export function execute(operation: AluOperation, left: number, right: number): number {
  const a = toInt32(left);
  const b = toInt32(right);

  switch (operation) {
    case "add":
      return toInt32(a + b);
    case "sub":
      return toInt32(a - b);
    case "sll":
      return a << (b & 0x1f);
    case "slt":
      return a < b ? 1 : 0;
    case "sltu":
      return a >>> 0 < b >>> 0 ? 1 : 0;
    case "xor":
      return a ^ b;
    case "srl":
      return toInt32(a >>> (b & 0x1f));
    case "sra":
      return a >> (b & 0x1f);
    case "or":
      return a | b;
    case "and":
      return a & b;
    case "mul":
      return Math.imul(a, b);
    case "mulh":
      return highWord(BigInt(a) * BigInt(b));
    case "mulhsu":
      return highWord(BigInt(a) * BigInt(b >>> 0));
    case "mulhu":
      return highWord(BigInt(a >>> 0) * BigInt(b >>> 0));
    case "div":
      return divide(a, b);
    case "divu":
      return divideUnsigned(a, b);
    case "rem":
      return remainder(a, b);
    case "remu":
      return remainderUnsigned(a, b);
  }
}

const BRANCH_NAMES: ReadonlySet<string> = new Set<BranchName>(["beq", "bne", "blt", "bge", "bltu", "bgeu"]);

export function isBranchName(name: InstructionName): name is BranchName {
  return BRANCH_NAMES.has(name);
}

export function branchTaken(name: BranchName, left: number, right: number): boolean {
  const a = toInt32(left);
  const b = toInt32(right);

  switch (name) {
    case "beq":
      return a === b;
    case "bne":
      return a !== b;
    case "blt":
      return a < b;
    case "bge":
      return a >= b;
    case "bltu":
      return a >>> 0 < b >>> 0;
    case "bgeu":
      return a >>> 0 >= b >>> 0;
  }
}

/**
 * Maps a decoded instruction and its register operands onto the execution
 * unit's inputs. Loads and stores compute their effective address; jumps
 * compute the link value.
 */
export function operandsFor(instruction: DecodedInstruction, pc: number, rs1Value: number, rs2Value: number): AluInputs {
  switch (instruction.name) {
    case "lui":
      return { operation: "add", left: 0, right: instruction.imm };
    case "auipc":
      return { operation: "add", left: pc, right: instruction.imm };
    case "jal":
    case "jalr":
      return { operation: "add", left: pc, right: 4 };
    case "addi":
      return { operation: "add", left: rs1Value, right: instruction.imm };
    case "slti":
      return { operation: "slt", left: rs1Value, right: instruction.imm };
    case "sltiu":
      return { operation: "sltu", left: rs1Value, right: instruction.imm };
    case "xori":
      return { operation: "xor", left: rs1Value, right: instruction.imm };
    case "ori":
      return { operation: "or", left: rs1Value, right: instruction.imm };
    case "andi":
      return { operation: "and", left: rs1Value, right: instruction.imm };
    case "slli":
      return { operation: "sll", left: rs1Value, right: instruction.imm };
    case "srli":
      return { operation: "srl", left: rs1Value, right: instruction.imm };
    case "srai":
      return { operation: "sra", left: rs1Value, right: instruction.imm };
    case "add":
    case "sub":
    case "sll":
    case "slt":
    case "sltu":
    case "xor":
    case "srl":
    case "sra":
    case "or":
    case "and":
    case "mul":
    case "mulh":
    case "mulhsu":
    case "mulhu":
    case "div":
    case "divu":
    case "rem":
    case "remu":
      return { operation: instruction.name, left: rs1Value, right: rs2Value };
    case "lb":
    case "lh":
    case "lw":
    case "lbu":
    case "lhu":
    case "sb":
    case "sh":
    case "sw":
      return { operation: "add", left: rs1Value, right: instruction.imm };
    case "beq":
    case "bne":
    case "blt":
    case "bge":
    case "bltu":
    case "bgeu":
    case "fence":
    case "ecall":
    case "ebreak":
      return { operation: "add", left: 0, right: 0 };
  }
}

export interface ControlOutcome {
  taken: boolean;
  target: number;
  nextPc: number;
}

/** Resolves the architectural next PC of a branch or jump. */
export function resolveControl(instruction: DecodedInstruction, pc: number, rs1Value: number, rs2Value: number): ControlOutcome {
  const fallThrough = (pc + 4) >>> 0;

  switch (instruction.kind) {
    case "jump": {
      const target =
        instruction.name === "jalr"
          ? (toInt32(rs1Value + instruction.imm) & ~1) >>> 0
          : (pc + instruction.imm) >>> 0;
      return { taken: true, target, nextPc: target };
    }
    case "branch": {
      const target = (pc + instruction.imm) >>> 0;
      const taken = isBranchName(instruction.name) && branchTaken(instruction.name, rs1Value, rs2Value);
      return { taken, target, nextPc: taken ? target : fallThrough };
    }
    default:
      return { taken: false, target: fallThrough, nextPc: fallThrough };
  }
}
