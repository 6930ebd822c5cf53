import {
  FUNCT7_ALT,
  FUNCT7_MULDIV,
  FUNCT7_NORMAL,
  OPCODE,
  type BranchName,
  type ImmediateAluName,
  type LoadName,
  type MulDivName,
  type RegisterAluName,
  type StoreName,
} from "../cpu/Instructions";

type RegisterOpName = RegisterAluName | MulDivName;
type ShiftImmediateName = "slli" | "srli" | "srai";

const REGISTER_OPS: Record<RegisterOpName, { funct3: number; funct7: number }> = {
  add: { funct3: 0b000, funct7: FUNCT7_NORMAL },
  sub: { funct3: 0b000, funct7: FUNCT7_ALT },
  sll: { funct3: 0b001, funct7: FUNCT7_NORMAL },
  slt: { funct3: 0b010, funct7: FUNCT7_NORMAL },
  sltu: { funct3: 0b011, funct7: FUNCT7_NORMAL },
  xor: { funct3: 0b100, funct7: FUNCT7_NORMAL },
  srl: { funct3: 0b101, funct7: FUNCT7_NORMAL },
  sra: { funct3: 0b101, funct7: FUNCT7_ALT },
  or: { funct3: 0b110, funct7: FUNCT7_NORMAL },
  and: { funct3: 0b111, funct7: FUNCT7_NORMAL },
  mul: { funct3: 0b000, funct7: FUNCT7_MULDIV },
  mulh: { funct3: 0b001, funct7: FUNCT7_MULDIV },
  mulhsu: { funct3: 0b010, funct7: FUNCT7_MULDIV },
  mulhu: { funct3: 0b011, funct7: FUNCT7_MULDIV },
  div: { funct3: 0b100, funct7: FUNCT7_MULDIV },
  divu: { funct3: 0b101, funct7: FUNCT7_MULDIV },
  rem: { funct3: 0b110, funct7: FUNCT7_MULDIV },
  remu: { funct3: 0b111, funct7: FUNCT7_MULDIV },
};

const IMMEDIATE_OPS: Record<Exclude<ImmediateAluName, ShiftImmediateName>, number> = {
  addi: 0b000,
  slti: 0b010,
  sltiu: 0b011,
  xori: 0b100,
  ori: 0b110,
  andi: 0b111,
};

const SHIFT_OPS: Record<ShiftImmediateName, { funct3: number; funct7: number }> = {
  slli: { funct3: 0b001, funct7: FUNCT7_NORMAL },
  srli: { funct3: 0b101, funct7: FUNCT7_NORMAL },
  srai: { funct3: 0b101, funct7: FUNCT7_ALT },
};

const LOAD_OPS: Record<LoadName, number> = { lb: 0b000, lh: 0b001, lw: 0b010, lbu: 0b100, lhu: 0b101 };
const STORE_OPS: Record<StoreName, number> = { sb: 0b000, sh: 0b001, sw: 0b010 };
const BRANCH_OPS: Record<BranchName, number> = { beq: 0b000, bne: 0b001, blt: 0b100, bge: 0b101, bltu: 0b110, bgeu: 0b111 };

export function isRegisterOp(name: string): name is RegisterOpName {
  return Object.prototype.hasOwnProperty.call(REGISTER_OPS, name);
}

export function isImmediateOp(name: string): name is Exclude<ImmediateAluName, ShiftImmediateName> {
  return Object.prototype.hasOwnProperty.call(IMMEDIATE_OPS, name);
}

export function isShiftImmediateOp(name: string): name is ShiftImmediateName {
  return Object.prototype.hasOwnProperty.call(SHIFT_OPS, name);
}

export function isLoadOp(name: string): name is LoadName {
  return Object.prototype.hasOwnProperty.call(LOAD_OPS, name);
}

export function isStoreOp(name: string): name is StoreName {
  return Object.prototype.hasOwnProperty.call(STORE_OPS, name);
}

export function isBranchOp(name: string): name is BranchName {
  return Object.prototype.hasOwnProperty.call(BRANCH_OPS, name);
}

function typeR(funct7: number, rs2: number, rs1: number, funct3: number, rd: number, opcode: number): number {
  return (
    ((funct7 & 0x7f) << 25) |
    ((rs2 & 0x1f) << 20) |
    ((rs1 & 0x1f) << 15) |
    ((funct3 & 0x7) << 12) |
    ((rd & 0x1f) << 7) |
    opcode
  ) >>> 0;
}

function typeI(imm: number, rs1: number, funct3: number, rd: number, opcode: number): number {
  return (((imm & 0xfff) << 20) | ((rs1 & 0x1f) << 15) | ((funct3 & 0x7) << 12) | ((rd & 0x1f) << 7) | opcode) >>> 0;
}

/** Packs instruction fields into 32-bit words. Operands are assumed to be range-checked. */
export class Encoder {
  static encodeRegisterOp(name: RegisterOpName, rd: number, rs1: number, rs2: number): number {
    const { funct3, funct7 } = REGISTER_OPS[name];
    return typeR(funct7, rs2, rs1, funct3, rd, OPCODE.OP);
  }

  static encodeImmediateOp(name: Exclude<ImmediateAluName, ShiftImmediateName>, rd: number, rs1: number, imm: number): number {
    return typeI(imm, rs1, IMMEDIATE_OPS[name], rd, OPCODE.OP_IMM);
  }

  static encodeShiftImmediate(name: ShiftImmediateName, rd: number, rs1: number, shamt: number): number {
    const { funct3, funct7 } = SHIFT_OPS[name];
    return typeR(funct7, shamt, rs1, funct3, rd, OPCODE.OP_IMM);
  }

  static encodeLoad(name: LoadName, rd: number, rs1: number, offset: number): number {
    return typeI(offset, rs1, LOAD_OPS[name], rd, OPCODE.LOAD);
  }

  static encodeJalr(rd: number, rs1: number, offset: number): number {
    return typeI(offset, rs1, 0, rd, OPCODE.JALR);
  }

  /**
   * S-type
   * Format: imm[11:5] | rs2 | rs1 | funct3 | imm[4:0] | opcode
   */
  static encodeStore(name: StoreName, rs2: number, rs1: number, offset: number): number {
    return (
      (((offset >> 5) & 0x7f) << 25) |
      ((rs2 & 0x1f) << 20) |
      ((rs1 & 0x1f) << 15) |
      ((STORE_OPS[name] & 0x7) << 12) |
      ((offset & 0x1f) << 7) |
      OPCODE.STORE
    ) >>> 0;
  }

  /**
   * B-type
   * Format: imm[12] | imm[10:5] | rs2 | rs1 | funct3 | imm[4:1] | imm[11] | opcode
   */
  static encodeBranch(name: BranchName, rs1: number, rs2: number, offset: number): number {
    return (
      (((offset >> 12) & 0x1) << 31) |
      (((offset >> 5) & 0x3f) << 25) |
      ((rs2 & 0x1f) << 20) |
      ((rs1 & 0x1f) << 15) |
      ((BRANCH_OPS[name] & 0x7) << 12) |
      (((offset >> 1) & 0xf) << 8) |
      (((offset >> 11) & 0x1) << 7) |
      OPCODE.BRANCH
    ) >>> 0;
  }

  static encodeUpper(name: "lui" | "auipc", rd: number, imm20: number): number {
    const opcode = name === "lui" ? OPCODE.LUI : OPCODE.AUIPC;
    return (((imm20 & 0xfffff) << 12) | ((rd & 0x1f) << 7) | opcode) >>> 0;
  }

  /**
   * J-type
   * Format: imm[20] | imm[10:1] | imm[11] | imm[19:12] | rd | opcode
   */
  static encodeJal(rd: number, offset: number): number {
    return (
      (((offset >> 20) & 0x1) << 31) |
      (((offset >> 1) & 0x3ff) << 21) |
      (((offset >> 11) & 0x1) << 20) |
      (((offset >> 12) & 0xff) << 12) |
      ((rd & 0x1f) << 7) |
      OPCODE.JAL
    ) >>> 0;
  }

  static encodeSystem(name: "fence" | "ecall" | "ebreak"): number {
    switch (name) {
      case "fence":
        return 0x0ff0000f;
      case "ecall":
        return 0x00000073;
      case "ebreak":
        return 0x00100073;
    }
  }
}
