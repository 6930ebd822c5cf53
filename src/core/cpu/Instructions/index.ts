export const OPCODE = {
  LUI: 0b0110111,
  AUIPC: 0b0010111,
  JAL: 0b1101111,
  JALR: 0b1100111,
  BRANCH: 0b1100011,
  LOAD: 0b0000011,
  STORE: 0b0100011,
  OP_IMM: 0b0010011,
  OP: 0b0110011,
  MISC_MEM: 0b0001111,
  SYSTEM: 0b1110011,
} as const;

export const FUNCT7_NORMAL = 0b0000000;
export const FUNCT7_ALT = 0b0100000;
export const FUNCT7_MULDIV = 0b0000001;

export type BranchName = "beq" | "bne" | "blt" | "bge" | "bltu" | "bgeu";
export type LoadName = "lb" | "lh" | "lw" | "lbu" | "lhu";
export type StoreName = "sb" | "sh" | "sw";
export type ImmediateAluName = "addi" | "slti" | "sltiu" | "xori" | "ori" | "andi" | "slli" | "srli" | "srai";
export type RegisterAluName = "add" | "sub" | "sll" | "slt" | "sltu" | "xor" | "srl" | "sra" | "or" | "and";
export type MulDivName = "mul" | "mulh" | "mulhsu" | "mulhu" | "div" | "divu" | "rem" | "remu";
export type SystemName = "fence" | "ecall" | "ebreak";

export type InstructionName =
  | "lui"
  | "auipc"
  | "jal"
  | "jalr"
  | BranchName
  | LoadName
  | StoreName
  | ImmediateAluName
  | RegisterAluName
  | MulDivName
  | SystemName;

export type InstructionKind = "alu" | "load" | "store" | "branch" | "jump" | "system";

export interface DecodedInstruction {
  readonly word: number;
  readonly name: InstructionName;
  readonly kind: InstructionKind;
  readonly rd: number;
  readonly rs1: number;
  readonly rs2: number;
  readonly imm: number;
  readonly usesRs1: boolean;
  readonly usesRs2: boolean;
  /** False for x0 destinations and for instructions without a destination. */
  readonly writesRd: boolean;
  /** Access width in bytes for loads and stores, 0 otherwise. */
  readonly width: 0 | 1 | 2 | 4;
  readonly unsignedLoad: boolean;
}

export type HazardInfo = {
  sources: number[];
  destination: number | null;
  isLoad: boolean;
  isStore: boolean;
  isControl: boolean;
};

export const EMPTY_HAZARD: HazardInfo = {
  sources: [],
  destination: null,
  isLoad: false,
  isStore: false,
  isControl: false,
};

const BRANCHES: Record<number, BranchName | undefined> = {
  0b000: "beq",
  0b001: "bne",
  0b100: "blt",
  0b101: "bge",
  0b110: "bltu",
  0b111: "bgeu",
};

const LOADS: Record<number, { name: LoadName; width: 1 | 2 | 4; unsigned: boolean } | undefined> = {
  0b000: { name: "lb", width: 1, unsigned: false },
  0b001: { name: "lh", width: 2, unsigned: false },
  0b010: { name: "lw", width: 4, unsigned: false },
  0b100: { name: "lbu", width: 1, unsigned: true },
  0b101: { name: "lhu", width: 2, unsigned: true },
};

const STORES: Record<number, { name: StoreName; width: 1 | 2 | 4 } | undefined> = {
  0b000: { name: "sb", width: 1 },
  0b001: { name: "sh", width: 2 },
  0b010: { name: "sw", width: 4 },
};

const IMMEDIATE_ALU: Record<number, ImmediateAluName | undefined> = {
  0b000: "addi",
  0b010: "slti",
  0b011: "sltiu",
  0b100: "xori",
  0b110: "ori",
  0b111: "andi",
};

const REGISTER_ALU: Record<number, RegisterAluName | undefined> = {
  0b000: "add",
  0b001: "sll",
  0b010: "slt",
  0b011: "sltu",
  0b100: "xor",
  0b101: "srl",
  0b110: "or",
  0b111: "and",
};

const MULDIV: MulDivName[] = ["mul", "mulh", "mulhsu", "mulhu", "div", "divu", "rem", "remu"];

export function signExtend(value: number, bits: number): number {
  const shift = 32 - bits;
  return (value << shift) >> shift;
}

interface InstructionFields {
  opcode: number;
  rd: number;
  funct3: number;
  rs1: number;
  rs2: number;
  funct7: number;
}

function decodeFields(word: number): InstructionFields {
  return {
    opcode: word & 0x7f,
    rd: (word >>> 7) & 0x1f,
    funct3: (word >>> 12) & 0x7,
    rs1: (word >>> 15) & 0x1f,
    rs2: (word >>> 20) & 0x1f,
    funct7: (word >>> 25) & 0x7f,
  };
}

function immediateI(word: number): number {
  return word >> 20;
}

function immediateS(word: number): number {
  return signExtend((((word >>> 25) & 0x7f) << 5) | ((word >>> 7) & 0x1f), 12);
}

function immediateB(word: number): number {
  const imm12 = (word >>> 31) & 0x1;
  const imm11 = (word >>> 7) & 0x1;
  const imm10_5 = (word >>> 25) & 0x3f;
  const imm4_1 = (word >>> 8) & 0xf;
  return signExtend((imm12 << 12) | (imm11 << 11) | (imm10_5 << 5) | (imm4_1 << 1), 13);
}

function immediateU(word: number): number {
  return word & 0xfffff000;
}

function immediateJ(word: number): number {
  const imm20 = (word >>> 31) & 0x1;
  const imm19_12 = (word >>> 12) & 0xff;
  const imm11 = (word >>> 20) & 0x1;
  const imm10_1 = (word >>> 21) & 0x3ff;
  return signExtend((imm20 << 20) | (imm19_12 << 12) | (imm11 << 11) | (imm10_1 << 1), 21);
}

interface InstructionShape {
  name: InstructionName;
  kind: InstructionKind;
  rd?: number;
  rs1?: number;
  rs2?: number;
  imm?: number;
  width?: 0 | 1 | 2 | 4;
  unsignedLoad?: boolean;
}

function build(word: number, shape: InstructionShape): DecodedInstruction {
  const rd = shape.rd ?? 0;
  return {
    word: word >>> 0,
    name: shape.name,
    kind: shape.kind,
    rd,
    rs1: shape.rs1 ?? 0,
    rs2: shape.rs2 ?? 0,
    imm: shape.imm ?? 0,
    usesRs1: shape.rs1 !== undefined,
    usesRs2: shape.rs2 !== undefined,
    writesRd: shape.rd !== undefined && rd !== 0,
    width: shape.width ?? 0,
    unsignedLoad: shape.unsignedLoad ?? false,
  };
}

/**
 * Decodes one RV32IM instruction word. Returns null for encodings outside the
 * supported subset; the caller decides whether that is fatal.
 */
export function decodeInstruction(word: number): DecodedInstruction | null {
  const { opcode, rd, funct3, rs1, rs2, funct7 } = decodeFields(word);

  switch (opcode) {
    case OPCODE.LUI:
      return build(word, { name: "lui", kind: "alu", rd, imm: immediateU(word) });
    case OPCODE.AUIPC:
      return build(word, { name: "auipc", kind: "alu", rd, imm: immediateU(word) });
    case OPCODE.JAL:
      return build(word, { name: "jal", kind: "jump", rd, imm: immediateJ(word) });
    case OPCODE.JALR:
      if (funct3 !== 0) return null;
      return build(word, { name: "jalr", kind: "jump", rd, rs1, imm: immediateI(word) });
    case OPCODE.BRANCH: {
      const name = BRANCHES[funct3];
      if (!name) return null;
      return build(word, { name, kind: "branch", rs1, rs2, imm: immediateB(word) });
    }
    case OPCODE.LOAD: {
      const load = LOADS[funct3];
      if (!load) return null;
      return build(word, {
        name: load.name,
        kind: "load",
        rd,
        rs1,
        imm: immediateI(word),
        width: load.width,
        unsignedLoad: load.unsigned,
      });
    }
    case OPCODE.STORE: {
      const store = STORES[funct3];
      if (!store) return null;
      return build(word, { name: store.name, kind: "store", rs1, rs2, imm: immediateS(word), width: store.width });
    }
    case OPCODE.OP_IMM: {
      if (funct3 === 0b001) {
        if (funct7 !== FUNCT7_NORMAL) return null;
        return build(word, { name: "slli", kind: "alu", rd, rs1, imm: rs2 });
      }
      if (funct3 === 0b101) {
        if (funct7 === FUNCT7_NORMAL) return build(word, { name: "srli", kind: "alu", rd, rs1, imm: rs2 });
        if (funct7 === FUNCT7_ALT) return build(word, { name: "srai", kind: "alu", rd, rs1, imm: rs2 });
        return null;
      }
      const name = IMMEDIATE_ALU[funct3];
      if (!name) return null;
      return build(word, { name, kind: "alu", rd, rs1, imm: immediateI(word) });
    }
    case OPCODE.OP: {
      if (funct7 === FUNCT7_MULDIV) {
        return build(word, { name: MULDIV[funct3], kind: "alu", rd, rs1, rs2 });
      }
      if (funct7 === FUNCT7_ALT) {
        if (funct3 === 0b000) return build(word, { name: "sub", kind: "alu", rd, rs1, rs2 });
        if (funct3 === 0b101) return build(word, { name: "sra", kind: "alu", rd, rs1, rs2 });
        return null;
      }
      if (funct7 !== FUNCT7_NORMAL) return null;
      const name = REGISTER_ALU[funct3];
      if (!name) return null;
      return build(word, { name, kind: "alu", rd, rs1, rs2 });
    }
    case OPCODE.MISC_MEM:
      if (funct3 !== 0) return null;
      return build(word, { name: "fence", kind: "system" });
    case OPCODE.SYSTEM:
      if ((word >>> 0) === 0x00000073) return build(word, { name: "ecall", kind: "system" });
      if ((word >>> 0) === 0x00100073) return build(word, { name: "ebreak", kind: "system" });
      return null;
    default:
      return null;
  }
}

export function isControlTransfer(instruction: DecodedInstruction): boolean {
  return instruction.kind === "branch" || instruction.kind === "jump";
}

export function isHaltInstruction(instruction: DecodedInstruction): boolean {
  return instruction.name === "ecall" || instruction.name === "ebreak";
}

export const decodeHazardInfo = (instruction: DecodedInstruction | null): HazardInfo => {
  if (!instruction) {
    return EMPTY_HAZARD;
  }

  const sources: number[] = [];
  if (instruction.usesRs1) sources.push(instruction.rs1);
  if (instruction.usesRs2) sources.push(instruction.rs2);

  return {
    sources,
    destination: instruction.writesRd ? instruction.rd : null,
    isLoad: instruction.kind === "load",
    isStore: instruction.kind === "store",
    isControl: isControlTransfer(instruction),
  };
};
