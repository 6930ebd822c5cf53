import { signExtend } from "../cpu/Instructions";
import {
  Encoder,
  isBranchOp,
  isImmediateOp,
  isLoadOp,
  isRegisterOp,
  isShiftImmediateOp,
  isStoreOp,
} from "./Encoder";
import { Lexer, type Token } from "./Lexer";

export const DEFAULT_TEXT_BASE = 0x00000000;
export const DEFAULT_DATA_BASE = 0x00008000;

export interface TextWord {
  address: number;
  word: number;
  /** Source line the word was assembled from. */
  line: number;
}

export interface DataWord {
  address: number;
  value: number;
}

export interface BinaryImage {
  entryPoint: number;
  text: TextWord[];
  data: DataWord[];
  symbols: Record<string, number>;
}

type Section = "text" | "data";

type Operand =
  | { kind: "register"; value: number }
  | { kind: "immediate"; value: number }
  | { kind: "symbol"; name: string }
  | { kind: "memory"; offset: number; base: number };

interface Statement {
  line: number;
  address: number;
  mnemonic: string;
  operands: Operand[];
}

interface WordDirective {
  line: number;
  address: number;
  section: Section;
  value: Operand;
}

const ABI_NAMES = [
  "zero", "ra", "sp", "gp", "tp", "t0", "t1", "t2", "s0", "s1", "a0", "a1", "a2", "a3", "a4", "a5",
  "a6", "a7", "s2", "s3", "s4", "s5", "s6", "s7", "s8", "s9", "s10", "s11", "t3", "t4", "t5", "t6",
];

const IGNORED_DIRECTIVES = new Set(["globl", "global", "section"]);

export function parseRegister(name: string): number | null {
  const lower = name.toLowerCase();
  const numbered = /^[xr]([0-9]{1,2})$/.exec(lower);
  if (numbered) {
    const index = Number(numbered[1]);
    return index < 32 ? index : null;
  }
  if (lower === "fp") return 8;
  const abi = ABI_NAMES.indexOf(lower);
  return abi === -1 ? null : abi;
}

function fitsSigned(value: number, bits: number): boolean {
  const limit = 2 ** (bits - 1);
  return Number.isInteger(value) && value >= -limit && value < limit;
}

/** Splits a 32-bit constant into the `lui` upper part and the sign-extended low 12 bits. */
export function splitImmediate(value: number): { upper: number; lower: number } {
  const lower = signExtend(value & 0xfff, 12);
  const upper = ((value - lower) >>> 12) & 0xfffff;
  return { upper, lower };
}

/**
 * Two-pass RV32IM assembler. The first pass lays out sections and collects
 * labels; the second expands pseudo-instructions and encodes.
 */
export class Assembler {
  private readonly lexer = new Lexer();

  assemble(source: string): BinaryImage {
    const symbols = new Map<string, number>();
    const statements: Statement[] = [];
    const words: WordDirective[] = [];
    const counters: Record<Section, number> = { text: DEFAULT_TEXT_BASE, data: DEFAULT_DATA_BASE };
    let section: Section = "text";

    for (const { line, tokens } of this.lexer.tokenize(source)) {
      let rest = tokens;

      while (rest.length >= 2 && rest[0].type === "identifier" && rest[1].type === "colon") {
        const label = String(rest[0].value);
        if (symbols.has(label)) {
          throw new Error(`Duplicate label '${label}' at line ${line}`);
        }
        symbols.set(label, counters[section]);
        rest = rest.slice(2);
      }
      if (rest.length === 0) continue;

      const [head, ...tail] = rest;
      const operands = this.parseOperands(tail, line);

      if (head.type === "directive") {
        const directive = String(head.value);
        switch (directive) {
          case "text":
          case "data":
            section = directive;
            if (operands.length > 0) counters[section] = this.requireAddress(operands[0], line);
            break;
          case "org":
            if (operands.length !== 1) throw new Error(`.org expects one address at line ${line}`);
            counters[section] = this.requireAddress(operands[0], line);
            break;
          case "word":
            if (operands.length === 0) throw new Error(`.word expects at least one value at line ${line}`);
            for (const value of operands) {
              this.requireWordValue(value, line);
              words.push({ line, address: counters[section], section, value });
              counters[section] += 4;
            }
            break;
          default:
            if (!IGNORED_DIRECTIVES.has(directive)) {
              throw new Error(`Unknown directive '.${directive}' at line ${line}`);
            }
        }
        continue;
      }

      if (head.type !== "identifier") {
        throw new Error(`Expected an instruction at line ${line}, found '${head.raw}'`);
      }
      if (section !== "text") {
        throw new Error(`Instruction '${head.raw}' outside .text at line ${line}`);
      }

      const statement: Statement = {
        line,
        address: counters.text,
        mnemonic: String(head.value).toLowerCase(),
        operands,
      };
      statements.push(statement);
      counters.text += 4 * this.sizeOf(statement);
    }

    const resolve = (operand: Operand, line: number): number => this.resolveValue(operand, symbols, line);

    const text: TextWord[] = [];
    const data: DataWord[] = [];
    for (const statement of statements) {
      this.encode(statement, symbols).forEach((word, index) => {
        text.push({ address: (statement.address + index * 4) >>> 0, word: word >>> 0, line: statement.line });
      });
    }
    for (const word of words) {
      const value = resolve(word.value, word.line) >>> 0;
      if (word.section === "text") text.push({ address: word.address >>> 0, word: value, line: word.line });
      else data.push({ address: word.address >>> 0, value });
    }

    text.sort((a, b) => a.address - b.address);
    data.sort((a, b) => a.address - b.address);
    this.checkOverlap([...text.map((entry) => entry.address), ...data.map((entry) => entry.address)]);

    return {
      entryPoint: symbols.get("_start") ?? text[0]?.address ?? DEFAULT_TEXT_BASE,
      text,
      data,
      symbols: Object.fromEntries(symbols),
    };
  }

  private parseOperands(tokens: Token[], line: number): Operand[] {
    if (tokens.length === 0) return [];

    const groups: Token[][] = [[]];
    for (const token of tokens) {
      if (token.type === "comma") groups.push([]);
      else groups[groups.length - 1].push(token);
    }

    return groups.map((group) => this.parseOperand(group, line));
  }

  private parseOperand(group: Token[], line: number): Operand {
    const shape = group.map((token) => token.type).join(" ");
    switch (shape) {
      case "number":
        return { kind: "immediate", value: Number(group[0].value) };
      case "identifier": {
        const name = String(group[0].value);
        const register = parseRegister(name);
        return register === null ? { kind: "symbol", name } : { kind: "register", value: register };
      }
      case "number lparen identifier rparen":
        return { kind: "memory", offset: Number(group[0].value), base: this.registerNamed(group[2], line) };
      case "lparen identifier rparen":
        return { kind: "memory", offset: 0, base: this.registerNamed(group[1], line) };
      default:
        throw new Error(`Malformed operand '${group.map((token) => token.raw).join("")}' at line ${line}`);
    }
  }

  private registerNamed(token: Token, line: number): number {
    const register = parseRegister(String(token.value));
    if (register === null) {
      throw new Error(`Unknown register '${token.raw}' at line ${line}`);
    }
    return register;
  }

  private requireAddress(operand: Operand, line: number): number {
    if (operand.kind !== "immediate" || operand.value < 0 || operand.value % 4 !== 0) {
      throw new Error(`Expected a word-aligned address at line ${line}`);
    }
    return operand.value >>> 0;
  }

  private requireWordValue(operand: Operand, line: number): void {
    if (operand.kind !== "immediate" && operand.kind !== "symbol") {
      throw new Error(`.word takes numbers or labels at line ${line}`);
    }
  }

  private sizeOf(statement: Statement): number {
    if (statement.mnemonic === "la") return 2;
    if (statement.mnemonic === "li") {
      const value = statement.operands[1];
      if (value?.kind !== "immediate") return 1;
      if (fitsSigned(value.value, 12)) return 1;
      return splitImmediate(value.value).lower === 0 ? 1 : 2;
    }
    return 1;
  }

  private resolveValue(operand: Operand, symbols: Map<string, number>, line: number): number {
    if (operand.kind === "immediate") return operand.value;
    if (operand.kind === "symbol") {
      const address = symbols.get(operand.name);
      if (address === undefined) {
        throw new Error(`Undefined symbol '${operand.name}' at line ${line}`);
      }
      return address;
    }
    throw new Error(`Expected a value at line ${line}`);
  }

  private encode(statement: Statement, symbols: Map<string, number>): number[] {
    const { mnemonic: name, operands, line, address } = statement;
    const count = (expected: number): void => {
      if (operands.length !== expected) {
        throw new Error(`'${name}' expects ${expected} operand(s) at line ${line}, got ${operands.length}`);
      }
    };
    const reg = (index: number): number => {
      const operand = operands[index];
      if (operand?.kind !== "register") {
        throw new Error(`'${name}' operand ${index + 1} must be a register at line ${line}`);
      }
      return operand.value;
    };
    const imm = (index: number, bits: number): number => {
      const operand = operands[index];
      if (operand?.kind !== "immediate" || !fitsSigned(operand.value, bits)) {
        throw new Error(`'${name}' operand ${index + 1} must be a ${bits}-bit signed immediate at line ${line}`);
      }
      return operand.value;
    };
    const mem = (index: number): { offset: number; base: number } => {
      const operand = operands[index];
      if (operand?.kind !== "memory" || !fitsSigned(operand.offset, 12)) {
        throw new Error(`'${name}' operand ${index + 1} must be offset(register) at line ${line}`);
      }
      return operand;
    };
    const target = (index: number, bits: number): number => {
      const operand = operands[index];
      const offset =
        operand?.kind === "symbol" ? this.resolveValue(operand, symbols, line) - address : imm(index, bits);
      if (!fitsSigned(offset, bits) || offset % 2 !== 0) {
        throw new Error(`Branch target out of range at line ${line}`);
      }
      return offset;
    };

    if (isRegisterOp(name)) {
      count(3);
      return [Encoder.encodeRegisterOp(name, reg(0), reg(1), reg(2))];
    }
    if (isImmediateOp(name)) {
      count(3);
      return [Encoder.encodeImmediateOp(name, reg(0), reg(1), imm(2, 12))];
    }
    if (isShiftImmediateOp(name)) {
      count(3);
      const shamt = imm(2, 12);
      if (shamt < 0 || shamt > 31) throw new Error(`Shift amount out of range at line ${line}`);
      return [Encoder.encodeShiftImmediate(name, reg(0), reg(1), shamt)];
    }
    if (isLoadOp(name)) {
      count(2);
      const { offset, base } = mem(1);
      return [Encoder.encodeLoad(name, reg(0), base, offset)];
    }
    if (isStoreOp(name)) {
      count(2);
      const { offset, base } = mem(1);
      return [Encoder.encodeStore(name, reg(0), base, offset)];
    }
    if (isBranchOp(name)) {
      count(3);
      return [Encoder.encodeBranch(name, reg(0), reg(1), target(2, 13))];
    }

    switch (name) {
      case "lui":
      case "auipc": {
        count(2);
        const value = operands[1];
        if (value?.kind !== "immediate" || value.value < -0x80000 || value.value > 0xfffff) {
          throw new Error(`'${name}' takes a 20-bit immediate at line ${line}`);
        }
        return [Encoder.encodeUpper(name, reg(0), value.value)];
      }
      case "jal":
        if (operands.length === 1) return [Encoder.encodeJal(1, target(0, 21))];
        count(2);
        return [Encoder.encodeJal(reg(0), target(1, 21))];
      case "jalr":
        if (operands.length === 1) return [Encoder.encodeJalr(1, reg(0), 0)];
        if (operands.length === 2 && operands[1].kind === "memory") {
          const { offset, base } = mem(1);
          return [Encoder.encodeJalr(reg(0), base, offset)];
        }
        if (operands.length === 2) return [Encoder.encodeJalr(reg(0), reg(1), 0)];
        count(3);
        return [Encoder.encodeJalr(reg(0), reg(1), imm(2, 12))];
      case "fence":
      case "ecall":
      case "ebreak":
        if (name !== "fence") count(0);
        return [Encoder.encodeSystem(name)];
      case "nop":
        count(0);
        return [Encoder.encodeImmediateOp("addi", 0, 0, 0)];
      case "mv":
        count(2);
        return [Encoder.encodeImmediateOp("addi", reg(0), reg(1), 0)];
      case "not":
        count(2);
        return [Encoder.encodeImmediateOp("xori", reg(0), reg(1), -1)];
      case "neg":
        count(2);
        return [Encoder.encodeRegisterOp("sub", reg(0), 0, reg(1))];
      case "j":
        count(1);
        return [Encoder.encodeJal(0, target(0, 21))];
      case "jr":
        count(1);
        return [Encoder.encodeJalr(0, reg(0), 0)];
      case "ret":
        count(0);
        return [Encoder.encodeJalr(0, 1, 0)];
      case "beqz":
        count(2);
        return [Encoder.encodeBranch("beq", reg(0), 0, target(1, 13))];
      case "bnez":
        count(2);
        return [Encoder.encodeBranch("bne", reg(0), 0, target(1, 13))];
      case "li": {
        count(2);
        const value = operands[1];
        if (value.kind !== "immediate" || !Number.isInteger(value.value) || value.value < -0x80000000 || value.value > 0xffffffff) {
          throw new Error(`'li' takes a 32-bit constant at line ${line}`);
        }
        return this.loadConstant(reg(0), value.value | 0);
      }
      case "la": {
        count(2);
        const value = operands[1];
        if (value.kind !== "symbol") throw new Error(`'la' takes a label at line ${line}`);
        const { upper, lower } = splitImmediate(this.resolveValue(value, symbols, line));
        const rd = reg(0);
        return [Encoder.encodeUpper("lui", rd, upper), Encoder.encodeImmediateOp("addi", rd, rd, lower)];
      }
      default:
        throw new Error(`Unknown instruction '${name}' at line ${line}`);
    }
  }

  private loadConstant(rd: number, value: number): number[] {
    if (fitsSigned(value, 12)) {
      return [Encoder.encodeImmediateOp("addi", rd, 0, value)];
    }
    const { upper, lower } = splitImmediate(value);
    const words = [Encoder.encodeUpper("lui", rd, upper)];
    if (lower !== 0) words.push(Encoder.encodeImmediateOp("addi", rd, rd, lower));
    return words;
  }

  private checkOverlap(addresses: number[]): void {
    const seen = new Set<number>();
    for (const address of addresses) {
      if (seen.has(address)) {
        throw new Error(`Overlapping output at 0x${address.toString(16)}`);
      }
      seen.add(address);
    }
  }
}
