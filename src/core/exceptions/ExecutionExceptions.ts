import { BusError, type AccessType } from "./AccessExceptions";

export class CpuException extends Error {
  pc: number | null;

  constructor(message: string, pc: number | null = null) {
    super(message);
    this.pc = pc;
    this.name = "CpuException";
  }

  withPc(pc: number): this {
    if (this.pc === null) {
      this.pc = pc >>> 0;
    }
    return this;
  }
}

export class InvalidInstruction extends CpuException {
  readonly instruction: number;

  constructor(instruction: number, pc: number | null = null) {
    super(`Invalid or unimplemented instruction 0x${(instruction >>> 0).toString(16)}`, pc);
    this.instruction = instruction >>> 0;
    this.name = "InvalidInstruction";
  }
}

export class MisalignedAccess extends CpuException {
  readonly address: number;
  readonly access: AccessType;
  readonly width: number;

  constructor(address: number, access: AccessType, width: number, pc: number | null = null) {
    super(`Misaligned ${width}-byte ${access} access at 0x${(address >>> 0).toString(16)}`, pc);
    this.address = address >>> 0;
    this.access = access;
    this.width = width;
    this.name = "MisalignedAccess";
  }
}

export class MemoryAccessFault extends CpuException {
  readonly address: number;
  readonly access: AccessType;

  constructor(address: number, access: AccessType, pc: number | null = null, message?: string) {
    super(message ?? `Memory access error at 0x${(address >>> 0).toString(16)}`, pc);
    this.address = address >>> 0;
    this.access = access;
    this.name = "MemoryAccessFault";
  }
}

export function normalizeCpuException(error: unknown, pc: number): CpuException {
  if (error instanceof CpuException) {
    return error.withPc(pc);
  }

  if (error instanceof BusError) {
    return new MemoryAccessFault(error.address, error.access, pc, error.message);
  }

  if (error instanceof Error) {
    return new CpuException(error.message, pc);
  }

  return new CpuException("Unknown CPU exception", pc);
}
