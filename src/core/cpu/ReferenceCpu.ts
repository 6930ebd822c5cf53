// Sequential golden model: one instruction per step over the same decoder and
// execution unit as the pipeline, against a flat little-endian memory with no
// caches or bus timing.

import type { BinaryImage } from "../assembler/Assembler";
import { resolveCoreConfig, type ResolvedCoreConfig } from "../config/CoreConfig";
import {
  CpuException,
  InvalidInstruction,
  MemoryAccessFault,
  MisalignedAccess,
  normalizeCpuException,
} from "../exceptions/ExecutionExceptions";
import type { AccessType } from "../exceptions/AccessExceptions";
import { extractLoad } from "../pipeline/MEMStage";
import { RegisterFile } from "../state/RegisterFile";
import type { CoreStatus } from "../tools/pipelineEvents";
import { execute, operandsFor, resolveControl } from "./ExecutionUnit";
import { decodeInstruction, isHaltInstruction } from "./Instructions";

export interface ReferenceCpuOptions {
  config?: ResolvedCoreConfig;
}

export class ReferenceCpu {
  private readonly config: ResolvedCoreConfig;
  private readonly registers = new RegisterFile();
  private readonly memory: Uint8Array;
  private readonly view: DataView;
  private textAddresses = new Set<number>();
  private pc: number;
  private status: CoreStatus = "running";
  private fault: CpuException | null = null;
  private retired = 0;

  constructor(options: ReferenceCpuOptions = {}) {
    this.config = options.config ?? resolveCoreConfig();
    this.memory = new Uint8Array(this.config.memory.capacity);
    this.view = new DataView(this.memory.buffer);
    this.pc = this.config.resetVector;
  }

  load(image: BinaryImage): void {
    this.memory.fill(0);
    this.registers.reset();
    image.text.forEach(({ address, word }) => this.storeWord(address, word));
    image.data.forEach(({ address, value }) => this.storeWord(address, value));
    this.textAddresses = new Set(image.text.map(({ address }) => address >>> 0));
    this.pc = image.entryPoint >>> 0;
    this.status = "running";
    this.fault = null;
    this.retired = 0;
  }

  getPc(): number {
    return this.pc;
  }

  getStatus(): CoreStatus {
    return this.status;
  }

  getFault(): CpuException | null {
    return this.fault;
  }

  getRetiredCount(): number {
    return this.retired;
  }

  getRegisters(): number[] {
    return this.registers.snapshot();
  }

  /** Backdoor read; fault ranges do not apply. */
  readWord(address: number): number {
    const start = address >>> 0;
    if (start % 4 !== 0 || start + 4 > this.memory.length) {
      throw new RangeError(`Address 0x${start.toString(16)} is not a word in memory`);
    }
    return this.view.getInt32(start, true);
  }

  step(): CoreStatus {
    if (this.status !== "running") return this.status;
    if (!this.textAddresses.has(this.pc)) {
      this.status = "halted";
      return this.status;
    }

    const pc = this.pc;
    try {
      this.executeAt(pc);
    } catch (error) {
      this.fault = normalizeCpuException(error, pc);
      this.status = "fault";
    }
    return this.status;
  }

  run(maxSteps = Number.MAX_SAFE_INTEGER): CoreStatus {
    let steps = 0;
    while (this.status === "running" && steps < maxSteps) {
      this.step();
      steps += 1;
    }
    return this.status;
  }

  private executeAt(pc: number): void {
    this.checkRange(pc, 4, "execute");
    const word = this.view.getUint32(pc, true);
    const decoded = decodeInstruction(word);
    if (!decoded) {
      throw new InvalidInstruction(word, pc);
    }

    const rs1 = this.registers.read(decoded.rs1);
    const rs2 = this.registers.read(decoded.rs2);
    const inputs = operandsFor(decoded, pc, rs1, rs2);
    const result = execute(inputs.operation, inputs.left, inputs.right);
    const control = resolveControl(decoded, pc, rs1, rs2);

    if (control.taken && control.target % 4 !== 0) {
      throw new MisalignedAccess(control.target, "execute", 4, pc);
    }

    let value = result;
    if (decoded.kind === "load" || decoded.kind === "store") {
      const width = decoded.width === 0 ? 4 : decoded.width;
      const address = result >>> 0;
      const access: AccessType = decoded.kind === "store" ? "write" : "read";
      if (address % width !== 0) {
        throw new MisalignedAccess(address, access, width, pc);
      }
      this.checkRange(address & ~3, 4, access);

      if (decoded.kind === "store") {
        for (let i = 0; i < width; i++) {
          this.memory[address + i] = (rs2 >>> (i * 8)) & 0xff;
        }
      } else {
        value = extractLoad(this.view.getInt32(address & ~3, true), address, width, decoded.unsignedLoad);
      }
    }

    if (decoded.writesRd) {
      this.registers.write(decoded.rd, value);
    }
    this.retired += 1;
    this.pc = control.nextPc;

    if (isHaltInstruction(decoded)) {
      this.status = "halted";
    }
  }

  private storeWord(address: number, value: number): void {
    if ((address >>> 0) + 4 > this.memory.length) {
      throw new RangeError(`Image word at 0x${(address >>> 0).toString(16)} lies outside memory`);
    }
    this.view.setInt32(address >>> 0, value | 0, true);
  }

  private checkRange(address: number, width: number, access: AccessType): void {
    const start = address >>> 0;
    if (start + width > this.memory.length) {
      throw new MemoryAccessFault(start, access);
    }
    if (this.config.memory.faultRanges.some((range) => start < range.end && start + width > range.start)) {
      throw new MemoryAccessFault(start, access);
    }
  }
}
