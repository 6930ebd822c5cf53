import { isHaltInstruction } from "../cpu/Instructions";
import type { CpuException } from "../exceptions/ExecutionExceptions";
import type { MemWbPayload } from "./PipelineTypes";

export interface RegisterWrite {
  register: number;
  value: number;
}

export interface RetiredInstruction {
  sequence: number;
  pc: number;
  word: number;
  name: string;
  write: RegisterWrite | null;
}

export type WBStageResult =
  | { status: "idle" }
  | { status: "retired"; retired: RetiredInstruction; halt: boolean }
  | { status: "fault"; fault: CpuException };

export class WBStage {
  run(writeback: MemWbPayload | null): WBStageResult {
    if (!writeback) {
      return { status: "idle" };
    }

    if (writeback.fault) {
      return { status: "fault", fault: writeback.fault };
    }

    const { decoded } = writeback;
    if (!decoded) {
      return { status: "idle" };
    }

    return {
      status: "retired",
      retired: {
        sequence: writeback.sequence,
        pc: writeback.pc,
        word: writeback.word,
        name: decoded.name,
        write: decoded.writesRd ? { register: decoded.rd, value: writeback.value | 0 } : null,
      },
      halt: isHaltInstruction(decoded),
    };
  }
}
