import { execute, operandsFor, resolveControl } from "../cpu/ExecutionUnit";
import { isControlTransfer } from "../cpu/Instructions";
import { MisalignedAccess } from "../exceptions/ExecutionExceptions";
import type { ExMemPayload, IdExPayload } from "./PipelineTypes";

export interface BranchResolution {
  pc: number;
  isControl: boolean;
  taken: boolean;
  target: number;
  actualNextPc: number;
  predictedNextPc: number;
  mispredicted: boolean;
}

export interface EXStageParams {
  executing: IdExPayload | null;
}

export interface EXStageResult {
  executed: ExMemPayload | null;
  resolution: BranchResolution | null;
}

export class EXStage {
  run(params: EXStageParams): EXStageResult {
    const { executing } = params;
    if (!executing) {
      return { executed: null, resolution: null };
    }

    const { decoded, operand1, operand2 } = executing;
    if (executing.fault || !decoded) {
      return { executed: { ...this.tag(executing), decoded, result: 0, storeData: 0 }, resolution: null };
    }

    const inputs = operandsFor(decoded, executing.pc, operand1, operand2);
    const result = execute(inputs.operation, inputs.left, inputs.right);
    const control = resolveControl(decoded, executing.pc, operand1, operand2);

    if (control.taken && control.target % 4 !== 0) {
      return {
        executed: {
          ...this.tag(executing),
          decoded,
          result,
          storeData: 0,
          fault: new MisalignedAccess(control.target, "execute", 4, executing.pc),
        },
        resolution: null,
      };
    }

    const resolution: BranchResolution = {
      pc: executing.pc,
      isControl: isControlTransfer(decoded),
      taken: control.taken,
      target: control.target,
      actualNextPc: control.nextPc,
      predictedNextPc: executing.prediction.nextPc,
      mispredicted: control.nextPc !== executing.prediction.nextPc,
    };

    return {
      executed: { ...this.tag(executing), decoded, result, storeData: operand2 },
      resolution,
    };
  }

  private tag(payload: IdExPayload): Pick<ExMemPayload, "sequence" | "pc" | "word" | "fault"> {
    return { sequence: payload.sequence, pc: payload.pc, word: payload.word, fault: payload.fault };
  }
}
