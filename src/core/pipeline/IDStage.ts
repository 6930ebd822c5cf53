import { decodeHazardInfo, decodeInstruction } from "../cpu/Instructions";
import { InvalidInstruction } from "../exceptions/ExecutionExceptions";
import type { RegisterFile } from "../state/RegisterFile";
import type { ForwardingUnit, ResolvedOperand } from "./ForwardingUnit";
import type { HazardReport, HazardUnit } from "./HazardUnit";
import type { IdExPayload, IfIdPayload } from "./PipelineTypes";
import type { Scoreboard } from "./Scoreboard";

export interface IDStageParams {
  decoding: IfIdPayload | null;
  scoreboard: Scoreboard;
  registerFile: RegisterFile;
  hazardUnit: HazardUnit;
  forwardingUnit: ForwardingUnit;
  forwardingEnabled: boolean;
}

export interface IDStageResult {
  decoded: IdExPayload | null;
  hazards: HazardReport;
  operands: ResolvedOperand[];
}

const NO_HAZARDS: HazardReport = { sources: [], loadUseHazard: false, dataHazard: false };

export class IDStage {
  run(params: IDStageParams): IDStageResult {
    const { decoding } = params;
    if (!decoding) {
      return { decoded: null, hazards: NO_HAZARDS, operands: [] };
    }

    if (decoding.fault) {
      return {
        decoded: { ...decoding, decoded: null, operand1: 0, operand2: 0 },
        hazards: NO_HAZARDS,
        operands: [],
      };
    }

    const decoded = decodeInstruction(decoding.word);
    if (!decoded) {
      return {
        decoded: {
          ...decoding,
          decoded: null,
          operand1: 0,
          operand2: 0,
          fault: new InvalidInstruction(decoding.word, decoding.pc),
        },
        hazards: NO_HAZARDS,
        operands: [],
      };
    }

    const hazards = params.hazardUnit.detect(decodeHazardInfo(decoded), params.scoreboard, {
      forwardingEnabled: params.forwardingEnabled,
    });
    const rs1 = params.forwardingUnit.resolve(decoded.usesRs1 ? decoded.rs1 : 0, params.scoreboard, params.registerFile);
    const rs2 = params.forwardingUnit.resolve(decoded.usesRs2 ? decoded.rs2 : 0, params.scoreboard, params.registerFile);

    return {
      decoded: { ...decoding, decoded, operand1: rs1.value, operand2: rs2.value },
      hazards,
      operands: [rs1, rs2],
    };
  }
}
