import { MisalignedAccess, normalizeCpuException } from "../exceptions/ExecutionExceptions";
import type { CacheController } from "../memory/Caches";
import type { BranchPredictor } from "./BranchPredictor";
import type { IfIdPayload } from "./PipelineTypes";

export interface IFStageParams {
  fetchPc: number;
  sequence: number;
  instructionCache: CacheController;
  predictor: BranchPredictor;
  hasInstruction: (address: number) => boolean;
}

export type IFStageResult =
  | { status: "fetched"; payload: IfIdPayload }
  | { status: "stall" }
  | { status: "idle" };

export class IFStage {
  run(params: IFStageParams): IFStageResult {
    const { fetchPc, sequence } = params;

    if (!params.hasInstruction(fetchPc)) {
      return { status: "idle" };
    }

    const fallThrough = { taken: false, nextPc: (fetchPc + 4) >>> 0 };
    if (fetchPc % 4 !== 0) {
      const fault = new MisalignedAccess(fetchPc, "execute", 4, fetchPc);
      return { status: "fetched", payload: { sequence, pc: fetchPc, word: 0, fault, prediction: fallThrough } };
    }

    const response = params.instructionCache.access({ address: fetchPc });
    switch (response.status) {
      case "stall":
        return { status: "stall" };
      case "fault":
        return {
          status: "fetched",
          payload: {
            sequence,
            pc: fetchPc,
            word: 0,
            fault: normalizeCpuException(response.error, fetchPc),
            prediction: fallThrough,
          },
        };
      case "hit":
        return {
          status: "fetched",
          payload: {
            sequence,
            pc: fetchPc,
            word: response.data >>> 0,
            fault: null,
            prediction: params.predictor.predict(fetchPc),
          },
        };
    }
  }
}
