import { signExtend } from "../cpu/Instructions";
import { MisalignedAccess, normalizeCpuException } from "../exceptions/ExecutionExceptions";
import type { CacheController } from "../memory/Caches";
import type { ExMemPayload, MemWbPayload } from "./PipelineTypes";

export interface MEMStageParams {
  memory: ExMemPayload | null;
  dataCache: CacheController;
}

export type MEMStageResult =
  | { status: "idle" }
  | { status: "done"; output: MemWbPayload }
  | { status: "stall" };

export function extractLoad(word: number, address: number, width: 1 | 2 | 4, unsigned: boolean): number {
  if (width === 4) return word | 0;
  const bits = width * 8;
  const raw = (word >>> ((address & 3) * 8)) & ((1 << bits) - 1);
  return unsigned ? raw : signExtend(raw, bits);
}

export class MEMStage {
  run(params: MEMStageParams): MEMStageResult {
    const { memory } = params;
    if (!memory) {
      return { status: "idle" };
    }

    const { decoded } = memory;
    const base = { sequence: memory.sequence, pc: memory.pc, word: memory.word, decoded };

    if (memory.fault || !decoded) {
      return { status: "done", output: { ...base, value: 0, fault: memory.fault } };
    }

    if (decoded.kind !== "load" && decoded.kind !== "store") {
      return { status: "done", output: { ...base, value: memory.result, fault: null } };
    }

    const width = decoded.width === 0 ? 4 : decoded.width;
    const address = memory.result >>> 0;
    const isStore = decoded.kind === "store";
    if (address % width !== 0) {
      const fault = new MisalignedAccess(address, isStore ? "write" : "read", width, memory.pc);
      return { status: "done", output: { ...base, value: 0, fault } };
    }

    const shift = (address & 3) * 8;
    const response = params.dataCache.access({
      address: address & ~3,
      write: isStore
        ? {
            data: (memory.storeData << shift) | 0,
            byteMask: (((1 << width) - 1) << (address & 3)) & 0xf,
          }
        : undefined,
    });

    switch (response.status) {
      case "stall":
        return { status: "stall" };
      case "fault":
        return {
          status: "done",
          output: { ...base, value: 0, fault: normalizeCpuException(response.error, memory.pc) },
        };
      case "hit":
        return {
          status: "done",
          output: {
            ...base,
            value: isStore ? 0 : extractLoad(response.data, address, width, decoded.unsignedLoad),
            fault: null,
          },
        };
    }
  }
}
