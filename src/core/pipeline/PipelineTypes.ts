import type { DecodedInstruction } from "../cpu/Instructions";
import type { CpuException } from "../exceptions/ExecutionExceptions";

/**
 * Contents of one pipeline latch. `empty` is an unoccupied slot (startup or
 * drain); `bubble` is an occupied slot with no architectural effect.
 */
export type PipelineSlot<T> =
  | { readonly state: "empty" }
  | { readonly state: "bubble" }
  | { readonly state: "valid"; readonly payload: T };

export type SlotState = PipelineSlot<unknown>["state"];

export const EMPTY_SLOT: PipelineSlot<never> = { state: "empty" };
export const BUBBLE_SLOT: PipelineSlot<never> = { state: "bubble" };

export function validSlot<T>(payload: T): PipelineSlot<T> {
  return { state: "valid", payload };
}

export function payloadOf<T>(slot: PipelineSlot<T>): T | null {
  return slot.state === "valid" ? slot.payload : null;
}

export interface InstructionTag {
  /** Program-order number, assigned at fetch. */
  sequence: number;
  pc: number;
  word: number;
  /** Set when an earlier stage faulted; the instruction then has no other effect. */
  fault: CpuException | null;
}

export interface BranchPrediction {
  taken: boolean;
  nextPc: number;
}

export interface IfIdPayload extends InstructionTag {
  prediction: BranchPrediction;
}

export interface IdExPayload extends InstructionTag {
  decoded: DecodedInstruction | null;
  prediction: BranchPrediction;
  /** Source operand values, resolved at decode through the forwarding network. */
  operand1: number;
  operand2: number;
}

export interface ExMemPayload extends InstructionTag {
  decoded: DecodedInstruction | null;
  /** ALU result, or the effective address for loads and stores. */
  result: number;
  storeData: number;
}

export interface MemWbPayload extends InstructionTag {
  decoded: DecodedInstruction | null;
  value: number;
}

export type IfIdSlot = PipelineSlot<IfIdPayload>;
export type IdExSlot = PipelineSlot<IdExPayload>;
export type ExMemSlot = PipelineSlot<ExMemPayload>;
export type MemWbSlot = PipelineSlot<MemWbPayload>;

export type PipelineLatchName = "ifId" | "idEx" | "exMem" | "memWb";
