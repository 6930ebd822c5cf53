import type { RegisterFile } from "../state/RegisterFile";
import type { ProducerStage, Scoreboard } from "./Scoreboard";

export type OperandSource = "register-file" | ProducerStage;

export interface ResolvedOperand {
  register: number;
  value: number;
  source: OperandSource;
}

export class ForwardingUnit {
  /**
   * Picks the newest value of `register`. An in-flight producer whose value is
   * not yet available falls back to the register file; the hazard unit stalls
   * the consumer in that case.
   */
  resolve(register: number, scoreboard: Scoreboard, registerFile: RegisterFile): ResolvedOperand {
    if (register === 0) {
      return { register, value: 0, source: "register-file" };
    }

    const producer = scoreboard.lookup(register);
    if (producer?.available) {
      return { register, value: producer.value | 0, source: producer.stage };
    }

    return { register, value: registerFile.read(register), source: "register-file" };
  }
}
