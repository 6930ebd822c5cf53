import type { HazardInfo } from "../cpu/Instructions";
import type { ProducerStage, Scoreboard } from "./Scoreboard";

export type SourceHazardKind = "none" | "forward" | "load-use" | "data";

export interface SourceHazard {
  register: number;
  kind: SourceHazardKind;
  producer: ProducerStage | null;
}

export interface HazardReport {
  sources: SourceHazard[];
  loadUseHazard: boolean;
  /** A producer must commit before the consumer can decode. */
  dataHazard: boolean;
}

export interface HazardDetectionOptions {
  forwardingEnabled?: boolean;
}

export class HazardUnit {
  detect(decodingHazard: HazardInfo, scoreboard: Scoreboard, options?: HazardDetectionOptions): HazardReport {
    const forwardingEnabled = options?.forwardingEnabled ?? true;

    const sources = decodingHazard.sources.map((register): SourceHazard => {
      const producer = register === 0 ? null : scoreboard.lookup(register);
      if (!producer) {
        return { register, kind: "none", producer: null };
      }

      // The register file is written before it is read, so a writeback producer
      // never stalls, even without forwarding.
      if (!forwardingEnabled) {
        const kind = producer.stage === "writeback" ? "forward" : "data";
        return { register, kind, producer: producer.stage };
      }

      if (producer.available) {
        return { register, kind: "forward", producer: producer.stage };
      }
      return { register, kind: producer.isLoad ? "load-use" : "data", producer: producer.stage };
    });

    return {
      sources,
      loadUseHazard: sources.some((source) => source.kind === "load-use"),
      dataHazard: sources.some((source) => source.kind === "data"),
    };
  }
}
