import {
  resolveBackingMemoryConfig,
  type AddressRange,
  type BackingMemoryConfig,
  type ResolvedBackingMemoryConfig,
} from "../config/CoreConfig";
import { BusResponse, type BusChannels, type BusResponseCode, type BusTransfers } from "./Handshake";

export type SlaveInputChannel = "aw" | "w" | "ar";

/** Decides whether the slave raises ready on an input channel this cycle. */
export type ReadyPolicy = (channel: SlaveInputChannel, cycle: number) => boolean;

export interface MemorySlaveOptions extends Partial<BackingMemoryConfig> {
  readyPolicy?: ReadyPolicy;
}

interface PendingResponse<T> {
  readyAt: number;
  beat: T;
}

const alwaysReady: ReadyPolicy = () => true;

/**
 * Backing memory behind the slave side of the bus: a flat little-endian byte
 * array. Write address and write data are accepted independently and paired
 * in arrival order. Responses leave in the order their requests were accepted.
 */
export class MemorySlave {
  private readonly config: ResolvedBackingMemoryConfig;
  private readonly bytes: Uint8Array;
  private readonly readyPolicy: ReadyPolicy;

  private readonly writeAddresses: number[] = [];
  private readonly writeData: Array<{ data: number; strobe: number }> = [];
  private readonly writeResponses: Array<PendingResponse<{ response: BusResponseCode }>> = [];
  private readonly readResponses: Array<PendingResponse<{ data: number; response: BusResponseCode }>> = [];

  constructor(
    private readonly channels: BusChannels,
    options: MemorySlaveOptions = {},
  ) {
    this.config = resolveBackingMemoryConfig(options);
    this.bytes = new Uint8Array(this.config.capacity);
    this.readyPolicy = options.readyPolicy ?? alwaysReady;
  }

  get capacity(): number {
    return this.config.capacity;
  }

  /** Drives this cycle's slave-side signals. */
  drive(cycle: number): void {
    const { aw, w, b, ar, r } = this.channels;
    const depth = this.config.queueDepth;

    aw.setReady(this.writeAddresses.length < depth && this.readyPolicy("aw", cycle));
    w.setReady(this.writeData.length < depth && this.readyPolicy("w", cycle));
    ar.setReady(this.readResponses.length < depth && this.readyPolicy("ar", cycle));

    const writeResponse = this.writeResponses[0];
    if (!b.valid && writeResponse && writeResponse.readyAt <= cycle) {
      b.offer(writeResponse.beat);
    }
    const readResponse = this.readResponses[0];
    if (!r.valid && readResponse && readResponse.readyAt <= cycle) {
      r.offer(readResponse.beat);
    }
  }

  clock(cycle: number, transfers: BusTransfers): void {
    if (transfers.b) this.writeResponses.shift();
    if (transfers.r) this.readResponses.shift();

    if (transfers.ar) {
      const address = transfers.ar.address >>> 0;
      const response = this.decodeAddress(address);
      this.readResponses.push({
        readyAt: cycle + this.config.readLatency,
        beat: { data: response === BusResponse.OKAY ? this.readWord(address) : 0, response },
      });
    }

    if (transfers.aw) this.writeAddresses.push(transfers.aw.address >>> 0);
    if (transfers.w) this.writeData.push(transfers.w);

    while (this.writeAddresses.length > 0 && this.writeData.length > 0) {
      const address = this.writeAddresses.shift() ?? 0;
      const beat = this.writeData.shift() ?? { data: 0, strobe: 0 };
      const response = this.decodeAddress(address);
      if (response === BusResponse.OKAY) {
        this.applyWrite(address, beat.data, beat.strobe);
      }
      this.writeResponses.push({ readyAt: cycle + this.config.writeLatency, beat: { response } });
    }
  }

  isIdle(): boolean {
    return (
      this.writeAddresses.length === 0 &&
      this.writeData.length === 0 &&
      this.writeResponses.length === 0 &&
      this.readResponses.length === 0
    );
  }

  /** Drops in-flight requests. Memory contents are retained. */
  reset(): void {
    this.writeAddresses.length = 0;
    this.writeData.length = 0;
    this.writeResponses.length = 0;
    this.readResponses.length = 0;
  }

  readByte(address: number): number {
    return this.bytes[this.validateAddress(address, 1)];
  }

  writeByte(address: number, value: number): void {
    this.bytes[this.validateAddress(address, 1)] = value & 0xff;
  }

  readWord(address: number): number {
    const base = this.validateAddress(address, 4);
    return (
      this.bytes[base] |
      (this.bytes[base + 1] << 8) |
      (this.bytes[base + 2] << 16) |
      (this.bytes[base + 3] << 24)
    );
  }

  writeWord(address: number, value: number): void {
    const base = this.validateAddress(address, 4);
    for (let i = 0; i < 4; i++) {
      this.bytes[base + i] = (value >>> (8 * i)) & 0xff;
    }
  }

  private applyWrite(address: number, data: number, strobe: number): void {
    for (let i = 0; i < 4; i++) {
      if ((strobe >>> i) & 1) {
        this.bytes[address + i] = (data >>> (8 * i)) & 0xff;
      }
    }
  }

  private decodeAddress(address: number): BusResponseCode {
    if (address % 4 !== 0 || address + 4 > this.config.capacity) {
      return BusResponse.DECERR;
    }
    if (this.config.faultRanges.some((range) => overlaps(range, address))) {
      return BusResponse.SLVERR;
    }
    return BusResponse.OKAY;
  }

  private validateAddress(address: number, width: number): number {
    const normalized = address >>> 0;
    if (!Number.isInteger(address) || normalized + width > this.config.capacity) {
      throw new RangeError(`Address 0x${normalized.toString(16)} is outside backing memory`);
    }
    if (normalized % width !== 0) {
      throw new RangeError(`Unaligned ${width}-byte access at 0x${normalized.toString(16)}`);
    }
    return normalized;
  }
}

function overlaps(range: AddressRange, address: number): boolean {
  return address < range.end && address + 4 > range.start;
}
