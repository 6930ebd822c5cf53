export const BusResponse = {
  OKAY: 0,
  EXOKAY: 1,
  SLVERR: 2,
  DECERR: 3,
} as const;

export type BusResponseCode = (typeof BusResponse)[keyof typeof BusResponse];

export function isResponseOk(response: BusResponseCode): boolean {
  return response === BusResponse.OKAY || response === BusResponse.EXOKAY;
}

export type AddressBeat = { address: number };
export type WriteDataBeat = { data: number; strobe: number };
export type WriteResponseBeat = { response: BusResponseCode };
export type ReadDataBeat = { data: number; response: BusResponseCode };

export type BusChannelName = "aw" | "w" | "b" | "ar" | "r";

/**
 * One valid/ready channel. The producer drives `valid` and the payload, the
 * consumer drives `ready`; a beat transfers on a cycle where both are high.
 * Signals are driven during a cycle and settled by {@link endCycle}.
 */
export class HandshakeChannel<T> {
  private validSignal = false;
  private readySignal = false;
  private current: T | null = null;

  constructor(readonly name: BusChannelName) {}

  get valid(): boolean {
    return this.validSignal;
  }

  get ready(): boolean {
    return this.readySignal;
  }

  get payload(): T | null {
    return this.current;
  }

  offer(payload: T): void {
    this.validSignal = true;
    this.current = payload;
  }

  withdraw(): void {
    this.validSignal = false;
    this.current = null;
  }

  setReady(ready: boolean): void {
    this.readySignal = ready;
  }

  fired(): boolean {
    return this.validSignal && this.readySignal;
  }

  /** Payload of this cycle's transfer, or null when nothing fired. */
  take(): T | null {
    return this.fired() ? this.current : null;
  }

  endCycle(): void {
    if (this.fired()) {
      this.withdraw();
    }
    this.readySignal = false;
  }

  reset(): void {
    this.validSignal = false;
    this.readySignal = false;
    this.current = null;
  }
}

export interface BusChannels {
  aw: HandshakeChannel<AddressBeat>;
  w: HandshakeChannel<WriteDataBeat>;
  b: HandshakeChannel<WriteResponseBeat>;
  ar: HandshakeChannel<AddressBeat>;
  r: HandshakeChannel<ReadDataBeat>;
}

export interface BusTransfers {
  aw: AddressBeat | null;
  w: WriteDataBeat | null;
  b: WriteResponseBeat | null;
  ar: AddressBeat | null;
  r: ReadDataBeat | null;
}

export const BUS_CHANNEL_NAMES: readonly BusChannelName[] = ["aw", "w", "b", "ar", "r"];

export function createBusChannels(): BusChannels {
  return {
    aw: new HandshakeChannel<AddressBeat>("aw"),
    w: new HandshakeChannel<WriteDataBeat>("w"),
    b: new HandshakeChannel<WriteResponseBeat>("b"),
    ar: new HandshakeChannel<AddressBeat>("ar"),
    r: new HandshakeChannel<ReadDataBeat>("r"),
  };
}

export function sampleTransfers(channels: BusChannels): BusTransfers {
  return {
    aw: channels.aw.take(),
    w: channels.w.take(),
    b: channels.b.take(),
    ar: channels.ar.take(),
    r: channels.r.take(),
  };
}

export function endBusCycle(channels: BusChannels): void {
  channels.aw.endCycle();
  channels.w.endCycle();
  channels.b.endCycle();
  channels.ar.endCycle();
  channels.r.endCycle();
}

export function resetBusChannels(channels: BusChannels): void {
  channels.aw.reset();
  channels.w.reset();
  channels.b.reset();
  channels.ar.reset();
  channels.r.reset();
}
