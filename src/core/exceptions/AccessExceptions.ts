export type AccessType = "read" | "write" | "execute";

export class BusError extends Error {
  readonly address: number;
  readonly access: AccessType;
  readonly response: number;

  constructor(address: number, access: AccessType, response: number, message?: string) {
    super(message ?? `Bus ${access} error (response ${response}) at 0x${(address >>> 0).toString(16)}`);
    this.address = address >>> 0;
    this.access = access;
    this.response = response;
    this.name = "BusError";
  }
}

export class BusProtocolError extends Error {
  readonly channel: string;
  readonly cycle: number;

  constructor(channel: string, cycle: number, message: string) {
    super(`[${channel}] cycle ${cycle}: ${message}`);
    this.channel = channel;
    this.cycle = cycle;
    this.name = "BusProtocolError";
  }
}
