import { BusResponse, isResponseOk, type BusChannels, type BusResponseCode, type BusTransfers } from "./Handshake";

export type BusDirection = "read" | "write";

export interface BusTransactionRequest {
  direction: BusDirection;
  /** Word-aligned address of the first beat. */
  address: number;
  /** Number of word beats. */
  beats: number;
  /** One word per beat, writes only. */
  data?: number[];
  /** Byte strobe applied to every write beat; defaults to all four bytes. */
  strobe?: number;
}

export interface BusTransactionResult {
  id: number;
  direction: BusDirection;
  address: number;
  data: number[];
  response: BusResponseCode;
  ok: boolean;
}

interface ActiveTransaction {
  id: number;
  request: Required<BusTransactionRequest>;
  addressesIssued: number;
  dataIssued: number;
  responsesReceived: number;
  data: number[];
  response: BusResponseCode;
}

export interface BusAdapterOptions {
  maxOutstandingReads?: number;
}

/**
 * Master side of the handshake bus. Line transactions are queued and served
 * strictly in order; each is split into word beats. Read address beats may run
 * ahead of their data up to the outstanding-read limit.
 */
export class BusAdapter {
  private readonly maxOutstandingReads: number;
  private readonly queue: ActiveTransaction[] = [];
  private readonly results = new Map<number, BusTransactionResult>();
  private nextId = 1;

  constructor(
    private readonly channels: BusChannels,
    options: BusAdapterOptions = {},
  ) {
    this.maxOutstandingReads = options.maxOutstandingReads ?? 4;
    if (!Number.isInteger(this.maxOutstandingReads) || this.maxOutstandingReads < 1) {
      throw new RangeError(`Outstanding read limit must be at least one (got ${this.maxOutstandingReads})`);
    }
  }

  enqueue(request: BusTransactionRequest): number {
    if (!Number.isInteger(request.beats) || request.beats < 1) {
      throw new RangeError(`Bus transaction needs at least one beat (got ${request.beats})`);
    }
    if (request.address % 4 !== 0) {
      throw new RangeError(`Bus transaction address must be word aligned (got 0x${request.address.toString(16)})`);
    }
    const data = request.data ?? [];
    if (request.direction === "write" && data.length !== request.beats) {
      throw new RangeError(`Write transaction carries ${data.length} words for ${request.beats} beats`);
    }

    const id = this.nextId;
    this.nextId += 1;
    this.queue.push({
      id,
      request: {
        direction: request.direction,
        address: request.address >>> 0,
        beats: request.beats,
        data: [...data],
        strobe: request.strobe ?? 0xf,
      },
      addressesIssued: 0,
      dataIssued: 0,
      responsesReceived: 0,
      data: [],
      response: BusResponse.OKAY,
    });
    return id;
  }

  /** Drives this cycle's master-side signals. */
  drive(): void {
    const { aw, w, b, ar, r } = this.channels;
    b.setReady(true);
    r.setReady(true);

    const head = this.queue[0];
    if (!head) return;

    const { request } = head;
    if (request.direction === "read") {
      const outstanding = head.addressesIssued - head.responsesReceived;
      if (!ar.valid && head.addressesIssued < request.beats && outstanding < this.maxOutstandingReads) {
        ar.offer({ address: this.beatAddress(head, head.addressesIssued) });
        head.addressesIssued += 1;
      }
      return;
    }

    if (!aw.valid && head.addressesIssued < request.beats) {
      aw.offer({ address: this.beatAddress(head, head.addressesIssued) });
      head.addressesIssued += 1;
    }
    if (!w.valid && head.dataIssued < request.beats) {
      w.offer({ data: request.data[head.dataIssued] >>> 0, strobe: request.strobe });
      head.dataIssued += 1;
    }
  }

  /** Consumes the responses transferred this cycle. */
  clock(transfers: BusTransfers): void {
    const head = this.queue[0];
    if (!head) return;

    if (head.request.direction === "read" && transfers.r) {
      head.data.push(transfers.r.data >>> 0);
      this.recordResponse(head, transfers.r.response);
    } else if (head.request.direction === "write" && transfers.b) {
      this.recordResponse(head, transfers.b.response);
    }

    if (head.responsesReceived === head.request.beats) {
      this.queue.shift();
      this.results.set(head.id, {
        id: head.id,
        direction: head.request.direction,
        address: head.request.address,
        data: head.data,
        response: head.response,
        ok: isResponseOk(head.response),
      });
    }
  }

  takeResult(id: number): BusTransactionResult | null {
    const result = this.results.get(id);
    if (!result) return null;
    this.results.delete(id);
    return result;
  }

  isIdle(): boolean {
    return this.queue.length === 0;
  }

  pendingTransactions(): number {
    return this.queue.length;
  }

  reset(): void {
    this.queue.length = 0;
    this.results.clear();
  }

  private recordResponse(transaction: ActiveTransaction, response: BusResponseCode): void {
    transaction.responsesReceived += 1;
    if (isResponseOk(transaction.response) && !isResponseOk(response)) {
      transaction.response = response;
    }
  }

  private beatAddress(transaction: ActiveTransaction, beat: number): number {
    return (transaction.request.address + beat * 4) >>> 0;
  }
}
