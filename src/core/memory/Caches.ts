import type { BusTransactionRequest, BusTransactionResult } from "../bus/BusAdapter";
import { resolveCacheConfig, log2, type CacheConfig, type ResolvedCacheConfig } from "../config/CoreConfig";
import { BusError, type AccessType } from "../exceptions/AccessExceptions";

export interface CacheWrite {
  data: number;
  /** Bit i enables byte i of the word. */
  byteMask: number;
}

export interface CacheRequest {
  /** Word-aligned byte address. */
  address: number;
  write?: CacheWrite;
}

export type CacheResponse =
  | { status: "hit"; data: number }
  | { status: "stall" }
  | { status: "fault"; error: BusError };

export type CachePhase = "idle" | "miss" | "fault";

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  writeBacks: number;
}

/** The slice of the bus adapter a cache needs. */
export interface CacheBusPort {
  enqueue(request: BusTransactionRequest): number;
  takeResult(id: number): BusTransactionResult | null;
}

/** Direct access to backing memory, bypassing the bus. */
export interface CacheBackdoor {
  loadLine(address: number, size: number): Uint8Array;
  storeLine(address: number, data: Uint8Array): void;
}

export interface CacheControllerOptions {
  name: string;
  config?: Partial<CacheConfig>;
  bus: CacheBusPort;
  backdoor: CacheBackdoor;
  /** The instruction cache has no write path. */
  writable?: boolean;
}

interface CacheLine {
  tag: number;
  valid: boolean;
  dirty: boolean;
  lastUsed: number;
  insertedAt: number;
  data: Uint8Array;
}

interface OutstandingMiss {
  setIndex: number;
  tag: number;
  way: number;
  lineAddress: number;
  requestAddress: number;
  access: AccessType;
  writeBackId: number | null;
  fillId: number;
  error: BusError | null;
}

type PendingAction =
  | { kind: "hit"; line: CacheLine; offset: number; write?: CacheWrite }
  | { kind: "miss"; setIndex: number; tag: number; address: number; access: AccessType }
  | { kind: "acknowledge-fault" };

/**
 * Blocking set-associative cache in front of the bus adapter. `access` is
 * combinational and only records what the request needs; `clock` applies it at
 * the edge and advances the miss state machine. Dirty lines are written back
 * before the fill is requested, so both land on the bus in order.
 */
export class CacheController {
  readonly name: string;
  private readonly config: ResolvedCacheConfig;
  private readonly offsetBits: number;
  private readonly indexBits: number;
  private readonly sets: CacheLine[][];
  private readonly bus: CacheBusPort;
  private readonly backdoor: CacheBackdoor;
  private readonly writable: boolean;
  private usageCounter = 0;
  private phase: CachePhase = "idle";
  private miss: OutstandingMiss | null = null;
  private fault: BusError | null = null;
  private faultLine: number | null = null;
  private pending: PendingAction | null = null;
  private stats: CacheStats = { hits: 0, misses: 0, evictions: 0, writeBacks: 0 };

  constructor(options: CacheControllerOptions) {
    this.name = options.name;
    this.config = resolveCacheConfig(options.config, options.name);
    this.offsetBits = log2(this.config.lineSize);
    this.indexBits = log2(this.config.sets);
    this.bus = options.bus;
    this.backdoor = options.backdoor;
    this.writable = options.writable ?? true;
    this.sets = Array.from({ length: this.config.sets }, () => this.createEmptySet());
  }

  getConfig(): ResolvedCacheConfig {
    return this.config;
  }

  getPhase(): CachePhase {
    return this.phase;
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  access(request: CacheRequest): CacheResponse {
    const address = request.address >>> 0;
    if (address % 4 !== 0) {
      throw new RangeError(`${this.name}: access must be word aligned (got 0x${address.toString(16)})`);
    }
    if (request.write && !this.writable) {
      throw new RangeError(`${this.name}: cache is read-only`);
    }

    if (this.phase === "miss") {
      this.pending = null;
      return { status: "stall" };
    }

    const { setIndex, tag, offset } = this.indexAddress(address);
    // A fault answers only the line that caused it; other lines look up normally.
    if (this.phase === "fault" && this.fault && this.faultLine === this.computeLineBase(tag, setIndex)) {
      this.pending = { kind: "acknowledge-fault" };
      return { status: "fault", error: this.fault };
    }

    const line = this.findLine(this.sets[setIndex], tag);
    if (line) {
      this.pending = { kind: "hit", line, offset, write: request.write };
      return { status: "hit", data: readLineWord(line.data, offset) };
    }

    const access: AccessType = !this.writable ? "execute" : request.write ? "write" : "read";
    this.pending = { kind: "miss", setIndex, tag, address, access };
    return { status: "stall" };
  }

  clock(): void {
    const action = this.pending;
    this.pending = null;

    if (action && this.phase === "fault") {
      this.phase = "idle";
      this.fault = null;
      this.faultLine = null;
    }

    if (action?.kind === "hit") {
      this.stats.hits += 1;
      this.touch(action.line);
      if (action.write) {
        writeLineWord(action.line.data, action.offset, action.write.data, action.write.byteMask);
        action.line.dirty = true;
      }
    } else if (action?.kind === "miss") {
      this.startMiss(action.setIndex, action.tag, action.address, action.access);
    }

    this.pollMiss();
  }

  /** Installs the line holding `address` straight from backing memory. */
  preload(address: number): void {
    const { setIndex, tag } = this.indexAddress(address >>> 0);
    const set = this.sets[setIndex];
    if (this.findLine(set, tag)) return;

    const way = this.selectVictim(set);
    const victim = set[way];
    if (victim.valid && victim.dirty) {
      this.backdoor.storeLine(this.computeLineBase(victim.tag, setIndex), victim.data);
    }
    const lineAddress = this.computeLineBase(tag, setIndex);
    this.install(victim, tag, this.backdoor.loadLine(lineAddress, this.config.lineSize));
  }

  /** Current cached value of a word, or null when its line is not resident. */
  peekWord(address: number): number | null {
    const { setIndex, tag, offset } = this.indexAddress(address >>> 0);
    const line = this.findLine(this.sets[setIndex], tag);
    return line ? readLineWord(line.data, offset & ~3) : null;
  }

  /** Writes every dirty line to backing memory through the backdoor. */
  writeBackAll(): void {
    this.sets.forEach((set, setIndex) => {
      for (const line of set) {
        if (line.valid && line.dirty) {
          this.backdoor.storeLine(this.computeLineBase(line.tag, setIndex), line.data);
          line.dirty = false;
        }
      }
    });
  }

  /** Drops every line without write-back and abandons any outstanding miss. */
  invalidateAll(): void {
    for (let i = 0; i < this.sets.length; i++) {
      this.sets[i] = this.createEmptySet();
    }
    this.usageCounter = 0;
    this.phase = "idle";
    this.miss = null;
    this.fault = null;
    this.faultLine = null;
    this.pending = null;
  }

  reset(): void {
    this.invalidateAll();
    this.stats = { hits: 0, misses: 0, evictions: 0, writeBacks: 0 };
  }

  private startMiss(setIndex: number, tag: number, requestAddress: number, access: AccessType): void {
    this.stats.misses += 1;
    const set = this.sets[setIndex];
    const way = this.selectVictim(set);
    const victim = set[way];
    const beats = this.config.lineSize / 4;

    let writeBackId: number | null = null;
    if (victim.valid) {
      this.stats.evictions += 1;
      if (victim.dirty) {
        this.stats.writeBacks += 1;
        writeBackId = this.bus.enqueue({
          direction: "write",
          address: this.computeLineBase(victim.tag, setIndex),
          beats,
          data: Array.from({ length: beats }, (_, beat) => readLineWord(victim.data, beat * 4)),
        });
      }
    }
    victim.valid = false;
    victim.dirty = false;

    const lineAddress = this.computeLineBase(tag, setIndex);
    const fillId = this.bus.enqueue({ direction: "read", address: lineAddress, beats });
    this.miss = { setIndex, tag, way, lineAddress, requestAddress, access, writeBackId, fillId, error: null };
    this.phase = "miss";
  }

  private pollMiss(): void {
    const miss = this.miss;
    if (!miss) return;

    if (miss.writeBackId !== null) {
      const result = this.bus.takeResult(miss.writeBackId);
      if (!result) return;
      miss.writeBackId = null;
      if (!result.ok) {
        miss.error = new BusError(miss.requestAddress, miss.access, result.response);
      }
    }

    const fill = this.bus.takeResult(miss.fillId);
    if (!fill) return;

    this.miss = null;
    const error = miss.error ?? (fill.ok ? null : new BusError(miss.requestAddress, miss.access, fill.response));
    if (error) {
      this.fault = error;
      this.faultLine = miss.lineAddress;
      this.phase = "fault";
      return;
    }

    const data = new Uint8Array(this.config.lineSize);
    fill.data.forEach((word, beat) => writeLineWord(data, beat * 4, word, 0xf));
    this.install(this.sets[miss.setIndex][miss.way], miss.tag, data);
    this.phase = "idle";
  }

  private install(line: CacheLine, tag: number, data: Uint8Array): void {
    line.tag = tag;
    line.valid = true;
    line.dirty = false;
    line.data = data;
    this.touch(line);
    line.insertedAt = this.usageCounter;
  }

  private createLine(): CacheLine {
    return {
      tag: 0,
      valid: false,
      dirty: false,
      lastUsed: 0,
      insertedAt: 0,
      data: new Uint8Array(this.config.lineSize),
    };
  }

  private createEmptySet(): CacheLine[] {
    return Array.from({ length: this.config.ways }, () => this.createLine());
  }

  private selectVictim(set: CacheLine[]): number {
    const invalid = set.findIndex((line) => !line.valid);
    if (invalid !== -1) return invalid;

    const stamp = (line: CacheLine): number => (this.config.replacement === "fifo" ? line.insertedAt : line.lastUsed);
    let victim = 0;
    for (let way = 1; way < set.length; way++) {
      if (stamp(set[way]) < stamp(set[victim])) victim = way;
    }
    return victim;
  }

  private computeLineBase(tag: number, setIndex: number): number {
    return ((tag << (this.offsetBits + this.indexBits)) | (setIndex << this.offsetBits)) >>> 0;
  }

  private findLine(set: CacheLine[], tag: number): CacheLine | undefined {
    return set.find((line) => line.valid && line.tag === tag);
  }

  private indexAddress(address: number): { setIndex: number; tag: number; offset: number } {
    const offset = address & (this.config.lineSize - 1);
    const setIndex = (address >>> this.offsetBits) & (this.config.sets - 1);
    const tag = address >>> (this.offsetBits + this.indexBits);
    return { setIndex, tag, offset };
  }

  private touch(line: CacheLine): void {
    this.usageCounter += 1;
    line.lastUsed = this.usageCounter;
  }
}

function readLineWord(data: Uint8Array, offset: number): number {
  return data[offset] | (data[offset + 1] << 8) | (data[offset + 2] << 16) | (data[offset + 3] << 24);
}

function writeLineWord(data: Uint8Array, offset: number, value: number, byteMask: number): void {
  for (let i = 0; i < 4; i++) {
    if ((byteMask >>> i) & 1) {
      data[offset + i] = (value >>> (8 * i)) & 0xff;
    }
  }
}
