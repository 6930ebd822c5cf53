export type ReplacementPolicy = "lru" | "fifo";

export const COUNTER_STATES = ["strongly-not-taken", "weakly-not-taken", "weakly-taken", "strongly-taken"] as const;
export type CounterState = (typeof COUNTER_STATES)[number];

export interface CacheConfig {
  sets: number;
  ways: number;
  /** Bytes per line; a power of two no smaller than one word. */
  lineSize: number;
  replacement?: ReplacementPolicy;
}

export interface PredictorConfig {
  entries: number;
  initialState?: CounterState;
}

export interface BusConfig {
  maxOutstandingReads?: number;
}

export interface AddressRange {
  start: number;
  end: number;
}

export interface BackingMemoryConfig {
  capacity: number;
  readLatency?: number;
  writeLatency?: number;
  queueDepth?: number;
  /** Address ranges (end exclusive) answered with a slave error. */
  faultRanges?: AddressRange[];
}

export interface CoreConfig {
  resetVector: number;
  instructionCache: CacheConfig;
  dataCache: CacheConfig;
  predictor: PredictorConfig;
  bus: BusConfig;
  memory: BackingMemoryConfig;
  checkProtocol: boolean;
  forwardingEnabled: boolean;
}

export interface CoreConfigOverrides {
  resetVector?: number;
  instructionCache?: Partial<CacheConfig>;
  dataCache?: Partial<CacheConfig>;
  predictor?: Partial<PredictorConfig>;
  bus?: Partial<BusConfig>;
  memory?: Partial<BackingMemoryConfig>;
  checkProtocol?: boolean;
  forwardingEnabled?: boolean;
}

export type ResolvedCacheConfig = Required<CacheConfig>;
export type ResolvedBackingMemoryConfig = Required<BackingMemoryConfig>;

export interface ResolvedCoreConfig {
  readonly resetVector: number;
  readonly instructionCache: Readonly<ResolvedCacheConfig>;
  readonly dataCache: Readonly<ResolvedCacheConfig>;
  readonly predictor: Readonly<Required<PredictorConfig>>;
  readonly bus: Readonly<Required<BusConfig>>;
  readonly memory: Readonly<ResolvedBackingMemoryConfig>;
  readonly checkProtocol: boolean;
  readonly forwardingEnabled: boolean;
}

export const DEFAULT_CACHE_CONFIG: ResolvedCacheConfig = {
  sets: 16,
  ways: 2,
  lineSize: 16,
  replacement: "lru",
};

export const DEFAULT_CORE_CONFIG: ResolvedCoreConfig = {
  resetVector: 0,
  instructionCache: DEFAULT_CACHE_CONFIG,
  dataCache: DEFAULT_CACHE_CONFIG,
  predictor: { entries: 64, initialState: "weakly-not-taken" },
  bus: { maxOutstandingReads: 4 },
  memory: { capacity: 0x10000, readLatency: 1, writeLatency: 1, queueDepth: 4, faultRanges: [] },
  checkProtocol: true,
  forwardingEnabled: true,
};

export function isPowerOfTwo(value: number): boolean {
  return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

export function log2(value: number): number {
  return 31 - Math.clz32(value);
}

export function resolveCacheConfig(overrides: Partial<CacheConfig> = {}, label = "cache"): ResolvedCacheConfig {
  const config: ResolvedCacheConfig = {
    sets: overrides.sets ?? DEFAULT_CACHE_CONFIG.sets,
    ways: overrides.ways ?? DEFAULT_CACHE_CONFIG.ways,
    lineSize: overrides.lineSize ?? DEFAULT_CACHE_CONFIG.lineSize,
    replacement: overrides.replacement ?? DEFAULT_CACHE_CONFIG.replacement,
  };

  if (!isPowerOfTwo(config.sets)) {
    throw new RangeError(`${label}: set count must be a power of two (got ${config.sets})`);
  }
  if (!Number.isInteger(config.ways) || config.ways <= 0) {
    throw new RangeError(`${label}: way count must be a positive integer (got ${config.ways})`);
  }
  if (!isPowerOfTwo(config.lineSize) || config.lineSize < 4) {
    throw new RangeError(`${label}: line size must be a power of two of at least 4 bytes (got ${config.lineSize})`);
  }

  return Object.freeze(config);
}

function nonNegativeInteger(value: number, label: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer (got ${value})`);
  }
  return value;
}

export function resolveBackingMemoryConfig(overrides: Partial<BackingMemoryConfig> = {}): ResolvedBackingMemoryConfig {
  const defaults = DEFAULT_CORE_CONFIG.memory;
  const config: ResolvedBackingMemoryConfig = {
    capacity: overrides.capacity ?? defaults.capacity,
    readLatency: overrides.readLatency ?? defaults.readLatency,
    writeLatency: overrides.writeLatency ?? defaults.writeLatency,
    queueDepth: overrides.queueDepth ?? defaults.queueDepth,
    faultRanges: (overrides.faultRanges ?? defaults.faultRanges).map((range) => ({ ...range })),
  };

  if (!Number.isInteger(config.capacity) || config.capacity <= 0 || config.capacity % 4 !== 0) {
    throw new RangeError(`memory: capacity must be a positive multiple of 4 bytes (got ${config.capacity})`);
  }
  if (nonNegativeInteger(config.readLatency, "memory: read latency") < 1) {
    throw new RangeError("memory: read latency must be at least one cycle");
  }
  if (nonNegativeInteger(config.writeLatency, "memory: write latency") < 1) {
    throw new RangeError("memory: write latency must be at least one cycle");
  }
  if (nonNegativeInteger(config.queueDepth, "memory: queue depth") < 1) {
    throw new RangeError("memory: queue depth must be at least one");
  }

  return Object.freeze(config);
}

export function resolveCoreConfig(overrides: CoreConfigOverrides = {}): ResolvedCoreConfig {
  const resetVector = (overrides.resetVector ?? DEFAULT_CORE_CONFIG.resetVector) >>> 0;
  if (resetVector % 4 !== 0) {
    throw new RangeError(`Reset vector must be word aligned (got 0x${resetVector.toString(16)})`);
  }

  const predictor = {
    entries: overrides.predictor?.entries ?? DEFAULT_CORE_CONFIG.predictor.entries,
    initialState: overrides.predictor?.initialState ?? DEFAULT_CORE_CONFIG.predictor.initialState,
  };
  if (!isPowerOfTwo(predictor.entries)) {
    throw new RangeError(`predictor: entry count must be a power of two (got ${predictor.entries})`);
  }

  const bus = {
    maxOutstandingReads: overrides.bus?.maxOutstandingReads ?? DEFAULT_CORE_CONFIG.bus.maxOutstandingReads,
  };
  if (!Number.isInteger(bus.maxOutstandingReads) || bus.maxOutstandingReads < 1) {
    throw new RangeError(`bus: outstanding read limit must be at least one (got ${bus.maxOutstandingReads})`);
  }

  return Object.freeze({
    resetVector,
    instructionCache: resolveCacheConfig(overrides.instructionCache, "instruction cache"),
    dataCache: resolveCacheConfig(overrides.dataCache, "data cache"),
    predictor: Object.freeze(predictor),
    bus: Object.freeze(bus),
    memory: resolveBackingMemoryConfig(overrides.memory),
    checkProtocol: overrides.checkProtocol ?? DEFAULT_CORE_CONFIG.checkProtocol,
    forwardingEnabled: overrides.forwardingEnabled ?? DEFAULT_CORE_CONFIG.forwardingEnabled,
  });
}
