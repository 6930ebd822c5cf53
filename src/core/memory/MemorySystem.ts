import { BusAdapter } from "../bus/BusAdapter";
import { BusMonitor } from "../bus/BusMonitor";
import { createBusChannels, endBusCycle, resetBusChannels, sampleTransfers, type BusChannels } from "../bus/Handshake";
import { MemorySlave, type ReadyPolicy } from "../bus/MemorySlave";
import { resolveCoreConfig, type ResolvedCoreConfig } from "../config/CoreConfig";
import { BusProtocolError } from "../exceptions/AccessExceptions";
import { CacheController, type CacheBackdoor } from "./Caches";

export interface MemorySystemOptions {
  config?: ResolvedCoreConfig;
  readyPolicy?: ReadyPolicy;
}

/**
 * The memory side of the core: both L1 caches sharing one bus adapter in front
 * of the backing memory. One call to {@link clock} is one clock edge.
 */
export class MemorySystem {
  readonly channels: BusChannels;
  readonly adapter: BusAdapter;
  readonly slave: MemorySlave;
  readonly monitor: BusMonitor;
  readonly instructionCache: CacheController;
  readonly dataCache: CacheController;
  private readonly checkProtocol: boolean;
  private cycle = 0;

  constructor(options: MemorySystemOptions = {}) {
    const config = options.config ?? resolveCoreConfig();
    this.checkProtocol = config.checkProtocol;
    this.channels = createBusChannels();
    this.adapter = new BusAdapter(this.channels, { maxOutstandingReads: config.bus.maxOutstandingReads });
    this.slave = new MemorySlave(this.channels, { ...config.memory, readyPolicy: options.readyPolicy });
    this.monitor = new BusMonitor();

    const backdoor: CacheBackdoor = {
      loadLine: (address, size) => {
        const data = new Uint8Array(size);
        for (let i = 0; i < size; i++) {
          data[i] = this.slave.readByte(address + i);
        }
        return data;
      },
      storeLine: (address, data) => {
        data.forEach((value, i) => this.slave.writeByte(address + i, value));
      },
    };

    this.instructionCache = new CacheController({
      name: "instruction cache",
      config: config.instructionCache,
      bus: this.adapter,
      backdoor,
      writable: false,
    });
    this.dataCache = new CacheController({
      name: "data cache",
      config: config.dataCache,
      bus: this.adapter,
      backdoor,
    });
  }

  getCycle(): number {
    return this.cycle;
  }

  clock(): void {
    const cycle = this.cycle;

    this.adapter.drive();
    this.slave.drive(cycle);

    const violations = this.monitor.observe(cycle, this.channels);
    if (this.checkProtocol && violations.length > 0) {
      const [first] = violations;
      throw new BusProtocolError(first.channel, first.cycle, first.message);
    }

    const transfers = sampleTransfers(this.channels);
    this.slave.clock(cycle, transfers);
    this.adapter.clock(transfers);
    endBusCycle(this.channels);

    // The data cache enqueues first when both miss on the same edge.
    this.dataCache.clock();
    this.instructionCache.clock();

    this.cycle += 1;
  }

  isIdle(): boolean {
    return this.adapter.isIdle() && this.slave.isIdle();
  }

  /** Reads a word as the program sees it: a resident data-cache line wins. */
  debugReadWord(address: number): number {
    return this.dataCache.peekWord(address) ?? this.slave.readWord(address);
  }

  /** Abandons every queued and in-flight bus transaction without touching cache contents. */
  cancelTransfers(): void {
    this.adapter.reset();
    this.slave.reset();
    this.monitor.reset();
    resetBusChannels(this.channels);
  }

  /** Makes caches cold and the bus idle. Backing memory is retained. */
  reset(): void {
    this.instructionCache.reset();
    this.dataCache.reset();
    this.cancelTransfers();
    this.cycle = 0;
  }
}
