import { BUS_CHANNEL_NAMES, type BusChannelName, type BusChannels } from "./Handshake";

export interface BusViolation {
  cycle: number;
  channel: BusChannelName;
  message: string;
}

export interface BusTransferRecord {
  cycle: number;
  channel: BusChannelName;
  payload: string;
}

interface ChannelSample {
  valid: boolean;
  fired: boolean;
  payload: string;
}

const IDLE_SAMPLE: ChannelSample = { valid: false, fired: false, payload: "" };

export interface BusMonitorOptions {
  /** Number of recent transfers kept for inspection. */
  historyLimit?: number;
}

/**
 * Passive checker sampling every channel once per cycle. A producer that
 * lowers valid, or changes the payload, before its beat was accepted is
 * reported as a violation.
 */
export class BusMonitor {
  private readonly historyLimit: number;
  private readonly previous = new Map<BusChannelName, ChannelSample>();
  private readonly violations: BusViolation[] = [];
  private readonly history: BusTransferRecord[] = [];
  private readonly counts: Record<BusChannelName, number> = { aw: 0, w: 0, b: 0, ar: 0, r: 0 };

  constructor(options: BusMonitorOptions = {}) {
    this.historyLimit = options.historyLimit ?? 256;
  }

  /** Returns the violations found in this cycle. */
  observe(cycle: number, channels: BusChannels): BusViolation[] {
    const found: BusViolation[] = [];

    for (const name of BUS_CHANNEL_NAMES) {
      const channel = channels[name];
      const sample: ChannelSample = {
        valid: channel.valid,
        fired: channel.fired(),
        payload: channel.payload === null ? "" : JSON.stringify(channel.payload),
      };
      const before = this.previous.get(name) ?? IDLE_SAMPLE;

      if (before.valid && !before.fired) {
        if (!sample.valid) {
          found.push({ cycle, channel: name, message: "valid dropped before ready" });
        } else if (sample.payload !== before.payload) {
          found.push({ cycle, channel: name, message: "payload changed while waiting for ready" });
        }
      }

      if (sample.fired) {
        this.counts[name] += 1;
        this.history.push({ cycle, channel: name, payload: sample.payload });
        if (this.history.length > this.historyLimit) {
          this.history.shift();
        }
      }

      this.previous.set(name, sample);
    }

    this.violations.push(...found);
    return found;
  }

  getViolations(): BusViolation[] {
    return [...this.violations];
  }

  getHistory(): BusTransferRecord[] {
    return [...this.history];
  }

  getTransferCounts(): Record<BusChannelName, number> {
    return { ...this.counts };
  }

  reset(): void {
    this.previous.clear();
    this.violations.length = 0;
    this.history.length = 0;
    for (const name of BUS_CHANNEL_NAMES) {
      this.counts[name] = 0;
    }
  }
}
