import assert from "node:assert";
import { describe, test } from "node:test";

import { BusAdapter, type BusAdapterOptions } from "../../src/core/bus/BusAdapter";
import { BusMonitor } from "../../src/core/bus/BusMonitor";
import { BusResponse, createBusChannels, endBusCycle, sampleTransfers } from "../../src/core/bus/Handshake";
import { MemorySlave, type MemorySlaveOptions } from "../../src/core/bus/MemorySlave";

function createBus(adapterOptions: BusAdapterOptions = {}, slaveOptions: MemorySlaveOptions = {}) {
  const channels = createBusChannels();
  const adapter = new BusAdapter(channels, adapterOptions);
  const slave = new MemorySlave(channels, slaveOptions);
  const monitor = new BusMonitor();
  let cycle = 0;

  const clock = (count = 1): void => {
    for (let i = 0; i < count; i++) {
      adapter.drive();
      slave.drive(cycle);
      monitor.observe(cycle, channels);
      const transfers = sampleTransfers(channels);
      slave.clock(cycle, transfers);
      adapter.clock(transfers);
      endBusCycle(channels);
      cycle += 1;
    }
  };

  return { adapter, slave, monitor, clock };
}

describe("BusAdapter", () => {
  test("completes a two-beat write after its responses arrive", () => {
    const { adapter, slave, clock } = createBus();
    const id = adapter.enqueue({ direction: "write", address: 0x10, beats: 2, data: [1, 2] });

    clock(2);
    assert.strictEqual(adapter.takeResult(id), null);
    clock();

    const result = adapter.takeResult(id);
    assert.ok(result);
    assert.strictEqual(result.ok, true);
    assert.strictEqual(result.response, BusResponse.OKAY);
    assert.strictEqual(slave.readWord(0x10), 1);
    assert.strictEqual(slave.readWord(0x14), 2);
    assert.strictEqual(adapter.takeResult(id), null);
  });

  test("serves queued transactions in order", () => {
    const { adapter, clock, monitor } = createBus();
    const writeId = adapter.enqueue({ direction: "write", address: 0x20, beats: 1, data: [0xcafe] });
    const readId = adapter.enqueue({ direction: "read", address: 0x20, beats: 2 });
    assert.strictEqual(adapter.pendingTransactions(), 2);

    clock(10);

    assert.ok(adapter.takeResult(writeId));
    const read = adapter.takeResult(readId);
    assert.ok(read);
    assert.deepStrictEqual(read.data, [0xcafe, 0]);
    assert.strictEqual(adapter.isIdle(), true);
    assert.deepStrictEqual(monitor.getTransferCounts(), { aw: 1, w: 1, b: 1, ar: 2, r: 2 });
  });

  test("limits read addresses running ahead of their data", () => {
    const limited = createBus({ maxOutstandingReads: 1 });
    const limitedId = limited.adapter.enqueue({ direction: "read", address: 0, beats: 2 });
    limited.clock(3);
    assert.strictEqual(limited.adapter.takeResult(limitedId), null);
    limited.clock();
    assert.ok(limited.adapter.takeResult(limitedId));

    const pipelined = createBus();
    const pipelinedId = pipelined.adapter.enqueue({ direction: "read", address: 0, beats: 2 });
    pipelined.clock(3);
    assert.ok(pipelined.adapter.takeResult(pipelinedId));
  });

  test("keeps the first error response of a transaction", () => {
    const { adapter, slave, clock } = createBus({}, { capacity: 0x100 });
    slave.writeWord(0xfc, 0x55);
    const id = adapter.enqueue({ direction: "read", address: 0xfc, beats: 2 });

    clock(5);

    const result = adapter.takeResult(id);
    assert.ok(result);
    assert.strictEqual(result.ok, false);
    assert.strictEqual(result.response, BusResponse.DECERR);
    assert.deepStrictEqual(result.data, [0x55, 0]);
  });

  test("holds valid steady while the slave applies back-pressure", () => {
    const { adapter, slave, monitor, clock } = createBus(
      {},
      { readyPolicy: (_channel, cycle) => cycle % 3 === 2 },
    );
    slave.writeWord(0x40, 7);
    const id = adapter.enqueue({ direction: "read", address: 0x40, beats: 1 });

    clock(2);
    assert.strictEqual(adapter.takeResult(id), null);
    clock(2);

    const result = adapter.takeResult(id);
    assert.ok(result);
    assert.deepStrictEqual(result.data, [7]);
    assert.deepStrictEqual(monitor.getViolations(), []);
  });

  test("rejects malformed requests", () => {
    const { adapter } = createBus();
    assert.throws(() => adapter.enqueue({ direction: "read", address: 0, beats: 0 }), RangeError);
    assert.throws(() => adapter.enqueue({ direction: "read", address: 2, beats: 1 }), RangeError);
    assert.throws(() => adapter.enqueue({ direction: "write", address: 0, beats: 2, data: [1] }), RangeError);
    assert.throws(() => new BusAdapter(createBusChannels(), { maxOutstandingReads: 0 }), RangeError);
  });
});
