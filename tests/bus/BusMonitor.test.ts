import assert from "node:assert";
import { describe, test } from "node:test";

import { BusMonitor } from "../../src/core/bus/BusMonitor";
import { createBusChannels, endBusCycle } from "../../src/core/bus/Handshake";

describe("BusMonitor", () => {
  test("reports valid dropped before the beat was accepted", () => {
    const channels = createBusChannels();
    const monitor = new BusMonitor();

    channels.ar.offer({ address: 0 });
    assert.deepStrictEqual(monitor.observe(0, channels), []);
    endBusCycle(channels);

    channels.ar.withdraw();
    assert.deepStrictEqual(monitor.observe(1, channels), [
      { cycle: 1, channel: "ar", message: "valid dropped before ready" },
    ]);
  });

  test("reports a payload change while waiting", () => {
    const channels = createBusChannels();
    const monitor = new BusMonitor();

    channels.w.offer({ data: 1, strobe: 0xf });
    monitor.observe(0, channels);
    endBusCycle(channels);

    channels.w.offer({ data: 2, strobe: 0xf });
    const [violation] = monitor.observe(1, channels);
    assert.strictEqual(violation.message, "payload changed while waiting for ready");
    assert.strictEqual(monitor.getViolations().length, 1);
  });

  test("records accepted beats", () => {
    const channels = createBusChannels();
    const monitor = new BusMonitor({ historyLimit: 1 });

    channels.ar.offer({ address: 4 });
    channels.ar.setReady(true);
    monitor.observe(0, channels);
    endBusCycle(channels);

    channels.ar.offer({ address: 8 });
    channels.ar.setReady(true);
    monitor.observe(1, channels);

    assert.strictEqual(monitor.getTransferCounts().ar, 2);
    assert.deepStrictEqual(monitor.getHistory(), [{ cycle: 1, channel: "ar", payload: '{"address":8}' }]);
    assert.deepStrictEqual(monitor.getViolations(), []);
  });
});
