import { describe, it, expect } from "vitest";
import { WakeSignal } from "../../src/session.js";
import { WakeWaiter, WAIT_HTTP } from "../../src/waiter.js";

describe("WakeWaiter", () => {
  it("should return immediately when a source is already signalled", async () => {
    const waiter = new WakeWaiter();
    const signal = new WakeSignal();
    waiter.addWakeSource(signal, WAIT_HTTP);

    signal.signal();
    expect(await waiter.wait(60_000)).toBe(WAIT_HTTP);
    expect(signal.isSet).toBe(false);
  });

  it("should resolve 0 when the timeout passes", async () => {
    const waiter = new WakeWaiter();
    waiter.addWakeSource(new WakeSignal(), WAIT_HTTP);
    expect(await waiter.wait(5)).toBe(0);
  });

  it("should wake when a source is signalled during the wait", async () => {
    const waiter = new WakeWaiter();
    const http = new WakeSignal();
    const other = new WakeSignal();
    waiter.addWakeSource(http, WAIT_HTTP);
    waiter.addWakeSource(other, 2);

    const pending = waiter.wait(60_000);
    setTimeout(() => other.signal(), 1);

    expect(await pending).toBe(2);
  });

  it("should record connectivity reports", () => {
    const waiter = new WakeWaiter();
    expect(waiter.reachable).toBeNull();
    waiter.notifyConnectivity(false);
    expect(waiter.reachable).toBe(false);
    waiter.notifyConnectivity(true);
    expect(waiter.reachable).toBe(true);
  });
});
