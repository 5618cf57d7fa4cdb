import { describe, it, expect } from "vitest";
import { silentLogger } from "../logger";
import { Aggregator } from "../master/aggregator";
import { BoundedChannel } from "../net/channel";
import { globalSnapshot } from "./fixtures";

function aggregator(historyDepth = 3, observerBuffer = 4) {
  return new Aggregator({ historyDepth, observerBuffer, logger: silentLogger });
}

describe("Aggregator", () => {
  it("keeps only the last K snapshots and their series", () => {
    const agg = aggregator(3);
    for (let step = 1; step <= 5; step += 1) {
      agg.merge(globalSnapshot(step, step * 2));
    }

    expect(agg.history().map((snapshot) => snapshot.step)).toEqual([3, 4, 5]);
    expect(agg.series()).toEqual([
      { step: 3, activeVehicles: 6 },
      { step: 4, activeVehicles: 8 },
      { step: 5, activeVehicles: 10 }
    ]);
    expect(agg.latest()?.step).toBe(5);
  });

  it("refuses a step that is not ahead of the latest", () => {
    const agg = aggregator();
    agg.merge(globalSnapshot(2));

    expect(() => agg.merge(globalSnapshot(2))).toThrow("arrived after step 2");
    expect(() => agg.merge(globalSnapshot(1))).toThrow("arrived after step 2");
  });

  it("starts a late subscriber at the latest snapshot, then follows in order", async () => {
    const agg = aggregator();
    agg.merge(globalSnapshot(1));
    agg.merge(globalSnapshot(2));

    const subscription = agg.subscribe();
    agg.merge(globalSnapshot(3));
    agg.merge(globalSnapshot(4));
    agg.close();

    const steps: number[] = [];
    for await (const snapshot of subscription) {
      steps.push(snapshot.step);
    }
    expect(steps).toEqual([2, 3, 4]);
  });

  it("drops the oldest queued snapshots for a slow observer only", async () => {
    const agg = aggregator(10, 2);
    const slow = agg.subscribe();
    const fast = agg.subscribe();
    const fastSteps: number[] = [];
    const consumer = (async () => {
      for await (const snapshot of fast) {
        fastSteps.push(snapshot.step);
      }
    })();

    for (let step = 1; step <= 4; step += 1) {
      agg.merge(globalSnapshot(step));
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
    agg.close();
    await consumer;

    expect(fastSteps).toEqual([1, 2, 3, 4]);
    expect(slow.droppedCount).toBe(2);
    const slowSteps: number[] = [];
    for await (const snapshot of slow) {
      slowSteps.push(snapshot.step);
    }
    expect(slowSteps).toEqual([3, 4]);
  });

  it("forgets an observer that stops iterating", async () => {
    const agg = aggregator();
    const subscription = agg.subscribe();
    expect(agg.observerCount).toBe(1);

    await subscription.return();
    expect(agg.observerCount).toBe(0);
    expect(subscription.isClosed).toBe(true);
  });

  it("ends new subscriptions right away once closed", async () => {
    const agg = aggregator();
    agg.merge(globalSnapshot(7));
    agg.close();

    const subscription = agg.subscribe();
    expect(await subscription.next()).toEqual({ value: agg.latest(), done: false });
    expect(await subscription.next()).toEqual({ value: undefined, done: true });
    expect(() => agg.merge(globalSnapshot(8))).toThrow("closed");
  });
});

describe("BoundedChannel", () => {
  it("hands a pushed item straight to a waiting reader", async () => {
    const channel = new BoundedChannel<number>({ capacity: 1 });
    const pending = channel.next();
    channel.push(5);

    expect(await pending).toEqual({ value: 5, done: false });
    expect(channel.size).toBe(0);
  });

  it("allows a single pending reader", async () => {
    const channel = new BoundedChannel<number>({ capacity: 1 });
    const first = channel.next();

    await expect(channel.next()).rejects.toThrow("single pending reader");
    channel.close();
    expect(await first).toEqual({ value: undefined, done: true });
    expect(channel.push(1)).toBe(false);
  });
});
