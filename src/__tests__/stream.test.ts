import { EventEmitter } from "node:events";
import { describe, it, expect, vi } from "vitest";
import { silentLogger } from "../logger";
import { Aggregator } from "../master/aggregator";
import { streamSnapshots } from "../master/server";
import { globalSnapshot } from "./fixtures";

class FakeRequest extends EventEmitter {}

class FakeResponse extends EventEmitter {
  status = 0;
  chunks: string[] = [];
  ended = false;
  writable = true;

  writeHead(status: number): this {
    this.status = status;
    return this;
  }

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return this.writable;
  }

  end(chunk: string): this {
    this.chunks.push(chunk);
    this.ended = true;
    return this;
  }
}

interface SseEvent {
  event: string;
  data: unknown;
}

function events(res: FakeResponse): SseEvent[] {
  return res.chunks
    .filter((chunk) => chunk.startsWith("event: "))
    .map((chunk) => {
      const [eventLine, dataLine] = chunk.trim().split("\n");
      return { event: eventLine.slice("event: ".length), data: JSON.parse(dataLine.slice("data: ".length)) };
    });
}

function snapshotSteps(res: FakeResponse): unknown[] {
  return events(res)
    .filter((entry) => entry.event === "snapshot")
    .map((entry) => (entry.data && typeof entry.data === "object" ? Reflect.get(entry.data, "step") : undefined));
}

function setup() {
  const aggregator = new Aggregator({ historyDepth: 5, observerBuffer: 8, logger: silentLogger });
  const req = new FakeRequest();
  const res = new FakeResponse();
  return { aggregator, req, res };
}

describe("streamSnapshots", () => {
  it("opens with the latest snapshot and history, then sends each later step once", async () => {
    const { aggregator, req, res } = setup();
    aggregator.merge(globalSnapshot(1, 2));

    const done = streamSnapshots(req, res, aggregator, silentLogger);
    expect(res.status).toBe(200);
    expect(res.chunks[0]).toBe("retry: 3000\n\n");
    expect(events(res)).toEqual([
      {
        event: "initial",
        data: { snapshot: JSON.parse(JSON.stringify(globalSnapshot(1, 2))), series: [{ step: 1, activeVehicles: 2 }] }
      }
    ]);
    expect(aggregator.observerCount).toBe(1);

    aggregator.merge(globalSnapshot(2));
    aggregator.merge(globalSnapshot(3));
    await vi.waitFor(() => expect(snapshotSteps(res)).toEqual([2, 3]));

    req.emit("close");
    await done;
    expect(aggregator.observerCount).toBe(0);
    expect(res.ended).toBe(false);
  });

  it("sends a null initial snapshot before the first step settles", async () => {
    const { aggregator, req, res } = setup();

    const done = streamSnapshots(req, res, aggregator, silentLogger);
    expect(events(res)).toEqual([{ event: "initial", data: { snapshot: null, series: [] } }]);

    aggregator.merge(globalSnapshot(1));
    await vi.waitFor(() => expect(snapshotSteps(res)).toEqual([1]));
    req.emit("close");
    await done;
  });

  it("holds further snapshots until the response drains", async () => {
    const { aggregator, req, res } = setup();
    const done = streamSnapshots(req, res, aggregator, silentLogger);

    res.writable = false;
    aggregator.merge(globalSnapshot(1));
    await vi.waitFor(() => expect(snapshotSteps(res)).toEqual([1]));
    aggregator.merge(globalSnapshot(2));
    await new Promise((resolve) => setImmediate(resolve));
    expect(snapshotSteps(res)).toEqual([1]);

    res.writable = true;
    res.emit("drain");
    await vi.waitFor(() => expect(snapshotSteps(res)).toEqual([1, 2]));
    req.emit("close");
    await done;
  });

  it("ends the stream with the last step when the aggregator closes", async () => {
    const { aggregator, req, res } = setup();
    const done = streamSnapshots(req, res, aggregator, silentLogger);

    aggregator.merge(globalSnapshot(1));
    aggregator.merge(globalSnapshot(2));
    aggregator.close();
    await done;

    expect(snapshotSteps(res)).toEqual([1, 2]);
    expect(res.ended).toBe(true);
    expect(events(res).at(-1)).toEqual({ event: "end", data: { lastStep: 2 } });
  });
});
