import { createServer, type Server } from "node:http";
import { describeError } from "../errors";
import type { Logger } from "../logger";
import { readJsonBody, requestPath, sendJson } from "../net/http";
import type { GlobalSnapshot } from "../protocol/types";
import type { Aggregator } from "./aggregator";
import type { MasterApi } from "./api";

const HEARTBEAT_MS = 15_000;
const RECONNECT_HINT_MS = 3000;

export function createMasterServer(api: MasterApi, aggregator: Aggregator, logger: Logger): Server {
  return createServer((req, res) => {
    const path = requestPath(req);
    if (req.method === "GET" && path === "/stream") {
      streamSnapshots(req, res, aggregator, logger).catch((error: unknown) => {
        logger.debug(`observer stream ended: ${describeError(error)}`);
      });
      return;
    }
    api
      .handle(req.method ?? "GET", path, () => readJsonBody(req))
      .then((response) => sendJson(res, response))
      .catch((error: unknown) => {
        logger.error(`request ${req.method} ${path} failed:`, error);
        if (!res.headersSent) {
          sendJson(res, { status: 500, body: { error: describeError(error) } });
        }
      });
  });
}

/** The parts of the request and response a stream touches. */
export interface StreamRequest {
  on(event: "close", listener: () => void): unknown;
}

export interface StreamResponse {
  writeHead(status: number, headers: Record<string, string>): unknown;
  write(chunk: string): boolean;
  end(chunk: string): unknown;
  once(event: "drain" | "close", listener: () => void): unknown;
  off(event: "drain" | "close", listener: () => void): unknown;
}

export function formatSseEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Server-Sent Events feed: one `initial` event with the latest snapshot and the
 * history series, then one `snapshot` event per settled step. A client that
 * cannot keep up loses the oldest queued snapshots, never the order.
 */
export async function streamSnapshots(
  req: StreamRequest,
  res: StreamResponse,
  aggregator: Aggregator,
  logger: Logger
): Promise<void> {
  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive"
  });
  res.write(`retry: ${RECONNECT_HINT_MS}\n\n`);

  const subscription = aggregator.subscribe();
  let open = true;
  const heartbeat = setInterval(() => {
    res.write(": heartbeat\n\n");
  }, HEARTBEAT_MS);
  req.on("close", () => {
    open = false;
    clearInterval(heartbeat);
    subscription.close();
  });
  logger.debug(`observer connected (${aggregator.observerCount} total)`);

  let lastStep = 0;
  const initial: GlobalSnapshot | undefined = aggregator.latest();
  res.write(formatSseEvent("initial", { snapshot: initial ?? null, series: aggregator.series() }));
  if (initial) {
    lastStep = initial.step;
  }

  try {
    for await (const snapshot of subscription) {
      if (!open) {
        break;
      }
      if (snapshot.step <= lastStep) {
        continue;
      }
      lastStep = snapshot.step;
      if (!res.write(formatSseEvent("snapshot", snapshot))) {
        await waitForDrain(res);
      }
    }
  } finally {
    clearInterval(heartbeat);
    if (open) {
      res.end(formatSseEvent("end", { lastStep }));
    }
  }
}

function waitForDrain(res: StreamResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.once("drain", done);
    res.once("close", done);
  });
}
