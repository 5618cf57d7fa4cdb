import { createLogger, type Logger } from "../logger";
import { BoundedChannel } from "../net/channel";
import type { GlobalSnapshot, HistoryPoint } from "../protocol/types";

export interface AggregatorOptions {
  historyDepth: number;
  observerBuffer: number;
  logger?: Logger;
}

/**
 * Keeps the last K global snapshots and fans each merged snapshot out to every
 * observer through its own drop-oldest channel.
 */
export class Aggregator {
  private historyDepth: number;
  private observerBuffer: number;
  private logger: Logger;
  private snapshots: GlobalSnapshot[];
  private observers: Set<BoundedChannel<GlobalSnapshot>>;
  private closed: boolean;

  constructor(options: AggregatorOptions) {
    this.historyDepth = Math.max(1, Math.floor(options.historyDepth));
    this.observerBuffer = Math.max(1, Math.floor(options.observerBuffer));
    this.logger = options.logger ?? createLogger("aggregator");
    this.snapshots = [];
    this.observers = new Set();
    this.closed = false;
  }

  get observerCount(): number {
    return this.observers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  merge(snapshot: GlobalSnapshot): void {
    if (this.closed) {
      throw new Error("Aggregator is closed.");
    }
    const latest = this.latest();
    if (latest && snapshot.step <= latest.step) {
      throw new Error(`Snapshot for step ${snapshot.step} arrived after step ${latest.step}.`);
    }
    this.snapshots.push(snapshot);
    if (this.snapshots.length > this.historyDepth) {
      this.snapshots.splice(0, this.snapshots.length - this.historyDepth);
    }
    for (const observer of this.observers) {
      observer.push(snapshot);
    }
  }

  /**
   * Live, ordered sequence: the most recent snapshot first (when there is one),
   * then every later one. Ends when the aggregator closes or the consumer
   * stops iterating.
   */
  subscribe(): BoundedChannel<GlobalSnapshot> {
    const channel: BoundedChannel<GlobalSnapshot> = new BoundedChannel<GlobalSnapshot>({
      capacity: this.observerBuffer,
      onDrop: (dropped) => this.logger.debug(`observer fell behind, ${dropped} snapshot(s) dropped`),
      onClose: () => {
        this.observers.delete(channel);
      }
    });
    const latest = this.latest();
    if (latest) {
      channel.push(latest);
    }
    if (this.closed) {
      channel.close();
    } else {
      this.observers.add(channel);
    }
    return channel;
  }

  latest(): GlobalSnapshot | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }

  history(): GlobalSnapshot[] {
    return [...this.snapshots];
  }

  series(): HistoryPoint[] {
    return this.snapshots.map((snapshot) => ({
      step: snapshot.step,
      activeVehicles: snapshot.totals.activeVehicles
    }));
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const observer of [...this.observers]) {
      observer.close();
    }
    this.observers.clear();
  }
}
