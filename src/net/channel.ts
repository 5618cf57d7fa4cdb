export interface ChannelOptions {
  capacity: number;
  onDrop?: (dropped: number) => void;
  onClose?: () => void;
}

/**
 * Single-consumer queue with a fixed capacity. When full, the oldest queued
 * item is discarded so a slow consumer never blocks the producer.
 */
export class BoundedChannel<T> implements AsyncIterableIterator<T> {
  private capacity: number;
  private onDrop?: (dropped: number) => void;
  private onClose?: () => void;
  private buffer: T[];
  private waiting: ((result: IteratorResult<T>) => void) | null;
  private closed: boolean;
  private dropped: number;

  constructor(options: ChannelOptions) {
    this.capacity = Math.max(1, Math.floor(options.capacity));
    this.onDrop = options.onDrop;
    this.onClose = options.onClose;
    this.buffer = [];
    this.waiting = null;
    this.closed = false;
    this.dropped = 0;
  }

  get size(): number {
    return this.buffer.length;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: item, done: false });
      return true;
    }
    this.buffer.push(item);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
      this.dropped += 1;
      this.onDrop?.(this.dropped);
    }
    return true;
  }

  /** Ends the channel; items already queued are still delivered. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
    this.onClose?.();
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiting) {
      return Promise.reject(new Error("BoundedChannel supports a single pending reader."));
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  return(): Promise<IteratorResult<T>> {
    this.buffer = [];
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
