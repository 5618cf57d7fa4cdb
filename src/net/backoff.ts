export interface BackoffOptions {
  baseMs: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
}

const DEFAULT_MAX_MS = 30_000;
const DEFAULT_JITTER_RATIO = 0.3;

export function computeBackoffMs(attempt: number, options: BackoffOptions): number {
  const base = options.baseMs * 2 ** Math.max(0, attempt);
  const jitter = options.baseMs * (options.jitterRatio ?? DEFAULT_JITTER_RATIO) * (options.random ?? Math.random)();
  return Math.min(options.maxMs ?? DEFAULT_MAX_MS, base + jitter);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
