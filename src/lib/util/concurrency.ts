import { CancelledError } from "../../shared/errors";

/**
 * Resolves after `ms` milliseconds. When a signal is given and fires first,
 * rejects with a `CancelledError`.
 */
export const delay = (ms: number, signal?: AbortSignal): Promise<void> => {
  if (!signal) {
    return new Promise((resolve) => globalThis.setTimeout(resolve, ms));
  }

  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new CancelledError("Run was cancelled"));
      return;
    }

    const onAbort = () => {
      globalThis.clearTimeout(timer);
      reject(new CancelledError("Run was cancelled"));
    };
    const timer = globalThis.setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal.addEventListener("abort", onAbort, { once: true });
  });
};

/**
 * Simple promise-based concurrency limiter.
 *
 * @example
 * ```ts
 * const limiter = new ConcurrencyLimiter(2);
 * await Promise.all(ids.map((id) => limiter.run(() => exportDoc(id))));
 * ```
 */
export class ConcurrencyLimiter {
  /**
   * The number of operations currently running.
   */
  private running = 0;

  /**
   * Operations waiting for a free slot.
   */
  private queue: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    while (this.running >= this.maxConcurrent) {
      await new Promise<void>((resolve) => this.queue.push(resolve));
    }

    this.running++;

    try {
      return await fn();
    } finally {
      this.running--;
      const next = this.queue.shift();
      if (next) next();
    }
  }

  getStats(): { running: number; queued: number } {
    return {
      running: this.running,
      queued: this.queue.length
    };
  }
}
