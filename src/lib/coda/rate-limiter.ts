import { delay } from "../util/concurrency";

export type RateLimiterConfig = {
  /**
   * Minimum milliseconds between two request starts.
   */
  minInterval: number;
};

export type RateLimiterStats = {
  requests: number;
  pauses: number;
  waitedMs: number;
  pausedUntil: Date | null;
};

/**
 * Run-scoped rate limiter shared by every request of an export.
 *
 * Requests reserve start slots at least `minInterval` apart. When any request
 * is throttled, `pause()` pushes a global window during which no request
 * starts, so concurrent docs back off together instead of amplifying the 429s.
 */
export class RateLimiter {
  private nextSlot = 0;
  private pausedUntil = 0;

  private requests = 0;
  private pauses = 0;
  private waitedMs = 0;

  constructor(private readonly config: RateLimiterConfig = { minInterval: 100 }) {}

  /**
   * Wait for a start slot before issuing a request.
   */
  async waitForSlot(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const now = Date.now();
      const start = Math.max(now, this.nextSlot, this.pausedUntil);
      this.nextSlot = start + this.config.minInterval;

      if (start > now) {
        this.waitedMs += start - now;
        await delay(start - now, signal);
      }

      // Another request may have been throttled while we slept.
      if (Date.now() >= this.pausedUntil) {
        break;
      }
    }

    this.requests++;
  }

  /**
   * Hold back every request for at least `ms` milliseconds.
   */
  pause(ms: number): void {
    const until = Date.now() + Math.max(0, ms);
    if (until > this.pausedUntil) {
      this.pausedUntil = until;
    }
    this.pauses++;
  }

  getStats(): RateLimiterStats {
    return {
      requests: this.requests,
      pauses: this.pauses,
      waitedMs: this.waitedMs,
      pausedUntil: this.pausedUntil > Date.now() ? new Date(this.pausedUntil) : null
    };
  }
}
