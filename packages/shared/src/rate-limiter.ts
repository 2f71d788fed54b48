/**
 * @calsync/shared -- Shared minimum-interval gate for gateway calls.
 *
 * One instance is shared by every call site (sync, archive import,
 * recovery). acquire() resolves once at least `minIntervalMs` has elapsed
 * since the previous grant. The grant slot is reserved synchronously
 * before the caller suspends, so concurrent callers queue up one interval
 * apart instead of racing on the same "last call" timestamp.
 */

import { DEFAULT_MIN_INTERVAL_MS } from "./constants";
import { sleep, type SleepFn } from "./retry";

export interface RateLimiterOptions {
  minIntervalMs?: number;
  now?: () => number;
  sleepFn?: SleepFn;
}

export class SyncRateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleepFn: SleepFn;
  private lastGrantAt: number | null = null;

  constructor(options: RateLimiterOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  /**
   * Wait for the next free slot.
   *
   * @returns How long the caller was held back, in milliseconds.
   */
  async acquire(): Promise<number> {
    const now = this.now();
    const grantAt =
      this.lastGrantAt === null
        ? now
        : Math.max(now, this.lastGrantAt + this.minIntervalMs);
    this.lastGrantAt = grantAt;

    const waitMs = grantAt - now;
    if (waitMs > 0) {
      await this.sleepFn(waitMs);
    }
    return waitMs;
  }

  /** Forget the last grant. The next acquire() is immediate. */
  reset(): void {
    this.lastGrantAt = null;
  }
}
