/**
 * @calsync/shared -- Exponential backoff with jitter.
 *
 * delay(a) = min(maxWait, base * 2^a + jitter), jitter = U(0, 0.5) * base * 2^a,
 * with the attempt counter `a` starting at 0 for the first retry. Only
 * rate limiting (429, or 403 with a rate-limit reason) is retried; every
 * other error is surfaced immediately. When retries run out, the error of
 * the last attempt is rethrown as-is with its retryStats filled in.
 */

import {
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BACKOFF_MAX_WAIT_MS,
  DEFAULT_MAX_RETRIES,
} from "./constants";
import { GoogleApiError, RateLimitError } from "./errors";
import type { RetryStats } from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Injectable sleep, replaced by a recorder in tests. */
export type SleepFn = (ms: number) => Promise<void>;

export interface BackoffOptions {
  baseMs?: number;
  maxWaitMs?: number;
  /** Uniform [0, 1) source for the jitter. Defaults to Math.random. */
  random?: () => number;
}

/** Options for retryWithBackoff. */
export interface RetryOptions extends BackoffOptions {
  maxRetries?: number;
  /** Injectable sleep function for testing. Defaults to real setTimeout. */
  sleepFn?: SleepFn;
  /** Which errors are retried. Defaults to rate limiting only. */
  isRetryable?: (err: unknown) => boolean;
}

export interface RetryResult<T> extends RetryStats {
  readonly value: T;
}

// ---------------------------------------------------------------------------
// Backoff
// ---------------------------------------------------------------------------

/** Delay before retry number `attempt` (0-based). */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions = {},
): number {
  const {
    baseMs = DEFAULT_BACKOFF_BASE_MS,
    maxWaitMs = DEFAULT_BACKOFF_MAX_WAIT_MS,
    random = Math.random,
  } = options;

  const exponential = baseMs * Math.pow(2, attempt);
  const jitter = random() * 0.5 * exponential;
  return Math.min(maxWaitMs, exponential + jitter);
}

/** True for errors the gateway retries on its own. */
export function isRateLimited(err: unknown): boolean {
  return err instanceof RateLimitError;
}

/**
 * Run `fn`, retrying retryable errors with exponential backoff.
 *
 * Resolves with the value plus how many retries were needed and how long
 * was spent sleeping between them.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const {
    maxRetries = DEFAULT_MAX_RETRIES,
    sleepFn = sleep,
    isRetryable = isRateLimited,
  } = options;

  let retryCount = 0;
  let totalWaitMs = 0;

  while (true) {
    try {
      const value = await fn();
      return { value, retryCount, totalWaitMs };
    } catch (err) {
      if (!isRetryable(err) || retryCount >= maxRetries) {
        if (err instanceof GoogleApiError) {
          err.retryStats = { retryCount, totalWaitMs };
        }
        throw err;
      }
      const delayMs = computeBackoffDelay(retryCount, options);
      retryCount++;
      totalWaitMs += delayMs;
      await sleepFn(delayMs);
    }
  }
}

/** Sleep for the given number of milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
