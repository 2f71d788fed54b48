/**
 * @calsync/shared -- Building sync telemetry entries.
 *
 * Every unit of work (a push, a pull of one collection, an archive import
 * of one collection, a recovery) appends exactly one entry when it ends,
 * successful or not.
 */

import {
  classifyError,
  errorMessage,
  httpStatusOf,
  retryStatsOf,
} from "./errors";
import { collectionHash } from "./hash";
import { generateId } from "./id";
import type { ApplyCounts, RetryStats, SyncTelemetryEntry, SyncType } from "./types";

export interface TelemetryInput {
  syncType: SyncType;
  startedAt: string;
  endedAt: string;
  /** Hashed before it is stored. */
  collectionId?: string | null;
  counts?: Partial<ApplyCounts>;
  /** Retries of successful calls. A failing call's own stats come from `error`. */
  retry?: RetryStats;
  hadCursorFallback?: boolean;
  error?: unknown;
}

/** Accumulates retry stats across the calls of one unit of work. */
export class RetryTally implements RetryStats {
  retryCount = 0;
  totalWaitMs = 0;

  add(stats: RetryStats): void {
    this.retryCount += stats.retryCount;
    this.totalWaitMs += stats.totalWaitMs;
  }
}

export async function buildTelemetryEntry(input: TelemetryInput): Promise<SyncTelemetryEntry> {
  const failed = input.error !== undefined;
  const errorRetry = failed ? retryStatsOf(input.error) : { retryCount: 0, totalWaitMs: 0 };
  const retryCount = (input.retry?.retryCount ?? 0) + errorRetry.retryCount;
  const totalWaitMs = (input.retry?.totalWaitMs ?? 0) + errorRetry.totalWaitMs;

  return {
    entryId: generateId("telemetry"),
    syncType: input.syncType,
    startedAt: input.startedAt,
    endedAt: input.endedAt,
    collectionHash:
      input.collectionId !== undefined && input.collectionId !== null
        ? await collectionHash(input.collectionId)
        : null,
    upserted: input.counts?.upserted ?? 0,
    deleted: input.counts?.deleted ?? 0,
    skipped: input.counts?.skipped ?? 0,
    conflicted: input.counts?.conflicted ?? 0,
    retryCount,
    totalWaitMs,
    hadCursorFallback: input.hadCursorFallback ?? false,
    hadRateLimitRetry: retryCount > 0,
    httpStatus: failed ? httpStatusOf(input.error) : null,
    errorKind: failed ? classifyError(input.error) : null,
    errorMessage: failed ? errorMessage(input.error) : null,
  };
}
