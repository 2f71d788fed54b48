/**
 * @calsync/store -- Append-only sync telemetry.
 *
 * Entries are written once when a unit of work finishes and never updated.
 * They are only removed by purge(), either on request or by recovery.
 */

import type { ErrorKind, SqlStorageLike, SyncTelemetryEntry, SyncType } from "@calsync/shared";

interface TelemetryRow extends Record<string, unknown> {
  entry_id: string;
  sync_type: SyncType;
  started_at: string;
  ended_at: string;
  collection_hash: string | null;
  upserted: number;
  deleted: number;
  skipped: number;
  conflicted: number;
  retry_count: number;
  total_wait_ms: number;
  had_cursor_fallback: number;
  had_rate_limit_retry: number;
  http_status: number | null;
  error_kind: ErrorKind | null;
  error_message: string | null;
}

function fromRow(row: TelemetryRow): SyncTelemetryEntry {
  return {
    entryId: row.entry_id,
    syncType: row.sync_type,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    collectionHash: row.collection_hash,
    upserted: row.upserted,
    deleted: row.deleted,
    skipped: row.skipped,
    conflicted: row.conflicted,
    retryCount: row.retry_count,
    totalWaitMs: row.total_wait_ms,
    hadCursorFallback: row.had_cursor_fallback === 1,
    hadRateLimitRetry: row.had_rate_limit_retry === 1,
    httpStatus: row.http_status,
    errorKind: row.error_kind,
    errorMessage: row.error_message,
  };
}

export interface TelemetryListOptions {
  limit?: number;
  syncType?: SyncType;
}

export class TelemetryStore {
  constructor(private readonly sql: SqlStorageLike) {}

  append(entry: SyncTelemetryEntry): void {
    this.sql.exec(
      `INSERT INTO sync_telemetry (
         entry_id, sync_type, started_at, ended_at, collection_hash,
         upserted, deleted, skipped, conflicted, retry_count, total_wait_ms,
         had_cursor_fallback, had_rate_limit_retry, http_status, error_kind, error_message
       ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      entry.entryId,
      entry.syncType,
      entry.startedAt,
      entry.endedAt,
      entry.collectionHash,
      entry.upserted,
      entry.deleted,
      entry.skipped,
      entry.conflicted,
      entry.retryCount,
      entry.totalWaitMs,
      entry.hadCursorFallback ? 1 : 0,
      entry.hadRateLimitRetry ? 1 : 0,
      entry.httpStatus,
      entry.errorKind,
      entry.errorMessage,
    );
  }

  /** Newest first. */
  list(options: TelemetryListOptions = {}): SyncTelemetryEntry[] {
    const where = options.syncType !== undefined ? "WHERE sync_type = ?" : "";
    const bindings: unknown[] = options.syncType !== undefined ? [options.syncType] : [];
    bindings.push(options.limit ?? 100);
    return this.sql
      .exec<TelemetryRow>(
        `SELECT * FROM sync_telemetry ${where} ORDER BY started_at DESC, entry_id DESC LIMIT ?`,
        ...bindings,
      )
      .toArray()
      .map(fromRow);
  }

  count(): number {
    return this.sql.exec<{ n: number }>("SELECT COUNT(*) AS n FROM sync_telemetry").one().n;
  }

  /** @returns how many entries were removed */
  purge(): number {
    return this.sql.exec("DELETE FROM sync_telemetry").rowsWritten;
  }
}

/** JSON export of telemetry, with a derived duration per entry. */
export function toTelemetryJson(entries: readonly SyncTelemetryEntry[]): string {
  return JSON.stringify(
    entries.map((entry) => ({
      ...entry,
      durationMs: Date.parse(entry.endedAt) - Date.parse(entry.startedAt),
    })),
    null,
    2,
  );
}
