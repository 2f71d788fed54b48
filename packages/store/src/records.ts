/**
 * @calsync/store -- Record repository.
 *
 * Records are written whole: callers read a LocalRecord, build the next
 * version with spread syntax, and hand it back to upsert(). The only bulk
 * mutations are the ones recovery and retry need.
 */

import type { LocalRecord, SqlStorageLike, SyncStatus } from "@calsync/shared";

// ---------------------------------------------------------------------------
// Row shape
// ---------------------------------------------------------------------------

interface RecordRow extends Record<string, unknown> {
  record_id: string;
  collection_id: string | null;
  remote_item_id: string | null;
  title: string;
  body: string;
  start_at: string;
  end_at: string;
  all_day: number;
  tags: string;
  sync_status: SyncStatus;
  last_synced_at: string | null;
  is_deleted: number;
  deleted_at: string | null;
  created_at: string;
  updated_at: string;
  origin: "local" | "remote";
  last_linked_remote_updated_at: string | null;
  has_conflict: number;
  conflict_detected_at: string | null;
  conflict_remote_title: string | null;
  conflict_remote_body: string | null;
  conflict_remote_updated_at: string | null;
  conflict_remote_start_at: string | null;
}

function parseTags(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((t): t is string => typeof t === "string") : [];
}

function fromRow(row: RecordRow): LocalRecord {
  return {
    recordId: row.record_id,
    collectionId: row.collection_id,
    remoteItemId: row.remote_item_id,
    title: row.title,
    body: row.body,
    startAt: row.start_at,
    endAt: row.end_at,
    allDay: row.all_day === 1,
    tags: parseTags(row.tags),
    syncStatus: row.sync_status,
    lastSyncedAt: row.last_synced_at,
    isDeleted: row.is_deleted === 1,
    deletedAt: row.deleted_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    origin: row.origin,
    lastLinkedRemoteUpdatedAt: row.last_linked_remote_updated_at,
    hasConflict: row.has_conflict === 1,
    conflictDetectedAt: row.conflict_detected_at,
    conflictRemoteTitle: row.conflict_remote_title,
    conflictRemoteBody: row.conflict_remote_body,
    conflictRemoteUpdatedAt: row.conflict_remote_updated_at,
    conflictRemoteStartAt: row.conflict_remote_start_at,
  };
}

const COLUMNS = [
  "record_id",
  "collection_id",
  "remote_item_id",
  "title",
  "body",
  "start_at",
  "end_at",
  "all_day",
  "tags",
  "sync_status",
  "last_synced_at",
  "is_deleted",
  "deleted_at",
  "created_at",
  "updated_at",
  "origin",
  "last_linked_remote_updated_at",
  "has_conflict",
  "conflict_detected_at",
  "conflict_remote_title",
  "conflict_remote_body",
  "conflict_remote_updated_at",
  "conflict_remote_start_at",
] as const;

const UPSERT_SQL = `INSERT INTO records (${COLUMNS.join(", ")})
  VALUES (${COLUMNS.map(() => "?").join(", ")})
  ON CONFLICT(record_id) DO UPDATE SET ${COLUMNS.slice(1)
    .map((c) => `${c} = excluded.${c}`)
    .join(", ")}`;

function toBindings(record: LocalRecord): unknown[] {
  return [
    record.recordId,
    record.collectionId,
    record.remoteItemId,
    record.title,
    record.body,
    record.startAt,
    record.endAt,
    record.allDay ? 1 : 0,
    JSON.stringify(record.tags),
    record.syncStatus,
    record.lastSyncedAt,
    record.isDeleted ? 1 : 0,
    record.deletedAt,
    record.createdAt,
    record.updatedAt,
    record.origin,
    record.lastLinkedRemoteUpdatedAt,
    record.hasConflict ? 1 : 0,
    record.conflictDetectedAt,
    record.conflictRemoteTitle,
    record.conflictRemoteBody,
    record.conflictRemoteUpdatedAt,
    record.conflictRemoteStartAt,
  ];
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export interface RecordListFilter {
  status?: SyncStatus;
  includeDeleted?: boolean;
  conflictsOnly?: boolean;
  limit?: number;
}

export class RecordStore {
  constructor(private readonly sql: SqlStorageLike) {}

  get(recordId: string): LocalRecord | null {
    const rows = this.sql
      .exec<RecordRow>("SELECT * FROM records WHERE record_id = ?", recordId)
      .toArray();
    return rows.length > 0 ? fromRow(rows[0]) : null;
  }

  /** The record linked to a remote item, if any. */
  findByRemote(collectionId: string, remoteItemId: string): LocalRecord | null {
    const rows = this.sql
      .exec<RecordRow>(
        "SELECT * FROM records WHERE collection_id = ? AND remote_item_id = ?",
        collectionId,
        remoteItemId,
      )
      .toArray();
    return rows.length > 0 ? fromRow(rows[0]) : null;
  }

  /** Records with the given status, oldest edit first. */
  listByStatus(status: SyncStatus): LocalRecord[] {
    return this.sql
      .exec<RecordRow>(
        "SELECT * FROM records WHERE sync_status = ? ORDER BY updated_at, record_id",
        status,
      )
      .toArray()
      .map(fromRow);
  }

  list(filter: RecordListFilter = {}): LocalRecord[] {
    const clauses: string[] = [];
    const bindings: unknown[] = [];
    if (filter.status !== undefined) {
      clauses.push("sync_status = ?");
      bindings.push(filter.status);
    }
    if (!filter.includeDeleted) {
      clauses.push("is_deleted = 0");
    }
    if (filter.conflictsOnly) {
      clauses.push("has_conflict = 1");
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
    const limit = filter.limit !== undefined ? "LIMIT ?" : "";
    if (filter.limit !== undefined) {
      bindings.push(filter.limit);
    }
    return this.sql
      .exec<RecordRow>(`SELECT * FROM records ${where} ORDER BY start_at, record_id ${limit}`, ...bindings)
      .toArray()
      .map(fromRow);
  }

  /** Linked records (remote id set). */
  listLinked(): LocalRecord[] {
    return this.sql
      .exec<RecordRow>("SELECT * FROM records WHERE remote_item_id IS NOT NULL ORDER BY record_id")
      .toArray()
      .map(fromRow);
  }

  count(): number {
    return this.sql.exec<{ n: number }>("SELECT COUNT(*) AS n FROM records").one().n;
  }

  countByStatus(status: SyncStatus): number {
    return this.sql
      .exec<{ n: number }>("SELECT COUNT(*) AS n FROM records WHERE sync_status = ?", status)
      .one().n;
  }

  countConflicts(): number {
    return this.sql
      .exec<{ n: number }>("SELECT COUNT(*) AS n FROM records WHERE has_conflict = 1")
      .one().n;
  }

  /** Insert or fully replace a record. */
  upsert(record: LocalRecord): void {
    this.sql.exec(UPSERT_SQL, ...toBindings(record));
  }

  /** @returns true if a row was removed */
  delete(recordId: string): boolean {
    return this.sql.exec("DELETE FROM records WHERE record_id = ?", recordId).rowsWritten > 0;
  }

  /** failed -> pending. @returns how many records were reset */
  resetFailed(): number {
    return this.sql.exec(
      "UPDATE records SET sync_status = ? WHERE sync_status = ?",
      "pending",
      "failed",
    ).rowsWritten;
  }

  /**
   * Drop the remote link and conflict of every locally managed record,
   * queueing it for a fresh push. The collection is kept so the push
   * targets the same calendar.
   *
   * @returns how many records were unlinked
   */
  unlinkLocal(): number {
    return this.sql.exec(
      `UPDATE records SET
         remote_item_id = NULL,
         last_linked_remote_updated_at = NULL,
         sync_status = ?,
         has_conflict = 0,
         conflict_detected_at = NULL,
         conflict_remote_title = NULL,
         conflict_remote_body = NULL,
         conflict_remote_updated_at = NULL,
         conflict_remote_start_at = NULL
       WHERE origin = ?`,
      "pending",
      "local",
    ).rowsWritten;
  }

  /** @returns how many records were removed */
  deleteByOrigin(origin: LocalRecord["origin"]): number {
    return this.sql.exec("DELETE FROM records WHERE origin = ?", origin).rowsWritten;
  }

  deleteAll(): number {
    return this.sql.exec("DELETE FROM records").rowsWritten;
  }
}
