/**
 * @calsync/store -- Archive repository.
 *
 * One row per remote item over the whole remote history. Rows are ordered
 * by (start_day_key, uid); the composite order is what lets the display
 * cursor page strictly beyond a boundary without skipping or repeating
 * rows that share a day.
 */

import type { ArchiveEntry, SqlStorageLike } from "@calsync/shared";
import {
  CACHE_COLUMNS,
  archiveEntryFromRow,
  cacheBindings,
  upsertSql,
  type ArchiveRow,
} from "./cache-rows";

const ARCHIVE_COLUMNS = [...CACHE_COLUMNS, "start_day_key", "start_month_day_key"] as const;
const UPSERT_SQL = upsertSql("archive", ARCHIVE_COLUMNS);

/** Position in (dayKey, uid) order. */
export interface ArchiveBoundary {
  readonly dayKey: number;
  readonly uid: string;
}

export class ArchiveStore {
  constructor(private readonly sql: SqlStorageLike) {}

  get(uid: string): ArchiveEntry | null {
    const rows = this.sql
      .exec<ArchiveRow>("SELECT * FROM archive WHERE uid = ?", uid)
      .toArray();
    return rows.length > 0 ? archiveEntryFromRow(rows[0]) : null;
  }

  has(uid: string): boolean {
    return (
      this.sql.exec<{ n: number }>("SELECT COUNT(*) AS n FROM archive WHERE uid = ?", uid).one().n > 0
    );
  }

  upsert(entry: ArchiveEntry): void {
    this.sql.exec(
      UPSERT_SQL,
      ...cacheBindings(entry),
      entry.startDayKey,
      entry.startMonthDayKey,
    );
  }

  /** @returns true if a row was removed */
  delete(uid: string): boolean {
    return this.sql.exec("DELETE FROM archive WHERE uid = ?", uid).rowsWritten > 0;
  }

  /**
   * Up to `limit` rows strictly before the boundary, nearest first
   * (descending order).
   */
  fetchBefore(boundary: ArchiveBoundary, limit: number): ArchiveEntry[] {
    return this.sql
      .exec<ArchiveRow>(
        `SELECT * FROM archive
         WHERE start_day_key < ? OR (start_day_key = ? AND uid < ?)
         ORDER BY start_day_key DESC, uid DESC
         LIMIT ?`,
        boundary.dayKey,
        boundary.dayKey,
        boundary.uid,
        limit,
      )
      .toArray()
      .map(archiveEntryFromRow);
  }

  /**
   * Up to `limit` rows strictly after the boundary, nearest first
   * (ascending order).
   */
  fetchAfter(boundary: ArchiveBoundary, limit: number): ArchiveEntry[] {
    return this.sql
      .exec<ArchiveRow>(
        `SELECT * FROM archive
         WHERE start_day_key > ? OR (start_day_key = ? AND uid > ?)
         ORDER BY start_day_key ASC, uid ASC
         LIMIT ?`,
        boundary.dayKey,
        boundary.dayKey,
        boundary.uid,
        limit,
      )
      .toArray()
      .map(archiveEntryFromRow);
  }

  /** Rows whose metadata carries a local record id. */
  listLinked(): ArchiveEntry[] {
    return this.sql
      .exec<ArchiveRow>("SELECT * FROM archive WHERE linked_record_id IS NOT NULL ORDER BY uid")
      .toArray()
      .map(archiveEntryFromRow);
  }

  count(): number {
    return this.sql.exec<{ n: number }>("SELECT COUNT(*) AS n FROM archive").one().n;
  }

  deleteAll(): number {
    return this.sql.exec("DELETE FROM archive").rowsWritten;
  }
}
