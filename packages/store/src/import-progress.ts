/**
 * @calsync/store -- Archive import progress and markers.
 *
 * Progress is the index of the last committed sub-range per collection;
 * an interrupted import resumes at the next one. Markers say whether an
 * import is running or has completed for a collection.
 */

import type { SqlStorageLike } from "@calsync/shared";

export type ImportState = "in_progress" | "completed";

export interface ImportProgress {
  readonly collectionId: string;
  /** Last committed sub-range, 0-based. */
  readonly completedRangeIndex: number;
  readonly totalRanges: number;
  readonly updatedAt: string;
}

interface ProgressRow extends Record<string, unknown> {
  collection_id: string;
  completed_range_index: number;
  total_ranges: number;
  updated_at: string;
}

export class ImportProgressStore {
  constructor(private readonly sql: SqlStorageLike) {}

  getProgress(collectionId: string): ImportProgress | null {
    const rows = this.sql
      .exec<ProgressRow>(
        "SELECT * FROM archive_import_progress WHERE collection_id = ?",
        collectionId,
      )
      .toArray();
    if (rows.length === 0) {
      return null;
    }
    return {
      collectionId: rows[0].collection_id,
      completedRangeIndex: rows[0].completed_range_index,
      totalRanges: rows[0].total_ranges,
      updatedAt: rows[0].updated_at,
    };
  }

  saveProgress(collectionId: string, completedRangeIndex: number, totalRanges: number, now: string): void {
    this.sql.exec(
      `INSERT INTO archive_import_progress (collection_id, completed_range_index, total_ranges, updated_at)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(collection_id) DO UPDATE SET
         completed_range_index = excluded.completed_range_index,
         total_ranges = excluded.total_ranges,
         updated_at = excluded.updated_at`,
      collectionId,
      completedRangeIndex,
      totalRanges,
      now,
    );
  }

  clearProgress(collectionId: string): void {
    this.sql.exec("DELETE FROM archive_import_progress WHERE collection_id = ?", collectionId);
  }

  getState(collectionId: string): ImportState | null {
    const rows = this.sql
      .exec<{ state: ImportState }>(
        "SELECT state FROM archive_import_state WHERE collection_id = ?",
        collectionId,
      )
      .toArray();
    return rows.length > 0 ? rows[0].state : null;
  }

  setState(collectionId: string, state: ImportState, now: string): void {
    this.sql.exec(
      `INSERT INTO archive_import_state (collection_id, state, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(collection_id) DO UPDATE SET state = excluded.state, updated_at = excluded.updated_at`,
      collectionId,
      state,
      now,
    );
  }

  clearState(collectionId: string): void {
    this.sql.exec("DELETE FROM archive_import_state WHERE collection_id = ?", collectionId);
  }

  /** Drop every progress row and marker. */
  clearAll(): void {
    this.sql.exec("DELETE FROM archive_import_progress");
    this.sql.exec("DELETE FROM archive_import_state");
  }
}
