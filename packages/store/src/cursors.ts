/**
 * @calsync/store -- Sync cursor repository.
 *
 * One opaque continuation token per collection, stored in its own database
 * file. A cursor is only valid until the remote answers 410; the sync
 * worker then clears it and falls back to a time-ranged pull.
 */

import type { SqlStorageLike } from "@calsync/shared";

export class CursorStore {
  constructor(private readonly sql: SqlStorageLike) {}

  get(collectionId: string): string | null {
    const rows = this.sql
      .exec<{ sync_token: string }>(
        "SELECT sync_token FROM sync_cursors WHERE collection_id = ?",
        collectionId,
      )
      .toArray();
    return rows.length > 0 ? rows[0].sync_token : null;
  }

  set(collectionId: string, syncToken: string, now: string): void {
    this.sql.exec(
      `INSERT INTO sync_cursors (collection_id, sync_token, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(collection_id) DO UPDATE SET sync_token = excluded.sync_token, updated_at = excluded.updated_at`,
      collectionId,
      syncToken,
      now,
    );
  }

  clear(collectionId: string): void {
    this.sql.exec("DELETE FROM sync_cursors WHERE collection_id = ?", collectionId);
  }

  clearAll(): number {
    return this.sql.exec("DELETE FROM sync_cursors").rowsWritten;
  }

  /** Collection ids that currently hold a cursor. */
  collections(): string[] {
    return this.sql
      .exec<{ collection_id: string }>("SELECT collection_id FROM sync_cursors ORDER BY collection_id")
      .toArray()
      .map((row) => row.collection_id);
  }
}
