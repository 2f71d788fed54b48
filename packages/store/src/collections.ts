/**
 * @calsync/store -- Cached collection list.
 *
 * Refreshed from listCollections() at the start of every pull. The enabled
 * flag is local state: new collections start enabled, and a refresh keeps
 * whatever the user chose for collections it already knew.
 */

import type { CollectionEntry, RemoteCollection, SqlStorageLike } from "@calsync/shared";

interface CollectionRow extends Record<string, unknown> {
  collection_id: string;
  display_name: string;
  is_primary: number;
  color: string | null;
  is_enabled: number;
  updated_at: string;
}

function fromRow(row: CollectionRow): CollectionEntry {
  return {
    collectionId: row.collection_id,
    displayName: row.display_name,
    isPrimary: row.is_primary === 1,
    color: row.color,
    isEnabled: row.is_enabled === 1,
    updatedAt: row.updated_at,
  };
}

export class CollectionStore {
  constructor(private readonly sql: SqlStorageLike) {}

  list(): CollectionEntry[] {
    return this.sql
      .exec<CollectionRow>("SELECT * FROM collections ORDER BY is_primary DESC, display_name, collection_id")
      .toArray()
      .map(fromRow);
  }

  listEnabled(): CollectionEntry[] {
    return this.list().filter((c) => c.isEnabled);
  }

  enabledIds(): Set<string> {
    return new Set(this.listEnabled().map((c) => c.collectionId));
  }

  get(collectionId: string): CollectionEntry | null {
    const rows = this.sql
      .exec<CollectionRow>("SELECT * FROM collections WHERE collection_id = ?", collectionId)
      .toArray();
    return rows.length > 0 ? fromRow(rows[0]) : null;
  }

  /**
   * Replace the cached list with a fresh remote listing. Collections no
   * longer listed are dropped; known ones keep their enabled flag.
   */
  replaceFromRemote(collections: readonly RemoteCollection[], now: string): void {
    const listed = new Set<string>();
    for (const collection of collections) {
      listed.add(collection.id);
      this.sql.exec(
        `INSERT INTO collections (collection_id, display_name, is_primary, color, is_enabled, updated_at)
         VALUES (?, ?, ?, ?, 1, ?)
         ON CONFLICT(collection_id) DO UPDATE SET
           display_name = excluded.display_name,
           is_primary = excluded.is_primary,
           color = excluded.color,
           updated_at = excluded.updated_at`,
        collection.id,
        collection.summary,
        collection.primary ? 1 : 0,
        collection.backgroundColor ?? null,
        now,
      );
    }
    for (const existing of this.list()) {
      if (!listed.has(existing.collectionId)) {
        this.sql.exec("DELETE FROM collections WHERE collection_id = ?", existing.collectionId);
      }
    }
  }

  /** @returns false when the collection is unknown */
  setEnabled(collectionId: string, enabled: boolean): boolean {
    return (
      this.sql.exec(
        "UPDATE collections SET is_enabled = ? WHERE collection_id = ?",
        enabled ? 1 : 0,
        collectionId,
      ).rowsWritten > 0
    );
  }

  count(): number {
    return this.sql.exec<{ n: number }>("SELECT COUNT(*) AS n FROM collections").one().n;
  }

  deleteAll(): number {
    return this.sql.exec("DELETE FROM collections").rowsWritten;
  }
}
