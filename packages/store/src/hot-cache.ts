/**
 * @calsync/store -- Hot cache repository.
 *
 * One row per remote item inside the active sync window, keyed by
 * `collectionId:itemId`. Eviction is a plain range delete on start_at;
 * nothing here is soft-deleted.
 */

import type { HotCacheEntry, SqlStorageLike } from "@calsync/shared";
import {
  CACHE_COLUMNS,
  cacheBindings,
  cacheEntryFromRow,
  upsertSql,
  type CacheRow,
} from "./cache-rows";

const UPSERT_SQL = upsertSql("hot_cache", CACHE_COLUMNS);

export class HotCacheStore {
  constructor(private readonly sql: SqlStorageLike) {}

  get(uid: string): HotCacheEntry | null {
    const rows = this.sql
      .exec<CacheRow>("SELECT * FROM hot_cache WHERE uid = ?", uid)
      .toArray();
    return rows.length > 0 ? cacheEntryFromRow(rows[0]) : null;
  }

  /** Entries in start order. */
  list(): HotCacheEntry[] {
    return this.sql
      .exec<CacheRow>("SELECT * FROM hot_cache ORDER BY start_at, uid")
      .toArray()
      .map(cacheEntryFromRow);
  }

  /** Entries whose metadata points at the given record. */
  findByLinkedRecord(recordId: string): HotCacheEntry[] {
    return this.sql
      .exec<CacheRow>("SELECT * FROM hot_cache WHERE linked_record_id = ? ORDER BY uid", recordId)
      .toArray()
      .map(cacheEntryFromRow);
  }

  upsert(entry: HotCacheEntry): void {
    this.sql.exec(UPSERT_SQL, ...cacheBindings(entry));
  }

  /** @returns true if a row was removed */
  delete(uid: string): boolean {
    return this.sql.exec("DELETE FROM hot_cache WHERE uid = ?", uid).rowsWritten > 0;
  }

  /**
   * Delete every entry starting before `minStartAt` or after `maxStartAt`
   * (ISO 8601 UTC, compared lexicographically).
   *
   * @returns how many entries were evicted
   */
  deleteOutside(minStartAt: string, maxStartAt: string): number {
    return this.sql.exec(
      "DELETE FROM hot_cache WHERE start_at < ? OR start_at > ?",
      minStartAt,
      maxStartAt,
    ).rowsWritten;
  }

  /** @returns how many entries were removed */
  deleteByCollection(collectionId: string): number {
    return this.sql.exec("DELETE FROM hot_cache WHERE collection_id = ?", collectionId).rowsWritten;
  }

  count(): number {
    return this.sql.exec<{ n: number }>("SELECT COUNT(*) AS n FROM hot_cache").one().n;
  }

  deleteAll(): number {
    return this.sql.exec("DELETE FROM hot_cache").rowsWritten;
  }
}
