/**
 * @calsync/store -- Row mapping shared by the hot cache and the archive.
 */

import type { ArchiveEntry, HotCacheEntry, RemoteItemStatus } from "@calsync/shared";

export interface CacheRow extends Record<string, unknown> {
  uid: string;
  collection_id: string;
  item_id: string;
  linked_record_id: string | null;
  title: string;
  body: string;
  start_at: string;
  end_at: string;
  all_day: number;
  status: RemoteItemStatus;
  updated_at: string;
  cached_at: string;
}

export interface ArchiveRow extends CacheRow {
  start_day_key: number;
  start_month_day_key: number;
}

export const CACHE_COLUMNS = [
  "uid",
  "collection_id",
  "item_id",
  "linked_record_id",
  "title",
  "body",
  "start_at",
  "end_at",
  "all_day",
  "status",
  "updated_at",
  "cached_at",
] as const;

export function cacheEntryFromRow(row: CacheRow): HotCacheEntry {
  return {
    uid: row.uid,
    collectionId: row.collection_id,
    itemId: row.item_id,
    linkedRecordId: row.linked_record_id,
    title: row.title,
    body: row.body,
    startAt: row.start_at,
    endAt: row.end_at,
    allDay: row.all_day === 1,
    status: row.status,
    updatedAt: row.updated_at,
    cachedAt: row.cached_at,
  };
}

export function archiveEntryFromRow(row: ArchiveRow): ArchiveEntry {
  return {
    ...cacheEntryFromRow(row),
    startDayKey: row.start_day_key,
    startMonthDayKey: row.start_month_day_key,
  };
}

export function cacheBindings(entry: HotCacheEntry): unknown[] {
  return [
    entry.uid,
    entry.collectionId,
    entry.itemId,
    entry.linkedRecordId,
    entry.title,
    entry.body,
    entry.startAt,
    entry.endAt,
    entry.allDay ? 1 : 0,
    entry.status,
    entry.updatedAt,
    entry.cachedAt,
  ];
}

/** INSERT ... ON CONFLICT(uid) DO UPDATE over the given columns. */
export function upsertSql(table: string, columns: readonly string[]): string {
  return `INSERT INTO ${table} (${columns.join(", ")})
  VALUES (${columns.map(() => "?").join(", ")})
  ON CONFLICT(uid) DO UPDATE SET ${columns
    .filter((c) => c !== "uid")
    .map((c) => `${c} = excluded.${c}`)
    .join(", ")}`;
}
