/**
 * @calsync/sync-worker -- Applying pulled remote items to the local store.
 *
 * Items are applied one at a time in the order the remote returned them.
 * Applying the same page twice is a no-op: an item whose `updated` is not
 * newer than what the linked record last reconciled with is skipped.
 */

import {
  clearedConflict,
  emptyCounts,
  extractTags,
  generateId,
  normalizeRemoteItem,
  toArchiveEntry,
  toHotCacheEntry,
  type ApplyCounts,
  type LocalRecord,
  type NormalizedItem,
  type RemoteItem,
} from "@calsync/shared";
import type { LocalStore } from "@calsync/store";
import { isConflict, markConflict } from "./conflict";

export interface ApplyOptions {
  /** Soft-delete records whose remote item was cancelled instead of unlinking them. */
  trashEnabled: boolean;
  now: string;
}

type Outcome = keyof ApplyCounts;

export function applyRemoteItems(
  store: LocalStore,
  collectionId: string,
  items: readonly RemoteItem[],
  options: ApplyOptions,
): ApplyCounts {
  const counts = emptyCounts();
  for (const raw of items) {
    const item = normalizeRemoteItem(collectionId, raw);
    const outcome: Outcome = item === null ? "skipped" : applyItem(store, item, options);
    counts[outcome]++;
  }
  return counts;
}

/** Add `more` into `into`. */
export function addCounts(into: ApplyCounts, more: ApplyCounts): void {
  into.upserted += more.upserted;
  into.deleted += more.deleted;
  into.skipped += more.skipped;
  into.conflicted += more.conflicted;
}

function applyItem(store: LocalStore, item: NormalizedItem, options: ApplyOptions): Outcome {
  if (item.status === "cancelled") {
    applyCancelled(store, item, options);
    return "deleted";
  }

  store.hotCache.upsert(toHotCacheEntry(item, options.now));
  if (store.archive.has(item.uid)) {
    store.archive.upsert(toArchiveEntry(item, options.now));
  }

  let record = store.records.findByRemote(item.collectionId, item.itemId);

  if (record === null && item.linkedRecordId !== null) {
    const candidate = store.records.get(item.linkedRecordId);
    if (candidate !== null && candidate.remoteItemId === null) {
      store.records.upsert({
        ...candidate,
        collectionId: item.collectionId,
        remoteItemId: item.itemId,
        lastLinkedRemoteUpdatedAt: item.updatedAt,
        syncStatus: "synced",
        lastSyncedAt: options.now,
      });
      return "upserted";
    }
  }

  if (record === null) {
    store.records.upsert(recordFromRemote(item, options.now));
    return "upserted";
  }

  if (record.isDeleted) {
    return "skipped";
  }

  if (
    record.lastLinkedRemoteUpdatedAt !== null &&
    Date.parse(record.lastLinkedRemoteUpdatedAt) >= Date.parse(item.updatedAt)
  ) {
    return "skipped";
  }

  if (isConflict(record, item)) {
    record = markConflict(record, item, options.now);
    store.records.upsert(record);
    console.log("sync: conflict detected", { record_id: record.recordId, uid: item.uid });
    return "conflicted";
  }

  store.records.upsert({
    ...record,
    ...clearedConflict(),
    collectionId: item.collectionId,
    title: item.title,
    body: item.body,
    startAt: item.startAt,
    endAt: item.endAt,
    allDay: item.allDay,
    tags: extractTags(item.title, item.body),
    syncStatus: "synced",
    lastSyncedAt: options.now,
    updatedAt: item.updatedAt,
    lastLinkedRemoteUpdatedAt: item.updatedAt,
  });
  return "upserted";
}

function applyCancelled(store: LocalStore, item: NormalizedItem, options: ApplyOptions): void {
  store.hotCache.delete(item.uid);
  store.archive.delete(item.uid);

  const record = store.records.findByRemote(item.collectionId, item.itemId);
  if (record === null) {
    return;
  }
  const cleared: LocalRecord = { ...record, ...clearedConflict() };

  if (options.trashEnabled) {
    store.records.upsert({
      ...cleared,
      isDeleted: true,
      deletedAt: options.now,
      syncStatus: "synced",
      lastSyncedAt: options.now,
    });
  } else if (record.origin === "local") {
    store.records.upsert({
      ...cleared,
      remoteItemId: null,
      lastLinkedRemoteUpdatedAt: null,
      syncStatus: "synced",
      lastSyncedAt: options.now,
    });
  } else {
    store.records.delete(record.recordId);
  }
}

function recordFromRemote(item: NormalizedItem, now: string): LocalRecord {
  return {
    recordId: generateId("record"),
    collectionId: item.collectionId,
    remoteItemId: item.itemId,
    title: item.title,
    body: item.body,
    startAt: item.startAt,
    endAt: item.endAt,
    allDay: item.allDay,
    tags: extractTags(item.title, item.body),
    syncStatus: "synced",
    lastSyncedAt: now,
    isDeleted: false,
    deletedAt: null,
    createdAt: now,
    updatedAt: item.updatedAt,
    origin: "remote",
    lastLinkedRemoteUpdatedAt: item.updatedAt,
    ...clearedConflict(),
  };
}
