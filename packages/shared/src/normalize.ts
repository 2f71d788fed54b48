/**
 * @calsync/shared -- Remote item normalization.
 *
 * Converts raw Google Calendar items into the flat NormalizedItem shape the
 * caches and records carry, and builds the request body for pushing a
 * local record back.
 *
 * Deterministic, no mutations. The only side effect is console.warn()
 * when an item cannot be placed on the timeline.
 *
 * - All-day items carry `date` (YYYY-MM-DD); they are stored as midnight UTC.
 * - Timed items carry `dateTime` with an offset; they are stored in UTC.
 * - Cancelled items from an incremental pull often carry only id and status;
 *   they normalize with empty timestamps since only their key matters.
 */

import {
  METADATA_APP_KEY,
  METADATA_APP_VALUE,
  METADATA_RECORD_ID_KEY,
  METADATA_SCHEMA_VERSION,
  METADATA_SCHEMA_VERSION_KEY,
} from "./constants";
import { dayKeyFromIso, monthDayKeyFromIso } from "./day-key";
import type {
  ArchiveEntry,
  EventDateTime,
  HotCacheEntry,
  LocalRecord,
  NormalizedItem,
  RemoteItem,
  RemoteItemInput,
  RemoteItemStatus,
} from "./types";

const EPOCH_ISO = new Date(0).toISOString();

// ---------------------------------------------------------------------------
// Keys and metadata
// ---------------------------------------------------------------------------

/** Cache key of a remote item. */
export function itemUid(collectionId: string, itemId: string): string {
  return `${collectionId}:${itemId}`;
}

/** recordId from the private metadata block, if calsync wrote it. */
export function readLinkedRecordId(item: RemoteItem): string | null {
  const metadata = item.extendedProperties?.private;
  if (metadata === undefined || metadata[METADATA_APP_KEY] !== METADATA_APP_VALUE) {
    return null;
  }
  return metadata[METADATA_RECORD_ID_KEY] ?? null;
}

// ---------------------------------------------------------------------------
// Remote -> local
// ---------------------------------------------------------------------------

/**
 * Flatten a remote item.
 *
 * @returns null when a non-cancelled item has no usable start time
 */
export function normalizeRemoteItem(
  collectionId: string,
  item: RemoteItem,
): NormalizedItem | null {
  const status = normalizeStatus(item.status);
  const start = toUtcIso(item.start);
  const end = toUtcIso(item.end) ?? start;

  if (start === null && status !== "cancelled") {
    console.warn("normalize: item without a usable start skipped", {
      item_id: item.id,
    });
    return null;
  }

  return {
    uid: itemUid(collectionId, item.id),
    collectionId,
    itemId: item.id,
    linkedRecordId: readLinkedRecordId(item),
    title: item.summary ?? "",
    body: item.description ?? "",
    startAt: start ?? "",
    endAt: end ?? "",
    allDay: item.start?.date !== undefined && item.start.dateTime === undefined,
    status,
    updatedAt: toUtcIso({ dateTime: item.updated }) ?? EPOCH_ISO,
  };
}

function normalizeStatus(status: string | undefined): RemoteItemStatus {
  if (status === "cancelled" || status === "tentative") {
    return status;
  }
  if (status !== undefined && status !== "confirmed") {
    console.warn("normalize: unexpected item status treated as confirmed", { status });
  }
  return "confirmed";
}

function toUtcIso(value: EventDateTime | undefined): string | null {
  if (value === undefined) {
    return null;
  }
  const raw = value.dateTime ?? (value.date !== undefined ? `${value.date}T00:00:00Z` : undefined);
  if (raw === undefined) {
    return null;
  }
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/** Hot cache row for a normalized item. */
export function toHotCacheEntry(item: NormalizedItem, cachedAt: string): HotCacheEntry {
  return {
    uid: item.uid,
    collectionId: item.collectionId,
    itemId: item.itemId,
    linkedRecordId: item.linkedRecordId,
    title: item.title,
    body: item.body,
    startAt: item.startAt,
    endAt: item.endAt,
    allDay: item.allDay,
    status: item.status,
    updatedAt: item.updatedAt,
    cachedAt,
  };
}

/** Archive row for a normalized item, with its derived day keys. */
export function toArchiveEntry(item: NormalizedItem, cachedAt: string): ArchiveEntry {
  return {
    ...toHotCacheEntry(item, cachedAt),
    startDayKey: dayKeyFromIso(item.startAt),
    startMonthDayKey: monthDayKeyFromIso(item.startAt),
  };
}

// ---------------------------------------------------------------------------
// Local -> remote
// ---------------------------------------------------------------------------

/** Request body for pushing a record, carrying its link metadata. */
export function buildRemoteInput(record: LocalRecord): RemoteItemInput {
  return {
    summary: record.title,
    description: record.body,
    start: toEventDateTime(record.startAt, record.allDay),
    end: toEventDateTime(record.endAt, record.allDay),
    extendedProperties: {
      private: {
        [METADATA_APP_KEY]: METADATA_APP_VALUE,
        [METADATA_SCHEMA_VERSION_KEY]: METADATA_SCHEMA_VERSION,
        [METADATA_RECORD_ID_KEY]: record.recordId,
      },
    },
  };
}

function toEventDateTime(iso: string, allDay: boolean): EventDateTime {
  return allDay ? { date: iso.slice(0, 10) } : { dateTime: iso };
}
