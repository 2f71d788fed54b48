/**
 * @calsync/shared -- Domain types for the calsync sync and caching engine.
 *
 * Remote shapes mirror the Google Calendar v3 payloads we consume. Local
 * shapes (records, cache entries, telemetry) are what the store persists.
 * All timestamps are ISO 8601 strings in UTC.
 */

// ---------------------------------------------------------------------------
// Remote calendar API types
// ---------------------------------------------------------------------------

/** Start or end of a remote item. */
export interface EventDateTime {
  /** ISO 8601 datetime (e.g. "2025-06-15T09:00:00Z"). Present for timed items. */
  readonly dateTime?: string;
  /** YYYY-MM-DD date string. Present for all-day items. */
  readonly date?: string;
  /** IANA timezone (e.g. "America/Chicago"). */
  readonly timeZone?: string;
}

/** Remote item status. "cancelled" means the item was deleted remotely. */
export type RemoteItemStatus = "confirmed" | "tentative" | "cancelled";

/** A remote item as returned by events.list / events.insert / events.update. */
export interface RemoteItem {
  readonly id: string;
  readonly summary?: string;
  readonly description?: string;
  readonly start?: EventDateTime;
  readonly end?: EventDateTime;
  readonly status?: string;
  /** Last modification time on the remote side. */
  readonly updated?: string;
  readonly extendedProperties?: {
    readonly private?: Readonly<Record<string, string>>;
    readonly shared?: Readonly<Record<string, string>>;
  };
}

/** Body sent to events.insert / events.update. */
export interface RemoteItemInput {
  readonly summary: string;
  readonly description: string;
  readonly start: EventDateTime;
  readonly end: EventDateTime;
  readonly extendedProperties: {
    readonly private: Readonly<Record<string, string>>;
  };
}

/** A remote collection (calendar) from calendarList.list. */
export interface RemoteCollection {
  readonly id: string;
  readonly summary: string;
  readonly primary: boolean;
  readonly backgroundColor?: string;
  readonly accessRole?: string;
}

/** One page of a list call. */
export interface ItemPage {
  readonly items: RemoteItem[];
  readonly nextPageToken?: string;
  /** Present only on the terminal page. */
  readonly nextSyncToken?: string;
}

/** Time-ranged or cursor-based list query. */
export type ListQuery =
  | { readonly syncToken: string }
  | { readonly timeMin: string; readonly timeMax: string };

/** Retry bookkeeping reported by every gateway call. */
export interface RetryStats {
  readonly retryCount: number;
  readonly totalWaitMs: number;
}

// ---------------------------------------------------------------------------
// Normalized remote item
// ---------------------------------------------------------------------------

/**
 * A remote item flattened into the fields the caches and records carry.
 * Produced by normalizeRemoteItem().
 */
export interface NormalizedItem {
  /** `collectionId:itemId` */
  readonly uid: string;
  readonly collectionId: string;
  readonly itemId: string;
  /** recordId from the private metadata block, if calsync wrote it. */
  readonly linkedRecordId: string | null;
  readonly title: string;
  readonly body: string;
  readonly startAt: string;
  readonly endAt: string;
  readonly allDay: boolean;
  readonly status: RemoteItemStatus;
  readonly updatedAt: string;
}

// ---------------------------------------------------------------------------
// Local records
// ---------------------------------------------------------------------------

/** Sync state of a local record. */
export type SyncStatus = "synced" | "pending" | "failed";

/**
 * Who manages the record. "remote" records were created by a pull and are
 * not locally managed.
 */
export type RecordOrigin = "local" | "remote";

/** The unit of scheduling data. */
export interface LocalRecord {
  readonly recordId: string;
  readonly collectionId: string | null;
  readonly remoteItemId: string | null;
  readonly title: string;
  readonly body: string;
  readonly startAt: string;
  readonly endAt: string;
  readonly allDay: boolean;
  /** Derived from title and body, never authored directly. */
  readonly tags: readonly string[];
  readonly syncStatus: SyncStatus;
  readonly lastSyncedAt: string | null;
  readonly isDeleted: boolean;
  readonly deletedAt: string | null;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly origin: RecordOrigin;
  /** Remote `updated` of the last version this record was reconciled with. */
  readonly lastLinkedRemoteUpdatedAt: string | null;
  readonly hasConflict: boolean;
  readonly conflictDetectedAt: string | null;
  readonly conflictRemoteTitle: string | null;
  readonly conflictRemoteBody: string | null;
  readonly conflictRemoteUpdatedAt: string | null;
  readonly conflictRemoteStartAt: string | null;
}

// ---------------------------------------------------------------------------
// Cache entries
// ---------------------------------------------------------------------------

/** One remote item inside the active sync window. */
export interface HotCacheEntry {
  readonly uid: string;
  readonly collectionId: string;
  readonly itemId: string;
  readonly linkedRecordId: string | null;
  readonly title: string;
  readonly body: string;
  readonly startAt: string;
  readonly endAt: string;
  readonly allDay: boolean;
  readonly status: RemoteItemStatus;
  readonly updatedAt: string;
  readonly cachedAt: string;
}

/** One remote item anywhere in the remote history. */
export interface ArchiveEntry extends HotCacheEntry {
  /** YYYYMMDD of the start date. */
  readonly startDayKey: number;
  /** MMDD of the start date. */
  readonly startMonthDayKey: number;
}

/** Cached collection list entry. */
export interface CollectionEntry {
  readonly collectionId: string;
  readonly displayName: string;
  readonly isPrimary: boolean;
  readonly color: string | null;
  readonly isEnabled: boolean;
  readonly updatedAt: string;
}

// ---------------------------------------------------------------------------
// Telemetry
// ---------------------------------------------------------------------------

export type SyncType = "push" | "incremental" | "full" | "archive" | "recovery";

/** Error classification recorded in telemetry. */
export type ErrorKind =
  | "network"
  | "remote-api"
  | "cursor-expired"
  | "local-storage"
  | "cancelled"
  | "unknown";

/** Append-only record of one sync unit of work. */
export interface SyncTelemetryEntry {
  readonly entryId: string;
  readonly syncType: SyncType;
  readonly startedAt: string;
  readonly endedAt: string;
  /** First 8 hex chars of SHA-256(collectionId). Raw ids are never stored. */
  readonly collectionHash: string | null;
  readonly upserted: number;
  readonly deleted: number;
  readonly skipped: number;
  readonly conflicted: number;
  readonly retryCount: number;
  readonly totalWaitMs: number;
  readonly hadCursorFallback: boolean;
  readonly hadRateLimitRetry: boolean;
  readonly httpStatus: number | null;
  readonly errorKind: ErrorKind | null;
  readonly errorMessage: string | null;
}

// ---------------------------------------------------------------------------
// Apply counts
// ---------------------------------------------------------------------------

/** Per-batch outcome of applying remote items. */
export interface ApplyCounts {
  upserted: number;
  deleted: number;
  skipped: number;
  conflicted: number;
}

/** A zeroed ApplyCounts. */
export function emptyCounts(): ApplyCounts {
  return { upserted: 0, deleted: 0, skipped: 0, conflicted: 0 };
}
