/**
 * @calsync/shared -- Constants for the calsync sync and caching engine.
 *
 * All magic strings, default values, and prefix maps live here so that
 * every worker, workflow, and store references the same values.
 */

// ---------------------------------------------------------------------------
// Remote private metadata (extendedProperties.private) keys
// ---------------------------------------------------------------------------

/** Metadata key: marks the remote item as written by calsync. */
export const METADATA_APP_KEY = "app" as const;

/** Metadata key: schema version of the metadata block. */
export const METADATA_SCHEMA_VERSION_KEY = "schemaVersion" as const;

/** Metadata key: the local record this remote item is linked to. */
export const METADATA_RECORD_ID_KEY = "recordId" as const;

/** Value written under METADATA_APP_KEY. */
export const METADATA_APP_VALUE = "calsync" as const;

/** Value written under METADATA_SCHEMA_VERSION_KEY. */
export const METADATA_SCHEMA_VERSION = "1" as const;

// ---------------------------------------------------------------------------
// Gateway and retry defaults
// ---------------------------------------------------------------------------

/** Google Calendar REST API base URL. */
export const DEFAULT_API_BASE = "https://www.googleapis.com/calendar/v3";

/** Minimum interval between two granted gateway calls. */
export const DEFAULT_MIN_INTERVAL_MS = 5_000;

/** Retries for 429 / rate-limited 403 responses. */
export const DEFAULT_MAX_RETRIES = 5;

/** Base delay of the exponential backoff. */
export const DEFAULT_BACKOFF_BASE_MS = 1_000;

/** Upper bound of any single backoff delay. */
export const DEFAULT_BACKOFF_MAX_WAIT_MS = 60_000;

/** Maximum items per page requested from events.list. */
export const LIST_PAGE_SIZE = 2500;

/** 403 error reasons that mean "rate limited" rather than "forbidden". */
export const RATE_LIMIT_REASONS: readonly string[] = [
  "rateLimitExceeded",
  "userRateLimitExceeded",
];

// ---------------------------------------------------------------------------
// Sync window and conflict defaults
// ---------------------------------------------------------------------------

/** Days before now covered by a time-ranged full pull and the hot window. */
export const DEFAULT_PAST_WINDOW_DAYS = 90;

/** Days after now covered by a time-ranged full pull and the hot window. */
export const DEFAULT_FUTURE_WINDOW_DAYS = 365;

/** Local edits must be this much newer than the remote to count as a conflict. */
export const CONFLICT_DEBOUNCE_MS = 30_000;

/** Default periodic sync interval. */
export const DEFAULT_SYNC_INTERVAL_MS = 300_000;

/** Collection used for records that do not name one. */
export const DEFAULT_TARGET_COLLECTION = "primary";

// ---------------------------------------------------------------------------
// Archive import defaults
// ---------------------------------------------------------------------------

/** First day covered by a full archive import. */
export const DEFAULT_ARCHIVE_EPOCH = "2000-01-01";

/** Width of one archive import sub-range. */
export const ARCHIVE_RANGE_MONTHS = 6;

/** Days after now covered by a full archive import. */
export const ARCHIVE_FUTURE_DAYS = 365;

/** Pause between two archive sub-range fetches. */
export const ARCHIVE_RANGE_DELAY_MS = 200;

// ---------------------------------------------------------------------------
// Display pagination defaults
// ---------------------------------------------------------------------------

export const DISPLAY_PAGE_SIZE = 150;
export const DISPLAY_INITIAL_LOAD = 100;
export const DISPLAY_MAX_BUFFERED = 600;
export const DISPLAY_MAX_RAW_FETCH = 2400;

// ---------------------------------------------------------------------------
// Tags
// ---------------------------------------------------------------------------

/** Tags longer than this are dropped. */
export const MAX_TAG_LENGTH = 50;

// ---------------------------------------------------------------------------
// Meta flags
// ---------------------------------------------------------------------------

/** Meta key set while a recovery has started but not completed. */
export const META_RECOVERY_IN_PROGRESS = "recovery_in_progress" as const;

// ---------------------------------------------------------------------------
// ID prefixes
// ---------------------------------------------------------------------------

/**
 * Prefix map for all entity types. Every ID in the system is a
 * prefixed ULID.
 *
 * Usage: `ID_PREFIXES.record + ulid()` => "rec_01HXYZ..."
 */
export const ID_PREFIXES = {
  record: "rec_",
  telemetry: "tel_",
} as const;
