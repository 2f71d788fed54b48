/**
 * @calsync/shared -- shared types, constants, and utilities
 * for the calsync sync and caching engine.
 */

/** Application name constant. */
export const APP_NAME = "calsync" as const;

// Re-export all domain types
export type {
  EventDateTime,
  RemoteItemStatus,
  RemoteItem,
  RemoteItemInput,
  RemoteCollection,
  ItemPage,
  ListQuery,
  RetryStats,
  NormalizedItem,
  SyncStatus,
  RecordOrigin,
  LocalRecord,
  HotCacheEntry,
  ArchiveEntry,
  CollectionEntry,
  SyncType,
  ErrorKind,
  SyncTelemetryEntry,
  ApplyCounts,
} from "./types";
export { emptyCounts } from "./types";

// Re-export constants
export {
  METADATA_APP_KEY,
  METADATA_SCHEMA_VERSION_KEY,
  METADATA_RECORD_ID_KEY,
  METADATA_APP_VALUE,
  METADATA_SCHEMA_VERSION,
  DEFAULT_API_BASE,
  DEFAULT_MIN_INTERVAL_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BACKOFF_MAX_WAIT_MS,
  LIST_PAGE_SIZE,
  RATE_LIMIT_REASONS,
  DEFAULT_PAST_WINDOW_DAYS,
  DEFAULT_FUTURE_WINDOW_DAYS,
  CONFLICT_DEBOUNCE_MS,
  DEFAULT_SYNC_INTERVAL_MS,
  DEFAULT_TARGET_COLLECTION,
  DEFAULT_ARCHIVE_EPOCH,
  ARCHIVE_RANGE_MONTHS,
  ARCHIVE_FUTURE_DAYS,
  ARCHIVE_RANGE_DELAY_MS,
  DISPLAY_PAGE_SIZE,
  DISPLAY_INITIAL_LOAD,
  DISPLAY_MAX_BUFFERED,
  DISPLAY_MAX_RAW_FETCH,
  MAX_TAG_LENGTH,
  META_RECOVERY_IN_PROGRESS,
  ID_PREFIXES,
} from "./constants";

// Re-export ID utilities
export { generateId, parseId, isValidId, ENTITY_TYPES } from "./id";
export type { EntityType } from "./id";

// Re-export error taxonomy
export {
  NetworkError,
  toNetworkError,
  GoogleApiError,
  TokenExpiredError,
  ForbiddenError,
  ResourceNotFoundError,
  SyncTokenExpiredError,
  RateLimitError,
  ServerError,
  InvalidResponseError,
  LocalStorageError,
  ConflictResolutionError,
  OperationCancelledError,
  throwIfCancelled,
  classifyError,
  httpStatusOf,
  retryStatsOf,
  errorMessage,
} from "./errors";
export type { NetworkErrorKind, LocalStorageErrorKind } from "./errors";

// Re-export retry and rate limiting
export {
  computeBackoffDelay,
  isRateLimited,
  retryWithBackoff,
  sleep,
} from "./retry";
export type { SleepFn, BackoffOptions, RetryOptions, RetryResult } from "./retry";
export { SyncRateLimiter } from "./rate-limiter";
export type { RateLimiterOptions } from "./rate-limiter";

// Re-export the remote gateway
export {
  GoogleCalendarClient,
  mapErrorResponse,
  parseErrorReason,
} from "./google-api";
export type {
  FetchFn,
  AccessTokenProvider,
  CalendarGateway,
  ListItemsResult,
  ListCollectionsResult,
  ItemWriteResult,
  GoogleCalendarClientOptions,
} from "./google-api";
export { InMemoryCalendarGateway } from "./in-memory-gateway";
export type {
  GatewayMethod,
  GatewayCall,
  InMemoryGatewayOptions,
} from "./in-memory-gateway";
export {
  RemoteItemSchema,
  ItemListResponseSchema,
  RemoteCollectionSchema,
  CollectionListResponseSchema,
  ApiErrorBodySchema,
} from "./remote-schemas";

// Re-export derivations
export {
  dayKeyFromDate,
  dayKeyFromIso,
  monthDayKeyFromDate,
  monthDayKeyFromIso,
  dateFromDayKey,
  todayDayKey,
} from "./day-key";
export { extractTags } from "./tags";
export { newLocalRecord, editRecord, clearedConflict } from "./record-factory";
export type { RecordDraft } from "./record-factory";
export { sha256, collectionHash } from "./hash";
export { buildTelemetryEntry, RetryTally } from "./telemetry";
export type { TelemetryInput } from "./telemetry";
export {
  itemUid,
  readLinkedRecordId,
  normalizeRemoteItem,
  toHotCacheEntry,
  toArchiveEntry,
  buildRemoteInput,
} from "./normalize";

// Re-export schema and migrations
export {
  LOCAL_STORE_MIGRATION_V1,
  LOCAL_STORE_MIGRATIONS,
  LOCAL_STORE_SCHEMA,
  CURSOR_STORE_MIGRATION_V1,
  CURSOR_STORE_MIGRATIONS,
  CURSOR_STORE_SCHEMA,
  applyMigrations,
  getSchemaVersion,
} from "./schema";
export type { SqlStorageLike, SqlStorageCursorLike, Migration } from "./schema";

// Re-export configuration
export { ConfigSchema, ConfigError, loadConfig } from "./config";
export type { CalsyncConfig } from "./config";
