/**
 * @calsync/shared -- SQLite schema definitions and migration runner.
 *
 * Two databases:
 * - the local store (records, hot cache, archive, collections, import
 *   state, telemetry, meta flags)
 * - the cursor store (sync cursors), kept in its own file so clearing or
 *   losing one never silently invalidates the other
 *
 * The migration runner tracks a version per schema in a _schema_meta table
 * and applies pending migrations sequentially through the synchronous
 * SqlStorageLike.exec() interface.
 */

// ---------------------------------------------------------------------------
// SqlStorage compatibility types
// ---------------------------------------------------------------------------

/**
 * Minimal synchronous SQL interface the store layer is written against.
 * @calsync/store adapts better-sqlite3 to it; nothing else in the engine
 * touches the driver directly.
 */
export interface SqlStorageLike {
  exec<T extends Record<string, unknown>>(
    query: string,
    ...bindings: unknown[]
  ): SqlStorageCursorLike<T>;
}

export interface SqlStorageCursorLike<T> {
  toArray(): T[];
  one(): T;
  /** Rows changed by an INSERT / UPDATE / DELETE. 0 for reads and scripts. */
  readonly rowsWritten: number;
}

// ---------------------------------------------------------------------------
// Migration types
// ---------------------------------------------------------------------------

/** A single schema migration step. */
export interface Migration {
  /** Monotonically increasing version number starting at 1. */
  readonly version: number;
  /** The SQL to execute for this migration. */
  readonly sql: string;
  /** Human-readable description of what this migration does. */
  readonly description: string;
}

// ---------------------------------------------------------------------------
// Local store schema
// ---------------------------------------------------------------------------

export const LOCAL_STORE_MIGRATION_V1 = `
-- Locally owned scheduling records
CREATE TABLE records (
  record_id                      TEXT PRIMARY KEY,
  collection_id                  TEXT,
  remote_item_id                 TEXT,
  title                          TEXT NOT NULL DEFAULT '',
  body                           TEXT NOT NULL DEFAULT '',
  start_at                       TEXT NOT NULL,
  end_at                         TEXT NOT NULL,
  all_day                        INTEGER NOT NULL DEFAULT 0,
  tags                           TEXT NOT NULL DEFAULT '[]',
  sync_status                    TEXT NOT NULL DEFAULT 'pending'
                                 CHECK(sync_status IN ('synced', 'pending', 'failed')),
  last_synced_at                 TEXT,
  is_deleted                     INTEGER NOT NULL DEFAULT 0,
  deleted_at                     TEXT,
  created_at                     TEXT NOT NULL,
  updated_at                     TEXT NOT NULL,
  origin                         TEXT NOT NULL DEFAULT 'local'
                                 CHECK(origin IN ('local', 'remote')),
  last_linked_remote_updated_at  TEXT,
  has_conflict                   INTEGER NOT NULL DEFAULT 0,
  conflict_detected_at           TEXT,
  conflict_remote_title          TEXT,
  conflict_remote_body           TEXT,
  conflict_remote_updated_at     TEXT,
  conflict_remote_start_at       TEXT
);

CREATE UNIQUE INDEX idx_records_remote ON records(collection_id, remote_item_id)
  WHERE remote_item_id IS NOT NULL;
CREATE INDEX idx_records_status ON records(sync_status);
CREATE INDEX idx_records_conflict ON records(has_conflict) WHERE has_conflict = 1;

-- Remote items inside the active sync window
CREATE TABLE hot_cache (
  uid               TEXT PRIMARY KEY,
  collection_id     TEXT NOT NULL,
  item_id           TEXT NOT NULL,
  linked_record_id  TEXT,
  title             TEXT NOT NULL DEFAULT '',
  body              TEXT NOT NULL DEFAULT '',
  start_at          TEXT NOT NULL,
  end_at            TEXT NOT NULL,
  all_day           INTEGER NOT NULL DEFAULT 0,
  status            TEXT NOT NULL DEFAULT 'confirmed',
  updated_at        TEXT NOT NULL,
  cached_at         TEXT NOT NULL
);

CREATE INDEX idx_hot_cache_start ON hot_cache(start_at);
CREATE INDEX idx_hot_cache_record ON hot_cache(linked_record_id);

-- Every remote item in the remote history
CREATE TABLE archive (
  uid                  TEXT PRIMARY KEY,
  collection_id        TEXT NOT NULL,
  item_id              TEXT NOT NULL,
  linked_record_id     TEXT,
  title                TEXT NOT NULL DEFAULT '',
  body                 TEXT NOT NULL DEFAULT '',
  start_at             TEXT NOT NULL,
  end_at               TEXT NOT NULL,
  all_day              INTEGER NOT NULL DEFAULT 0,
  status               TEXT NOT NULL DEFAULT 'confirmed',
  updated_at           TEXT NOT NULL,
  cached_at            TEXT NOT NULL,
  start_day_key        INTEGER NOT NULL,
  start_month_day_key  INTEGER NOT NULL
);

CREATE INDEX idx_archive_day ON archive(start_day_key, uid);
CREATE INDEX idx_archive_month_day ON archive(start_month_day_key);
CREATE INDEX idx_archive_record ON archive(linked_record_id);

-- Cached collection list
CREATE TABLE collections (
  collection_id  TEXT PRIMARY KEY,
  display_name   TEXT NOT NULL DEFAULT '',
  is_primary     INTEGER NOT NULL DEFAULT 0,
  color          TEXT,
  is_enabled     INTEGER NOT NULL DEFAULT 1,
  updated_at     TEXT NOT NULL
);

-- Archive import resume point per collection
CREATE TABLE archive_import_progress (
  collection_id          TEXT PRIMARY KEY,
  completed_range_index  INTEGER NOT NULL,
  total_ranges           INTEGER NOT NULL,
  updated_at             TEXT NOT NULL
);

-- Archive import in-progress / completed markers
CREATE TABLE archive_import_state (
  collection_id  TEXT PRIMARY KEY,
  state          TEXT NOT NULL CHECK(state IN ('in_progress', 'completed')),
  updated_at     TEXT NOT NULL
);

-- Append-only sync telemetry
CREATE TABLE sync_telemetry (
  entry_id              TEXT PRIMARY KEY,
  sync_type             TEXT NOT NULL,
  started_at            TEXT NOT NULL,
  ended_at              TEXT NOT NULL,
  collection_hash       TEXT,
  upserted              INTEGER NOT NULL DEFAULT 0,
  deleted               INTEGER NOT NULL DEFAULT 0,
  skipped               INTEGER NOT NULL DEFAULT 0,
  conflicted            INTEGER NOT NULL DEFAULT 0,
  retry_count           INTEGER NOT NULL DEFAULT 0,
  total_wait_ms         INTEGER NOT NULL DEFAULT 0,
  had_cursor_fallback   INTEGER NOT NULL DEFAULT 0,
  had_rate_limit_retry  INTEGER NOT NULL DEFAULT 0,
  http_status           INTEGER,
  error_kind            TEXT,
  error_message         TEXT
);

CREATE INDEX idx_sync_telemetry_started ON sync_telemetry(started_at);

-- Process-level flags (e.g. recovery in progress)
CREATE TABLE meta (
  key    TEXT PRIMARY KEY,
  value  TEXT NOT NULL
);
`;

/** Ordered migrations for the local store. */
export const LOCAL_STORE_MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    sql: LOCAL_STORE_MIGRATION_V1,
    description: "Initial local store schema: records, caches, import state, telemetry",
  },
] as const;

// ---------------------------------------------------------------------------
// Cursor store schema
// ---------------------------------------------------------------------------

export const CURSOR_STORE_MIGRATION_V1 = `
CREATE TABLE sync_cursors (
  collection_id  TEXT PRIMARY KEY,
  sync_token     TEXT NOT NULL,
  updated_at     TEXT NOT NULL
);
`;

/** Ordered migrations for the cursor store. */
export const CURSOR_STORE_MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    sql: CURSOR_STORE_MIGRATION_V1,
    description: "Initial cursor store schema: sync_cursors",
  },
] as const;

// ---------------------------------------------------------------------------
// Migration runner
// ---------------------------------------------------------------------------

/**
 * Apply all pending migrations for a schema.
 *
 * Idempotent: running twice applies nothing the second time.
 *
 * @param schemaName - Prefix of the version key in _schema_meta
 */
export function applyMigrations(
  sql: SqlStorageLike,
  migrations: readonly Migration[],
  schemaName: string,
): void {
  sql.exec(
    "CREATE TABLE IF NOT EXISTS _schema_meta (key TEXT PRIMARY KEY, value TEXT)",
  );

  const currentVersion = getSchemaVersion(sql, schemaName);
  const metaKey = `${schemaName}_version`;

  for (const migration of migrations) {
    if (migration.version <= currentVersion) {
      continue;
    }

    sql.exec(migration.sql);

    // Update version after each successful migration
    sql.exec(
      "INSERT OR REPLACE INTO _schema_meta (key, value) VALUES (?, ?)",
      metaKey,
      String(migration.version),
    );
  }
}

/**
 * Current schema version, or 0 when nothing has been applied yet.
 */
export function getSchemaVersion(
  sql: SqlStorageLike,
  schemaName: string,
): number {
  try {
    const rows = sql
      .exec<{ value: string | null }>(
        "SELECT value FROM _schema_meta WHERE key = ?",
        `${schemaName}_version`,
      )
      .toArray();

    if (rows.length > 0 && rows[0].value !== null) {
      return parseInt(rows[0].value, 10);
    }
    return 0;
  } catch {
    // _schema_meta table doesn't exist yet
    return 0;
  }
}

/** Schema name of the local store in _schema_meta. */
export const LOCAL_STORE_SCHEMA = "local_store";

/** Schema name of the cursor store in _schema_meta. */
export const CURSOR_STORE_SCHEMA = "cursor_store";
