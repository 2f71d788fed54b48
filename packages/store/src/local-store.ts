/**
 * @calsync/store -- Opening the local store.
 *
 * Bundles every repository over two databases: the main store and the
 * cursor store. Migrations run on open.
 */

import type { Database as DatabaseType } from "better-sqlite3";
import {
  applyMigrations,
  CURSOR_STORE_MIGRATIONS,
  CURSOR_STORE_SCHEMA,
  LOCAL_STORE_MIGRATIONS,
  LOCAL_STORE_SCHEMA,
  type SqlStorageLike,
} from "@calsync/shared";
import { ArchiveStore } from "./archive";
import { CollectionStore } from "./collections";
import { CursorStore } from "./cursors";
import { HotCacheStore } from "./hot-cache";
import { ImportProgressStore } from "./import-progress";
import { MetaStore } from "./meta";
import { RecordStore } from "./records";
import { createSqlStorage, openDatabase } from "./sqlite";
import { TelemetryStore } from "./telemetry";

export interface LocalStore {
  readonly records: RecordStore;
  readonly hotCache: HotCacheStore;
  readonly archive: ArchiveStore;
  readonly collections: CollectionStore;
  readonly cursors: CursorStore;
  readonly importProgress: ImportProgressStore;
  readonly telemetry: TelemetryStore;
  readonly meta: MetaStore;
  close(): void;
}

export interface LocalStoreOptions {
  /** Main database file, or ":memory:". */
  dbPath: string;
  /** Cursor database file, or ":memory:". */
  cursorDbPath: string;
}

/** Build the repositories over already-open SqlStorageLike handles. */
export function createLocalStore(
  sql: SqlStorageLike,
  cursorSql: SqlStorageLike,
  close: () => void = () => {},
): LocalStore {
  applyMigrations(sql, LOCAL_STORE_MIGRATIONS, LOCAL_STORE_SCHEMA);
  applyMigrations(cursorSql, CURSOR_STORE_MIGRATIONS, CURSOR_STORE_SCHEMA);

  return {
    records: new RecordStore(sql),
    hotCache: new HotCacheStore(sql),
    archive: new ArchiveStore(sql),
    collections: new CollectionStore(sql),
    cursors: new CursorStore(cursorSql),
    importProgress: new ImportProgressStore(sql),
    telemetry: new TelemetryStore(sql),
    meta: new MetaStore(sql),
    close,
  };
}

/** Open both database files and migrate them. */
export function openLocalStore(options: LocalStoreOptions): LocalStore {
  const db: DatabaseType = openDatabase(options.dbPath);
  const cursorDb: DatabaseType = openDatabase(options.cursorDbPath);
  return createLocalStore(createSqlStorage(db), createSqlStorage(cursorDb), () => {
    db.close();
    cursorDb.close();
  });
}

/** A fresh in-memory store. */
export function openMemoryStore(): LocalStore {
  return openLocalStore({ dbPath: ":memory:", cursorDbPath: ":memory:" });
}
