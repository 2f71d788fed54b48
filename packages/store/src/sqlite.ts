/**
 * @calsync/store -- better-sqlite3 adapter for SqlStorageLike.
 *
 * The store layer is written against the synchronous SqlStorageLike
 * interface from @calsync/shared. This module is the one place that knows
 * about better-sqlite3:
 * - SELECT / PRAGMA / EXPLAIN / WITH statements return rows
 * - Multi-statement scripts (migrations) go through db.exec()
 * - Everything else is a prepared statement whose change count becomes
 *   rowsWritten
 * - Driver exceptions are rethrown as LocalStorageError so callers see one
 *   error family for every persistence failure
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";
import {
  LocalStorageError,
  type LocalStorageErrorKind,
  type SqlStorageCursorLike,
  type SqlStorageLike,
} from "@calsync/shared";

const READ_PREFIXES = ["SELECT", "PRAGMA", "EXPLAIN", "WITH"];

const INTEGRITY_CODES = new Set(["SQLITE_CORRUPT", "SQLITE_NOTADB", "SQLITE_CONSTRAINT"]);

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

/** Wrap a better-sqlite3 handle as SqlStorageLike. */
export function createSqlStorage(db: DatabaseType): SqlStorageLike {
  return {
    exec<T extends Record<string, unknown>>(
      query: string,
      ...bindings: unknown[]
    ): SqlStorageCursorLike<T> {
      const trimmed = query.trim().toUpperCase();
      const isRead = READ_PREFIXES.some((prefix) => trimmed.startsWith(prefix));

      try {
        if (isRead) {
          const rows = db.prepare(query).all(...bindings) as T[];
          return cursorOf(rows, 0);
        }

        // better-sqlite3's prepare() only handles single statements
        if (bindings.length === 0 && isScript(query)) {
          db.exec(query);
          return cursorOf<T>([], 0);
        }

        const info = db.prepare(query).run(...bindings);
        return cursorOf<T>([], info.changes);
      } catch (err) {
        throw toStorageError(err, isRead ? "read" : "write");
      }
    },
  };
}

/** More than one statement, ignoring a trailing semicolon. */
function isScript(query: string): boolean {
  return query.trim().replace(/;$/, "").includes(";");
}

function cursorOf<T>(rows: T[], rowsWritten: number): SqlStorageCursorLike<T> {
  return {
    toArray(): T[] {
      return rows;
    },
    one(): T {
      if (rows.length === 0) {
        throw new LocalStorageError("read", "Expected at least one row, got none");
      }
      return rows[0];
    },
    rowsWritten,
  };
}

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

function sqliteCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Map a driver error to LocalStorageError.
 *
 * SQLITE_FULL -> storage-full, corruption and constraint violations ->
 * integrity, anything else -> the direction of the statement.
 */
export function toStorageError(
  err: unknown,
  direction: Extract<LocalStorageErrorKind, "read" | "write">,
): LocalStorageError {
  if (err instanceof LocalStorageError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  const code = sqliteCode(err);

  if (code === "SQLITE_FULL") {
    return new LocalStorageError("storage-full", message, { cause: err });
  }
  if (code !== undefined && [...INTEGRITY_CODES].some((c) => code.startsWith(c))) {
    return new LocalStorageError("integrity", message, { cause: err });
  }
  return new LocalStorageError(direction, message, { cause: err });
}

// ---------------------------------------------------------------------------
// Opening databases
// ---------------------------------------------------------------------------

/**
 * Open (creating if needed) a SQLite database file. ":memory:" opens an
 * in-memory database.
 */
export function openDatabase(path: string): DatabaseType {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}
