/**
 * @calsync/store -- SQLite-backed repositories for the calsync engine.
 */

export { createSqlStorage, openDatabase, toStorageError } from "./sqlite";
export { RecordStore } from "./records";
export type { RecordListFilter } from "./records";
export { HotCacheStore } from "./hot-cache";
export { ArchiveStore } from "./archive";
export type { ArchiveBoundary } from "./archive";
export { CollectionStore } from "./collections";
export { CursorStore } from "./cursors";
export { ImportProgressStore } from "./import-progress";
export type { ImportProgress, ImportState } from "./import-progress";
export { MetaStore } from "./meta";
export { TelemetryStore, toTelemetryJson } from "./telemetry";
export type { TelemetryListOptions } from "./telemetry";
export { createLocalStore, openLocalStore, openMemoryStore } from "./local-store";
export type { LocalStore, LocalStoreOptions } from "./local-store";
