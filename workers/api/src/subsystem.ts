/**
 * SyncSubsystem -- the single entry point a UI or the HTTP surface drives.
 *
 * Wires one orchestrator, one archive importer and one lifecycle manager
 * over a shared store and gateway. Eviction runs after every completed
 * sync cycle.
 *
 * Local edits go through here too: every create, edit and delete leaves
 * the record pending so the next push carries it to the remote.
 */

import {
  DEFAULT_FUTURE_WINDOW_DAYS,
  DEFAULT_PAST_WINDOW_DAYS,
  editRecord,
  newLocalRecord,
  type CalendarGateway,
  type CollectionEntry,
  type LocalRecord,
  type RecordDraft,
  type SleepFn,
  type SyncTelemetryEntry,
} from "@calsync/shared";
import type { LocalStore, RecordListFilter, TelemetryListOptions } from "@calsync/store";
import { DisplayPaginationCursor } from "@calsync/timeline";
import {
  SyncOrchestrator,
  type ConflictResolution,
  type PullResult,
  type PushResult,
  type SyncCycleResult,
  type SyncState,
} from "@calsync/sync-worker";
import {
  ArchiveImporter,
  type ArchiveImportResult,
  type ArchiveImportRunOptions,
  type ArchiveProgressCallback,
} from "@calsync/workflow-archive-import";
import {
  CacheLifecycleManager,
  type IntegrityReport,
  type RecoveryPhase,
  type RecoveryProgressCallback,
  type RecoveryResult,
} from "@calsync/workflow-cache-lifecycle";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A record or collection id that does not exist. */
export class NotFoundError extends Error {
  readonly kind: "record" | "collection";
  readonly id: string;

  constructor(kind: "record" | "collection", id: string) {
    super(`${kind === "record" ? "Record" : "Collection"} ${id} not found`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

export interface SubsystemStatus {
  state: SyncState;
  periodicSync: boolean;
  archiveImporting: boolean;
  recoveryPhase: RecoveryPhase;
  pendingRecords: number;
  failedRecords: number;
  conflicts: number;
  needsRecovery: boolean;
}

export interface SyncSubsystemOptions {
  store: LocalStore;
  gateway: CalendarGateway;
  targetCollection?: string;
  pastWindowDays?: number;
  futureWindowDays?: number;
  trashEnabled?: boolean;
  /** YYYY-MM-DD start of the archive import window. */
  archiveEpoch?: string;
  /** Pause between archive sub-ranges. */
  sleepFn?: SleepFn;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Subsystem
// ---------------------------------------------------------------------------

export class SyncSubsystem {
  readonly orchestrator: SyncOrchestrator;
  readonly importer: ArchiveImporter;
  readonly lifecycle: CacheLifecycleManager;

  private readonly store: LocalStore;
  private readonly now: () => Date;

  constructor(options: SyncSubsystemOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    const pastWindowDays = options.pastWindowDays ?? DEFAULT_PAST_WINDOW_DAYS;
    const futureWindowDays = options.futureWindowDays ?? DEFAULT_FUTURE_WINDOW_DAYS;

    this.orchestrator = new SyncOrchestrator({
      store: options.store,
      gateway: options.gateway,
      targetCollection: options.targetCollection,
      pastWindowDays,
      futureWindowDays,
      trashEnabled: options.trashEnabled,
      now: this.now,
    });
    this.importer = new ArchiveImporter({
      store: options.store,
      gateway: options.gateway,
      epoch: options.archiveEpoch,
      sleepFn: options.sleepFn,
      now: this.now,
    });
    this.lifecycle = new CacheLifecycleManager({
      store: options.store,
      gateway: options.gateway,
      orchestrator: this.orchestrator,
      importer: this.importer,
      pastWindowDays,
      futureWindowDays,
      now: this.now,
    });
    this.lifecycle.attachTo(this.orchestrator);
  }

  // -------------------------------------------------------------------------
  // Sync triggers
  // -------------------------------------------------------------------------

  runFullSyncCycle(): Promise<SyncCycleResult> {
    return this.orchestrator.runFullSyncCycle();
  }

  pushLocalChanges(): Promise<PushResult> {
    return this.orchestrator.pushLocalChanges();
  }

  pullRemoteChanges(pastWindowDays?: number, futureWindowDays?: number): Promise<PullResult> {
    return this.orchestrator.pullRemoteChanges(pastWindowDays, futureWindowDays);
  }

  retryFailedPushes(): Promise<PushResult> {
    return this.orchestrator.retryFailedPushes();
  }

  startPeriodicSync(intervalMs?: number): void {
    this.orchestrator.startPeriodicSync(intervalMs);
  }

  stopPeriodicSync(): void {
    this.orchestrator.stopPeriodicSync();
  }

  resolveConflict(recordId: string, resolution: ConflictResolution): LocalRecord {
    this.requireRecord(recordId);
    return this.orchestrator.resolveConflict(recordId, resolution);
  }

  // -------------------------------------------------------------------------
  // Archive and recovery
  // -------------------------------------------------------------------------

  importFullArchive(
    collectionIds?: readonly string[],
    onProgress?: ArchiveProgressCallback,
    options?: ArchiveImportRunOptions,
  ): Promise<ArchiveImportResult> {
    return this.importer.importFullArchive(collectionIds, onProgress, options);
  }

  cancelArchiveImport(): void {
    this.importer.cancel();
  }

  recoverFromRemote(
    preserveRecords = true,
    onProgress?: RecoveryProgressCallback,
  ): Promise<RecoveryResult> {
    return this.lifecycle.recoverFromRemote({ preserveRecords, onProgress });
  }

  cancelRecovery(): void {
    this.lifecycle.cancelRecovery();
  }

  checkIntegrity(): IntegrityReport {
    return this.lifecycle.checkIntegrity();
  }

  /** A display window over the archive, limited to enabled collections. */
  createDisplayCursor(): DisplayPaginationCursor {
    return new DisplayPaginationCursor({
      archive: this.store.archive,
      enabledCollections: () => this.store.collections.enabledIds(),
    });
  }

  // -------------------------------------------------------------------------
  // Local records
  // -------------------------------------------------------------------------

  createRecord(draft: RecordDraft): LocalRecord {
    const record = newLocalRecord(draft, this.now().toISOString());
    this.store.records.upsert(record);
    return record;
  }

  getRecord(recordId: string): LocalRecord {
    return this.requireRecord(recordId);
  }

  updateRecord(recordId: string, changes: Partial<RecordDraft>): LocalRecord {
    const record = this.requireRecord(recordId);
    if (record.isDeleted) {
      throw new NotFoundError("record", recordId);
    }
    const edited = editRecord(record, changes, this.now().toISOString());
    this.store.records.upsert(edited);
    return edited;
  }

  /** Soft delete. The next push removes the remote item. */
  deleteRecord(recordId: string): LocalRecord {
    const record = this.requireRecord(recordId);
    if (record.isDeleted) {
      return record;
    }
    const now = this.now().toISOString();
    const deleted: LocalRecord = {
      ...record,
      isDeleted: true,
      deletedAt: now,
      syncStatus: "pending",
      updatedAt: now,
    };
    this.store.records.upsert(deleted);
    return deleted;
  }

  listRecords(filter: RecordListFilter = {}): LocalRecord[] {
    return this.store.records.list(filter);
  }

  // -------------------------------------------------------------------------
  // Collections, status, telemetry
  // -------------------------------------------------------------------------

  listCollections(): CollectionEntry[] {
    return this.store.collections.list();
  }

  setCollectionEnabled(collectionId: string, enabled: boolean): CollectionEntry {
    this.store.collections.setEnabled(collectionId, enabled);
    const collection = this.store.collections.get(collectionId);
    if (collection === null) {
      throw new NotFoundError("collection", collectionId);
    }
    return collection;
  }

  status(): SubsystemStatus {
    return {
      state: this.orchestrator.state,
      periodicSync: this.orchestrator.periodicSyncActive,
      archiveImporting: this.importer.isImporting(),
      recoveryPhase: this.lifecycle.recoveryPhase,
      pendingRecords: this.store.records.countByStatus("pending"),
      failedRecords: this.orchestrator.pendingFailureCount(),
      conflicts: this.store.records.countConflicts(),
      needsRecovery: this.lifecycle.needsRecovery(),
    };
  }

  telemetry(options: TelemetryListOptions = {}): SyncTelemetryEntry[] {
    return this.store.telemetry.list(options);
  }

  /** Stop every timer and close the store. */
  close(): void {
    this.orchestrator.stopPeriodicSync();
    this.lifecycle.stopPeriodicEviction();
    this.importer.cancel();
    this.store.close();
  }

  private requireRecord(recordId: string): LocalRecord {
    const record = this.store.records.get(recordId);
    if (record === null) {
      throw new NotFoundError("record", recordId);
    }
    return record;
  }
}
