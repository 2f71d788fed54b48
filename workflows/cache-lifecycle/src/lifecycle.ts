/**
 * CacheLifecycleManager -- keeps the caches bounded and rebuilds them
 * from the remote when they cannot be trusted.
 *
 * Eviction drops hot cache rows outside the sync window. It runs after
 * every completed sync cycle and optionally on its own timer.
 *
 * Recovery phases:
 * 1. clearing: set the recovery flag, wipe every cache, cursor, import
 *    marker and telemetry row, then unlink locally managed records (or
 *    delete them) and delete remote-origin ones
 * 2. listing-collections: refresh the collection list
 * 3. fetching-events: force a full archive import of enabled collections
 * 4. rebuilding-indexes: pull the sync window, then relink records to the
 *    rows whose metadata names them
 * 5. completed: clear the flag
 *
 * A failed or cancelled recovery leaves the flag set, so needsRecovery()
 * keeps reporting it until a later run completes. Each run starts over
 * from clearing.
 */

import { addDays, subDays } from "date-fns";
import {
  DEFAULT_FUTURE_WINDOW_DAYS,
  DEFAULT_PAST_WINDOW_DAYS,
  META_RECOVERY_IN_PROGRESS,
  buildTelemetryEntry,
  errorMessage,
  itemUid,
  throwIfCancelled,
  type CalendarGateway,
  type HotCacheEntry,
} from "@calsync/shared";
import type { LocalStore } from "@calsync/store";
import type { PullResult, SyncOrchestrator } from "@calsync/sync-worker";
import type {
  ArchiveImporter,
  ArchiveImportProgress,
  ArchiveImportResult,
} from "@calsync/workflow-archive-import";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RecoveryPhase =
  | "idle"
  | "clearing"
  | "listing-collections"
  | "fetching-events"
  | "rebuilding-indexes"
  | "completed"
  | "failed";

export interface RecoveryProgress {
  readonly phase: RecoveryPhase;
  /** Present while fetching-events reports import progress. */
  readonly archive?: ArchiveImportProgress;
}

export type RecoveryProgressCallback = (progress: RecoveryProgress) => void;

export interface RecoveryOptions {
  /**
   * Keep locally managed records (unlinked, pending) instead of deleting
   * them. Remote-origin records are always deleted. Defaults to true.
   */
  preserveRecords?: boolean;
  onProgress?: RecoveryProgressCallback;
  signal?: AbortSignal;
}

export interface RecoveryResult {
  /** Locally managed records kept through the clearing phase. */
  preservedRecords: number;
  collections: number;
  archive: ArchiveImportResult;
  pull: PullResult;
  /** Records linked back from archive or hot cache rows after the pull. */
  relinked: number;
}

export interface IntegrityReport {
  records: number;
  hotCacheEntries: number;
  archiveEntries: number;
  collections: number;
  /** Linked records whose remote item is in neither cache. */
  orphanedRecords: number;
  issues: string[];
}

export interface CacheLifecycleOptions {
  store: LocalStore;
  gateway: CalendarGateway;
  orchestrator: SyncOrchestrator;
  importer: ArchiveImporter;
  pastWindowDays?: number;
  futureWindowDays?: number;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Manager
// ---------------------------------------------------------------------------

export class CacheLifecycleManager {
  private readonly store: LocalStore;
  private readonly gateway: CalendarGateway;
  private readonly orchestrator: SyncOrchestrator;
  private readonly importer: ArchiveImporter;
  private readonly pastWindowDays: number;
  private readonly futureWindowDays: number;
  private readonly now: () => Date;

  private currentPhase: RecoveryPhase = "idle";
  private recovery: Promise<RecoveryResult> | null = null;
  private controller: AbortController | null = null;
  private evictionTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: CacheLifecycleOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.orchestrator = options.orchestrator;
    this.importer = options.importer;
    this.pastWindowDays = options.pastWindowDays ?? DEFAULT_PAST_WINDOW_DAYS;
    this.futureWindowDays = options.futureWindowDays ?? DEFAULT_FUTURE_WINDOW_DAYS;
    this.now = options.now ?? (() => new Date());
  }

  get recoveryPhase(): RecoveryPhase {
    return this.currentPhase;
  }

  // -------------------------------------------------------------------------
  // Eviction
  // -------------------------------------------------------------------------

  /** Drop hot cache rows starting outside the sync window around `now`. */
  evictOutsideWindow(now: Date = this.now()): number {
    const evicted = this.store.hotCache.deleteOutside(
      subDays(now, this.pastWindowDays).toISOString(),
      addDays(now, this.futureWindowDays).toISOString(),
    );
    if (evicted > 0) {
      console.log("lifecycle: evicted hot cache entries outside the window", { count: evicted });
    }
    return evicted;
  }

  /** Evict after every completed sync cycle. */
  attachTo(orchestrator: SyncOrchestrator): void {
    orchestrator.onCycleComplete(() => {
      this.evictOutsideWindow();
    });
  }

  startPeriodicEviction(intervalMs: number): void {
    this.stopPeriodicEviction();
    this.evictionTimer = setInterval(() => {
      try {
        this.evictOutsideWindow();
      } catch (err) {
        console.error("lifecycle: periodic eviction failed", { error: errorMessage(err) });
      }
    }, intervalMs);
  }

  stopPeriodicEviction(): void {
    if (this.evictionTimer !== null) {
      clearInterval(this.evictionTimer);
      this.evictionTimer = null;
    }
  }

  // -------------------------------------------------------------------------
  // Integrity
  // -------------------------------------------------------------------------

  checkIntegrity(): IntegrityReport {
    const issues: string[] = [];

    const linked = this.store.records.listLinked();
    let orphanedRecords = 0;
    for (const record of linked) {
      if (record.collectionId === null || record.remoteItemId === null) {
        continue;
      }
      const uid = itemUid(record.collectionId, record.remoteItemId);
      if (this.store.hotCache.get(uid) === null && !this.store.archive.has(uid)) {
        orphanedRecords++;
      }
    }
    if (orphanedRecords > 0) {
      issues.push(`${orphanedRecords} linked record(s) have no cached remote item`);
    }

    const brokenConflicts = this.store.records
      .list({ conflictsOnly: true, includeDeleted: true })
      .filter((r) => r.conflictRemoteUpdatedAt === null || r.conflictRemoteStartAt === null);
    if (brokenConflicts.length > 0) {
      issues.push(`${brokenConflicts.length} conflicted record(s) are missing their remote snapshot`);
    }

    if (this.store.meta.get(META_RECOVERY_IN_PROGRESS) !== null) {
      issues.push("a previous recovery did not complete");
    }

    return {
      records: this.store.records.count(),
      hotCacheEntries: this.store.hotCache.count(),
      archiveEntries: this.store.archive.count(),
      collections: this.store.collections.count(),
      orphanedRecords,
      issues,
    };
  }

  /** True when the record table cannot be read. */
  detectCorruption(): boolean {
    try {
      this.store.records.count();
      return false;
    } catch (err) {
      console.error("lifecycle: record table unreadable", { error: errorMessage(err) });
      return true;
    }
  }

  needsRecovery(): boolean {
    return this.store.meta.get(META_RECOVERY_IN_PROGRESS) !== null || this.detectCorruption();
  }

  // -------------------------------------------------------------------------
  // Recovery
  // -------------------------------------------------------------------------

  /**
   * Rebuild every cache from the remote. A call made while a recovery runs
   * joins it.
   *
   * @throws OperationCancelledError when cancelled between phases
   */
  recoverFromRemote(options: RecoveryOptions = {}): Promise<RecoveryResult> {
    if (this.recovery !== null) {
      return this.recovery;
    }
    const controller = new AbortController();
    this.controller = controller;
    const forwardAbort = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    }
    options.signal?.addEventListener("abort", forwardAbort);

    const recovery = this.runRecovery(options, controller.signal).finally(() => {
      options.signal?.removeEventListener("abort", forwardAbort);
      this.controller = null;
      this.recovery = null;
    });
    this.recovery = recovery;
    return recovery;
  }

  cancelRecovery(): void {
    this.controller?.abort();
    this.importer.cancel();
  }

  private async runRecovery(options: RecoveryOptions, signal: AbortSignal): Promise<RecoveryResult> {
    const preserveRecords = options.preserveRecords ?? true;
    const startedAt = this.now().toISOString();
    const enter = (phase: RecoveryPhase): void => {
      this.currentPhase = phase;
      console.log("lifecycle: recovery phase", { phase });
      options.onProgress?.({ phase });
    };

    try {
      throwIfCancelled(signal, "Recovery");
      enter("clearing");
      const preservedRecords = this.clearLocalState(preserveRecords);

      throwIfCancelled(signal, "Recovery");
      enter("listing-collections");
      const { collections } = await this.gateway.listCollections();
      this.store.collections.replaceFromRemote(collections, this.now().toISOString());
      const enabled = this.store.collections.listEnabled().map((c) => c.collectionId);

      throwIfCancelled(signal, "Recovery");
      enter("fetching-events");
      const archive = await this.importer.importFullArchive(
        enabled,
        (progress) => options.onProgress?.({ phase: "fetching-events", archive: progress }),
        { force: true, signal },
      );

      throwIfCancelled(signal, "Recovery");
      enter("rebuilding-indexes");
      const pull = await this.orchestrator.pullRemoteChanges();
      const relinked = this.relinkRecords();

      this.store.meta.delete(META_RECOVERY_IN_PROGRESS);
      enter("completed");
      await this.appendTelemetry(startedAt, { upserted: archive.completed.length });

      return { preservedRecords, collections: collections.length, archive, pull, relinked };
    } catch (err) {
      enter("failed");
      console.error("lifecycle: recovery failed", { error: errorMessage(err) });
      await this.appendTelemetry(startedAt, {}, err);
      throw err;
    }
  }

  /** @returns how many records were kept */
  private clearLocalState(preserveRecords: boolean): number {
    this.store.meta.set(META_RECOVERY_IN_PROGRESS, this.now().toISOString());
    this.store.hotCache.deleteAll();
    this.store.archive.deleteAll();
    this.store.collections.deleteAll();
    this.store.cursors.clearAll();
    this.store.importProgress.clearAll();
    this.store.telemetry.purge();

    if (!preserveRecords) {
      this.store.records.deleteAll();
      return 0;
    }
    // The pull rebuilds remote-origin records from their items.
    const dropped = this.store.records.deleteByOrigin("remote");
    if (dropped > 0) {
      console.log("lifecycle: dropped remote-origin records", { count: dropped });
    }
    return this.store.records.unlinkLocal();
  }

  /**
   * Link unlinked records to the cached rows whose metadata names them.
   * The pull already relinked rows inside the sync window; this covers the
   * archive beyond it.
   */
  private relinkRecords(): number {
    const now = this.now().toISOString();
    const candidates: HotCacheEntry[] = [
      ...this.store.archive.listLinked(),
      ...this.store.hotCache.list().filter((e) => e.linkedRecordId !== null),
    ];

    let relinked = 0;
    for (const entry of candidates) {
      if (entry.linkedRecordId === null) {
        continue;
      }
      const record = this.store.records.get(entry.linkedRecordId);
      if (record === null || record.remoteItemId !== null) {
        continue;
      }
      if (this.store.records.findByRemote(entry.collectionId, entry.itemId) !== null) {
        continue;
      }
      this.store.records.upsert({
        ...record,
        collectionId: entry.collectionId,
        remoteItemId: entry.itemId,
        lastLinkedRemoteUpdatedAt: entry.updatedAt,
        syncStatus: "synced",
        lastSyncedAt: now,
      });
      relinked++;
    }
    return relinked;
  }

  private async appendTelemetry(
    startedAt: string,
    counts: { upserted?: number },
    error?: unknown,
  ): Promise<void> {
    this.store.telemetry.append(
      await buildTelemetryEntry({
        syncType: "recovery",
        startedAt,
        endedAt: this.now().toISOString(),
        counts,
        error,
      }),
    );
  }
}
