/**
 * @calsync/sync-worker -- Two-way sync between local records and the remote.
 *
 * A cycle pushes pending local records first, then pulls every enabled
 * collection:
 * 1. listCollections() refreshes the cached collection list; when it fails
 *    the cached list is pulled instead
 * 2. A collection with a cursor is pulled incrementally; one without a
 *    cursor, or whose cursor the remote rejects with 410, has its hot rows
 *    dropped and is pulled over the sync window instead
 * 3. Pages are applied in order; only the terminal page's cursor is saved
 *
 * Error handling:
 * - Gateway and network errors fail the record (push) or the collection
 *   (pull) they happened on; the rest of the cycle continues
 * - LocalStorageError aborts the cycle
 *
 * Push is held while a recovery is in progress: records are unlinked until
 * the recovery relinks them, and pushing them would duplicate their items.
 *
 * Operations on one orchestrator never overlap. A runFullSyncCycle() call
 * made while a cycle runs joins it instead of starting another.
 */

import { addDays, subDays } from "date-fns";
import {
  DEFAULT_FUTURE_WINDOW_DAYS,
  DEFAULT_PAST_WINDOW_DAYS,
  DEFAULT_SYNC_INTERVAL_MS,
  DEFAULT_TARGET_COLLECTION,
  LocalStorageError,
  META_RECOVERY_IN_PROGRESS,
  RetryTally,
  SyncTokenExpiredError,
  buildRemoteInput,
  buildTelemetryEntry,
  emptyCounts,
  errorMessage,
  itemUid,
  normalizeRemoteItem,
  retryStatsOf,
  toArchiveEntry,
  toHotCacheEntry,
  type ApplyCounts,
  type CalendarGateway,
  type ListQuery,
  type LocalRecord,
  type RemoteItem,
  type TelemetryInput,
} from "@calsync/shared";
import type { LocalStore } from "@calsync/store";
import { addCounts, applyRemoteItems } from "./apply";
import { resolveConflict, type ConflictResolution } from "./conflict";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SyncState = "idle" | "pushing-local" | "pulling-remote" | "completed" | "failed";

export interface PushResult {
  created: number;
  updated: number;
  deleted: number;
  failed: number;
  /** Pending records left unpushed because a recovery is in progress. */
  held: number;
}

export interface CollectionPullResult {
  collectionId: string;
  mode: "incremental" | "full";
  hadCursorFallback: boolean;
  counts: ApplyCounts;
  /** Set when the collection failed; its partial counts are kept. */
  error?: string;
}

export interface PullResult {
  collections: CollectionPullResult[];
  /** Set when the collection list could not be refreshed and the cached one was used. */
  collectionListError?: string;
  counts: ApplyCounts;
}

export interface SyncCycleResult {
  push: PushResult;
  pull: PullResult;
}

/** Runs after every completed cycle. */
export type PostCycleHook = (result: SyncCycleResult) => void | Promise<void>;

export interface SyncOrchestratorOptions {
  store: LocalStore;
  gateway: CalendarGateway;
  /** Collection for records that do not name one. */
  targetCollection?: string;
  pastWindowDays?: number;
  futureWindowDays?: number;
  trashEnabled?: boolean;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class SyncOrchestrator {
  private readonly store: LocalStore;
  private readonly gateway: CalendarGateway;
  private readonly targetCollection: string;
  private readonly pastWindowDays: number;
  private readonly futureWindowDays: number;
  private readonly trashEnabled: boolean;
  private readonly now: () => Date;
  private readonly hooks: PostCycleHook[] = [];

  private currentState: SyncState = "idle";
  private cycle: Promise<SyncCycleResult> | null = null;
  private tail: Promise<unknown> = Promise.resolve();
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: SyncOrchestratorOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.targetCollection = options.targetCollection ?? DEFAULT_TARGET_COLLECTION;
    this.pastWindowDays = options.pastWindowDays ?? DEFAULT_PAST_WINDOW_DAYS;
    this.futureWindowDays = options.futureWindowDays ?? DEFAULT_FUTURE_WINDOW_DAYS;
    this.trashEnabled = options.trashEnabled ?? false;
    this.now = options.now ?? (() => new Date());
  }

  get state(): SyncState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.currentState === "pushing-local" || this.currentState === "pulling-remote";
  }

  onCycleComplete(hook: PostCycleHook): void {
    this.hooks.push(hook);
  }

  // -------------------------------------------------------------------------
  // Triggers
  // -------------------------------------------------------------------------

  /** Push, then pull, then run the post-cycle hooks. */
  runFullSyncCycle(): Promise<SyncCycleResult> {
    if (this.cycle !== null) {
      return this.cycle;
    }
    const cycle = this.exclusive(async () => {
      const push = await this.push();
      const pull = await this.pull(this.pastWindowDays, this.futureWindowDays);
      return { push, pull };
    })
      .then(async (result) => {
        await this.runHooks(result);
        return result;
      })
      .finally(() => {
        this.cycle = null;
      });
    this.cycle = cycle;
    return cycle;
  }

  pushLocalChanges(): Promise<PushResult> {
    return this.exclusive(() => this.push());
  }

  pullRemoteChanges(pastWindowDays?: number, futureWindowDays?: number): Promise<PullResult> {
    return this.exclusive(() =>
      this.pull(pastWindowDays ?? this.pastWindowDays, futureWindowDays ?? this.futureWindowDays),
    );
  }

  /** Move failed records back to pending and push them. */
  retryFailedPushes(): Promise<PushResult> {
    return this.exclusive(() => {
      const reset = this.store.records.resetFailed();
      console.log("sync: retrying failed pushes", { count: reset });
      return this.push();
    });
  }

  pendingFailureCount(): number {
    return this.store.records.countByStatus("failed");
  }

  resolveConflict(recordId: string, resolution: ConflictResolution): LocalRecord {
    return resolveConflict(this.store.records, recordId, resolution, this.isoNow());
  }

  // -------------------------------------------------------------------------
  // Periodic sync
  // -------------------------------------------------------------------------

  /** Run a cycle every `intervalMs`. Replaces a running timer. */
  startPeriodicSync(intervalMs: number = DEFAULT_SYNC_INTERVAL_MS): void {
    this.stopPeriodicSync();
    this.timer = setInterval(() => {
      void this.periodicTick();
    }, intervalMs);
    console.log("sync: periodic sync started", { interval_ms: intervalMs });
  }

  stopPeriodicSync(): void {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
      console.log("sync: periodic sync stopped");
    }
  }

  get periodicSyncActive(): boolean {
    return this.timer !== null;
  }

  private async periodicTick(): Promise<void> {
    if (this.cycle !== null) {
      console.log("sync: periodic tick skipped, cycle already running");
      return;
    }
    try {
      await this.runFullSyncCycle();
    } catch (err) {
      console.error("sync: periodic cycle failed", { error: errorMessage(err) });
    }
  }

  // -------------------------------------------------------------------------
  // Serialization
  // -------------------------------------------------------------------------

  /** Run `fn` after every earlier operation has settled. */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn).then(
      (value) => {
        this.currentState = "completed";
        return value;
      },
      (err: unknown) => {
        this.currentState = "failed";
        console.error("sync: operation failed", { error: errorMessage(err) });
        throw err;
      },
    );
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runHooks(result: SyncCycleResult): Promise<void> {
    for (const hook of this.hooks) {
      try {
        await hook(result);
      } catch (err) {
        console.error("sync: post-cycle hook failed", { error: errorMessage(err) });
      }
    }
  }

  // -------------------------------------------------------------------------
  // Push
  // -------------------------------------------------------------------------

  private async push(): Promise<PushResult> {
    this.currentState = "pushing-local";
    const result: PushResult = { created: 0, updated: 0, deleted: 0, failed: 0, held: 0 };
    if (this.store.meta.get(META_RECOVERY_IN_PROGRESS) !== null) {
      result.held = this.store.records.countByStatus("pending");
      console.warn("sync: push held while a recovery is in progress", { pending: result.held });
      return result;
    }

    const startedAt = this.isoNow();
    const tally = new RetryTally();
    let lastError: unknown;

    const pending = this.store.records.listByStatus("pending");
    for (const record of pending) {
      try {
        await this.pushRecord(record, result, tally);
      } catch (err) {
        if (err instanceof LocalStorageError) {
          await this.appendTelemetry({ syncType: "push", startedAt, retry: tally, error: err });
          throw err;
        }
        if (lastError !== undefined) {
          tally.add(retryStatsOf(lastError));
        }
        lastError = err;
        result.failed++;
        console.warn("sync: push failed", {
          record_id: record.recordId,
          error: errorMessage(err),
        });
        const current = this.store.records.get(record.recordId) ?? record;
        this.store.records.upsert({ ...current, syncStatus: "failed" });
      }
    }

    await this.appendTelemetry({
      syncType: "push",
      startedAt,
      counts: { upserted: result.created + result.updated, deleted: result.deleted },
      retry: tally,
      error: lastError,
    });
    if (pending.length > 0) {
      console.log("sync: push complete", { ...result });
    }
    return result;
  }

  private async pushRecord(record: LocalRecord, result: PushResult, tally: RetryTally): Promise<void> {
    const collectionId = record.collectionId ?? this.targetCollection;

    if (record.isDeleted) {
      if (record.remoteItemId !== null) {
        tally.add(await this.gateway.deleteItem(collectionId, record.remoteItemId));
        this.store.hotCache.delete(itemUid(collectionId, record.remoteItemId));
        result.deleted++;
      }
      this.store.records.upsert({
        ...record,
        remoteItemId: null,
        lastLinkedRemoteUpdatedAt: null,
        syncStatus: "synced",
        lastSyncedAt: this.isoNow(),
      });
      return;
    }

    const input = buildRemoteInput(record);
    if (record.remoteItemId === null) {
      const { item, retry } = await this.gateway.createItem(collectionId, input);
      tally.add(retry);
      this.linkPushed(record, collectionId, item);
      result.created++;
    } else {
      const { item, retry } = await this.gateway.updateItem(collectionId, record.remoteItemId, input);
      tally.add(retry);
      this.linkPushed(record, collectionId, item);
      result.updated++;
    }
  }

  /**
   * Store the ids and version the remote returned. A record edited while
   * the call was in flight stays pending so the edit is pushed next time.
   */
  private linkPushed(pushed: LocalRecord, collectionId: string, item: RemoteItem): void {
    const now = this.isoNow();
    const current = this.store.records.get(pushed.recordId);
    if (current === null) {
      return;
    }
    const normalized = normalizeRemoteItem(collectionId, item);
    const editedSincePush = current.updatedAt !== pushed.updatedAt;

    this.store.records.upsert({
      ...current,
      collectionId,
      remoteItemId: item.id,
      lastLinkedRemoteUpdatedAt: normalized?.updatedAt ?? item.updated ?? now,
      syncStatus: editedSincePush ? "pending" : "synced",
      lastSyncedAt: now,
    });

    if (normalized !== null) {
      this.store.hotCache.upsert(toHotCacheEntry(normalized, now));
      if (this.store.archive.has(normalized.uid)) {
        this.store.archive.upsert(toArchiveEntry(normalized, now));
      }
    }
  }

  // -------------------------------------------------------------------------
  // Pull
  // -------------------------------------------------------------------------

  private async pull(pastWindowDays: number, futureWindowDays: number): Promise<PullResult> {
    this.currentState = "pulling-remote";
    const collectionListError = await this.refreshCollections();

    const now = this.now();
    const window: ListQuery = {
      timeMin: subDays(now, pastWindowDays).toISOString(),
      timeMax: addDays(now, futureWindowDays).toISOString(),
    };

    const results: CollectionPullResult[] = [];
    const counts = emptyCounts();
    for (const collection of this.store.collections.listEnabled()) {
      const result = await this.pullCollection(collection.collectionId, window);
      addCounts(counts, result.counts);
      results.push(result);
    }
    const result: PullResult = { collections: results, counts };
    if (collectionListError !== undefined) {
      result.collectionListError = collectionListError;
    }
    return result;
  }

  /**
   * Replace the cached collection list with the remote one. A gateway
   * failure falls back to the cached list unless there is none.
   *
   * @returns the failure message when the cached list is used
   */
  private async refreshCollections(): Promise<string | undefined> {
    try {
      const { collections } = await this.gateway.listCollections();
      this.store.collections.replaceFromRemote(collections, this.isoNow());
      return undefined;
    } catch (err) {
      if (err instanceof LocalStorageError || this.store.collections.count() === 0) {
        throw err;
      }
      console.warn("sync: collection list failed, pulling the cached list", {
        error: errorMessage(err),
      });
      return errorMessage(err);
    }
  }

  private async pullCollection(collectionId: string, window: ListQuery): Promise<CollectionPullResult> {
    const startedAt = this.isoNow();
    const tally = new RetryTally();
    const result: CollectionPullResult = {
      collectionId,
      mode: "incremental",
      hadCursorFallback: false,
      counts: emptyCounts(),
    };

    try {
      const cursor = this.store.cursors.get(collectionId);
      if (cursor === null) {
        result.mode = "full";
        await this.pullPages(collectionId, window, result.counts, tally);
      } else {
        try {
          await this.pullPages(collectionId, { syncToken: cursor }, result.counts, tally);
        } catch (err) {
          if (!(err instanceof SyncTokenExpiredError)) {
            throw err;
          }
          tally.add(err.retryStats);
          console.log("sync: cursor expired, falling back to a full pull", {
            collection_id: collectionId,
          });
          this.store.cursors.clear(collectionId);
          this.store.hotCache.deleteByCollection(collectionId);
          result.mode = "full";
          result.hadCursorFallback = true;
          await this.pullPages(collectionId, window, result.counts, tally);
        }
      }
    } catch (err) {
      await this.appendTelemetry({
        syncType: result.mode,
        startedAt,
        collectionId,
        counts: result.counts,
        retry: tally,
        hadCursorFallback: result.hadCursorFallback,
        error: err,
      });
      if (err instanceof LocalStorageError) {
        throw err;
      }
      console.warn("sync: pull failed for collection", {
        collection_id: collectionId,
        error: errorMessage(err),
      });
      result.error = errorMessage(err);
      return result;
    }

    await this.appendTelemetry({
      syncType: result.mode,
      startedAt,
      collectionId,
      counts: result.counts,
      retry: tally,
      hadCursorFallback: result.hadCursorFallback,
    });
    return result;
  }

  /** Follow every page of one query, then save the terminal cursor. */
  private async pullPages(
    collectionId: string,
    query: ListQuery,
    counts: ApplyCounts,
    tally: RetryTally,
  ): Promise<void> {
    let pageToken: string | undefined;
    let syncToken: string | undefined;
    do {
      const page = await this.gateway.listItems(collectionId, query, pageToken);
      tally.add(page.retry);
      addCounts(
        counts,
        applyRemoteItems(this.store, collectionId, page.items, {
          trashEnabled: this.trashEnabled,
          now: this.isoNow(),
        }),
      );
      pageToken = page.nextPageToken;
      syncToken = page.nextSyncToken;
    } while (pageToken !== undefined);

    if (syncToken !== undefined) {
      this.store.cursors.set(collectionId, syncToken, this.isoNow());
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private isoNow(): string {
    return this.now().toISOString();
  }

  private async appendTelemetry(input: Omit<TelemetryInput, "endedAt">): Promise<void> {
    this.store.telemetry.append(await buildTelemetryEntry({ ...input, endedAt: this.isoNow() }));
  }
}
