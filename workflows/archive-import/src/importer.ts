/**
 * ArchiveImporter -- imports the full remote history into the archive.
 *
 * Steps per collection, sequentially:
 * 1. Skip when the collection is already marked completed (unless forced)
 *    or an import of it is already running in this process
 * 2. Mark it in_progress and resume after the last committed sub-range
 * 3. For each remaining sub-range: list every page, upsert archive rows
 *    (cancelled items delete theirs), report progress, commit the range
 *    index, then pause before the next range
 * 4. Clear the progress row and mark the collection completed
 *
 * Partial failures: a failing sub-range stops that collection only. Its
 * committed ranges are kept so the next run resumes after them.
 *
 * Cancellation is checked between sub-ranges, never in the middle of a
 * call. A cancelled run keeps its committed ranges and throws
 * OperationCancelledError.
 */

import {
  ARCHIVE_RANGE_DELAY_MS,
  OperationCancelledError,
  RetryTally,
  buildTelemetryEntry,
  emptyCounts,
  errorMessage,
  normalizeRemoteItem,
  sleep,
  throwIfCancelled,
  toArchiveEntry,
  type ApplyCounts,
  type CalendarGateway,
  type SleepFn,
} from "@calsync/shared";
import type { LocalStore } from "@calsync/store";
import { planImportRanges, type ImportRange } from "./ranges";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ArchiveImportProgress {
  readonly collectionId: string;
  /** Sub-ranges committed so far, including ones from earlier runs. */
  readonly fetchedRanges: number;
  readonly totalRanges: number;
  /** Rows written in this run. */
  readonly upserted: number;
  readonly deleted: number;
}

export type ArchiveProgressCallback = (progress: ArchiveImportProgress) => void;

export interface ArchiveImportRunOptions {
  /** Re-import collections already marked completed. */
  force?: boolean;
  signal?: AbortSignal;
}

export interface ArchiveImportResult {
  completed: string[];
  failed: Array<{ collectionId: string; error: string }>;
  skipped: string[];
}

export interface ArchiveImporterOptions {
  store: LocalStore;
  gateway: CalendarGateway;
  /** YYYY-MM-DD start of the archive window. */
  epoch?: string;
  futureDays?: number;
  rangeMonths?: number;
  rangeDelayMs?: number;
  sleepFn?: SleepFn;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Importer
// ---------------------------------------------------------------------------

export class ArchiveImporter {
  private readonly store: LocalStore;
  private readonly gateway: CalendarGateway;
  private readonly options: ArchiveImporterOptions;
  private readonly rangeDelayMs: number;
  private readonly sleepFn: SleepFn;
  private readonly now: () => Date;

  private readonly active = new Set<string>();
  private readonly controllers = new Set<AbortController>();

  constructor(options: ArchiveImporterOptions) {
    this.store = options.store;
    this.gateway = options.gateway;
    this.options = options;
    this.rangeDelayMs = options.rangeDelayMs ?? ARCHIVE_RANGE_DELAY_MS;
    this.sleepFn = options.sleepFn ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  /** True while any collection (or the given one) is importing. */
  isImporting(collectionId?: string): boolean {
    return collectionId === undefined ? this.active.size > 0 : this.active.has(collectionId);
  }

  /** Cancel every running import at its next checkpoint. */
  cancel(): void {
    for (const controller of this.controllers) {
      controller.abort();
    }
  }

  /**
   * Import the given collections, or every enabled one.
   *
   * @throws OperationCancelledError when cancelled
   */
  async importFullArchive(
    collectionIds?: readonly string[],
    onProgress?: ArchiveProgressCallback,
    runOptions: ArchiveImportRunOptions = {},
  ): Promise<ArchiveImportResult> {
    const controller = new AbortController();
    this.controllers.add(controller);
    const external = runOptions.signal;
    const forwardAbort = (): void => controller.abort();
    if (external?.aborted) {
      controller.abort();
    }
    external?.addEventListener("abort", forwardAbort);

    const result: ArchiveImportResult = { completed: [], failed: [], skipped: [] };
    try {
      const ids = collectionIds ?? (await this.enabledCollectionIds());
      const ranges = planImportRanges(this.now(), {
        epoch: this.options.epoch,
        futureDays: this.options.futureDays,
        months: this.options.rangeMonths,
      });

      for (const collectionId of ids) {
        throwIfCancelled(controller.signal, "Archive import");

        if (!runOptions.force && this.store.importProgress.getState(collectionId) === "completed") {
          result.skipped.push(collectionId);
          continue;
        }
        if (this.active.has(collectionId)) {
          console.log("archive-import: collection already importing, skipped", {
            collection_id: collectionId,
          });
          result.skipped.push(collectionId);
          continue;
        }

        this.active.add(collectionId);
        try {
          await this.importCollection(collectionId, ranges, controller.signal, onProgress);
          result.completed.push(collectionId);
        } catch (err) {
          if (err instanceof OperationCancelledError) {
            throw err;
          }
          console.warn("archive-import: collection failed", {
            collection_id: collectionId,
            error: errorMessage(err),
          });
          result.failed.push({ collectionId, error: errorMessage(err) });
        } finally {
          this.active.delete(collectionId);
        }
      }
    } finally {
      external?.removeEventListener("abort", forwardAbort);
      this.controllers.delete(controller);
    }

    console.log("archive-import: run finished", {
      completed: result.completed.length,
      failed: result.failed.length,
      skipped: result.skipped.length,
    });
    return result;
  }

  private async enabledCollectionIds(): Promise<string[]> {
    if (this.store.collections.count() === 0) {
      const { collections } = await this.gateway.listCollections();
      this.store.collections.replaceFromRemote(collections, this.now().toISOString());
    }
    return this.store.collections.listEnabled().map((c) => c.collectionId);
  }

  // -------------------------------------------------------------------------
  // One collection
  // -------------------------------------------------------------------------

  private async importCollection(
    collectionId: string,
    ranges: readonly ImportRange[],
    signal: AbortSignal,
    onProgress: ArchiveProgressCallback | undefined,
  ): Promise<void> {
    const startedAt = this.now().toISOString();
    const counts = emptyCounts();
    const tally = new RetryTally();
    const progress = this.store.importProgress;

    progress.setState(collectionId, "in_progress", startedAt);
    const saved = progress.getProgress(collectionId);
    const firstRange = saved !== null ? saved.completedRangeIndex + 1 : 0;
    if (firstRange > 0) {
      console.log("archive-import: resuming", {
        collection_id: collectionId,
        next_range: firstRange,
        total_ranges: ranges.length,
      });
    }

    try {
      for (let index = firstRange; index < ranges.length; index++) {
        throwIfCancelled(signal, "Archive import");

        await this.importRange(collectionId, ranges[index], counts, tally);
        progress.saveProgress(collectionId, index, ranges.length, this.now().toISOString());
        onProgress?.({
          collectionId,
          fetchedRanges: index + 1,
          totalRanges: ranges.length,
          upserted: counts.upserted,
          deleted: counts.deleted,
        });

        throwIfCancelled(signal, "Archive import");
        await this.sleepFn(this.rangeDelayMs);
        throwIfCancelled(signal, "Archive import");
      }
    } catch (err) {
      progress.clearState(collectionId);
      await this.appendTelemetry(collectionId, startedAt, counts, tally, err);
      throw err;
    }

    progress.clearProgress(collectionId);
    progress.setState(collectionId, "completed", this.now().toISOString());
    await this.appendTelemetry(collectionId, startedAt, counts, tally);
  }

  private async importRange(
    collectionId: string,
    range: ImportRange,
    counts: ApplyCounts,
    tally: RetryTally,
  ): Promise<void> {
    let pageToken: string | undefined;
    do {
      const page = await this.gateway.listItems(collectionId, range, pageToken);
      tally.add(page.retry);
      const cachedAt = this.now().toISOString();

      for (const raw of page.items) {
        const item = normalizeRemoteItem(collectionId, raw);
        if (item === null) {
          counts.skipped++;
        } else if (item.status === "cancelled") {
          this.store.archive.delete(item.uid);
          counts.deleted++;
        } else {
          this.store.archive.upsert(toArchiveEntry(item, cachedAt));
          counts.upserted++;
        }
      }
      pageToken = page.nextPageToken;
    } while (pageToken !== undefined);
  }

  private async appendTelemetry(
    collectionId: string,
    startedAt: string,
    counts: ApplyCounts,
    tally: RetryTally,
    error?: unknown,
  ): Promise<void> {
    this.store.telemetry.append(
      await buildTelemetryEntry({
        syncType: "archive",
        startedAt,
        endedAt: this.now().toISOString(),
        collectionId,
        counts,
        retry: tally,
        error,
      }),
    );
  }
}
