/**
 * DisplayPaginationCursor -- a bidirectional window over the archive for
 * scrolling display.
 *
 * The buffer is sorted ascending by (startDayKey, uid). Each side keeps a
 * composite boundary key; loads fetch rows strictly beyond it, so a past
 * load and a future load never return the same row.
 *
 * Rows from disabled collections are dropped after the fetch. When that
 * leaves a page short, the raw fetch limit doubles up to maxRawFetch.
 * A side is terminal only when the archive itself returned fewer rows
 * than asked for.
 *
 * Trimming never touches a side whose load is in flight; that load trims
 * when it lands. A load that lands after reset() is dropped.
 *
 * The cursor never writes to the archive.
 */

import {
  DISPLAY_INITIAL_LOAD,
  DISPLAY_MAX_BUFFERED,
  DISPLAY_MAX_RAW_FETCH,
  DISPLAY_PAGE_SIZE,
  type ArchiveEntry,
} from "@calsync/shared";
import type { ArchiveBoundary } from "@calsync/store";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Read side of the archive. Both methods return nearest rows first. */
export interface ArchiveReader {
  fetchBefore(boundary: ArchiveBoundary, limit: number): ArchiveEntry[] | Promise<ArchiveEntry[]>;
  fetchAfter(boundary: ArchiveBoundary, limit: number): ArchiveEntry[] | Promise<ArchiveEntry[]>;
}

export type LoadDirection = "past" | "future";

export interface DisplayCursorOptions {
  archive: ArchiveReader;
  /** Collections whose rows are shown. Read on every fetch. */
  enabledCollections: () => ReadonlySet<string>;
  pageSize?: number;
  initialLoadSize?: number;
  maxBuffered?: number;
  maxRawFetch?: number;
}

export interface LoadResult {
  /** Rows added to the buffer. */
  readonly added: number;
  /** True when the load did not run (busy, terminal, or not initialised). */
  readonly suppressed: boolean;
}

interface FilteredFetch {
  entries: ArchiveEntry[];
  /** Furthest row examined, or null when nothing was examined. */
  boundary: ArchiveBoundary | null;
  exhausted: boolean;
}

const SUPPRESSED: LoadResult = { added: 0, suppressed: true };

function boundaryOf(entry: ArchiveEntry): ArchiveBoundary {
  return { dayKey: entry.startDayKey, uid: entry.uid };
}

function compareEntries(a: ArchiveEntry, b: ArchiveEntry): number {
  if (a.startDayKey !== b.startDayKey) {
    return a.startDayKey - b.startDayKey;
  }
  return a.uid < b.uid ? -1 : a.uid > b.uid ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Cursor
// ---------------------------------------------------------------------------

export class DisplayPaginationCursor {
  private readonly archive: ArchiveReader;
  private readonly enabledCollections: () => ReadonlySet<string>;
  private readonly pageSize: number;
  private readonly initialLoadSize: number;
  private readonly maxBuffered: number;
  private readonly maxRawFetch: number;

  private buffer: ArchiveEntry[] = [];
  private earliest: ArchiveBoundary | null = null;
  private latest: ArchiveBoundary | null = null;
  private reachedEarliest = false;
  private reachedLatest = false;
  private loadingPast = false;
  private loadingFuture = false;
  private generation = 0;

  constructor(options: DisplayCursorOptions) {
    this.archive = options.archive;
    this.enabledCollections = options.enabledCollections;
    this.pageSize = options.pageSize ?? DISPLAY_PAGE_SIZE;
    this.initialLoadSize = options.initialLoadSize ?? DISPLAY_INITIAL_LOAD;
    this.maxBuffered = options.maxBuffered ?? DISPLAY_MAX_BUFFERED;
    this.maxRawFetch = options.maxRawFetch ?? DISPLAY_MAX_RAW_FETCH;
  }

  /** Buffered rows, oldest first. */
  get items(): readonly ArchiveEntry[] {
    return this.buffer;
  }

  get earliestLoadedDayKey(): number | null {
    return this.earliest?.dayKey ?? null;
  }

  get latestLoadedDayKey(): number | null {
    return this.latest?.dayKey ?? null;
  }

  get hasReachedEarliest(): boolean {
    return this.reachedEarliest;
  }

  get hasReachedLatest(): boolean {
    return this.reachedLatest;
  }

  get isLoadingPast(): boolean {
    return this.loadingPast;
  }

  get isLoadingFuture(): boolean {
    return this.loadingFuture;
  }

  reset(): void {
    this.generation++;
    this.buffer = [];
    this.earliest = null;
    this.latest = null;
    this.reachedEarliest = false;
    this.reachedLatest = false;
  }

  /**
   * Replace the buffer with rows around `todayKey`: today onwards in the
   * future direction, strictly before today in the past direction.
   */
  async initialLoad(todayKey: number): Promise<LoadResult> {
    if (this.loadingPast || this.loadingFuture) {
      return SUPPRESSED;
    }
    this.loadingPast = true;
    this.loadingFuture = true;
    try {
      this.reset();
      const generation = this.generation;
      const anchor: ArchiveBoundary = { dayKey: todayKey, uid: "" };
      const future = await this.fetchFiltered("future", anchor, this.initialLoadSize);
      const past = await this.fetchFiltered("past", anchor, this.initialLoadSize);
      if (generation !== this.generation) {
        return { added: 0, suppressed: false };
      }

      this.buffer = [...past.entries, ...future.entries].sort(compareEntries);
      this.earliest = past.boundary ?? anchor;
      this.latest = future.boundary ?? anchor;
      this.reachedEarliest = past.exhausted;
      this.reachedLatest = future.exhausted;
      return { added: this.buffer.length, suppressed: false };
    } finally {
      this.loadingPast = false;
      this.loadingFuture = false;
    }
  }

  loadPast(): Promise<LoadResult> {
    return this.load("past");
  }

  loadFuture(): Promise<LoadResult> {
    return this.load("future");
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async load(direction: LoadDirection): Promise<LoadResult> {
    const past = direction === "past";
    const boundary = past ? this.earliest : this.latest;
    const busy = past ? this.loadingPast : this.loadingFuture;
    const terminal = past ? this.reachedEarliest : this.reachedLatest;
    if (busy || terminal || boundary === null) {
      return SUPPRESSED;
    }

    this.setLoading(direction, true);
    const generation = this.generation;
    try {
      const fetched = await this.fetchFiltered(direction, boundary, this.pageSize);
      if (generation !== this.generation) {
        return { added: 0, suppressed: false };
      }
      const added = this.merge(fetched.entries);

      if (past) {
        this.earliest = fetched.boundary ?? this.earliest;
        this.reachedEarliest = fetched.exhausted;
      } else {
        this.latest = fetched.boundary ?? this.latest;
        this.reachedLatest = fetched.exhausted;
      }

      this.trimIfNeeded(direction);
      return { added, suppressed: false };
    } finally {
      this.setLoading(direction, false);
    }
  }

  private setLoading(direction: LoadDirection, value: boolean): void {
    if (direction === "past") {
      this.loadingPast = value;
    } else {
      this.loadingFuture = value;
    }
  }

  /**
   * Fetch up to `want` enabled rows beyond `boundary`, doubling the raw
   * limit while filtering leaves the page short.
   */
  private async fetchFiltered(
    direction: LoadDirection,
    boundary: ArchiveBoundary,
    want: number,
  ): Promise<FilteredFetch> {
    const enabled = this.enabledCollections();
    let rawLimit = Math.min(want, this.maxRawFetch);

    for (;;) {
      const rows =
        direction === "past"
          ? await this.archive.fetchBefore(boundary, rawLimit)
          : await this.archive.fetchAfter(boundary, rawLimit);
      const matching = rows.filter((row) => enabled.has(row.collectionId));
      const exhausted = rows.length < rawLimit;

      if (matching.length > want) {
        const entries = matching.slice(0, want);
        return { entries, boundary: boundaryOf(entries[entries.length - 1]), exhausted: false };
      }
      if (matching.length === want || exhausted || rawLimit >= this.maxRawFetch) {
        // Every examined row is either taken or disabled, so the boundary
        // moves past all of them.
        const last = rows[rows.length - 1];
        return {
          entries: matching,
          boundary: last === undefined ? null : boundaryOf(last),
          exhausted,
        };
      }
      rawLimit = Math.min(rawLimit * 2, this.maxRawFetch);
    }
  }

  private merge(entries: readonly ArchiveEntry[]): number {
    const known = new Set(this.buffer.map((e) => e.uid));
    const fresh = entries.filter((e) => !known.has(e.uid));
    if (fresh.length > 0) {
      this.buffer = [...this.buffer, ...fresh].sort(compareEntries);
    }
    return fresh.length;
  }

  /** Drop rows on the side opposite the load direction, unless that side is loading. */
  private trimIfNeeded(direction: LoadDirection): void {
    const excess = this.buffer.length - this.maxBuffered;
    const oppositeBusy = direction === "past" ? this.loadingFuture : this.loadingPast;
    if (excess <= 0 || oppositeBusy) {
      return;
    }
    let count = Math.max(this.pageSize, excess);
    if (count >= this.buffer.length) {
      count = excess;
    }

    if (direction === "past") {
      this.buffer = this.buffer.slice(0, this.buffer.length - count);
      this.latest = boundaryOf(this.buffer[this.buffer.length - 1]);
      this.reachedLatest = false;
    } else {
      this.buffer = this.buffer.slice(count);
      this.earliest = boundaryOf(this.buffer[0]);
      this.reachedEarliest = false;
    }
    console.log("timeline: trimmed buffer", { direction, dropped: count, buffered: this.buffer.length });
  }
}
