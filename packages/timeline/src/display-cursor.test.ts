import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ArchiveEntry } from "@calsync/shared";
import { openMemoryStore, type ArchiveBoundary, type LocalStore } from "@calsync/store";
import { DisplayPaginationCursor, type ArchiveReader } from "./display-cursor";

/** One archive row on 2025-01-<day>. */
function row(collectionId: string, itemId: string, day: number): ArchiveEntry {
  const dd = String(day).padStart(2, "0");
  return {
    uid: `${collectionId}:${itemId}`,
    collectionId,
    itemId,
    linkedRecordId: null,
    title: itemId,
    body: "",
    startAt: `2025-01-${dd}T09:00:00.000Z`,
    endAt: `2025-01-${dd}T10:00:00.000Z`,
    allDay: false,
    status: "confirmed",
    updatedAt: "2025-01-01T00:00:00.000Z",
    cachedAt: "2025-01-01T00:00:00.000Z",
    startDayKey: 20250100 + day,
    startMonthDayKey: 100 + day,
  };
}

let store: LocalStore;
let limits: { before: number[]; after: number[] };

/** Archive reader that records the raw limits it was asked for. */
function recordingReader(): ArchiveReader {
  return {
    fetchBefore: (boundary: ArchiveBoundary, limit: number) => {
      limits.before.push(limit);
      return store.archive.fetchBefore(boundary, limit);
    },
    fetchAfter: (boundary: ArchiveBoundary, limit: number) => {
      limits.after.push(limit);
      return store.archive.fetchAfter(boundary, limit);
    },
  };
}

function cursor(options: { initialLoadSize?: number; maxRawFetch?: number } = {}): DisplayPaginationCursor {
  return new DisplayPaginationCursor({
    archive: recordingReader(),
    enabledCollections: () => store.collections.enabledIds(),
    pageSize: 3,
    initialLoadSize: options.initialLoadSize ?? 2,
    maxBuffered: 6,
    maxRawFetch: options.maxRawFetch ?? 12,
  });
}

const uids = (c: DisplayPaginationCursor): string[] => c.items.map((e) => e.uid);

beforeEach(() => {
  store = openMemoryStore();
  limits = { before: [], after: [] };
  store.collections.replaceFromRemote(
    [
      { id: "primary", summary: "Me", primary: true },
      { id: "team", summary: "Team", primary: false },
    ],
    "2025-01-01T00:00:00.000Z",
  );
  store.collections.setEnabled("team", false);
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  store.close();
});

describe("DisplayPaginationCursor", () => {
  describe("with one row per day", () => {
    beforeEach(() => {
      for (let day = 1; day <= 10; day++) {
        store.archive.upsert(row("primary", `d${String(day).padStart(2, "0")}`, day));
      }
    });

    it("loads today onwards and strictly before today", async () => {
      const sut = cursor();

      const result = await sut.initialLoad(20250105);

      expect(result).toEqual({ added: 4, suppressed: false });
      expect(uids(sut)).toEqual(["primary:d03", "primary:d04", "primary:d05", "primary:d06"]);
      expect(sut.earliestLoadedDayKey).toBe(20250103);
      expect(sut.latestLoadedDayKey).toBe(20250106);
      expect(sut.hasReachedEarliest).toBe(false);
      expect(sut.hasReachedLatest).toBe(false);
    });

    it("never overlaps and trims the side opposite the load direction", async () => {
      const sut = cursor();
      await sut.initialLoad(20250105);

      expect(await sut.loadPast()).toEqual({ added: 2, suppressed: false });
      expect(sut.hasReachedEarliest).toBe(true);

      expect(await sut.loadFuture()).toEqual({ added: 3, suppressed: false });
      expect(uids(sut)).toEqual([
        "primary:d04",
        "primary:d05",
        "primary:d06",
        "primary:d07",
        "primary:d08",
        "primary:d09",
      ]);
      expect(sut.earliestLoadedDayKey).toBe(20250104);
      expect(sut.hasReachedEarliest).toBe(false);

      await sut.loadFuture();
      expect(uids(sut)).toEqual(["primary:d07", "primary:d08", "primary:d09", "primary:d10"]);
      expect(sut.hasReachedLatest).toBe(true);

      expect(await sut.loadPast()).toEqual({ added: 3, suppressed: false });
      expect(uids(sut)).toEqual(["primary:d04", "primary:d05", "primary:d06", "primary:d07"]);
      expect(sut.latestLoadedDayKey).toBe(20250107);
      expect(sut.hasReachedLatest).toBe(false);
    });

    it("does not fetch again once a side is terminal", async () => {
      const sut = cursor();
      await sut.initialLoad(20250105);
      await sut.loadPast();
      const calls = limits.before.length;

      expect(await sut.loadPast()).toEqual({ added: 0, suppressed: true });
      expect(limits.before).toHaveLength(calls);
    });
  });

  it("suppresses loads before the initial load", async () => {
    expect(await cursor().loadFuture()).toEqual({ added: 0, suppressed: true });
    expect(limits.after).toEqual([]);
  });

  describe("with a disabled collection between enabled rows", () => {
    beforeEach(() => {
      store.archive.upsert(row("primary", "d05", 5));
      for (let day = 6; day <= 11; day++) {
        store.archive.upsert(row("team", `t${day}`, day));
      }
      store.archive.upsert(row("primary", "d12", 12));
    });

    it("doubles the raw limit until a filtered row is found", async () => {
      const sut = cursor({ initialLoadSize: 1 });
      await sut.initialLoad(20250105);
      expect(sut.hasReachedEarliest).toBe(true);
      limits.after = [];

      expect(await sut.loadFuture()).toEqual({ added: 1, suppressed: false });

      expect(limits.after).toEqual([3, 6, 12]);
      expect(uids(sut)).toEqual(["primary:d05", "primary:d12"]);
      expect(sut.hasReachedLatest).toBe(true);
    });

    it("moves the boundary past filtered rows when the ceiling is reached", async () => {
      const sut = cursor({ initialLoadSize: 1, maxRawFetch: 6 });
      await sut.initialLoad(20250105);
      limits.after = [];

      expect(await sut.loadFuture()).toEqual({ added: 0, suppressed: false });
      expect(limits.after).toEqual([3, 6]);
      expect(sut.latestLoadedDayKey).toBe(20250111);
      expect(sut.hasReachedLatest).toBe(false);

      expect(await sut.loadFuture()).toEqual({ added: 1, suppressed: false });
      expect(sut.latestLoadedDayKey).toBe(20250112);
      expect(sut.hasReachedLatest).toBe(true);
    });
  });

  it("suppresses a second load in a direction that is busy", async () => {
    for (let day = 1; day <= 10; day++) {
      store.archive.upsert(row("primary", `d${day}`, day));
    }
    let gate: Promise<void> | null = null;
    let release = (): void => {};
    const sut = new DisplayPaginationCursor({
      archive: {
        fetchAfter: (b, l) => store.archive.fetchAfter(b, l),
        fetchBefore: async (b, l) => {
          if (gate !== null) {
            await gate;
          }
          return store.archive.fetchBefore(b, l);
        },
      },
      enabledCollections: () => store.collections.enabledIds(),
      pageSize: 3,
      initialLoadSize: 2,
    });
    await sut.initialLoad(20250105);
    gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = sut.loadPast();
    expect(sut.isLoadingPast).toBe(true);
    expect(await sut.loadPast()).toEqual({ added: 0, suppressed: true });
    expect(await sut.initialLoad(20250105)).toEqual({ added: 0, suppressed: true });
    expect((await sut.loadFuture()).suppressed).toBe(false);

    release();
    expect(await first).toEqual({ added: 2, suppressed: false });
    expect(sut.isLoadingPast).toBe(false);
  });

  it("keeps the window contiguous when both directions load at once", async () => {
    for (let day = 1; day <= 28; day++) {
      store.archive.upsert(row("primary", `d${String(day).padStart(2, "0")}`, day));
    }
    const sut = cursor({ initialLoadSize: 3 });
    await sut.initialLoad(20250115);

    await Promise.all([sut.loadPast(), sut.loadFuture()]);

    const days = sut.items.map((e) => e.startDayKey);
    expect(days).toHaveLength(6);
    expect(days).toEqual(days.map((_, i) => days[0] + i));
    expect(sut.earliestLoadedDayKey).toBe(days[0]);
    expect(sut.latestLoadedDayKey).toBe(days[5]);
  });

  it("drops a load that lands after a reset", async () => {
    for (let day = 1; day <= 10; day++) {
      store.archive.upsert(row("primary", `d${day}`, day));
    }
    let gate: Promise<void> | null = null;
    let release = (): void => {};
    const sut = new DisplayPaginationCursor({
      archive: {
        fetchBefore: (b, l) => store.archive.fetchBefore(b, l),
        fetchAfter: async (b, l) => {
          if (gate !== null) {
            await gate;
          }
          return store.archive.fetchAfter(b, l);
        },
      },
      enabledCollections: () => store.collections.enabledIds(),
      pageSize: 3,
      initialLoadSize: 2,
    });
    await sut.initialLoad(20250105);
    gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const pending = sut.loadFuture();
    sut.reset();
    release();

    expect(await pending).toEqual({ added: 0, suppressed: false });
    expect(sut.items).toEqual([]);
    expect(sut.latestLoadedDayKey).toBeNull();
  });
});
