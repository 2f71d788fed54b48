/**
 * Tests for ArchiveImporter: range walking, resume after cancellation,
 * per-collection failure, completion markers.
 *
 * The window is 2020-01-01 .. 2025-01-01 with no future extension, which
 * gives exactly ten six-month sub-ranges.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  InMemoryCalendarGateway,
  OperationCancelledError,
  ServerError,
  type RemoteItem,
} from "@calsync/shared";
import { openMemoryStore, type LocalStore } from "@calsync/store";
import { ArchiveImporter, type ArchiveImportProgress } from "./importer";

const NOW = new Date("2025-01-01T00:00:00.000Z");

function timedItem(id: string, start: string, overrides: Partial<RemoteItem> = {}): RemoteItem {
  return {
    id,
    summary: id,
    start: { dateTime: start },
    end: { dateTime: start },
    status: "confirmed",
    updated: "2024-12-01T00:00:00.000Z",
    ...overrides,
  };
}

let store: LocalStore;
let gateway: InMemoryCalendarGateway;
let sleeps: number[];

function importer(): ArchiveImporter {
  return new ArchiveImporter({
    store,
    gateway,
    epoch: "2020-01-01",
    futureDays: 0,
    sleepFn: async (ms) => {
      sleeps.push(ms);
    },
    now: () => NOW,
  });
}

beforeEach(() => {
  store = openMemoryStore();
  gateway = new InMemoryCalendarGateway({ now: () => NOW });
  sleeps = [];
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  store.close();
});

describe("ArchiveImporter", () => {
  it("walks every sub-range, writes archive rows, and marks completion", async () => {
    gateway.putItem("primary", timedItem("evt-1", "2021-03-10T10:00:00.000Z"));
    gateway.putItem(
      "primary",
      timedItem("evt-2", "2023-05-01T10:00:00.000Z", { status: "cancelled" }),
    );
    store.archive.upsert({
      uid: "primary:evt-2",
      collectionId: "primary",
      itemId: "evt-2",
      linkedRecordId: null,
      title: "evt-2",
      body: "",
      startAt: "2023-05-01T10:00:00.000Z",
      endAt: "2023-05-01T10:00:00.000Z",
      allDay: false,
      status: "confirmed",
      updatedAt: "2024-01-01T00:00:00.000Z",
      cachedAt: "2024-01-01T00:00:00.000Z",
      startDayKey: 20230501,
      startMonthDayKey: 501,
    });
    const progress: ArchiveImportProgress[] = [];

    const result = await importer().importFullArchive(["primary"], (p) => progress.push(p));

    expect(result).toEqual({ completed: ["primary"], failed: [], skipped: [] });
    expect(gateway.callsTo("listItems")).toHaveLength(10);
    expect(sleeps).toEqual(Array.from({ length: 10 }, () => 200));
    expect(progress).toHaveLength(10);
    expect(progress[9]).toEqual({
      collectionId: "primary",
      fetchedRanges: 10,
      totalRanges: 10,
      upserted: 1,
      deleted: 1,
    });

    const row = store.archive.get("primary:evt-1");
    expect(row?.startDayKey).toBe(20210310);
    expect(row?.startMonthDayKey).toBe(310);
    expect(store.archive.has("primary:evt-2")).toBe(false);

    expect(store.importProgress.getState("primary")).toBe("completed");
    expect(store.importProgress.getProgress("primary")).toBeNull();
    const [entry] = store.telemetry.list({ syncType: "archive" });
    expect(entry.upserted).toBe(1);
    expect(entry.deleted).toBe(1);
  });

  it("resumes after the last committed sub-range when restarted after a cancel", async () => {
    const sut = importer();

    await expect(
      sut.importFullArchive(["primary"], (p) => {
        if (p.fetchedRanges === 3) {
          sut.cancel();
        }
      }),
    ).rejects.toBeInstanceOf(OperationCancelledError);

    expect(gateway.callsTo("listItems")).toHaveLength(3);
    expect(store.importProgress.getProgress("primary")?.completedRangeIndex).toBe(2);
    expect(store.importProgress.getState("primary")).toBeNull();
    expect(sut.isImporting()).toBe(false);

    const result = await sut.importFullArchive(["primary"]);

    const resumed = gateway.callsTo("listItems").slice(3);
    expect(resumed).toHaveLength(7);
    expect(resumed[0].query).toEqual({
      timeMin: "2021-07-01T00:00:00.000Z",
      timeMax: "2022-01-01T00:00:00.000Z",
    });
    expect(result.completed).toEqual(["primary"]);
    expect(store.importProgress.getState("primary")).toBe("completed");
  });

  it("stops before the first call when the caller's signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      importer().importFullArchive(["primary"], undefined, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(gateway.callsTo("listItems")).toHaveLength(0);
  });

  it("skips completed collections unless forced", async () => {
    const sut = importer();
    await sut.importFullArchive(["primary"]);

    expect(await sut.importFullArchive(["primary"])).toEqual({
      completed: [],
      failed: [],
      skipped: ["primary"],
    });
    expect((await sut.importFullArchive(["primary"], undefined, { force: true })).completed).toEqual([
      "primary",
    ]);
    expect(gateway.callsTo("listItems")).toHaveLength(20);
  });

  it("skips a collection that is already importing", async () => {
    const sut = importer();

    const first = sut.importFullArchive(["primary"]);
    const second = await sut.importFullArchive(["primary"]);

    expect(second.skipped).toEqual(["primary"]);
    expect((await first).completed).toEqual(["primary"]);
  });

  it("records a failing collection and continues with the next", async () => {
    gateway.failNext("listItems", new ServerError("Backend unavailable", 503), "primary");

    const result = await importer().importFullArchive(["primary", "team"]);

    expect(result).toEqual({
      completed: ["team"],
      failed: [{ collectionId: "primary", error: "Backend unavailable" }],
      skipped: [],
    });
    expect(store.importProgress.getState("primary")).toBeNull();
    expect(store.importProgress.getState("team")).toBe("completed");
    const failed = store.telemetry.list({ syncType: "archive" }).find((e) => e.errorKind !== null);
    expect(failed?.httpStatus).toBe(503);
  });

  it("imports every enabled collection when none are named", async () => {
    gateway.setCollections([
      { id: "primary", summary: "Me", primary: true },
      { id: "team", summary: "Team", primary: false },
    ]);

    const result = await importer().importFullArchive();

    expect(gateway.callsTo("listCollections")).toHaveLength(1);
    expect(result.completed).toEqual(["primary", "team"]);
  });
});
