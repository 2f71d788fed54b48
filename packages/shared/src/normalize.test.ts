/**
 * @calsync/shared -- Unit tests for remote item normalization.
 */
import { describe, it, expect, vi } from "vitest";
import {
  buildRemoteInput,
  itemUid,
  normalizeRemoteItem,
  readLinkedRecordId,
  toArchiveEntry,
} from "./normalize";
import type { LocalRecord, RemoteItem } from "./types";

function makeRecord(overrides: Partial<LocalRecord> = {}): LocalRecord {
  return {
    recordId: "rec_01HXYZ0000000000000000000A",
    collectionId: "primary",
    remoteItemId: null,
    title: "Dentist",
    body: "Checkup #health",
    startAt: "2025-06-15T09:00:00.000Z",
    endAt: "2025-06-15T10:00:00.000Z",
    allDay: false,
    tags: ["health"],
    syncStatus: "pending",
    lastSyncedAt: null,
    isDeleted: false,
    deletedAt: null,
    createdAt: "2025-06-01T00:00:00.000Z",
    updatedAt: "2025-06-01T00:00:00.000Z",
    origin: "local",
    lastLinkedRemoteUpdatedAt: null,
    hasConflict: false,
    conflictDetectedAt: null,
    conflictRemoteTitle: null,
    conflictRemoteBody: null,
    conflictRemoteUpdatedAt: null,
    conflictRemoteStartAt: null,
    ...overrides,
  };
}

describe("normalizeRemoteItem", () => {
  it("flattens a timed item into UTC", () => {
    const item: RemoteItem = {
      id: "evt1",
      summary: "Standup",
      description: "daily",
      start: { dateTime: "2025-06-15T09:00:00+02:00", timeZone: "Europe/Berlin" },
      end: { dateTime: "2025-06-15T09:15:00+02:00" },
      status: "confirmed",
      updated: "2025-06-10T08:00:00.123Z",
    };

    expect(normalizeRemoteItem("primary", item)).toEqual({
      uid: "primary:evt1",
      collectionId: "primary",
      itemId: "evt1",
      linkedRecordId: null,
      title: "Standup",
      body: "daily",
      startAt: "2025-06-15T07:00:00.000Z",
      endAt: "2025-06-15T07:15:00.000Z",
      allDay: false,
      status: "confirmed",
      updatedAt: "2025-06-10T08:00:00.123Z",
    });
  });

  it("stores all-day items at midnight UTC", () => {
    const normalized = normalizeRemoteItem("primary", {
      id: "evt2",
      start: { date: "2025-07-04" },
      end: { date: "2025-07-05" },
    });
    expect(normalized?.allDay).toBe(true);
    expect(normalized?.startAt).toBe("2025-07-04T00:00:00.000Z");
    expect(normalized?.endAt).toBe("2025-07-05T00:00:00.000Z");
    expect(normalized?.title).toBe("");
  });

  it("keeps cancelled items that carry only an id", () => {
    const normalized = normalizeRemoteItem("primary", { id: "gone", status: "cancelled" });
    expect(normalized?.status).toBe("cancelled");
    expect(normalized?.startAt).toBe("");
    expect(normalized?.updatedAt).toBe("1970-01-01T00:00:00.000Z");
  });

  it("skips live items without a start", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    expect(normalizeRemoteItem("primary", { id: "broken", status: "confirmed" })).toBeNull();
    expect(warn).toHaveBeenCalledOnce();
    warn.mockRestore();
  });

  it("reads the linked record id from calsync metadata only", () => {
    expect(
      readLinkedRecordId({
        id: "a",
        extendedProperties: { private: { app: "calsync", schemaVersion: "1", recordId: "rec_1" } },
      }),
    ).toBe("rec_1");
    expect(
      readLinkedRecordId({ id: "b", extendedProperties: { private: { recordId: "rec_1" } } }),
    ).toBeNull();
  });
});

describe("toArchiveEntry", () => {
  it("derives day keys from the start", () => {
    const normalized = normalizeRemoteItem("team", {
      id: "x",
      start: { dateTime: "2024-02-29T23:00:00Z" },
    });
    expect(normalized).not.toBeNull();
    if (normalized === null) return;
    const entry = toArchiveEntry(normalized, "2025-01-01T00:00:00.000Z");
    expect(entry.startDayKey).toBe(20240229);
    expect(entry.startMonthDayKey).toBe(229);
    expect(entry.uid).toBe(itemUid("team", "x"));
    expect(entry.cachedAt).toBe("2025-01-01T00:00:00.000Z");
  });
});

describe("buildRemoteInput", () => {
  it("carries the record id in private metadata", () => {
    expect(buildRemoteInput(makeRecord())).toEqual({
      summary: "Dentist",
      description: "Checkup #health",
      start: { dateTime: "2025-06-15T09:00:00.000Z" },
      end: { dateTime: "2025-06-15T10:00:00.000Z" },
      extendedProperties: {
        private: { app: "calsync", schemaVersion: "1", recordId: "rec_01HXYZ0000000000000000000A" },
      },
    });
  });

  it("sends all-day records as dates", () => {
    const input = buildRemoteInput(
      makeRecord({ allDay: true, startAt: "2025-07-04T00:00:00.000Z", endAt: "2025-07-05T00:00:00.000Z" }),
    );
    expect(input.start).toEqual({ date: "2025-07-04" });
    expect(input.end).toEqual({ date: "2025-07-05" });
  });
});
