/**
 * Tests for SyncOrchestrator against an in-memory store and an in-process
 * gateway.
 *
 * Covers:
 * - Push: create, update, remote delete, partial failure, retry of failures,
 *   hold during recovery
 * - Pull: full and incremental, 410 fallback within one cycle, pagination,
 *   per-collection failure, cached collection list, disabled collections,
 *   relink by metadata
 * - Cancelled remote items with and without the trash policy
 * - Cycle joining, post-cycle hooks, periodic sync
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  InMemoryCalendarGateway,
  LocalStorageError,
  METADATA_APP_KEY,
  METADATA_APP_VALUE,
  METADATA_RECORD_ID_KEY,
  METADATA_SCHEMA_VERSION,
  METADATA_SCHEMA_VERSION_KEY,
  META_RECOVERY_IN_PROGRESS,
  ServerError,
  newLocalRecord,
  type HotCacheEntry,
  type LocalRecord,
  type RemoteItem,
} from "@calsync/shared";
import { openMemoryStore, type LocalStore } from "@calsync/store";
import { SyncOrchestrator } from "./orchestrator";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const NOW = new Date("2025-06-01T12:00:00.000Z");

function localRecord(overrides: Partial<LocalRecord> = {}): LocalRecord {
  return {
    ...newLocalRecord(
      {
        title: "Dentist #health",
        startAt: "2025-06-03T09:00:00.000Z",
        endAt: "2025-06-03T10:00:00.000Z",
      },
      NOW.toISOString(),
    ),
    ...overrides,
  };
}

function remoteItem(id: string, overrides: Partial<RemoteItem> = {}): RemoteItem {
  return {
    id,
    summary: "Remote title",
    description: "",
    start: { dateTime: "2025-06-03T09:00:00.000Z" },
    end: { dateTime: "2025-06-03T10:00:00.000Z" },
    status: "confirmed",
    updated: "2025-06-01T11:00:00.000Z",
    ...overrides,
  };
}

function hotEntry(itemId: string): HotCacheEntry {
  return {
    uid: `primary:${itemId}`,
    collectionId: "primary",
    itemId,
    linkedRecordId: null,
    title: itemId,
    body: "",
    startAt: "2025-06-02T09:00:00.000Z",
    endAt: "2025-06-02T10:00:00.000Z",
    allDay: false,
    status: "confirmed",
    updatedAt: "2025-05-01T00:00:00.000Z",
    cachedAt: "2025-05-01T00:00:00.000Z",
  };
}

let store: LocalStore;
let gateway: InMemoryCalendarGateway;

function orchestrator(options: { trashEnabled?: boolean } = {}): SyncOrchestrator {
  return new SyncOrchestrator({
    store,
    gateway,
    trashEnabled: options.trashEnabled,
    now: () => NOW,
  });
}

beforeEach(() => {
  store = openMemoryStore();
  gateway = new InMemoryCalendarGateway({ now: () => NOW });
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  store.close();
});

// ---------------------------------------------------------------------------
// Push
// ---------------------------------------------------------------------------

describe("pushLocalChanges", () => {
  it("creates a new record remotely exactly once and links it", async () => {
    const record = localRecord();
    store.records.upsert(record);

    const result = await orchestrator().pushLocalChanges();

    expect(result).toEqual({ created: 1, updated: 0, deleted: 0, failed: 0, held: 0 });
    expect(gateway.callsTo("createItem")).toEqual([
      { method: "createItem", collectionId: "primary" },
    ]);
    const stored = store.records.get(record.recordId);
    expect(stored?.remoteItemId).toBe("item-1");
    expect(stored?.collectionId).toBe("primary");
    expect(stored?.syncStatus).toBe("synced");
    expect(stored?.lastLinkedRemoteUpdatedAt).toBe(NOW.toISOString());
    expect(store.hotCache.get("primary:item-1")?.linkedRecordId).toBe(record.recordId);
  });

  it("writes the link metadata into the remote item", async () => {
    const record = localRecord();
    store.records.upsert(record);

    await orchestrator().pushLocalChanges();

    expect(gateway.getItem("primary", "item-1")?.extendedProperties?.private).toEqual({
      [METADATA_APP_KEY]: METADATA_APP_VALUE,
      [METADATA_SCHEMA_VERSION_KEY]: METADATA_SCHEMA_VERSION,
      [METADATA_RECORD_ID_KEY]: record.recordId,
    });
  });

  it("updates a linked record in place", async () => {
    gateway.putItem("team", remoteItem("evt-1"));
    const record = localRecord({
      collectionId: "team",
      remoteItemId: "evt-1",
      title: "Edited locally",
    });
    store.records.upsert(record);

    const result = await orchestrator().pushLocalChanges();

    expect(result.updated).toBe(1);
    expect(gateway.callsTo("updateItem")).toEqual([
      { method: "updateItem", collectionId: "team", itemId: "evt-1" },
    ]);
    expect(gateway.getItem("team", "evt-1")?.summary).toBe("Edited locally");
    expect(store.records.get(record.recordId)?.syncStatus).toBe("synced");
  });

  it("deletes a soft-deleted record remotely and unlinks it", async () => {
    gateway.putItem("primary", remoteItem("evt-1"));
    const record = localRecord({
      collectionId: "primary",
      remoteItemId: "evt-1",
      isDeleted: true,
      deletedAt: NOW.toISOString(),
    });
    store.records.upsert(record);

    const result = await orchestrator().pushLocalChanges();

    expect(result.deleted).toBe(1);
    expect(gateway.getItem("primary", "evt-1")?.status).toBe("cancelled");
    const stored = store.records.get(record.recordId);
    expect(stored?.remoteItemId).toBeNull();
    expect(stored?.syncStatus).toBe("synced");
    expect(stored?.isDeleted).toBe(true);
  });

  it("marks a failing record as failed and keeps pushing the rest", async () => {
    const first = localRecord({ updatedAt: "2025-06-01T10:00:00.000Z" });
    const second = localRecord({ updatedAt: "2025-06-01T11:00:00.000Z" });
    store.records.upsert(first);
    store.records.upsert(second);
    gateway.failNext("createItem", new ServerError("Backend unavailable", 503));
    const sync = orchestrator();

    const result = await sync.pushLocalChanges();

    expect(result).toEqual({ created: 1, updated: 0, deleted: 0, failed: 1, held: 0 });
    expect(store.records.get(first.recordId)?.syncStatus).toBe("failed");
    expect(store.records.get(second.recordId)?.syncStatus).toBe("synced");
    expect(sync.pendingFailureCount()).toBe(1);

    const [entry] = store.telemetry.list({ syncType: "push" });
    expect(entry.upserted).toBe(1);
    expect(entry.httpStatus).toBe(503);
    expect(entry.errorKind).toBe("remote-api");
  });

  it("retries failed pushes", async () => {
    const record = localRecord({ syncStatus: "failed" });
    store.records.upsert(record);
    const sync = orchestrator();

    const result = await sync.retryFailedPushes();

    expect(result.created).toBe(1);
    expect(sync.pendingFailureCount()).toBe(0);
    expect(store.records.get(record.recordId)?.syncStatus).toBe("synced");
  });

  it("holds pending records while a recovery is in progress", async () => {
    const record = localRecord();
    store.records.upsert(record);
    store.meta.set(META_RECOVERY_IN_PROGRESS, NOW.toISOString());

    const result = await orchestrator().pushLocalChanges();

    expect(result).toEqual({ created: 0, updated: 0, deleted: 0, failed: 0, held: 1 });
    expect(gateway.callsTo("createItem")).toHaveLength(0);
    expect(store.records.get(record.recordId)?.syncStatus).toBe("pending");
  });

  it("aborts the cycle on a local storage error", async () => {
    store.records.upsert(localRecord());
    vi.spyOn(store.records, "upsert").mockImplementation(() => {
      throw new LocalStorageError("storage-full", "database or disk is full");
    });
    const sync = orchestrator();

    await expect(sync.runFullSyncCycle()).rejects.toBeInstanceOf(LocalStorageError);
    expect(sync.state).toBe("failed");
    expect(gateway.callsTo("listCollections")).toHaveLength(0);
  });
});

// ---------------------------------------------------------------------------
// Pull
// ---------------------------------------------------------------------------

describe("pullRemoteChanges", () => {
  it("creates remote-origin records and saves the cursor on a first pull", async () => {
    gateway.putItem("primary", remoteItem("evt-1", { summary: "Lunch #food" }));

    const result = await orchestrator().pullRemoteChanges();

    expect(result.collections).toEqual([
      {
        collectionId: "primary",
        mode: "full",
        hadCursorFallback: false,
        counts: { upserted: 1, deleted: 0, skipped: 0, conflicted: 0 },
      },
    ]);
    const record = store.records.findByRemote("primary", "evt-1");
    expect(record?.origin).toBe("remote");
    expect(record?.tags).toEqual(["food"]);
    expect(record?.lastLinkedRemoteUpdatedAt).toBe("2025-06-01T11:00:00.000Z");
    expect(store.hotCache.count()).toBe(1);
    expect(store.cursors.get("primary")).toBe("seq-1");
    expect(store.collections.list().map((c) => c.collectionId)).toEqual(["primary"]);
  });

  it("pulls incrementally once a cursor exists", async () => {
    gateway.putItem("primary", remoteItem("evt-1"));
    const sync = orchestrator();
    await sync.pullRemoteChanges();

    gateway.putItem("primary", remoteItem("evt-2"));
    const result = await sync.pullRemoteChanges();

    expect(result.collections[0].mode).toBe("incremental");
    expect(result.counts.upserted).toBe(1);
    expect(gateway.callsTo("listItems")[1].query).toEqual({ syncToken: "seq-1" });
    expect(store.cursors.get("primary")).toBe("seq-2");
  });

  it("falls back to a full pull within the same cycle when the cursor expired", async () => {
    store.cursors.set("primary", "seq-0", NOW.toISOString());
    gateway.expireToken("seq-0");
    gateway.putItem("primary", remoteItem("evt-1"));

    const result = await orchestrator().pullRemoteChanges();

    expect(result.collections[0]).toMatchObject({
      mode: "full",
      hadCursorFallback: true,
      counts: { upserted: 1 },
    });
    const queries = gateway.callsTo("listItems").map((c) => c.query);
    expect(queries[0]).toEqual({ syncToken: "seq-0" });
    expect(queries[1]).toEqual({
      timeMin: "2025-03-03T12:00:00.000Z",
      timeMax: "2026-06-01T12:00:00.000Z",
    });
    expect(store.cursors.get("primary")).toBe("seq-1");

    const [entry] = store.telemetry.list({ syncType: "full" });
    expect(entry.hadCursorFallback).toBe(true);
    expect(entry.errorKind).toBeNull();
    expect(entry.collectionHash).toBe("986a1b71");
  });

  it("drops the collection's hot rows before the fallback pull", async () => {
    store.cursors.set("primary", "seq-0", NOW.toISOString());
    gateway.expireToken("seq-0");
    store.hotCache.upsert(hotEntry("purged"));
    gateway.putItem("primary", remoteItem("evt-1"));

    await orchestrator().pullRemoteChanges();

    expect(store.hotCache.get("primary:purged")).toBeNull();
    expect(store.hotCache.get("primary:evt-1")?.title).toBe("Remote title");
  });

  it("follows every page and saves only the terminal cursor", async () => {
    gateway = new InMemoryCalendarGateway({ now: () => NOW, pageSize: 2 });
    gateway.putItem("primary", remoteItem("evt-1"));
    gateway.putItem("primary", remoteItem("evt-2"));
    gateway.putItem("primary", remoteItem("evt-3"));

    const result = await orchestrator().pullRemoteChanges();

    expect(result.counts.upserted).toBe(3);
    expect(gateway.callsTo("listItems").map((c) => c.pageToken)).toEqual([undefined, "2"]);
    expect(store.cursors.get("primary")).toBe("seq-3");
  });

  it("keeps no cursor when a later page fails", async () => {
    gateway = new InMemoryCalendarGateway({ now: () => NOW, pageSize: 2 });
    gateway.putItem("primary", remoteItem("evt-1"));
    gateway.putItem("primary", remoteItem("evt-2"));
    gateway.putItem("primary", remoteItem("evt-3"));
    const listItems = gateway.listItems.bind(gateway);
    vi.spyOn(gateway, "listItems")
      .mockImplementationOnce(listItems)
      .mockRejectedValueOnce(new ServerError("Backend unavailable", 503));

    const result = await orchestrator().pullRemoteChanges();

    expect(result.collections[0].error).toBe("Backend unavailable");
    expect(result.collections[0].counts.upserted).toBe(2);
    expect(store.cursors.get("primary")).toBeNull();
  });

  it("records a failing collection and continues with the next", async () => {
    gateway.setCollections([
      { id: "primary", summary: "Me", primary: true },
      { id: "team", summary: "Team", primary: false },
    ]);
    gateway.putItem("team", remoteItem("evt-1"));
    gateway.failNext("listItems", new ServerError("Backend unavailable", 503), "primary");

    const result = await orchestrator().pullRemoteChanges();

    expect(result.collections.map((c) => [c.collectionId, c.error])).toEqual([
      ["primary", "Backend unavailable"],
      ["team", undefined],
    ]);
    expect(result.counts.upserted).toBe(1);
    expect(store.telemetry.count()).toBe(2);
    expect(console.warn).toHaveBeenCalledWith("sync: pull failed for collection", {
      collection_id: "primary",
      error: "Backend unavailable",
    });
  });

  it("pulls the cached collections when the collection list fails", async () => {
    const sync = orchestrator();
    await sync.pullRemoteChanges();
    gateway.putItem("primary", remoteItem("evt-1"));
    gateway.failNext("listCollections", new ServerError("Backend unavailable", 503));

    const result = await sync.pullRemoteChanges();

    expect(result.collectionListError).toBe("Backend unavailable");
    expect(result.collections.map((c) => [c.collectionId, c.error])).toEqual([["primary", undefined]]);
    expect(result.counts.upserted).toBe(1);
  });

  it("fails the pull when the collection list fails and none is cached", async () => {
    gateway.failNext("listCollections", new ServerError("Backend unavailable", 503));

    await expect(orchestrator().pullRemoteChanges()).rejects.toBeInstanceOf(ServerError);
    expect(gateway.callsTo("listItems")).toHaveLength(0);
  });

  it("skips disabled collections", async () => {
    gateway.setCollections([
      { id: "primary", summary: "Me", primary: true },
      { id: "team", summary: "Team", primary: false },
    ]);
    const sync = orchestrator();
    await sync.pullRemoteChanges();
    store.collections.setEnabled("team", false);

    await sync.pullRemoteChanges();

    const pulled = gateway.callsTo("listItems").map((c) => c.collectionId);
    expect(pulled).toEqual(["primary", "team", "primary"]);
  });

  it("relinks an unlinked record whose id is in the remote metadata", async () => {
    const record = localRecord({ title: "Kept locally" });
    store.records.upsert(record);
    gateway.putItem(
      "primary",
      remoteItem("evt-9", {
        extendedProperties: {
          private: {
            [METADATA_APP_KEY]: METADATA_APP_VALUE,
            [METADATA_RECORD_ID_KEY]: record.recordId,
          },
        },
      }),
    );

    await orchestrator().pullRemoteChanges();

    const stored = store.records.get(record.recordId);
    expect(stored?.remoteItemId).toBe("evt-9");
    expect(stored?.syncStatus).toBe("synced");
    expect(stored?.title).toBe("Kept locally");
    expect(store.records.count()).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Cancelled remote items
// ---------------------------------------------------------------------------

describe("remote cancellation", () => {
  async function pushThenCancel(trashEnabled: boolean): Promise<{ record: LocalRecord; sync: SyncOrchestrator }> {
    const record = localRecord();
    store.records.upsert(record);
    const sync = orchestrator({ trashEnabled });
    await sync.pushLocalChanges();
    await gateway.deleteItem("primary", "item-1");
    return { record, sync };
  }

  it("unlinks a locally managed record and drops the hot entry", async () => {
    const { record, sync } = await pushThenCancel(false);

    const result = await sync.pullRemoteChanges();

    expect(result.counts.deleted).toBe(1);
    const stored = store.records.get(record.recordId);
    expect(stored?.remoteItemId).toBeNull();
    expect(stored?.syncStatus).toBe("synced");
    expect(stored?.isDeleted).toBe(false);
    expect(store.hotCache.get("primary:item-1")).toBeNull();
  });

  it("soft-deletes the record when the trash policy is on", async () => {
    const { record, sync } = await pushThenCancel(true);

    await sync.pullRemoteChanges();

    const stored = store.records.get(record.recordId);
    expect(stored?.isDeleted).toBe(true);
    expect(stored?.deletedAt).toBe(NOW.toISOString());
    expect(store.hotCache.get("primary:item-1")).toBeNull();
  });

  it("hard-deletes a remote-origin record when the trash policy is off", async () => {
    gateway.putItem("primary", remoteItem("evt-1"));
    const sync = orchestrator();
    await sync.pullRemoteChanges();
    await gateway.deleteItem("primary", "evt-1");

    await sync.pullRemoteChanges();

    expect(store.records.count()).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Cycles
// ---------------------------------------------------------------------------

describe("runFullSyncCycle", () => {
  it("joins a cycle that is already running", async () => {
    const sync = orchestrator();

    const first = sync.runFullSyncCycle();
    const second = sync.runFullSyncCycle();

    expect(second).toBe(first);
    await first;
    expect(gateway.callsTo("listCollections")).toHaveLength(1);
    expect(sync.state).toBe("completed");
  });

  it("pushes before pulling and runs post-cycle hooks", async () => {
    store.records.upsert(localRecord());
    const sync = orchestrator();
    const hook = vi.fn();
    sync.onCycleComplete(hook);

    const result = await sync.runFullSyncCycle();

    expect(gateway.calls.map((c) => c.method)).toEqual([
      "createItem",
      "listCollections",
      "listItems",
    ]);
    expect(result.push.created).toBe(1);
    // The pushed item comes back on the pull and is already reconciled
    expect(result.pull.counts).toEqual({ upserted: 0, deleted: 0, skipped: 1, conflicted: 0 });
    expect(hook).toHaveBeenCalledWith(result);
  });
});

describe("periodic sync", () => {
  it("runs cycles on a timer until stopped", async () => {
    const sync = orchestrator();

    sync.startPeriodicSync(10);
    expect(sync.periodicSyncActive).toBe(true);
    await vi.waitFor(() => {
      expect(gateway.callsTo("listCollections").length).toBeGreaterThan(0);
    });
    sync.stopPeriodicSync();
    await sync.runFullSyncCycle();
    const calls = gateway.callsTo("listCollections").length;

    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(sync.periodicSyncActive).toBe(false);
    expect(gateway.callsTo("listCollections")).toHaveLength(calls);
  });

  it("logs a failing periodic cycle instead of throwing", async () => {
    gateway.failNext("listCollections", new Error("offline"));
    const sync = orchestrator();

    sync.startPeriodicSync(10);
    await vi.waitFor(() => {
      expect(console.error).toHaveBeenCalledWith("sync: periodic cycle failed", {
        error: "offline",
      });
    });
    sync.stopPeriodicSync();
  });
});
