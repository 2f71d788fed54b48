import { describe, it, expect } from "vitest";
import { InMemoryCalendarGateway } from "./in-memory-gateway";
import { ResourceNotFoundError, SyncTokenExpiredError } from "./errors";

function timed(id: string, start: string) {
  return { id, summary: id, start: { dateTime: start }, end: { dateTime: start }, updated: start };
}

describe("InMemoryCalendarGateway", () => {
  it("pages a ranged list and puts the sync token on the last page", async () => {
    const gateway = new InMemoryCalendarGateway({ pageSize: 2 });
    gateway.putItem("primary", timed("a", "2025-06-01T09:00:00Z"));
    gateway.putItem("primary", timed("b", "2025-06-02T09:00:00Z"));
    gateway.putItem("primary", timed("c", "2025-06-03T09:00:00Z"));
    gateway.putItem("primary", timed("outside", "2030-01-01T09:00:00Z"));
    const range = { timeMin: "2025-01-01T00:00:00.000Z", timeMax: "2026-01-01T00:00:00.000Z" };

    const first = await gateway.listItems("primary", range);
    expect(first.items.map((i) => i.id)).toEqual(["a", "b"]);
    expect(first.nextPageToken).toBe("2");
    expect(first.nextSyncToken).toBeUndefined();

    const last = await gateway.listItems("primary", range, first.nextPageToken);
    expect(last.items.map((i) => i.id)).toEqual(["c"]);
    expect(last.nextSyncToken).toBe("seq-4");
  });

  it("returns only changes after a sync token, tombstones included", async () => {
    const gateway = new InMemoryCalendarGateway();
    gateway.putItem("primary", timed("a", "2025-06-01T09:00:00Z"));
    const { nextSyncToken } = await gateway.listItems("primary", {
      timeMin: "2025-01-01T00:00:00.000Z",
      timeMax: "2026-01-01T00:00:00.000Z",
    });

    gateway.putItem("primary", timed("b", "2025-06-02T09:00:00Z"));
    await gateway.deleteItem("primary", "a");

    const page = await gateway.listItems("primary", { syncToken: nextSyncToken ?? "" });
    expect(page.items.map((i) => [i.id, i.status])).toEqual([
      ["b", undefined],
      ["a", "cancelled"],
    ]);
  });

  it("answers 410 for an expired token and 404 for an unknown item", async () => {
    const gateway = new InMemoryCalendarGateway();
    gateway.expireToken("seq-0");

    await expect(gateway.listItems("primary", { syncToken: "seq-0" })).rejects.toBeInstanceOf(
      SyncTokenExpiredError,
    );
    await expect(
      gateway.updateItem("primary", "missing", {
        summary: "",
        description: "",
        start: {},
        end: {},
        extendedProperties: { private: {} },
      }),
    ).rejects.toBeInstanceOf(ResourceNotFoundError);
  });

  it("fails the next matching call once", async () => {
    const gateway = new InMemoryCalendarGateway();
    gateway.failNext("listCollections", new Error("down"));

    await expect(gateway.listCollections()).rejects.toThrow("down");
    await expect(gateway.listCollections()).resolves.toMatchObject({
      collections: [{ id: "primary" }],
    });
    expect(gateway.callsTo("listCollections")).toHaveLength(2);
  });
});
