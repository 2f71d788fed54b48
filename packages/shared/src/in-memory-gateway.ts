/**
 * @calsync/shared -- In-process CalendarGateway.
 *
 * Keeps collections and items in memory and answers the same contract as
 * GoogleCalendarClient: pages, sync tokens, tombstones for deleted items,
 * 404 on unknown ids. Used by tests and for running the engine offline.
 *
 * Sync tokens encode a change sequence number. An incremental list
 * returns every item (tombstones included) changed after that sequence.
 */

import { ResourceNotFoundError, SyncTokenExpiredError } from "./errors";
import type {
  CalendarGateway,
  ItemWriteResult,
  ListCollectionsResult,
  ListItemsResult,
} from "./google-api";
import type {
  ListQuery,
  RemoteCollection,
  RemoteItem,
  RemoteItemInput,
  RetryStats,
} from "./types";

const NO_RETRY: RetryStats = { retryCount: 0, totalWaitMs: 0 };

export type GatewayMethod =
  | "listCollections"
  | "listItems"
  | "createItem"
  | "updateItem"
  | "deleteItem";

/** One recorded gateway call. */
export interface GatewayCall {
  readonly method: GatewayMethod;
  readonly collectionId?: string;
  readonly itemId?: string;
  readonly query?: ListQuery;
  readonly pageToken?: string;
}

interface StoredItem {
  item: RemoteItem;
  seq: number;
}

interface QueuedFailure {
  method: GatewayMethod;
  collectionId: string | undefined;
  error: unknown;
}

export interface InMemoryGatewayOptions {
  collections?: RemoteCollection[];
  /** Items per page. Defaults to 250. */
  pageSize?: number;
  /** Clock used for `updated` on writes. */
  now?: () => Date;
}

export class InMemoryCalendarGateway implements CalendarGateway {
  /** Every call, in order. */
  readonly calls: GatewayCall[] = [];

  private collections: RemoteCollection[];
  private readonly items = new Map<string, Map<string, StoredItem>>();
  private readonly failures: QueuedFailure[] = [];
  private readonly expiredTokens = new Set<string>();
  private readonly pageSize: number;
  private readonly now: () => Date;
  private seq = 0;
  private nextId = 1;

  constructor(options: InMemoryGatewayOptions = {}) {
    this.collections = options.collections ?? [
      { id: "primary", summary: "Primary", primary: true },
    ];
    this.pageSize = options.pageSize ?? 250;
    this.now = options.now ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Arranging remote state
  // -------------------------------------------------------------------------

  setCollections(collections: RemoteCollection[]): void {
    this.collections = collections;
  }

  /** Insert or replace an item as if it was edited on the remote. */
  putItem(collectionId: string, item: RemoteItem): void {
    this.bucket(collectionId).set(item.id, { item, seq: ++this.seq });
  }

  /** Current remote state of an item, tombstones included. */
  getItem(collectionId: string, itemId: string): RemoteItem | undefined {
    return this.items.get(collectionId)?.get(itemId)?.item;
  }

  /** Make the next matching call reject with `error`. */
  failNext(method: GatewayMethod, error: unknown, collectionId?: string): void {
    this.failures.push({ method, collectionId, error });
  }

  /** Answer 410 for an incremental list with this token. */
  expireToken(token: string): void {
    this.expiredTokens.add(token);
  }

  /** Calls of one method. */
  callsTo(method: GatewayMethod): GatewayCall[] {
    return this.calls.filter((c) => c.method === method);
  }

  // -------------------------------------------------------------------------
  // CalendarGateway
  // -------------------------------------------------------------------------

  async listCollections(): Promise<ListCollectionsResult> {
    this.record({ method: "listCollections" });
    return { collections: [...this.collections], retry: NO_RETRY };
  }

  async listItems(
    collectionId: string,
    query: ListQuery,
    pageToken?: string,
  ): Promise<ListItemsResult> {
    this.record({ method: "listItems", collectionId, query, pageToken });

    let matching: StoredItem[];
    if ("syncToken" in query) {
      if (this.expiredTokens.has(query.syncToken)) {
        throw new SyncTokenExpiredError();
      }
      const since = parseToken(query.syncToken);
      matching = this.sorted(collectionId).filter((s) => s.seq > since);
    } else {
      matching = this.sorted(collectionId).filter((s) => {
        const start = s.item.start?.dateTime ?? s.item.start?.date;
        return start !== undefined && start >= query.timeMin && start < query.timeMax;
      });
    }

    const offset = pageToken !== undefined ? Number(pageToken) : 0;
    const page = matching.slice(offset, offset + this.pageSize).map((s) => s.item);
    const nextOffset = offset + this.pageSize;
    if (nextOffset < matching.length) {
      return { items: page, nextPageToken: String(nextOffset), retry: NO_RETRY };
    }
    return { items: page, nextSyncToken: `seq-${this.seq}`, retry: NO_RETRY };
  }

  async createItem(collectionId: string, input: RemoteItemInput): Promise<ItemWriteResult> {
    this.record({ method: "createItem", collectionId });
    const item: RemoteItem = {
      ...input,
      id: `item-${this.nextId++}`,
      status: "confirmed",
      updated: this.now().toISOString(),
    };
    this.putItem(collectionId, item);
    return { item, retry: NO_RETRY };
  }

  async updateItem(
    collectionId: string,
    itemId: string,
    input: RemoteItemInput,
  ): Promise<ItemWriteResult> {
    this.record({ method: "updateItem", collectionId, itemId });
    const existing = this.getItem(collectionId, itemId);
    if (existing === undefined || existing.status === "cancelled") {
      throw new ResourceNotFoundError(`Item ${itemId} not found`);
    }
    const item: RemoteItem = {
      ...input,
      id: itemId,
      status: "confirmed",
      updated: this.now().toISOString(),
    };
    this.putItem(collectionId, item);
    return { item, retry: NO_RETRY };
  }

  async deleteItem(collectionId: string, itemId: string): Promise<RetryStats> {
    this.record({ method: "deleteItem", collectionId, itemId });
    const existing = this.getItem(collectionId, itemId);
    if (existing !== undefined && existing.status !== "cancelled") {
      this.putItem(collectionId, {
        ...existing,
        status: "cancelled",
        updated: this.now().toISOString(),
      });
    }
    return NO_RETRY;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private record(call: GatewayCall): void {
    this.calls.push(call);
    const index = this.failures.findIndex(
      (f) =>
        f.method === call.method &&
        (f.collectionId === undefined || f.collectionId === call.collectionId),
    );
    if (index >= 0) {
      const [failure] = this.failures.splice(index, 1);
      throw failure.error;
    }
  }

  private bucket(collectionId: string): Map<string, StoredItem> {
    let bucket = this.items.get(collectionId);
    if (bucket === undefined) {
      bucket = new Map();
      this.items.set(collectionId, bucket);
    }
    return bucket;
  }

  /** Items in change order. */
  private sorted(collectionId: string): StoredItem[] {
    return [...this.bucket(collectionId).values()].sort((a, b) => a.seq - b.seq);
  }
}

function parseToken(token: string): number {
  const seq = Number(token.replace(/^seq-/, ""));
  if (!Number.isInteger(seq)) {
    throw new SyncTokenExpiredError(`Unrecognized sync token ${token}`);
  }
  return seq;
}
