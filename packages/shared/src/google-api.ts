/**
 * @calsync/shared -- Remote gateway over the Google Calendar REST API.
 *
 * Thin typed wrapper that:
 * - Exposes the CalendarGateway contract the sync engine depends on
 * - Passes every HTTP request through the shared SyncRateLimiter first
 * - Retries 429 and rate-limited 403 responses with exponential backoff
 * - Maps every other non-2xx status to a typed error, without retrying
 * - Decodes response bodies with zod (InvalidResponseError on mismatch)
 * - Reports retry count and backoff wait per call, and cumulatively
 * - Accepts injectable FetchFn, sleep, and random sources for testability
 */

import type { z } from "zod/v4";
import { DEFAULT_API_BASE, LIST_PAGE_SIZE, RATE_LIMIT_REASONS } from "./constants";
import {
  ForbiddenError,
  GoogleApiError,
  InvalidResponseError,
  RateLimitError,
  ResourceNotFoundError,
  ServerError,
  SyncTokenExpiredError,
  TokenExpiredError,
  toNetworkError,
} from "./errors";
import { SyncRateLimiter } from "./rate-limiter";
import {
  ApiErrorBodySchema,
  CollectionListResponseSchema,
  ItemListResponseSchema,
  RemoteItemSchema,
} from "./remote-schemas";
import { retryWithBackoff, type RetryResult, type SleepFn } from "./retry";
import type {
  ItemPage,
  ListQuery,
  RemoteCollection,
  RemoteItem,
  RemoteItemInput,
  RetryStats,
} from "./types";

// ---------------------------------------------------------------------------
// Injectable dependencies
// ---------------------------------------------------------------------------

/**
 * Injectable fetch function for testing. In production this is
 * globalThis.fetch; in tests it can be replaced with a mock.
 */
export type FetchFn = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

/** Returns a currently valid bearer token. Refresh is the provider's job. */
export type AccessTokenProvider = () => Promise<string>;

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/** One page of items plus the retries it took to get it. */
export interface ListItemsResult extends ItemPage {
  readonly retry: RetryStats;
}

export interface ListCollectionsResult {
  readonly collections: RemoteCollection[];
  readonly retry: RetryStats;
}

/** Result of createItem / updateItem. */
export interface ItemWriteResult {
  readonly item: RemoteItem;
  readonly retry: RetryStats;
}

// ---------------------------------------------------------------------------
// Gateway contract
// ---------------------------------------------------------------------------

/**
 * What the sync engine needs from the remote. GoogleCalendarClient
 * implements it; tests substitute an in-process fake.
 */
export interface CalendarGateway {
  listCollections(): Promise<ListCollectionsResult>;

  /**
   * Fetch a single page. Callers follow `nextPageToken` themselves so pages
   * can be applied in server order; `nextSyncToken` is only present on the
   * terminal page.
   */
  listItems(
    collectionId: string,
    query: ListQuery,
    pageToken?: string,
  ): Promise<ListItemsResult>;

  createItem(collectionId: string, input: RemoteItemInput): Promise<ItemWriteResult>;

  updateItem(
    collectionId: string,
    itemId: string,
    input: RemoteItemInput,
  ): Promise<ItemWriteResult>;

  /** Resolves when the item is gone, including when it was already absent. */
  deleteItem(collectionId: string, itemId: string): Promise<RetryStats>;
}

// ---------------------------------------------------------------------------
// GoogleCalendarClient implementation
// ---------------------------------------------------------------------------

export interface GoogleCalendarClientOptions {
  tokenProvider: AccessTokenProvider;
  fetchFn?: FetchFn;
  /** Shared gate. Pass the same instance to every client in the process. */
  rateLimiter?: SyncRateLimiter;
  baseUrl?: string;
  maxRetries?: number;
  sleepFn?: SleepFn;
  /** Jitter source for backoff. */
  random?: () => number;
}

/** Status and parsed JSON body of a 2xx response. */
interface RawResponse {
  readonly status: number;
  readonly body: unknown;
}

interface RequestContext {
  /** The request is an incremental (syncToken) list. 410 means cursor expired. */
  readonly incremental?: boolean;
}

/**
 * Usage:
 *   const client = new GoogleCalendarClient({ tokenProvider: async () => token });
 *   const page = await client.listItems("primary", { syncToken });
 */
export class GoogleCalendarClient implements CalendarGateway {
  private readonly tokenProvider: AccessTokenProvider;
  private readonly fetchFn: FetchFn;
  private readonly rateLimiter: SyncRateLimiter;
  private readonly baseUrl: string;
  private readonly maxRetries: number | undefined;
  private readonly sleepFn: SleepFn | undefined;
  private readonly random: (() => number) | undefined;

  private cumulativeRetries = 0;
  private cumulativeWaitMs = 0;

  constructor(options: GoogleCalendarClientOptions) {
    this.tokenProvider = options.tokenProvider;
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.rateLimiter = options.rateLimiter ?? new SyncRateLimiter({ sleepFn: options.sleepFn });
    this.baseUrl = options.baseUrl ?? DEFAULT_API_BASE;
    this.maxRetries = options.maxRetries;
    this.sleepFn = options.sleepFn;
    this.random = options.random;
  }

  /** Retries and backoff wait accumulated over the client's lifetime. */
  stats(): RetryStats {
    return { retryCount: this.cumulativeRetries, totalWaitMs: this.cumulativeWaitMs };
  }

  // -----------------------------------------------------------------------
  // Collections
  // -----------------------------------------------------------------------

  /** List every calendar the user can see, following pagination. */
  async listCollections(): Promise<ListCollectionsResult> {
    const collections: RemoteCollection[] = [];
    let pageToken: string | undefined;
    let retryCount = 0;
    let totalWaitMs = 0;

    do {
      const params = new URLSearchParams();
      if (pageToken) {
        params.set("pageToken", pageToken);
      }
      const query = params.toString();
      const suffix = query.length > 0 ? `?${query}` : "";
      const { data, retry } = await this.request(
        `${this.baseUrl}/users/me/calendarList${suffix}`,
        { method: "GET" },
        CollectionListResponseSchema,
      );
      retryCount += retry.retryCount;
      totalWaitMs += retry.totalWaitMs;
      collections.push(...data.items);
      pageToken = data.nextPageToken;
    } while (pageToken);

    return { collections, retry: { retryCount, totalWaitMs } };
  }

  // -----------------------------------------------------------------------
  // Items
  // -----------------------------------------------------------------------

  async listItems(
    collectionId: string,
    query: ListQuery,
    pageToken?: string,
  ): Promise<ListItemsResult> {
    const params = new URLSearchParams();

    // Expand recurring series into concrete instances and include cancelled
    // entries so remote deletions are observable.
    params.set("singleEvents", "true");
    params.set("showDeleted", "true");
    params.set("maxResults", String(LIST_PAGE_SIZE));

    const incremental = "syncToken" in query;
    if ("syncToken" in query) {
      params.set("syncToken", query.syncToken);
    } else {
      params.set("timeMin", query.timeMin);
      params.set("timeMax", query.timeMax);
    }
    if (pageToken) {
      params.set("pageToken", pageToken);
    }

    const { data, retry } = await this.request(
      `${this.itemsUrl(collectionId)}?${params.toString()}`,
      { method: "GET" },
      ItemListResponseSchema,
      { incremental },
    );

    return {
      items: data.items,
      nextPageToken: data.nextPageToken,
      nextSyncToken: data.nextSyncToken,
      retry,
    };
  }

  async createItem(collectionId: string, input: RemoteItemInput): Promise<ItemWriteResult> {
    const { data, retry } = await this.request(
      this.itemsUrl(collectionId),
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(input),
      },
      RemoteItemSchema,
    );
    return { item: data, retry };
  }

  async updateItem(
    collectionId: string,
    itemId: string,
    input: RemoteItemInput,
  ): Promise<ItemWriteResult> {
    const { data, retry } = await this.request(
      `${this.itemsUrl(collectionId)}/${encodeURIComponent(itemId)}`,
      {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(input),
      },
      RemoteItemSchema,
    );
    return { item: data, retry };
  }

  async deleteItem(collectionId: string, itemId: string): Promise<RetryStats> {
    const url = `${this.itemsUrl(collectionId)}/${encodeURIComponent(itemId)}`;
    try {
      const { retry } = await this.request(url, { method: "DELETE" }, null);
      return retry;
    } catch (err) {
      // Already absent: 404 Not Found, or 410 "Resource has been deleted"
      if (
        err instanceof ResourceNotFoundError ||
        (err instanceof GoogleApiError && err.statusCode === 410)
      ) {
        return err.retryStats;
      }
      throw err;
    }
  }

  // -----------------------------------------------------------------------
  // Internal: HTTP request with retry, error mapping, and decoding
  // -----------------------------------------------------------------------

  private itemsUrl(collectionId: string): string {
    return `${this.baseUrl}/calendars/${encodeURIComponent(collectionId)}/events`;
  }

  private async request<S extends z.ZodType>(
    url: string,
    init: RequestInit,
    schema: S,
    context?: RequestContext,
  ): Promise<{ data: z.output<S>; retry: RetryStats }>;
  private async request(
    url: string,
    init: RequestInit,
    schema: null,
    context?: RequestContext,
  ): Promise<{ data: null; retry: RetryStats }>;
  private async request<S extends z.ZodType>(
    url: string,
    init: RequestInit,
    schema: S | null,
    context: RequestContext = {},
  ): Promise<{ data: z.output<S> | null; retry: RetryStats }> {
    let result: RetryResult<RawResponse>;
    try {
      result = await retryWithBackoff(
        () => this.send(url, init, context),
        { maxRetries: this.maxRetries, sleepFn: this.sleepFn, random: this.random },
      );
    } catch (err) {
      if (err instanceof GoogleApiError) {
        this.record(err.retryStats);
      }
      throw err;
    }

    const retry = { retryCount: result.retryCount, totalWaitMs: result.totalWaitMs };
    this.record(retry);

    if (schema === null) {
      return { data: null, retry };
    }
    const parsed = schema.safeParse(result.value.body);
    if (!parsed.success) {
      const error = new InvalidResponseError(
        `Unexpected response shape from ${init.method ?? "GET"} ${stripQuery(url)}: ${parsed.error.message}`,
        result.value.status,
      );
      error.retryStats = retry;
      throw error;
    }
    return { data: parsed.data, retry };
  }

  /** One attempt: acquire the gate, authorise, send, map the status. */
  private async send(
    url: string,
    init: RequestInit,
    context: RequestContext,
  ): Promise<RawResponse> {
    await this.rateLimiter.acquire();

    const headers = new Headers(init.headers);
    headers.set("Authorization", `Bearer ${await this.tokenProvider()}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, { ...init, headers });
    } catch (err) {
      throw toNetworkError(err);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      throw mapErrorResponse(response.status, errorText, context);
    }

    // 204 No Content (DELETE)
    if (response.status === 204) {
      return { status: 204, body: null };
    }

    const text = await response.text();
    if (text.length === 0) {
      return { status: response.status, body: null };
    }
    try {
      const body: unknown = JSON.parse(text);
      return { status: response.status, body };
    } catch {
      throw new InvalidResponseError(
        `Response from ${stripQuery(url)} is not valid JSON`,
        response.status,
      );
    }
  }

  private record(stats: RetryStats): void {
    this.cumulativeRetries += stats.retryCount;
    this.cumulativeWaitMs += stats.totalWaitMs;
  }
}

// ---------------------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------------------

/** Pull the first error reason out of a Google JSON error body. */
export function parseErrorReason(errorText: string): string | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(errorText);
  } catch {
    return undefined;
  }
  const parsed = ApiErrorBodySchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  return parsed.data.error.errors?.find((e) => e.reason !== undefined)?.reason;
}

/**
 * Map a non-2xx response to a typed error.
 *
 * - 401 -> TokenExpiredError
 * - 403 + rate-limit reason -> RateLimitError, otherwise ForbiddenError
 * - 404 -> ResourceNotFoundError
 * - 410 on an incremental list -> SyncTokenExpiredError
 * - 429 -> RateLimitError
 * - 5xx -> ServerError
 * - Other -> GoogleApiError
 */
export function mapErrorResponse(
  status: number,
  errorText: string,
  context: RequestContext = {},
): GoogleApiError {
  switch (status) {
    case 401:
      return new TokenExpiredError(errorText);
    case 403: {
      const reason = parseErrorReason(errorText);
      if (reason !== undefined && RATE_LIMIT_REASONS.includes(reason)) {
        return new RateLimitError(errorText, 403, reason);
      }
      return new ForbiddenError(errorText, reason);
    }
    case 404:
      return new ResourceNotFoundError(errorText);
    case 410:
      return context.incremental
        ? new SyncTokenExpiredError(errorText)
        : new GoogleApiError(errorText, 410);
    case 429:
      return new RateLimitError(errorText, 429, parseErrorReason(errorText));
    default:
      return status >= 500
        ? new ServerError(errorText, status)
        : new GoogleApiError(errorText, status);
  }
}

/** Log-safe URL: query strings carry sync and page tokens. */
function stripQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
}
