/**
 * @calsync/shared -- Error taxonomy.
 *
 * Every failure the engine can surface maps to one of these classes:
 * - NetworkError: the request never produced an HTTP response
 * - GoogleApiError and subclasses: the remote answered with a non-2xx
 * - SyncTokenExpiredError: the distinguished 410 "cursor expired" case
 * - LocalStorageError: the local SQLite store failed
 * - ConflictResolutionError: resolve() called on a record with no conflict
 * - OperationCancelledError: a cooperative cancellation was observed
 *
 * `retryable` says whether retrying the same call could succeed. It does
 * not mean the engine retries it automatically; only rate limiting is
 * retried inside the gateway.
 */

import type { ErrorKind, RetryStats } from "./types";

const NO_RETRIES: RetryStats = { retryCount: 0, totalWaitMs: 0 };

// ---------------------------------------------------------------------------
// Network
// ---------------------------------------------------------------------------

export type NetworkErrorKind =
  | "timeout"
  | "connection-failed"
  | "no-connection"
  | "dns"
  | "other";

/** The transport failed before any HTTP status was received. */
export class NetworkError extends Error {
  readonly kind: NetworkErrorKind;

  constructor(kind: NetworkErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
    this.kind = kind;
  }

  get retryable(): boolean {
    return this.kind !== "dns" && this.kind !== "other";
  }
}

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);
const NO_CONNECTION_CODES = new Set(["ENETUNREACH", "ENETDOWN", "EHOSTUNREACH"]);
const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);
const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);

function errorCode(value: unknown): string | undefined {
  if (typeof value !== "object" || value === null || !("code" in value)) {
    return undefined;
  }
  return typeof value.code === "string" ? value.code : undefined;
}

/**
 * Classify an exception thrown by fetch() into a NetworkError.
 *
 * Node's fetch wraps socket errors as `TypeError("fetch failed")` with the
 * system error on `cause`.
 */
export function toNetworkError(err: unknown): NetworkError {
  if (err instanceof NetworkError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return new NetworkError("timeout", message, { cause: err });
  }

  const code = errorCode(err) ?? (err instanceof Error ? errorCode(err.cause) : undefined);
  if (code !== undefined) {
    if (TIMEOUT_CODES.has(code)) return new NetworkError("timeout", message, { cause: err });
    if (DNS_CODES.has(code)) return new NetworkError("dns", message, { cause: err });
    if (NO_CONNECTION_CODES.has(code)) return new NetworkError("no-connection", message, { cause: err });
    if (CONNECTION_CODES.has(code)) return new NetworkError("connection-failed", message, { cause: err });
  }
  if (err instanceof TypeError) {
    return new NetworkError("connection-failed", message, { cause: err });
  }
  return new NetworkError("other", message, { cause: err });
}

// ---------------------------------------------------------------------------
// Remote API
// ---------------------------------------------------------------------------

/** Base class for all Google Calendar API errors. */
export class GoogleApiError extends Error {
  readonly statusCode: number;
  /** Google error reason (e.g. "rateLimitExceeded"), when the body carried one. */
  readonly reason: string | undefined;
  /** Retries performed before this error was surfaced. */
  retryStats: RetryStats = NO_RETRIES;

  constructor(message: string, statusCode: number, reason?: string) {
    super(message);
    this.name = "GoogleApiError";
    this.statusCode = statusCode;
    this.reason = reason;
  }

  get retryable(): boolean {
    return this.statusCode >= 500;
  }
}

/** 401 -- access token expired or invalid. The token provider must refresh. */
export class TokenExpiredError extends GoogleApiError {
  constructor(message = "Access token expired or invalid") {
    super(message, 401);
    this.name = "TokenExpiredError";
  }

  override get retryable(): boolean {
    return true;
  }
}

/** 403 without a rate-limit reason. */
export class ForbiddenError extends GoogleApiError {
  constructor(message = "Forbidden", reason?: string) {
    super(message, 403, reason);
    this.name = "ForbiddenError";
  }
}

/** 404 -- requested resource not found. */
export class ResourceNotFoundError extends GoogleApiError {
  constructor(message = "Resource not found") {
    super(message, 404);
    this.name = "ResourceNotFoundError";
  }
}

/** 410 Gone on an incremental list -- the cursor must be replaced by a full pull. */
export class SyncTokenExpiredError extends GoogleApiError {
  constructor(message = "Sync token expired, full sync required") {
    super(message, 410);
    this.name = "SyncTokenExpiredError";
  }
}

/** 429, or 403 with a rate-limit reason. */
export class RateLimitError extends GoogleApiError {
  constructor(message = "Rate limited by Google Calendar API", statusCode = 429, reason?: string) {
    super(message, statusCode, reason);
    this.name = "RateLimitError";
  }

  override get retryable(): boolean {
    return true;
  }
}

/** 5xx. */
export class ServerError extends GoogleApiError {
  constructor(message: string, statusCode: number) {
    super(message, statusCode);
    this.name = "ServerError";
  }
}

/** A 2xx body that could not be decoded into the expected shape. */
export class InvalidResponseError extends GoogleApiError {
  constructor(message: string, statusCode: number) {
    super(message, statusCode);
    this.name = "InvalidResponseError";
  }

  override get retryable(): boolean {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Local storage
// ---------------------------------------------------------------------------

export type LocalStorageErrorKind = "write" | "read" | "integrity" | "storage-full";

/** The local store failed. Never retried automatically. */
export class LocalStorageError extends Error {
  readonly kind: LocalStorageErrorKind;

  constructor(kind: LocalStorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LocalStorageError";
    this.kind = kind;
  }

  get retryable(): boolean {
    return false;
  }
}

// ---------------------------------------------------------------------------
// Conflict / cancellation
// ---------------------------------------------------------------------------

/** resolve() was called on a record that has no recorded conflict. */
export class ConflictResolutionError extends Error {
  readonly recordId: string;

  constructor(recordId: string, message = `Record ${recordId} has no conflict to resolve`) {
    super(message);
    this.name = "ConflictResolutionError";
    this.recordId = recordId;
  }
}

/** A cooperative cancellation signal was observed between steps. */
export class OperationCancelledError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "OperationCancelledError";
  }
}

/** Throw OperationCancelledError if the signal is aborted. */
export function throwIfCancelled(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(`${what} cancelled`);
  }
}

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

/** Map any thrown value to the telemetry error kind. */
export function classifyError(err: unknown): ErrorKind {
  if (err instanceof SyncTokenExpiredError) return "cursor-expired";
  if (err instanceof GoogleApiError) return "remote-api";
  if (err instanceof NetworkError) return "network";
  if (err instanceof LocalStorageError) return "local-storage";
  if (err instanceof OperationCancelledError) return "cancelled";
  return "unknown";
}

/** HTTP status carried by the error, if it came from the remote. */
export function httpStatusOf(err: unknown): number | null {
  return err instanceof GoogleApiError ? err.statusCode : null;
}

/** Retry stats carried by the error, if it came from the remote. */
export function retryStatsOf(err: unknown): RetryStats {
  return err instanceof GoogleApiError ? err.retryStats : NO_RETRIES;
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
