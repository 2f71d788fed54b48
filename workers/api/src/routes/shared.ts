/**
 * Shared types and helpers for the route modules: the response envelope,
 * error-to-status mapping, and zod-validated request parsing.
 */

import { z } from "zod/v4";
import {
  ConflictResolutionError,
  GoogleApiError,
  LocalStorageError,
  NetworkError,
  OperationCancelledError,
  RateLimitError,
  errorMessage,
} from "@calsync/shared";
import { NotFoundError } from "../subsystem";

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  CANCELLED: 409,
  PROVIDER_QUOTA: 429,
  STORAGE_ERROR: 500,
  INTERNAL_ERROR: 500,
  PROVIDER_ERROR: 502,
} as const;

export type ErrorCodeName = keyof typeof ErrorCode;

// ---------------------------------------------------------------------------
// Response envelope
// ---------------------------------------------------------------------------

export interface ApiEnvelope<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  error_code?: ErrorCodeName;
  meta: {
    request_id: string;
    timestamp: string;
  };
}

/** Generate a short request ID (not cryptographically secure, just for tracing). */
function generateRequestId(): string {
  const ts = Date.now().toString(36);
  const rand = Math.random().toString(36).slice(2, 8);
  return `req_${ts}_${rand}`;
}

export function successEnvelope<T>(data: T): ApiEnvelope<T> {
  return {
    ok: true,
    data,
    meta: {
      request_id: generateRequestId(),
      timestamp: new Date().toISOString(),
    },
  };
}

export function errorEnvelope(error: string, code: ErrorCodeName): ApiEnvelope {
  return {
    ok: false,
    error,
    error_code: code,
    meta: {
      request_id: generateRequestId(),
      timestamp: new Date().toISOString(),
    },
  };
}

export function jsonResponse(envelope: ApiEnvelope, status: number): Response {
  return new Response(JSON.stringify(envelope), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function apiSuccessResponse<T>(data: T, status = 200): Response {
  return jsonResponse(successEnvelope(data), status);
}

export function apiErrorResponse(code: ErrorCodeName, message: string): Response {
  return jsonResponse(errorEnvelope(message, code), ErrorCode[code]);
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** A request body or query that failed validation. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Pick the envelope code for an error thrown by a handler. */
export function errorCodeFor(err: unknown): ErrorCodeName {
  if (err instanceof ValidationError) return "VALIDATION_ERROR";
  if (err instanceof NotFoundError) return "NOT_FOUND";
  if (err instanceof ConflictResolutionError) return "CONFLICT";
  if (err instanceof OperationCancelledError) return "CANCELLED";
  if (err instanceof RateLimitError) return "PROVIDER_QUOTA";
  if (err instanceof GoogleApiError || err instanceof NetworkError) return "PROVIDER_ERROR";
  if (err instanceof LocalStorageError) return "STORAGE_ERROR";
  return "INTERNAL_ERROR";
}

/** Map a thrown error onto an error envelope. Unexpected errors are logged. */
export function errorResponse(err: unknown): Response {
  const code = errorCodeFor(err);
  if (code === "INTERNAL_ERROR" || code === "STORAGE_ERROR") {
    console.error("api: request failed", { code, error: errorMessage(err) });
    return apiErrorResponse(code, code === "STORAGE_ERROR" ? errorMessage(err) : "Internal error");
  }
  return apiErrorResponse(code, errorMessage(err));
}

// ---------------------------------------------------------------------------
// Request parsing
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Read and validate a JSON body. An empty body validates as `{}` so that
 * schemas with only optional fields accept a bare POST.
 *
 * @throws ValidationError
 */
export async function parseJsonBody<T>(request: Request, schema: z.ZodType<T>): Promise<T> {
  const text = await request.text();
  let raw: unknown = {};
  if (text.trim() !== "") {
    try {
      raw = JSON.parse(text);
    } catch {
      throw new ValidationError("Request body must be valid JSON");
    }
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

/** @throws ValidationError */
export function parseQuery<T>(query: Record<string, string>, schema: z.ZodType<T>): T {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Common schemas
// ---------------------------------------------------------------------------

/** "true"/"false"/"1"/"0" query flags. */
export const queryFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

/** A timed ISO instant or an all-day YYYY-MM-DD date. */
export const instantOrDate = z.union([z.iso.datetime({ offset: true }), z.iso.date()]);
