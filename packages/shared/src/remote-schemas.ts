/**
 * Zod schemas for the Google Calendar v3 payloads the gateway decodes.
 *
 * Only the fields the engine reads are declared; anything else the API
 * returns is stripped. A body that fails these schemas surfaces as
 * InvalidResponseError rather than an untyped crash further down.
 */

import { z } from "zod/v4";

// ---------------------------------------------------------------------------
// Items (events)
// ---------------------------------------------------------------------------

export const EventDateTimeSchema = z.object({
  dateTime: z.string().optional(),
  date: z.string().optional(),
  timeZone: z.string().optional(),
});

export const RemoteItemSchema = z.object({
  id: z.string().min(1),
  summary: z.string().optional(),
  description: z.string().optional(),
  start: EventDateTimeSchema.optional(),
  end: EventDateTimeSchema.optional(),
  status: z.string().optional(),
  updated: z.string().optional(),
  extendedProperties: z
    .object({
      private: z.record(z.string(), z.string()).optional(),
      shared: z.record(z.string(), z.string()).optional(),
    })
    .optional(),
});

/** Raw shape from GET /calendars/{id}/events */
export const ItemListResponseSchema = z.object({
  items: z.array(RemoteItemSchema).default([]),
  nextPageToken: z.string().optional(),
  nextSyncToken: z.string().optional(),
});

export type ItemListResponse = z.infer<typeof ItemListResponseSchema>;

// ---------------------------------------------------------------------------
// Collections (calendarList)
// ---------------------------------------------------------------------------

export const RemoteCollectionSchema = z.object({
  id: z.string().min(1),
  summary: z.string().default(""),
  primary: z.boolean().default(false),
  backgroundColor: z.string().optional(),
  accessRole: z.string().optional(),
});

/** Raw shape from GET /users/me/calendarList */
export const CollectionListResponseSchema = z.object({
  items: z.array(RemoteCollectionSchema).default([]),
  nextPageToken: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Error body
// ---------------------------------------------------------------------------

/**
 * Google JSON error envelope:
 * `{ "error": { "code": 403, "message": "...", "errors": [{ "reason": "rateLimitExceeded" }] } }`
 */
export const ApiErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
    errors: z
      .array(
        z.object({
          reason: z.string().optional(),
          message: z.string().optional(),
        }),
      )
      .optional(),
  }),
});

export type ApiErrorBody = z.infer<typeof ApiErrorBodySchema>;
