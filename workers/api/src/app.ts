/**
 * HTTP surface over a SyncSubsystem.
 *
 * Every response uses the envelope from routes/shared.ts:
 *   { ok, data, error, error_code, meta: { request_id, timestamp } }
 */

import { Hono } from "hono";
import type { SyncSubsystem } from "./subsystem";
import { createRecordRoutes } from "./routes/records";
import { apiErrorResponse, apiSuccessResponse, errorResponse } from "./routes/shared";
import { createSyncRoutes } from "./routes/sync";

export const API_VERSION = "0.1.0";

export function createApp(subsystem: SyncSubsystem): Hono {
  const app = new Hono();

  app.get("/health", () => apiSuccessResponse({ status: "healthy", version: API_VERSION }));

  app.route("/", createSyncRoutes(subsystem));
  app.route("/", createRecordRoutes(subsystem));

  app.notFound(() => apiErrorResponse("NOT_FOUND", "Route not found"));
  app.onError((err) => errorResponse(err));

  return app;
}
