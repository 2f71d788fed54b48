/**
 * Route group: sync triggers, archive import, recovery, status and
 * telemetry.
 *
 * Archive import and recovery answer when the run finishes. A cancelled
 * run answers 409 CANCELLED.
 */

import { Hono } from "hono";
import { z } from "zod/v4";
import type { SyncSubsystem } from "../subsystem";
import { apiSuccessResponse, parseJsonBody, parseQuery } from "./shared";

const PullSchema = z.object({
  pastWindowDays: z.number().int().positive().optional(),
  futureWindowDays: z.number().int().positive().optional(),
});

const PeriodicSchema = z.object({
  intervalMs: z.number().int().min(1000).optional(),
});

const ArchiveImportSchema = z.object({
  collectionIds: z.array(z.string().min(1)).optional(),
  force: z.boolean().optional(),
});

const RecoverySchema = z.object({
  preserveRecords: z.boolean().default(true),
});

const TelemetryQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
  syncType: z.enum(["push", "incremental", "full", "archive", "recovery"]).optional(),
});

export function createSyncRoutes(subsystem: SyncSubsystem): Hono {
  const routes = new Hono();

  routes.get("/status", () => apiSuccessResponse(subsystem.status()));

  routes.get("/integrity", () => apiSuccessResponse(subsystem.checkIntegrity()));

  routes.get("/telemetry", (c) => {
    const query = parseQuery(c.req.query(), TelemetryQuerySchema);
    return apiSuccessResponse(subsystem.telemetry(query));
  });

  // =========================================================================
  // Sync
  // =========================================================================

  routes.post("/sync/run", async () => apiSuccessResponse(await subsystem.runFullSyncCycle()));

  routes.post("/sync/push", async () => apiSuccessResponse(await subsystem.pushLocalChanges()));

  routes.post("/sync/pull", async (c) => {
    const body = await parseJsonBody(c.req.raw, PullSchema);
    return apiSuccessResponse(
      await subsystem.pullRemoteChanges(body.pastWindowDays, body.futureWindowDays),
    );
  });

  routes.post("/sync/retry-failed", async () =>
    apiSuccessResponse(await subsystem.retryFailedPushes()),
  );

  routes.post("/sync/periodic", async (c) => {
    const body = await parseJsonBody(c.req.raw, PeriodicSchema);
    subsystem.startPeriodicSync(body.intervalMs);
    return apiSuccessResponse(subsystem.status());
  });

  routes.delete("/sync/periodic", () => {
    subsystem.stopPeriodicSync();
    return apiSuccessResponse(subsystem.status());
  });

  // =========================================================================
  // Archive
  // =========================================================================

  routes.post("/archive/import", async (c) => {
    const body = await parseJsonBody(c.req.raw, ArchiveImportSchema);
    const result = await subsystem.importFullArchive(body.collectionIds, undefined, {
      force: body.force,
    });
    return apiSuccessResponse(result);
  });

  routes.post("/archive/import/cancel", () => {
    subsystem.cancelArchiveImport();
    return apiSuccessResponse({ cancelled: true });
  });

  // =========================================================================
  // Recovery
  // =========================================================================

  routes.post("/recovery", async (c) => {
    const body = await parseJsonBody(c.req.raw, RecoverySchema);
    return apiSuccessResponse(await subsystem.recoverFromRemote(body.preserveRecords));
  });

  routes.post("/recovery/cancel", () => {
    subsystem.cancelRecovery();
    return apiSuccessResponse({ cancelled: true });
  });

  return routes;
}
