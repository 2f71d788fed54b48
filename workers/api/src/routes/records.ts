/**
 * Route group: local records and collections.
 *
 * Writes only touch the local store. They reach the remote on the next
 * push.
 */

import { Hono } from "hono";
import { z } from "zod/v4";
import type { SyncSubsystem } from "../subsystem";
import {
  ValidationError,
  apiSuccessResponse,
  instantOrDate,
  parseJsonBody,
  parseQuery,
  queryFlag,
} from "./shared";

const CreateRecordSchema = z
  .object({
    title: z.string().min(1).max(1024),
    body: z.string().max(8192).optional(),
    startAt: instantOrDate,
    endAt: instantOrDate,
    allDay: z.boolean().optional(),
    collectionId: z.string().min(1).optional(),
  })
  .refine((draft) => Date.parse(draft.endAt) >= Date.parse(draft.startAt), {
    message: "endAt must not be before startAt",
    path: ["endAt"],
  });

const UpdateRecordSchema = z.object({
  title: z.string().min(1).max(1024).optional(),
  body: z.string().max(8192).optional(),
  startAt: instantOrDate.optional(),
  endAt: instantOrDate.optional(),
  allDay: z.boolean().optional(),
});

const ResolveSchema = z.object({
  resolution: z.enum(["useLocal", "useRemote"]),
});

const EnabledSchema = z.object({
  enabled: z.boolean(),
});

const ListQuerySchema = z.object({
  status: z.enum(["synced", "pending", "failed"]).optional(),
  includeDeleted: queryFlag.optional(),
  conflictsOnly: queryFlag.optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
});

export function createRecordRoutes(subsystem: SyncSubsystem): Hono {
  const routes = new Hono();

  // =========================================================================
  // Records
  // =========================================================================

  routes.get("/records", (c) => {
    const filter = parseQuery(c.req.query(), ListQuerySchema);
    return apiSuccessResponse(subsystem.listRecords(filter));
  });

  routes.post("/records", async (c) => {
    const draft = await parseJsonBody(c.req.raw, CreateRecordSchema);
    return apiSuccessResponse(subsystem.createRecord(draft), 201);
  });

  routes.get("/records/:id", (c) => apiSuccessResponse(subsystem.getRecord(c.req.param("id"))));

  routes.patch("/records/:id", async (c) => {
    const changes = await parseJsonBody(c.req.raw, UpdateRecordSchema);
    const current = subsystem.getRecord(c.req.param("id"));
    const startAt = changes.startAt ?? current.startAt;
    const endAt = changes.endAt ?? current.endAt;
    if (Date.parse(endAt) < Date.parse(startAt)) {
      throw new ValidationError("endAt: endAt must not be before startAt");
    }
    return apiSuccessResponse(subsystem.updateRecord(current.recordId, changes));
  });

  routes.delete("/records/:id", (c) =>
    apiSuccessResponse(subsystem.deleteRecord(c.req.param("id"))),
  );

  routes.post("/records/:id/resolve", async (c) => {
    const { resolution } = await parseJsonBody(c.req.raw, ResolveSchema);
    return apiSuccessResponse(subsystem.resolveConflict(c.req.param("id"), resolution));
  });

  // =========================================================================
  // Collections
  // =========================================================================

  routes.get("/collections", () => apiSuccessResponse(subsystem.listCollections()));

  routes.put("/collections/:id/enabled", async (c) => {
    const { enabled } = await parseJsonBody(c.req.raw, EnabledSchema);
    return apiSuccessResponse(subsystem.setCollectionEnabled(c.req.param("id"), enabled));
  });

  return routes;
}
