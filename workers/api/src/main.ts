/**
 * Node entry point: load config, open the store, serve the API.
 *
 * Usage: CALSYNC_ACCESS_TOKEN=... npm start
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { serve } from "@hono/node-server";
import {
  ConfigError,
  GoogleCalendarClient,
  SyncRateLimiter,
  errorMessage,
  loadConfig,
  type CalsyncConfig,
} from "@calsync/shared";
import { openLocalStore } from "@calsync/store";
import { createApp } from "./app";
import { SyncSubsystem } from "./subsystem";

function ensureParentDir(path: string): void {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
}

function start(config: CalsyncConfig): void {
  const accessToken = config.accessToken;
  if (accessToken === undefined) {
    throw new ConfigError(["CALSYNC_ACCESS_TOKEN: required to reach the calendar API"]);
  }

  ensureParentDir(config.dbPath);
  ensureParentDir(config.cursorDbPath);
  const store = openLocalStore({ dbPath: config.dbPath, cursorDbPath: config.cursorDbPath });

  const gateway = new GoogleCalendarClient({
    tokenProvider: async () => accessToken,
    rateLimiter: new SyncRateLimiter({ minIntervalMs: config.minIntervalMs }),
    baseUrl: config.apiBase,
    maxRetries: config.maxRetries,
  });

  const subsystem = new SyncSubsystem({
    store,
    gateway,
    targetCollection: config.targetCollection,
    pastWindowDays: config.pastWindowDays,
    futureWindowDays: config.futureWindowDays,
    trashEnabled: config.trashEnabled,
    archiveEpoch: config.archiveEpoch,
  });

  if (subsystem.lifecycle.needsRecovery()) {
    console.warn("api: local cache needs recovery, POST /recovery to rebuild it");
  }
  if (config.syncIntervalMs > 0) {
    subsystem.startPeriodicSync(config.syncIntervalMs);
  }

  const server = serve({ fetch: createApp(subsystem).fetch, port: config.port }, (info) => {
    console.log("api: listening", { port: info.port });
  });

  const shutdown = (): void => {
    console.log("api: shutting down");
    server.close();
    subsystem.close();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

try {
  start(loadConfig());
} catch (err) {
  console.error("api: failed to start", { error: errorMessage(err) });
  process.exitCode = 1;
}
