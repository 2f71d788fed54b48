/**
 * @calsync/shared -- Environment configuration.
 *
 * Every tunable of the engine comes from environment variables, validated
 * once at startup with zod. Invalid values fail fast with one message that
 * names every offending key.
 */

import { z } from "zod/v4";
import {
  DEFAULT_API_BASE,
  DEFAULT_ARCHIVE_EPOCH,
  DEFAULT_FUTURE_WINDOW_DAYS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MIN_INTERVAL_MS,
  DEFAULT_PAST_WINDOW_DAYS,
  DEFAULT_SYNC_INTERVAL_MS,
  DEFAULT_TARGET_COLLECTION,
} from "./constants";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const nonNegativeInt = z.coerce.number().int().min(0);
const positiveInt = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
  CALSYNC_DB_PATH: z.string().min(1).default("./data/calsync.db"),
  CALSYNC_CURSOR_DB_PATH: z.string().min(1).default("./data/cursors.db"),
  CALSYNC_ACCESS_TOKEN: z.string().min(1).optional(),
  CALSYNC_API_BASE: z.url().default(DEFAULT_API_BASE),
  CALSYNC_TARGET_COLLECTION: z.string().min(1).default(DEFAULT_TARGET_COLLECTION),
  CALSYNC_MIN_INTERVAL_MS: nonNegativeInt.default(DEFAULT_MIN_INTERVAL_MS),
  CALSYNC_MAX_RETRIES: nonNegativeInt.default(DEFAULT_MAX_RETRIES),
  CALSYNC_PAST_DAYS: positiveInt.default(DEFAULT_PAST_WINDOW_DAYS),
  CALSYNC_FUTURE_DAYS: positiveInt.default(DEFAULT_FUTURE_WINDOW_DAYS),
  CALSYNC_TRASH_ENABLED: booleanFlag.default(false),
  CALSYNC_ARCHIVE_EPOCH: z.iso.date().default(DEFAULT_ARCHIVE_EPOCH),
  CALSYNC_SYNC_INTERVAL_MS: nonNegativeInt.default(DEFAULT_SYNC_INTERVAL_MS),
  PORT: positiveInt.max(65_535).default(8787),
});

// ---------------------------------------------------------------------------
// Typed config
// ---------------------------------------------------------------------------

export interface CalsyncConfig {
  readonly dbPath: string;
  readonly cursorDbPath: string;
  readonly accessToken: string | undefined;
  readonly apiBase: string;
  readonly targetCollection: string;
  readonly minIntervalMs: number;
  readonly maxRetries: number;
  readonly pastWindowDays: number;
  readonly futureWindowDays: number;
  readonly trashEnabled: boolean;
  readonly archiveEpoch: string;
  /** 0 disables periodic sync. */
  readonly syncIntervalMs: number;
  readonly port: number;
}

/** Raised when the environment does not validate. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Read and validate the configuration.
 *
 * Empty strings count as unset so `FOO=` in an env file means "default".
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): CalsyncConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      cleaned[key] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const c = parsed.data;
  return Object.freeze({
    dbPath: c.CALSYNC_DB_PATH,
    cursorDbPath: c.CALSYNC_CURSOR_DB_PATH,
    accessToken: c.CALSYNC_ACCESS_TOKEN,
    apiBase: c.CALSYNC_API_BASE,
    targetCollection: c.CALSYNC_TARGET_COLLECTION,
    minIntervalMs: c.CALSYNC_MIN_INTERVAL_MS,
    maxRetries: c.CALSYNC_MAX_RETRIES,
    pastWindowDays: c.CALSYNC_PAST_DAYS,
    futureWindowDays: c.CALSYNC_FUTURE_DAYS,
    trashEnabled: c.CALSYNC_TRASH_ENABLED,
    archiveEpoch: c.CALSYNC_ARCHIVE_EPOCH,
    syncIntervalMs: c.CALSYNC_SYNC_INTERVAL_MS,
    port: c.PORT,
  });
}
