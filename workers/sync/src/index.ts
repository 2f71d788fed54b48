/**
 * @calsync/sync-worker -- Push/pull sync between local records and the
 * remote calendar.
 */

export { SyncOrchestrator } from "./orchestrator";
export type {
  SyncState,
  PushResult,
  PullResult,
  CollectionPullResult,
  SyncCycleResult,
  PostCycleHook,
  SyncOrchestratorOptions,
} from "./orchestrator";
export { applyRemoteItems, addCounts } from "./apply";
export type { ApplyOptions } from "./apply";
export { isConflict, markConflict, resolveConflict } from "./conflict";
export type { ConflictResolution } from "./conflict";
