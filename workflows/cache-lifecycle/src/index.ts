/**
 * @calsync/workflow-cache-lifecycle -- Hot cache eviction, integrity checks
 * and rebuild from the remote.
 */

export { CacheLifecycleManager } from "./lifecycle";
export type {
  CacheLifecycleOptions,
  IntegrityReport,
  RecoveryOptions,
  RecoveryPhase,
  RecoveryProgress,
  RecoveryProgressCallback,
  RecoveryResult,
} from "./lifecycle";
