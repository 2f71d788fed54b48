/**
 * @calsync/api -- SyncSubsystem facade and its HTTP surface.
 */

export { SyncSubsystem, NotFoundError } from "./subsystem";
export type { SubsystemStatus, SyncSubsystemOptions } from "./subsystem";
export { createApp, API_VERSION } from "./app";
export {
  ErrorCode,
  ValidationError,
  errorCodeFor,
  successEnvelope,
  errorEnvelope,
} from "./routes/shared";
export type { ApiEnvelope, ErrorCodeName } from "./routes/shared";
