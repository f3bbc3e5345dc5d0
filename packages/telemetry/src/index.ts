/**
 * @listsync/telemetry - Privacy-conscious analytics for listsync
 *
 * Usage:
 * ```typescript
 * import { getTelemetryClient, shutdownTelemetry } from "@listsync/telemetry";
 *
 * const telemetry = getTelemetryClient();
 * telemetry.setSurface("cli");
 * telemetry.trackCommand("lists", true);
 *
 * // On process exit
 * await shutdownTelemetry();
 * ```
 */

// Client exports
export {
  TelemetryClient,
  getTelemetryClient,
  initTelemetry,
  shutdownTelemetry,
  resetTelemetryClient,
} from "./client.js";
export type { TelemetryClientOptions } from "./client.js";

// Event exports
export {
  TelemetryEventSchema,
  EVENT_TYPES,
  SyncStartedEventSchema,
  SyncStoppedEventSchema,
  SyncFailedEventSchema,
  SyncCycleCompletedEventSchema,
  CommandRunEventSchema,
  SyncTriggerSchema,
  SyncStageSchema,
  SyncDirectionSchema,
} from "./events.js";
export type {
  TelemetryEvent,
  TelemetrySink,
  EventType,
  SyncTrigger,
  SyncStage,
  SyncDirection,
} from "./events.js";

// Config exports
export {
  TelemetryConfigSchema,
  loadTelemetryConfig,
  saveTelemetryConfig,
  isTelemetryEnabled,
} from "./config.js";
export type { TelemetryConfig } from "./config.js";

// User ID exports
export {
  getAnonymousUserId,
  getDeviceId,
  hashForAnonymity,
  setConfigDir,
  getConfigDir,
} from "./user-id.js";
