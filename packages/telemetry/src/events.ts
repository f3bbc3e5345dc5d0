/**
 * Telemetry event type definitions with Zod schemas
 *
 * PRIVACY: These events track metadata only, NEVER content.
 * - Counts and durations, not list names or item text
 * - Command names, not arguments
 * - No list, item or principal ids
 */

import { z } from "zod";

// --- Enums (reused across events) ---

export const SyncTriggerSchema = z.enum(["manual", "auth", "resume"]);

export const SyncStageSchema = z.enum([
  "subscribe",
  "local_stream",
  "remote_stream",
]);

export const SyncDirectionSchema = z.enum(["push", "pull"]);

// --- Sync Lifecycle Events ---

export const SyncStartedEventSchema = z.object({
  event: z.literal("sync.started"),
  properties: z.object({
    trigger: SyncTriggerSchema,
  }),
});

export const SyncStoppedEventSchema = z.object({
  event: z.literal("sync.stopped"),
  properties: z.object({
    was_running: z.boolean(),
  }),
});

export const SyncFailedEventSchema = z.object({
  event: z.literal("sync.failed"),
  properties: z.object({
    stage: SyncStageSchema,
  }),
});

// --- Sync Cycle Events ---

export const SyncCycleCompletedEventSchema = z.object({
  event: z.literal("sync.cycle_completed"),
  properties: z.object({
    direction: SyncDirectionSchema,
    lists: z.number().int().min(0),
    writes: z.number().int().min(0),
    failures: z.number().int().min(0),
    duration_ms: z.number().min(0),
  }),
});

// --- CLI Events ---

export const CommandRunEventSchema = z.object({
  event: z.literal("cli.command_run"),
  properties: z.object({
    command: z.string(),
    success: z.boolean(),
  }),
});

// --- Union type for all events ---

export const TelemetryEventSchema = z.discriminatedUnion("event", [
  SyncStartedEventSchema,
  SyncStoppedEventSchema,
  SyncFailedEventSchema,
  SyncCycleCompletedEventSchema,
  CommandRunEventSchema,
]);

export type TelemetryEvent = z.infer<typeof TelemetryEventSchema>;
export type SyncTrigger = z.infer<typeof SyncTriggerSchema>;
export type SyncStage = z.infer<typeof SyncStageSchema>;
export type SyncDirection = z.infer<typeof SyncDirectionSchema>;

// --- Event type literals for convenience ---

export type EventType = TelemetryEvent["event"];

export const EVENT_TYPES = {
  SYNC_STARTED: "sync.started",
  SYNC_STOPPED: "sync.stopped",
  SYNC_FAILED: "sync.failed",
  SYNC_CYCLE_COMPLETED: "sync.cycle_completed",
  COMMAND_RUN: "cli.command_run",
} as const satisfies Record<string, EventType>;

/**
 * Anything that accepts telemetry events. The sync engine depends on this
 * rather than on the PostHog client.
 */
export interface TelemetrySink {
  track: (event: TelemetryEvent) => void;
}
