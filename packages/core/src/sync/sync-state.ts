/**
 * Sync State Management
 *
 * Persists sync metadata to <configDir>/sync-state.json
 * Tracks: last pull/push times, last error, consecutive failures
 *
 * This is diagnostic metadata. It never gates a sync cycle and carries no
 * transactional meaning.
 */

import { z } from "zod";
import { existsSync, readFileSync, writeFileSync, mkdirSync } from "fs";
import { join } from "path";

// --- Schema ---

export const SyncStateSchema = z.object({
  version: z.literal("1.0.0"),
  lastPullAt: z.string().nullable(), // ISO timestamp of last completed pull cycle
  lastPushAt: z.string().nullable(), // ISO timestamp of last completed push cycle
  lastSyncError: z.string().nullable(),
  consecutiveFailures: z.number().int().min(0),
});

export type SyncState = z.infer<typeof SyncStateSchema>;

export interface SyncStateStore {
  load: () => SyncState;
  save: (state: SyncState) => void;
}

// --- Factory ---

export function createEmptySyncState(): SyncState {
  return {
    version: "1.0.0",
    lastPullAt: null,
    lastPushAt: null,
    lastSyncError: null,
    consecutiveFailures: 0,
  };
}

// --- Stores ---

export const SYNC_STATE_FILE = "sync-state.json";

/**
 * File-backed store. Unreadable or invalid files load as empty state.
 */
export function createFileSyncStateStore(configDir: string): SyncStateStore {
  const stateFile = join(configDir, SYNC_STATE_FILE);

  function load(): SyncState {
    if (!existsSync(stateFile)) {
      return createEmptySyncState();
    }

    try {
      const data = readFileSync(stateFile, "utf-8");
      const parsed = SyncStateSchema.safeParse(JSON.parse(data));
      if (parsed.success) {
        return parsed.data;
      }
      // Invalid schema, start over
      return createEmptySyncState();
    } catch {
      // Parse error, start over
      return createEmptySyncState();
    }
  }

  function save(state: SyncState): void {
    if (!existsSync(configDir)) {
      mkdirSync(configDir, { recursive: true, mode: 0o700 });
    }
    writeFileSync(stateFile, JSON.stringify(state, null, 2), { mode: 0o600 });
  }

  return { load, save };
}

export function createMemorySyncStateStore(
  initial: SyncState = createEmptySyncState()
): SyncStateStore {
  let state = initial;
  return {
    load: () => state,
    save: (next) => {
      state = next;
    },
  };
}

// --- Mutation Helpers ---

export function markPushComplete(
  state: SyncState,
  now: Date = new Date()
): SyncState {
  return {
    ...state,
    lastPushAt: now.toISOString(),
    lastSyncError: null,
    consecutiveFailures: 0,
  };
}

export function markPullComplete(
  state: SyncState,
  now: Date = new Date()
): SyncState {
  return {
    ...state,
    lastPullAt: now.toISOString(),
    lastSyncError: null,
    consecutiveFailures: 0,
  };
}

export function markSyncError(state: SyncState, error: string): SyncState {
  return {
    ...state,
    lastSyncError: error,
    consecutiveFailures: state.consecutiveFailures + 1,
  };
}
