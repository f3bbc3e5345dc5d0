/**
 * Sync Service
 *
 * Keeps the local store and the remote store converged while it is running.
 * Two independent subscriptions do the work:
 *
 *   local  -> remote: every local snapshot is pushed list by list
 *   remote -> local: every remote snapshot is merged into the local store
 *
 * Each stream is consumed serially. The two streams interleave freely and
 * share no lock; the timestamp tolerance in the conflict resolver and the
 * change detector's write guard are what stop them from ping-ponging.
 *
 * Usage:
 *   const sync = createSyncService({ local, remote, identity });
 *   sync.startSync();
 *   ...
 *   sync.stopSync();
 */

import type { SyncTrigger, SyncStage, TelemetrySink } from "@listsync/telemetry";
import {
  activeItems,
  deletedItems,
  isTombstone,
  removeItems,
  type ListMetadata,
  type ShoppingList,
} from "../schema/shopping-list.js";
import { shouldUpdateLocal } from "./change-detector.js";
import { mergeLists, retainPendingTombstones } from "./conflict-resolver.js";
import { errorMessage } from "./result.js";
import {
  consumeSerially,
  createValueStore,
  type SerialConsumer,
  type Unsubscribe,
} from "./snapshot-stream.js";
import {
  createMemorySyncStateStore,
  markPullComplete,
  markPushComplete,
  markSyncError,
  type SyncState,
  type SyncStateStore,
} from "./sync-state.js";
import type { IdentityProvider, LocalListStore, RemoteListStore } from "./types.js";

// --- Types ---

export type SyncStatus = "idle" | "syncing" | "synced" | "error";

export interface SyncServiceOptions {
  local: LocalListStore;
  remote: RemoteListStore;
  identity: IdentityProvider;
  /** Defaults to an in-memory store */
  stateStore?: SyncStateStore;
  telemetry?: TelemetrySink;
}

export interface SyncService {
  startSync: (trigger?: SyncTrigger) => void;
  stopSync: () => void;
  getStatus: () => SyncStatus;
  onStatusChange: (listener: (status: SyncStatus) => void) => Unsubscribe;
  getLastError: () => string | null;
  /** True while both subscriptions are attached */
  isRunning: () => boolean;
  getSyncState: () => SyncState;
  /** Resolves once neither stream has queued or in-flight work */
  drained: () => Promise<void>;
}

interface CycleStats {
  lists: number;
  writes: number;
  failures: number;
  lastError: string | null;
}

function createCycleStats(lists: number): CycleStats {
  return { lists, writes: 0, failures: 0, lastError: null };
}

function recordFailure(stats: CycleStats, error: string): void {
  stats.failures += 1;
  stats.lastError = error;
}

function pickMetadata(list: ShoppingList): ListMetadata {
  return {
    name: list.name,
    description: list.description,
    color: list.color,
    members: list.members,
    updatedAt: list.updatedAt,
  };
}

// --- Implementation ---

export function createSyncService(options: SyncServiceOptions): SyncService {
  const { local, remote, identity, telemetry } = options;
  const stateStore = options.stateStore ?? createMemorySyncStateStore();

  const status = createValueStore<SyncStatus>("idle");
  let lastError: string | null = null;
  let localConsumer: SerialConsumer | null = null;
  let remoteConsumer: SerialConsumer | null = null;
  // Deletions the remote store confirmed. A remote snapshot queried before
  // the delete must not bring them back; an id is dropped once a snapshot
  // no longer contains it.
  const purgedListIds = new Set<string>();
  const purgedItemIds = new Map<string, Set<string>>();

  function updateState(change: (state: SyncState) => SyncState): void {
    try {
      stateStore.save(change(stateStore.load()));
    } catch (err) {
      console.error("[SyncService] Failed to save sync state:", err);
    }
  }

  function teardown(): boolean {
    const wasRunning = localConsumer !== null || remoteConsumer !== null;
    localConsumer?.cancel();
    remoteConsumer?.cancel();
    localConsumer = null;
    remoteConsumer = null;
    return wasRunning;
  }

  function enterError(stage: SyncStage, err: unknown): void {
    teardown();
    const message = errorMessage(err);
    lastError = message;
    console.error(`[SyncService] Sync failed (${stage}):`, message);
    status.set("error");
    updateState((state) => markSyncError(state, message));
    telemetry?.track({ event: "sync.failed", properties: { stage } });
  }

  function finishCycle(
    direction: "push" | "pull",
    stats: CycleStats,
    startedAt: number
  ): void {
    if (stats.failures === 0) {
      updateState((state) =>
        direction === "push" ? markPushComplete(state) : markPullComplete(state)
      );
    } else {
      updateState((state) =>
        markSyncError(state, stats.lastError ?? `${direction} failed`)
      );
    }

    telemetry?.track({
      event: "sync.cycle_completed",
      properties: {
        direction,
        lists: stats.lists,
        writes: stats.writes,
        failures: stats.failures,
        duration_ms: Date.now() - startedAt,
      },
    });
  }

  // --- Local -> remote ---

  async function pushLocalLists(lists: ShoppingList[]): Promise<void> {
    const startedAt = Date.now();
    const stats = createCycleStats(lists.length);

    for (const list of lists) {
      if (isTombstone(list)) {
        await pushListDeletion(list, stats);
      } else {
        await pushList(list, stats);
      }
    }

    finishCycle("push", stats, startedAt);
  }

  async function pushListDeletion(list: ShoppingList, stats: CycleStats): Promise<void> {
    // Guard before the call: the snapshot the delete publishes may be
    // handled before the call returns
    purgedListIds.add(list.id);
    const deleted = await remote.deleteEntity(list.id);
    if (!deleted.success) {
      purgedListIds.delete(list.id);
      console.error(`[SyncService] Failed to delete list ${list.id} remotely:`, deleted.error);
      recordFailure(stats, deleted.error);
      return;
    }
    stats.writes += 1;

    const purged = await local.hardDelete(list.id);
    if (!purged.success) {
      console.error(`[SyncService] Failed to purge list ${list.id} locally:`, purged.error);
      recordFailure(stats, purged.error);
    }
  }

  async function pushList(list: ShoppingList, stats: CycleStats): Promise<void> {
    const created = await remote.create(list);
    if (created.success) {
      stats.writes += 1;
      await pushItemDeletions(list, stats);
      return;
    }

    // Most often the list already exists remotely
    const updated = await remote.updateMetadata(list.id, pickMetadata(list));
    if (!updated.success) {
      console.error(`[SyncService] Failed to push list ${list.id}:`, updated.error);
      recordFailure(stats, updated.error);
      return;
    }
    stats.writes += 1;

    for (const item of activeItems(list)) {
      const pushed = await remote.pushItem(list.id, item);
      if (pushed.success) {
        stats.writes += 1;
      } else {
        console.error(
          `[SyncService] Failed to push item ${item.id} of list ${list.id}:`,
          pushed.error
        );
        recordFailure(stats, pushed.error);
      }
    }

    await pushItemDeletions(list, stats);
  }

  function guardItem(listId: string, itemId: string): void {
    const itemIds = purgedItemIds.get(listId) ?? new Set<string>();
    itemIds.add(itemId);
    purgedItemIds.set(listId, itemIds);
  }

  function unguardItem(listId: string, itemId: string): void {
    const itemIds = purgedItemIds.get(listId);
    itemIds?.delete(itemId);
    if (itemIds?.size === 0) purgedItemIds.delete(listId);
  }

  /**
   * Delete item tombstones remotely, then purge only the confirmed ones.
   * Unconfirmed tombstones stay local and are retried on the next emission.
   */
  async function pushItemDeletions(list: ShoppingList, stats: CycleStats): Promise<void> {
    const tombstones = deletedItems(list);
    if (tombstones.length === 0) return;

    const confirmed = new Set<string>();
    for (const item of tombstones) {
      guardItem(list.id, item.id);
      const deleted = await remote.deleteItem(list.id, item.id);
      if (deleted.success) {
        confirmed.add(item.id);
        stats.writes += 1;
      } else {
        unguardItem(list.id, item.id);
        console.error(
          `[SyncService] Failed to delete item ${item.id} of list ${list.id} remotely:`,
          deleted.error
        );
        recordFailure(stats, deleted.error);
      }
    }
    if (confirmed.size === 0) return;

    // Re-read: the list may have changed while the deletes were in flight
    const latest = (await local.getAll()).find((candidate) => candidate.id === list.id);
    if (!latest || isTombstone(latest)) return;

    const purgeable = new Set(
      latest.items
        .filter((item) => isTombstone(item) && confirmed.has(item.id))
        .map((item) => item.id)
    );
    if (purgeable.size === 0) return;

    const written = await local.upsert(removeItems(latest, purgeable));
    if (!written.success) {
      console.error(
        `[SyncService] Failed to purge deleted items of list ${list.id}:`,
        written.error
      );
      recordFailure(stats, written.error);
    }
  }

  // --- Remote -> local ---

  /**
   * Forget confirmed deletions the remote snapshot already reflects.
   */
  function forgetSettledDeletions(remoteLists: ShoppingList[]): void {
    const remoteById = new Map(remoteLists.map((list) => [list.id, list]));

    for (const listId of purgedListIds) {
      if (!remoteById.has(listId)) purgedListIds.delete(listId);
    }

    for (const [listId, itemIds] of purgedItemIds) {
      const remoteList = remoteById.get(listId);
      if (!remoteList) {
        purgedItemIds.delete(listId);
        continue;
      }
      const present = new Set(remoteList.items.map((item) => item.id));
      for (const itemId of itemIds) {
        if (!present.has(itemId)) itemIds.delete(itemId);
      }
      if (itemIds.size === 0) purgedItemIds.delete(listId);
    }
  }

  async function pullRemoteLists(snapshot: ShoppingList[]): Promise<void> {
    const startedAt = Date.now();
    const stats = createCycleStats(snapshot.length);
    forgetSettledDeletions(snapshot);
    const localById = new Map((await local.getAll()).map((list) => [list.id, list]));

    for (const received of snapshot) {
      if (purgedListIds.has(received.id)) continue;
      const purgedItems = purgedItemIds.get(received.id);
      const remoteList = purgedItems ? removeItems(received, purgedItems) : received;
      const localList = localById.get(remoteList.id);

      let next: ShoppingList;
      if (!localList) {
        // First sighting on this device, e.g. a list just shared with us
        next = remoteList;
      } else if (isTombstone(localList)) {
        // Pending local deletion; the push direction owns it
        continue;
      } else {
        next = retainPendingTombstones(mergeLists(localList, remoteList), localList);
        if (!shouldUpdateLocal(localList, next)) continue;
      }

      const written = await local.upsert(next);
      if (written.success) {
        stats.writes += 1;
      } else {
        console.error(`[SyncService] Failed to store list ${remoteList.id}:`, written.error);
        recordFailure(stats, written.error);
      }
    }

    finishCycle("pull", stats, startedAt);
  }

  // --- Control ---

  function startSync(trigger: SyncTrigger = "manual"): void {
    const principalId = identity.currentPrincipalId();
    if (!principalId) {
      console.log("[SyncService] No signed-in user, sync not started");
      return;
    }

    teardown();
    lastError = null;
    status.set("syncing");

    try {
      localConsumer = consumeSerially(local.watchAll(), {
        onSnapshot: pushLocalLists,
        onStreamError: (err) => enterError("local_stream", err),
        onHandlerError: (err) =>
          console.error("[SyncService] Local change handling failed:", err),
      });
      remoteConsumer = consumeSerially(remote.watchAccessible(principalId), {
        onSnapshot: pullRemoteLists,
        onStreamError: (err) => enterError("remote_stream", err),
        onHandlerError: (err) =>
          console.error("[SyncService] Remote change handling failed:", err),
      });
    } catch (err) {
      enterError("subscribe", err);
      return;
    }

    status.set("synced");
    console.log(`[SyncService] Sync started (${trigger})`);
    telemetry?.track({ event: "sync.started", properties: { trigger } });
  }

  function stopSync(): void {
    const wasRunning = teardown();
    status.set("idle");
    if (wasRunning) {
      console.log("[SyncService] Sync stopped");
    }
    telemetry?.track({ event: "sync.stopped", properties: { was_running: wasRunning } });
  }

  async function drained(): Promise<void> {
    for (;;) {
      const consumers = [localConsumer, remoteConsumer].filter(
        (consumer): consumer is SerialConsumer => consumer !== null
      );
      if (consumers.every((consumer) => consumer.isIdle())) return;
      await Promise.all(consumers.map((consumer) => consumer.drained()));
    }
  }

  return {
    startSync,
    stopSync,
    getStatus: status.get,
    onStatusChange: status.subscribe,
    getLastError: () => lastError,
    isRunning: () => localConsumer !== null && remoteConsumer !== null,
    getSyncState: () => stateStore.load(),
    drained,
  };
}
