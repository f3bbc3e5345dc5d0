/**
 * Conflict Resolver
 *
 * Decides, per entity pair, which side of a local/remote divergence wins,
 * and merges two copies of the same list.
 *
 * Strategy:
 * - List metadata: last-write-wins on updatedAt, ties go to local
 * - Members: set union
 * - Items: merged one by one, createdAt is the item's version clock
 * - Tombstones: a deletion on one side propagates to the other
 */

import {
  isTombstone,
  toMillis,
  type ShoppingItem,
  type ShoppingList,
} from "../schema/shopping-list.js";

// --- Types ---

export type SyncAction = "noAction" | "useLocal" | "useRemote" | "mergeRequired";

export interface SyncTimestamps {
  localUpdatedAt: string | null;
  remoteUpdatedAt: string | null;
  localDeletedAt: string | null;
  remoteDeletedAt: string | null;
}

/**
 * Two writes closer than this are the same logical edit. Without this
 * window a list and its echo from the other store keep overwriting each
 * other forever.
 */
export const SYNC_TIMESTAMP_TOLERANCE_MS = 1000;

// --- Entity-level decision ---

export function determineSyncAction(timestamps: SyncTimestamps): SyncAction {
  const { localUpdatedAt, remoteUpdatedAt, localDeletedAt, remoteDeletedAt } =
    timestamps;

  if (localDeletedAt !== null && remoteDeletedAt !== null) return "noAction";
  if (localDeletedAt !== null) return "useLocal";
  if (remoteDeletedAt !== null) return "useRemote";

  if (localUpdatedAt === null && remoteUpdatedAt === null) return "noAction";
  if (localUpdatedAt === null) return "useRemote";
  if (remoteUpdatedAt === null) return "useLocal";

  const localTime = toMillis(localUpdatedAt);
  const remoteTime = toMillis(remoteUpdatedAt);

  if (Math.abs(localTime - remoteTime) <= SYNC_TIMESTAMP_TOLERANCE_MS) {
    return "noAction";
  }

  return localTime > remoteTime ? "useLocal" : "useRemote";
}

// --- List merge ---

/**
 * Merge a local and a remote copy of the same list.
 *
 * Metadata is taken wholesale from the newer side; items are merged
 * independently because a share on one device and an item edit on another
 * routinely touch the same list at the same time.
 */
export function mergeLists(
  local: ShoppingList,
  remote: ShoppingList
): ShoppingList {
  // A tombstone is never merged back to life
  if (isTombstone(local)) return local;
  if (isTombstone(remote)) return remote;

  const useLocalProperties =
    toMillis(local.updatedAt) >= toMillis(remote.updatedAt);
  const base = useLocalProperties ? local : remote;

  return {
    ...base,
    members: unionMembers(local.members, remote.members),
    items: mergeItems(local.items, remote.items),
  };
}

/**
 * Merge two item collections.
 *
 * Returns active items only: local order first, then items that only
 * exist remotely.
 */
export function mergeItems(
  localItems: ShoppingItem[],
  remoteItems: ShoppingItem[]
): ShoppingItem[] {
  const merged = new Map<string, ShoppingItem>();
  const localById = new Map<string, ShoppingItem>();

  for (const item of localItems) {
    localById.set(item.id, item);
    if (!isTombstone(item)) {
      merged.set(item.id, item);
    }
  }

  for (const remoteItem of remoteItems) {
    const localItem = localById.get(remoteItem.id);

    if (!localItem) {
      // Created and deleted remotely before we ever saw it: drop it
      if (!isTombstone(remoteItem)) {
        merged.set(remoteItem.id, remoteItem);
      }
      continue;
    }

    const action = determineSyncAction({
      localUpdatedAt: localItem.createdAt,
      remoteUpdatedAt: remoteItem.createdAt,
      localDeletedAt: localItem.deletedAt,
      remoteDeletedAt: remoteItem.deletedAt,
    });

    switch (action) {
      case "useRemote":
        if (isTombstone(remoteItem)) {
          merged.delete(remoteItem.id);
        } else {
          merged.set(remoteItem.id, remoteItem);
        }
        break;
      case "useLocal":
      case "noAction":
      case "mergeRequired":
        // Local entry is already in place (or absent when it is a tombstone)
        break;
    }
  }

  return Array.from(merged.values());
}

/**
 * Put back local item tombstones the merge dropped.
 *
 * mergeItems() only returns active items, but a local deletion must stay on
 * disk until the push direction has confirmed it remotely. Tombstones whose
 * id came back as an active item (the remote side won) are not restored.
 */
export function retainPendingTombstones(
  merged: ShoppingList,
  local: ShoppingList
): ShoppingList {
  if (isTombstone(merged)) return merged;

  const mergedIds = new Set(merged.items.map((item) => item.id));
  const pending = local.items.filter(
    (item) => isTombstone(item) && !mergedIds.has(item.id)
  );
  if (pending.length === 0) return merged;

  return { ...merged, items: [...merged.items, ...pending] };
}

// --- Helpers ---

export function unionMembers(local: string[], remote: string[]): string[] {
  return Array.from(new Set([...local, ...remote]));
}
