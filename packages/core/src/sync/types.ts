/**
 * Collaborator contracts for the sync engine
 *
 * The engine only talks to these interfaces. Concrete adapters live in
 * ../store (local) and ../supabase (remote, identity).
 */

import type { ListMetadata, ShoppingItem, ShoppingList } from "../schema/shopping-list.js";
import type { StoreResult } from "./result.js";
import type { SnapshotStream } from "./snapshot-stream.js";

/**
 * On-device list storage.
 *
 * watchAll() emits every stored list, tombstones included.
 */
export interface LocalListStore {
  watchAll: () => SnapshotStream<ShoppingList[]>;
  upsert: (list: ShoppingList) => Promise<StoreResult>;
  hardDelete: (id: string) => Promise<StoreResult>;
  getAll: () => Promise<ShoppingList[]>;
}

/**
 * Multi-writer remote list storage.
 *
 * watchAccessible() emits the lists the principal owns or is a member of.
 * Remote deletes are hard deletes, so emissions never contain tombstones.
 */
export interface RemoteListStore {
  watchAccessible: (principalId: string) => SnapshotStream<ShoppingList[]>;
  /** Fails when the list already exists */
  create: (list: ShoppingList) => Promise<StoreResult<string>>;
  updateMetadata: (id: string, fields: ListMetadata) => Promise<StoreResult>;
  /** Create-or-update by item id */
  pushItem: (listId: string, item: ShoppingItem) => Promise<StoreResult>;
  deleteItem: (listId: string, itemId: string) => Promise<StoreResult>;
  deleteEntity: (id: string) => Promise<StoreResult>;
}

export interface AuthSnapshot {
  principalId: string | null;
  isAnonymous: boolean;
}

export interface IdentityProvider {
  currentPrincipalId: () => string | null;
  isAnonymous: () => boolean;
  authStateChanges: () => SnapshotStream<AuthSnapshot>;
}
