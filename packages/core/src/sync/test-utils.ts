/**
 * In-process stand-ins for the remote store and the identity provider.
 * Test code only.
 */

import {
  activeItems,
  type ShoppingItem,
  type ShoppingList,
} from "../schema/shopping-list.js";
import { fail, ok, type StoreResult } from "./result.js";
import {
  createSnapshotChannel,
  type SnapshotChannel,
  type SnapshotStream,
} from "./snapshot-stream.js";
import type { AuthSnapshot, IdentityProvider, RemoteListStore } from "./types.js";

// --- Remote store ---

export type RemoteOperation =
  | "create"
  | "updateMetadata"
  | "pushItem"
  | "deleteItem"
  | "deleteEntity";

interface StoredList {
  ownerId: string;
  list: ShoppingList;
}

export interface FakeRemoteStore extends RemoteListStore {
  /** Operation log, e.g. "create:list-1" or "deleteItem:list-1/item-2" */
  calls: string[];
  /** Fail every call of an operation on the given list or item id */
  failOn: (operation: RemoteOperation, id: string) => void;
  clearFailures: () => void;
  /** Make the next watchAccessible() throw */
  failSubscribe: (error: Error) => void;
  /** Report an error on every open stream */
  breakStreams: (error: Error) => void;
  /** Server-side write from another device */
  seed: (list: ShoppingList, ownerId: string) => void;
  get: (id: string) => ShoppingList | undefined;
  watcherCount: () => number;
  /** Queue writes without publishing, like a query still in flight */
  holdPublishes: () => void;
  /** Publish the current state and resume publishing after writes */
  releasePublishes: () => void;
  /** Deliver an arbitrary (e.g. outdated) snapshot to every open stream */
  publishSnapshot: (lists: ShoppingList[]) => void;
}

export function createFakeRemoteStore(ownerId: string): FakeRemoteStore {
  const lists = new Map<string, StoredList>();
  const channels = new Map<string, SnapshotChannel<ShoppingList[]>>();
  const failures = new Set<string>();
  const calls: string[] = [];
  let subscribeError: Error | null = null;
  let held = false;

  function accessible(principalId: string): ShoppingList[] {
    return Array.from(lists.values())
      .filter(
        (stored) =>
          stored.ownerId === principalId || stored.list.members.includes(principalId)
      )
      .map((stored) => stored.list);
  }

  function publish(): void {
    if (held) return;
    for (const [principalId, channel] of channels) {
      channel.publish(accessible(principalId));
    }
  }

  function record(operation: RemoteOperation, id: string): StoreResult<never> | null {
    calls.push(`${operation}:${id}`);
    const key = `${operation}:${id.split("/").pop() ?? id}`;
    return failures.has(key) ? fail(`${operation} rejected for ${id}`) : null;
  }

  function replaceItems(
    listId: string,
    change: (items: ShoppingItem[]) => ShoppingItem[]
  ): StoreResult {
    const stored = lists.get(listId);
    if (!stored) {
      return fail(`List not found: ${listId}`);
    }
    lists.set(listId, {
      ...stored,
      list: { ...stored.list, items: change(stored.list.items) },
    });
    publish();
    return ok(undefined);
  }

  return {
    calls,

    watchAccessible: (principalId): SnapshotStream<ShoppingList[]> => {
      if (subscribeError) {
        const error = subscribeError;
        subscribeError = null;
        throw error;
      }
      const channel = createSnapshotChannel<ShoppingList[]>();
      channels.set(principalId, channel);
      channel.publish(accessible(principalId));
      return {
        subscribe: (observer) => {
          const unsubscribe = channel.subscribe(observer);
          return () => {
            unsubscribe();
            if (channel.subscriberCount() === 0) {
              channels.delete(principalId);
            }
          };
        },
      };
    },

    create: async (list) => {
      const rejected = record("create", list.id);
      if (rejected) return rejected;
      if (lists.has(list.id)) {
        return fail(`duplicate key value violates unique constraint: ${list.id}`);
      }
      lists.set(list.id, {
        ownerId,
        list: { ...list, items: activeItems(list) },
      });
      publish();
      return ok(list.id);
    },

    updateMetadata: async (id, fields) => {
      const rejected = record("updateMetadata", id);
      if (rejected) return rejected;
      const stored = lists.get(id);
      if (!stored) {
        return fail(`List not found: ${id}`);
      }
      lists.set(id, { ...stored, list: { ...stored.list, ...fields } });
      publish();
      return ok(undefined);
    },

    pushItem: async (listId, item) => {
      const rejected = record("pushItem", `${listId}/${item.id}`);
      if (rejected) return rejected;
      return replaceItems(listId, (items) =>
        items.some((existing) => existing.id === item.id)
          ? items.map((existing) => (existing.id === item.id ? item : existing))
          : [...items, item]
      );
    },

    deleteItem: async (listId, itemId) => {
      const rejected = record("deleteItem", `${listId}/${itemId}`);
      if (rejected) return rejected;
      return replaceItems(listId, (items) => items.filter((item) => item.id !== itemId));
    },

    deleteEntity: async (id) => {
      const rejected = record("deleteEntity", id);
      if (rejected) return rejected;
      if (lists.delete(id)) {
        publish();
      }
      return ok(undefined);
    },

    failOn: (operation, id) => {
      failures.add(`${operation}:${id}`);
    },
    clearFailures: () => failures.clear(),
    failSubscribe: (error) => {
      subscribeError = error;
    },
    breakStreams: (error) => {
      for (const channel of channels.values()) {
        channel.fail(error);
      }
    },
    seed: (list, seedOwnerId) => {
      lists.set(list.id, { ownerId: seedOwnerId, list });
      publish();
    },
    get: (id) => lists.get(id)?.list,
    watcherCount: () => channels.size,
    holdPublishes: () => {
      held = true;
    },
    releasePublishes: () => {
      held = false;
      publish();
    },
    publishSnapshot: (snapshot) => {
      for (const channel of channels.values()) {
        channel.publish(snapshot);
      }
    },
  };
}

// --- Identity ---

export interface FakeIdentity extends IdentityProvider {
  signIn: (principalId: string, isAnonymous?: boolean) => void;
  signOut: () => void;
}

export function createFakeIdentity(initial: AuthSnapshot | null = null): FakeIdentity {
  let current: AuthSnapshot = initial ?? { principalId: null, isAnonymous: false };
  const channel = createSnapshotChannel<AuthSnapshot>();
  channel.publish(current);

  function emit(next: AuthSnapshot): void {
    current = next;
    channel.publish(next);
  }

  return {
    currentPrincipalId: () => current.principalId,
    isAnonymous: () => current.isAnonymous,
    authStateChanges: () => channel,
    signIn: (principalId, isAnonymous = false) => emit({ principalId, isAnonymous }),
    signOut: () => emit({ principalId: null, isAnonymous: false }),
  };
}
