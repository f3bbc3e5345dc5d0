/**
 * List repository
 *
 * User-facing operations over the local store. Every change is a local
 * write only; the sync service picks it up from the store's change stream.
 */

import {
  addItem,
  addMember,
  createShoppingItem,
  createShoppingList,
  clearCompletedItems,
  isTombstone,
  removeMember,
  softDeleteItem,
  softDeleteList,
  updateItem,
  updateListDetails,
  visibleLists,
  type CreateItemInput,
  type CreateListInput,
  type ItemPatch,
  type ListDetailsPatch,
  type ShoppingList,
} from "../schema/shopping-list.js";
import { fail, ok, type StoreResult } from "../sync/result.js";
import type { LocalListStore } from "../sync/types.js";

export interface ListRepository {
  getLists: () => Promise<ShoppingList[]>;
  getList: (id: string) => Promise<ShoppingList | null>;
  createList: (input: CreateListInput) => Promise<StoreResult<ShoppingList>>;
  updateList: (id: string, patch: ListDetailsPatch) => Promise<StoreResult<ShoppingList>>;
  deleteList: (id: string) => Promise<StoreResult<ShoppingList>>;
  addItem: (listId: string, input: CreateItemInput) => Promise<StoreResult<ShoppingList>>;
  updateItem: (
    listId: string,
    itemId: string,
    patch: ItemPatch
  ) => Promise<StoreResult<ShoppingList>>;
  removeItem: (listId: string, itemId: string) => Promise<StoreResult<ShoppingList>>;
  clearCompleted: (listId: string) => Promise<StoreResult<ShoppingList>>;
  shareList: (listId: string, memberId: string) => Promise<StoreResult<ShoppingList>>;
  removeMember: (listId: string, memberId: string) => Promise<StoreResult<ShoppingList>>;
  /**
   * Drop a shared list from this device. The remote store turns a
   * member's delete into leaving the list.
   */
  leaveList: (listId: string) => Promise<StoreResult<ShoppingList>>;
}

export interface ListRepositoryOptions {
  now?: () => Date;
}

export function createListRepository(
  store: LocalListStore,
  options: ListRepositoryOptions = {}
): ListRepository {
  const now = options.now ?? (() => new Date());

  async function getList(id: string): Promise<ShoppingList | null> {
    const lists = await store.getAll();
    const list = lists.find((candidate) => candidate.id === id);
    return list && !isTombstone(list) ? list : null;
  }

  async function save(list: ShoppingList): Promise<StoreResult<ShoppingList>> {
    const result = await store.upsert(list);
    return result.success ? ok(list) : result;
  }

  /**
   * Load a visible list, apply an edit and store the result.
   */
  async function modify(
    id: string,
    edit: (list: ShoppingList, timestamp: Date) => StoreResult<ShoppingList>
  ): Promise<StoreResult<ShoppingList>> {
    const list = await getList(id);
    if (!list) {
      return fail(`List not found: ${id}`);
    }

    const edited = edit(list, now());
    if (!edited.success || edited.data === list) {
      return edited;
    }
    return save(edited.data);
  }

  function requireItem(list: ShoppingList, itemId: string): StoreResult<ShoppingList> {
    const exists = list.items.some((item) => item.id === itemId && !isTombstone(item));
    return exists ? ok(list) : fail(`Item not found: ${itemId}`);
  }

  return {
    getLists: async () => visibleLists(await store.getAll()),

    getList,

    createList: (input) => save(createShoppingList(input, now())),

    updateList: (id, patch) =>
      modify(id, (list, timestamp) => ok(updateListDetails(list, patch, timestamp))),

    deleteList: (id) =>
      modify(id, (list, timestamp) => ok(softDeleteList(list, timestamp))),

    addItem: (listId, input) =>
      modify(listId, (list, timestamp) =>
        ok(addItem(list, createShoppingItem(input, timestamp), timestamp))
      ),

    updateItem: (listId, itemId, patch) =>
      modify(listId, (list, timestamp) => {
        const found = requireItem(list, itemId);
        return found.success ? ok(updateItem(list, itemId, patch, timestamp)) : found;
      }),

    removeItem: (listId, itemId) =>
      modify(listId, (list, timestamp) => {
        const found = requireItem(list, itemId);
        return found.success ? ok(softDeleteItem(list, itemId, timestamp)) : found;
      }),

    clearCompleted: (listId) =>
      modify(listId, (list, timestamp) => ok(clearCompletedItems(list, timestamp))),

    shareList: (listId, memberId) =>
      modify(listId, (list, timestamp) => {
        const id = memberId.trim();
        return id ? ok(addMember(list, id, timestamp)) : fail("Missing member id");
      }),

    removeMember: (listId, memberId) =>
      modify(listId, (list, timestamp) =>
        list.members.includes(memberId)
          ? ok(removeMember(list, memberId, timestamp))
          : fail(`Not a member of ${list.name}: ${memberId}`)
      ),

    leaveList: (listId) =>
      modify(listId, (list, timestamp) => ok(softDeleteList(list, timestamp))),
  };
}
