/**
 * Shopping list schema
 *
 * Lists and items are immutable values: every helper below returns a copy.
 * Tombstones (non-null deletedAt) stay in local storage until the deletion
 * has been confirmed by the remote store, so user-facing queries must go
 * through visibleLists / activeItems.
 */

import { randomUUID } from "crypto";
import { z } from "zod";

export const DEFAULT_LIST_COLOR = "#2196F3";

/**
 * Single entry in a list.
 *
 * createdAt doubles as the item's version clock during merge.
 */
export const ShoppingItemSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  quantity: z.string().nullable(),
  isCompleted: z.boolean(),
  createdAt: z.string(), // ISO timestamp
  completedAt: z.string().nullable(),
  deletedAt: z.string().nullable(), // tombstone marker
});

export type ShoppingItem = z.infer<typeof ShoppingItemSchema>;

export const ShoppingListSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string(),
  color: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
  deletedAt: z.string().nullable(),
  members: z.array(z.string()),
  items: z.array(ShoppingItemSchema),
});

export type ShoppingList = z.infer<typeof ShoppingListSchema>;

/**
 * Fields the remote store accepts in a metadata update
 */
export type ListMetadata = Pick<
  ShoppingList,
  "name" | "description" | "color" | "members" | "updatedAt"
>;

// --- Parsing ---

export function parseShoppingList(data: unknown): ShoppingList {
  return ShoppingListSchema.parse(data);
}

export function safeParseShoppingList(data: unknown): ShoppingList | null {
  const result = ShoppingListSchema.safeParse(data);
  return result.success ? result.data : null;
}

// --- Factories ---

export interface CreateListInput {
  name: string;
  description?: string;
  color?: string;
  members?: string[];
  id?: string;
}

export function createShoppingList(
  input: CreateListInput,
  now: Date = new Date()
): ShoppingList {
  const timestamp = now.toISOString();
  return {
    id: input.id ?? randomUUID(),
    name: input.name,
    description: input.description ?? "",
    color: input.color ?? DEFAULT_LIST_COLOR,
    createdAt: timestamp,
    updatedAt: timestamp,
    deletedAt: null,
    members: [...new Set(input.members ?? [])],
    items: [],
  };
}

export interface CreateItemInput {
  name: string;
  quantity?: string | null;
  id?: string;
}

export function createShoppingItem(
  input: CreateItemInput,
  now: Date = new Date()
): ShoppingItem {
  return {
    id: input.id ?? randomUUID(),
    name: input.name,
    quantity: input.quantity ?? null,
    isCompleted: false,
    createdAt: now.toISOString(),
    completedAt: null,
    deletedAt: null,
  };
}

// --- Queries ---

export function isTombstone(entity: { deletedAt: string | null }): boolean {
  return entity.deletedAt !== null;
}

export function activeItems(list: ShoppingList): ShoppingItem[] {
  return list.items.filter((item) => !isTombstone(item));
}

export function deletedItems(list: ShoppingList): ShoppingItem[] {
  return list.items.filter(isTombstone);
}

/**
 * Lists safe to show to the user, most recently updated first
 */
export function visibleLists(lists: ShoppingList[]): ShoppingList[] {
  return lists
    .filter((list) => !isTombstone(list))
    .sort((a, b) => toMillis(b.updatedAt) - toMillis(a.updatedAt));
}

export function completionProgress(list: ShoppingList): number {
  const items = activeItems(list);
  if (items.length === 0) return 0;
  return items.filter((item) => item.isCompleted).length / items.length;
}

export function toMillis(timestamp: string): number {
  return new Date(timestamp).getTime();
}

// --- Mutations ---
//
// Each helper takes one `now` and uses it for both the entity it changes and
// the parent list's updatedAt, so a list update and the item update that
// caused it always carry the identical timestamp.

export interface ListDetailsPatch {
  name?: string;
  description?: string;
  color?: string;
}

export function updateListDetails(
  list: ShoppingList,
  patch: ListDetailsPatch,
  now: Date = new Date()
): ShoppingList {
  return {
    ...list,
    name: patch.name ?? list.name,
    description: patch.description ?? list.description,
    color: patch.color ?? list.color,
    updatedAt: now.toISOString(),
  };
}

export function addItem(
  list: ShoppingList,
  item: ShoppingItem,
  now: Date = new Date()
): ShoppingList {
  return {
    ...list,
    items: [...list.items.filter((existing) => existing.id !== item.id), item],
    updatedAt: now.toISOString(),
  };
}

export interface ItemPatch {
  name?: string;
  quantity?: string | null;
  isCompleted?: boolean;
}

/**
 * Apply a patch to one item.
 *
 * completedAt is set only on a false -> true transition and cleared on
 * true -> false. createdAt is left untouched.
 */
export function applyItemPatch(
  item: ShoppingItem,
  patch: ItemPatch,
  now: Date = new Date()
): ShoppingItem {
  const willBeCompleted = patch.isCompleted ?? item.isCompleted;

  let completedAt = item.completedAt;
  if (!item.isCompleted && willBeCompleted) {
    completedAt = now.toISOString();
  } else if (item.isCompleted && !willBeCompleted) {
    completedAt = null;
  }

  return {
    ...item,
    name: patch.name ?? item.name,
    quantity: patch.quantity === undefined ? item.quantity : patch.quantity,
    isCompleted: willBeCompleted,
    completedAt,
  };
}

export function updateItem(
  list: ShoppingList,
  itemId: string,
  patch: ItemPatch,
  now: Date = new Date()
): ShoppingList {
  if (!list.items.some((item) => item.id === itemId)) {
    return list;
  }

  return {
    ...list,
    items: list.items.map((item) =>
      item.id === itemId ? applyItemPatch(item, patch, now) : item
    ),
    updatedAt: now.toISOString(),
  };
}

export function softDeleteItem(
  list: ShoppingList,
  itemId: string,
  now: Date = new Date()
): ShoppingList {
  const timestamp = now.toISOString();
  if (!list.items.some((item) => item.id === itemId && !isTombstone(item))) {
    return list;
  }

  return {
    ...list,
    items: list.items.map((item) =>
      item.id === itemId ? { ...item, deletedAt: timestamp } : item
    ),
    updatedAt: timestamp,
  };
}

export function clearCompletedItems(
  list: ShoppingList,
  now: Date = new Date()
): ShoppingList {
  const timestamp = now.toISOString();
  const hasCompleted = list.items.some(
    (item) => item.isCompleted && !isTombstone(item)
  );
  if (!hasCompleted) return list;

  return {
    ...list,
    items: list.items.map((item) =>
      item.isCompleted && !isTombstone(item)
        ? { ...item, deletedAt: timestamp }
        : item
    ),
    updatedAt: timestamp,
  };
}

export function softDeleteList(
  list: ShoppingList,
  now: Date = new Date()
): ShoppingList {
  if (isTombstone(list)) return list;
  const timestamp = now.toISOString();
  return { ...list, deletedAt: timestamp, updatedAt: timestamp };
}

export function addMember(
  list: ShoppingList,
  memberId: string,
  now: Date = new Date()
): ShoppingList {
  if (list.members.includes(memberId)) return list;
  return {
    ...list,
    members: [...list.members, memberId],
    updatedAt: now.toISOString(),
  };
}

export function removeMember(
  list: ShoppingList,
  memberId: string,
  now: Date = new Date()
): ShoppingList {
  if (!list.members.includes(memberId)) return list;
  return {
    ...list,
    members: list.members.filter((id) => id !== memberId),
    updatedAt: now.toISOString(),
  };
}

/**
 * Drop the given item ids from the list entirely (confirmed remote deletes).
 * Does not touch updatedAt: this is storage cleanup, not a user edit.
 */
export function removeItems(
  list: ShoppingList,
  itemIds: ReadonlySet<string>
): ShoppingList {
  return {
    ...list,
    items: list.items.filter((item) => !itemIds.has(item.id)),
  };
}
