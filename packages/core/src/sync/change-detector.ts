/**
 * Change detection
 *
 * Decides whether a merge result differs from what is already stored
 * locally. Writing an unchanged list would re-trigger the local change
 * stream, so this check is what lets the two sync directions converge.
 */

import type { ShoppingItem, ShoppingList } from "../schema/shopping-list.js";

export function shouldUpdateLocal(
  local: ShoppingList,
  merged: ShoppingList
): boolean {
  if (local.name !== merged.name) return true;
  if (local.description !== merged.description) return true;
  if (local.color !== merged.color) return true;
  if (!sameInstant(local.updatedAt, merged.updatedAt)) return true;
  if (!sameInstant(local.deletedAt, merged.deletedAt)) return true;

  return !itemSetsEqual(local.items, merged.items);
}

/**
 * Order-independent comparison keyed by item id.
 */
export function itemSetsEqual(a: ShoppingItem[], b: ShoppingItem[]): boolean {
  if (a.length !== b.length) return false;

  const byId = new Map(a.map((item) => [item.id, item]));
  if (byId.size !== a.length) return false;

  return b.every((item) => {
    const other = byId.get(item.id);
    return other !== undefined && itemsEqual(other, item);
  });
}

/**
 * quantity and completedAt are not compared.
 */
export function itemsEqual(a: ShoppingItem, b: ShoppingItem): boolean {
  return (
    a.id === b.id &&
    a.name === b.name &&
    a.isCompleted === b.isCompleted &&
    sameInstant(a.createdAt, b.createdAt) &&
    sameInstant(a.deletedAt, b.deletedAt)
  );
}

export function sameInstant(a: string | null, b: string | null): boolean {
  if (a === null || b === null) return a === b;
  return new Date(a).getTime() === new Date(b).getTime();
}
