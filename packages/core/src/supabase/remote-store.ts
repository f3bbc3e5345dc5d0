/**
 * Supabase list store
 *
 * RemoteListStore over two tables (see supabase/migrations):
 *   lists       one row per list, member_ids holds the members
 *   list_items  keyed by (list_id, id), id is the client-generated item id
 *
 * Deletes are hard deletes, so a query never returns tombstones. Every
 * timestamp written is the client's own; the database adds none.
 */

import type { RealtimeChannel, SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import {
  activeItems,
  type ListMetadata,
  type ShoppingItem,
  type ShoppingList,
} from "../schema/shopping-list.js";
import { attempt, fail } from "../sync/result.js";
import type { SnapshotStream } from "../sync/snapshot-stream.js";
import type { IdentityProvider, RemoteListStore } from "../sync/types.js";

export const LISTS_TABLE = "lists";
export const ITEMS_TABLE = "list_items";
export const LEAVE_LIST_FUNCTION = "leave_list";

/**
 * leave_list result: "left" dropped the caller from member_ids, "missing"
 * and "not_member" mean there was nothing to leave, "owner" means the
 * caller owns a row its delete did not remove.
 */
const LeaveOutcomeSchema = z.enum(["left", "missing", "not_member", "owner"]);

// --- Row schemas ---

const TimestampSchema = z.string().transform((value) => new Date(value).toISOString());

export const ItemRowSchema = z.object({
  list_id: z.string(),
  id: z.string(),
  name: z.string(),
  quantity: z.string().nullable(),
  is_completed: z.boolean(),
  created_at: TimestampSchema,
  completed_at: TimestampSchema.nullable(),
});

export const ListRowSchema = z.object({
  id: z.string(),
  owner_id: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  color: z.string(),
  member_ids: z.array(z.string()).nullable(),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
  list_items: z.array(ItemRowSchema).nullable().optional(),
});

export type ItemRow = z.infer<typeof ItemRowSchema>;
export type ListRow = z.infer<typeof ListRowSchema>;

// --- Mapping ---

export function toItemRow(listId: string, item: ShoppingItem): z.input<typeof ItemRowSchema> {
  return {
    list_id: listId,
    id: item.id,
    name: item.name,
    quantity: item.quantity,
    is_completed: item.isCompleted,
    created_at: item.createdAt,
    completed_at: item.completedAt,
  };
}

export function toListRow(
  list: ShoppingList,
  ownerId: string
): Omit<z.input<typeof ListRowSchema>, "list_items"> {
  return {
    id: list.id,
    owner_id: ownerId,
    name: list.name,
    description: list.description,
    color: list.color,
    member_ids: list.members,
    created_at: list.createdAt,
    updated_at: list.updatedAt,
  };
}

export function fromListRow(row: ListRow): ShoppingList {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? "",
    color: row.color,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: null,
    members: row.member_ids ?? [],
    items: (row.list_items ?? [])
      .slice()
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map((item) => ({
        id: item.id,
        name: item.name,
        quantity: item.quantity,
        isCompleted: item.is_completed,
        createdAt: item.created_at,
        completedAt: item.completed_at,
        deletedAt: null,
      })),
  };
}

// --- Store ---

export interface SupabaseListStoreOptions {
  client: SupabaseClient;
  /** Supplies the owner id for new lists */
  identity: IdentityProvider;
}

export function createSupabaseListStore(
  options: SupabaseListStoreOptions
): RemoteListStore {
  const { client, identity } = options;
  let channelCounter = 0;

  async function fetchAccessible(principalId: string): Promise<ShoppingList[]> {
    const { data, error } = await client
      .from(LISTS_TABLE)
      .select(`*, ${ITEMS_TABLE}(*)`)
      .or(`owner_id.eq.${principalId},member_ids.cs.{${principalId}}`);

    if (error) {
      throw new Error(error.message);
    }

    const parsed = z.array(ListRowSchema).safeParse(data ?? []);
    if (!parsed.success) {
      throw new Error(`Unexpected list rows: ${parsed.error.message}`);
    }
    return parsed.data.map(fromListRow);
  }

  /**
   * Query once, then re-query whenever either table changes. Only the
   * newest query's result is emitted.
   */
  function watchAccessible(principalId: string): SnapshotStream<ShoppingList[]> {
    return {
      subscribe: (observer) => {
        let active = true;
        let sequence = 0;

        async function refresh(): Promise<void> {
          const current = ++sequence;
          try {
            const lists = await fetchAccessible(principalId);
            if (active && current === sequence) {
              observer.next(lists);
            }
          } catch (err) {
            if (active && current === sequence) {
              observer.error?.(err);
            }
          }
        }

        channelCounter += 1;
        const channel: RealtimeChannel = client
          .channel(`lists-${principalId}-${channelCounter}`)
          .on(
            "postgres_changes",
            { event: "*", schema: "public", table: LISTS_TABLE },
            () => void refresh()
          )
          .on(
            "postgres_changes",
            { event: "*", schema: "public", table: ITEMS_TABLE },
            () => void refresh()
          )
          .subscribe((status, err) => {
            if (!active) return;
            if (status === "CHANNEL_ERROR" || status === "TIMED_OUT") {
              observer.error?.(err ?? new Error(`Realtime channel ${status.toLowerCase()}`));
            }
          });

        void refresh();

        return () => {
          active = false;
          client.removeChannel(channel).catch((err: unknown) => {
            console.error("[SupabaseListStore] Failed to remove channel:", err);
          });
        };
      },
    };
  }

  async function create(list: ShoppingList) {
    const ownerId = identity.currentPrincipalId();
    if (!ownerId) {
      return fail("Not authenticated");
    }

    return attempt(async () => {
      const { error } = await client.from(LISTS_TABLE).insert(toListRow(list, ownerId));
      if (error) {
        throw new Error(error.message);
      }

      const items = activeItems(list).map((item) => toItemRow(list.id, item));
      if (items.length > 0) {
        const { error: itemsError } = await client
          .from(ITEMS_TABLE)
          .upsert(items, { onConflict: "list_id,id" });
        if (itemsError) {
          throw new Error(itemsError.message);
        }
      }

      return list.id;
    });
  }

  function updateMetadata(id: string, fields: ListMetadata) {
    return attempt(async () => {
      const { data, error } = await client
        .from(LISTS_TABLE)
        .update({
          name: fields.name,
          description: fields.description,
          color: fields.color,
          member_ids: fields.members,
          updated_at: fields.updatedAt,
        })
        .eq("id", id)
        .select("id");

      if (error) {
        throw new Error(error.message);
      }
      // No row back: missing, or row level security hid it
      if (!data || data.length === 0) {
        throw new Error(`List not found: ${id}`);
      }
    });
  }

  function pushItem(listId: string, item: ShoppingItem) {
    return attempt(async () => {
      const { error } = await client
        .from(ITEMS_TABLE)
        .upsert(toItemRow(listId, item), { onConflict: "list_id,id" });
      if (error) {
        throw new Error(error.message);
      }
    });
  }

  function deleteItem(listId: string, itemId: string) {
    return attempt(async () => {
      const { error } = await client
        .from(ITEMS_TABLE)
        .delete()
        .eq("list_id", listId)
        .eq("id", itemId);
      if (error) {
        throw new Error(error.message);
      }
    });
  }

  /**
   * Remove the caller's own membership. A member may not delete a shared
   * list, so this is what a member's delete turns into.
   */
  async function leave(id: string): Promise<void> {
    const { data, error } = await client.rpc(LEAVE_LIST_FUNCTION, { target_list_id: id });
    if (error) {
      throw new Error(error.message);
    }

    const outcome = LeaveOutcomeSchema.safeParse(data);
    if (!outcome.success) {
      throw new Error(`Unexpected ${LEAVE_LIST_FUNCTION} result: ${String(data)}`);
    }
    if (outcome.data === "owner") {
      throw new Error(`List ${id} could not be deleted`);
    }
  }

  function deleteEntity(id: string) {
    return attempt(async () => {
      // Items go with it (on delete cascade)
      const { data, error } = await client
        .from(LISTS_TABLE)
        .delete()
        .eq("id", id)
        .select("id");
      if (error) {
        throw new Error(error.message);
      }
      // Only the owner's delete removes the row
      if (!data || data.length === 0) {
        await leave(id);
      }
    });
  }

  return {
    watchAccessible,
    create,
    updateMetadata,
    pushItem,
    deleteItem,
    deleteEntity,
  };
}
