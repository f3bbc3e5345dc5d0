/**
 * Supabase adapters
 *
 * @example
 * ```typescript
 * import { createListSyncClient, createSupabaseIdentity, createSupabaseListStore } from "@listsync/core";
 *
 * const client = createListSyncClient({ supabaseUrl, supabaseAnonKey });
 * const identity = createSupabaseIdentity(client);
 * const remote = createSupabaseListStore({ client, identity });
 * ```
 */

export { createListSyncClient, type ListSyncClientOptions } from "./client.js";

export {
  createSupabaseIdentity,
  snapshotFromSession,
  type SupabaseIdentity,
} from "./identity.js";

export {
  createSupabaseListStore,
  fromListRow,
  toListRow,
  toItemRow,
  ListRowSchema,
  ItemRowSchema,
  LISTS_TABLE,
  ITEMS_TABLE,
  type ListRow,
  type ItemRow,
  type SupabaseListStoreOptions,
} from "./remote-store.js";
