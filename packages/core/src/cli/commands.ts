/**
 * CLI commands
 *
 * Each command opens the local list file, does its work and returns. Only
 * `sync` stays running.
 */

import {
  activeItems,
  completionProgress,
  type ShoppingItem,
  type ShoppingList,
} from "../schema/shopping-list.js";
import { createListRepository, type ListRepository } from "../store/list-repository.js";
import { createLocalListStore } from "../store/local-store.js";
import { createSyncLifecycle } from "../sync/lifecycle.js";
import { createSyncService } from "../sync/sync-service.js";
import { createFileSyncStateStore } from "../sync/sync-state.js";
import type { StoreResult } from "../sync/result.js";
import { createListSyncClient } from "../supabase/client.js";
import { createSupabaseIdentity, type SupabaseIdentity } from "../supabase/identity.js";
import { createSupabaseListStore } from "../supabase/remote-store.js";
import {
  ConfigSchema,
  getConfigDir,
  getConfigFile,
  getListsFile,
  getPauseInBackground,
  getRefreshToken,
  getSupabaseAnonKey,
  getSupabaseUrl,
  loadConfig,
  updateConfig,
  type ListSyncConfig,
} from "../config.js";
import type { TelemetrySink } from "@listsync/telemetry";

// --- Helpers ---

function openRepository(): ListRepository {
  return createListRepository(createLocalListStore({ filePath: getListsFile() }));
}

function unwrap<T>(result: StoreResult<T>): T {
  if (!result.success) {
    throw new Error(result.error);
  }
  return result.data;
}

/**
 * Resolve a list by id, id prefix or case-insensitive name
 */
export async function resolveList(
  repo: ListRepository,
  ref: string | undefined
): Promise<ShoppingList> {
  if (!ref) {
    throw new Error("Missing list. Pass a list id or name.");
  }

  const lists = await repo.getLists();
  const exact = lists.find((list) => list.id === ref);
  if (exact) return exact;

  const needle = ref.toLowerCase();
  const matches = lists.filter(
    (list) => list.id.startsWith(ref) || list.name.toLowerCase() === needle
  );
  if (matches.length === 1) return matches[0];
  if (matches.length > 1) {
    throw new Error(`"${ref}" matches ${matches.length} lists, use the list id`);
  }
  throw new Error(`List not found: ${ref}`);
}

function resolveItem(list: ShoppingList, ref: string | undefined): ShoppingItem {
  if (!ref) {
    throw new Error("Missing item. Pass an item id or name.");
  }

  const items = activeItems(list);
  const needle = ref.toLowerCase();
  const matches = items.filter(
    (item) => item.id === ref || item.id.startsWith(ref) || item.name.toLowerCase() === needle
  );
  if (matches.length === 1) return matches[0];
  if (matches.length > 1) {
    throw new Error(`"${ref}" matches ${matches.length} items in ${list.name}, use the item id`);
  }
  throw new Error(`Item not found: ${ref}`);
}

function shortId(id: string): string {
  return id.slice(0, 8);
}

export function formatList(list: ShoppingList): string {
  const items = activeItems(list);
  const lines = [`${list.name} (${shortId(list.id)})`];
  if (list.description) lines.push(`  ${list.description}`);
  if (list.members.length > 0) lines.push(`  Shared with: ${list.members.join(", ")}`);
  if (items.length === 0) {
    lines.push("  (no items)");
  }
  for (const item of items) {
    const mark = item.isCompleted ? "[x]" : "[ ]";
    const quantity = item.quantity ? ` (${item.quantity})` : "";
    lines.push(`  ${mark} ${item.name}${quantity}  ${shortId(item.id)}`);
  }
  return lines.join("\n");
}

// --- List commands ---

export async function cmdLists(): Promise<void> {
  const lists = await openRepository().getLists();
  if (lists.length === 0) {
    console.log("No lists yet. Create one with: listsync list create <name>");
    return;
  }

  for (const list of lists) {
    const items = activeItems(list);
    const done = items.filter((item) => item.isCompleted).length;
    const percent = Math.round(completionProgress(list) * 100);
    console.log(`${shortId(list.id)}  ${list.name}  ${done}/${items.length} done (${percent}%)`);
  }
}

export async function cmdListShow(ref: string | undefined): Promise<void> {
  const list = await resolveList(openRepository(), ref);
  console.log(formatList(list));
}

export interface CreateListOptions {
  description?: string;
  color?: string;
}

export async function cmdListCreate(
  name: string | undefined,
  options: CreateListOptions = {}
): Promise<void> {
  if (!name?.trim()) {
    throw new Error("Missing list name. Usage: listsync list create <name>");
  }

  const list = unwrap(
    await openRepository().createList({
      name: name.trim(),
      description: options.description,
      color: options.color,
    })
  );
  console.log(`Created list ${list.name} (${list.id})`);
}

export async function cmdListRename(
  ref: string | undefined,
  name: string | undefined
): Promise<void> {
  if (!name?.trim()) {
    throw new Error("Missing new name. Usage: listsync list rename <list> <name>");
  }

  const repo = openRepository();
  const list = await resolveList(repo, ref);
  const renamed = unwrap(await repo.updateList(list.id, { name: name.trim() }));
  console.log(`Renamed ${list.name} to ${renamed.name}`);
}

export async function cmdListDelete(ref: string | undefined): Promise<void> {
  const repo = openRepository();
  const list = await resolveList(repo, ref);
  unwrap(await repo.deleteList(list.id));
  console.log(`Deleted list ${list.name}`);
}

// --- Sharing commands ---

export async function cmdListShare(
  ref: string | undefined,
  userId: string | undefined
): Promise<void> {
  if (!userId?.trim()) {
    throw new Error("Missing user id. Usage: listsync list share <list> <user-id>");
  }

  const repo = openRepository();
  const list = await resolveList(repo, ref);
  unwrap(await repo.shareList(list.id, userId));
  console.log(`Shared ${list.name} with ${userId.trim()}`);
}

export async function cmdListUnshare(
  ref: string | undefined,
  userId: string | undefined
): Promise<void> {
  if (!userId?.trim()) {
    throw new Error("Missing user id. Usage: listsync list unshare <list> <user-id>");
  }

  const repo = openRepository();
  const list = await resolveList(repo, ref);
  unwrap(await repo.removeMember(list.id, userId.trim()));
  console.log(`Removed ${userId.trim()} from ${list.name}`);
}

export async function cmdListLeave(ref: string | undefined): Promise<void> {
  const repo = openRepository();
  const list = await resolveList(repo, ref);
  unwrap(await repo.leaveList(list.id));
  console.log(`Left ${list.name}`);
}

// --- Item commands ---

export async function cmdItemAdd(
  ref: string | undefined,
  name: string | undefined,
  quantity?: string
): Promise<void> {
  if (!name?.trim()) {
    throw new Error("Missing item name. Usage: listsync item add <list> <name>");
  }

  const repo = openRepository();
  const list = await resolveList(repo, ref);
  unwrap(await repo.addItem(list.id, { name: name.trim(), quantity: quantity ?? null }));
  console.log(`Added ${name.trim()} to ${list.name}`);
}

export async function cmdItemToggle(
  ref: string | undefined,
  itemRef: string | undefined
): Promise<void> {
  const repo = openRepository();
  const list = await resolveList(repo, ref);
  const item = resolveItem(list, itemRef);
  unwrap(await repo.updateItem(list.id, item.id, { isCompleted: !item.isCompleted }));
  console.log(`${item.isCompleted ? "Unchecked" : "Checked"} ${item.name}`);
}

export async function cmdItemRemove(
  ref: string | undefined,
  itemRef: string | undefined
): Promise<void> {
  const repo = openRepository();
  const list = await resolveList(repo, ref);
  const item = resolveItem(list, itemRef);
  unwrap(await repo.removeItem(list.id, item.id));
  console.log(`Removed ${item.name} from ${list.name}`);
}

export async function cmdItemClear(ref: string | undefined): Promise<void> {
  const repo = openRepository();
  const list = await resolveList(repo, ref);
  const completed = activeItems(list).filter((item) => item.isCompleted).length;
  unwrap(await repo.clearCompleted(list.id));
  console.log(`Cleared ${completed} completed item(s) from ${list.name}`);
}

// --- Config ---

const CONFIG_KEYS = ["supabaseUrl", "supabaseAnonKey", "refreshToken", "pauseInBackground"] as const;
type ConfigKey = (typeof CONFIG_KEYS)[number];

function isConfigKey(key: string | undefined): key is ConfigKey {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

export function cmdConfigSet(key: string | undefined, value: string | undefined): void {
  if (!isConfigKey(key) || value === undefined) {
    throw new Error(`Usage: listsync config set <${CONFIG_KEYS.join("|")}> <value>`);
  }

  const patch: Partial<ListSyncConfig> = {};
  switch (key) {
    case "pauseInBackground":
      patch.pauseInBackground = value === "true";
      break;
    case "supabaseUrl":
      patch.supabaseUrl = value;
      break;
    case "supabaseAnonKey":
      patch.supabaseAnonKey = value;
      break;
    case "refreshToken":
      patch.refreshToken = value;
      break;
  }
  const parsed = ConfigSchema.safeParse({ ...loadConfig(), ...patch });
  if (!parsed.success) {
    throw new Error(`Invalid ${key}: ${parsed.error.issues[0]?.message}`);
  }

  updateConfig(patch);
  console.log(`Set ${key}`);
}

export function cmdConfigShow(): void {
  const config = loadConfig();
  console.log(`Config file: ${getConfigFile()}`);
  console.log(`supabaseUrl:       ${config.supabaseUrl ?? "(not set)"}`);
  console.log(`supabaseAnonKey:   ${config.supabaseAnonKey ? "(set)" : "(not set)"}`);
  console.log(`refreshToken:      ${config.refreshToken ? "(set)" : "(not set)"}`);
  console.log(`pauseInBackground: ${getPauseInBackground()}`);
}

// --- Sync ---

export function cmdStatus(): void {
  const state = createFileSyncStateStore(getConfigDir()).load();
  console.log(`Last push:   ${state.lastPushAt ?? "never"}`);
  console.log(`Last pull:   ${state.lastPullAt ?? "never"}`);
  if (state.lastSyncError) {
    console.log(`Last error:  ${state.lastSyncError}`);
    console.log(`Failures:    ${state.consecutiveFailures} in a row`);
  }
  console.log(`Signed in:   ${getRefreshToken() ? "yes" : "no"}`);
}

/**
 * Store every refresh token the client rotates to. The previous one is
 * already spent.
 */
export function persistRefreshTokens(
  identity: Pick<SupabaseIdentity, "onRefreshToken">
): () => void {
  let warned = false;
  return identity.onRefreshToken((token) => {
    updateConfig({ refreshToken: token });
    if (process.env.LISTSYNC_REFRESH_TOKEN && !warned) {
      warned = true;
      console.log(
        `Refresh token rotated and saved to ${getConfigFile()}. Unset LISTSYNC_REFRESH_TOKEN to use it.`
      );
    }
  });
}

/**
 * Sign in with the stored refresh token and sync until interrupted.
 */
export async function cmdSync(telemetry?: TelemetrySink): Promise<void> {
  const refreshToken = getRefreshToken();
  if (!refreshToken) {
    throw new Error(
      "Not signed in. Set LISTSYNC_REFRESH_TOKEN or run: listsync config set refreshToken <token>"
    );
  }

  const client = createListSyncClient({
    supabaseUrl: getSupabaseUrl(),
    supabaseAnonKey: getSupabaseAnonKey(),
  });
  const identity = createSupabaseIdentity(client);
  await identity.ready();

  const stopPersisting = persistRefreshTokens(identity);
  await identity.signInWithRefreshToken(refreshToken);

  // Other listsync commands write the same file while this one runs
  const local = createLocalListStore({ filePath: getListsFile(), watch: true });
  const service = createSyncService({
    local,
    remote: createSupabaseListStore({ client, identity }),
    identity,
    stateStore: createFileSyncStateStore(getConfigDir()),
    telemetry,
  });
  const lifecycle = createSyncLifecycle({
    service,
    identity,
    pauseInBackground: getPauseInBackground(),
  });

  service.onStatusChange((status) => {
    const detail = status === "error" ? `: ${service.getLastError()}` : "";
    console.log(`Sync ${status}${detail}`);
  });

  lifecycle.attach();
  console.log("Syncing. Press Ctrl+C to stop.");

  await new Promise<void>((resolve) => {
    const stop = () => {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
      resolve();
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
  });

  await service.drained();
  lifecycle.detach();
  local.close();
  stopPersisting();
  identity.dispose();
  await client.removeAllChannels();
}

// --- Help ---

export function cmdHelp(): void {
  console.log(`
listsync - Local-first shared lists

Usage:
  listsync lists                             Show all lists
  listsync list show <list>                  Show a list and its items
  listsync list create <name> [--description TEXT] [--color #RRGGBB]
  listsync list rename <list> <name>         Rename a list
  listsync list delete <list>                Delete a list
  listsync list share <list> <user-id>       Add a member
  listsync list unshare <list> <user-id>     Remove a member
  listsync list leave <list>                 Leave a list shared with you

  listsync item add <list> <name> [--quantity Q]
  listsync item toggle <list> <item>         Check or uncheck an item
  listsync item remove <list> <item>         Remove an item
  listsync item clear <list>                 Remove all checked items

  listsync sync                              Sync with the server until Ctrl+C
  listsync status                            Show last sync times and errors

  listsync config show                       Show configuration
  listsync config set <key> <value>          Keys: ${CONFIG_KEYS.join(", ")}

  listsync telemetry status|on|off           Anonymous usage statistics

<list> and <item> take an id, an id prefix or a name.

Environment:
  SUPABASE_URL, SUPABASE_ANON_KEY, LISTSYNC_REFRESH_TOKEN override the config file.
`);
}
