/**
 * Local list store
 *
 * Holds every list on this device, tombstones included, and publishes the
 * full collection after each write. With a filePath the collection is
 * mirrored to a JSON file and reloaded on the next start.
 */

import {
  existsSync,
  readFileSync,
  writeFileSync,
  mkdirSync,
  renameSync,
  watch,
  type FSWatcher,
} from "fs";
import { basename, dirname } from "path";
import { z } from "zod";
import { ShoppingListSchema, type ShoppingList } from "../schema/shopping-list.js";
import { attempt } from "../sync/result.js";
import { createSnapshotChannel, type SnapshotStream } from "../sync/snapshot-stream.js";
import type { LocalListStore } from "../sync/types.js";

export const LOCAL_STORE_FILE = "lists.json";

const ListFileSchema = z.object({
  version: z.literal(1),
  lists: z.array(ShoppingListSchema),
});

export interface LocalListStoreOptions {
  /** Omit for a purely in-memory store */
  filePath?: string;
  /**
   * Publish writes made to the file by other processes (default: false).
   * Needs filePath.
   */
  watch?: boolean;
}

export interface FileBackedListStore extends LocalListStore {
  /** Drop all watchers */
  close: () => void;
}

function parseLists(raw: string, filePath: string): ShoppingList[] | null {
  try {
    const parsed = ListFileSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data.lists;
    }
    console.error(`[LocalStore] Ignoring invalid list file ${filePath}`);
  } catch (err) {
    console.error(`[LocalStore] Could not parse ${filePath}:`, err);
  }
  return null;
}

function serialize(lists: ShoppingList[]): string {
  return JSON.stringify({ version: 1, lists }, null, 2);
}

export function createLocalListStore(
  options: LocalListStoreOptions = {}
): FileBackedListStore {
  const { filePath } = options;
  const lists = new Map<string, ShoppingList>();
  const channel = createSnapshotChannel<ShoppingList[]>();
  // File content as last read or written by this store
  let knownContent: string | null = null;
  let watcher: FSWatcher | null = null;

  function snapshot(): ShoppingList[] {
    return Array.from(lists.values());
  }

  /**
   * Re-read the file. Returns true when another writer changed it.
   */
  function reload(): boolean {
    if (!filePath) return false;

    let raw: string | null;
    try {
      raw = existsSync(filePath) ? readFileSync(filePath, "utf-8") : null;
    } catch (err) {
      console.error(`[LocalStore] Could not read ${filePath}:`, err);
      return false;
    }
    if (raw === knownContent) return false;

    const loaded = raw === null ? [] : parseLists(raw, filePath);
    knownContent = raw;
    if (loaded === null) {
      // Unreadable content never replaces lists already held
      return false;
    }
    lists.clear();
    for (const list of loaded) {
      lists.set(list.id, list);
    }
    return true;
  }

  function refresh(): void {
    if (reload()) {
      channel.publish(snapshot());
    }
  }

  function persist(next: ShoppingList[]): void {
    if (!filePath) return;

    const dir = dirname(filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    const content = serialize(next);
    // Write then rename, so a concurrent reader never sees a partial file
    const tempPath = `${filePath}.${process.pid}.tmp`;
    writeFileSync(tempPath, content, { mode: 0o600 });
    renameSync(tempPath, filePath);
    knownContent = content;
  }

  /**
   * Apply a change on top of the latest file content, write it through and
   * publish. The in-memory copy is only replaced once the write succeeded.
   */
  async function commit(change: (draft: Map<string, ShoppingList>) => void): Promise<void> {
    reload();
    const draft = new Map(lists);
    change(draft);
    const next = Array.from(draft.values());
    persist(next);

    lists.clear();
    for (const list of next) {
      lists.set(list.id, list);
    }
    channel.publish(snapshot());
  }

  function startWatching(path: string): void {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    const name = basename(path);
    // Watch the directory: the file may not exist yet
    watcher = watch(dir, { persistent: false }, (_event, changed) => {
      if (changed === null || changed === name) {
        refresh();
      }
    });
    watcher.on("error", (err) => {
      console.error(`[LocalStore] Stopped watching ${path}:`, err);
      watcher?.close();
      watcher = null;
    });
  }

  reload();
  if (filePath && options.watch) {
    startWatching(filePath);
  }
  channel.publish(snapshot());

  return {
    watchAll: (): SnapshotStream<ShoppingList[]> => channel,

    upsert: (list) =>
      attempt(() =>
        commit((draft) => {
          draft.set(list.id, list);
        })
      ),

    hardDelete: (id) =>
      attempt(async () => {
        refresh();
        if (!lists.has(id)) return;
        await commit((draft) => {
          draft.delete(id);
        });
      }),

    getAll: async () => {
      refresh();
      return snapshot();
    },

    close: () => {
      watcher?.close();
      watcher = null;
      channel.close();
    },
  };
}
