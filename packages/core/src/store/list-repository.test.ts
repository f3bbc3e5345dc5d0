/**
 * List repository tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createListRepository, type ListRepository } from "./list-repository.js";
import { createLocalListStore, type FileBackedListStore } from "./local-store.js";
import type { ShoppingList } from "../schema/shopping-list.js";
import type { StoreResult } from "../sync/result.js";

const T0 = "2024-05-01T12:00:00.000Z";

let clock: Date;
let store: FileBackedListStore;
let repo: ListRepository;

function unwrap(result: StoreResult<ShoppingList>): ShoppingList {
  if (!result.success) {
    throw new Error(result.error);
  }
  return result.data;
}

function tick(seconds: number): void {
  clock = new Date(clock.getTime() + seconds * 1000);
}

beforeEach(() => {
  clock = new Date(T0);
  store = createLocalListStore();
  repo = createListRepository(store, { now: () => clock });
});

describe("createList", () => {
  it("stores a new list", async () => {
    const list = unwrap(await repo.createList({ name: "Market", color: "#4CAF50" }));

    expect(list.name).toBe("Market");
    expect(list.createdAt).toBe(T0);
    expect(await repo.getList(list.id)).toEqual(list);
  });
});

describe("getLists", () => {
  it("returns visible lists, newest first", async () => {
    const older = unwrap(await repo.createList({ name: "Older" }));
    tick(10);
    const newer = unwrap(await repo.createList({ name: "Newer" }));
    tick(10);
    const deleted = unwrap(await repo.createList({ name: "Deleted" }));
    await repo.deleteList(deleted.id);

    const lists = await repo.getLists();

    expect(lists.map((list) => list.id)).toEqual([newer.id, older.id]);
  });
});

describe("updateList", () => {
  it("applies the patch and stamps updatedAt", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));
    tick(5);

    const updated = unwrap(await repo.updateList(list.id, { name: "Farmers market" }));

    expect(updated.name).toBe("Farmers market");
    expect(updated.updatedAt).toBe("2024-05-01T12:00:05.000Z");
  });

  it("fails for an unknown list", async () => {
    expect(await repo.updateList("missing", { name: "x" })).toEqual({
      success: false,
      error: "List not found: missing",
    });
  });
});

describe("deleteList", () => {
  it("keeps a tombstone in the store", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));
    tick(1);

    await repo.deleteList(list.id);

    expect(await repo.getList(list.id)).toBeNull();
    const stored = await store.getAll();
    expect(stored[0].deletedAt).toBe("2024-05-01T12:00:01.000Z");
  });

  it("cannot delete a list twice", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));
    await repo.deleteList(list.id);

    expect((await repo.deleteList(list.id)).success).toBe(false);
  });
});

describe("items", () => {
  it("adds an item with the same timestamp as the list update", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));
    tick(3);

    const updated = unwrap(await repo.addItem(list.id, { name: "Eggs", quantity: "12" }));

    expect(updated.items).toHaveLength(1);
    expect(updated.items[0].name).toBe("Eggs");
    expect(updated.items[0].quantity).toBe("12");
    expect(updated.items[0].createdAt).toBe("2024-05-01T12:00:03.000Z");
    expect(updated.updatedAt).toBe("2024-05-01T12:00:03.000Z");
  });

  it("toggles completion without touching createdAt", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));
    const withItem = unwrap(await repo.addItem(list.id, { name: "Eggs" }));
    const itemId = withItem.items[0].id;
    tick(60);

    const updated = unwrap(await repo.updateItem(list.id, itemId, { isCompleted: true }));

    expect(updated.items[0].isCompleted).toBe(true);
    expect(updated.items[0].completedAt).toBe("2024-05-01T12:01:00.000Z");
    expect(updated.items[0].createdAt).toBe(T0);
  });

  it("soft deletes an item", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));
    const withItem = unwrap(await repo.addItem(list.id, { name: "Eggs" }));
    const itemId = withItem.items[0].id;

    const updated = unwrap(await repo.removeItem(list.id, itemId));

    expect(updated.items[0].deletedAt).toBe(T0);
  });

  it("fails for an unknown item", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));

    expect(await repo.updateItem(list.id, "nope", { name: "x" })).toEqual({
      success: false,
      error: "Item not found: nope",
    });
    expect((await repo.removeItem(list.id, "nope")).success).toBe(false);
  });

  it("clears completed items", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));
    unwrap(await repo.addItem(list.id, { name: "Eggs" }));
    const withTwo = unwrap(await repo.addItem(list.id, { name: "Milk" }));
    await repo.updateItem(list.id, withTwo.items[0].id, { isCompleted: true });
    tick(1);

    const cleared = unwrap(await repo.clearCompleted(list.id));

    expect(cleared.items.map((item) => item.deletedAt)).toEqual([
      "2024-05-01T12:00:01.000Z",
      null,
    ]);
  });

  it("skips the write when nothing is completed", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));

    const cleared = unwrap(await repo.clearCompleted(list.id));

    expect(cleared).toEqual(list);
  });
});

describe("sharing", () => {
  it("adds a member and stamps updatedAt", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));
    tick(5);

    const shared = unwrap(await repo.shareList(list.id, " user-2 "));

    expect(shared.members).toEqual(["user-2"]);
    expect(shared.updatedAt).toBe("2024-05-01T12:00:05.000Z");
    expect((await repo.getList(list.id))?.members).toEqual(["user-2"]);
  });

  it("rejects an empty member id", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));

    expect(await repo.shareList(list.id, "  ")).toEqual({
      success: false,
      error: "Missing member id",
    });
  });

  it("removes a member", async () => {
    const list = unwrap(await repo.createList({ name: "Market", members: ["user-2", "user-3"] }));
    tick(5);

    const updated = unwrap(await repo.removeMember(list.id, "user-2"));

    expect(updated.members).toEqual(["user-3"]);
    expect(updated.updatedAt).toBe("2024-05-01T12:00:05.000Z");
  });

  it("fails to remove someone who is not a member", async () => {
    const list = unwrap(await repo.createList({ name: "Market" }));

    expect(await repo.removeMember(list.id, "user-9")).toEqual({
      success: false,
      error: "Not a member of Market: user-9",
    });
  });

  it("hides a list after leaving it and keeps the tombstone for sync", async () => {
    const list = unwrap(await repo.createList({ name: "Theirs", members: ["user-1"] }));
    tick(5);

    const left = unwrap(await repo.leaveList(list.id));

    expect(left.deletedAt).toBe("2024-05-01T12:00:05.000Z");
    expect(await repo.getLists()).toEqual([]);
    expect(await store.getAll()).toEqual([left]);
  });
});
