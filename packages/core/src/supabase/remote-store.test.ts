/**
 * Supabase list store tests
 *
 * The Supabase client is a hand-built mock: query builders are chainable
 * thenables and the realtime channel records its handlers.
 */

import { describe, it, expect, vi } from "vitest";
import type { SupabaseClient } from "@supabase/supabase-js";
import { createSupabaseListStore, fromListRow, ListRowSchema } from "./remote-store.js";
import { createFakeIdentity } from "../sync/test-utils.js";
import type { ShoppingList } from "../schema/shopping-list.js";

interface QueryResult {
  data: unknown;
  error: { message: string } | null;
}

function createMockQuery(result: QueryResult | Promise<QueryResult> = { data: null, error: null }) {
  const query = {
    select: vi.fn(),
    or: vi.fn(),
    eq: vi.fn(),
    insert: vi.fn(),
    upsert: vi.fn(),
    update: vi.fn(),
    delete: vi.fn(),
    then: (
      resolve: (value: QueryResult) => unknown,
      reject?: (reason: unknown) => unknown
    ) => Promise.resolve(result).then(resolve, reject),
  };
  query.select.mockReturnValue(query);
  query.or.mockReturnValue(query);
  query.eq.mockReturnValue(query);
  query.insert.mockReturnValue(query);
  query.upsert.mockReturnValue(query);
  query.update.mockReturnValue(query);
  query.delete.mockReturnValue(query);
  return query;
}

type MockQuery = ReturnType<typeof createMockQuery>;

function createMockChannel() {
  const channel = {
    on: vi.fn(),
    subscribe: vi.fn(),
  };
  channel.on.mockReturnValue(channel);
  channel.subscribe.mockReturnValue(channel);
  return channel;
}

function createMockSupabase(queries: MockQuery[] = []) {
  const channel = createMockChannel();
  const from = vi.fn();
  for (const query of queries) {
    from.mockReturnValueOnce(query);
  }
  return {
    client: {
      from,
      channel: vi.fn().mockReturnValue(channel),
      removeChannel: vi.fn().mockResolvedValue("ok"),
      rpc: vi.fn().mockResolvedValue({ data: "left", error: null }),
    },
    channel,
  };
}

function asClient(mock: ReturnType<typeof createMockSupabase>["client"]): SupabaseClient {
  return mock as unknown as SupabaseClient;
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

const LIST_ROW = {
  id: "list-1",
  owner_id: "user-1",
  name: "Market",
  description: null,
  color: "#4CAF50",
  member_ids: ["user-2"],
  created_at: "2024-07-01T09:00:00+00:00",
  updated_at: "2024-07-01T10:00:00+00:00",
  list_items: [
    {
      list_id: "list-1",
      id: "item-b",
      name: "Bread",
      quantity: null,
      is_completed: true,
      created_at: "2024-07-01T09:30:00+00:00",
      completed_at: "2024-07-01T09:45:00+00:00",
    },
    {
      list_id: "list-1",
      id: "item-a",
      name: "Apples",
      quantity: "6",
      is_completed: false,
      created_at: "2024-07-01T09:10:00+00:00",
      completed_at: null,
    },
  ],
};

const LIST: ShoppingList = {
  id: "list-1",
  name: "Market",
  description: "",
  color: "#4CAF50",
  createdAt: "2024-07-01T09:00:00.000Z",
  updatedAt: "2024-07-01T10:00:00.000Z",
  deletedAt: null,
  members: ["user-2"],
  items: [
    {
      id: "item-a",
      name: "Apples",
      quantity: "6",
      isCompleted: false,
      createdAt: "2024-07-01T09:10:00.000Z",
      completedAt: null,
      deletedAt: null,
    },
    {
      id: "item-b",
      name: "Bread",
      quantity: null,
      isCompleted: true,
      createdAt: "2024-07-01T09:30:00.000Z",
      completedAt: "2024-07-01T09:45:00.000Z",
      deletedAt: null,
    },
  ],
};

const identity = createFakeIdentity({ principalId: "user-1", isAnonymous: false });

// --- Mapping ---

describe("fromListRow", () => {
  it("maps rows to the domain model", () => {
    expect(fromListRow(ListRowSchema.parse(LIST_ROW))).toEqual(LIST);
  });

  it("treats missing members and items as empty", () => {
    const row = ListRowSchema.parse({ ...LIST_ROW, member_ids: null, list_items: undefined });
    const list = fromListRow(row);
    expect(list.members).toEqual([]);
    expect(list.items).toEqual([]);
  });
});

// --- watchAccessible ---

describe("watchAccessible", () => {
  it("emits the lists the user owns or is a member of", async () => {
    const query = createMockQuery({ data: [LIST_ROW], error: null });
    const { client } = createMockSupabase([query]);
    const store = createSupabaseListStore({ client: asClient(client), identity });
    const next = vi.fn();

    store.watchAccessible("user-1").subscribe({ next });
    await flush();

    expect(client.from).toHaveBeenCalledWith("lists");
    expect(query.select).toHaveBeenCalledWith("*, list_items(*)");
    expect(query.or).toHaveBeenCalledWith("owner_id.eq.user-1,member_ids.cs.{user-1}");
    expect(next).toHaveBeenCalledWith([LIST]);
  });

  it("subscribes to changes on both tables", () => {
    const { client, channel } = createMockSupabase([createMockQuery({ data: [], error: null })]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    store.watchAccessible("user-1").subscribe({ next: vi.fn() });

    expect(channel.on).toHaveBeenCalledWith(
      "postgres_changes",
      { event: "*", schema: "public", table: "lists" },
      expect.any(Function)
    );
    expect(channel.on).toHaveBeenCalledWith(
      "postgres_changes",
      { event: "*", schema: "public", table: "list_items" },
      expect.any(Function)
    );
    expect(channel.subscribe).toHaveBeenCalled();
  });

  it("re-queries when a change arrives", async () => {
    const { client, channel } = createMockSupabase([
      createMockQuery({ data: [], error: null }),
      createMockQuery({ data: [LIST_ROW], error: null }),
    ]);
    const store = createSupabaseListStore({ client: asClient(client), identity });
    const next = vi.fn();
    store.watchAccessible("user-1").subscribe({ next });
    await flush();

    const onItemChange = channel.on.mock.calls[1][2];
    onItemChange({ eventType: "INSERT" });
    await flush();

    expect(next.mock.calls).toEqual([[[]], [[LIST]]]);
  });

  it("drops a query result that a newer query overtook", async () => {
    let resolveSlow: (value: QueryResult) => void = () => {};
    const slow = new Promise<QueryResult>((resolve) => {
      resolveSlow = resolve;
    });
    const { client, channel } = createMockSupabase([
      createMockQuery(slow),
      createMockQuery({ data: [LIST_ROW], error: null }),
    ]);
    const store = createSupabaseListStore({ client: asClient(client), identity });
    const next = vi.fn();
    store.watchAccessible("user-1").subscribe({ next });

    channel.on.mock.calls[0][2]({ eventType: "UPDATE" });
    await flush();
    resolveSlow({ data: [], error: null });
    await flush();

    expect(next.mock.calls).toEqual([[[LIST]]]);
  });

  it("reports query errors to the observer", async () => {
    const { client } = createMockSupabase([
      createMockQuery({ data: null, error: { message: "permission denied" } }),
    ]);
    const store = createSupabaseListStore({ client: asClient(client), identity });
    const error = vi.fn();

    store.watchAccessible("user-1").subscribe({ next: vi.fn(), error });
    await flush();

    expect(error).toHaveBeenCalledWith(new Error("permission denied"));
  });

  it("reports malformed rows", async () => {
    const { client } = createMockSupabase([
      createMockQuery({ data: [{ id: "list-1" }], error: null }),
    ]);
    const store = createSupabaseListStore({ client: asClient(client), identity });
    const next = vi.fn();
    const error = vi.fn();

    store.watchAccessible("user-1").subscribe({ next, error });
    await flush();

    expect(next).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("reports a failed realtime channel", () => {
    const { client, channel } = createMockSupabase([createMockQuery({ data: [], error: null })]);
    const store = createSupabaseListStore({ client: asClient(client), identity });
    const error = vi.fn();
    store.watchAccessible("user-1").subscribe({ next: vi.fn(), error });

    const onStatus = channel.subscribe.mock.calls[0][0];
    onStatus("CHANNEL_ERROR", new Error("socket closed"));

    expect(error).toHaveBeenCalledWith(new Error("socket closed"));
  });

  it("removes the channel and goes quiet on unsubscribe", async () => {
    const { client, channel } = createMockSupabase([createMockQuery({ data: [LIST_ROW], error: null })]);
    const store = createSupabaseListStore({ client: asClient(client), identity });
    const next = vi.fn();

    const unsubscribe = store.watchAccessible("user-1").subscribe({ next });
    unsubscribe();
    await flush();

    expect(client.removeChannel).toHaveBeenCalledWith(channel);
    expect(next).not.toHaveBeenCalled();
  });
});

// --- Writes ---

describe("create", () => {
  it("inserts the list row and its active items", async () => {
    const listsQuery = createMockQuery();
    const itemsQuery = createMockQuery();
    const { client } = createMockSupabase([listsQuery, itemsQuery]);
    const store = createSupabaseListStore({ client: asClient(client), identity });
    const withTombstone: ShoppingList = {
      ...LIST,
      items: [...LIST.items, { ...LIST.items[0], id: "item-gone", deletedAt: LIST.updatedAt }],
    };

    const result = await store.create(withTombstone);

    expect(result).toEqual({ success: true, data: "list-1" });
    expect(client.from.mock.calls).toEqual([["lists"], ["list_items"]]);
    expect(listsQuery.insert).toHaveBeenCalledWith({
      id: "list-1",
      owner_id: "user-1",
      name: "Market",
      description: "",
      color: "#4CAF50",
      member_ids: ["user-2"],
      created_at: "2024-07-01T09:00:00.000Z",
      updated_at: "2024-07-01T10:00:00.000Z",
    });
    const [rows, options] = itemsQuery.upsert.mock.calls[0];
    expect(rows.map((row: { id: string }) => row.id)).toEqual(["item-a", "item-b"]);
    expect(options).toEqual({ onConflict: "list_id,id" });
  });

  it("skips the item write for an empty list", async () => {
    const { client } = createMockSupabase([createMockQuery()]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    await store.create({ ...LIST, items: [] });

    expect(client.from).toHaveBeenCalledTimes(1);
  });

  it("fails when the list already exists", async () => {
    const { client } = createMockSupabase([
      createMockQuery({ data: null, error: { message: "duplicate key value" } }),
    ]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.create(LIST)).toEqual({ success: false, error: "duplicate key value" });
  });

  it("fails without a signed-in user", async () => {
    const { client } = createMockSupabase();
    const store = createSupabaseListStore({
      client: asClient(client),
      identity: createFakeIdentity(),
    });

    expect(await store.create(LIST)).toEqual({ success: false, error: "Not authenticated" });
    expect(client.from).not.toHaveBeenCalled();
  });
});

describe("updateMetadata", () => {
  it("updates the metadata columns of one list", async () => {
    const query = createMockQuery({ data: [{ id: "list-1" }], error: null });
    const { client } = createMockSupabase([query]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    const result = await store.updateMetadata("list-1", {
      name: "Market",
      description: "",
      color: "#4CAF50",
      members: ["user-2"],
      updatedAt: "2024-07-01T10:00:00.000Z",
    });

    expect(result.success).toBe(true);
    expect(query.update).toHaveBeenCalledWith({
      name: "Market",
      description: "",
      color: "#4CAF50",
      member_ids: ["user-2"],
      updated_at: "2024-07-01T10:00:00.000Z",
    });
    expect(query.eq).toHaveBeenCalledWith("id", "list-1");
  });

  it("fails when no row was updated", async () => {
    const { client } = createMockSupabase([createMockQuery({ data: [], error: null })]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    const result = await store.updateMetadata("list-1", {
      name: "x",
      description: "",
      color: "#000000",
      members: [],
      updatedAt: "2024-07-01T10:00:00.000Z",
    });

    expect(result).toEqual({ success: false, error: "List not found: list-1" });
  });
});

describe("item writes", () => {
  it("upserts an item under its own id", async () => {
    const query = createMockQuery();
    const { client } = createMockSupabase([query]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    await store.pushItem("list-1", LIST.items[0]);

    expect(query.upsert).toHaveBeenCalledWith(
      {
        list_id: "list-1",
        id: "item-a",
        name: "Apples",
        quantity: "6",
        is_completed: false,
        created_at: "2024-07-01T09:10:00.000Z",
        completed_at: null,
      },
      { onConflict: "list_id,id" }
    );
  });

  it("deletes one item by list and item id", async () => {
    const query = createMockQuery();
    const { client } = createMockSupabase([query]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    const result = await store.deleteItem("list-1", "item-a");

    expect(result.success).toBe(true);
    expect(query.delete).toHaveBeenCalled();
    expect(query.eq.mock.calls).toEqual([
      ["list_id", "list-1"],
      ["id", "item-a"],
    ]);
  });

  it("reports a rejected item delete", async () => {
    const { client } = createMockSupabase([
      createMockQuery({ data: null, error: { message: "permission denied" } }),
    ]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.deleteItem("list-1", "item-a")).toEqual({
      success: false,
      error: "permission denied",
    });
  });
});

describe("deleteEntity", () => {
  it("deletes the list row", async () => {
    const query = createMockQuery({ data: [{ id: "list-1" }], error: null });
    const { client } = createMockSupabase([query]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.deleteEntity("list-1")).toEqual({ success: true, data: undefined });
    expect(query.eq).toHaveBeenCalledWith("id", "list-1");
    expect(query.select).toHaveBeenCalledWith("id");
    expect(client.rpc).not.toHaveBeenCalled();
  });

  it("leaves a shared list whose row the caller cannot delete", async () => {
    const { client } = createMockSupabase([createMockQuery({ data: [], error: null })]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.deleteEntity("list-1")).toEqual({ success: true, data: undefined });
    expect(client.rpc).toHaveBeenCalledWith("leave_list", { target_list_id: "list-1" });
  });

  it("treats a list that is already gone as deleted", async () => {
    const { client } = createMockSupabase([createMockQuery({ data: [], error: null })]);
    client.rpc.mockResolvedValueOnce({ data: "missing", error: null });
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.deleteEntity("list-1")).toEqual({ success: true, data: undefined });
  });

  it("fails when an owned row was not deleted", async () => {
    const { client } = createMockSupabase([createMockQuery({ data: [], error: null })]);
    client.rpc.mockResolvedValueOnce({ data: "owner", error: null });
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.deleteEntity("list-1")).toEqual({
      success: false,
      error: "List list-1 could not be deleted",
    });
  });

  it("reports a rejected leave", async () => {
    const { client } = createMockSupabase([createMockQuery({ data: [], error: null })]);
    client.rpc.mockResolvedValueOnce({ data: null, error: { message: "permission denied" } });
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.deleteEntity("list-1")).toEqual({
      success: false,
      error: "permission denied",
    });
  });

  it("rejects an unknown leave result", async () => {
    const { client } = createMockSupabase([createMockQuery({ data: [], error: null })]);
    client.rpc.mockResolvedValueOnce({ data: "archived", error: null });
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.deleteEntity("list-1")).toEqual({
      success: false,
      error: "Unexpected leave_list result: archived",
    });
  });

  it("turns a thrown network error into a failure", async () => {
    const { client } = createMockSupabase([
      createMockQuery(Promise.reject(new Error("fetch failed"))),
    ]);
    const store = createSupabaseListStore({ client: asClient(client), identity });

    expect(await store.deleteEntity("list-1")).toEqual({ success: false, error: "fetch failed" });
  });
});
