/**
 * Converge — In-Memory State Store Tests
 */

import { describe, it, expect } from "vitest";
import { MemoryStateStore } from "./memory-store.js";
import type { StateRecord } from "./types.js";

const vpc: StateRecord = {
  kind: "vpc",
  name: "main",
  handle: "vpc-1",
  attributes: { cidr: "10.0.0.0/16", tags: { env: "dev" } },
  computed: {},
  dependencies: [],
  updatedAt: "2024-01-01T00:00:00.000Z",
};

describe("MemoryStateStore", () => {
  it("reads its own writes", async () => {
    const store = new MemoryStateStore();
    await store.put(vpc);
    expect(await store.get({ kind: "vpc", name: "main" })).toEqual(vpc);
    expect(await store.list()).toEqual([vpc]);

    await store.delete({ kind: "vpc", name: "main" });
    expect(await store.get({ kind: "vpc", name: "main" })).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("never hands out its own copies", async () => {
    const store = new MemoryStateStore([vpc]);
    const read = await store.get({ kind: "vpc", name: "main" });
    if (read) read.attributes.cidr = "changed";

    const listed = await store.list();
    expect(listed[0].attributes.cidr).toBe("10.0.0.0/16");
  });

  it("replaces a record on put", async () => {
    const store = new MemoryStateStore([vpc]);
    await store.put({ ...vpc, handle: "vpc-2" });
    expect(store.size).toBe(1);
    expect((await store.get(vpc))?.handle).toBe("vpc-2");
  });

  it("clears everything", async () => {
    const store = new MemoryStateStore([vpc, { ...vpc, name: "other" }]);
    store.clear();
    expect(await store.list()).toEqual([]);
  });
});
