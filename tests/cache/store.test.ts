/**
 * Tests for the in-memory cache store and typed helpers
 */

import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import {
  MemoryCacheStore,
  CacheTTL,
  CacheNamespace,
  isFresh,
  readCached,
  cached,
} from "../../src/cache/store";
import { silentLogger } from "../../src/utils/logger";

function createStore(start = 1_000_000) {
  let now = start;
  const store = new MemoryCacheStore({ clock: () => now, logger: silentLogger });
  return {
    store,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("MemoryCacheStore", () => {
  it("should return a payload immediately after it is written", () => {
    const { store } = createStore();
    store.set(CacheNamespace.QUALITY, "k1", { score: 42 });

    const lookup = store.get(CacheNamespace.QUALITY, "k1", 0);
    expect(lookup).toEqual({ hit: true, payload: { score: 42 }, writtenAt: 1_000_000 });
  });

  it("should miss once the entry is older than the TTL", () => {
    const { store, advance } = createStore();
    store.set("ns", "k1", "value");

    advance(1000);
    expect(store.get("ns", "k1", 1000).hit).toBe(true);

    advance(1);
    expect(store.get("ns", "k1", 1000).hit).toBe(false);
    expect(store.getStats().expirations).toBe(1);
  });

  it("should measure age from the last write", () => {
    const { store, advance } = createStore();
    store.set("ns", "k1", "first");
    advance(900);
    store.set("ns", "k1", "second");
    advance(900);

    const lookup = store.get("ns", "k1", 1000);
    expect(lookup.hit && lookup.payload).toBe("second");
  });

  it("should return a copy of the stored payload", () => {
    const { store } = createStore();
    const payload = { items: [1, 2] };
    store.set("ns", "k1", payload);
    payload.items.push(3);

    const lookup = store.get("ns", "k1", CacheTTL.API);
    expect(lookup.hit && lookup.payload).toEqual({ items: [1, 2] });
  });

  it("should keep namespaces apart", () => {
    const { store } = createStore();
    store.set("a", "k", 1);
    expect(store.get("b", "k", CacheTTL.API).hit).toBe(false);
  });

  it("should count payloads that cannot be serialised as write failures", () => {
    const { store } = createStore();
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    store.set("ns", "k", cyclic);
    expect(store.getStats().writeFailures).toBe(1);
    expect(store.get("ns", "k", CacheTTL.API).hit).toBe(false);
  });

  it("should clear one namespace or everything", () => {
    const { store } = createStore();
    store.set("a", "k1", 1);
    store.set("a", "k2", 2);
    store.set("b", "k1", 3);

    expect(store.clear("a")).toBe(2);
    expect(store.get("b", "k1", CacheTTL.API).hit).toBe(true);
    expect(store.clear()).toBe(1);
    expect(store.get("b", "k1", CacheTTL.API).hit).toBe(false);
  });

  it("should track hits and misses", () => {
    const { store } = createStore();
    store.set("ns", "k", 1);
    store.get("ns", "k", CacheTTL.API);
    store.get("ns", "missing", CacheTTL.API);

    expect(store.getStats()).toEqual({
      hits: 1,
      misses: 1,
      expirations: 0,
      corruptions: 0,
      writes: 1,
      writeFailures: 0,
      hitRate: 0.5,
    });
  });
});

describe("isFresh", () => {
  it("should include the TTL boundary", () => {
    expect(isFresh(0, 100, 100)).toBe(true);
    expect(isFresh(0, 101, 100)).toBe(false);
  });
});

describe("typed helpers", () => {
  const schema = z.object({ name: z.string() });

  it("should return payloads that match the schema", () => {
    const { store } = createStore();
    store.set("ns", "k", { name: "demo" });
    expect(readCached(store, "ns", "k", CacheTTL.API, schema)).toEqual({ name: "demo" });
  });

  it("should treat payloads that fail the schema as misses", () => {
    const { store } = createStore();
    store.set("ns", "k", { name: 7 });
    expect(readCached(store, "ns", "k", CacheTTL.API, schema)).toBeUndefined();
  });

  it("should compute and store on a miss, then serve the stored value", async () => {
    const { store } = createStore();
    const compute = vi.fn(async () => ({ name: "fresh" }));

    const first = await cached(store, "ns", "k", CacheTTL.API, schema, compute);
    const second = await cached(store, "ns", "k", CacheTTL.API, schema, compute);

    expect(first).toEqual({ name: "fresh" });
    expect(second).toEqual({ name: "fresh" });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("should store nothing when the computation rejects", async () => {
    const { store } = createStore();
    await expect(
      cached(store, "ns", "k", CacheTTL.API, schema, async () => {
        throw new Error("upstream down");
      })
    ).rejects.toThrow("upstream down");
    expect(store.getStats().writes).toBe(0);
  });
});
