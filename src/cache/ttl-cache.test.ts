// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createTtlCache } from "./ttl-cache.ts";

function clockedCache<V>(ttl_ms: number, max_entries: number) {
  const clock = { now: 0 };
  const cache = createTtlCache<V>({ ttl_ms, max_entries, now: () => clock.now });
  return { cache, clock };
}

describe("createTtlCache", () => {
  it("returns undefined for an unknown key and counts a miss", () => {
    const { cache } = clockedCache<string>(1000, 10);

    expect(cache.get("missing")).toBeUndefined();
    expect(cache.stats()).toEqual({ hits: 0, misses: 1, evictions: 0, size: 0 });
  });

  it("returns the stored instance on a hit", () => {
    const { cache } = clockedCache<ReadonlyArray<number>>(1000, 10);
    const value = [1, 2, 3];

    cache.set("k", value);

    expect(cache.get("k")).toBe(value);
    expect(cache.stats().hits).toBe(1);
  });

  it("expires entries once the ttl has elapsed since the write", () => {
    const { cache, clock } = clockedCache<string>(1000, 10);
    cache.set("k", "v");

    clock.now = 999;
    expect(cache.get("k")).toBe("v");

    clock.now = 1000;
    expect(cache.get("k")).toBeUndefined();
    expect(cache.size()).toBe(0);
    expect(cache.stats().evictions).toBe(1);
  });

  it("does not extend the ttl on reads", () => {
    const { cache, clock } = clockedCache<string>(1000, 10);
    cache.set("k", "v");

    clock.now = 900;
    cache.get("k");
    clock.now = 1100;

    expect(cache.get("k")).toBeUndefined();
  });

  it("replaces an entry on overwrite without touching the previous value", () => {
    const { cache, clock } = clockedCache<ReadonlyArray<string>>(1000, 10);
    const first = ["a"];
    const second = ["b"];

    cache.set("k", first);
    clock.now = 800;
    cache.set("k", second);
    clock.now = 1500;

    expect(cache.get("k")).toBe(second);
    expect(first).toEqual(["a"]);
  });

  it("evicts the least recently used entry beyond capacity", () => {
    const { cache } = clockedCache<string>(1000, 2);
    cache.set("a", "1");
    cache.set("b", "2");
    cache.get("a");
    cache.set("c", "3");

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe("1");
    expect(cache.get("c")).toBe("3");
    expect(cache.size()).toBe(2);
    expect(cache.stats().evictions).toBe(1);
  });

  it("supports delete and clear", () => {
    const { cache } = clockedCache<string>(1000, 10);
    cache.set("a", "1");
    cache.set("b", "2");

    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    cache.clear();
    expect(cache.size()).toBe(0);
  });

  it("rejects a non-positive ttl or capacity", () => {
    expect(() => createTtlCache({ ttl_ms: 0, max_entries: 10 })).toThrow("cache ttl must be a positive");
    expect(() => createTtlCache({ ttl_ms: 1000, max_entries: 0 })).toThrow("cache max_entries must be a positive integer");
  });
});
