// pattern: Imperative Shell

/**
 * In-memory cache with expire-after-write TTL and least-recently-used eviction.
 *
 * Hits return the stored value itself, never a copy. Writes replace the entry
 * wholesale, so a value handed out earlier is never changed underneath its holder.
 * All operations are synchronous, which makes reads and writes for a key atomic
 * with respect to each other on the event loop.
 */

export type TtlCacheOptions = {
  readonly ttl_ms: number;
  readonly max_entries: number;
  readonly now?: () => number;
};

export type CacheStats = {
  readonly hits: number;
  readonly misses: number;
  readonly evictions: number;
  readonly size: number;
};

export type TtlCache<V> = {
  get(key: string): V | undefined;
  set(key: string, value: V): void;
  delete(key: string): boolean;
  clear(): void;
  size(): number;
  stats(): CacheStats;
};

type CacheEntry<V> = {
  readonly value: V;
  readonly insertedAt: number;
};

export function createTtlCache<V>(options: TtlCacheOptions): TtlCache<V> {
  if (!Number.isFinite(options.ttl_ms) || options.ttl_ms <= 0) {
    throw new Error(`cache ttl must be a positive number of milliseconds, got ${options.ttl_ms}`);
  }
  if (!Number.isInteger(options.max_entries) || options.max_entries < 1) {
    throw new Error(`cache max_entries must be a positive integer, got ${options.max_entries}`);
  }

  const now = options.now ?? Date.now;
  // Map iteration order doubles as recency order: oldest first.
  const entries = new Map<string, CacheEntry<V>>();
  let hits = 0;
  let misses = 0;
  let evictions = 0;

  function isExpired(entry: CacheEntry<V>): boolean {
    return now() - entry.insertedAt >= options.ttl_ms;
  }

  return {
    get(key: string): V | undefined {
      const entry = entries.get(key);
      if (!entry) {
        misses++;
        return undefined;
      }

      if (isExpired(entry)) {
        entries.delete(key);
        evictions++;
        misses++;
        return undefined;
      }

      entries.delete(key);
      entries.set(key, entry);
      hits++;
      return entry.value;
    },

    set(key: string, value: V): void {
      entries.delete(key);
      entries.set(key, { value, insertedAt: now() });

      while (entries.size > options.max_entries) {
        const oldest = entries.keys().next();
        if (oldest.done) break;
        entries.delete(oldest.value);
        evictions++;
      }
    },

    delete(key: string): boolean {
      return entries.delete(key);
    },

    clear(): void {
      entries.clear();
    },

    size(): number {
      return entries.size;
    },

    stats(): CacheStats {
      return { hits, misses, evictions, size: entries.size };
    },
  };
}
