/**
 * Cache store contract and in-memory implementation
 *
 * A store maps (namespace, key) to a JSON payload stamped with its write time.
 * A lookup is a hit only when the entry exists and is no older than the TTL
 * passed by the caller. Age runs from the last write, never from access.
 *
 * Caching is an optimization: reads that fail are misses and writes that fail
 * are logged and dropped.
 */

import type { z } from "zod";
import { serviceLoggers, type Logger } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

/** Clock returning milliseconds since the epoch */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Result of a cache lookup
 */
export type CacheLookup = { hit: true; payload: unknown; writtenAt: number } | { hit: false };

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  /** Misses caused by an entry older than the TTL */
  expirations: number;
  /** Misses caused by an unreadable or malformed entry */
  corruptions: number;
  writes: number;
  writeFailures: number;
  /** Cache hit rate (0-1) */
  hitRate: number;
}

/**
 * Key/payload store with write-time TTL semantics
 */
export interface CacheStore {
  get(namespace: string, key: string, ttlMs: number): CacheLookup;
  set(namespace: string, key: string, payload: unknown): void;
  /** Remove entries in `namespace`, or everything; returns the count removed */
  clear(namespace?: string): number;
  getStats(): CacheStats;
}

/**
 * Options shared by store implementations
 */
export interface CacheStoreConfig {
  /** Time source for write stamps and age checks */
  clock?: Clock;
  logger?: Logger;
}

/**
 * Predefined TTL values in milliseconds
 */
export const CacheTTL = {
  /** 30 minutes - raw GitHub API payloads */
  API: 30 * 60 * 1000,

  /** 7 days - quality assessments */
  QUALITY: 7 * 24 * 60 * 60 * 1000,
} as const;

/**
 * Namespaces used by the subsystem
 */
export const CacheNamespace = {
  API: "api",
  QUALITY: "quality",
  PORTFOLIO: "portfolio",
} as const;

// ============================================================================
// Statistics
// ============================================================================

/**
 * Mutable counters behind `getStats()`
 */
export class CacheStatsTracker {
  hits = 0;
  misses = 0;
  expirations = 0;
  corruptions = 0;
  writes = 0;
  writeFailures = 0;

  snapshot(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      expirations: this.expirations,
      corruptions: this.corruptions,
      writes: this.writes,
      writeFailures: this.writeFailures,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }
}

/**
 * Whether an entry written at `writtenAt` is still fresh at `now`
 */
export function isFresh(writtenAt: number, now: number, ttlMs: number): boolean {
  return now - writtenAt <= ttlMs;
}

// ============================================================================
// Memory store
// ============================================================================

interface MemoryEntry {
  payload: string;
  writtenAt: number;
}

/**
 * In-process store. Payloads are held as JSON text so a read returns a fresh
 * copy, the same round-trip a file store gives.
 */
export class MemoryCacheStore implements CacheStore {
  private readonly entries: Map<string, Map<string, MemoryEntry>> = new Map();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly stats = new CacheStatsTracker();

  constructor(config: CacheStoreConfig = {}) {
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? serviceLoggers.cache;
  }

  get(namespace: string, key: string, ttlMs: number): CacheLookup {
    const entry = this.entries.get(namespace)?.get(key);
    if (!entry) {
      this.stats.misses++;
      return { hit: false };
    }

    if (!isFresh(entry.writtenAt, this.clock(), ttlMs)) {
      this.stats.misses++;
      this.stats.expirations++;
      return { hit: false };
    }

    this.stats.hits++;
    return { hit: true, payload: JSON.parse(entry.payload), writtenAt: entry.writtenAt };
  }

  set(namespace: string, key: string, payload: unknown): void {
    let serialized: string | undefined;
    try {
      serialized = JSON.stringify(payload);
    } catch (error) {
      this.stats.writeFailures++;
      this.logger.debug("Cache write skipped: payload not serializable", {
        namespace,
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }
    if (serialized === undefined) {
      this.stats.writeFailures++;
      return;
    }

    let bucket = this.entries.get(namespace);
    if (!bucket) {
      bucket = new Map();
      this.entries.set(namespace, bucket);
    }
    bucket.set(key, { payload: serialized, writtenAt: this.clock() });
    this.stats.writes++;
  }

  clear(namespace?: string): number {
    if (namespace !== undefined) {
      const removed = this.entries.get(namespace)?.size ?? 0;
      this.entries.delete(namespace);
      return removed;
    }
    let removed = 0;
    for (const bucket of this.entries.values()) {
      removed += bucket.size;
    }
    this.entries.clear();
    return removed;
  }

  getStats(): CacheStats {
    return this.stats.snapshot();
  }
}

// ============================================================================
// Typed helpers
// ============================================================================

/**
 * Read a payload and check its shape. A payload that fails the schema is
 * treated like any other corrupt entry: a miss.
 */
export function readCached<T>(
  store: CacheStore,
  namespace: string,
  key: string,
  ttlMs: number,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T | undefined {
  const lookup = store.get(namespace, key, ttlMs);
  if (!lookup.hit) {
    return undefined;
  }
  const parsed = schema.safeParse(lookup.payload);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Get-or-compute. The computed value is written back before it is returned;
 * a rejected computation propagates and writes nothing.
 *
 * @example
 * ```typescript
 * const repos = await cached(store, CacheNamespace.API, requestCacheKey("GET", url, params),
 *   CacheTTL.API, z.array(z.record(z.unknown())), () => fetchPage(url, params));
 * ```
 */
export async function cached<T>(
  store: CacheStore,
  namespace: string,
  key: string,
  ttlMs: number,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  compute: () => Promise<T>
): Promise<T> {
  const hit = readCached(store, namespace, key, ttlMs, schema);
  if (hit !== undefined) {
    return hit;
  }
  const value = await compute();
  store.set(namespace, key, value);
  return value;
}
