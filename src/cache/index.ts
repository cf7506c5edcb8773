/**
 * Cache module
 *
 * Content-addressed, TTL-bounded key/payload stores and key derivation.
 */

export {
  KEY_CONTENT_CHARS,
  canonicalize,
  hashKey,
  qualityCacheKey,
  requestCacheKey,
  portfolioCacheKey,
} from "./keys";
export type { QualityKeyInput } from "./keys";

export {
  CacheTTL,
  CacheNamespace,
  CacheStatsTracker,
  MemoryCacheStore,
  systemClock,
  isFresh,
  readCached,
  cached,
} from "./store";
export type { CacheStore, CacheStoreConfig, CacheLookup, CacheStats, Clock } from "./store";

export { FileCacheStore, toPathSegment } from "./file-store";
export type { FileCacheStoreConfig } from "./file-store";
