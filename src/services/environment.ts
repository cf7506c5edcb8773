/**
 * Builds services from the environment configuration
 *
 * Services never read `process.env` themselves; these factories translate
 * the typed `env` object into explicit configs.
 */

import { env, type Env } from "../../config/env";
import { FileCacheStore } from "../cache/file-store";
import type { CacheStore } from "../cache/store";
import { QualityAssessor, type QualityAssessorConfig } from "../quality/assessor";
import { ScoringPipeline, type ScoringPipelineConfig } from "./scoring-pipeline";

const MS_PER_MINUTE = 60 * 1000;

export type QualityEnv = Pick<
  Env,
  "QUALITY_API_KEY" | "QUALITY_API_URL" | "QUALITY_MODEL" | "QUALITY_TIMEOUT_MS" | "CACHE_QUALITY_TTL_MINUTES"
>;

/**
 * Assessor configuration from environment values
 */
export function qualityConfigFromEnv(source: QualityEnv = env, cache?: CacheStore): QualityAssessorConfig {
  return {
    apiKey: source.QUALITY_API_KEY,
    model: source.QUALITY_MODEL,
    baseUrl: source.QUALITY_API_URL,
    timeoutMs: source.QUALITY_TIMEOUT_MS,
    cacheTtlMs: source.CACHE_QUALITY_TTL_MINUTES * MS_PER_MINUTE,
    ...(cache ? { cache } : {}),
  };
}

/**
 * File-backed cache rooted at CACHE_DIR
 */
export function createCacheStoreFromEnv(source: Pick<Env, "CACHE_DIR"> = env): FileCacheStore {
  return new FileCacheStore({ rootDir: source.CACHE_DIR });
}

/**
 * Pipeline wired with a file cache and an environment-configured assessor
 */
export function createScoringPipelineFromEnv(
  overrides: Omit<ScoringPipelineConfig, "assessor"> = {}
): ScoringPipeline {
  const cache = createCacheStoreFromEnv();
  const assessor = new QualityAssessor(qualityConfigFromEnv(env, cache));
  return new ScoringPipeline({ ...overrides, assessor });
}

/** API response freshness window from CACHE_API_TTL_MINUTES */
export function apiCacheTtlMs(source: Pick<Env, "CACHE_API_TTL_MINUTES"> = env): number {
  return source.CACHE_API_TTL_MINUTES * MS_PER_MINUTE;
}
