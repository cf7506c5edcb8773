/**
 * repo-signal
 * Repository scoring, assessment caching and aggregation
 */

export const APP_NAME = "repo-signal";
export const VERSION = "0.1.0";

export * from "./github";
export * from "./scoring";
export * from "./cache";
export * from "./quality";

export {
  ScoringPipeline,
  createScoringPipeline,
  toScoreRow,
  repositoryIdentity,
  mapWithConcurrency,
} from "./services/scoring-pipeline";
export type {
  ScoredRepository,
  AssessmentFailure,
  BatchResult,
  ScoreRow,
  ScoreSink,
  ScoringRunInput,
  ScoringPipelineConfig,
  RepositoryScoredEvent,
  AssessmentFailedEvent,
  RunCompletedEvent,
} from "./services/scoring-pipeline";

export {
  qualityConfigFromEnv,
  createCacheStoreFromEnv,
  createScoringPipelineFromEnv,
  apiCacheTtlMs,
} from "./services/environment";
export type { QualityEnv } from "./services/environment";

export { logger, createLogger, createServiceLogger, silentLogger } from "./utils/logger";
export type { Logger, LogLevel, LogContext } from "./utils/logger";
