/**
 * GitHub repository records: temporal enrichment and analytics
 */

export {
  MS_PER_DAY,
  ACTIVITY_WINDOWS,
  parseGithubTimestamp,
  daysSince,
  computeTemporalFeatures,
  enrichRepository,
  enrichRepositories,
} from "./enrichment";

export {
  UNKNOWN_PUSH_SENTINEL,
  computeSummary,
  topByStars,
  topByForks,
  topByRecentPush,
  topLanguages,
  searchRepositories,
} from "./analytics";
export type { PortfolioSummary, LanguageCount } from "./analytics";

export type {
  RepositoryLicense,
  RepositoryRecord,
  TemporalFeatures,
  EnrichedRepository,
  SampleFile,
  RepositorySample,
} from "./types";
