/**
 * Scoring module
 *
 * Exports the per-repository scoring functions and batch aggregation.
 */

export {
  ACTIVITY_STEPS,
  STALE_ACTIVITY_SCORE,
  POPULARITY_WEIGHTS,
  HEALTH_RULES,
  HARD_SCORE_WEIGHTS,
  TOTAL_SCORE_WEIGHTS,
  clamp,
  toNonNegativeInt,
  toFlag,
  roundTo,
  activityScore,
  popularityScore,
  healthScore,
  hardScore,
  totalScore,
  toScoringInput,
  computeScoreBreakdown,
  scoreRepository,
} from "./scores";

export { CONFIDENCE_TIERS, MAX_CONFIDENCE_BASE, averageScores, confidenceBase, confidenceScore } from "./aggregate";

export { SCORE_FIELDS } from "./types";
export type { ScoreBreakdown, ScoreField, ScoreAverages, ScoringInput } from "./types";
