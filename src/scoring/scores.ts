/**
 * Repository Scoring Engine
 *
 * Converts sparse, skewed repository metadata into bounded 0-100 signals and
 * blends them into a single total.
 *
 * - Activity: step function over days since the last push
 * - Popularity: log-scaled stars and forks, so heavy-tailed counts do not
 *   saturate the scale while small counts still move it
 * - Health: baseline with a flat archive penalty and a capped issue penalty
 * - Hard score: weighted blend of the three
 * - Total: hard score alone, or blended with the external quality signal
 *
 * All functions are pure and never throw on malformed input.
 */

import type { EnrichedRepository } from "../github/types";
import type { ScoreBreakdown, ScoringInput } from "./types";

// ============================================================================
// Weights and thresholds
// ============================================================================

/** Activity score steps: pushes within `maxDays` earn `score` */
export const ACTIVITY_STEPS: ReadonlyArray<{ maxDays: number; score: number }> = [
  { maxDays: 7, score: 100 },
  { maxDays: 30, score: 85 },
  { maxDays: 90, score: 70 },
  { maxDays: 365, score: 45 },
];

/** Activity score for pushes older than every step */
export const STALE_ACTIVITY_SCORE = 20;

export const POPULARITY_WEIGHTS = {
  stars: 18,
  forks: 14,
} as const;

export const HEALTH_RULES = {
  baseline: 85,
  archivedPenalty: 25,
  perIssuePenalty: 1.5,
  maxIssuePenalty: 25,
} as const;

export const HARD_SCORE_WEIGHTS = {
  activity: 0.45,
  popularity: 0.35,
  health: 0.2,
} as const;

export const TOTAL_SCORE_WEIGHTS = {
  hard: 0.35,
  quality: 0.65,
} as const;

// ============================================================================
// Coercion helpers
// ============================================================================

/**
 * Clamp a number into [lo, hi]; NaN collapses to `lo`
 */
export function clamp(value: number, lo: number = 0, hi: number = 100): number {
  if (Number.isNaN(value) || value < lo) {
    return lo;
  }
  if (value > hi) {
    return hi;
  }
  return value;
}

/**
 * Best-effort non-negative integer. Accepts finite numbers and numeric
 * strings (fractions truncate toward zero); anything else becomes 0.
 */
export function toNonNegativeInt(value: unknown): number {
  let parsed: number;
  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && value.trim() !== "") {
    parsed = Number(value.trim());
  } else {
    return 0;
  }
  if (!Number.isFinite(parsed)) {
    return 0;
  }
  return Math.max(0, Math.trunc(parsed));
}

/**
 * Interpret a loosely typed flag; only `true`, `"true"` and `1` count
 */
export function toFlag(value: unknown): boolean {
  return value === true || value === 1 || value === "true";
}

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, decimals: number = 1): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

// ============================================================================
// Sub-scores
// ============================================================================

/**
 * Activity score (0-100). Unknown push age scores 0, the same as "never pushed".
 */
export function activityScore(daysSincePush: number | null): number {
  if (daysSincePush === null || Number.isNaN(daysSincePush)) {
    return 0;
  }
  for (const step of ACTIVITY_STEPS) {
    if (daysSincePush <= step.maxDays) {
      return step.score;
    }
  }
  return STALE_ACTIVITY_SCORE;
}

/**
 * Popularity score (0-100) from log-scaled star and fork counts
 */
export function popularityScore(stars: unknown, forks: unknown): number {
  const s = toNonNegativeInt(stars);
  const f = toNonNegativeInt(forks);
  const raw = Math.log1p(s) * POPULARITY_WEIGHTS.stars + Math.log1p(f) * POPULARITY_WEIGHTS.forks;
  return clamp(raw);
}

/**
 * Health score (0-100). Archival is a flat penalty, open issues a capped linear one.
 */
export function healthScore(openIssues: unknown, archived: unknown): number {
  const issues = toNonNegativeInt(openIssues);
  let score: number = HEALTH_RULES.baseline;
  if (toFlag(archived)) {
    score -= HEALTH_RULES.archivedPenalty;
  }
  if (issues > 0) {
    score -= Math.min(HEALTH_RULES.maxIssuePenalty, issues * HEALTH_RULES.perIssuePenalty);
  }
  return clamp(score);
}

/**
 * Weighted blend of the metadata sub-scores. Bounded inputs keep it in range.
 */
export function hardScore(activity: number, popularity: number, health: number): number {
  return (
    HARD_SCORE_WEIGHTS.activity * activity +
    HARD_SCORE_WEIGHTS.popularity * popularity +
    HARD_SCORE_WEIGHTS.health * health
  );
}

/**
 * Final score. Without a quality signal the hard score stands alone.
 */
export function totalScore(hard: number, quality: number | null): number {
  if (quality === null) {
    return hard;
  }
  return TOTAL_SCORE_WEIGHTS.hard * hard + TOTAL_SCORE_WEIGHTS.quality * clamp(quality);
}

// ============================================================================
// Breakdown
// ============================================================================

/**
 * Pull the coerced scoring inputs out of an enriched record
 */
export function toScoringInput(repo: EnrichedRepository): ScoringInput {
  return {
    daysSincePush: repo.daysSincePush,
    stars: toNonNegativeInt(repo.stargazers_count),
    forks: toNonNegativeInt(repo.forks_count),
    openIssues: toNonNegativeInt(repo.open_issues_count),
    archived: toFlag(repo.archived),
  };
}

/**
 * Compute the full breakdown from coerced inputs
 *
 * @param quality - external skill score, or null/undefined when unavailable
 */
export function computeScoreBreakdown(input: ScoringInput, quality?: number | null): ScoreBreakdown {
  const activity = activityScore(input.daysSincePush);
  const popularity = popularityScore(input.stars, input.forks);
  const health = healthScore(input.openIssues, input.archived);
  const hard = hardScore(activity, popularity, health);

  const q = quality === undefined || quality === null || Number.isNaN(quality) ? null : clamp(quality);
  const total = totalScore(hard, q);

  return {
    activity: roundTo(activity),
    popularity: roundTo(popularity),
    health: roundTo(health),
    hard: roundTo(hard),
    quality: q === null ? null : roundTo(q),
    total: roundTo(total),
  };
}

/**
 * Score one enriched repository
 */
export function scoreRepository(repo: EnrichedRepository, quality?: number | null): ScoreBreakdown {
  return computeScoreBreakdown(toScoringInput(repo), quality);
}
