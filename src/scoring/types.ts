/**
 * Score types shared by the scoring engine, aggregator and pipeline
 */

/**
 * Per-repository score breakdown. Every figure lies in [0, 100] and is
 * rounded to one decimal place.
 */
export interface ScoreBreakdown {
  activity: number;
  popularity: number;
  health: number;
  /** Metadata-only blend of activity, popularity and health */
  hard: number;
  /** External quality signal; null when no assessment was available */
  quality: number | null;
  total: number;
}

export type ScoreField = keyof ScoreBreakdown;

export const SCORE_FIELDS: readonly ScoreField[] = [
  "activity",
  "popularity",
  "health",
  "hard",
  "quality",
  "total",
];

/**
 * Averages per score field; null where no entry carried the field
 */
export type ScoreAverages = Record<ScoreField, number | null>;

/**
 * Coerced metadata inputs to the scoring functions
 */
export interface ScoringInput {
  daysSincePush: number | null;
  stars: number;
  forks: number;
  openIssues: number;
  archived: boolean;
}
