/**
 * Batch aggregation over score breakdowns
 */

import { roundTo } from "./scores";
import { SCORE_FIELDS, type ScoreAverages, type ScoreBreakdown } from "./types";

/** Confidence ceilings by batch size */
export const CONFIDENCE_TIERS: ReadonlyArray<{ maxSize: number; base: number }> = [
  { maxSize: 1, base: 20 },
  { maxSize: 3, base: 50 },
  { maxSize: 5, base: 70 },
];

export const MAX_CONFIDENCE_BASE = 90;

/**
 * Average each field over the entries that carry it.
 *
 * Presence is judged per field, so a missing quality score in one entry does
 * not drop that entry from the activity average.
 */
export function averageScores(breakdowns: readonly ScoreBreakdown[]): ScoreAverages {
  const averages: ScoreAverages = {
    activity: null,
    popularity: null,
    health: null,
    hard: null,
    quality: null,
    total: null,
  };

  for (const field of SCORE_FIELDS) {
    let sum = 0;
    let count = 0;
    for (const breakdown of breakdowns) {
      const value = breakdown[field];
      if (value === null) {
        continue;
      }
      sum += value;
      count++;
    }
    averages[field] = count === 0 ? null : roundTo(sum / count);
  }

  return averages;
}

/**
 * Base confidence for a batch of `size` entries
 */
export function confidenceBase(size: number): number {
  for (const tier of CONFIDENCE_TIERS) {
    if (size <= tier.maxSize) {
      return tier.base;
    }
  }
  return MAX_CONFIDENCE_BASE;
}

/**
 * Confidence (0-100) that the batch averages are meaningful.
 *
 * Capped by what the batch size supports and scaled down by the share of
 * entries that carry a quality signal.
 */
export function confidenceScore(breakdowns: readonly ScoreBreakdown[]): number {
  if (breakdowns.length === 0) {
    return 0;
  }
  const valid = breakdowns.filter((b) => b.quality !== null).length;
  const validFraction = valid / breakdowns.length;
  return Math.floor(confidenceBase(breakdowns.length) * validFraction);
}
