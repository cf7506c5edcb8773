/**
 * Temporal enrichment for repository records.
 *
 * Derives push age and activity windows from the raw `pushed_at` timestamp.
 * Records are copied, never mutated, and a bad timestamp degrades to
 * "unknown" rather than throwing.
 */

import type { EnrichedRepository, RepositoryRecord, TemporalFeatures } from "./types";

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Activity window thresholds in days */
export const ACTIVITY_WINDOWS = {
  RECENT: 30,
  QUARTER: 90,
  YEAR: 365,
} as const;

const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}):(\d{2}))$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Whether the captured fields name a real calendar instant (no 30 February)
 */
function isValidCalendarMatch(match: RegExpExecArray): boolean {
  const [year, month, day, hour, minute, second] = match.slice(1, 7).map(Number);
  const offsetHour = Number(match[7] ?? 0);
  const offsetMinute = Number(match[8] ?? 0);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return false;
  }
  return (
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month) &&
    hour <= 23 &&
    minute <= 59 &&
    second <= 59 &&
    offsetHour <= 23 &&
    offsetMinute <= 59
  );
}

/**
 * Parse a GitHub timestamp such as `2024-01-01T12:34:56Z`
 *
 * @returns the instant, or null for missing or malformed input
 */
export function parseGithubTimestamp(value: unknown): Date | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  const match = ISO_TIMESTAMP.exec(trimmed);
  if (match === null || !isValidCalendarMatch(match)) {
    return null;
  }
  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) {
    return null;
  }
  return new Date(ms);
}

/**
 * Whole days elapsed between `instant` and `now` (floor division)
 */
export function daysSince(instant: Date | null, now: Date = new Date()): number | null {
  if (instant === null) {
    return null;
  }
  return Math.floor((now.getTime() - instant.getTime()) / MS_PER_DAY);
}

/**
 * Compute the temporal features for a single push timestamp
 */
export function computeTemporalFeatures(pushedAt: unknown, now: Date = new Date()): TemporalFeatures {
  const pushedInstant = parseGithubTimestamp(pushedAt);
  const days = daysSince(pushedInstant, now);

  return {
    pushedInstant,
    daysSincePush: days,
    isActive30: days !== null && days <= ACTIVITY_WINDOWS.RECENT,
    isActive90: days !== null && days <= ACTIVITY_WINDOWS.QUARTER,
    isActive365: days !== null && days <= ACTIVITY_WINDOWS.YEAR,
  };
}

/**
 * Return a copy of `record` with temporal features attached
 */
export function enrichRepository(record: RepositoryRecord, now: Date = new Date()): EnrichedRepository {
  return {
    ...record,
    ...computeTemporalFeatures(record.pushed_at, now),
  };
}

/**
 * Enrich a batch against a single reference instant
 */
export function enrichRepositories(
  records: readonly RepositoryRecord[],
  now: Date = new Date()
): EnrichedRepository[] {
  return records.map((record) => enrichRepository(record, now));
}
