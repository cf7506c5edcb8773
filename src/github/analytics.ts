/**
 * Portfolio-level analytics over raw repository records
 */

import { enrichRepositories } from "./enrichment";
import type { EnrichedRepository, RepositoryRecord } from "./types";
import { toFlag, toNonNegativeInt } from "../scoring/scores";

/** Sort key given to repositories whose push age is unknown */
export const UNKNOWN_PUSH_SENTINEL = 1_000_000_000;

export interface PortfolioSummary {
  repoCount: number;
  totalStars: number;
  avgStars: number;
  minStars: number;
  maxStars: number;
  active30d: number;
  active90d: number;
  active365d: number;
  /** Repositories not pushed within a year, including unknown push dates */
  stale365dPlus: number;
  archivedCount: number;
  licensedCount: number;
  reposWithIssues: number;
  totalOpenIssues: number;
}

export interface LanguageCount {
  language: string;
  count: number;
}

const EMPTY_SUMMARY: PortfolioSummary = {
  repoCount: 0,
  totalStars: 0,
  avgStars: 0,
  minStars: 0,
  maxStars: 0,
  active30d: 0,
  active90d: 0,
  active365d: 0,
  stale365dPlus: 0,
  archivedCount: 0,
  licensedCount: 0,
  reposWithIssues: 0,
  totalOpenIssues: 0,
};

// Any license object counts, named or not
function hasLicense(repo: RepositoryRecord): boolean {
  return repo.license !== null && repo.license !== undefined;
}

/**
 * Summarise a user's repositories
 */
export function computeSummary(records: readonly RepositoryRecord[], now: Date = new Date()): PortfolioSummary {
  if (records.length === 0) {
    return { ...EMPTY_SUMMARY };
  }

  const repos = enrichRepositories(records, now);
  const stars = repos.map((repo) => toNonNegativeInt(repo.stargazers_count));
  const issues = repos.map((repo) => toNonNegativeInt(repo.open_issues_count));
  const totalStars = stars.reduce((sum, n) => sum + n, 0);
  const count = (predicate: (repo: EnrichedRepository) => boolean): number => repos.filter(predicate).length;

  return {
    repoCount: repos.length,
    totalStars,
    avgStars: totalStars / repos.length,
    minStars: Math.min(...stars),
    maxStars: Math.max(...stars),
    active30d: count((repo) => repo.isActive30),
    active90d: count((repo) => repo.isActive90),
    active365d: count((repo) => repo.isActive365),
    stale365dPlus: count((repo) => !repo.isActive365),
    archivedCount: count((repo) => toFlag(repo.archived)),
    licensedCount: count(hasLicense),
    reposWithIssues: issues.filter((n) => n > 0).length,
    totalOpenIssues: issues.reduce((sum, n) => sum + n, 0),
  };
}

function topBy<T extends RepositoryRecord>(
  records: readonly T[],
  limit: number,
  compare: (a: T, b: T) => number
): T[] {
  // Array.prototype.sort is stable, so ties keep input order
  return [...records].sort(compare).slice(0, Math.max(0, limit));
}

/**
 * Most-starred repositories first
 */
export function topByStars<T extends RepositoryRecord>(records: readonly T[], limit: number = 10): T[] {
  return topBy(
    records,
    limit,
    (a, b) => toNonNegativeInt(b.stargazers_count) - toNonNegativeInt(a.stargazers_count)
  );
}

/**
 * Most-forked repositories first
 */
export function topByForks<T extends RepositoryRecord>(records: readonly T[], limit: number = 10): T[] {
  return topBy(records, limit, (a, b) => toNonNegativeInt(b.forks_count) - toNonNegativeInt(a.forks_count));
}

/**
 * Most recently pushed first; unknown push dates last
 */
export function topByRecentPush(
  records: readonly EnrichedRepository[],
  limit: number = 10
): EnrichedRepository[] {
  const age = (repo: EnrichedRepository): number => repo.daysSincePush ?? UNKNOWN_PUSH_SENTINEL;
  return topBy(records, limit, (a, b) => age(a) - age(b));
}

/**
 * Language frequency, most common first (ties by first appearance)
 */
export function topLanguages(records: readonly RepositoryRecord[], limit: number = 10): LanguageCount[] {
  const counts = new Map<string, number>();
  for (const repo of records) {
    const language = repo.language;
    if (typeof language !== "string" || language === "") {
      continue;
    }
    counts.set(language, (counts.get(language) ?? 0) + 1);
  }

  return [...counts.entries()]
    .map(([language, count]) => ({ language, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, Math.max(0, limit));
}

/**
 * Case-insensitive substring match on the repository name.
 * A blank keyword returns every record.
 */
export function searchRepositories<T extends RepositoryRecord>(records: readonly T[], keyword: string): T[] {
  const needle = keyword.trim().toLowerCase();
  if (needle === "") {
    return [...records];
  }
  return records.filter((repo) => (repo.name ?? "").toLowerCase().includes(needle));
}
