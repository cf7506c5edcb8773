/**
 * Tests for the per-repository scoring engine
 */

import { describe, it, expect } from "vitest";
import {
  activityScore,
  popularityScore,
  healthScore,
  hardScore,
  totalScore,
  clamp,
  toNonNegativeInt,
  toFlag,
  roundTo,
  computeScoreBreakdown,
  scoreRepository,
} from "../../src/scoring/scores";
import { enrichRepository } from "../../src/github/enrichment";
import type { ScoringInput } from "../../src/scoring/types";

const baseInput: ScoringInput = {
  daysSincePush: 0,
  stars: 0,
  forks: 0,
  openIssues: 0,
  archived: false,
};

describe("Scoring Engine", () => {
  describe("activityScore", () => {
    it.each([
      [0, 100],
      [7, 100],
      [8, 85],
      [30, 85],
      [31, 70],
      [90, 70],
      [91, 45],
      [365, 45],
      [366, 20],
      [5000, 20],
    ])("should score %i days as %i", (days, expected) => {
      expect(activityScore(days)).toBe(expected);
    });

    it("should score an unknown push age as 0", () => {
      expect(activityScore(null)).toBe(0);
    });
  });

  describe("popularityScore", () => {
    it("should be 0 with no stars or forks", () => {
      expect(popularityScore(0, 0)).toBe(0);
    });

    it("should log-scale stars", () => {
      expect(popularityScore(1, 0)).toBeCloseTo(Math.log(2) * 18, 10);
    });

    it("should never decrease as stars or forks grow", () => {
      let previous = -1;
      for (const stars of [0, 1, 5, 20, 100, 1000]) {
        const score = popularityScore(stars, 3);
        expect(score).toBeGreaterThanOrEqual(previous);
        previous = score;
      }
      previous = -1;
      for (const forks of [0, 1, 5, 20, 100, 1000]) {
        const score = popularityScore(3, forks);
        expect(score).toBeGreaterThanOrEqual(previous);
        previous = score;
      }
    });

    it("should cap at 100", () => {
      expect(popularityScore(1_000_000, 1_000_000)).toBe(100);
    });

    it("should treat malformed counters as 0", () => {
      expect(popularityScore("lots", null)).toBe(0);
      expect(popularityScore(-5, undefined)).toBe(0);
    });
  });

  describe("healthScore", () => {
    it("should be 85 for a live repository with no issues", () => {
      expect(healthScore(0, false)).toBe(85);
    });

    it("should apply both penalties to an archived repository with many issues", () => {
      expect(healthScore(100, true)).toBe(35);
    });

    it("should charge 1.5 per open issue", () => {
      expect(healthScore(10, false)).toBe(70);
    });

    it("should cap the issue penalty at 25", () => {
      expect(healthScore(20, false)).toBe(60);
    });

    it("should accept string flags and counts", () => {
      expect(healthScore("2", "true")).toBe(57);
    });
  });

  describe("hardScore and totalScore", () => {
    it("should weight activity, popularity and health", () => {
      expect(hardScore(100, 0, 85)).toBeCloseTo(62, 10);
    });

    it("should return the hard score unchanged without quality", () => {
      expect(totalScore(62, null)).toBe(62);
    });

    it("should blend hard and quality scores", () => {
      expect(totalScore(62, 80)).toBeCloseTo(73.7, 10);
    });
  });

  describe("helpers", () => {
    it("should clamp into range and collapse NaN", () => {
      expect(clamp(-3)).toBe(0);
      expect(clamp(150)).toBe(100);
      expect(clamp(Number.NaN)).toBe(0);
      expect(clamp(42.5)).toBe(42.5);
    });

    it("should coerce counters", () => {
      expect(toNonNegativeInt(12)).toBe(12);
      expect(toNonNegativeInt(3.9)).toBe(3);
      expect(toNonNegativeInt(" 7 ")).toBe(7);
      expect(toNonNegativeInt("abc")).toBe(0);
      expect(toNonNegativeInt(true)).toBe(0);
      expect(toNonNegativeInt(Number.POSITIVE_INFINITY)).toBe(0);
    });

    it("should only accept explicit true flags", () => {
      expect(toFlag(true)).toBe(true);
      expect(toFlag(1)).toBe(true);
      expect(toFlag("true")).toBe(true);
      expect(toFlag("false")).toBe(false);
      expect(toFlag(null)).toBe(false);
    });

    it("should round to one decimal by default", () => {
      expect(roundTo(12.476649250079015)).toBe(12.5);
      expect(roundTo(1.234, 2)).toBe(1.23);
    });
  });

  describe("computeScoreBreakdown", () => {
    it("should round every figure to one decimal", () => {
      const breakdown = computeScoreBreakdown({ ...baseInput, stars: 1 });
      expect(breakdown).toEqual({
        activity: 100,
        popularity: 12.5,
        health: 85,
        hard: 66.4,
        quality: null,
        total: 66.4,
      });
    });

    it("should keep absent quality distinct from zero", () => {
      const absent = computeScoreBreakdown(baseInput, null);
      const zero = computeScoreBreakdown(baseInput, 0);
      expect(absent.quality).toBeNull();
      expect(absent.total).toBe(absent.hard);
      expect(zero.quality).toBe(0);
      expect(zero.total).toBe(21.7);
    });

    it("should clamp an out-of-range quality score", () => {
      const breakdown = computeScoreBreakdown(baseInput, 140);
      expect(breakdown.quality).toBe(100);
      expect(breakdown.total).toBe(86.7);
    });

    it("should keep every figure within [0, 100]", () => {
      const inputs: ScoringInput[] = [
        baseInput,
        { daysSincePush: null, stars: 0, forks: 0, openIssues: 500, archived: true },
        { daysSincePush: 3, stars: 10_000_000, forks: 10_000_000, openIssues: 0, archived: false },
      ];
      for (const input of inputs) {
        for (const quality of [null, 0, 55, 100]) {
          const breakdown = computeScoreBreakdown(input, quality);
          for (const value of Object.values(breakdown)) {
            if (value === null) continue;
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(100);
          }
        }
      }
    });

    it("should be deterministic for identical input", () => {
      const input: ScoringInput = { daysSincePush: 40, stars: 12, forks: 3, openIssues: 4, archived: false };
      expect(computeScoreBreakdown(input, 71)).toEqual(computeScoreBreakdown(input, 71));
    });
  });

  describe("scoreRepository", () => {
    it("should score an enriched raw record", () => {
      const now = new Date("2024-06-10T00:00:00Z");
      const repo = enrichRepository(
        {
          full_name: "octo/demo",
          pushed_at: "2024-06-05T00:00:00Z",
          stargazers_count: "1",
          forks_count: null,
          open_issues_count: 0,
          archived: false,
        },
        now
      );
      expect(scoreRepository(repo)).toEqual({
        activity: 100,
        popularity: 12.5,
        health: 85,
        hard: 66.4,
        quality: null,
        total: 66.4,
      });
    });

    it("should score a record with no push date as inactive", () => {
      const repo = enrichRepository({ name: "ghost" }, new Date("2024-06-10T00:00:00Z"));
      const breakdown = scoreRepository(repo, 50);
      expect(breakdown.activity).toBe(0);
      expect(breakdown.hard).toBe(17);
      expect(breakdown.total).toBe(38.5);
    });
  });
});
