/**
 * Tests for the provider output contract
 */

import { describe, it, expect } from "vitest";
import {
  FALLBACK_BULLETS,
  coerceSkillScore,
  stringifyValue,
  toBulletList,
  normalizeQualityAssessment,
  normalizePortfolioAssessment,
  qualityAssessmentSchema,
} from "../../src/quality/validate";

describe("coerceSkillScore", () => {
  it.each<[unknown, number | null]>([
    [72, 72],
    [87.9, 87],
    ["64", 64],
    [" 12 ", 12],
    [140, 100],
    [-5, 0],
    ["12.5", null],
    ["high", null],
    [true, null],
    [Number.NaN, null],
    [null, null],
    [undefined, null],
  ])("should coerce %s to %s", (value, expected) => {
    expect(coerceSkillScore(value)).toBe(expected);
  });
});

describe("stringifyValue", () => {
  it("should render any JSON value as text", () => {
    expect(stringifyValue("text")).toBe("text");
    expect(stringifyValue(3)).toBe("3");
    expect(stringifyValue(null)).toBe("");
    expect(stringifyValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe("toBulletList", () => {
  it("should keep the first three entries", () => {
    expect(toBulletList(["1", "2", "3", "4"], "fallback")).toEqual(["1", "2", "3"]);
  });

  it("should pad short lists with the fallback", () => {
    expect(toBulletList(["only"], "fallback")).toEqual(["only", "fallback", "fallback"]);
  });
});

describe("normalizeQualityAssessment", () => {
  it("should coerce every field into shape", () => {
    const assessment = normalizeQualityAssessment(
      {
        repo_summary: "x".repeat(300),
        strengths: ["Clear module layout"],
        weaknesses: "not a list",
        suggested_improvements: ["a", "b", "c", "d"],
        skill_score: "87",
        notes: null,
      },
      "raw text"
    );

    expect(assessment).toEqual({
      repoSummary: "x".repeat(220),
      strengths: ["Clear module layout", FALLBACK_BULLETS.strengths, FALLBACK_BULLETS.strengths],
      weaknesses: [FALLBACK_BULLETS.weaknesses, FALLBACK_BULLETS.weaknesses, FALLBACK_BULLETS.weaknesses],
      suggestedImprovements: ["a", "b", "c"],
      skillScore: 87,
      notes: "",
      rawOutput: "raw text",
    });
  });

  it("should leave the skill score absent when it is missing", () => {
    const assessment = normalizeQualityAssessment({ repo_summary: "Demo" }, "{}");
    expect(assessment.skillScore).toBeNull();
    expect(assessment.strengths).toHaveLength(3);
    expect(assessment.weaknesses).toHaveLength(3);
    expect(assessment.suggestedImprovements).toHaveLength(3);
  });

  it("should stringify non-string bullets", () => {
    const assessment = normalizeQualityAssessment({ strengths: [1, { area: "tests" }, null] }, "");
    expect(assessment.strengths).toEqual(["1", '{"area":"tests"}', ""]);
  });

  it("should produce values that pass the cache schema", () => {
    const assessment = normalizeQualityAssessment({ skill_score: 50 }, "raw");
    expect(qualityAssessmentSchema.safeParse(assessment).success).toBe(true);
  });
});

describe("normalizePortfolioAssessment", () => {
  it("should bound text and fill bullet lists", () => {
    const assessment = normalizePortfolioAssessment(
      {
        headline: "h".repeat(120),
        recruiter_summary: "s".repeat(700),
        top_strengths: ["Ships tested code", "Writes docs"],
      },
      "raw"
    );

    expect(assessment).toEqual({
      headline: "h".repeat(90),
      recruiterSummary: "s".repeat(600),
      topStrengths: ["Ships tested code", "Writes docs", FALLBACK_BULLETS.topStrengths],
      topRisks: [FALLBACK_BULLETS.topRisks, FALLBACK_BULLETS.topRisks, FALLBACK_BULLETS.topRisks],
      rawOutput: "raw",
    });
  });
});
