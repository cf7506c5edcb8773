/**
 * Output contract for provider responses.
 *
 * The schemas here never reject a parsed object: each field is coerced into
 * shape (truncated text, exactly three bullets, clamped score) so downstream
 * scoring always sees a complete assessment.
 */

import { z } from "zod";
import type { PortfolioAssessment, QualityAssessment } from "./types";

export const BULLET_COUNT = 3;

export const TEXT_LIMITS = {
  repoSummary: 220,
  notes: 220,
  headline: 90,
  recruiterSummary: 600,
} as const;

/** Back-fill sentences for short bullet lists */
export const FALLBACK_BULLETS = {
  strengths: "Not enough evidence in sample to make a confident strength.",
  weaknesses: "Not enough evidence in sample to make a confident weakness.",
  suggestedImprovements: "Not enough evidence in sample to suggest a confident improvement.",
  topStrengths: "Not enough evidence to identify a clear strength.",
  topRisks: "Not enough evidence to identify a clear risk.",
} as const;

/**
 * Render any JSON value as text
 */
export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Integer score in [0, 100], or null when the value is not an integer-like
 * number or numeric string
 */
export function coerceSkillScore(value: unknown): number | null {
  let n: number;
  if (typeof value === "number" && Number.isFinite(value)) {
    n = Math.trunc(value);
  } else if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    n = parseInt(value, 10);
  } else {
    return null;
  }
  return Math.min(100, Math.max(0, n));
}

/**
 * Keep at most BULLET_COUNT entries, then pad with `fallback`
 */
export function toBulletList(items: readonly unknown[], fallback: string): string[] {
  const bullets = items.slice(0, BULLET_COUNT).map(stringifyValue);
  while (bullets.length < BULLET_COUNT) {
    bullets.push(fallback);
  }
  return bullets;
}

const boundedText = (limit: number) => z.unknown().transform((value) => stringifyValue(value).slice(0, limit));

const bulletList = (fallback: string) =>
  z
    .array(z.unknown())
    .catch([])
    .transform((items) => toBulletList(items, fallback));

export const qualityResponseSchema = z.object({
  repo_summary: boundedText(TEXT_LIMITS.repoSummary),
  strengths: bulletList(FALLBACK_BULLETS.strengths),
  weaknesses: bulletList(FALLBACK_BULLETS.weaknesses),
  suggested_improvements: bulletList(FALLBACK_BULLETS.suggestedImprovements),
  skill_score: z.unknown().transform(coerceSkillScore),
  notes: boundedText(TEXT_LIMITS.notes),
});

export const portfolioResponseSchema = z.object({
  headline: boundedText(TEXT_LIMITS.headline),
  recruiter_summary: boundedText(TEXT_LIMITS.recruiterSummary),
  top_strengths: bulletList(FALLBACK_BULLETS.topStrengths),
  top_risks: bulletList(FALLBACK_BULLETS.topRisks),
});

/**
 * Coerce a parsed provider object into a QualityAssessment
 */
export function normalizeQualityAssessment(data: Record<string, unknown>, rawOutput: string): QualityAssessment {
  const parsed = qualityResponseSchema.parse(data);
  return {
    repoSummary: parsed.repo_summary,
    strengths: parsed.strengths,
    weaknesses: parsed.weaknesses,
    suggestedImprovements: parsed.suggested_improvements,
    skillScore: parsed.skill_score,
    notes: parsed.notes,
    rawOutput,
  };
}

/**
 * Coerce a parsed provider object into a PortfolioAssessment
 */
export function normalizePortfolioAssessment(data: Record<string, unknown>, rawOutput: string): PortfolioAssessment {
  const parsed = portfolioResponseSchema.parse(data);
  return {
    headline: parsed.headline,
    recruiterSummary: parsed.recruiter_summary,
    topStrengths: parsed.top_strengths,
    topRisks: parsed.top_risks,
    rawOutput,
  };
}

/**
 * Shapes of assessments read back from the cache
 */
export const qualityAssessmentSchema: z.ZodType<QualityAssessment, z.ZodTypeDef, unknown> = z.object({
  repoSummary: z.string(),
  strengths: z.array(z.string()).length(BULLET_COUNT),
  weaknesses: z.array(z.string()).length(BULLET_COUNT),
  suggestedImprovements: z.array(z.string()).length(BULLET_COUNT),
  skillScore: z.number().int().min(0).max(100).nullable(),
  notes: z.string(),
  rawOutput: z.string(),
});

export const portfolioAssessmentSchema: z.ZodType<PortfolioAssessment, z.ZodTypeDef, unknown> = z.object({
  headline: z.string(),
  recruiterSummary: z.string(),
  topStrengths: z.array(z.string()).length(BULLET_COUNT),
  topRisks: z.array(z.string()).length(BULLET_COUNT),
  rawOutput: z.string(),
});
