/**
 * Prompt templates for quality and portfolio assessment
 */

import type { RepositorySample } from "../github/types";
import type { CompletionRequest, PortfolioEntry } from "./types";

/** Scored repositories included in a portfolio prompt */
export const PORTFOLIO_MAX_REPOS = 12;

/** Bullets carried per repository into the portfolio projection */
export const PORTFOLIO_BULLETS_PER_REPO = 2;

export const QUALITY_SYSTEM_PROMPT = "You return only valid JSON. No markdown. No commentary.";
export const PORTFOLIO_SYSTEM_PROMPT = "Return only JSON. Do not include markdown.";

/**
 * Build the single-repository quality request
 */
export function buildQualityRequest(repoFullName: string, sample: RepositorySample): CompletionRequest {
  const prompt = [
    "You are a senior software engineer evaluating a GitHub repo for recruiter-facing insight.",
    "Only use the README + file samples below. Do not invent details.",
    "Return ONLY valid JSON (no markdown, no extra text).",
    "The JSON MUST have exactly these keys:",
    "- repo_summary (string, <= 220 chars)",
    "- strengths (array of 3 strings)",
    "- weaknesses (array of 3 strings)",
    "- suggested_improvements (array of 3 strings)",
    "- skill_score (integer 0-100)",
    "- notes (string, <= 220 chars)",
    "",
    `Repo: ${repoFullName}`,
    "",
    "README:",
    sample.readme,
    "",
    "FILES (sample):",
    JSON.stringify(sample.files, null, 2),
  ].join("\n");

  return {
    system: QUALITY_SYSTEM_PROMPT,
    prompt,
    temperature: 0.2,
    maxTokens: 900,
  };
}

/**
 * Compact projection of scored repositories for the portfolio prompt
 */
export function projectPortfolio(entries: readonly PortfolioEntry[]): Array<Record<string, unknown>> {
  return entries.slice(0, PORTFOLIO_MAX_REPOS).map((entry) => ({
    repo: entry.repo,
    language: entry.language,
    total_score: entry.totalScore,
    strengths: entry.strengths.slice(0, PORTFOLIO_BULLETS_PER_REPO),
    weaknesses: entry.weaknesses.slice(0, PORTFOLIO_BULLETS_PER_REPO),
  }));
}

/**
 * Build the portfolio-level request
 */
export function buildPortfolioRequest(
  username: string,
  projection: ReadonlyArray<Record<string, unknown>>
): CompletionRequest {
  const prompt = [
    "You are writing a recruiter-facing portfolio summary based on GitHub repo evaluation results.",
    "Return ONLY valid JSON with exactly these keys:",
    "- recruiter_summary (string, 3-5 sentences, <= 600 chars)",
    "- headline (string, <= 90 chars)",
    "- top_strengths (array of 3 strings)",
    "- top_risks (array of 3 strings)",
    "",
    `GitHub username: ${username}`,
    "",
    "Scored repo signals:",
    JSON.stringify(projection, null, 2),
  ].join("\n");

  return {
    system: PORTFOLIO_SYSTEM_PROMPT,
    prompt,
    temperature: 0.2,
    maxTokens: 600,
  };
}
