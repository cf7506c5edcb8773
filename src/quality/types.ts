/**
 * Quality assessment types
 */

/**
 * Validated result of a repository quality assessment
 */
export interface QualityAssessment {
  /** What the repository does (at most 220 characters) */
  repoSummary: string;
  /** Exactly three entries */
  strengths: string[];
  /** Exactly three entries */
  weaknesses: string[];
  /** Exactly three entries */
  suggestedImprovements: string[];
  /** Integer in [0, 100], or null when the provider gave nothing usable */
  skillScore: number | null;
  /** Caveat about the evidence (at most 220 characters) */
  notes: string;
  /** Unparsed provider response, kept for diagnostics */
  rawOutput: string;
}

/**
 * Validated result of a portfolio-level assessment
 */
export interface PortfolioAssessment {
  /** At most 90 characters */
  headline: string;
  /** Three to five sentences, at most 600 characters */
  recruiterSummary: string;
  /** Exactly three entries */
  topStrengths: string[];
  /** Exactly three entries */
  topRisks: string[];
  rawOutput: string;
}

/**
 * Failure categories surfaced to callers
 */
export enum AssessmentErrorKind {
  /** Credentials missing; nothing was sent */
  CONFIGURATION = "CONFIGURATION",
  /** Every attempt failed on transport or on the response contract */
  EXHAUSTED = "EXHAUSTED",
  /** The caller aborted before an attempt succeeded */
  CANCELLED = "CANCELLED",
}

export interface AssessmentError {
  kind: AssessmentErrorKind;
  /** Human-readable description */
  message: string;
  /** Attempts actually made */
  attempts: number;
  /** Message of the last attempt's error, if any */
  lastError?: string;
  /** Bounded preview of the last raw provider output */
  rawPreview?: string;
}

export type AssessmentResult<T> =
  | { ok: true; value: T; fromCache: boolean }
  | { ok: false; error: AssessmentError };

/**
 * Chat request sent to the provider
 */
export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Anything that can turn a chat request into response text
 */
export interface CompletionProvider {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * Compact view of a scored repository used for portfolio assessment
 */
export interface PortfolioEntry {
  repo: string;
  language: string | null;
  totalScore: number;
  strengths: string[];
  weaknesses: string[];
}
