/**
 * Quality module
 *
 * Provider-backed repository and portfolio assessment.
 */

export { QualityAssessor, createQualityAssessor, ResponseContractError, previewRaw, RAW_PREVIEW_CHARS } from "./assessor";
export type { QualityAssessorConfig, AssessOptions, QualityAssessorEvents } from "./assessor";

export { ChatCompletionsClient, ProviderApiException, parseErrorBody } from "./client";
export type { ChatCompletionsClientConfig, ProviderApiError } from "./client";

export { parseModelJson, stripCodeFences, findEmbeddedObject } from "./parse";
export type { ParseOutcome, ParseStrategy } from "./parse";

export {
  BULLET_COUNT,
  TEXT_LIMITS,
  FALLBACK_BULLETS,
  coerceSkillScore,
  normalizeQualityAssessment,
  normalizePortfolioAssessment,
  qualityAssessmentSchema,
  portfolioAssessmentSchema,
} from "./validate";

export { DEFAULT_RETRY_POLICY, createRetryPolicy, executeWithRetry, exponentialBackoff, defaultSleep } from "./retry";
export type { RetryPolicy, RetryResult, RetryOptions, Sleep } from "./retry";

export { DEFAULT_SAMPLE_LIMITS, prepareRepositorySample, looksMinified, isSampleCandidate } from "./sample";
export type { SampleLimits } from "./sample";

export {
  PORTFOLIO_MAX_REPOS,
  PORTFOLIO_BULLETS_PER_REPO,
  buildQualityRequest,
  buildPortfolioRequest,
  projectPortfolio,
} from "./prompts";

export { AssessmentErrorKind } from "./types";
export type {
  QualityAssessment,
  PortfolioAssessment,
  AssessmentError,
  AssessmentResult,
  CompletionRequest,
  CompletionProvider,
  PortfolioEntry,
} from "./types";
