/**
 * Quality Assessor
 *
 * Wraps a non-deterministic external evaluator behind a strict output
 * contract. Each call:
 * - trims the repository sample to the prompt budget
 * - returns a cached assessment when one is fresh
 * - fails fast with a configuration error when no credential is set
 * - retries with exponential backoff, repairing fenced or wrapped JSON
 * - coerces the parsed object into a complete assessment
 *
 * Failures come back as `{ ok: false, error }` with the last error and a
 * preview of the raw output. They are never cached and never defaulted.
 */

import { EventEmitter } from "events";
import type { z } from "zod";
import type { RepositorySample } from "../github/types";
import { portfolioCacheKey, qualityCacheKey } from "../cache/keys";
import { CacheNamespace, CacheTTL, readCached, type CacheStore } from "../cache/store";
import { serviceLoggers, type Logger } from "../utils/logger";
import { ChatCompletionsClient } from "./client";
import { parseModelJson } from "./parse";
import { buildPortfolioRequest, buildQualityRequest, projectPortfolio } from "./prompts";
import { createRetryPolicy, executeWithRetry, type RetryPolicy } from "./retry";
import { prepareRepositorySample, type SampleLimits } from "./sample";
import {
  AssessmentErrorKind,
  type AssessmentError,
  type AssessmentResult,
  type CompletionProvider,
  type CompletionRequest,
  type PortfolioAssessment,
  type PortfolioEntry,
  type QualityAssessment,
} from "./types";
import {
  normalizePortfolioAssessment,
  normalizeQualityAssessment,
  portfolioAssessmentSchema,
  qualityAssessmentSchema,
} from "./validate";

// ============================================================================
// Configuration
// ============================================================================

export interface QualityAssessorConfig {
  /** Provider credential; calls fail with a configuration error without it */
  apiKey?: string;
  /** Model name, also part of every cache key */
  model: string;
  /** Base URL of the OpenAI-compatible endpoint */
  baseUrl?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Provider override; defaults to a ChatCompletionsClient */
  provider?: CompletionProvider;
  /** Assessment cache; omit to disable caching */
  cache?: CacheStore;
  /** Freshness window for cached assessments */
  cacheTtlMs?: number;
  retry?: Partial<RetryPolicy>;
  sampleLimits?: Partial<SampleLimits>;
  logger?: Logger;
}

export interface AssessOptions {
  signal?: AbortSignal;
  /** Skip the cache read (the result is still written back) */
  bypassCache?: boolean;
}

/** Characters of raw output kept in failure previews */
export const RAW_PREVIEW_CHARS = 300;

/**
 * Events emitted by the assessor
 */
export interface QualityAssessorEvents {
  "cache:hit": { operation: string; key: string };
  "attempt:failed": { operation: string; attempt: number; error: string; willRetry: boolean; delayMs?: number };
  "assessment:completed": { operation: string; attempts: number };
  "assessment:failed": { operation: string; error: AssessmentError };
}

/**
 * Thrown inside an attempt when the response breaks the output contract
 */
export class ResponseContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseContractError";
  }
}

/**
 * Bounded preview of raw provider output
 */
export function previewRaw(raw: string, limit: number = RAW_PREVIEW_CHARS): string {
  if (raw === "") {
    return "";
  }
  return `${raw.slice(0, limit)}...`;
}

// ============================================================================
// Assessor
// ============================================================================

export class QualityAssessor extends EventEmitter {
  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly provider: CompletionProvider | null;
  private readonly cache: CacheStore | null;
  private readonly cacheTtlMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sampleLimits: Partial<SampleLimits>;
  private readonly logger: Logger;

  constructor(config: QualityAssessorConfig) {
    super();
    const apiKey = config.apiKey?.trim();
    this.apiKey = apiKey ? apiKey : undefined;
    this.model = config.model;
    this.cache = config.cache ?? null;
    this.cacheTtlMs = config.cacheTtlMs ?? CacheTTL.QUALITY;
    this.retryPolicy = createRetryPolicy(config.retry);
    this.sampleLimits = config.sampleLimits ?? {};
    this.logger = config.logger ?? serviceLoggers.quality;

    if (config.provider) {
      this.provider = config.provider;
    } else if (this.apiKey) {
      this.provider = new ChatCompletionsClient({
        apiKey: this.apiKey,
        model: this.model,
        baseUrl: config.baseUrl,
        timeout: config.timeoutMs,
      });
    } else {
      this.provider = null;
    }
  }

  private notify<K extends keyof QualityAssessorEvents>(event: K, payload: QualityAssessorEvents[K]): void {
    this.emit(event, payload);
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Whether a credential is configured
   */
  isConfigured(): boolean {
    return this.apiKey !== undefined && this.provider !== null;
  }

  /**
   * Assess one repository from its README and file samples
   */
  async assessRepository(
    repoFullName: string,
    sample: RepositorySample,
    options: AssessOptions = {}
  ): Promise<AssessmentResult<QualityAssessment>> {
    const operation = `assess ${repoFullName}`;
    const key = qualityCacheKey({
      repoFullName,
      model: this.model,
      readme: sample.readme,
      files: sample.files,
    });

    const cachedValue = this.readFromCache(CacheNamespace.QUALITY, key, options, qualityAssessmentSchema);
    if (cachedValue !== undefined) {
      this.notify("cache:hit", { operation, key });
      this.logger.debug("Quality assessment served from cache", { repo: repoFullName });
      return { ok: true, value: cachedValue, fromCache: true };
    }

    const prepared = prepareRepositorySample(sample, this.sampleLimits);
    const request = buildQualityRequest(repoFullName, prepared);
    const result = await this.runProtocol(operation, request, normalizeQualityAssessment, options.signal);

    if (result.ok) {
      this.cache?.set(CacheNamespace.QUALITY, key, result.value);
    }
    return result;
  }

  /**
   * Assess a whole portfolio from already-scored repositories
   */
  async assessPortfolio(
    username: string,
    entries: readonly PortfolioEntry[],
    options: AssessOptions = {}
  ): Promise<AssessmentResult<PortfolioAssessment>> {
    const operation = `portfolio ${username}`;
    const projection = projectPortfolio(entries);
    const key = portfolioCacheKey(username, this.model, projection);

    const cachedValue = this.readFromCache(CacheNamespace.PORTFOLIO, key, options, portfolioAssessmentSchema);
    if (cachedValue !== undefined) {
      this.notify("cache:hit", { operation, key });
      return { ok: true, value: cachedValue, fromCache: true };
    }

    const request = buildPortfolioRequest(username, projection);
    const result = await this.runProtocol(operation, request, normalizePortfolioAssessment, options.signal);

    if (result.ok) {
      this.cache?.set(CacheNamespace.PORTFOLIO, key, result.value);
    }
    return result;
  }

  private readFromCache<T>(
    namespace: string,
    key: string,
    options: AssessOptions,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): T | undefined {
    if (!this.cache || options.bypassCache) {
      return undefined;
    }
    return readCached(this.cache, namespace, key, this.cacheTtlMs, schema);
  }

  /**
   * Send `request` under the retry policy until a response parses
   */
  private async runProtocol<T>(
    operation: string,
    request: CompletionRequest,
    normalize: (data: Record<string, unknown>, rawOutput: string) => T,
    signal?: AbortSignal
  ): Promise<AssessmentResult<T>> {
    const provider = this.provider;
    if (!this.apiKey || provider === null) {
      const error: AssessmentError = {
        kind: AssessmentErrorKind.CONFIGURATION,
        message: "Missing API key for the quality provider. Set QUALITY_API_KEY and restart.",
        attempts: 0,
      };
      this.logger.error("Quality provider is not configured", { operation });
      this.notify("assessment:failed", { operation, error });
      return { ok: false, error };
    }

    let lastRaw = "";

    const result = await executeWithRetry(
      async () => {
        const raw = await provider.complete(request, signal);
        lastRaw = raw;
        const outcome = parseModelJson(raw);
        if (outcome.kind === "empty") {
          throw new ResponseContractError("Empty response");
        }
        if (outcome.kind === "malformed") {
          throw new ResponseContractError(outcome.reason);
        }
        return normalize(outcome.value, raw);
      },
      this.retryPolicy,
      {
        signal,
        onAttemptFailed: ({ attempt, error, willRetry, delayMs }) => {
          this.logger.warn(`${operation} failed: ${error.message}`, {
            attempt,
            maxAttempts: this.retryPolicy.maxAttempts,
            willRetry,
            retryDelay: delayMs,
          });
          this.notify("attempt:failed", { operation, attempt, error: error.message, willRetry, delayMs });
        },
      }
    );

    if (result.success) {
      this.notify("assessment:completed", { operation, attempts: result.attempts });
      return { ok: true, value: result.data, fromCache: false };
    }

    const rawPreview = previewRaw(lastRaw);
    const kind = result.cancelled ? AssessmentErrorKind.CANCELLED : AssessmentErrorKind.EXHAUSTED;
    const message =
      kind === AssessmentErrorKind.CANCELLED
        ? `Quality assessment cancelled after ${result.attempts} attempt(s).`
        : `Quality assessment failed after ${result.attempts} attempt(s). Last error: ${result.error.message}. Preview: ${rawPreview}`;

    const error: AssessmentError = {
      kind,
      message,
      attempts: result.attempts,
      lastError: result.error.message,
      ...(rawPreview !== "" ? { rawPreview } : {}),
    };

    this.logger.error(message, { operation, attempts: result.attempts });
    this.notify("assessment:failed", { operation, error });
    return { ok: false, error };
  }
}

/**
 * Create a new quality assessor
 */
export function createQualityAssessor(config: QualityAssessorConfig): QualityAssessor {
  return new QualityAssessor(config);
}
