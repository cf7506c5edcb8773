/**
 * Scoring Pipeline Service
 *
 * Runs one scoring batch for a user:
 * - enrich every repository record against a single reference instant
 * - assess repositories that come with a sample (cache-guarded)
 * - score each repository, with or without a quality figure
 * - aggregate averages and the confidence metric
 * - hand flattened rows to an optional sink
 *
 * A failed assessment never aborts the batch; the repository is scored
 * without quality and the failure is listed on the result.
 */

import { EventEmitter } from "events";
import { enrichRepositories } from "../github/enrichment";
import type { EnrichedRepository, RepositoryRecord, RepositorySample } from "../github/types";
import { averageScores, confidenceScore } from "../scoring/aggregate";
import { scoreRepository } from "../scoring/scores";
import type { ScoreAverages, ScoreBreakdown } from "../scoring/types";
import type { QualityAssessor } from "../quality/assessor";
import type { AssessmentError, QualityAssessment } from "../quality/types";
import { serviceLoggers, type Logger } from "../utils/logger";

// ============================================================================
// Types
// ============================================================================

export interface ScoredRepository {
  /** `owner/name`, falling back to the bare name */
  repo: string;
  url: string;
  language: string | null;
  enriched: EnrichedRepository;
  breakdown: ScoreBreakdown;
  /** Absent when no sample was supplied or the assessment failed */
  assessment?: QualityAssessment;
}

export interface AssessmentFailure {
  repo: string;
  error: AssessmentError;
}

export interface BatchResult {
  username: string;
  /** Input order */
  repositories: ScoredRepository[];
  averages: ScoreAverages;
  confidence: number;
  failures: AssessmentFailure[];
}

/**
 * One row handed to the persistence sink
 */
export interface ScoreRow extends ScoreBreakdown {
  repo: string;
  url: string;
  language: string | null;
  strengths: string;
  weaknesses: string;
  suggestedImprovements: string;
  notes: string;
}

/**
 * Downstream storage for computed scores
 */
export interface ScoreSink {
  saveRun(username: string, rows: ScoreRow[]): Promise<void>;
}

export interface ScoringRunInput {
  username: string;
  repositories: readonly RepositoryRecord[];
  /** Samples keyed by repository full name */
  samples?: Readonly<Record<string, RepositorySample>>;
  /** Reference instant for enrichment (default: now) */
  now?: Date;
  signal?: AbortSignal;
}

export interface ScoringPipelineConfig {
  /** Assessor for repositories with samples; omit to score without quality */
  assessor?: QualityAssessor;
  sink?: ScoreSink;
  /** Assessments in flight at once (default: 1) */
  concurrency?: number;
  logger?: Logger;
}

export interface RepositoryScoredEvent {
  type: "repository:scored";
  index: number;
  repository: ScoredRepository;
}

export interface AssessmentFailedEvent {
  type: "assessment:failed";
  repo: string;
  error: AssessmentError;
}

export interface RunCompletedEvent {
  type: "run:completed";
  result: BatchResult;
  durationMs: number;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Display identity of a record
 */
export function repositoryIdentity(record: RepositoryRecord): { repo: string; url: string; language: string | null } {
  const repo = record.full_name ?? record.name ?? "";
  return {
    repo,
    url: record.html_url ?? "",
    language: typeof record.language === "string" && record.language !== "" ? record.language : null,
  };
}

/**
 * Flatten a scored repository for the sink
 */
export function toScoreRow(scored: ScoredRepository): ScoreRow {
  const assessment = scored.assessment;
  return {
    repo: scored.repo,
    url: scored.url,
    language: scored.language,
    ...scored.breakdown,
    strengths: assessment ? assessment.strengths.join("\n") : "",
    weaknesses: assessment ? assessment.weaknesses.join("\n") : "",
    suggestedImprovements: assessment ? assessment.suggestedImprovements.join("\n") : "",
    notes: assessment ? assessment.notes : "",
  };
}

/**
 * Run `worker` over `items` with at most `limit` calls in flight
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      results[index] = await worker(item, index);
    }
  };

  const lanes = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}

// ============================================================================
// Service
// ============================================================================

export class ScoringPipeline extends EventEmitter {
  private readonly assessor: QualityAssessor | null;
  private readonly sink: ScoreSink | null;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(config: ScoringPipelineConfig = {}) {
    super();
    this.assessor = config.assessor ?? null;
    this.sink = config.sink ?? null;
    this.concurrency = config.concurrency ?? 1;
    this.logger = config.logger ?? serviceLoggers.pipeline;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new Error(`concurrency must be a positive integer, got: ${this.concurrency}`);
    }
  }

  /**
   * Score one batch of repositories
   */
  async run(input: ScoringRunInput): Promise<BatchResult> {
    const startTime = Date.now();
    const { username, samples = {}, signal } = input;
    const enriched = enrichRepositories(input.repositories, input.now ?? new Date());
    const failures: AssessmentFailure[] = [];

    this.logger.info("Scoring run started", { username, repositories: enriched.length });

    const repositories = await mapWithConcurrency(enriched, this.concurrency, async (repo, index) => {
      const identity = repositoryIdentity(repo);
      const sample = Object.hasOwn(samples, identity.repo) ? samples[identity.repo] : undefined;
      const assessment = await this.assess(identity.repo, sample, signal, failures);
      const scored: ScoredRepository = {
        ...identity,
        enriched: repo,
        breakdown: scoreRepository(repo, assessment?.skillScore ?? null),
        ...(assessment ? { assessment } : {}),
      };

      const event: RepositoryScoredEvent = { type: "repository:scored", index, repository: scored };
      this.emit("repository:scored", event);
      return scored;
    });

    const breakdowns = repositories.map((scored) => scored.breakdown);
    const result: BatchResult = {
      username,
      repositories,
      averages: averageScores(breakdowns),
      confidence: confidenceScore(breakdowns),
      failures,
    };

    if (this.sink) {
      const rows = repositories.map(toScoreRow);
      try {
        await this.sink.saveRun(username, rows);
      } catch (error) {
        this.logger.error("Failed to persist scoring run", {
          username,
          rows: rows.length,
          error: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }
    }

    const durationMs = Date.now() - startTime;
    this.logger.info("Scoring run completed", {
      username,
      repositories: repositories.length,
      failures: failures.length,
      confidence: result.confidence,
      durationMs,
    });

    const completed: RunCompletedEvent = { type: "run:completed", result, durationMs };
    this.emit("run:completed", completed);
    return result;
  }

  private async assess(
    repo: string,
    sample: RepositorySample | undefined,
    signal: AbortSignal | undefined,
    failures: AssessmentFailure[]
  ): Promise<QualityAssessment | undefined> {
    if (!this.assessor || sample === undefined) {
      return undefined;
    }

    const outcome = await this.assessor.assessRepository(repo, sample, { signal });
    if (outcome.ok) {
      return outcome.value;
    }

    failures.push({ repo, error: outcome.error });
    this.logger.warn("Scoring without quality", { repo, reason: outcome.error.kind });
    const event: AssessmentFailedEvent = { type: "assessment:failed", repo, error: outcome.error };
    this.emit("assessment:failed", event);
    return undefined;
  }
}

/**
 * Create a new scoring pipeline
 */
export function createScoringPipeline(config: ScoringPipelineConfig = {}): ScoringPipeline {
  return new ScoringPipeline(config);
}
