/**
 * Repository record contracts supplied by the GitHub fetch layer.
 *
 * Records arrive as decoded JSON straight from the REST API, so every field is
 * optional and may carry an unexpected type. Readers coerce instead of trusting.
 */

export interface RepositoryLicense {
  name?: string | null;
  [key: string]: unknown;
}

/**
 * One repository as returned by `GET /users/{user}/repos`
 */
export interface RepositoryRecord {
  id?: number;
  name?: string;
  full_name?: string;
  html_url?: string;
  language?: string | null;
  stargazers_count?: unknown;
  forks_count?: unknown;
  open_issues_count?: unknown;
  size?: unknown;
  archived?: unknown;
  license?: RepositoryLicense | null;
  created_at?: string | null;
  updated_at?: string | null;
  pushed_at?: string | null;
  [key: string]: unknown;
}

/**
 * Derived temporal features attached to a record
 */
export interface TemporalFeatures {
  /** Parsed `pushed_at`, or null when missing/unparsable */
  pushedInstant: Date | null;
  /** Whole days since the last push; null means unknown */
  daysSincePush: number | null;
  isActive30: boolean;
  isActive90: boolean;
  isActive365: boolean;
}

export type EnrichedRepository = RepositoryRecord & TemporalFeatures;

/**
 * A single file excerpt sent to the quality provider
 */
export interface SampleFile {
  path: string;
  content: string;
}

/**
 * README text plus file excerpts for one repository
 */
export interface RepositorySample {
  readme: string;
  files: SampleFile[];
}
