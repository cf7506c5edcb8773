/**
 * Prompt-budget preparation for repository samples
 */

import type { RepositorySample, SampleFile } from "../github/types";

export interface SampleLimits {
  /** Characters of README text kept */
  readmeChars: number;
  /** Characters kept per file */
  fileChars: number;
  /** Files kept per repository */
  maxFiles: number;
  /** Longest line a file may have before it is treated as minified */
  maxLineLength: number;
}

export const DEFAULT_SAMPLE_LIMITS: SampleLimits = {
  readmeChars: 2000,
  fileChars: 2000,
  maxFiles: 4,
  maxLineLength: 500,
};

const SAMPLE_EXTENSIONS = [".py", ".js", ".ts", ".md", ".txt", ".json", ".yml", ".yaml"];
const SAMPLE_FILENAMES = new Set(["requirements.txt", "package.json"]);

/**
 * Whether any line is long enough to suggest minified or generated output
 */
export function looksMinified(text: string, maxLineLength: number = DEFAULT_SAMPLE_LIMITS.maxLineLength): boolean {
  if (text === "") {
    return false;
  }
  return text.split(/\r?\n/).some((line) => line.length > maxLineLength);
}

/**
 * Whether a path is a text/code file worth showing the provider
 */
export function isSampleCandidate(filePath: string): boolean {
  const lower = filePath.toLowerCase();
  return SAMPLE_FILENAMES.has(lower) || SAMPLE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Trim a sample to the prompt budget: truncated README, then up to
 * `maxFiles` candidate files that are not minified, each truncated
 */
export function prepareRepositorySample(
  sample: RepositorySample,
  limits: Partial<SampleLimits> = {}
): RepositorySample {
  const resolved: SampleLimits = { ...DEFAULT_SAMPLE_LIMITS, ...limits };
  const files: SampleFile[] = [];

  for (const file of sample.files) {
    if (files.length >= resolved.maxFiles) {
      break;
    }
    if (looksMinified(file.content, resolved.maxLineLength)) {
      continue;
    }
    if (!isSampleCandidate(file.path)) {
      continue;
    }
    files.push({ path: file.path, content: file.content.slice(0, resolved.fileChars) });
  }

  return {
    readme: sample.readme.slice(0, resolved.readmeChars),
    files,
  };
}
