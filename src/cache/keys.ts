/**
 * Content-addressed cache keys
 *
 * A key is the SHA-256 digest of a canonical serialization of the semantic
 * input. Object fields are emitted in sorted order at every depth, so two
 * equivalent inputs hash identically regardless of insertion order.
 */

import { createHash } from "crypto";
import type { SampleFile } from "../github/types";

/** Characters of README/file content that participate in a quality key */
export const KEY_CONTENT_CHARS = 1500;

type Canonical = null | boolean | number | string | Canonical[] | { [key: string]: Canonical };

function toCanonical(value: unknown): Canonical {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "boolean" || typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map((item) => toCanonical(item));
  }
  if (typeof value === "object") {
    const sorted: { [key: string]: Canonical } = {};
    for (const key of Object.keys(value).sort()) {
      const field: unknown = Reflect.get(value, key);
      if (field === undefined || typeof field === "function") {
        continue;
      }
      sorted[key] = toCanonical(field);
    }
    return sorted;
  }
  return null;
}

/**
 * Deterministic JSON text for any value
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(toCanonical(value));
}

/**
 * Fixed-length, filesystem-safe digest of `text`
 */
export function hashKey(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

/**
 * Inputs that identify one quality assessment
 */
export interface QualityKeyInput {
  repoFullName: string;
  model: string;
  readme: string;
  files: readonly SampleFile[];
}

/**
 * Cache key for a quality assessment.
 *
 * README and file contents are cut to their first KEY_CONTENT_CHARS characters
 * before hashing, so inputs that differ only past that point share a key.
 */
export function qualityCacheKey(input: QualityKeyInput): string {
  return hashKey(
    canonicalize({
      repo: input.repoFullName,
      model: input.model,
      readme: input.readme.slice(0, KEY_CONTENT_CHARS),
      files: input.files.map((file) => ({
        path: file.path,
        content: file.content.slice(0, KEY_CONTENT_CHARS),
      })),
    })
  );
}

/**
 * Cache key for a raw external API payload
 */
export function requestCacheKey(method: string, url: string, params?: Record<string, unknown>): string {
  return hashKey(`${method.toUpperCase()}|${url}|${canonicalize(params ?? {})}`);
}

/**
 * Cache key for a portfolio-level assessment
 */
export function portfolioCacheKey(username: string, model: string, projection: unknown): string {
  return hashKey(canonicalize({ username, model, projection }));
}
