/**
 * Tests for content-addressed cache keys
 */

import { describe, it, expect } from "vitest";
import {
  KEY_CONTENT_CHARS,
  canonicalize,
  hashKey,
  qualityCacheKey,
  requestCacheKey,
  portfolioCacheKey,
} from "../../src/cache/keys";

describe("Cache keys", () => {
  describe("canonicalize", () => {
    it("should sort object keys at every depth", () => {
      expect(canonicalize({ b: 1, a: { d: 2, c: [3, { f: "x", e: true }] } })).toBe(
        '{"a":{"c":[3,{"e":true,"f":"x"}],"d":2},"b":1}'
      );
    });

    it("should drop undefined fields and null out non-finite numbers", () => {
      expect(canonicalize({ keep: null, skip: undefined, bad: Number.NaN })).toBe('{"bad":null,"keep":null}');
    });

    it("should serialise dates as ISO strings", () => {
      expect(canonicalize({ at: new Date("2024-01-01T00:00:00Z") })).toBe('{"at":"2024-01-01T00:00:00.000Z"}');
    });
  });

  describe("hashKey", () => {
    it("should return the SHA-256 hex digest", () => {
      expect(hashKey("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad");
    });
  });

  describe("qualityCacheKey", () => {
    const input = {
      repoFullName: "octo/demo",
      model: "test-model",
      readme: "# Demo",
      files: [{ path: "index.ts", content: "export {};" }],
    };

    it("should ignore field insertion order", () => {
      const reordered = {
        files: [{ content: "export {};", path: "index.ts" }],
        readme: "# Demo",
        model: "test-model",
        repoFullName: "octo/demo",
      };
      expect(qualityCacheKey(reordered)).toBe(qualityCacheKey(input));
    });

    it("should collide for content that differs only past the truncation boundary", () => {
      const base = "x".repeat(KEY_CONTENT_CHARS);
      const a = qualityCacheKey({ ...input, readme: `${base}tail-one` });
      const b = qualityCacheKey({ ...input, readme: `${base}tail-two` });
      expect(a).toBe(b);

      const fileA = qualityCacheKey({ ...input, files: [{ path: "a.ts", content: `${base}1` }] });
      const fileB = qualityCacheKey({ ...input, files: [{ path: "a.ts", content: `${base}2` }] });
      expect(fileA).toBe(fileB);
    });

    it("should differ for content inside the boundary", () => {
      expect(qualityCacheKey({ ...input, readme: "# Other" })).not.toBe(qualityCacheKey(input));
    });

    it("should differ by model", () => {
      expect(qualityCacheKey({ ...input, model: "other-model" })).not.toBe(qualityCacheKey(input));
    });

    it("should be a 64-character hex digest", () => {
      expect(qualityCacheKey(input)).toMatch(/^[0-9a-f]{64}$/);
    });
  });

  describe("requestCacheKey", () => {
    it("should normalise method case and parameter order", () => {
      expect(requestCacheKey("get", "https://api.example.test/users/octo/repos", { page: 1, per_page: 100 })).toBe(
        requestCacheKey("GET", "https://api.example.test/users/octo/repos", { per_page: 100, page: 1 })
      );
    });

    it("should treat missing params like empty params", () => {
      expect(requestCacheKey("GET", "https://api.example.test/x")).toBe(
        hashKey('GET|https://api.example.test/x|{}')
      );
    });
  });

  describe("portfolioCacheKey", () => {
    it("should depend on username, model and projection", () => {
      const projection = [{ repo: "octo/demo", total_score: 50 }];
      const key = portfolioCacheKey("octo", "test-model", projection);
      expect(portfolioCacheKey("octo", "test-model", [{ total_score: 50, repo: "octo/demo" }])).toBe(key);
      expect(portfolioCacheKey("other", "test-model", projection)).not.toBe(key);
      expect(portfolioCacheKey("octo", "test-model", [{ repo: "octo/demo", total_score: 51 }])).not.toBe(key);
    });
  });
});
