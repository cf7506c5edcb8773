/**
 * File-backed cache store
 *
 * Layout: `<rootDir>/<namespace>/<key>.json`, one JSON document per entry:
 *
 *   { "key": "<key>", "writtenAt": 1718000000000, "payload": <any JSON> }
 *
 * Each write goes to a temporary file that is renamed over the target, so a
 * reader sees either the old entry or the new one. Concurrent writers need no
 * lock: keys are content-derived, so the same key always carries the same
 * payload and the last rename wins.
 */

import fs from "fs";
import path from "path";
import { randomBytes } from "crypto";
import { z } from "zod";
import { hashKey } from "./keys";
import {
  CacheStatsTracker,
  isFresh,
  systemClock,
  type CacheLookup,
  type CacheStats,
  type CacheStore,
  type CacheStoreConfig,
  type Clock,
} from "./store";
import { serviceLoggers, type Logger } from "../utils/logger";

const SAFE_SEGMENT = /^[A-Za-z0-9_-]{1,128}$/;

const fileEntrySchema = z.object({
  key: z.string(),
  writtenAt: z.number().finite(),
  payload: z.unknown(),
});

export interface FileCacheStoreConfig extends CacheStoreConfig {
  /** Directory that holds one sub-directory per namespace */
  rootDir: string;
}

/**
 * Map an arbitrary namespace or key onto a safe path segment
 */
export function toPathSegment(value: string): string {
  return SAFE_SEGMENT.test(value) ? value : hashKey(value);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class FileCacheStore implements CacheStore {
  private readonly rootDir: string;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly stats = new CacheStatsTracker();

  constructor(config: FileCacheStoreConfig) {
    this.rootDir = config.rootDir;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? serviceLoggers.cache;
  }

  /**
   * Absolute-or-relative path of the file backing an entry
   */
  entryPath(namespace: string, key: string): string {
    return path.join(this.rootDir, toPathSegment(namespace), `${toPathSegment(key)}.json`);
  }

  get(namespace: string, key: string, ttlMs: number): CacheLookup {
    const filePath = this.entryPath(namespace, key);

    let text: string;
    try {
      text = fs.readFileSync(filePath, "utf8");
    } catch {
      this.stats.misses++;
      return { hit: false };
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (error) {
      return this.corrupt(namespace, filePath, describeError(error));
    }

    const parsed = fileEntrySchema.safeParse(decoded);
    if (!parsed.success || parsed.data.key !== key) {
      return this.corrupt(namespace, filePath, "unexpected entry shape");
    }

    if (!isFresh(parsed.data.writtenAt, this.clock(), ttlMs)) {
      this.stats.misses++;
      this.stats.expirations++;
      return { hit: false };
    }

    this.stats.hits++;
    return { hit: true, payload: parsed.data.payload, writtenAt: parsed.data.writtenAt };
  }

  set(namespace: string, key: string, payload: unknown): void {
    const filePath = this.entryPath(namespace, key);
    const tempPath = `${filePath}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`;

    try {
      const body = JSON.stringify({ key, writtenAt: this.clock(), payload }, null, 2);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(tempPath, body, "utf8");
      fs.renameSync(tempPath, filePath);
      this.stats.writes++;
    } catch (error) {
      this.stats.writeFailures++;
      this.logger.debug("Cache write failed", { namespace, path: filePath, error: describeError(error) });
      try {
        fs.rmSync(tempPath, { force: true });
      } catch (cleanupError) {
        this.logger.debug("Could not remove temporary cache file", {
          path: tempPath,
          error: describeError(cleanupError),
        });
      }
    }
  }

  clear(namespace?: string): number {
    const dirs =
      namespace !== undefined ? [path.join(this.rootDir, toPathSegment(namespace))] : this.namespaceDirs();

    let removed = 0;
    for (const dir of dirs) {
      let names: string[];
      try {
        names = fs.readdirSync(dir);
      } catch {
        continue;
      }
      for (const name of names) {
        if (!name.endsWith(".json")) {
          continue;
        }
        try {
          fs.rmSync(path.join(dir, name), { force: true });
          removed++;
        } catch (error) {
          this.logger.warn("Could not remove cache entry", { path: path.join(dir, name), error: describeError(error) });
        }
      }
    }

    this.logger.info("Cache cleared", { namespace: namespace ?? "(all)", entriesRemoved: removed });
    return removed;
  }

  getStats(): CacheStats {
    return this.stats.snapshot();
  }

  private namespaceDirs(): string[] {
    try {
      return fs
        .readdirSync(this.rootDir, { withFileTypes: true })
        .filter((entry) => entry.isDirectory())
        .map((entry) => path.join(this.rootDir, entry.name));
    } catch {
      return [];
    }
  }

  private corrupt(namespace: string, filePath: string, reason: string): CacheLookup {
    this.stats.misses++;
    this.stats.corruptions++;
    this.logger.debug("Ignoring unreadable cache entry", { namespace, path: filePath, reason });
    return { hit: false };
  }
}
