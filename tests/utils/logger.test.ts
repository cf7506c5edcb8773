/**
 * Logger Utility Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  logger,
  createLogger,
  createServiceLogger,
  serviceLoggers,
  silentLogger,
  getLogLevelFromEnv,
  LOG_LEVELS,
  type LogLevel,
} from "../../src/utils/logger";

function spyOnConsole() {
  return {
    debug: vi.spyOn(console, "debug").mockImplementation(() => {}),
    info: vi.spyOn(console, "info").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

function lastLine(calls: unknown[][]): Record<string, unknown> {
  const line = calls[calls.length - 1]?.[0];
  const parsed: unknown = JSON.parse(String(line));
  return typeof parsed === "object" && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
}

describe("Logger Utility", () => {
  let consoleSpy: ReturnType<typeof spyOnConsole>;

  beforeEach(() => {
    consoleSpy = spyOnConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe("LOG_LEVELS", () => {
    it("should have increasing values for severity", () => {
      const levels: LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];
      expect(levels.map((level) => LOG_LEVELS[level])).toEqual([10, 20, 30, 40, 50, 60]);
    });
  });

  describe("level filtering", () => {
    it("should not log below the configured level", () => {
      const log = createLogger({ level: "warn", prettyPrint: false });
      log.debug("hidden");
      log.info("hidden");
      expect(consoleSpy.debug).not.toHaveBeenCalled();
      expect(consoleSpy.info).not.toHaveBeenCalled();
    });

    it("should route each level to its console method", () => {
      const log = createLogger({ level: "trace", prettyPrint: false });
      log.trace("t");
      log.debug("d");
      log.info("i");
      log.warn("w");
      log.error("e");
      log.fatal("f");
      expect(consoleSpy.debug).toHaveBeenCalledTimes(2);
      expect(consoleSpy.info).toHaveBeenCalledTimes(1);
      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
      expect(consoleSpy.error).toHaveBeenCalledTimes(2);
    });

    it("should keep the silent logger quiet at every level", () => {
      silentLogger.error("suppressed");
      silentLogger.fatal("suppressed");
      silentLogger.child({ service: "Cache" }).fatal("suppressed");
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });

    it("should write nothing when disabled", () => {
      const log = createLogger({ level: "trace", prettyPrint: false, enabled: false });
      log.info("hidden");
      log.fatal("hidden");
      expect(consoleSpy.info).not.toHaveBeenCalled();
      expect(consoleSpy.error).not.toHaveBeenCalled();
    });
  });

  describe("JSON output", () => {
    it("should include context with either argument order", () => {
      const log = createLogger({ level: "info", prettyPrint: false });

      log.info("Run started", { username: "octo" });
      expect(lastLine(consoleSpy.info.mock.calls)).toMatchObject({ msg: "Run started", username: "octo", level: "info" });

      log.info({ attempt: 2 }, "Retrying");
      expect(lastLine(consoleSpy.info.mock.calls)).toMatchObject({ msg: "Retrying", attempt: 2, levelNum: 30 });
    });

    it("should stamp an ISO timestamp", () => {
      const log = createLogger({ level: "info", prettyPrint: false });
      log.info("stamped");
      expect(String(lastLine(consoleSpy.info.mock.calls).time)).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });
  });

  describe("child loggers", () => {
    it("should carry bindings and the service name", () => {
      const parent = createLogger({ level: "info", prettyPrint: false, base: { runId: "run-1" } });
      const child = parent.child({ service: "QualityAssessor", repo: "octo/demo" });

      child.warn("attempt failed");
      expect(lastLine(consoleSpy.warn.mock.calls)).toMatchObject({
        service: "QualityAssessor",
        runId: "run-1",
        repo: "octo/demo",
        msg: "attempt failed",
      });
    });

    it("should name service loggers", () => {
      const log = createServiceLogger("Cache");
      expect(log.level).toBe(logger.level);
    });

    it("should provide lazily created service loggers", () => {
      expect(serviceLoggers.cache).toBe(serviceLoggers.cache);
      expect(serviceLoggers.quality).toBe(serviceLoggers.quality);
      expect(serviceLoggers.pipeline).not.toBe(serviceLoggers.quality);
    });
  });

  describe("pretty output", () => {
    it("should print the service name and context", () => {
      const log = createLogger({ level: "info", prettyPrint: true, name: "ScoringPipeline" });
      log.info("Scoring run completed", { repositories: 3 });

      const line = String(consoleSpy.info.mock.calls[0]?.[0]);
      expect(line).toContain("[ScoringPipeline]");
      expect(line).toContain("Scoring run completed");
      expect(line).toContain('{"repositories":3}');
    });
  });

  describe("getLogLevelFromEnv", () => {
    it("should prefer LOG_LEVEL", () => {
      vi.stubEnv("LOG_LEVEL", "WARN");
      expect(getLogLevelFromEnv()).toBe("warn");
    });

    it("should default to error under test", () => {
      vi.stubEnv("LOG_LEVEL", "");
      vi.stubEnv("NODE_ENV", "test");
      expect(getLogLevelFromEnv()).toBe("error");
    });

    it("should default to info in production", () => {
      vi.stubEnv("LOG_LEVEL", "");
      vi.stubEnv("NODE_ENV", "production");
      expect(getLogLevelFromEnv()).toBe("info");
    });
  });
});
