/**
 * Structured Logging Utility
 *
 * Provides a consistent logging interface throughout the scoring subsystem.
 * Uses a pino-style API so call sites read the same as with pino.
 *
 * Features:
 * - Log levels: trace, debug, info, warn, error, fatal
 * - Structured logging with context/metadata
 * - Child loggers for service-specific logging
 * - Environment-based log level configuration
 * - Pretty printing in development, JSON lines in production
 *
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.info('Run started', { username: 'octocat' });
 *
 *   const log = logger.child({ service: 'QualityAssessor' });
 *   log.warn('Attempt failed', { attempt: 2 });
 */

// ============================================================================
// Types
// ============================================================================

/** Log levels in order of severity */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Numeric log level values (pino-compatible) */
export const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/** Log context/metadata */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Scoring run identifier */
  runId?: string;
  [key: string]: unknown;
}

/** Log entry structure */
export interface LogEntry {
  time: string;
  level: LogLevel;
  levelNum: number;
  msg: string;
  [key: string]: unknown;
}

/** Logger configuration */
export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Service/component name for this logger */
  name?: string;
  prettyPrint: boolean;
  /** Base context for all log entries */
  base: LogContext;
  /** When false nothing is written at any level */
  enabled: boolean;
}

/** Logger interface (pino-compatible) */
export interface Logger {
  level: LogLevel;
  trace(msg: string, context?: LogContext): void;
  trace(context: LogContext, msg: string): void;
  debug(msg: string, context?: LogContext): void;
  debug(context: LogContext, msg: string): void;
  info(msg: string, context?: LogContext): void;
  info(context: LogContext, msg: string): void;
  warn(msg: string, context?: LogContext): void;
  warn(context: LogContext, msg: string): void;
  error(msg: string, context?: LogContext): void;
  error(context: LogContext, msg: string): void;
  fatal(msg: string, context?: LogContext): void;
  fatal(context: LogContext, msg: string): void;
  child(bindings: LogContext): Logger;
}

// ============================================================================
// Configuration
// ============================================================================

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

/**
 * Get log level from environment variable
 */
function getLogLevelFromEnv(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  if (process.env.NODE_ENV === "test") {
    return "error";
  }
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

/**
 * Check if we should pretty print
 */
function shouldPrettyPrint(): boolean {
  if (process.env.LOG_PRETTY === "false") {
    return false;
  }
  return process.env.NODE_ENV !== "production";
}

// ============================================================================
// Color utilities for pretty printing
// ============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.red + COLORS.bold,
};

const RESERVED_KEYS = new Set(["time", "level", "levelNum", "msg", "service"]);

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a structured logger instance
 */
function createLogger(config: Partial<LoggerConfig> = {}): Logger {
  const fullConfig: LoggerConfig = {
    level: config.level ?? getLogLevelFromEnv(),
    name: config.name,
    prettyPrint: config.prettyPrint ?? shouldPrettyPrint(),
    base: config.base ?? {},
    enabled: config.enabled ?? true,
  };

  const currentLevelNum = LOG_LEVELS[fullConfig.level];

  function formatPretty(entry: LogEntry): string {
    const timeParts = entry.time.split("T");
    const time = COLORS.dim + (timeParts[1]?.replace("Z", "") ?? entry.time) + COLORS.reset;
    const level = LEVEL_COLORS[entry.level] + entry.level.toUpperCase().padEnd(5) + COLORS.reset;
    const name =
      typeof entry.service === "string"
        ? COLORS.cyan + `[${entry.service}]` + COLORS.reset + " "
        : "";

    const context: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(entry)) {
      if (!RESERVED_KEYS.has(key)) {
        context[key] = value;
      }
    }

    const contextStr =
      Object.keys(context).length > 0
        ? " " + COLORS.dim + JSON.stringify(context) + COLORS.reset
        : "";

    return `${time} ${level} ${name}${entry.msg}${contextStr}`;
  }

  function output(level: LogLevel, msg: string, context: LogContext): void {
    if (!fullConfig.enabled || LOG_LEVELS[level] < currentLevelNum) {
      return;
    }

    const entry: LogEntry = {
      ...fullConfig.base,
      ...context,
      time: new Date().toISOString(),
      level,
      levelNum: LOG_LEVELS[level],
      msg,
    };

    if (fullConfig.name) {
      entry.service = fullConfig.name;
    }

    const formatted = fullConfig.prettyPrint ? formatPretty(entry) : JSON.stringify(entry);

    switch (level) {
      case "trace":
      case "debug":
        // eslint-disable-next-line no-console
        console.debug(formatted);
        break;
      case "info":
        // eslint-disable-next-line no-console
        console.info(formatted);
        break;
      case "warn":
        // eslint-disable-next-line no-console
        console.warn(formatted);
        break;
      case "error":
      case "fatal":
        // eslint-disable-next-line no-console
        console.error(formatted);
        break;
    }
  }

  /**
   * Support both (msg, context) and (context, msg) call patterns
   */
  function emit(level: LogLevel, arg1: string | LogContext, arg2?: string | LogContext): void {
    if (typeof arg1 === "string") {
      output(level, arg1, typeof arg2 === "object" ? arg2 : {});
    } else {
      output(level, typeof arg2 === "string" ? arg2 : "", arg1);
    }
  }

  function child(bindings: LogContext): Logger {
    return createLogger({
      ...fullConfig,
      name: bindings.service ?? fullConfig.name,
      base: { ...fullConfig.base, ...bindings },
    });
  }

  return {
    level: fullConfig.level,
    trace: (arg1: string | LogContext, arg2?: string | LogContext) => emit("trace", arg1, arg2),
    debug: (arg1: string | LogContext, arg2?: string | LogContext) => emit("debug", arg1, arg2),
    info: (arg1: string | LogContext, arg2?: string | LogContext) => emit("info", arg1, arg2),
    warn: (arg1: string | LogContext, arg2?: string | LogContext) => emit("warn", arg1, arg2),
    error: (arg1: string | LogContext, arg2?: string | LogContext) => emit("error", arg1, arg2),
    fatal: (arg1: string | LogContext, arg2?: string | LogContext) => emit("fatal", arg1, arg2),
    child,
  };
}

// ============================================================================
// Singleton logger instance
// ============================================================================

export const logger = createLogger({
  name: "repo-signal",
});

/**
 * Create a logger for a specific service
 */
export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

/**
 * Logger that writes nothing
 */
export const silentLogger: Logger = createLogger({ level: "fatal", prettyPrint: false, base: {}, enabled: false });

// ============================================================================
// Pre-configured service loggers (lazy initialization)
// ============================================================================

let _cacheLogger: Logger | null = null;
let _qualityLogger: Logger | null = null;
let _pipelineLogger: Logger | null = null;

export const serviceLoggers = {
  get cache(): Logger {
    if (!_cacheLogger) {
      _cacheLogger = createServiceLogger("Cache");
    }
    return _cacheLogger;
  },

  get quality(): Logger {
    if (!_qualityLogger) {
      _qualityLogger = createServiceLogger("QualityAssessor");
    }
    return _qualityLogger;
  },

  get pipeline(): Logger {
    if (!_pipelineLogger) {
      _pipelineLogger = createServiceLogger("ScoringPipeline");
    }
    return _pipelineLogger;
  },
};

export { createLogger, getLogLevelFromEnv, shouldPrettyPrint };

export default logger;
