import dotenv from "dotenv";

// Load environment variables from .env file
dotenv.config();

/**
 * Environment variable configuration with type safety and validation
 */

/**
 * Validates that a URL string is properly formatted
 */
function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Get a required environment variable; empty strings fall back to the default
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const raw = process.env[key];
  const value = raw === undefined || raw === "" ? defaultValue : raw;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get an optional environment variable; empty strings count as unset
 */
function getEnvVarOptional(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return value;
}

/**
 * Get a required URL environment variable with validation
 */
function getEnvVarUrl(key: string, defaultValue?: string): string {
  const value = getEnvVar(key, defaultValue);
  if (!isValidUrl(value)) {
    throw new Error(`Environment variable ${key} must be a valid URL, got: ${value}`);
  }
  return value;
}

/**
 * Get an environment variable as a number
 */
function getEnvVarAsNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === "") {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/**
 * Redact sensitive values for logging
 */
function redactSecret(value: string | undefined): string {
  if (value === undefined || value === "") {
    return "(not set)";
  }
  if (value.length <= 8) {
    return "****";
  }
  return `${value.substring(0, 4)}****${value.substring(value.length - 4)}`;
}

/**
 * All environment configuration with validation
 */
export const env = {
  // Application
  NODE_ENV: getEnvVar("NODE_ENV", "development"),
  isProduction: getEnvVar("NODE_ENV", "development") === "production",
  isTest: getEnvVar("NODE_ENV", "development") === "test",

  // Quality provider (OpenAI-compatible chat completions endpoint)
  QUALITY_API_KEY: getEnvVarOptional("QUALITY_API_KEY"),
  QUALITY_API_URL: getEnvVarUrl("QUALITY_API_URL", "https://api.groq.com/openai/v1"),
  QUALITY_MODEL: getEnvVar("QUALITY_MODEL", "llama-3.1-8b-instant"),
  QUALITY_TIMEOUT_MS: getEnvVarAsNumber("QUALITY_TIMEOUT_MS", 30000),

  // Cache
  CACHE_DIR: getEnvVar("CACHE_DIR", "cache"),
  CACHE_API_TTL_MINUTES: getEnvVarAsNumber("CACHE_API_TTL_MINUTES", 30),
  CACHE_QUALITY_TTL_MINUTES: getEnvVarAsNumber("CACHE_QUALITY_TTL_MINUTES", 60 * 24 * 7),
} as const;

export type Env = typeof env;

/**
 * Log the current configuration (with sensitive values redacted)
 */
export function logConfig(): void {
  const config = {
    NODE_ENV: env.NODE_ENV,
    QUALITY_API_KEY: redactSecret(env.QUALITY_API_KEY),
    QUALITY_API_URL: env.QUALITY_API_URL,
    QUALITY_MODEL: env.QUALITY_MODEL,
    QUALITY_TIMEOUT_MS: env.QUALITY_TIMEOUT_MS,
    CACHE_DIR: env.CACHE_DIR,
    CACHE_API_TTL_MINUTES: env.CACHE_API_TTL_MINUTES,
    CACHE_QUALITY_TTL_MINUTES: env.CACHE_QUALITY_TTL_MINUTES,
  };

  console.log("=".repeat(60));
  console.log("Environment Configuration (secrets redacted):");
  console.log("=".repeat(60));
  for (const [key, value] of Object.entries(config)) {
    console.log(`  ${key}: ${value}`);
  }
  console.log("=".repeat(60));
}

/**
 * Validate that the environment is properly configured
 */
export function validateEnv(): {
  valid: boolean;
  errors: string[];
  warnings: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!env.QUALITY_API_KEY) {
    warnings.push("QUALITY_API_KEY not set - quality assessment will be skipped and totals fall back to hard scores");
  }

  if (env.QUALITY_TIMEOUT_MS <= 0) {
    errors.push(`QUALITY_TIMEOUT_MS must be positive, got: ${env.QUALITY_TIMEOUT_MS}`);
  }

  if (env.CACHE_API_TTL_MINUTES < 0) {
    errors.push(`CACHE_API_TTL_MINUTES cannot be negative, got: ${env.CACHE_API_TTL_MINUTES}`);
  }

  if (env.CACHE_QUALITY_TTL_MINUTES < 0) {
    errors.push(`CACHE_QUALITY_TTL_MINUTES cannot be negative, got: ${env.CACHE_QUALITY_TTL_MINUTES}`);
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Initialize and validate environment configuration
 * Logs config and throws if critical errors are found
 */
export function initializeEnv(): void {
  if (!env.isTest) {
    logConfig();
  }

  const validation = validateEnv();

  if (validation.warnings.length > 0 && !env.isTest) {
    console.log("\nConfiguration Warnings:");
    for (const warning of validation.warnings) {
      console.log(`  ⚠️  ${warning}`);
    }
  }

  if (validation.errors.length > 0) {
    console.error("\nConfiguration Errors:");
    for (const error of validation.errors) {
      console.error(`  ❌  ${error}`);
    }
    throw new Error(`Environment validation failed with ${validation.errors.length} error(s)`);
  }
}

// Export utility functions for testing
export const envUtils = {
  isValidUrl,
  redactSecret,
  getEnvVarOptional,
  getEnvVarAsNumber,
};
