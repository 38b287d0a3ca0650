/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { join } from "path";
import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { isLogLevel, type LogLevel } from "@/common/types/logging";

const DEFAULT_WEIGHTS = [1 / 3, 1 / 3, 1 / 3];

function parseLogLevel(): LogLevel {
  const value = EnvironmentUtils.parseString("LOG_LEVEL", "log");
  return isLogLevel(value) ? value : "log";
}

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
    PORT: EnvironmentUtils.parseInt("APP_PORT", 3101, { min: 1, max: 65535 }),
    BASE_PATH: EnvironmentUtils.parseString("APP_BASE_PATH", ""),
    CORS_ORIGIN: EnvironmentUtils.parseString("CORS_ORIGIN", ""),
    GRACEFUL_SHUTDOWN_MS: EnvironmentUtils.parseInt("GRACEFUL_SHUTDOWN_MS", 10000, { min: 100, max: 120000 }),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: parseLogLevel(),
  },

  // Collection: retries, backoff and per-attempt timeouts
  COLLECTION: {
    MAX_ATTEMPTS: EnvironmentUtils.parseInt("COLLECTION_MAX_ATTEMPTS", 3, { min: 1, max: 20 }),
    BACKOFF_BASE_MS: EnvironmentUtils.parseInt("COLLECTION_BACKOFF_BASE_MS", 250, { min: 0, max: 60000 }),
    BACKOFF_CAP_MS: EnvironmentUtils.parseInt("COLLECTION_BACKOFF_CAP_MS", 10000, { min: 0, max: 600000 }),
    BACKOFF_MULTIPLIER: EnvironmentUtils.parseFloat("COLLECTION_BACKOFF_MULTIPLIER", 2, { min: 1, max: 10 }),
    JITTER_RATIO: EnvironmentUtils.parseFloat("COLLECTION_JITTER_RATIO", 0.5, { min: 0, max: 9 }),
    ATTEMPT_TIMEOUT_MS: EnvironmentUtils.parseInt("COLLECTION_ATTEMPT_TIMEOUT_MS", 5000, { min: 10, max: 120000 }),
  },

  // Rate Limiting (token bucket per source)
  RATE_LIMITING: {
    SOURCE_RATE_PER_SECOND: EnvironmentUtils.parseFloat("SOURCE_RATE_PER_SECOND", 5, { min: 0.001, max: 10000 }),
    SOURCE_BURST: EnvironmentUtils.parseInt("SOURCE_BURST", 5, { min: 1, max: 1000 }),
  },

  // Quality scoring
  QUALITY: {
    ACCEPTANCE_THRESHOLD: EnvironmentUtils.parseFloat("QUALITY_ACCEPTANCE_THRESHOLD", 0.8, { min: 0, max: 1 }),
    SCORE_WEIGHTS: EnvironmentUtils.parseNumberList("QUALITY_SCORE_WEIGHTS", DEFAULT_WEIGHTS, 3),
    COMPLETENESS_THRESHOLD: EnvironmentUtils.parseFloat("QUALITY_COMPLETENESS_THRESHOLD", 0.8, { min: 0, max: 1 }),
    CONSISTENCY_THRESHOLD: EnvironmentUtils.parseFloat("QUALITY_CONSISTENCY_THRESHOLD", 0.9, { min: 0, max: 1 }),
    ACCURACY_THRESHOLD: EnvironmentUtils.parseFloat("QUALITY_ACCURACY_THRESHOLD", 0.85, { min: 0, max: 1 }),
    ACCURACY_TOLERANCE: EnvironmentUtils.parseFloat("QUALITY_ACCURACY_TOLERANCE", 0.1, { min: 0, max: 10 }),
    ZSCORE_THRESHOLD: EnvironmentUtils.parseFloat("QUALITY_ZSCORE_THRESHOLD", 3, { min: 0.5, max: 100 }),
    WINDOW_SIZE: EnvironmentUtils.parseInt("QUALITY_WINDOW_SIZE", 50, { min: 2, max: 10000 }),
    WINDOW_MIN_POINTS: EnvironmentUtils.parseInt("QUALITY_WINDOW_MIN_POINTS", 5, { min: 2, max: 10000 }),
    SENSITIVE_FIELDS: EnvironmentUtils.parseList("QUALITY_SENSITIVE_FIELDS", [
      "email",
      "phone",
      "password",
      "ssn",
      "credit_card",
    ]),
  },

  // Pipeline coordination and result sink
  PIPELINE: {
    BATCH_CONCURRENCY: EnvironmentUtils.parseInt("PIPELINE_BATCH_CONCURRENCY", 4, { min: 1, max: 100 }),
    RESULT_SINK: EnvironmentUtils.parseEnum("RESULT_SINK", ["memory", "file"] as const, "memory"),
    RESULT_SINK_DIRECTORY: EnvironmentUtils.parseString("RESULT_SINK_DIRECTORY", join(process.cwd(), "data", "results")),
  },

  // Source definitions
  SOURCES: {
    CONFIG_PATH: EnvironmentUtils.parseString("SOURCES_CONFIG_PATH", join(process.cwd(), "src", "config", "sources.json")),
  },
};
