import { validateRateLimit } from "@/common/rate-limiting/rate-limiter.service";
import type { QualityConfig, RetryPolicy } from "@/common/types/core";
import type { RateLimitConfig } from "@/common/types/rate-limiting";
import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { validateRetryPolicy } from "@/error-handling/retry-policy";
import { DEFAULT_QUALITY_CONFIG, qualityConfigProblems } from "@/validation/quality-config";
import { ENV } from "./environment.constants";

export type ResultSinkKind = "memory" | "file";

/**
 * Everything the pipeline reads from the environment, in one validated object
 */
export interface PipelineConfig {
  retryPolicy: RetryPolicy;
  attemptTimeoutMs: number;
  defaultRateLimit: RateLimitConfig;
  acceptanceThreshold: number;
  quality: QualityConfig;
  batchConcurrency: number;
  resultSink: ResultSinkKind;
  resultSinkDirectory: string;
}

export function buildPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    retryPolicy: {
      maxAttempts: ENV.COLLECTION.MAX_ATTEMPTS,
      backoffBaseMs: ENV.COLLECTION.BACKOFF_BASE_MS,
      backoffCapMs: ENV.COLLECTION.BACKOFF_CAP_MS,
      backoffMultiplier: ENV.COLLECTION.BACKOFF_MULTIPLIER,
      jitterRatio: ENV.COLLECTION.JITTER_RATIO,
    },
    attemptTimeoutMs: ENV.COLLECTION.ATTEMPT_TIMEOUT_MS,
    defaultRateLimit: {
      ratePerSecond: ENV.RATE_LIMITING.SOURCE_RATE_PER_SECOND,
      burst: ENV.RATE_LIMITING.SOURCE_BURST,
    },
    acceptanceThreshold: ENV.QUALITY.ACCEPTANCE_THRESHOLD,
    quality: DEFAULT_QUALITY_CONFIG,
    batchConcurrency: ENV.PIPELINE.BATCH_CONCURRENCY,
    resultSink: ENV.PIPELINE.RESULT_SINK,
    resultSinkDirectory: ENV.PIPELINE.RESULT_SINK_DIRECTORY,
    ...overrides,
  };
}

export function pipelineConfigProblems(config: PipelineConfig): string[] {
  const problems = [
    ...validateRetryPolicy(config.retryPolicy).map(problem => `retryPolicy: ${problem}`),
    ...validateRateLimit(config.defaultRateLimit, "defaultRateLimit"),
    ...qualityConfigProblems(config.quality).map(problem => `quality: ${problem}`),
  ];

  if (!(config.attemptTimeoutMs > 0)) {
    problems.push(`attemptTimeoutMs must be > 0 (got ${config.attemptTimeoutMs})`);
  }
  if (!(config.acceptanceThreshold >= 0 && config.acceptanceThreshold <= 1)) {
    problems.push(`acceptanceThreshold must be within [0, 1] (got ${config.acceptanceThreshold})`);
  }
  if (!Number.isInteger(config.batchConcurrency) || config.batchConcurrency < 1) {
    problems.push(`batchConcurrency must be a positive integer (got ${config.batchConcurrency})`);
  }
  if (config.resultSink === "file" && !config.resultSinkDirectory) {
    problems.push("resultSinkDirectory is required for the file sink");
  }
  return problems;
}

export function assertValidPipelineConfig(config: PipelineConfig): void {
  const problems = pipelineConfigProblems(config);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid pipeline configuration: ${problems.join("; ")}`, problems);
  }
}
