import type { RetryPolicy } from "@/common/types/core";
import { ConfigurationError } from "./pipeline.errors";

/**
 * Delay to wait after the `failedAttempt`-th failure (1-based).
 *
 * raw = base * multiplier^(failedAttempt - 1), jittered upwards by at most jitterRatio * raw,
 * then capped. Because jitterRatio <= multiplier - 1, the largest delay for attempt n never
 * exceeds the smallest for attempt n + 1, so successive delays never shrink.
 */
export function computeBackoffDelay(failedAttempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const raw = policy.backoffBaseMs * Math.pow(policy.backoffMultiplier, Math.max(0, failedAttempt - 1));
  const jittered = raw * (1 + policy.jitterRatio * clampUnit(random()));
  return Math.round(Math.min(policy.backoffCapMs, jittered));
}

function clampUnit(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return value >= 1 ? 0.999999 : value;
}

export function validateRetryPolicy(policy: RetryPolicy): string[] {
  const problems: string[] = [];

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    problems.push(`maxAttempts must be a positive integer (got ${policy.maxAttempts})`);
  }
  if (!(policy.backoffBaseMs >= 0)) {
    problems.push(`backoffBaseMs must be >= 0 (got ${policy.backoffBaseMs})`);
  }
  if (!(policy.backoffCapMs >= policy.backoffBaseMs)) {
    problems.push(`backoffCapMs (${policy.backoffCapMs}) must be >= backoffBaseMs (${policy.backoffBaseMs})`);
  }
  if (!(policy.backoffMultiplier >= 1)) {
    problems.push(`backoffMultiplier must be >= 1 (got ${policy.backoffMultiplier})`);
  }
  if (!(policy.jitterRatio >= 0) || policy.jitterRatio > policy.backoffMultiplier - 1) {
    problems.push(
      `jitterRatio must be between 0 and backoffMultiplier - 1 (got ${policy.jitterRatio} with multiplier ${policy.backoffMultiplier})`
    );
  }

  return problems;
}

/**
 * Merge overrides onto defaults and validate the result
 */
export function createRetryPolicy(defaults: RetryPolicy, overrides: Partial<RetryPolicy> = {}): Readonly<RetryPolicy> {
  const policy: RetryPolicy = { ...defaults };
  for (const key of ["maxAttempts", "backoffBaseMs", "backoffCapMs", "backoffMultiplier", "jitterRatio"] as const) {
    const value = overrides[key];
    if (value !== undefined) {
      policy[key] = value;
    }
  }

  const problems = validateRetryPolicy(policy);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid retry policy: ${problems.join("; ")}`, problems);
  }
  return Object.freeze(policy);
}
