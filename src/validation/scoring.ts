import type { FieldRule, FieldValue, NormalizedRecord, RecordSchema, ScoreWeights, SubScores } from "@/common/types/core";

export const DEFAULT_MAX_FUTURE_SKEW_MS = 5 * 60 * 1000;
const WEIGHT_SUM_TOLERANCE = 1e-6;

export interface ConsistencyResult {
  score: number;
  violations: string[];
}

function isPresent(value: FieldValue | undefined): value is string | number | boolean {
  return value !== undefined && value !== null;
}

/**
 * Share of required fields that are present and non-null
 */
export function completenessScore(record: NormalizedRecord, schema: RecordSchema): { score: number; missing: string[] } {
  const required = schema.fields.filter(rule => rule.required);
  if (required.length === 0) {
    return { score: 1, missing: [] };
  }

  const missing = required.filter(rule => !isPresent(record.fields[rule.name])).map(rule => rule.name);
  return { score: (required.length - missing.length) / required.length, missing };
}

/**
 * Why `value` breaks `rule`, or null when it conforms
 */
export function fieldViolation(rule: FieldRule, value: string | number | boolean, now: number): string | null {
  switch (rule.type) {
    case "number":
      if (typeof value !== "number" || !Number.isFinite(value)) return `${rule.name}: expected a number`;
      if (rule.min !== undefined && value < rule.min) return `${rule.name}: ${value} is below ${rule.min}`;
      if (rule.max !== undefined && value > rule.max) return `${rule.name}: ${value} is above ${rule.max}`;
      return null;
    case "string":
      if (typeof value !== "string") return `${rule.name}: expected a string`;
      if (rule.pattern !== undefined && !new RegExp(rule.pattern).test(value)) {
        return `${rule.name}: does not match ${rule.pattern}`;
      }
      return null;
    case "boolean":
      return typeof value === "boolean" ? null : `${rule.name}: expected a boolean`;
    case "timestamp": {
      if (typeof value !== "number" || !Number.isFinite(value)) return `${rule.name}: expected a timestamp`;
      if (value < 0) return `${rule.name}: before the epoch`;
      if (value > now + (rule.maxFutureSkewMs ?? DEFAULT_MAX_FUTURE_SKEW_MS)) return `${rule.name}: in the future`;
      if (rule.maxAgeMs !== undefined && now - value > rule.maxAgeMs) return `${rule.name}: older than ${rule.maxAgeMs}ms`;
      return null;
    }
  }
}

/**
 * Share of present declared fields whose value fits its rule
 */
export function consistencyScore(record: NormalizedRecord, schema: RecordSchema, now: number): ConsistencyResult {
  let checked = 0;
  const violations: string[] = [];

  for (const rule of schema.fields) {
    const value = record.fields[rule.name];
    if (!isPresent(value)) continue;

    checked++;
    const violation = fieldViolation(rule, value, now);
    if (violation) violations.push(violation);
  }

  return { score: checked === 0 ? 1 : (checked - violations.length) / checked, violations };
}

/**
 * 1 within `tolerance` relative deviation of the reference, then falling linearly to 0
 */
export function accuracyScore(value: number | undefined, reference: number | undefined, tolerance: number): number {
  if (value === undefined || reference === undefined || reference === 0) {
    return 1;
  }

  const deviation = Math.abs(value - reference) / Math.abs(reference);
  return deviation <= tolerance ? 1 : 1 - Math.min(1, deviation - tolerance);
}

export function computeAggregate(scores: SubScores, weights: ScoreWeights): number {
  const aggregate =
    weights.completeness * scores.completeness + weights.consistency * scores.consistency + weights.accuracy * scores.accuracy;
  return Math.min(1, Math.max(0, aggregate));
}

export function validateWeights(weights: ScoreWeights): string[] {
  const problems: string[] = [];
  const values = [weights.completeness, weights.consistency, weights.accuracy];

  if (values.some(weight => !Number.isFinite(weight) || weight < 0)) {
    problems.push(`score weights must be non-negative numbers (got ${values.join(", ")})`);
  }
  const sum = values.reduce((total, weight) => total + weight, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    problems.push(`score weights must sum to 1 (got ${sum})`);
  }
  return problems;
}

/**
 * Population mean and standard deviation
 */
export function summarize(values: readonly number[]): { mean: number; stdDev: number } {
  const mean = values.reduce((total, value) => total + value, 0) / values.length;
  const variance = values.reduce((total, value) => total + (value - mean) ** 2, 0) / values.length;
  return { mean, stdDev: Math.sqrt(variance) };
}

/**
 * z-score of `value` against `window`, or null when the window is too short to judge.
 * A flat window gives Infinity for any differing value.
 */
export function zScore(value: number, window: readonly number[], minPoints: number): number | null {
  if (window.length < minPoints || window.length === 0) {
    return null;
  }
  const { mean, stdDev } = summarize(window);
  if (stdDev === 0) {
    return value === mean ? 0 : Infinity;
  }
  return Math.abs(value - mean) / stdDev;
}
