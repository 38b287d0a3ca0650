import type { QualityConfig } from "@/common/types/core";
import { ErrorSeverity } from "@/common/types/error-handling";
import { ENV } from "@/config/environment.constants";
import { validateWeights } from "./scoring";

const [COMPLETENESS_WEIGHT, CONSISTENCY_WEIGHT, ACCURACY_WEIGHT] = ENV.QUALITY.SCORE_WEIGHTS;

export const DEFAULT_QUALITY_CONFIG: QualityConfig = {
  weights: { completeness: COMPLETENESS_WEIGHT, consistency: CONSISTENCY_WEIGHT, accuracy: ACCURACY_WEIGHT },
  thresholds: {
    completeness: { threshold: ENV.QUALITY.COMPLETENESS_THRESHOLD, severity: ErrorSeverity.CRITICAL },
    consistency: { threshold: ENV.QUALITY.CONSISTENCY_THRESHOLD, severity: ErrorSeverity.HIGH },
    accuracy: { threshold: ENV.QUALITY.ACCURACY_THRESHOLD, severity: ErrorSeverity.HIGH },
  },
  accuracyTolerance: ENV.QUALITY.ACCURACY_TOLERANCE,
  zScoreThreshold: ENV.QUALITY.ZSCORE_THRESHOLD,
  windowSize: ENV.QUALITY.WINDOW_SIZE,
  windowMinPoints: ENV.QUALITY.WINDOW_MIN_POINTS,
  sensitiveFields: ENV.QUALITY.SENSITIVE_FIELDS,
};

export function qualityConfigProblems(config: QualityConfig): string[] {
  const problems = validateWeights(config.weights);

  for (const [name, { threshold }] of Object.entries(config.thresholds)) {
    if (!(threshold >= 0 && threshold <= 1)) {
      problems.push(`${name} threshold must be within [0, 1] (got ${threshold})`);
    }
  }
  if (!(config.accuracyTolerance >= 0)) {
    problems.push(`accuracyTolerance must be >= 0 (got ${config.accuracyTolerance})`);
  }
  if (!(config.zScoreThreshold > 0)) {
    problems.push(`zScoreThreshold must be > 0 (got ${config.zScoreThreshold})`);
  }
  if (!Number.isInteger(config.windowSize) || config.windowSize < 2) {
    problems.push(`windowSize must be an integer >= 2 (got ${config.windowSize})`);
  }
  if (!Number.isInteger(config.windowMinPoints) || config.windowMinPoints < 2 || config.windowMinPoints > config.windowSize) {
    problems.push(`windowMinPoints must be an integer between 2 and windowSize (got ${config.windowMinPoints})`);
  }
  return problems;
}
