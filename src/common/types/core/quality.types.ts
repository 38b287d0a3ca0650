import type { ErrorSeverity } from "../error-handling";
import type { FieldType } from "./record.types";

export interface FieldRule {
  name: string;
  type: FieldType;
  required?: boolean;
  min?: number;
  max?: number;
  pattern?: string;
  /** Timestamps only: oldest acceptable age */
  maxAgeMs?: number;
  /** Timestamps only: how far ahead of now a value may be */
  maxFutureSkewMs?: number;
}

export interface RecordSchema {
  name: string;
  fields: FieldRule[];
  /** Numeric field compared against references and the rolling window */
  referenceField?: string;
}

export type AnomalyTag =
  | "completeness_low"
  | "consistency_low"
  | "accuracy_low"
  | "statistical_outlier"
  | "sensitive_field";

export interface AnomalyFlag {
  tag: AnomalyTag;
  severity: ErrorSeverity;
  message: string;
  field?: string;
}

export interface SubScores {
  completeness: number;
  consistency: number;
  accuracy: number;
}

export interface QualityScore extends SubScores {
  readonly aggregate: number;
  readonly flags: readonly AnomalyFlag[];
}

export type ScoreWeights = SubScores;

export interface SubScoreThreshold {
  threshold: number;
  severity: ErrorSeverity;
}

export interface QualityConfig {
  weights: ScoreWeights;
  thresholds: Record<keyof SubScores, SubScoreThreshold>;
  /** Relative deviation tolerated before accuracy drops */
  accuracyTolerance: number;
  zScoreThreshold: number;
  windowSize: number;
  windowMinPoints: number;
  sensitiveFields: string[];
}

export interface ValidationContext {
  referenceValue?: number;
}
