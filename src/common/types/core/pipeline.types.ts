import type { ErrorCode } from "../error-handling";
import type { NormalizedRecord } from "./record.types";
import type { QualityScore } from "./quality.types";

export type PipelineDecision = "accepted" | "rejected" | "retry-exhausted" | "failed";

export type RequestState = "pending" | "collecting" | "validating" | PipelineDecision;

export const PIPELINE_DECISIONS: readonly PipelineDecision[] = ["accepted", "rejected", "retry-exhausted", "failed"];

export const REQUEST_STATES: readonly RequestState[] = ["pending", "collecting", "validating", ...PIPELINE_DECISIONS];

export interface PipelineErrorSummary {
  code: ErrorCode;
  /** Error class name, e.g. NormalizationError */
  kind: string;
  message: string;
}

/**
 * Terminal artifact for one request. Frozen once created.
 */
export interface PipelineResult {
  readonly requestId: string;
  readonly symbol: string;
  readonly sourceId: string;
  readonly decision: PipelineDecision;
  readonly record?: NormalizedRecord;
  readonly quality?: QualityScore;
  readonly reasons: readonly string[];
  readonly error?: PipelineErrorSummary;
  readonly attempts: number;
  readonly completedAt: number;
}

export interface StateTransition {
  requestId: string;
  from: RequestState;
  to: RequestState;
  timestamp: number;
}

export interface AttemptLog {
  sourceId: string;
  attempt: number;
  /** Backoff waited before this attempt */
  delayBeforeMs: number;
  durationMs: number;
  outcome: "success" | "failure";
  error?: string;
}
