import { v4 as uuidv4 } from "uuid";
import type { CollectionRequest, Primitive, RetryPolicy } from "@/common/types/core";
import { ConfigurationError } from "@/error-handling/pipeline.errors";
import { createRetryPolicy } from "@/error-handling/retry-policy";

export interface CollectionRequestInput {
  requestId?: string;
  sourceId: string;
  target: string;
  parameters?: Record<string, Primitive>;
  retryPolicy?: Partial<RetryPolicy>;
  timeoutMs?: number;
  fallbackSourceIds?: string[];
  schemaName?: string;
  referenceValue?: number;
}

/**
 * Build a frozen CollectionRequest, filling the retry policy from `defaultPolicy`
 */
export function createCollectionRequest(input: CollectionRequestInput, defaultPolicy: RetryPolicy): CollectionRequest {
  const problems: string[] = [];
  if (!input.sourceId.trim()) problems.push("sourceId must not be empty");
  if (!input.target.trim()) problems.push("target must not be empty");
  if (input.timeoutMs !== undefined && !(input.timeoutMs > 0)) {
    problems.push(`timeoutMs must be > 0 (got ${input.timeoutMs})`);
  }
  if (input.referenceValue !== undefined && !Number.isFinite(input.referenceValue)) {
    problems.push("referenceValue must be a finite number");
  }
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid collection request: ${problems.join("; ")}`, problems);
  }

  return Object.freeze({
    requestId: input.requestId ?? uuidv4(),
    sourceId: input.sourceId.trim(),
    target: input.target.trim(),
    parameters: Object.freeze({ ...input.parameters }),
    retryPolicy: createRetryPolicy(defaultPolicy, input.retryPolicy),
    timeoutMs: input.timeoutMs,
    fallbackSourceIds: Object.freeze([...(input.fallbackSourceIds ?? [])]),
    schemaName: input.schemaName,
    referenceValue: input.referenceValue,
  });
}
