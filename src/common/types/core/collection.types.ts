/**
 * Core collection type definitions
 */

export type Primitive = string | number | boolean | null;

/**
 * Capability a source adapter provides.
 */
export type SourceKind = "rest" | "database" | "scrape" | "stream";

export const SOURCE_KINDS: readonly SourceKind[] = ["rest", "database", "scrape", "stream"];

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffCapMs: number;
  backoffMultiplier: number;
  /** Fraction of the un-jittered delay that may be added at random; must not exceed multiplier - 1 */
  jitterRatio: number;
}

/**
 * A single unit of work for the pipeline. Frozen once created.
 */
export interface CollectionRequest {
  readonly requestId: string;
  readonly sourceId: string;
  /** Symbol or key looked up at the source */
  readonly target: string;
  readonly parameters: Readonly<Record<string, Primitive>>;
  readonly retryPolicy: Readonly<RetryPolicy>;
  /** Per-attempt timeout; falls back to the source definition, then the global default */
  readonly timeoutMs?: number;
  readonly fallbackSourceIds: readonly string[];
  readonly schemaName?: string;
  /** Explicit reference for the accuracy check, takes precedence over the rolling window */
  readonly referenceValue?: number;
}

export interface RawRecord {
  sourceId: string;
  fetchedAt: number;
  payload: Record<string, unknown>;
  latencyMs: number;
}

export interface FetchOptions {
  signal: AbortSignal;
  timeoutMs?: number;
}
