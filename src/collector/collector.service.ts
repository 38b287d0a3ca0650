import { Injectable } from "@nestjs/common";
import type { SourceAdapter } from "@/adapters/base/source-adapter.interface";
import { SourceAdapterRegistry, type SourceRegistryEntry } from "@/adapters/base/source-adapter.registry";
import { StandardService } from "@/common/base/composed.service";
import { WithConfiguration } from "@/common/base/mixins/configurable.mixin";
import { RateLimiterService } from "@/common/rate-limiting/rate-limiter.service";
import type { AttemptLog, CollectionRequest, NormalizedRecord, RawRecord } from "@/common/types/core";
import { AbortedError, sleep, withTimeout } from "@/common/utils/async.utils";
import { ENV } from "@/config/environment.constants";
import { classifySourceFailure } from "@/error-handling/error-classification";
import {
  CollectionCancelledError,
  CollectionExhaustedError,
  ConfigurationError,
  NormalizationError,
  SourceError,
  SourceMalformedError,
  SourceNotFoundError,
  SourceRejectedError,
  SourceUnavailableError,
  type PipelineError,
} from "@/error-handling/pipeline.errors";
import { computeBackoffDelay } from "@/error-handling/retry-policy";
import { normalizeRecord } from "./normalizer";

export interface CollectorConfig {
  /** Per-attempt timeout when neither the request nor the source sets one */
  defaultTimeoutMs: number;
}

export interface CollectOptions {
  signal?: AbortSignal;
  /** Called as each attempt settles */
  onAttempt?: (attempt: AttemptLog) => void;
}

export interface CollectionOutcome {
  record: NormalizedRecord;
  /** Source that produced the record; differs from the request's when a fallback was used */
  sourceId: string;
  attempts: AttemptLog[];
}

const ConfigurableService = WithConfiguration<CollectorConfig>({
  defaultTimeoutMs: ENV.COLLECTION.ATTEMPT_TIMEOUT_MS,
})(StandardService);

/**
 * Drives source adapters until one yields a record.
 *
 * Each source gets `retryPolicy.maxAttempts` attempts. Only SourceUnavailable is retried;
 * a rejection moves on to the next fallback source and a malformed payload ends collection
 * with a NormalizationError. Every attempt holds a rate-limiter permit for its duration.
 */
@Injectable()
export class CollectorService extends ConfigurableService {
  constructor(
    private readonly registry: SourceAdapterRegistry,
    private readonly rateLimiter: RateLimiterService
  ) {
    super();
  }

  override validateConfig(config: CollectorConfig): void {
    if (!(config.defaultTimeoutMs > 0)) {
      throw new ConfigurationError(`defaultTimeoutMs must be > 0 (got ${config.defaultTimeoutMs})`);
    }
  }

  async collect(request: CollectionRequest, options: CollectOptions = {}): Promise<CollectionOutcome> {
    const attempts: AttemptLog[] = [];
    const track = (attempt: AttemptLog): void => {
      attempts.push(attempt);
      options.onAttempt?.(attempt);
    };

    const sourceIds = [request.sourceId, ...request.fallbackSourceIds];
    let lastError: PipelineError | undefined;

    for (const sourceId of sourceIds) {
      this.throwIfCancelled(request, options.signal);

      const entry = this.registry.get(sourceId);
      if (!entry) {
        lastError = new SourceNotFoundError(sourceId);
        this.logWarning(lastError.message, request.requestId);
        continue;
      }

      try {
        const record = await this.collectFrom(entry, request, track, options.signal);
        return { record, sourceId: entry.adapter.sourceId, attempts };
      } catch (error) {
        if (!(error instanceof CollectionExhaustedError || error instanceof SourceRejectedError)) {
          throw error;
        }
        lastError = error;
        if (sourceId !== sourceIds[sourceIds.length - 1]) {
          this.logWarning(`${error.message}; trying next fallback source`, request.requestId);
        }
      }
    }

    throw lastError ?? new SourceNotFoundError(request.sourceId);
  }

  private async collectFrom(
    entry: SourceRegistryEntry,
    request: CollectionRequest,
    track: (attempt: AttemptLog) => void,
    signal?: AbortSignal
  ): Promise<NormalizedRecord> {
    const { adapter } = entry;
    const key = adapter.sourceId.toLowerCase();
    const policy = request.retryPolicy;
    const timeoutMs = request.timeoutMs ?? entry.timeoutMs ?? this.config.defaultTimeoutMs;

    let delayBeforeMs = 0;
    let lastError: SourceUnavailableError | undefined;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
      this.throwIfCancelled(request, signal);
      this.incrementCounter(`attempts_${key}`);
      if (attempt > 1) this.incrementCounter(`retries_${key}`);

      const startedAt = Date.now();
      let raw: RawRecord;
      try {
        raw = await this.attempt(adapter, request, timeoutMs, signal);
      } catch (error) {
        const failure = this.toAttemptFailure(error, adapter.sourceId, request, signal);
        if (failure instanceof CollectionCancelledError) {
          throw failure;
        }
        track({
          sourceId: adapter.sourceId,
          attempt,
          delayBeforeMs,
          durationMs: Date.now() - startedAt,
          outcome: "failure",
          error: failure.message,
        });
        this.registry.recordFailure(adapter.sourceId);

        if (!(failure instanceof SourceUnavailableError)) {
          if (failure instanceof NormalizationError) this.incrementCounter(`normalization_failures_${key}`);
          throw failure;
        }

        lastError = failure;
        if (attempt < policy.maxAttempts) {
          delayBeforeMs = computeBackoffDelay(attempt, policy);
          this.logWarning(
            `Attempt ${attempt}/${policy.maxAttempts} on ${adapter.sourceId} failed (${failure.message}); retrying in ${delayBeforeMs}ms`,
            request.requestId
          );
          await this.backoff(delayBeforeMs, request, signal);
        }
        continue;
      }

      track({
        sourceId: adapter.sourceId,
        attempt,
        delayBeforeMs,
        durationMs: Date.now() - startedAt,
        outcome: "success",
      });
      this.registry.recordSuccess(adapter.sourceId);

      try {
        const record = normalizeRecord(raw, entry.normalization, {
          symbol: request.target,
          requestId: request.requestId,
          attempt,
        });
        this.incrementCounter(`successes_${key}`);
        return record;
      } catch (error) {
        this.incrementCounter(`normalization_failures_${key}`);
        throw error;
      }
    }

    this.incrementCounter(`exhaustions_${key}`);
    throw new CollectionExhaustedError(
      adapter.sourceId,
      policy.maxAttempts,
      lastError ?? new SourceUnavailableError("No attempt was made", adapter.sourceId)
    );
  }

  /**
   * One fetch bounded by its own timeout. The rate-limiter permit is held until the adapter call
   * itself settles, so a timed-out fetch that keeps running still counts against the burst.
   */
  private async attempt(
    adapter: SourceAdapter,
    request: CollectionRequest,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<RawRecord> {
    const permit = await this.rateLimiter.acquire(adapter.sourceId, signal);
    let fetchSettled: Promise<void> = Promise.resolve();
    try {
      return await withTimeout(
        attemptSignal => {
          const fetching = adapter.fetch(request, { signal: attemptSignal, timeoutMs });
          fetchSettled = fetching.then(
            () => undefined,
            () => undefined
          );
          return fetching;
        },
        timeoutMs,
        () =>
          new SourceUnavailableError(`${adapter.sourceId} timed out after ${timeoutMs}ms`, adapter.sourceId, {
            context: { timeoutMs },
          }),
        signal
      );
    } finally {
      void fetchSettled.then(() => permit.release());
    }
  }

  private toAttemptFailure(
    error: unknown,
    sourceId: string,
    request: CollectionRequest,
    signal?: AbortSignal
  ): PipelineError {
    if (signal?.aborted) {
      return this.cancelled(request);
    }
    if (error instanceof SourceMalformedError) {
      return new NormalizationError(error.message, { cause: error, context: { sourceId } });
    }
    return error instanceof SourceError ? error : classifySourceFailure(error, sourceId);
  }

  private async backoff(delayMs: number, request: CollectionRequest, signal?: AbortSignal): Promise<void> {
    this.throwIfCancelled(request, signal);
    try {
      await sleep(delayMs, signal);
    } catch (error) {
      if (error instanceof AbortedError) {
        throw this.cancelled(request);
      }
      throw error;
    }
  }

  private throwIfCancelled(request: CollectionRequest, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw this.cancelled(request);
    }
  }

  private cancelled(request: CollectionRequest): CollectionCancelledError {
    return new CollectionCancelledError(`Collection for request ${request.requestId} was cancelled`, {
      context: { requestId: request.requestId, sourceId: request.sourceId },
    });
  }
}
