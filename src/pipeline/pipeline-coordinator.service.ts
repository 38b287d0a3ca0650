import { Inject, Injectable } from "@nestjs/common";
import { SourceAdapterRegistry } from "@/adapters/base/source-adapter.registry";
import { StandardService } from "@/common/base/composed.service";
import { WithConfiguration } from "@/common/base/mixins/configurable.mixin";
import { WithEvents } from "@/common/base/mixins/events.mixin";
import type {
  CollectionRequest,
  NormalizedRecord,
  PipelineDecision,
  PipelineErrorSummary,
  PipelineResult,
  QualityScore,
  RecordSchema,
  RequestState,
  StateTransition,
} from "@/common/types/core";
import { ErrorCode, ErrorSeverity } from "@/common/types/error-handling";
import { executeWithConcurrency } from "@/common/utils/async.utils";
import { toError } from "@/common/utils/error.utils";
import { ENV } from "@/config/environment.constants";
import { CollectorService, type CollectionOutcome } from "@/collector/collector.service";
import { CollectionCancelledError, CollectionExhaustedError, ConfigurationError, isPipelineError, SchemaError } from "@/error-handling/pipeline.errors";
import { QualityValidatorService } from "@/validation/quality-validator.service";
import { SchemaRegistry } from "@/validation/schema.registry";
import { RESULT_SINK, type ResultSink } from "./result-sink";

export interface CoordinatorConfig {
  acceptanceThreshold: number;
  batchConcurrency: number;
  /** Terminal request states kept for lookups */
  maxTrackedRequests: number;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

export interface PipelineStats {
  submitted: number;
  inFlight: number;
  accepted: number;
  rejected: number;
  retryExhausted: number;
  failed: number;
  sinkFailures: number;
}

type PipelineEvents = {
  stateChanged: [StateTransition];
  resultReady: [PipelineResult];
};

const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  pending: ["collecting"],
  collecting: ["validating", "retry-exhausted", "failed"],
  validating: ["accepted", "rejected", "failed"],
  accepted: [],
  rejected: [],
  "retry-exhausted": [],
  failed: [],
};

const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  acceptanceThreshold: ENV.QUALITY.ACCEPTANCE_THRESHOLD,
  batchConcurrency: ENV.PIPELINE.BATCH_CONCURRENCY,
  maxTrackedRequests: 10000,
};

const CoordinatorBase = WithEvents<PipelineEvents>()(
  WithConfiguration<CoordinatorConfig>(DEFAULT_COORDINATOR_CONFIG)(StandardService)
);

/**
 * Runs each request through collection and validation, decides its outcome and hands the
 * frozen result to the sink.
 *
 * State per request: pending -> collecting -> validating -> accepted | rejected, with
 * collecting -> retry-exhausted | failed and validating -> failed. Failures of collection,
 * normalization, schema or cancellation come back as results, never as exceptions.
 */
@Injectable()
export class PipelineCoordinatorService extends CoordinatorBase {
  private readonly states = new Map<string, RequestState>();
  /** Requests still collecting; only these can be cancelled */
  private readonly controllers = new Map<string, AbortController>();
  private readonly active = new Set<string>();
  private readonly finished: string[] = [];

  constructor(
    private readonly collector: CollectorService,
    private readonly validator: QualityValidatorService,
    private readonly schemas: SchemaRegistry,
    private readonly registry: SourceAdapterRegistry,
    @Inject(RESULT_SINK) private readonly sink: ResultSink
  ) {
    super();
  }

  override validateConfig(config: CoordinatorConfig): void {
    const problems: string[] = [];
    if (!(config.acceptanceThreshold >= 0 && config.acceptanceThreshold <= 1)) {
      problems.push(`acceptanceThreshold must be within [0, 1] (got ${config.acceptanceThreshold})`);
    }
    if (!Number.isInteger(config.batchConcurrency) || config.batchConcurrency < 1) {
      problems.push(`batchConcurrency must be a positive integer (got ${config.batchConcurrency})`);
    }
    if (!Number.isInteger(config.maxTrackedRequests) || config.maxTrackedRequests < 1) {
      problems.push(`maxTrackedRequests must be a positive integer (got ${config.maxTrackedRequests})`);
    }
    if (problems.length > 0) {
      throw new ConfigurationError(`Invalid coordinator configuration: ${problems.join("; ")}`, problems);
    }
  }

  async submit(request: CollectionRequest, options: SubmitOptions = {}): Promise<PipelineResult> {
    const { requestId } = request;
    if (this.states.has(requestId)) {
      throw new ConfigurationError(`Request ${requestId} has already been submitted`);
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    this.states.set(requestId, "pending");
    this.controllers.set(requestId, controller);
    this.active.add(requestId);
    this.incrementCounter("submitted");

    try {
      this.transition(requestId, "collecting");

      let attempts = 0;
      let outcome: CollectionOutcome;
      try {
        outcome = await this.collector.collect(request, {
          signal: controller.signal,
          onAttempt: () => {
            attempts++;
          },
        });
      } catch (error) {
        return await this.finish(request, this.failureResult(request, error, attempts));
      }

      // Collection is over; from here on the request runs to its decision
      this.controllers.delete(requestId);
      if (controller.signal.aborted) {
        const cancelled = new CollectionCancelledError(`Collection for request ${requestId} was cancelled`, {
          context: { requestId },
        });
        return await this.finish(request, this.failureResult(request, cancelled, attempts, outcome.sourceId));
      }

      this.transition(requestId, "validating");
      return await this.finish(request, await this.evaluate(request, outcome));
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
      this.controllers.delete(requestId);
      this.active.delete(requestId);
    }
  }

  /**
   * Submit several requests with bounded concurrency; results keep input order. A request refused
   * at submission (a reused id) comes back as a failed result instead of failing the batch.
   */
  async submitBatch(requests: readonly CollectionRequest[], options: { concurrency?: number } = {}): Promise<PipelineResult[]> {
    return executeWithConcurrency(
      requests,
      async request => {
        try {
          return await this.submit(request);
        } catch (error) {
          if (error instanceof ConfigurationError) {
            return this.failureResult(request, error, 0);
          }
          throw error;
        }
      },
      options.concurrency ?? this.config.batchConcurrency
    );
  }

  /**
   * Abort a request that is still collecting. Returns false when it is unknown, already past
   * collection or already has a result.
   */
  cancel(requestId: string): boolean {
    const controller = this.controllers.get(requestId);
    if (!controller || controller.signal.aborted) {
      return false;
    }

    controller.abort();
    this.logDebug(`Cancellation requested`, requestId);
    return true;
  }

  getRequestState(requestId: string): RequestState | undefined {
    return this.states.get(requestId);
  }

  getStats(): PipelineStats {
    const counters = this.getCounters();
    return {
      submitted: counters.submitted ?? 0,
      inFlight: this.active.size,
      accepted: counters.accepted ?? 0,
      rejected: counters.rejected ?? 0,
      retryExhausted: counters["retry-exhausted"] ?? 0,
      failed: counters.failed ?? 0,
      sinkFailures: counters.sink_failures ?? 0,
    };
  }

  override async cleanup(): Promise<void> {
    for (const controller of this.controllers.values()) {
      controller.abort();
    }
    this.removeAllListeners();
  }

  private async evaluate(request: CollectionRequest, outcome: CollectionOutcome): Promise<PipelineResult> {
    const { record, attempts } = outcome;

    let quality: QualityScore;
    try {
      quality = await this.validator.validate(record, this.resolveSchema(request, outcome.sourceId), {
        referenceValue: request.referenceValue,
      });
    } catch (error) {
      return this.failureResult(request, error, attempts.length, outcome.sourceId);
    }

    const threshold = this.config.acceptanceThreshold;
    const hasCritical = quality.flags.some(flag => flag.severity === ErrorSeverity.CRITICAL);
    const belowThreshold = quality.aggregate < threshold;
    const decision: PipelineDecision = hasCritical || belowThreshold ? "rejected" : "accepted";

    const reasons =
      decision === "rejected"
        ? [...new Set([...quality.flags.map(flag => flag.tag), ...(belowThreshold ? ["aggregate_low"] : [])])]
        : [];

    return this.buildResult(request, decision, {
      sourceId: outcome.sourceId,
      record,
      quality,
      reasons,
      attempts: attempts.length,
    });
  }

  /**
   * The request's schema, else the default schema of the source that produced the record
   */
  private resolveSchema(request: CollectionRequest, sourceId: string): RecordSchema {
    const name = request.schemaName ?? this.registry.get(sourceId)?.schemaName;
    if (!name) {
      throw new SchemaError(`No schema configured for source "${sourceId}"`);
    }

    const schema = this.schemas.get(name);
    if (!schema) {
      throw new SchemaError(`Unknown schema "${name}"`);
    }
    return schema;
  }

  private failureResult(request: CollectionRequest, error: unknown, attempts: number, sourceId = request.sourceId): PipelineResult {
    const decision: PipelineDecision = error instanceof CollectionExhaustedError ? "retry-exhausted" : "failed";

    let summary: PipelineErrorSummary;
    if (isPipelineError(error)) {
      summary = { code: error.code, kind: error.name, message: error.message };
    } else {
      const err = toError(error);
      this.logError(err, "Unexpected pipeline failure", { requestId: request.requestId });
      summary = { code: ErrorCode.UNKNOWN_ERROR, kind: err.name, message: err.message };
    }

    return this.buildResult(request, decision, {
      sourceId,
      reasons: [summary.code.toLowerCase()],
      error: summary,
      attempts,
    });
  }

  private buildResult(
    request: CollectionRequest,
    decision: PipelineDecision,
    details: {
      sourceId: string;
      reasons: string[];
      attempts: number;
      record?: NormalizedRecord;
      quality?: QualityScore;
      error?: PipelineErrorSummary;
    }
  ): PipelineResult {
    return Object.freeze({
      requestId: request.requestId,
      symbol: request.target,
      sourceId: details.sourceId,
      decision,
      record: details.record,
      quality: details.quality,
      reasons: Object.freeze(details.reasons),
      error: details.error ? Object.freeze(details.error) : undefined,
      attempts: details.attempts,
      completedAt: Date.now(),
    });
  }

  private async finish(request: CollectionRequest, result: PipelineResult): Promise<PipelineResult> {
    // Once a result exists the request can no longer be cancelled
    this.controllers.delete(request.requestId);
    this.transition(request.requestId, result.decision);
    this.incrementCounter(result.decision);
    this.rememberFinished(request.requestId);

    try {
      await this.sink.store(result);
    } catch (error) {
      this.incrementCounter("sink_failures");
      this.logError(toError(error), "Result sink failed", { requestId: request.requestId });
    }

    this.logCriticalOperation(
      "pipeline_result",
      { requestId: request.requestId, sourceId: result.sourceId, decision: result.decision, reasons: result.reasons },
      result.decision === "accepted" || result.decision === "rejected"
    );
    this.emit("resultReady", result);
    return result;
  }

  private transition(requestId: string, to: RequestState): void {
    const from = this.states.get(requestId);
    if (!from || !TRANSITIONS[from].includes(to)) {
      throw new Error(`Illegal state transition ${from ?? "none"} -> ${to} for request ${requestId}`);
    }

    this.states.set(requestId, to);
    this.emit("stateChanged", { requestId, from, to, timestamp: Date.now() });
  }

  private rememberFinished(requestId: string): void {
    this.finished.push(requestId);
    while (this.finished.length > this.config.maxTrackedRequests) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) this.states.delete(evicted);
    }
  }
}
