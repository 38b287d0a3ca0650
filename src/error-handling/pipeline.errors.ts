import { ErrorCode, ErrorSeverity, type IErrorDetails } from "@/common/types/error-handling";

interface PipelineErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown>;
}

/**
 * Root of every failure the pipeline raises on purpose. `retryable` marks
 * transport-level failures the collector may try again.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly severity: ErrorSeverity;
  abstract readonly module: string;
  readonly retryable: boolean = false;
  readonly timestamp = Date.now();
  readonly context: Record<string, unknown>;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.context = options.context ?? {};
  }

  toDetails(): IErrorDetails {
    return {
      code: this.code,
      message: this.message,
      severity: this.severity,
      module: this.module,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause,
    };
  }
}

// Adapter level

export abstract class SourceError extends PipelineError {
  readonly module = "adapter";

  constructor(
    message: string,
    readonly sourceId: string,
    options: PipelineErrorOptions = {}
  ) {
    super(message, { ...options, context: { sourceId, ...options.context } });
  }
}

/** Network failure, timeout, throttling or a provider-side outage */
export class SourceUnavailableError extends SourceError {
  readonly code = ErrorCode.SOURCE_UNAVAILABLE;
  readonly severity = ErrorSeverity.MEDIUM;
  override readonly retryable = true;
}

/** Bad credentials or parameters; the same request will fail again */
export class SourceRejectedError extends SourceError {
  readonly code = ErrorCode.SOURCE_REJECTED;
  readonly severity = ErrorSeverity.HIGH;
}

/** Payload could not be parsed */
export class SourceMalformedError extends SourceError {
  readonly code = ErrorCode.SOURCE_MALFORMED;
  readonly severity = ErrorSeverity.HIGH;
}

export class SourceNotFoundError extends SourceError {
  readonly code = ErrorCode.SOURCE_NOT_FOUND;
  readonly severity = ErrorSeverity.HIGH;

  constructor(sourceId: string) {
    super(`No adapter registered for source "${sourceId}"`, sourceId);
  }
}

// Collector level

export class NormalizationError extends PipelineError {
  readonly code = ErrorCode.NORMALIZATION_FAILED;
  readonly severity = ErrorSeverity.HIGH;
  readonly module = "collector";
}

export class CollectionExhaustedError extends PipelineError {
  readonly code = ErrorCode.COLLECTION_EXHAUSTED;
  readonly severity = ErrorSeverity.HIGH;
  readonly module = "collector";

  constructor(
    readonly sourceId: string,
    readonly attempts: number,
    readonly lastError: Error
  ) {
    super(`Collection from "${sourceId}" failed after ${attempts} attempts: ${lastError.message}`, {
      cause: lastError,
      context: { sourceId, attempts },
    });
  }
}

export class CollectionCancelledError extends PipelineError {
  readonly code = ErrorCode.COLLECTION_CANCELLED;
  readonly severity = ErrorSeverity.LOW;
  readonly module = "collector";
}

// Validator level

export class SchemaError extends PipelineError {
  readonly code = ErrorCode.SCHEMA_INVALID;
  readonly severity = ErrorSeverity.CRITICAL;
  readonly module = "validation";

  constructor(
    message: string,
    readonly problems: string[] = [message]
  ) {
    super(message, { context: { problems } });
  }
}

// Configuration

export class ConfigurationError extends PipelineError {
  readonly code = ErrorCode.CONFIGURATION_ERROR;
  readonly severity = ErrorSeverity.CRITICAL;
  readonly module = "config";

  constructor(
    message: string,
    readonly problems: string[] = [message]
  ) {
    super(message, { context: { problems } });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}
