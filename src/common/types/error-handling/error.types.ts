/**
 * Defines the severity levels for errors and anomaly flags, allowing for prioritized handling.
 */
export enum ErrorSeverity {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
  CRITICAL = "critical",
}

/**
 * Stable error codes, one per failure kind. The HTTP layer exposes these verbatim.
 */
export enum ErrorCode {
  // Generic
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",

  // Source adapters
  SOURCE_UNAVAILABLE = "SOURCE_UNAVAILABLE",
  SOURCE_REJECTED = "SOURCE_REJECTED",
  SOURCE_MALFORMED = "SOURCE_MALFORMED",
  SOURCE_NOT_FOUND = "SOURCE_NOT_FOUND",

  // Collector
  NORMALIZATION_FAILED = "NORMALIZATION_FAILED",
  COLLECTION_EXHAUSTED = "COLLECTION_EXHAUSTED",
  COLLECTION_CANCELLED = "COLLECTION_CANCELLED",

  // Validator
  SCHEMA_INVALID = "SCHEMA_INVALID",

  // API
  INVALID_REQUEST = "INVALID_REQUEST",
  REQUEST_NOT_FOUND = "REQUEST_NOT_FOUND",
}

/**
 * Base interface for all error details.
 */
export interface IErrorDetails {
  /**
   * Machine-readable error code
   */
  code: ErrorCode;

  /**
   * Human-readable error message
   */
  message: string;

  severity: ErrorSeverity;

  /**
   * Module name where the error originated
   */
  module?: string;

  timestamp?: number;

  context?: Record<string, unknown>;

  /**
   * Error cause (for error chaining)
   */
  cause?: unknown;
}

/**
 * Standardized error body returned by the HTTP layer.
 */
export interface StandardErrorResponse {
  success: false;
  error: Pick<IErrorDetails, "code" | "message" | "severity">;
  timestamp: number;
  requestId?: string;
}
