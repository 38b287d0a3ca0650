import axios from "axios";
import { extractStatusCode, toError } from "@/common/utils/error.utils";
import {
  SourceError,
  SourceMalformedError,
  SourceRejectedError,
  SourceUnavailableError,
} from "./pipeline.errors";

const UNAVAILABLE_CODES = new Set([
  "ECONNABORTED",
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ETIMEDOUT",
  "ERR_CANCELED",
]);

const REJECTED_PATTERNS = [
  "authentication",
  "authorization",
  "forbidden",
  "unauthorized",
  "invalid api key",
  "permission denied",
  "bad request",
];

const MALFORMED_PATTERNS = ["malformed", "invalid json", "unexpected token", "syntax error"];

function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Status code carried by an HTTP client error, or embedded in its message
 */
export function statusOf(error: unknown): number | null {
  if (axios.isAxiosError(error) && error.response) {
    return error.response.status;
  }
  return error instanceof Error ? extractStatusCode(error.message) : null;
}

/**
 * Map an HTTP status to the adapter failure taxonomy; 429 and 5xx are transient
 */
export function classifyStatus(status: number): "unavailable" | "rejected" {
  return status === 429 || status === 408 || status >= 500 ? "unavailable" : "rejected";
}

/**
 * Translate whatever a provider client threw into a SourceError
 */
export function classifySourceFailure(error: unknown, sourceId: string): SourceError {
  if (error instanceof SourceError) {
    return error;
  }

  const err = toError(error);
  const status = statusOf(error);
  if (status !== null && status >= 400) {
    const message = `${sourceId} responded with HTTP ${status}`;
    return classifyStatus(status) === "unavailable"
      ? new SourceUnavailableError(message, sourceId, { cause: err, context: { status } })
      : new SourceRejectedError(message, sourceId, { cause: err, context: { status } });
  }

  const code = errorCodeOf(error);
  if (code && UNAVAILABLE_CODES.has(code)) {
    return new SourceUnavailableError(`${sourceId} unreachable (${code}): ${err.message}`, sourceId, { cause: err });
  }

  if (err instanceof SyntaxError) {
    return new SourceMalformedError(`${sourceId} returned an unparsable payload: ${err.message}`, sourceId, {
      cause: err,
    });
  }

  const message = err.message.toLowerCase();
  if (MALFORMED_PATTERNS.some(pattern => message.includes(pattern))) {
    return new SourceMalformedError(err.message, sourceId, { cause: err });
  }
  if (REJECTED_PATTERNS.some(pattern => message.includes(pattern))) {
    return new SourceRejectedError(err.message, sourceId, { cause: err });
  }

  // Unknown failures are treated as transient
  return new SourceUnavailableError(err.message, sourceId, { cause: err });
}
