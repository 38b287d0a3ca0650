import { HttpStatus } from "@nestjs/common";
import type { PipelineResult } from "@/common/types/core";
import { ErrorCode } from "@/common/types/error-handling";

const STATUS_BY_CODE: Record<ErrorCode, HttpStatus> = {
  [ErrorCode.UNKNOWN_ERROR]: HttpStatus.INTERNAL_SERVER_ERROR,
  [ErrorCode.CONFIGURATION_ERROR]: HttpStatus.BAD_REQUEST,
  [ErrorCode.SOURCE_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorCode.SOURCE_REJECTED]: HttpStatus.UNPROCESSABLE_ENTITY,
  [ErrorCode.SOURCE_MALFORMED]: HttpStatus.UNPROCESSABLE_ENTITY,
  [ErrorCode.SOURCE_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ErrorCode.NORMALIZATION_FAILED]: HttpStatus.UNPROCESSABLE_ENTITY,
  [ErrorCode.COLLECTION_EXHAUSTED]: HttpStatus.SERVICE_UNAVAILABLE,
  [ErrorCode.COLLECTION_CANCELLED]: HttpStatus.CONFLICT,
  [ErrorCode.SCHEMA_INVALID]: HttpStatus.UNPROCESSABLE_ENTITY,
  [ErrorCode.INVALID_REQUEST]: HttpStatus.BAD_REQUEST,
  [ErrorCode.REQUEST_NOT_FOUND]: HttpStatus.NOT_FOUND,
};

export function httpStatusForCode(code: ErrorCode): HttpStatus {
  return STATUS_BY_CODE[code];
}

/**
 * Decided results answer 200, with or without acceptance; anything else answers with the
 * status of its error code.
 */
export function httpStatusForResult(result: PipelineResult): HttpStatus {
  if (result.decision === "accepted" || result.decision === "rejected") {
    return HttpStatus.OK;
  }
  return httpStatusForCode(result.error?.code ?? ErrorCode.UNKNOWN_ERROR);
}
