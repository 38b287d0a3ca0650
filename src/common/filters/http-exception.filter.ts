import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { ErrorCode, ErrorSeverity, type StandardErrorResponse } from "@/common/types/error-handling";
import { isPlainObject } from "@/common/utils/template.utils";
import { httpStatusForCode } from "@/error-handling/http-status";
import { isPipelineError } from "@/error-handling/pipeline.errors";

export interface ErrorResponseEnvelope {
  status: number;
  body: StandardErrorResponse;
}

function isStandardErrorResponse(value: unknown): value is StandardErrorResponse {
  return isPlainObject(value) && value.success === false && isPlainObject(value.error) && typeof value.error.code === "string";
}

function httpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === "string") {
    return response;
  }
  if (isPlainObject(response)) {
    const { message } = response;
    if (Array.isArray(message)) return message.map(String).join("; ");
    if (typeof message === "string") return message;
  }
  return exception.message;
}

/**
 * Translate anything a handler threw into a status and a StandardErrorResponse body
 */
export function buildErrorResponse(exception: unknown, requestId?: string): ErrorResponseEnvelope {
  const timestamp = Date.now();

  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const response = exception.getResponse();
    if (isStandardErrorResponse(response)) {
      return { status, body: response };
    }

    const serverSide = status >= HttpStatus.INTERNAL_SERVER_ERROR;
    const code = serverSide
      ? ErrorCode.UNKNOWN_ERROR
      : status === HttpStatus.NOT_FOUND
        ? ErrorCode.REQUEST_NOT_FOUND
        : ErrorCode.INVALID_REQUEST;
    return {
      status,
      body: {
        success: false,
        error: { code, message: httpExceptionMessage(exception), severity: serverSide ? ErrorSeverity.HIGH : ErrorSeverity.LOW },
        timestamp,
        requestId,
      },
    };
  }

  if (isPipelineError(exception)) {
    return {
      status: httpStatusForCode(exception.code),
      body: {
        success: false,
        error: { code: exception.code, message: exception.message, severity: exception.severity },
        timestamp,
        requestId,
      },
    };
  }

  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: {
      success: false,
      error: { code: ErrorCode.UNKNOWN_ERROR, message: "Internal server error", severity: ErrorSeverity.HIGH },
      timestamp,
      requestId,
    },
  };
}

/**
 * Global exception filter; every error leaves the API as a StandardErrorResponse
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const requestIdHeader = request.headers["x-request-id"];
    const { status, body } = buildErrorResponse(exception, typeof requestIdHeader === "string" ? requestIdHeader : undefined);

    const summary = `${request.method} ${request.url} -> ${status} ${body.error.code}: ${body.error.message}`;
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(summary, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(summary);
    }

    response.status(status).json(body);
  }
}
