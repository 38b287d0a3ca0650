import { v4 as uuidv4 } from "uuid";
import { HttpException, HttpStatus } from "@nestjs/common";
import { ErrorCode, ErrorSeverity, type StandardErrorResponse } from "../types/error-handling";
import { toError } from "../utils/error.utils";
import { BaseService } from "./base.service";

interface ControllerOperationOptions {
  requestId?: string;
  body?: unknown;
  performanceThreshold?: number;
}

/**
 * Common controller plumbing: request ids, timing and standard error bodies
 */
export abstract class BaseController extends BaseService {
  protected readonly startupTime: number = Date.now();

  public generateRequestId(): string {
    return uuidv4();
  }

  protected getUptime(): number {
    return Date.now() - this.startupTime;
  }

  /**
   * Run `operation`, logging its duration. Errors are logged and rethrown for the exception filter.
   */
  protected async handleControllerOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    method: string,
    url: string,
    options: ControllerOperationOptions = {}
  ): Promise<T> {
    const requestId = options.requestId ?? this.generateRequestId();
    const startTime = performance.now();
    this.logDebug(`${method} ${url}`, operationName, { requestId, body: options.body });

    try {
      const result = await operation();
      this.logPerformance(`${method} ${url}`, Math.round(performance.now() - startTime), options.performanceThreshold);
      return result;
    } catch (error) {
      const duration = Math.round(performance.now() - startTime);
      if (!(error instanceof HttpException) || error.getStatus() >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logError(toError(error), operationName, { requestId, method, url, duration });
      }
      throw error;
    }
  }

  protected createErrorResponse(
    code: ErrorCode,
    message: string,
    severity: ErrorSeverity,
    requestId?: string
  ): StandardErrorResponse {
    return {
      success: false,
      error: { code, message, severity },
      timestamp: Date.now(),
      requestId,
    };
  }

  protected throwHttpException(status: HttpStatus, code: ErrorCode, message: string, requestId?: string): never {
    throw new HttpException(this.createErrorResponse(code, message, ErrorSeverity.LOW, requestId), status);
  }
}
