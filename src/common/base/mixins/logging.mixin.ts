import { Logger } from "@nestjs/common";
import type { AbstractConstructor } from "../../types/services/mixins";

export interface LoggingCapabilities {
  logInitialization(message?: string): void;
  logShutdown(message?: string): void;
  logPerformance(operation: string, durationMs: number, thresholdMs?: number): void;
  logError(error: Error, context?: string, details?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, details?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, details?: unknown): void;
  logCriticalOperation(operation: string, details: Record<string, unknown>, success?: boolean): void;
}

function tagged(message: string, context?: string): string {
  return context ? `[${context}] ${message}` : message;
}

/**
 * Gives a service a Nest logger named after its class, plus helpers that tag messages with the
 * operation they come from. Optional details are passed through as an extra log parameter.
 */
export function WithLogging<TBase extends AbstractConstructor>(Base: TBase) {
  abstract class LoggingMixin extends Base implements LoggingCapabilities {
    public readonly logger: Logger;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.logger = new Logger(this.constructor.name);
    }

    logInitialization(message = `${this.constructor.name} ready`): void {
      this.logger.log(message);
    }

    logShutdown(message = `${this.constructor.name} stopping`): void {
      this.logger.log(message);
    }

    logPerformance(operation: string, durationMs: number, thresholdMs = 1000): void {
      if (durationMs > thresholdMs) {
        this.logger.warn(`${operation} took ${durationMs}ms (threshold ${thresholdMs}ms)`);
        return;
      }
      this.logger.debug(`${operation} took ${durationMs}ms`);
    }

    logError(error: Error, context?: string, details?: Record<string, unknown>): void {
      const params: unknown[] = details ? [error.stack, details] : [error.stack];
      this.logger.error(tagged(error.message, context), ...params);
    }

    logWarning(message: string, context?: string, details?: Record<string, unknown>): void {
      const params: unknown[] = details ? [details] : [];
      this.logger.warn(tagged(message, context), ...params);
    }

    logDebug(message: string, context?: string, details?: unknown): void {
      const params: unknown[] = details === undefined ? [] : [details];
      this.logger.debug(tagged(message, context), ...params);
    }

    logCriticalOperation(operation: string, details: Record<string, unknown>, success = true): void {
      if (success) {
        this.logger.log(`${operation} succeeded`, details);
      } else {
        this.logger.error(`${operation} failed`, details);
      }
    }
  }

  return LoggingMixin;
}
