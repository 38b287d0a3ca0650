import { Logger } from "@nestjs/common";
import { ENV } from "@/config/environment.constants";
import { shouldLog, type LogLevel } from "../types/logging";

/**
 * Nest logger that drops messages below a minimum level (LOG_LEVEL by default).
 * Fatal messages go out through `error` with a [FATAL] prefix.
 */
export class FilteredLogger extends Logger {
  constructor(
    context: string,
    private readonly minimumLevel: LogLevel = ENV.LOGGING.LOG_LEVEL
  ) {
    super(context);
  }

  override log(message: unknown, ...optionalParams: unknown[]): void {
    if (this.enabled("log")) super.log(message, ...optionalParams);
  }

  override error(message: unknown, ...optionalParams: unknown[]): void {
    if (this.enabled("error")) super.error(message, ...optionalParams);
  }

  override warn(message: unknown, ...optionalParams: unknown[]): void {
    if (this.enabled("warn")) super.warn(message, ...optionalParams);
  }

  override debug(message: unknown, ...optionalParams: unknown[]): void {
    if (this.enabled("debug")) super.debug(message, ...optionalParams);
  }

  override verbose(message: unknown, ...optionalParams: unknown[]): void {
    if (this.enabled("verbose")) super.verbose(message, ...optionalParams);
  }

  override fatal(message: unknown, ...optionalParams: unknown[]): void {
    if (this.enabled("fatal")) super.error(`[FATAL] ${String(message)}`, ...optionalParams);
  }

  private enabled(level: LogLevel): boolean {
    return shouldLog(level, this.minimumLevel);
  }
}
