import type { Logger } from "@nestjs/common";
import type { LoggingCapabilities } from "../../base/mixins/logging.mixin";

/**
 * Minimal surface every service exposes to the mixins layered on top of it
 */
export interface IBaseService extends LoggingCapabilities {
  readonly logger: Logger;
}

export type ServiceHealth = "healthy" | "degraded" | "unhealthy";
