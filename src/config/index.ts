/**
 * Config Module Exports
 */

// Services
export { ConfigService } from "./config.service";
export type { ConfigServiceOptions, ConfigValidationReport } from "./config.service";

// Module
export { ConfigModule } from "./config.module";

// Pipeline settings and source definitions
export * from "./pipeline-config";
export * from "./sources.loader";

// Environment
export { ENV, ENV_HELPERS } from "./environment.constants";
