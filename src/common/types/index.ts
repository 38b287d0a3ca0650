/**
 * Unified index for all type definitions.
 */

export * from "./adapters";
export * from "./core";
export * from "./error-handling";
export * from "./logging";
export * from "./rate-limiting";
export * from "./services";
