/**
 * Unified index for service-related type definitions.
 */

export * from "./base.types";
export * from "./mixins";
