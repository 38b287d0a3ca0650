/**
 * Unified index for core type definitions.
 */

export * from "./collection.types";
export * from "./pipeline.types";
export * from "./quality.types";
export * from "./record.types";
