// Base classes
export * from "./base";

// HTTP error envelope
export { buildErrorResponse, HttpExceptionFilter } from "./filters/http-exception.filter";

// Logging
export { FilteredLogger } from "./logging/filtered-logger";
