export * from "./error-classification";
export * from "./pipeline.errors";
export * from "./retry-policy";
export * from "./http-status";
