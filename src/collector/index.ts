export * from "./collection-request.factory";
export * from "./collector.module";
export * from "./collector.service";
export * from "./normalizer";
