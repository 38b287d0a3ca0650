export * from "./pipeline-coordinator.service";
export * from "./pipeline.module";
export * from "./result-sink";
