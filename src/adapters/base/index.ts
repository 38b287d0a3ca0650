export * from "./base-source-adapter";
export * from "./source-adapter.interface";
export * from "./source-adapter.registry";
