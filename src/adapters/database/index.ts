export * from "./database-source.adapter";
export * from "./query-client";
