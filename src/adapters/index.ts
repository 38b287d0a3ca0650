export * from "./base";
export * from "./database";
export * from "./rest";
export * from "./scrape";
export * from "./stream";
export * from "./source-adapter.factory";
