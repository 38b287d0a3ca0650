export * from "./async.utils";
export * from "./environment.utils";
export * from "./error.utils";
export * from "./template.utils";
