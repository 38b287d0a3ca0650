export * from "./source.types";
