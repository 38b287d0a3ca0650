export * from "./stream-source.adapter";
