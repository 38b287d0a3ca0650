export * from "./rest-source.adapter";
