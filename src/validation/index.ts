export * from "./quality-config";
export * from "./quality-validator.service";
export * from "./reference-window.store";
export * from "./schema";
export * from "./schema.registry";
export * from "./scoring";
export * from "./validation.module";
