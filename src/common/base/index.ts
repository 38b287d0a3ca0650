// Core base classes
export * from "./base.service";

// Capability mixins (compose these as needed)
export * from "./mixins/configurable.mixin";
export * from "./mixins/events.mixin";
export * from "./mixins/lifecycle.mixin";
export * from "./mixins/logging.mixin";
export * from "./mixins/monitoring.mixin";

// Composed service classes
export * from "./composed.service";
