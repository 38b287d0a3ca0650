import type { AbstractConstructor, IBaseService } from "../../types/services";
import { toError } from "../../utils/error.utils";

/**
 * Configuration management capabilities
 */
export interface ConfigurableCapabilities<TConfig extends object> {
  updateConfig(newConfig: Partial<TConfig>): void;
  getConfig(): Readonly<TConfig>;
  resetConfig(): void;
  validateConfig(config: TConfig): void;
}

/**
 * Mixin that adds typed configuration with validate-then-commit updates
 */
export function WithConfiguration<TConfig extends object>(defaultConfig: TConfig) {
  return function <TBase extends AbstractConstructor<IBaseService>>(Base: TBase) {
    abstract class ConfigurableMixin extends Base implements ConfigurableCapabilities<TConfig> {
      public config: TConfig;
      public readonly defaultConfig: TConfig;

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      constructor(...args: any[]) {
        super(...args);
        this.defaultConfig = { ...defaultConfig };
        this.config = { ...defaultConfig };
      }

      updateConfig(newConfig: Partial<TConfig>): void {
        const oldConfig = this.config;
        const candidate = { ...this.config, ...newConfig };

        try {
          this.validateConfig(candidate);
        } catch (error) {
          this.logError(toError(error), "Configuration update rejected, keeping previous values");
          throw error;
        }

        this.config = candidate;
        this.onConfigUpdated(oldConfig, candidate);
        this.logger.debug("Configuration updated", { changes: this.getConfigChanges(oldConfig, candidate) });
      }

      getConfig(): Readonly<TConfig> {
        return { ...this.config };
      }

      resetConfig(): void {
        const oldConfig = this.config;
        this.config = { ...this.defaultConfig };
        this.onConfigUpdated(oldConfig, this.config);
        this.logger.log("Configuration reset to defaults");
      }

      validateConfig(_config: TConfig): void {
        // Override in subclasses for specific validation
      }

      onConfigUpdated(_oldConfig: TConfig, _newConfig: TConfig): void {
        // Override in subclasses for specific handling
      }

      public getConfigChanges(oldConfig: TConfig, newConfig: TConfig): Record<string, { old: unknown; new: unknown }> {
        const changes: Record<string, { old: unknown; new: unknown }> = {};

        for (const key in newConfig) {
          if (oldConfig[key] !== newConfig[key]) {
            changes[key] = { old: oldConfig[key], new: newConfig[key] };
          }
        }

        return changes;
      }
    }

    return ConfigurableMixin;
  };
}
