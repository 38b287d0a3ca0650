/**
 * Environment variable parsing. Every parser falls back to its default (with a warning) on bad input.
 */

interface RangeOptions {
  min?: number;
  max?: number;
  fieldName?: string;
}

export class EnvironmentUtils {
  static parseInt(key: string, defaultValue: number, options: RangeOptions = {}): number {
    return EnvironmentUtils.parseNumber(key, defaultValue, options, value => Number.parseInt(value, 10), "integer");
  }

  static parseFloat(key: string, defaultValue: number, options: RangeOptions = {}): number {
    return EnvironmentUtils.parseNumber(key, defaultValue, options, Number.parseFloat, "float");
  }

  static parseBoolean(key: string, defaultValue: boolean, options: { fieldName?: string } = {}): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;

    const lowerValue = value.toLowerCase();
    if (lowerValue === "true" || lowerValue === "1" || lowerValue === "yes") {
      return true;
    }
    if (lowerValue === "false" || lowerValue === "0" || lowerValue === "no") {
      return false;
    }

    console.warn(`Invalid boolean value "${value}" for ${options.fieldName || key}, using default ${defaultValue}`);
    return defaultValue;
  }

  static parseString(key: string, defaultValue: string): string {
    const value = process.env[key];
    return value ? value : defaultValue;
  }

  /**
   * Parse a value restricted to a fixed set of literals
   */
  static parseEnum<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
    const value = process.env[key];
    if (!value) return defaultValue;

    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      console.warn(`Value "${value}" for ${key} must be one of: ${allowed.join(", ")}; using default ${defaultValue}`);
      return defaultValue;
    }
    return match;
  }

  /**
   * Parse comma-separated list from environment variable
   */
  static parseList(key: string, defaultValue: string[] = []): string[] {
    const value = process.env[key];
    if (!value) return defaultValue;

    return value
      .split(",")
      .map(item => item.trim())
      .filter(Boolean);
  }

  /**
   * Parse a comma-separated list of numbers of an exact length
   */
  static parseNumberList(key: string, defaultValue: number[], expectedLength: number): number[] {
    const items = EnvironmentUtils.parseList(key);
    if (items.length === 0) return defaultValue;

    const parsed = items.map(Number);
    if (parsed.length !== expectedLength || parsed.some(n => !Number.isFinite(n))) {
      console.warn(`Invalid number list "${process.env[key]}" for ${key}, using default ${defaultValue.join(",")}`);
      return defaultValue;
    }
    return parsed;
  }

  private static parseNumber(
    key: string,
    defaultValue: number,
    options: RangeOptions,
    parse: (value: string) => number,
    label: string
  ): number {
    const value = process.env[key];
    if (!value) return defaultValue;

    const name = options.fieldName || key;
    const parsed = parse(value);
    if (Number.isNaN(parsed)) {
      console.warn(`Invalid ${label} value "${value}" for ${name}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.min !== undefined && parsed < options.min) {
      console.warn(`Value ${parsed} for ${name} is below minimum ${options.min}, using default ${defaultValue}`);
      return defaultValue;
    }

    if (options.max !== undefined && parsed > options.max) {
      console.warn(`Value ${parsed} for ${name} is above maximum ${options.max}, using default ${defaultValue}`);
      return defaultValue;
    }

    return parsed;
  }
}
