/**
 * Configuration utilities for parsing and merging settings
 */

/**
 * Time units and their millisecond multipliers
 */
const TIME_UNITS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
} as const;

export type TimeUnit = keyof typeof TIME_UNITS;

/**
 * Readable time constants for use in configuration defaults
 */
export const TIME = {
  MILLISECOND: TIME_UNITS.ms,
  SECOND: TIME_UNITS.s,
  MINUTE: TIME_UNITS.m,
  HOUR: TIME_UNITS.h,
} as const;

export const isTimeUnit = (value: string): value is TimeUnit =>
  Object.keys(TIME_UNITS).includes(value);

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * One partial layer of a settings object; keys may be missing or undefined
 */
export type OptionalLayer<T> = { [K in keyof T]?: T[K] | undefined };

export class ConfigUtils {
  /**
   * Parse a duration to milliseconds
   * @param duration Number of milliseconds, or a string like "250ms", "2s", "1m30s"
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    if (/^\d+(\.\d+)?$/.test(durationStr)) {
      return Math.floor(parseFloat(durationStr));
    }

    if (!/^(\d+(\.\d+)?\s*[a-z]+\s*)+$/.test(durationStr)) {
      throw new Error(`Invalid duration format: ${duration}. Expected format like "250ms", "2s"`);
    }

    let totalMs = 0;
    for (const match of durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g)) {
      const [, valueStr, unit] = match;
      if (valueStr === undefined || unit === undefined) {
        throw new Error(`Invalid duration format: ${duration}`);
      }

      if (!isTimeUnit(unit)) {
        const validUnits = Object.keys(TIME_UNITS).join(', ');
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${validUnits}`);
      }

      totalMs += parseFloat(valueStr) * TIME_UNITS[unit];
    }

    return Math.floor(totalMs);
  }

  /**
   * Substitute `${VAR}` and `${VAR:-default}` placeholders in a string
   */
  static substituteEnvVars(str: string, env: Environment = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      return match;
    });
  }

  /**
   * Apply environment substitution to every string in a parsed document
   */
  static processEnvVars(value: unknown, env: Environment = process.env): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (value && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(item, env);
      }
      return result;
    }

    return value;
  }

  /**
   * Shallow-merge option layers; later layers win and undefined values are skipped
   */
  static mergeConfigs<T extends object>(target: T, ...sources: (OptionalLayer<T> | undefined)[]): T {
    const result: T = { ...target };

    for (const source of sources) {
      if (!source) {
        continue;
      }
      for (const key of Object.keys(source) as (keyof T)[]) {
        const value = source[key];
        if (value !== undefined) {
          result[key] = value as T[keyof T];
        }
      }
    }

    return result;
  }
}
