/**
 * Configuration utilities for parsing, transformation, and standardization
 */

import { z } from 'zod';

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

export const isTimeUnit = (value: string): value is TimeUnit => value in TIME_UNITS;

/**
 * Readable time constants for use in configuration defaults
 */
export const TIME = {
  MILLISECOND: TIME_UNITS.ms,
  SECOND: TIME_UNITS.s,
  MINUTE: TIME_UNITS.m,
  HOUR: TIME_UNITS.h,
} as const;

export type DurationString = `${number}${TimeUnit}`;

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse duration string to milliseconds
   * @param duration Duration string like "5ms", "1m30s", "2s"; bare numbers are milliseconds
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      if (!Number.isFinite(duration) || duration < 0) {
        throw new Error(`Invalid duration value: ${duration}`);
      }
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    if (/^\d+$/.test(durationStr)) {
      return parseInt(durationStr, 10);
    }

    let totalMs = 0;
    let consumed = '';

    for (const match of durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g)) {
      const [token, valueStr, unit] = match;
      if (!valueStr || !unit) {
        throw new Error(`Invalid duration format: ${duration}`);
      }
      if (!isTimeUnit(unit)) {
        const validUnits = Object.keys(TIME_UNITS).join(', ');
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${validUnits}`);
      }

      totalMs += parseFloat(valueStr) * TIME_UNITS[unit];
      consumed += token;
    }

    if (consumed.replace(/\s/g, '') !== durationStr.replace(/\s/g, '') || consumed === '') {
      throw new Error(`Invalid duration format: ${duration}. Expected format like "5ms", "1m30s"`);
    }

    return Math.floor(totalMs);
  }

  /**
   * Process environment variable substitution in configuration
   */
  static processEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (ConfigUtils.isPlainObject(value)) {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = ConfigUtils.processEnvVars(item, env);
      }
      return result;
    }

    return value;
  }

  /**
   * Substitute `${VAR}` and `${VAR:-default}` placeholders
   */
  static substituteEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName}`);
    });
  }

  /**
   * Overlay `<PREFIX>_<SECTION>__<KEY>` environment variables onto a raw config.
   * `BROKERLINK_SENDER__MAX_OUTSTANDING=50` sets `sender.max_outstanding`.
   */
  static applyEnvOverrides(
    raw: Record<string, unknown>,
    prefix: string,
    env: NodeJS.ProcessEnv = process.env
  ): Record<string, unknown> {
    const result = ConfigUtils.deepClone(raw);
    const lead = `${prefix.toUpperCase()}_`;

    for (const [name, value] of Object.entries(env)) {
      if (value === undefined || !name.startsWith(lead)) continue;

      const path = name
        .slice(lead.length)
        .split('__')
        .map(segment => segment.toLowerCase());
      ConfigUtils.setPath(result, path, ConfigUtils.coerceScalar(value));
    }

    return result;
  }

  static isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  /**
   * Create a Zod transformer for duration values
   * @returns Zod transformer that parses duration strings to milliseconds
   */
  static durationTransformer() {
    return z.union([z.string(), z.number()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseDuration(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });
  }

  private static coerceScalar(value: string): string | number | boolean {
    if (value === 'true') return true;
    if (value === 'false') return false;
    if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
    return value;
  }

  private static setPath(target: Record<string, unknown>, path: string[], value: unknown): void {
    let cursor = target;
    path.forEach((segment, index) => {
      if (index === path.length - 1) {
        cursor[segment] = value;
        return;
      }
      const next = cursor[segment];
      if (ConfigUtils.isPlainObject(next)) {
        cursor = next;
      } else {
        const created: Record<string, unknown> = {};
        cursor[segment] = created;
        cursor = created;
      }
    });
  }

  private static deepClone(value: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = ConfigUtils.isPlainObject(item) ? ConfigUtils.deepClone(item) : item;
    }
    return result;
  }
}
