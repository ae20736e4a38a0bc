import { promises as fs } from 'fs';

import { BrokerLinkError } from '@brokerlink/errors';
import type { Logger } from '@brokerlink/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { TransportConfigSchema, type TransportConfig } from './schemas.js';
import { ConfigUtils } from './utils.js';

export * from './schemas.js';
export { ConfigUtils, TIME, isTimeUnit, type TimeUnit, type DurationString } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute `${VAR:-default}` placeholders in string values */
  enableEnvSubstitution?: boolean;
  /** Prefix for `<PREFIX>_<SECTION>__<KEY>` environment overrides */
  envPrefix?: string;
  /** Environment to read from; defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
}

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends BrokerLinkError {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message, 'CONFIG_VALIDATION');
  }

  /**
   * Get formatted error details
   */
  getFormattedErrors(): string[] {
    return this.errors.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
  }
}

/**
 * Validate a raw value against a schema, throwing `ConfigValidationError` on failure
 */
export function parseConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  source = 'configuration'
): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(`Configuration validation failed for ${source}`, result.error);
  }
  return result.data;
}

/**
 * Loads and validates a YAML configuration file
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    try {
      const content = await fs.readFile(this.configPath, 'utf8');
      const config = this.parse(content);
      this.logger?.info(`Configuration loaded from: ${this.configPath}`);
      return config;
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${error.message}`, error, {
          issues: error.getFormattedErrors(),
        });
      } else {
        this.logger?.error(`Failed to load configuration from ${this.configPath}`, error);
      }
      throw error;
    }
  }

  /**
   * Parse and validate YAML content as if it had been read from the config path
   */
  parse(content: string): T {
    let raw: unknown = yamlLoad(content) ?? {};

    if (this.options.enableEnvSubstitution) {
      raw = ConfigUtils.processEnvVars(raw, this.env);
    }

    if (this.options.envPrefix) {
      if (!ConfigUtils.isPlainObject(raw)) {
        throw new Error(`Configuration root must be a mapping: ${this.configPath}`);
      }
      raw = ConfigUtils.applyEnvOverrides(raw, this.options.envPrefix, this.env);
    }

    this.config = parseConfig(this.schema, raw, this.configPath);
    return this.config;
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

/**
 * Transport configuration from a YAML file, or built-in defaults plus
 * `BROKERLINK_*` environment overrides when no path is given
 */
export async function loadTransportConfig(
  configPath?: string,
  options: ConfigOptions = {}
): Promise<TransportConfig> {
  const envPrefix = options.envPrefix ?? 'BROKERLINK';

  if (configPath === undefined) {
    const raw = ConfigUtils.applyEnvOverrides({}, envPrefix, options.env ?? process.env);
    return parseConfig(TransportConfigSchema, raw, 'environment');
  }

  const manager = new ConfigManager(configPath, TransportConfigSchema, {
    enableEnvSubstitution: true,
    ...options,
    envPrefix,
  });
  return manager.loadConfig();
}
