/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation and caching.
 */

import { z } from 'zod';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { AppConfig, AppConfigSchema, ConfigFragment } from './schema';
import { BaseError, getErrorMessage } from '../errors/base';
import { ConfigErrorCodes } from '../errors/codes';
import { ConfigurationError } from '../errors/domain';
import { createLogger } from '../logging/logger';

const logger = createLogger('config-loader');

// ============================================================================
// Helpers
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function parseBooleanFlag(value: string | undefined): boolean | undefined {
  return value === undefined ? undefined : value === 'true';
}

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  /** Unique name for the source */
  name: string;
  /** Priority level (higher = overrides lower) */
  priority: number;
  /** Load configuration from this source */
  load(): Promise<ConfigFragment>;
  /** Whether this source is available */
  isAvailable(): boolean;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

/**
 * Environment variable configuration source.
 * Numbers stay as strings here; the schema coerces them.
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<ConfigFragment> {
    const env = this.env;

    return this.filterUndefined({
      env: env.NODE_ENV,
      version: env.APP_VERSION,
      logging: {
        level: env.LOG_LEVEL,
        pretty: parseBooleanFlag(env.LOG_PRETTY),
        redact: env.LOG_REDACT ? env.LOG_REDACT.split(',').map(s => s.trim()) : undefined,
      },
      analysis: {
        maxConfigFileSize: env.CI_ANALYSIS_MAX_FILE_SIZE,
        parseBudgetMs: env.CI_ANALYSIS_PARSE_BUDGET_MS,
        encoding: env.CI_ANALYSIS_ENCODING,
      },
    });
  }

  /**
   * Recursively remove undefined values from an object
   */
  private filterUndefined(obj: Record<string, unknown>): ConfigFragment {
    const result: ConfigFragment = {};

    for (const [key, value] of Object.entries(obj)) {
      if (value === undefined) {
        continue;
      }
      if (isRecord(value)) {
        const filtered = this.filterUndefined(value);
        if (Object.keys(filtered).length > 0) {
          result[key] = filtered;
        }
      } else {
        result[key] = value;
      }
    }

    return result;
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * JSON file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<ConfigFragment> {
    if (!this.isAvailable()) {
      logger.debug({ filePath: this.filePath }, 'Config file not found, skipping');
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      logger.error({ err: error, filePath: this.filePath }, 'Failed to load config file');
      throw new ConfigurationError(
        `file:${this.filePath}`,
        `Failed to load configuration file: ${getErrorMessage(error)}`,
        ConfigErrorCodes.CONFIG_SOURCE_ERROR
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(
        `file:${this.filePath}`,
        'Configuration file must contain a JSON object',
        ConfigErrorCodes.CONFIG_SOURCE_ERROR
      );
    }

    logger.debug({ filePath: this.filePath }, 'Loaded config from file');
    return parsed;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

/**
 * Configuration loader options
 */
export interface ConfigLoaderOptions {
  /** Throw on validation errors (default: true) */
  throwOnError?: boolean;
  /** Enable caching (default: true) */
  enableCache?: boolean;
  /** Custom config sources; defaults to config/config*.json plus the environment */
  sources?: ConfigSource[];
  /** Directory holding config.json files (default: <cwd>/config) */
  configDir?: string;
}

/**
 * Configuration validation error
 */
export class ConfigValidationError extends BaseError {
  public readonly errors: z.ZodError;

  constructor(zodError: z.ZodError) {
    const formattedErrors = zodError.errors.map(e => ({
      path: e.path.join('.'),
      message: e.message,
    }));

    super(
      `Configuration validation failed:\n${
        formattedErrors.map(e => `  - ${e.path}: ${e.message}`).join('\n')
      }`,
      ConfigErrorCodes.CONFIG_INVALID,
      { details: { issues: formattedErrors } },
      false
    );
    this.name = 'ConfigValidationError';
    this.errors = zodError;
  }
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private sources: ConfigSource[] = [];
  private config: AppConfig | null = null;
  private readonly options: Required<Omit<ConfigLoaderOptions, 'sources' | 'configDir'>>;

  constructor(options: ConfigLoaderOptions = {}) {
    this.options = {
      throwOnError: options.throwOnError ?? true,
      enableCache: options.enableCache ?? true,
    };

    if (options.sources && options.sources.length > 0) {
      this.sources = [...options.sources];
    } else {
      this.initializeDefaultSources(options.configDir ?? join(process.cwd(), 'config'));
    }

    this.sources.sort((a, b) => a.priority - b.priority);
  }

  private initializeDefaultSources(configDir: string): void {
    const nodeEnv = process.env.NODE_ENV ?? 'development';

    this.addSource(new FileConfigSource(join(configDir, 'config.json'), 5));
    this.addSource(new FileConfigSource(join(configDir, `config.${nodeEnv}.json`), 6));
    this.addSource(new EnvironmentConfigSource());
  }

  /**
   * Add a configuration source
   */
  addSource(source: ConfigSource): this {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
    this.invalidateCache();
    return this;
  }

  /**
   * Remove a configuration source by name
   */
  removeSource(name: string): this {
    this.sources = this.sources.filter(s => s.name !== name);
    this.invalidateCache();
    return this;
  }

  getSourceNames(): string[] {
    return this.sources.map(s => s.name);
  }

  /**
   * Load and validate configuration from all sources
   */
  async load(): Promise<AppConfig> {
    if (this.options.enableCache && this.config) {
      return this.config;
    }

    const merged: ConfigFragment = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        logger.debug({ source: source.name }, 'Config source not available, skipping');
        continue;
      }

      try {
        const partial = await source.load();
        this.deepMerge(merged, partial);
        logger.debug({ source: source.name }, 'Loaded config from source');
      } catch (error) {
        logger.error({ err: error, source: source.name }, 'Failed to load config from source');
        if (this.options.throwOnError) {
          throw error;
        }
      }
    }

    const result = AppConfigSchema.safeParse(merged);

    if (!result.success) {
      const validationError = new ConfigValidationError(result.error);
      logger.error({ errors: result.error.errors }, 'Configuration validation failed');

      if (this.options.throwOnError) {
        throw validationError;
      }

      // Fall back to defaults when not throwing
      this.config = AppConfigSchema.parse({});
      return this.config;
    }

    this.config = result.data;
    logger.debug({ env: this.config.env }, 'Configuration loaded successfully');

    return this.config;
  }

  /**
   * Get loaded configuration (throws if not loaded)
   */
  get(): AppConfig {
    if (!this.config) {
      throw ConfigurationError.notLoaded();
    }
    return this.config;
  }

  /**
   * Get a specific configuration value, validated by the given schema
   */
  getValue<T extends z.ZodTypeAny>(path: string, schema: T): z.infer<T> {
    let value: unknown = this.get();

    for (const part of path.split('.')) {
      if (!isRecord(value)) {
        throw new ConfigurationError(path, `Configuration path '${path}' not found`);
      }
      value = value[part];
    }

    const result = schema.safeParse(value);
    if (!result.success) {
      throw new ConfigurationError(
        path,
        `Invalid configuration at '${path}': ${result.error.message}`
      );
    }

    return result.data;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  invalidateCache(): void {
    this.config = null;
  }

  /**
   * Reload configuration from all sources
   */
  async reload(): Promise<AppConfig> {
    this.invalidateCache();
    return this.load();
  }

  /**
   * Deep merge two objects, with source overwriting target
   */
  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): void {
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = target[key];

      if (sourceValue === undefined) {
        continue;
      }

      if (isRecord(sourceValue) && isRecord(targetValue)) {
        this.deepMerge(targetValue, sourceValue);
      } else if (isRecord(sourceValue)) {
        const copy: Record<string, unknown> = {};
        this.deepMerge(copy, sourceValue);
        target[key] = copy;
      } else {
        target[key] = sourceValue;
      }
    }
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Create a config loader with default settings
 */
export function createConfigLoader(options?: ConfigLoaderOptions): ConfigLoader {
  return new ConfigLoader(options);
}

/**
 * Load configuration with a single call
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<AppConfig> {
  return createConfigLoader(options).load();
}

/**
 * Validate a configuration object without loading any source
 */
export function validateConfig(config: unknown): ReturnType<typeof AppConfigSchema.safeParse> {
  return AppConfigSchema.safeParse(config);
}
