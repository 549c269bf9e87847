/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating application configuration.
 * Provides type-safe configuration with compile-time type inference.
 */

import { z } from 'zod';

// ============================================================================
// Environment Enum
// ============================================================================

/**
 * Valid application environments
 */
export const Environment = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  /** Log level */
  level: LogLevel.default('info'),
  /** Enable pretty printing (ignored in production) */
  pretty: z.boolean().default(false),
  /** Fields to redact from logs */
  redact: z.array(z.string()).default([
    'password',
    'token',
    'secret',
    'apiKey',
    'privateKey',
    'accessToken',
    'authorization',
  ]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Analysis Configuration
// ============================================================================

/**
 * Text encodings accepted when reading CI configuration files
 */
export const ConfigFileEncoding = z.enum(['utf-8', 'utf8', 'latin1', 'ascii']);
export type ConfigFileEncoding = z.infer<typeof ConfigFileEncoding>;

/**
 * CI configuration analysis settings
 */
export const AnalysisConfigSchema = z.object({
  /** Largest CI configuration file that will be read, in bytes */
  maxConfigFileSize: z.coerce.number().int().min(1024).max(50 * 1024 * 1024).default(1024 * 1024),
  /** Soft per-file parse budget; exceeding it is logged, never enforced */
  parseBudgetMs: z.coerce.number().int().min(1).max(60000).default(1000),
  /** Encoding used to read configuration files */
  encoding: ConfigFileEncoding.default('utf-8'),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

// ============================================================================
// Complete Application Configuration
// ============================================================================

/**
 * Complete application configuration schema
 */
export const AppConfigSchema = z.object({
  /** Environment name */
  env: Environment.default('development'),
  /** Application version */
  version: z.string().default('1.0.0'),
  /** Logging configuration */
  logging: LoggingConfigSchema.default({}),
  /** CI analysis configuration */
  analysis: AnalysisConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// ============================================================================
// Partial Configuration Types
// ============================================================================

/**
 * Unvalidated configuration fragment produced by a single source.
 * Fragments are merged and then validated against AppConfigSchema.
 */
export type ConfigFragment = Record<string, unknown>;

/**
 * Default analysis settings, used when no configuration is supplied
 */
export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = AnalysisConfigSchema.parse({});
