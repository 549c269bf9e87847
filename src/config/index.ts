/**
 * Configuration Module
 * @module config
 */

export {
  Environment,
  LogLevel,
  LoggingConfigSchema,
  ConfigFileEncoding,
  AnalysisConfigSchema,
  AppConfigSchema,
  DEFAULT_ANALYSIS_CONFIG,
} from './schema';

export type {
  LoggingConfig,
  AnalysisConfig,
  AppConfig,
  ConfigFragment,
} from './schema';

export {
  EnvironmentConfigSource,
  FileConfigSource,
  ConfigLoader,
  ConfigValidationError,
  createConfigLoader,
  loadConfig,
  validateConfig,
} from './loader';

export type { ConfigSource, ConfigLoaderOptions } from './loader';
