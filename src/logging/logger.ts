/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Provides structured logging with Pino for the CI test evidence analyzer.
 * Includes domain-specific logging methods for analysis runs, platform
 * detection and configuration parsers.
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';
import { getSystemErrorCode } from '../errors/base';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  analysisId?: string;
  repoPath?: string;
  platform?: string;
  operation?: string;
  module?: string;
  service?: string;
  version?: string;
  environment?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Options accepted by createLogger
 */
export interface CreateLoggerOptions extends Partial<LoggerConfig> {
  /** Explicit destination stream; bypasses the pretty transport */
  destination?: DestinationStream;
}

// ============================================================================
// Default Configuration
// ============================================================================

const DEFAULT_REDACT_PATHS: readonly string[] = [
  'password',
  'token',
  'authorization',
  'apiKey',
  'api_key',
  'secret',
  'secretKey',
  'secret_key',
  'accessToken',
  'access_token',
  'privateKey',
  'private_key',
];

function defaultConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true',
    redact: [...DEFAULT_REDACT_PATHS],
    service: 'ci-test-evidence',
    version: process.env.APP_VERSION || '1.0.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

// ============================================================================
// Redaction Utilities
// ============================================================================

/**
 * Expands redaction paths so nested keys are covered too
 */
function createRedactionPaths(paths: readonly string[]): string[] {
  const expandedPaths: string[] = [];

  for (const path of paths) {
    expandedPaths.push(path);
    expandedPaths.push(`*.${path}`);
    expandedPaths.push(`[*].${path}`);
  }

  return expandedPaths;
}

// ============================================================================
// Structured Logger
// ============================================================================

/**
 * Pino logger with domain-specific event methods.
 * The underlying pino instance stays reachable through `pino`.
 */
export class StructuredLogger {
  constructor(public readonly pino: Logger) {}

  get level(): string {
    return this.pino.level;
  }

  child(bindings: LogContext): StructuredLogger {
    return new StructuredLogger(this.pino.child(bindings));
  }

  withContext(context: LogContext): StructuredLogger {
    return this.child(context);
  }

  // Plain levels
  trace(obj: object, msg?: string): void {
    this.pino.trace(obj, msg);
  }

  debug(obj: object, msg?: string): void {
    this.pino.debug(obj, msg);
  }

  info(obj: object, msg?: string): void {
    this.pino.info(obj, msg);
  }

  warn(obj: object, msg?: string): void {
    this.pino.warn(obj, msg);
  }

  error(obj: object, msg?: string): void {
    this.pino.error(obj, msg);
  }

  // Analysis lifecycle

  analysisStarted(repoPath: string): void {
    this.info(
      {
        event: 'analysis_started',
        repoPath,
      },
      `CI analysis started for ${repoPath}`
    );
  }

  analysisCompleted(
    repoPath: string,
    duration: number,
    platform: string | null,
    score: number,
    parseErrorCount = 0
  ): void {
    this.info(
      {
        event: 'analysis_completed',
        repoPath,
        durationMs: duration,
        platform,
        score,
        parseErrorCount,
      },
      platform
        ? `CI analysis completed: ${platform} scored ${score} in ${duration}ms`
        : `CI analysis completed: no CI platform detected (${duration}ms)`
    );
  }

  platformDetected(platform: string, configPath: string): void {
    this.debug(
      {
        event: 'platform_detected',
        platform,
        configPath,
      },
      `Detected ${platform} configuration at ${configPath}`
    );
  }

  // Parser methods

  parserStarted(parser: string, filePath: string): void {
    this.debug(
      {
        event: 'parser_started',
        parser,
        filePath,
      },
      `Parser ${parser} started for ${filePath}`
    );
  }

  parserCompleted(parser: string, filePath: string, duration: number, stepCount?: number): void {
    this.debug(
      {
        event: 'parser_completed',
        parser,
        filePath,
        durationMs: duration,
        stepCount,
      },
      `Parser ${parser} completed in ${duration}ms${stepCount !== undefined ? ` (${stepCount} test steps)` : ''}`
    );
  }

  parserFailed(parser: string, filePath: string, error: Error): void {
    this.warn(
      {
        event: 'parser_failed',
        parser,
        filePath,
        err: error,
        errorCode: getSystemErrorCode(error),
      },
      `Parser ${parser} failed for ${filePath}: ${error.message}`
    );
  }

  parserSlow(parser: string, filePath: string, duration: number, budget: number): void {
    this.warn(
      {
        event: 'parser_slow',
        parser,
        filePath,
        durationMs: duration,
        budgetMs: budget,
      },
      `Parser ${parser} took ${duration}ms for ${filePath} (budget ${budget}ms)`
    );
  }

  // Performance

  performanceMetric(operation: string, duration: number, metadata?: Record<string, unknown>): void {
    this.debug(
      {
        event: 'performance_metric',
        operation,
        durationMs: duration,
        ...metadata,
      },
      `${operation}: ${duration}ms`
    );
  }
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(
  name: string,
  baseContext?: LogContext,
  overrides: CreateLoggerOptions = {}
): StructuredLogger {
  const { destination: explicitDestination, ...configOverrides } = overrides;
  const config: LoggerConfig = { ...defaultConfig(), ...configOverrides };

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        name: bindings.name,
      }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined = explicitDestination;

  if (!destination && config.pretty && config.environment !== 'production') {
    try {
      destination = pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          messageFormat: '{msg}',
        },
      });
    } catch {
      // pino-pretty not installed; fall back to JSON on stdout
      destination = undefined;
    }
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return new StructuredLogger(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

const ROOT_LOGGER_NAME = 'ci-test-evidence';

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger(ROOT_LOGGER_NAME);
  }
  return rootLogger;
}

/**
 * Initializes the root logger with custom configuration
 */
export function initLogger(context?: LogContext, overrides?: CreateLoggerOptions): StructuredLogger {
  rootLogger = createLogger(ROOT_LOGGER_NAME, context, overrides);
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().child({ module: moduleName });
}

/**
 * Wraps an async function with timing and logging
 */
export function withLogging<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();

  return fn()
    .then((result) => {
      logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
      return result;
    })
    .catch((error: unknown) => {
      logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
      throw error;
    });
}
