/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Domain-specific error classes for CI configuration analysis and scoring.
 */

import { BaseError, ErrorContext } from './base';
import {
  AnalysisErrorCodes,
  ConfigErrorCodes,
  ErrorCode,
  ParserErrorCodes,
  ScoringErrorCodes,
} from './codes';

// ============================================================================
// Repository Errors
// ============================================================================

/**
 * Repository path missing or not a directory. Raised to the caller with no
 * partial result.
 */
export class RepositoryPathError extends BaseError {
  public readonly repoPath: string;

  constructor(
    repoPath: string,
    code: ErrorCode = AnalysisErrorCodes.REPOSITORY_NOT_FOUND,
    context: ErrorContext = {}
  ) {
    const reason = code === AnalysisErrorCodes.REPOSITORY_NOT_DIRECTORY
      ? 'is not a directory'
      : 'does not exist';
    super(`Repository path ${reason}: ${repoPath}`, code, { ...context, resource: repoPath }, true);
    this.name = 'RepositoryPathError';
    this.repoPath = repoPath;
  }

  static notFound(repoPath: string, cause?: Error): RepositoryPathError {
    return new RepositoryPathError(repoPath, AnalysisErrorCodes.REPOSITORY_NOT_FOUND, { cause });
  }

  static notDirectory(repoPath: string): RepositoryPathError {
    return new RepositoryPathError(repoPath, AnalysisErrorCodes.REPOSITORY_NOT_DIRECTORY);
  }
}

// ============================================================================
// Parser Errors
// ============================================================================

/**
 * Malformed CI configuration content
 */
export class CIConfigParseError extends BaseError {
  public readonly filePath: string;
  public readonly line?: number;

  constructor(
    message: string,
    filePath: string,
    code: ErrorCode = ParserErrorCodes.PARSE_ERROR,
    line?: number,
    context: ErrorContext = {}
  ) {
    super(message, code, { ...context, resource: filePath }, true);
    this.name = 'CIConfigParseError';
    this.filePath = filePath;
    this.line = line;
  }

  static invalidYaml(filePath: string, detail: string, line?: number): CIConfigParseError {
    const where = line !== undefined ? ` (line ${line})` : '';
    return new CIConfigParseError(
      `Invalid YAML in ${filePath}${where}: ${detail}`,
      filePath,
      ParserErrorCodes.INVALID_YAML,
      line
    );
  }

  static invalidStructure(filePath: string, detail: string): CIConfigParseError {
    return new CIConfigParseError(
      `Unexpected structure in ${filePath}: ${detail}`,
      filePath,
      ParserErrorCodes.INVALID_STRUCTURE
    );
  }

  static fileTooLarge(filePath: string, size: number, maxSize: number): CIConfigParseError {
    return new CIConfigParseError(
      `File size ${size} exceeds maximum ${maxSize} bytes: ${filePath}`,
      filePath,
      ParserErrorCodes.FILE_TOO_LARGE,
      undefined,
      { details: { size, maxSize } }
    );
  }
}

/**
 * CI configuration file vanished between detection and parsing.
 * Detection and dispatch should make this impossible.
 */
export class ConfigFileNotFoundError extends BaseError {
  public readonly filePath: string;

  constructor(filePath: string, context: ErrorContext = {}) {
    super(
      `CI config file not found: ${filePath}`,
      ParserErrorCodes.FILE_NOT_FOUND,
      { ...context, resource: filePath },
      false
    );
    this.name = 'ConfigFileNotFoundError';
    this.filePath = filePath;
  }
}

// ============================================================================
// Model Errors
// ============================================================================

/**
 * A result value was constructed with fields that contradict each other.
 * Always a programming error.
 */
export class InvariantViolationError extends BaseError {
  public readonly model: string;
  public readonly violations: readonly string[];

  constructor(model: string, violations: readonly string[], context: ErrorContext = {}) {
    super(
      `${model} invariant violated: ${violations.join('; ')}`,
      AnalysisErrorCodes.INVARIANT_VIOLATION,
      { ...context, details: { model, violations } },
      false
    );
    this.name = 'InvariantViolationError';
    this.model = model;
    this.violations = violations;
  }
}

/**
 * A score handed to the combiner is outside its documented range
 */
export class ScoreValidationError extends BaseError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, expected: string) {
    super(
      `${field} must be ${expected}, got ${String(value)}`,
      ScoringErrorCodes.SCORE_OUT_OF_RANGE,
      { details: { field, value, expected } },
      true
    );
    this.name = 'ScoreValidationError';
    this.field = field;
    this.value = value;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration missing, unreadable or not loaded
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;

  constructor(
    configKey: string,
    message?: string,
    code: ErrorCode = ConfigErrorCodes.CONFIG_INVALID,
    context: ErrorContext = {}
  ) {
    super(
      message ?? `Invalid or missing configuration: ${configKey}`,
      code,
      context,
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }

  static notLoaded(): ConfigurationError {
    return new ConfigurationError(
      'config',
      'Configuration not loaded. Call load() first.',
      ConfigErrorCodes.CONFIG_NOT_LOADED
    );
  }
}
