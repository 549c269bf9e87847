/**
 * Base Parser Infrastructure
 * @module parsers/base/parser
 *
 * Foundational interface and base class for the CI configuration parsers.
 * Every parser reads one configuration file and reports one of three
 * outcomes: parsed, malformed or not found.
 */

import { promises as fs } from 'fs';
import { CIConfigParseError } from '../../errors/domain';
import { getErrorMessage, getSystemErrorCode } from '../../errors/base';
import { ParserErrorCodes } from '../../errors/codes';
import { createModuleLogger, StructuredLogger } from '../../logging/logger';
import { DEFAULT_ANALYSIS_CONFIG } from '../../config/schema';
import type { CIPlatform, TestStepInfo } from '../../types/ci-config';

// ============================================================================
// Parse Outcome Types
// ============================================================================

/**
 * What a parser extracts from a well-formed file
 */
export interface ParsedCIConfig {
  /** Test steps in document, job, step order */
  readonly steps: readonly TestStepInfo[];
  /** Every command or action reference seen, for coverage tool detection */
  readonly commands: readonly string[];
}

/**
 * Metadata about the parsing operation
 */
export interface ParseMetadata {
  /** File path that was parsed */
  readonly filePath: string;
  /** Parser name that produced this result */
  readonly parserName: string;
  /** Parser version */
  readonly parserVersion: string;
  /** Time taken to parse in milliseconds */
  readonly parseTimeMs: number;
  /** File size in bytes (content length when parsing a string) */
  readonly fileSize: number;
}

export interface ParsedOutcome extends ParsedCIConfig {
  readonly status: 'parsed';
  readonly metadata: ParseMetadata;
}

export interface MalformedOutcome {
  readonly status: 'malformed';
  readonly reason: string;
  readonly error: CIConfigParseError;
  readonly metadata: ParseMetadata;
}

export interface NotFoundOutcome {
  readonly status: 'not_found';
  readonly filePath: string;
  readonly metadata: ParseMetadata;
}

/**
 * Outcome of parsing one CI configuration file.
 * Discriminated on `status`.
 */
export type CIParseOutcome = ParsedOutcome | MalformedOutcome | NotFoundOutcome;

// ============================================================================
// Parser Interface
// ============================================================================

/**
 * Parser options
 */
export interface CIParserOptions {
  /** Maximum file size in bytes (default: 1MB) */
  maxFileSize?: number;
  /** File encoding (default: utf-8) */
  encoding?: BufferEncoding;
  /** Soft per-file budget in milliseconds; overruns are logged (default: 1000) */
  parseBudgetMs?: number;
  /** Logger receiving parser events (default: module logger) */
  logger?: StructuredLogger;
}

type ResolvedParserOptions = Required<CIParserOptions>;

/**
 * Common contract of the five platform parsers.
 * Implementations hold no per-call state.
 */
export interface CIConfigParser {
  /** Unique parser identifier */
  readonly name: string;
  /** Semantic version of the parser */
  readonly version: string;
  /** Platform whose configuration this parser reads */
  readonly platform: CIPlatform;

  /**
   * Parse configuration content already in memory
   */
  parse(content: string, filePath: string): Promise<CIParseOutcome>;

  /**
   * Read and parse a configuration file
   */
  parseFile(filePath: string): Promise<CIParseOutcome>;
}

// ============================================================================
// Base Parser Abstract Class
// ============================================================================

/**
 * Abstract base class providing file handling, timing and outcome
 * construction. Subclasses implement `doParse` and throw
 * CIConfigParseError for malformed content.
 */
export abstract class BaseCIParser implements CIConfigParser {
  abstract readonly name: string;
  abstract readonly version: string;
  abstract readonly platform: CIPlatform;

  protected readonly options: ResolvedParserOptions;

  constructor(options: CIParserOptions = {}) {
    this.options = {
      maxFileSize: options.maxFileSize ?? DEFAULT_ANALYSIS_CONFIG.maxConfigFileSize,
      encoding: options.encoding ?? DEFAULT_ANALYSIS_CONFIG.encoding,
      parseBudgetMs: options.parseBudgetMs ?? DEFAULT_ANALYSIS_CONFIG.parseBudgetMs,
      logger: options.logger ?? createModuleLogger('ci-parsers'),
    };
  }

  protected get logger(): StructuredLogger {
    return this.options.logger;
  }

  /**
   * Parse configuration content.
   * Template method that handles timing and error mapping, and delegates to doParse.
   */
  async parse(content: string, filePath: string): Promise<CIParseOutcome> {
    const startTime = performance.now();
    const size = Buffer.byteLength(content, this.options.encoding);

    if (size > this.options.maxFileSize) {
      return this.createMalformed(
        CIConfigParseError.fileTooLarge(filePath, size, this.options.maxFileSize),
        this.createMetadata(filePath, startTime, size)
      );
    }

    this.logger.parserStarted(this.name, filePath);

    try {
      const parsed = await this.doParse(content, filePath);
      const outcome = this.createParsed(parsed, this.createMetadata(filePath, startTime, size));
      this.reportTiming(outcome);
      return outcome;
    } catch (error) {
      if (error instanceof CIConfigParseError) {
        return this.createMalformed(error, this.createMetadata(filePath, startTime, size));
      }
      throw error;
    }
  }

  /**
   * Parse file directly from filesystem
   */
  async parseFile(filePath: string): Promise<CIParseOutcome> {
    const startTime = performance.now();

    let size: number;
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        return this.createMalformed(
          new CIConfigParseError(
            `Not a regular file: ${filePath}`,
            filePath,
            ParserErrorCodes.FILE_READ_ERROR
          ),
          this.createMetadata(filePath, startTime, 0)
        );
      }
      size = stats.size;
    } catch (error) {
      return this.fileErrorOutcome(error, filePath, startTime);
    }

    if (size > this.options.maxFileSize) {
      return this.createMalformed(
        CIConfigParseError.fileTooLarge(filePath, size, this.options.maxFileSize),
        this.createMetadata(filePath, startTime, size)
      );
    }

    let content: string;
    try {
      content = await fs.readFile(filePath, { encoding: this.options.encoding });
    } catch (error) {
      return this.fileErrorOutcome(error, filePath, startTime);
    }

    return this.parse(content, filePath);
  }

  // ============================================================================
  // Abstract Methods - Must be implemented by subclasses
  // ============================================================================

  /**
   * Perform the actual extraction. Throw CIConfigParseError for content
   * that cannot be interpreted.
   */
  protected abstract doParse(content: string, filePath: string): Promise<ParsedCIConfig>;

  // ============================================================================
  // Protected Helper Methods
  // ============================================================================

  protected createParsed(parsed: ParsedCIConfig, metadata: ParseMetadata): ParsedOutcome {
    return {
      status: 'parsed',
      steps: parsed.steps,
      commands: parsed.commands,
      metadata,
    };
  }

  protected createMalformed(error: CIConfigParseError, metadata: ParseMetadata): MalformedOutcome {
    this.logger.parserFailed(this.name, metadata.filePath, error);
    return {
      status: 'malformed',
      reason: error.message,
      error,
      metadata,
    };
  }

  protected createNotFound(filePath: string, metadata: ParseMetadata): NotFoundOutcome {
    return {
      status: 'not_found',
      filePath,
      metadata,
    };
  }

  protected createMetadata(filePath: string, startTime: number, fileSize: number): ParseMetadata {
    return {
      filePath,
      parserName: this.name,
      parserVersion: this.version,
      parseTimeMs: performance.now() - startTime,
      fileSize,
    };
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  private reportTiming(outcome: ParsedOutcome): void {
    const { filePath, parseTimeMs } = outcome.metadata;
    const duration = Math.round(parseTimeMs);

    this.logger.parserCompleted(this.name, filePath, duration, outcome.steps.length);

    if (parseTimeMs > this.options.parseBudgetMs) {
      this.logger.parserSlow(this.name, filePath, duration, this.options.parseBudgetMs);
    }
  }

  private fileErrorOutcome(error: unknown, filePath: string, startTime: number): CIParseOutcome {
    const metadata = this.createMetadata(filePath, startTime, 0);

    if (getSystemErrorCode(error) === 'ENOENT') {
      return this.createNotFound(filePath, metadata);
    }

    return this.createMalformed(
      new CIConfigParseError(
        `Cannot read ${filePath}: ${getErrorMessage(error)}`,
        filePath,
        ParserErrorCodes.FILE_READ_ERROR,
        undefined,
        { cause: error instanceof Error ? error : undefined }
      ),
      metadata
    );
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isParsedOutcome(outcome: CIParseOutcome): outcome is ParsedOutcome {
  return outcome.status === 'parsed';
}

export function isMalformedOutcome(outcome: CIParseOutcome): outcome is MalformedOutcome {
  return outcome.status === 'malformed';
}

export function isNotFoundOutcome(outcome: CIParseOutcome): outcome is NotFoundOutcome {
  return outcome.status === 'not_found';
}
