/**
 * CI Configuration Analyzer
 * @module services/ci-config-analyzer
 *
 * Detects the CI platforms configured in a repository, parses each one,
 * picks the best scoring platform and aggregates its evidence into a
 * CIConfigResult. Parser failures never abort the analysis; they are
 * reported in `parseErrors`.
 */

import { promises as fs } from 'fs';
import { getErrorMessage, getSystemErrorCode } from '../errors/base';
import { ConfigFileNotFoundError, RepositoryPathError } from '../errors/domain';
import { createLogger, createModuleLogger, StructuredLogger, withLogging } from '../logging/logger';
import type { AnalysisConfig, AppConfig } from '../config/schema';
import { detectPlatforms, DetectedPlatform } from '../detectors/platform-detector';
import { detectCoverageTools } from '../matchers/coverage-tool-matcher';
import {
  CIParserRegistry,
  CIParseOutcome,
  CIParserOptions,
  ParsedOutcome,
  createParserRegistry,
} from '../parsers';
import { calculateCIScore, countDistinctJobs, scorePlatform, PlatformScore } from '../scoring/ci-score';
import {
  CIConfigResult,
  CIPlatform,
  COVERAGE_FLAG_MARKER,
  CoverageSource,
  TestFramework,
  createCIConfigResult,
  emptyCIConfigResult,
} from '../types/ci-config';

// ============================================================================
// Types
// ============================================================================

/**
 * Analyzer construction options
 */
export interface CIConfigAnalyzerOptions {
  /** Parser per platform (default: createParserRegistry(parserOptions)) */
  parsers?: CIParserRegistry;
  /** Options handed to the default parsers */
  parserOptions?: CIParserOptions;
  /** Logger receiving analysis events */
  logger?: StructuredLogger;
}

export type PlatformEvaluationStatus = CIParseOutcome['status'] | 'error';

/**
 * How one detected platform fared
 */
export interface PlatformEvaluation {
  readonly platform: CIPlatform;
  /** Repository-relative configuration path */
  readonly configFilePath: string;
  readonly status: PlatformEvaluationStatus;
  readonly stepCount: number;
  /** Null unless the file parsed */
  readonly score: PlatformScore | null;
  /** Failure reason, null when the file parsed */
  readonly reason: string | null;
}

/**
 * Analysis result plus the evidence it was derived from
 */
export interface CIAnalysisEvidence {
  readonly result: CIConfigResult;
  /** One entry per detected platform, in fixed platform order */
  readonly platformEvaluations: readonly PlatformEvaluation[];
  /** Distinct frameworks of the winning platform's steps */
  readonly frameworks: readonly TestFramework[];
}

interface ParsedPlatform {
  readonly detected: DetectedPlatform;
  readonly outcome: ParsedOutcome;
  readonly score: PlatformScore;
}

interface FailedPlatform {
  readonly detected: DetectedPlatform;
  readonly status: Exclude<PlatformEvaluationStatus, 'parsed'>;
  readonly reason: string;
}

type PlatformAttempt =
  | ({ readonly ok: true } & ParsedPlatform)
  | ({ readonly ok: false } & FailedPlatform);

// ============================================================================
// Analyzer
// ============================================================================

export class CIConfigAnalyzer {
  private readonly parsers: CIParserRegistry;
  private readonly logger: StructuredLogger;

  constructor(options: CIConfigAnalyzerOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('ci-config-analyzer');
    this.parsers = options.parsers ?? createParserRegistry({
      logger: this.logger,
      ...options.parserOptions,
    });
  }

  /**
   * Analyze the CI configuration of a repository.
   *
   * @throws RepositoryPathError when the path is missing or not a directory
   */
  async analyze(repoPath: string): Promise<CIConfigResult> {
    const { result } = await this.analyzeWithEvidence(repoPath);
    return result;
  }

  /**
   * Analyze and also return the per-platform evaluations.
   *
   * @throws RepositoryPathError when the path is missing or not a directory
   */
  async analyzeWithEvidence(repoPath: string): Promise<CIAnalysisEvidence> {
    const startTime = Date.now();
    await this.assertRepository(repoPath);

    this.logger.analysisStarted(repoPath);

    const detected = await withLogging(this.logger, 'detect_platforms', () => detectPlatforms(repoPath));
    for (const entry of detected) {
      this.logger.platformDetected(entry.platform, entry.relativePath);
    }

    // Outcomes keep detection order regardless of completion order
    const attempts = await Promise.all(detected.map(entry => this.attempt(entry)));

    const evidence = this.aggregate(detected, attempts);

    this.logger.analysisCompleted(
      repoPath,
      Date.now() - startTime,
      evidence.result.platform,
      evidence.result.calculatedScore,
      evidence.result.parseErrors.length
    );

    return evidence;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async assertRepository(repoPath: string): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await fs.stat(repoPath)).isDirectory();
    } catch (error) {
      const code = getSystemErrorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw RepositoryPathError.notFound(repoPath, error instanceof Error ? error : undefined);
      }
      throw error;
    }

    if (!isDirectory) {
      throw RepositoryPathError.notDirectory(repoPath);
    }
  }

  private async attempt(detected: DetectedPlatform): Promise<PlatformAttempt> {
    if (detected.probeError !== null) {
      const reason = `cannot read ${detected.relativePath}: ${detected.probeError}`;
      this.logger.error(
        {
          event: 'config_unreadable',
          platform: detected.platform,
          filePath: detected.relativePath,
        },
        reason
      );
      return { ok: false, detected, status: 'error', reason };
    }

    const parser = this.parsers[detected.platform];

    let outcome: CIParseOutcome;
    try {
      outcome = await parser.parseFile(detected.configPath);
    } catch (error) {
      this.logger.error(
        {
          event: 'parser_error',
          platform: detected.platform,
          filePath: detected.relativePath,
          err: error,
        },
        `Unexpected error parsing ${detected.relativePath}`
      );
      return { ok: false, detected, status: 'error', reason: getErrorMessage(error) };
    }

    switch (outcome.status) {
      case 'parsed':
        return {
          ok: true,
          detected,
          outcome,
          score: scorePlatform(outcome.steps, outcome.commands),
        };
      case 'malformed':
        return { ok: false, detected, status: 'malformed', reason: outcome.reason };
      case 'not_found': {
        // Detected a moment ago, so the file vanished mid-analysis
        const error = new ConfigFileNotFoundError(detected.relativePath);
        this.logger.error(
          {
            event: 'config_vanished',
            platform: detected.platform,
            filePath: detected.relativePath,
            err: error,
          },
          error.message
        );
        return { ok: false, detected, status: 'not_found', reason: error.message };
      }
    }
  }

  private aggregate(
    detected: readonly DetectedPlatform[],
    attempts: readonly PlatformAttempt[]
  ): CIAnalysisEvidence {
    const platformEvaluations = attempts.map(toEvaluation);

    for (const evaluation of platformEvaluations) {
      this.logger.debug(
        {
          event: 'platform_evaluated',
          platform: evaluation.platform,
          status: evaluation.status,
          stepCount: evaluation.stepCount,
          score: evaluation.score?.total ?? null,
        },
        `Evaluated ${evaluation.platform}: ${evaluation.status}`
      );
    }

    const parsed: ParsedPlatform[] = [];
    const parseErrors: string[] = [];
    for (const attempt of attempts) {
      if (attempt.ok) {
        parsed.push(attempt);
      } else {
        parseErrors.push(`${attempt.detected.platform}: ${attempt.reason}`);
      }
    }

    const [firstDetected] = detected;
    if (firstDetected === undefined) {
      return { result: emptyCIConfigResult(), platformEvaluations, frameworks: [] };
    }

    const winner = selectWinner(parsed);
    if (winner === null) {
      return {
        result: createCIConfigResult({
          platform: firstDetected.platform,
          configFilePath: firstDetected.relativePath,
          hasTestSteps: false,
          testCommands: [],
          hasCoverageUpload: false,
          coverageTools: [],
          testJobCount: 0,
          calculatedScore: 0,
          parseErrors,
        }),
        platformEvaluations,
        frameworks: [],
      };
    }

    const { steps } = winner.outcome;
    const coverageTools = aggregateCoverage(parsed, winner);
    const testJobCount = countDistinctJobs(steps);

    const result = createCIConfigResult({
      platform: winner.detected.platform,
      configFilePath: winner.detected.relativePath,
      hasTestSteps: steps.length > 0,
      testCommands: steps.map(step => step.command),
      hasCoverageUpload: coverageTools.length > 0,
      coverageTools,
      testJobCount,
      calculatedScore: calculateCIScore({
        hasTestSteps: steps.length > 0,
        hasCoverage: coverageTools.length > 0,
        testJobCount,
      }),
      parseErrors,
    });

    return { result, platformEvaluations, frameworks: collectFrameworks(winner) };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toEvaluation(attempt: PlatformAttempt): PlatformEvaluation {
  if (attempt.ok) {
    return {
      platform: attempt.detected.platform,
      configFilePath: attempt.detected.relativePath,
      status: 'parsed',
      stepCount: attempt.outcome.steps.length,
      score: attempt.score,
      reason: null,
    };
  }

  return {
    platform: attempt.detected.platform,
    configFilePath: attempt.detected.relativePath,
    status: attempt.status,
    stepCount: 0,
    score: null,
    reason: attempt.reason,
  };
}

/**
 * Highest per-platform score. On a tie a platform with test steps beats
 * one without; otherwise the earliest platform wins.
 */
function selectWinner(parsed: readonly ParsedPlatform[]): ParsedPlatform | null {
  let winner: ParsedPlatform | null = null;
  for (const candidate of parsed) {
    if (winner === null || outranks(candidate.score, winner.score)) {
      winner = candidate;
    }
  }
  return winner;
}

function outranks(candidate: PlatformScore, current: PlatformScore): boolean {
  if (candidate.total !== current.total) {
    return candidate.total > current.total;
  }
  return candidate.testStepPoints > current.testStepPoints;
}

/**
 * Upload tools across every parsed platform. A coverage flag on the
 * winner's steps counts when no tool matched.
 */
function aggregateCoverage(
  parsed: readonly ParsedPlatform[],
  winner: ParsedPlatform
): CoverageSource[] {
  const tools: CoverageSource[] = detectCoverageTools(
    parsed.flatMap(entry => entry.outcome.commands)
  );

  if (tools.length === 0 && winner.score.hasCoverageFlag) {
    tools.push(COVERAGE_FLAG_MARKER);
  }

  return tools;
}

function collectFrameworks(winner: ParsedPlatform): TestFramework[] {
  const frameworks = new Set<TestFramework>();
  for (const step of winner.outcome.steps) {
    if (step.framework !== null) {
      frameworks.add(step.framework);
    }
  }
  return [...frameworks];
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCIConfigAnalyzer(options?: CIConfigAnalyzerOptions): CIConfigAnalyzer {
  return new CIConfigAnalyzer(options);
}

/**
 * Parser options derived from the `analysis` configuration section
 */
export function parserOptionsFromConfig(analysis: AnalysisConfig): CIParserOptions {
  return {
    maxFileSize: analysis.maxConfigFileSize,
    parseBudgetMs: analysis.parseBudgetMs,
    encoding: analysis.encoding,
  };
}

/**
 * Analyzer configured from a loaded application configuration. Without an
 * explicit logger one is built from the `logging` section.
 */
export function createAnalyzerFromConfig(
  config: AppConfig,
  logger?: StructuredLogger
): CIConfigAnalyzer {
  return new CIConfigAnalyzer({
    parserOptions: parserOptionsFromConfig(config.analysis),
    logger: logger ?? createLogger('ci-config-analyzer', undefined, {
      level: config.logging.level,
      pretty: config.logging.pretty,
      redact: config.logging.redact,
      version: config.version,
      environment: config.env,
    }),
  });
}

/**
 * Analyze a repository with a one-off analyzer
 */
export async function analyzeCIConfig(
  repoPath: string,
  options?: CIConfigAnalyzerOptions
): Promise<CIConfigResult> {
  return new CIConfigAnalyzer(options).analyze(repoPath);
}
