/**
 * CI Configuration Type Definitions
 * @module types/ci-config
 *
 * Value types for CI configuration analysis and the two-phase Testing
 * dimension score. Every value is built through a `create*` factory that
 * checks its invariants and returns a frozen object; a violation raises
 * InvariantViolationError.
 */

import { InvariantViolationError } from '../errors/domain';

// ============================================================================
// Enumerations
// ============================================================================

/**
 * Supported CI platforms, in the fixed evaluation order used for
 * deterministic tie-breaking.
 */
export const CI_PLATFORMS = [
  'github_actions',
  'gitlab_ci',
  'circleci',
  'travis_ci',
  'jenkins',
] as const;

export type CIPlatform = typeof CI_PLATFORMS[number];

export const TEST_FRAMEWORKS = ['pytest', 'jest', 'junit', 'go_test'] as const;

export type TestFramework = typeof TEST_FRAMEWORKS[number];

export const COVERAGE_TOOLS = ['codecov', 'coveralls', 'sonarqube'] as const;

export type CoverageTool = typeof COVERAGE_TOOLS[number];

/**
 * Recorded in coverageTools when coverage was established only through a
 * command-line flag such as `--cov`.
 */
export const COVERAGE_FLAG_MARKER = 'coverage_flag';

export type CoverageSource = CoverageTool | typeof COVERAGE_FLAG_MARKER;

export function isCIPlatform(value: unknown): value is CIPlatform {
  return typeof value === 'string' && CI_PLATFORMS.some(p => p === value);
}

export function isTestFramework(value: unknown): value is TestFramework {
  return typeof value === 'string' && TEST_FRAMEWORKS.some(f => f === value);
}

export function isCoverageSource(value: unknown): value is CoverageSource {
  return value === COVERAGE_FLAG_MARKER ||
    (typeof value === 'string' && COVERAGE_TOOLS.some(t => t === value));
}

// ============================================================================
// Score Constants
// ============================================================================

export const CIScorePoints = {
  TEST_STEPS: 5,
  COVERAGE: 5,
  MULTIPLE_JOBS: 3,
} as const;

/** Distinct test jobs needed for the multiple-jobs bonus */
export const MULTIPLE_JOBS_THRESHOLD = 2;

export const MAX_CI_SCORE = 13;

export const MAX_STATIC_SCORE = 25;

/** Ceiling for the combined Testing dimension score */
export const TESTING_DIMENSION_CAP = 35;

// ============================================================================
// Value Types
// ============================================================================

/**
 * One test-related step found in a CI configuration file
 */
export interface TestStepInfo {
  readonly jobName: string;
  readonly command: string;
  readonly framework: TestFramework | null;
  readonly hasCoverageFlag: boolean;
}

/**
 * Outcome of CI configuration analysis for one repository
 */
export interface CIConfigResult {
  readonly platform: CIPlatform | null;
  /** Path relative to the repository root, posix separators */
  readonly configFilePath: string | null;
  readonly hasTestSteps: boolean;
  readonly testCommands: readonly string[];
  readonly hasCoverageUpload: boolean;
  readonly coverageTools: readonly CoverageSource[];
  readonly testJobCount: number;
  readonly calculatedScore: number;
  readonly parseErrors: readonly string[];
}

/**
 * Audit record of how the static and CI phases combine
 */
export interface ScoreBreakdown {
  readonly phase1Contribution: number;
  readonly phase2Contribution: number;
  readonly rawTotal: number;
  readonly cappedTotal: number;
  readonly truncatedPoints: number;
}

/**
 * Anything exposing a phase 1 score
 */
export interface StaticScoreSource {
  readonly calculatedScore: number;
}

/**
 * Static test infrastructure analysis result (phase 1)
 */
export interface StaticInfrastructureResult extends StaticScoreSource {
  readonly testFilesDetected: number;
  readonly testConfigDetected: boolean;
  readonly coverageConfigDetected: boolean;
  /** Test files / total source files */
  readonly testFileRatio: number;
  readonly inferredFramework: string | null;
}

/**
 * Combined Testing dimension analysis
 */
export interface TestAnalysis<S extends StaticScoreSource = StaticInfrastructureResult> {
  readonly staticInfrastructure: S;
  readonly ciConfiguration: CIConfigResult | null;
  readonly combinedScore: number;
  readonly scoreBreakdown: ScoreBreakdown;
}

// ============================================================================
// Validation Helpers
// ============================================================================

function isIntInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

function assertValid(model: string, violations: string[]): void {
  if (violations.length > 0) {
    throw new InvariantViolationError(model, violations);
  }
}

// ============================================================================
// Factories
// ============================================================================

export function createTestStepInfo(params: TestStepInfo): TestStepInfo {
  const violations: string[] = [];

  if (params.jobName.length === 0) {
    violations.push('jobName must be non-empty');
  }
  if (params.command.length === 0) {
    violations.push('command must be non-empty');
  }
  if (params.framework !== null && !isTestFramework(params.framework)) {
    violations.push(`framework must be null or one of ${TEST_FRAMEWORKS.join(', ')}, got ${String(params.framework)}`);
  }

  assertValid('TestStepInfo', violations);

  return Object.freeze({
    jobName: params.jobName,
    command: params.command,
    framework: params.framework,
    hasCoverageFlag: params.hasCoverageFlag,
  });
}

export function createCIConfigResult(params: CIConfigResult): CIConfigResult {
  const violations: string[] = [];

  if (!isIntInRange(params.calculatedScore, 0, MAX_CI_SCORE)) {
    violations.push(`calculatedScore must be an integer in [0, ${MAX_CI_SCORE}], got ${params.calculatedScore}`);
  }
  if (params.platform !== null && !isCIPlatform(params.platform)) {
    violations.push(`platform must be null or one of ${CI_PLATFORMS.join(', ')}, got ${String(params.platform)}`);
  }
  if (params.platform === null && params.configFilePath !== null) {
    violations.push('configFilePath must be null when platform is null');
  }
  if (params.platform !== null && params.configFilePath === null) {
    violations.push('configFilePath is required when platform is set');
  }
  if (!Number.isInteger(params.testJobCount) || params.testJobCount < 0) {
    violations.push(`testJobCount must be a non-negative integer, got ${params.testJobCount}`);
  }
  if (params.hasTestSteps !== (params.testCommands.length > 0)) {
    violations.push(
      params.hasTestSteps
        ? 'hasTestSteps is true but testCommands is empty'
        : 'hasTestSteps is false but testCommands is non-empty'
    );
  }
  if (params.hasCoverageUpload !== (params.coverageTools.length > 0)) {
    violations.push(
      params.hasCoverageUpload
        ? 'hasCoverageUpload is true but coverageTools is empty'
        : 'hasCoverageUpload is false but coverageTools is non-empty'
    );
  }
  if (new Set(params.coverageTools).size !== params.coverageTools.length) {
    violations.push('coverageTools must not contain duplicates');
  }

  assertValid('CIConfigResult', violations);

  return Object.freeze({
    platform: params.platform,
    configFilePath: params.configFilePath,
    hasTestSteps: params.hasTestSteps,
    testCommands: Object.freeze([...params.testCommands]),
    hasCoverageUpload: params.hasCoverageUpload,
    coverageTools: Object.freeze([...params.coverageTools]),
    testJobCount: params.testJobCount,
    calculatedScore: params.calculatedScore,
    parseErrors: Object.freeze([...params.parseErrors]),
  });
}

/**
 * Result for a repository with no CI configuration at all
 */
export function emptyCIConfigResult(): CIConfigResult {
  return createCIConfigResult({
    platform: null,
    configFilePath: null,
    hasTestSteps: false,
    testCommands: [],
    hasCoverageUpload: false,
    coverageTools: [],
    testJobCount: 0,
    calculatedScore: 0,
    parseErrors: [],
  });
}

export function createScoreBreakdown(params: ScoreBreakdown): ScoreBreakdown {
  const violations: string[] = [];
  const { phase1Contribution, phase2Contribution, rawTotal, cappedTotal, truncatedPoints } = params;

  if (!isIntInRange(phase1Contribution, 0, MAX_STATIC_SCORE)) {
    violations.push(`phase1Contribution must be in [0, ${MAX_STATIC_SCORE}], got ${phase1Contribution}`);
  }
  if (!isIntInRange(phase2Contribution, 0, MAX_CI_SCORE)) {
    violations.push(`phase2Contribution must be in [0, ${MAX_CI_SCORE}], got ${phase2Contribution}`);
  }
  if (rawTotal !== phase1Contribution + phase2Contribution) {
    violations.push(
      `rawTotal must equal phase1 + phase2 (${phase1Contribution} + ${phase2Contribution} = ` +
      `${phase1Contribution + phase2Contribution}), got ${rawTotal}`
    );
  }
  const expectedCapped = Math.min(rawTotal, TESTING_DIMENSION_CAP);
  if (cappedTotal !== expectedCapped) {
    violations.push(`cappedTotal must equal min(rawTotal, ${TESTING_DIMENSION_CAP}) = ${expectedCapped}, got ${cappedTotal}`);
  }
  if (truncatedPoints !== rawTotal - cappedTotal) {
    violations.push(
      `truncatedPoints must equal rawTotal - cappedTotal (${rawTotal} - ${cappedTotal} = ` +
      `${rawTotal - cappedTotal}), got ${truncatedPoints}`
    );
  }
  if (truncatedPoints < 0) {
    violations.push(`truncatedPoints must be >= 0, got ${truncatedPoints}`);
  }

  assertValid('ScoreBreakdown', violations);

  return Object.freeze({ phase1Contribution, phase2Contribution, rawTotal, cappedTotal, truncatedPoints });
}

export function createStaticInfrastructureResult(
  params: StaticInfrastructureResult
): StaticInfrastructureResult {
  const violations: string[] = [];

  if (!Number.isInteger(params.testFilesDetected) || params.testFilesDetected < 0) {
    violations.push(`testFilesDetected must be a non-negative integer, got ${params.testFilesDetected}`);
  }
  if (!(params.testFileRatio >= 0 && params.testFileRatio <= 1)) {
    violations.push(`testFileRatio must be in [0, 1], got ${params.testFileRatio}`);
  }
  if (!isIntInRange(params.calculatedScore, 0, MAX_STATIC_SCORE)) {
    violations.push(`calculatedScore must be an integer in [0, ${MAX_STATIC_SCORE}], got ${params.calculatedScore}`);
  }

  assertValid('StaticInfrastructureResult', violations);

  return Object.freeze({
    testFilesDetected: params.testFilesDetected,
    testConfigDetected: params.testConfigDetected,
    coverageConfigDetected: params.coverageConfigDetected,
    testFileRatio: params.testFileRatio,
    calculatedScore: params.calculatedScore,
    inferredFramework: params.inferredFramework,
  });
}

export function createTestAnalysis<S extends StaticScoreSource>(
  params: TestAnalysis<S>
): TestAnalysis<S> {
  const violations: string[] = [];
  const phase1 = params.staticInfrastructure.calculatedScore;
  const phase2 = params.ciConfiguration ? params.ciConfiguration.calculatedScore : 0;
  const expected = Math.min(phase1 + phase2, TESTING_DIMENSION_CAP);

  if (params.combinedScore !== expected) {
    violations.push(
      `combinedScore must equal min(${phase1} + ${phase2}, ${TESTING_DIMENSION_CAP}) = ${expected}, ` +
      `got ${params.combinedScore}`
    );
  }
  if (!isIntInRange(params.combinedScore, 0, TESTING_DIMENSION_CAP)) {
    violations.push(`combinedScore must be in [0, ${TESTING_DIMENSION_CAP}], got ${params.combinedScore}`);
  }
  if (params.combinedScore !== params.scoreBreakdown.cappedTotal) {
    violations.push(
      `combinedScore (${params.combinedScore}) must match scoreBreakdown.cappedTotal ` +
      `(${params.scoreBreakdown.cappedTotal})`
    );
  }
  if (params.scoreBreakdown.phase1Contribution !== phase1) {
    violations.push(
      `scoreBreakdown.phase1Contribution (${params.scoreBreakdown.phase1Contribution}) must match ` +
      `staticInfrastructure.calculatedScore (${phase1})`
    );
  }
  if (params.scoreBreakdown.phase2Contribution !== phase2) {
    violations.push(
      `scoreBreakdown.phase2Contribution (${params.scoreBreakdown.phase2Contribution}) must match ` +
      `ciConfiguration.calculatedScore (${phase2})`
    );
  }

  assertValid('TestAnalysis', violations);

  return Object.freeze({
    staticInfrastructure: params.staticInfrastructure,
    ciConfiguration: params.ciConfiguration,
    combinedScore: params.combinedScore,
    scoreBreakdown: params.scoreBreakdown,
  });
}
