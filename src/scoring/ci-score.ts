/**
 * CI Score Calculation
 * @module scoring/ci-score
 *
 * Rule-based CI score in [0, 13]: points for test steps, for coverage
 * reporting and for spreading tests over several jobs.
 */

import { detectCoverageTools } from '../matchers/coverage-tool-matcher';
import {
  CIScorePoints,
  CoverageTool,
  MAX_CI_SCORE,
  MULTIPLE_JOBS_THRESHOLD,
  TestStepInfo,
} from '../types/ci-config';

// ============================================================================
// Types
// ============================================================================

/**
 * Facts the CI score is computed from
 */
export interface CIScoreInputs {
  readonly hasTestSteps: boolean;
  readonly hasCoverage: boolean;
  readonly testJobCount: number;
}

/**
 * Per-rule contributions of a CI score
 */
export interface CIScoreBreakdown {
  readonly testStepPoints: number;
  readonly coveragePoints: number;
  readonly multipleJobPoints: number;
  readonly total: number;
}

/**
 * Score of a single parsed platform, used to pick the winner
 */
export interface PlatformScore extends CIScoreBreakdown {
  readonly testJobCount: number;
  readonly coverageTools: readonly CoverageTool[];
  readonly hasCoverageFlag: boolean;
}

// ============================================================================
// Functions
// ============================================================================

export function explainCIScore(inputs: CIScoreInputs): CIScoreBreakdown {
  const testStepPoints = inputs.hasTestSteps ? CIScorePoints.TEST_STEPS : 0;
  const coveragePoints = inputs.hasCoverage ? CIScorePoints.COVERAGE : 0;
  const multipleJobPoints = inputs.testJobCount >= MULTIPLE_JOBS_THRESHOLD
    ? CIScorePoints.MULTIPLE_JOBS
    : 0;

  return {
    testStepPoints,
    coveragePoints,
    multipleJobPoints,
    total: Math.min(testStepPoints + coveragePoints + multipleJobPoints, MAX_CI_SCORE),
  };
}

export function calculateCIScore(inputs: CIScoreInputs): number {
  return explainCIScore(inputs).total;
}

/**
 * Number of distinct job names among the steps
 */
export function countDistinctJobs(steps: readonly TestStepInfo[]): number {
  return new Set(steps.map(step => step.jobName)).size;
}

/**
 * Score one platform from its own steps and candidate commands
 */
export function scorePlatform(
  steps: readonly TestStepInfo[],
  commands: readonly string[]
): PlatformScore {
  const testJobCount = countDistinctJobs(steps);
  const coverageTools = detectCoverageTools(commands);
  const hasCoverageFlag = steps.some(step => step.hasCoverageFlag);

  const breakdown = explainCIScore({
    hasTestSteps: steps.length > 0,
    hasCoverage: coverageTools.length > 0 || hasCoverageFlag,
    testJobCount,
  });

  return {
    ...breakdown,
    testJobCount,
    coverageTools,
    hasCoverageFlag,
  };
}
