/**
 * Testing Dimension Score Combiner
 * @module scoring/score-combiner
 *
 * Folds the static infrastructure score (phase 1, [0, 25]) and the CI
 * score (phase 2, [0, 13]) into one Testing dimension score capped at 35.
 * The points lost to the cap are kept in the breakdown.
 */

import { ScoreValidationError } from '../errors/domain';
import {
  CIConfigResult,
  MAX_CI_SCORE,
  MAX_STATIC_SCORE,
  ScoreBreakdown,
  StaticScoreSource,
  TESTING_DIMENSION_CAP,
  TestAnalysis,
  createScoreBreakdown,
  createTestAnalysis,
} from '../types/ci-config';

function assertScore(field: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ScoreValidationError(field, value, `an integer in [0, ${max}]`);
  }
}

/**
 * Combine the two phase scores into an audited breakdown
 *
 * @throws ScoreValidationError when a phase score is out of range
 */
export function combineScores(phase1Score: number, phase2Score: number): ScoreBreakdown {
  assertScore('phase1Score', phase1Score, MAX_STATIC_SCORE);
  assertScore('phase2Score', phase2Score, MAX_CI_SCORE);

  const rawTotal = phase1Score + phase2Score;
  const cappedTotal = Math.min(rawTotal, TESTING_DIMENSION_CAP);

  return createScoreBreakdown({
    phase1Contribution: phase1Score,
    phase2Contribution: phase2Score,
    rawTotal,
    cappedTotal,
    truncatedPoints: rawTotal - cappedTotal,
  });
}

/**
 * Build the Testing dimension analysis. A missing CI result contributes 0.
 */
export function buildTestAnalysis<S extends StaticScoreSource>(
  staticInfrastructure: S,
  ciConfiguration: CIConfigResult | null
): TestAnalysis<S> {
  const scoreBreakdown = combineScores(
    staticInfrastructure.calculatedScore,
    ciConfiguration ? ciConfiguration.calculatedScore : 0
  );

  return createTestAnalysis({
    staticInfrastructure,
    ciConfiguration,
    combinedScore: scoreBreakdown.cappedTotal,
    scoreBreakdown,
  });
}
