/**
 * CI Score Tests
 * @module tests/scoring/ci-score.test
 */

import { describe, it, expect } from 'vitest';
import {
  calculateCIScore,
  countDistinctJobs,
  explainCIScore,
  scorePlatform,
} from '../../src/scoring/ci-score';
import { createTestStepInfo, TestStepInfo } from '../../src/types/ci-config';

function step(jobName: string, command: string, hasCoverageFlag = false): TestStepInfo {
  return createTestStepInfo({ jobName, command, framework: null, hasCoverageFlag });
}

describe('calculateCIScore', () => {
  it.each([
    [{ hasTestSteps: false, hasCoverage: false, testJobCount: 0 }, 0],
    [{ hasTestSteps: true, hasCoverage: false, testJobCount: 1 }, 5],
    [{ hasTestSteps: true, hasCoverage: true, testJobCount: 1 }, 10],
    [{ hasTestSteps: true, hasCoverage: false, testJobCount: 2 }, 8],
    [{ hasTestSteps: true, hasCoverage: true, testJobCount: 3 }, 13],
    [{ hasTestSteps: false, hasCoverage: true, testJobCount: 0 }, 5],
  ])('scores %o as %i', (inputs, expected) => {
    expect(calculateCIScore(inputs)).toBe(expected);
  });
});

describe('explainCIScore', () => {
  it('reports each rule', () => {
    expect(explainCIScore({ hasTestSteps: true, hasCoverage: false, testJobCount: 2 })).toEqual({
      testStepPoints: 5,
      coveragePoints: 0,
      multipleJobPoints: 3,
      total: 8,
    });
  });
});

describe('countDistinctJobs', () => {
  it('counts unique job names', () => {
    expect(countDistinctJobs([step('a', 'pytest'), step('a', 'go test'), step('b', 'npm test')])).toBe(2);
    expect(countDistinctJobs([])).toBe(0);
  });
});

describe('scorePlatform', () => {
  it('counts coverage tools among the commands', () => {
    const score = scorePlatform([step('unit', 'pytest')], ['pytest', 'codecov upload']);

    expect(score).toEqual({
      testStepPoints: 5,
      coveragePoints: 5,
      multipleJobPoints: 0,
      total: 10,
      testJobCount: 1,
      coverageTools: ['codecov'],
      hasCoverageFlag: false,
    });
  });

  it('counts a step coverage flag as coverage', () => {
    const score = scorePlatform([step('unit', 'pytest --cov', true)], ['pytest --cov']);

    expect(score.coveragePoints).toBe(5);
    expect(score.coverageTools).toEqual([]);
    expect(score.hasCoverageFlag).toBe(true);
  });

  it('awards nothing for an empty platform', () => {
    expect(scorePlatform([], ['make build']).total).toBe(0);
  });
});
