/**
 * Scoring Module Exports
 * @module scoring
 */

export {
  explainCIScore,
  calculateCIScore,
  countDistinctJobs,
  scorePlatform,
  type CIScoreInputs,
  type CIScoreBreakdown,
  type PlatformScore,
} from './ci-score';

export {
  combineScores,
  buildTestAnalysis,
} from './score-combiner';
