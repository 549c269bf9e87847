/**
 * Type Definitions
 * @module types
 */

export {
  CI_PLATFORMS,
  TEST_FRAMEWORKS,
  COVERAGE_TOOLS,
  COVERAGE_FLAG_MARKER,
  CIScorePoints,
  MULTIPLE_JOBS_THRESHOLD,
  MAX_CI_SCORE,
  MAX_STATIC_SCORE,
  TESTING_DIMENSION_CAP,
  isCIPlatform,
  isTestFramework,
  isCoverageSource,
  createTestStepInfo,
  createCIConfigResult,
  emptyCIConfigResult,
  createScoreBreakdown,
  createStaticInfrastructureResult,
  createTestAnalysis,
} from './ci-config';

export type {
  CIPlatform,
  TestFramework,
  CoverageTool,
  CoverageSource,
  TestStepInfo,
  CIConfigResult,
  ScoreBreakdown,
  StaticScoreSource,
  StaticInfrastructureResult,
  TestAnalysis,
} from './ci-config';

export {
  CIPlatformSchema,
  CoverageSourceSchema,
  CIConfigRecordSchema,
  ScoreBreakdownRecordSchema,
  StaticInfrastructureRecordSchema,
  StaticScoreRecordSchema,
  TestAnalysisRecordSchema,
} from './ci-config-contract';

export type {
  CIConfigRecord,
  ScoreBreakdownRecord,
  StaticInfrastructureRecord,
  TestAnalysisRecord,
} from './ci-config-contract';

export {
  toCIConfigRecord,
  toScoreBreakdownRecord,
  toStaticInfrastructureRecord,
  toStaticScoreRecord,
  toTestAnalysisRecord,
  fromCIConfigRecord,
} from './ci-config-mappers';
