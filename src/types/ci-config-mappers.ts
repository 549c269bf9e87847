/**
 * CI Analysis Record Mappers
 * @module types/ci-config-mappers
 *
 * Mapper functions converting analysis values into the serialized
 * snake_case contract, and back.
 */

import {
  CIConfigResult,
  ScoreBreakdown,
  StaticInfrastructureResult,
  StaticScoreSource,
  TestAnalysis,
  createCIConfigResult,
} from './ci-config';
import {
  CIConfigRecord,
  CIConfigRecordSchema,
  ScoreBreakdownRecord,
  StaticInfrastructureRecord,
  TestAnalysisRecord,
} from './ci-config-contract';

// ============================================================================
// Value to Record Mappers
// ============================================================================

export function toCIConfigRecord(result: CIConfigResult): CIConfigRecord {
  return {
    platform: result.platform,
    config_file_path: result.configFilePath,
    has_test_steps: result.hasTestSteps,
    test_commands: [...result.testCommands],
    has_coverage_upload: result.hasCoverageUpload,
    coverage_tools: [...result.coverageTools],
    test_job_count: result.testJobCount,
    calculated_score: result.calculatedScore,
    parse_errors: [...result.parseErrors],
  };
}

export function toScoreBreakdownRecord(breakdown: ScoreBreakdown): ScoreBreakdownRecord {
  return {
    phase1_contribution: breakdown.phase1Contribution,
    phase2_contribution: breakdown.phase2Contribution,
    raw_total: breakdown.rawTotal,
    capped_total: breakdown.cappedTotal,
    truncated_points: breakdown.truncatedPoints,
  };
}

export function toStaticInfrastructureRecord(
  result: StaticInfrastructureResult
): StaticInfrastructureRecord {
  return {
    test_files_detected: result.testFilesDetected,
    test_config_detected: result.testConfigDetected,
    coverage_config_detected: result.coverageConfigDetected,
    test_file_ratio: result.testFileRatio,
    calculated_score: result.calculatedScore,
    inferred_framework: result.inferredFramework,
  };
}

function isStaticInfrastructureResult(
  value: StaticScoreSource
): value is StaticInfrastructureResult {
  return 'testFilesDetected' in value &&
    'testConfigDetected' in value &&
    'coverageConfigDetected' in value &&
    'testFileRatio' in value &&
    'inferredFramework' in value;
}

/**
 * Serializes a phase 1 value. Values that only expose a score are
 * reduced to `{ calculated_score }`.
 */
export function toStaticScoreRecord(
  source: StaticScoreSource
): TestAnalysisRecord['static_infrastructure'] {
  if (isStaticInfrastructureResult(source)) {
    return toStaticInfrastructureRecord(source);
  }
  return { calculated_score: source.calculatedScore };
}

export function toTestAnalysisRecord<S extends StaticScoreSource>(
  analysis: TestAnalysis<S>,
  serializeStatic: (source: S) => TestAnalysisRecord['static_infrastructure'] = toStaticScoreRecord
): TestAnalysisRecord {
  return {
    static_infrastructure: serializeStatic(analysis.staticInfrastructure),
    ci_configuration: analysis.ciConfiguration ? toCIConfigRecord(analysis.ciConfiguration) : null,
    combined_score: analysis.combinedScore,
    score_breakdown: toScoreBreakdownRecord(analysis.scoreBreakdown),
  };
}

// ============================================================================
// Record to Value Mappers
// ============================================================================

/**
 * Validates an untrusted record and rebuilds the CIConfigResult.
 * Throws ZodError on shape errors and InvariantViolationError on
 * inconsistent fields.
 */
export function fromCIConfigRecord(input: unknown): CIConfigResult {
  const record = CIConfigRecordSchema.parse(input);

  return createCIConfigResult({
    platform: record.platform,
    configFilePath: record.config_file_path,
    hasTestSteps: record.has_test_steps,
    testCommands: record.test_commands,
    hasCoverageUpload: record.has_coverage_upload,
    coverageTools: record.coverage_tools,
    testJobCount: record.test_job_count,
    calculatedScore: record.calculated_score,
    parseErrors: record.parse_errors,
  });
}
