/**
 * Serialized CI Analysis Contract
 * @module types/ci-config-contract
 *
 * Zod schemas for the snake_case records handed to downstream consumers.
 * Consumers can validate what they receive with `CIConfigRecordSchema.parse`.
 */

import { z } from 'zod';
import {
  CI_PLATFORMS,
  COVERAGE_FLAG_MARKER,
  COVERAGE_TOOLS,
  MAX_CI_SCORE,
  MAX_STATIC_SCORE,
  TESTING_DIMENSION_CAP,
} from './ci-config';

// ============================================================================
// Field Schemas
// ============================================================================

export const CIPlatformSchema = z.enum(CI_PLATFORMS);

export const CoverageSourceSchema = z.union([
  z.enum(COVERAGE_TOOLS),
  z.literal(COVERAGE_FLAG_MARKER),
]);

// ============================================================================
// Record Schemas
// ============================================================================

export const CIConfigRecordSchema = z.object({
  platform: CIPlatformSchema.nullable(),
  config_file_path: z.string().nullable(),
  has_test_steps: z.boolean(),
  test_commands: z.array(z.string()),
  has_coverage_upload: z.boolean(),
  coverage_tools: z.array(CoverageSourceSchema),
  test_job_count: z.number().int().min(0),
  calculated_score: z.number().int().min(0).max(MAX_CI_SCORE),
  parse_errors: z.array(z.string()),
}).strict();

export type CIConfigRecord = z.infer<typeof CIConfigRecordSchema>;

export const ScoreBreakdownRecordSchema = z.object({
  phase1_contribution: z.number().int().min(0).max(MAX_STATIC_SCORE),
  phase2_contribution: z.number().int().min(0).max(MAX_CI_SCORE),
  raw_total: z.number().int().min(0),
  capped_total: z.number().int().min(0).max(TESTING_DIMENSION_CAP),
  truncated_points: z.number().int().min(0),
}).strict();

export type ScoreBreakdownRecord = z.infer<typeof ScoreBreakdownRecordSchema>;

export const StaticInfrastructureRecordSchema = z.object({
  test_files_detected: z.number().int().min(0),
  test_config_detected: z.boolean(),
  coverage_config_detected: z.boolean(),
  test_file_ratio: z.number().min(0).max(1),
  calculated_score: z.number().int().min(0).max(MAX_STATIC_SCORE),
  inferred_framework: z.string().nullable(),
}).strict();

export type StaticInfrastructureRecord = z.infer<typeof StaticInfrastructureRecordSchema>;

/**
 * Phase 1 results from other producers only have to expose their score
 */
export const StaticScoreRecordSchema = z.object({
  calculated_score: z.number().int().min(0).max(MAX_STATIC_SCORE),
}).passthrough();

export const TestAnalysisRecordSchema = z.object({
  static_infrastructure: z.union([StaticInfrastructureRecordSchema, StaticScoreRecordSchema]),
  ci_configuration: CIConfigRecordSchema.nullable(),
  combined_score: z.number().int().min(0).max(TESTING_DIMENSION_CAP),
  score_breakdown: ScoreBreakdownRecordSchema,
}).strict();

export type TestAnalysisRecord = z.infer<typeof TestAnalysisRecordSchema>;
