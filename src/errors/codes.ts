/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the CI test evidence analyzer.
 * Codes are grouped by concern so callers can branch on them without
 * string matching on messages.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Generic error codes
 */
export const GenericErrorCodes = {
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
} as const;

export type GenericErrorCode = typeof GenericErrorCodes[keyof typeof GenericErrorCodes];

/**
 * Parser Error Codes
 */
export const ParserErrorCodes = {
  PARSE_ERROR: 'PARSE_ERROR',
  INVALID_YAML: 'INVALID_YAML',
  INVALID_STRUCTURE: 'INVALID_STRUCTURE',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  FILE_READ_ERROR: 'FILE_READ_ERROR',
} as const;

export type ParserErrorCode = typeof ParserErrorCodes[keyof typeof ParserErrorCodes];

/**
 * Analysis Error Codes
 */
export const AnalysisErrorCodes = {
  REPOSITORY_NOT_FOUND: 'REPOSITORY_NOT_FOUND',
  REPOSITORY_NOT_DIRECTORY: 'REPOSITORY_NOT_DIRECTORY',
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
} as const;

export type AnalysisErrorCode = typeof AnalysisErrorCodes[keyof typeof AnalysisErrorCodes];

/**
 * Scoring Error Codes
 */
export const ScoringErrorCodes = {
  SCORE_OUT_OF_RANGE: 'SCORE_OUT_OF_RANGE',
  SCORE_CALCULATION_ERROR: 'SCORE_CALCULATION_ERROR',
} as const;

export type ScoringErrorCode = typeof ScoringErrorCodes[keyof typeof ScoringErrorCodes];

/**
 * Configuration Error Codes
 */
export const ConfigErrorCodes = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_NOT_LOADED: 'CONFIG_NOT_LOADED',
  CONFIG_SOURCE_ERROR: 'CONFIG_SOURCE_ERROR',
} as const;

export type ConfigErrorCode = typeof ConfigErrorCodes[keyof typeof ConfigErrorCodes];

// ============================================================================
// Combined Error Code Type
// ============================================================================

/**
 * All error codes in the system
 */
export const ErrorCodes = {
  ...GenericErrorCodes,
  ...ParserErrorCodes,
  ...AnalysisErrorCodes,
  ...ScoringErrorCodes,
  ...ConfigErrorCodes,
} as const;

export type ErrorCode =
  | GenericErrorCode
  | ParserErrorCode
  | AnalysisErrorCode
  | ScoringErrorCode
  | ConfigErrorCode;

/**
 * Check if a string is a known error code
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.values<string>(ErrorCodes).includes(value);
}
