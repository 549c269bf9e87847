/**
 * Error Module Exports
 * @module errors
 */

export {
  GenericErrorCodes,
  ParserErrorCodes,
  AnalysisErrorCodes,
  ScoringErrorCodes,
  ConfigErrorCodes,
  ErrorCodes,
  isErrorCode,
} from './codes';

export type {
  GenericErrorCode,
  ParserErrorCode,
  AnalysisErrorCode,
  ScoringErrorCode,
  ConfigErrorCode,
  ErrorCode,
} from './codes';

export {
  BaseError,
  isBaseError,
  isOperationalError,
  hasErrorCode,
  wrapError,
  getErrorMessage,
  getSystemErrorCode,
} from './base';

export type { ErrorContext, SerializedError } from './base';

export {
  RepositoryPathError,
  CIConfigParseError,
  ConfigFileNotFoundError,
  InvariantViolationError,
  ScoreValidationError,
  ConfigurationError,
} from './domain';
