/**
 * Command Pattern Matchers
 * @module matchers
 */

export {
  TEST_COMMAND_PATTERNS,
  COVERAGE_FLAGS,
  isTestCommand,
  inferFramework,
  hasCoverageFlag,
  extractTestCommands,
} from './test-command-matcher';

export {
  matchCoverageTools,
  detectCoverageTools,
  hasCoverageUpload,
} from './coverage-tool-matcher';
