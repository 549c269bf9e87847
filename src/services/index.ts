/**
 * Services Module Exports
 * @module services
 */

// CI Config Analyzer - detection, parsing and platform selection
export {
  CIConfigAnalyzer,
  createCIConfigAnalyzer,
  createAnalyzerFromConfig,
  parserOptionsFromConfig,
  analyzeCIConfig,
  type CIConfigAnalyzerOptions,
  type CIAnalysisEvidence,
  type PlatformEvaluation,
  type PlatformEvaluationStatus,
} from './ci-config-analyzer';
