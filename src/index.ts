/**
 * CI Test Evidence Analyzer
 * @module ci-test-evidence
 *
 * Main entry point. Detects the CI platforms configured in a repository,
 * extracts test and coverage evidence from their configuration files and
 * turns it into a CI score that is combined with a static infrastructure
 * score into the Testing dimension.
 *
 * @example
 * ```typescript
 * import { createCIConfigAnalyzer, buildTestAnalysis, toTestAnalysisRecord } from 'ci-test-evidence';
 *
 * const analyzer = createCIConfigAnalyzer();
 * const ci = await analyzer.analyze('/path/to/repo');
 *
 * const analysis = buildTestAnalysis(staticInfrastructure, ci);
 * console.log(toTestAnalysisRecord(analysis));
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export * from './types';

// ============================================================================
// Errors
// ============================================================================

export * from './errors';

// ============================================================================
// Configuration & Logging
// ============================================================================

export * from './config';
export * from './logging';

// ============================================================================
// Analysis
// ============================================================================

export * from './matchers';
export * from './parsers';
export * from './detectors';
export * from './scoring';
export * from './services';
