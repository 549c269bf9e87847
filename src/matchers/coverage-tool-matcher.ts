/**
 * Coverage Tool Matcher
 * @module matchers/coverage-tool-matcher
 *
 * Detects coverage upload and reporting tools (Codecov, Coveralls,
 * SonarQube) in arbitrary CI commands and action references.
 */

import type { CoverageTool } from '../types/ci-config';

/**
 * Tool patterns in detection order. A command matches a tool when it
 * contains any of its fragments, ignoring case.
 */
const COVERAGE_TOOL_PATTERNS: ReadonlyArray<{ tool: CoverageTool; fragments: readonly string[] }> = [
  { tool: 'codecov', fragments: ['codecov'] },
  { tool: 'coveralls', fragments: ['coveralls'] },
  { tool: 'sonarqube', fragments: ['sonar-scanner', 'sonarqube'] },
];

/**
 * Tools used by a single command, in codecov, coveralls, sonarqube order
 */
export function matchCoverageTools(command: string): CoverageTool[] {
  const normalized = command.toLowerCase();
  if (normalized.length === 0) {
    return [];
  }

  return COVERAGE_TOOL_PATTERNS
    .filter(({ fragments }) => fragments.some(fragment => normalized.includes(fragment)))
    .map(({ tool }) => tool);
}

/**
 * Unique tools across all commands, in order of first detection
 */
export function detectCoverageTools(commands: Iterable<string>): CoverageTool[] {
  const detected = new Set<CoverageTool>();

  for (const command of commands) {
    for (const tool of matchCoverageTools(command)) {
      detected.add(tool);
    }
  }

  return [...detected];
}

export function hasCoverageUpload(commands: Iterable<string>): boolean {
  return detectCoverageTools(commands).length > 0;
}
