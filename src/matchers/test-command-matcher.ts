/**
 * Test Command Matcher
 * @module matchers/test-command-matcher
 *
 * Classifies shell commands found in CI configuration as test invocations,
 * infers the framework they imply and detects coverage flags. Matching is
 * plain substring containment, not shell parsing.
 */

import type { TestFramework } from '../types/ci-config';

// ============================================================================
// Pattern Tables
// ============================================================================

/**
 * Known test invocation fragments, matched case-insensitively
 */
export const TEST_COMMAND_PATTERNS: readonly string[] = [
  // Python
  'pytest',
  'python -m pytest',
  // JavaScript / TypeScript
  'npm test',
  'npm run test',
  // Go
  'go test',
  // Java
  'mvn test',
  'gradle test',
  './gradlew test',
  'gradlew test',
];

/**
 * Framework inference rules, first match wins
 */
const FRAMEWORK_RULES: ReadonlyArray<{ framework: TestFramework; patterns: readonly string[] }> = [
  { framework: 'pytest', patterns: ['pytest'] },
  { framework: 'jest', patterns: ['npm test', 'npm run test'] },
  { framework: 'go_test', patterns: ['go test'] },
  { framework: 'junit', patterns: ['mvn test', 'gradle test', 'gradlew test'] },
];

/**
 * Coverage flags, matched literally (case-sensitive)
 */
export const COVERAGE_FLAGS: readonly string[] = ['--cov', '--coverage', '-cover', '-coverprofile'];

// ============================================================================
// Matchers
// ============================================================================

/**
 * True when the command contains a known test invocation.
 * Blank input is never a test command.
 */
export function isTestCommand(command: string): boolean {
  const normalized = command.trim().toLowerCase();
  if (normalized.length === 0) {
    return false;
  }
  return TEST_COMMAND_PATTERNS.some(pattern => normalized.includes(pattern));
}

/**
 * Best-matching framework for a command, or null
 */
export function inferFramework(command: string): TestFramework | null {
  const normalized = command.toLowerCase();

  for (const rule of FRAMEWORK_RULES) {
    if (rule.patterns.some(pattern => normalized.includes(pattern))) {
      return rule.framework;
    }
  }

  return null;
}

/**
 * True when the command carries a coverage flag. Does not require the
 * command to be a test command.
 */
export function hasCoverageFlag(command: string): boolean {
  return COVERAGE_FLAGS.some(flag => command.includes(flag));
}

/**
 * Keeps only the test commands, preserving order
 */
export function extractTestCommands(commands: readonly string[]): string[] {
  return commands.filter(isTestCommand);
}
