/**
 * Step Collector
 * @module parsers/base/step-collector
 *
 * Accumulates the commands a parser walks over and keeps the ones that
 * are test invocations as TestStepInfo values.
 */

import { hasCoverageFlag, inferFramework, isTestCommand } from '../../matchers/test-command-matcher';
import { createTestStepInfo, TestStepInfo } from '../../types/ci-config';
import type { ParsedCIConfig } from './parser';

export class StepCollector {
  private readonly steps: TestStepInfo[] = [];
  private readonly commands: string[] = [];

  /**
   * Record a shell command run by `jobName`. Blank commands are ignored.
   */
  addCommand(jobName: string, command: string): void {
    const trimmed = command.trim();
    if (trimmed.length === 0) {
      return;
    }

    this.commands.push(trimmed);

    if (isTestCommand(trimmed)) {
      this.steps.push(createTestStepInfo({
        jobName,
        command: trimmed,
        framework: inferFramework(trimmed),
        hasCoverageFlag: hasCoverageFlag(trimmed),
      }));
    }
  }

  /**
   * Record a reference that is never a test step but may name a coverage
   * tool (an action in `uses:`, an orb invocation).
   */
  addReference(reference: string): void {
    const trimmed = reference.trim();
    if (trimmed.length > 0) {
      this.commands.push(trimmed);
    }
  }

  toParsed(): ParsedCIConfig {
    return {
      steps: [...this.steps],
      commands: [...this.commands],
    };
  }
}
