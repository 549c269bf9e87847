/**
 * GitHub Actions Parser
 * @module parsers/github-actions/gha-parser
 *
 * Parses GitHub Actions workflow files (.github/workflows/*.yml) and
 * extracts test steps from each job's `run:` blocks.
 */

import { BaseCIParser, CIParseOutcome, CIParserOptions, ParsedCIConfig } from '../base/parser';
import { StepCollector } from '../base/step-collector';
import { isYamlMapping, loadYamlMapping, mappingEntries } from '../base/yaml-loader';

/**
 * GitHub Actions workflow parser.
 *
 * Job name is the key under `jobs`. A multi-line `run` block yields one
 * candidate command per non-blank line. `uses:` references are kept as
 * candidate commands for coverage tool detection only.
 */
export class GitHubActionsParser extends BaseCIParser {
  readonly name = 'github-actions-parser';
  readonly version = '1.0.0';
  readonly platform = 'github_actions' as const;

  protected async doParse(content: string, filePath: string): Promise<ParsedCIConfig> {
    const collector = new StepCollector();
    const workflow = loadYamlMapping(content, filePath);

    if (!workflow) {
      return collector.toParsed();
    }

    for (const [jobName, job] of mappingEntries(workflow.jobs)) {
      if (!isYamlMapping(job) || !Array.isArray(job.steps)) {
        continue;
      }

      for (const step of job.steps) {
        if (!isYamlMapping(step)) {
          continue;
        }

        if (typeof step.uses === 'string') {
          collector.addReference(step.uses);
        }

        if (typeof step.run === 'string') {
          for (const line of step.run.split('\n')) {
            collector.addCommand(jobName, line);
          }
        }
      }
    }

    return collector.toParsed();
  }
}

/**
 * Create a GitHub Actions parser
 */
export function createGitHubActionsParser(options?: CIParserOptions): GitHubActionsParser {
  return new GitHubActionsParser(options);
}

/**
 * Parse a GitHub Actions workflow directly
 */
export async function parseGitHubActionsWorkflow(
  content: string,
  filePath: string,
  options?: CIParserOptions
): Promise<CIParseOutcome> {
  return createGitHubActionsParser(options).parse(content, filePath);
}
