/**
 * GitLab CI Parser
 * @module parsers/ci/gitlab-ci-parser
 *
 * Parses GitLab CI/CD configuration files (.gitlab-ci.yml).
 * Jobs are the top-level mappings that are neither reserved keywords nor
 * hidden (dot-prefixed) templates.
 */

import { BaseCIParser, CIParseOutcome, CIParserOptions, ParsedCIConfig } from '../base/parser';
import { StepCollector } from '../base/step-collector';
import { isYamlMapping, loadYamlMapping, toCommandList } from '../base/yaml-loader';

/**
 * Top-level keys that configure the pipeline rather than define a job
 */
export const GITLAB_RESERVED_KEYWORDS: ReadonlySet<string> = new Set([
  'image',
  'services',
  'stages',
  'variables',
  'cache',
  'before_script',
  'after_script',
  'artifacts',
  'retry',
  'timeout',
  'parallel',
  'trigger',
  'include',
  'extends',
  'pages',
  'workflow',
  'default',
  'inherit',
]);

/**
 * Job name given to steps found in a job's after_script
 */
export function afterScriptJobName(jobName: string): string {
  return `${jobName} (after_script)`;
}

export class GitLabCIParser extends BaseCIParser {
  readonly name = 'gitlab-ci-parser';
  readonly version = '1.0.0';
  readonly platform = 'gitlab_ci' as const;

  protected async doParse(content: string, filePath: string): Promise<ParsedCIConfig> {
    const collector = new StepCollector();
    const pipeline = loadYamlMapping(content, filePath);

    if (!pipeline) {
      return collector.toParsed();
    }

    for (const [jobName, job] of Object.entries(pipeline)) {
      if (!this.isJobKey(jobName) || !isYamlMapping(job)) {
        continue;
      }

      for (const command of toCommandList(job.script)) {
        collector.addCommand(jobName, command);
      }

      const afterScriptJob = afterScriptJobName(jobName);
      for (const command of toCommandList(job.after_script)) {
        collector.addCommand(afterScriptJob, command);
      }
    }

    return collector.toParsed();
  }

  private isJobKey(key: string): boolean {
    return !key.startsWith('.') && !GITLAB_RESERVED_KEYWORDS.has(key);
  }
}

/**
 * Create a GitLab CI parser
 */
export function createGitLabCIParser(options?: CIParserOptions): GitLabCIParser {
  return new GitLabCIParser(options);
}

/**
 * Parse a GitLab CI configuration directly
 */
export async function parseGitLabCI(
  content: string,
  filePath: string,
  options?: CIParserOptions
): Promise<CIParseOutcome> {
  return createGitLabCIParser(options).parse(content, filePath);
}
