/**
 * CircleCI Parser
 * @module parsers/circleci/circleci-parser
 *
 * Parses CircleCI configuration (.circleci/config.yml).
 */

import { BaseCIParser, CIParseOutcome, CIParserOptions, ParsedCIConfig } from '../base/parser';
import { StepCollector } from '../base/step-collector';
import { isYamlMapping, loadYamlMapping, mappingEntries } from '../base/yaml-loader';

/**
 * CircleCI configuration parser.
 *
 * A job step is one of:
 * - a bare string (`- checkout`)
 * - `run: <command>`
 * - `run: { command: <command> }`
 * - an orb or command invocation keyed by name (`codecov/upload: {...}`),
 *   kept only as a candidate command
 */
export class CircleCIParser extends BaseCIParser {
  readonly name = 'circleci-parser';
  readonly version = '1.0.0';
  readonly platform = 'circleci' as const;

  protected async doParse(content: string, filePath: string): Promise<ParsedCIConfig> {
    const collector = new StepCollector();
    const config = loadYamlMapping(content, filePath);

    if (!config) {
      return collector.toParsed();
    }

    for (const [jobName, job] of mappingEntries(config.jobs)) {
      if (!isYamlMapping(job) || !Array.isArray(job.steps)) {
        continue;
      }

      for (const step of job.steps) {
        if (typeof step === 'string') {
          collector.addCommand(jobName, step);
          continue;
        }

        if (!isYamlMapping(step)) {
          continue;
        }

        for (const [key, value] of Object.entries(step)) {
          if (key === 'run') {
            const command = this.extractRunCommand(value);
            if (command !== null) {
              collector.addCommand(jobName, command);
            }
          } else {
            collector.addReference(key);
          }
        }
      }
    }

    return collector.toParsed();
  }

  private extractRunCommand(run: unknown): string | null {
    if (typeof run === 'string') {
      return run;
    }
    if (isYamlMapping(run) && typeof run.command === 'string') {
      return run.command;
    }
    return null;
  }
}

/**
 * Create a CircleCI parser
 */
export function createCircleCIParser(options?: CIParserOptions): CircleCIParser {
  return new CircleCIParser(options);
}

/**
 * Parse a CircleCI configuration directly
 */
export async function parseCircleCIConfig(
  content: string,
  filePath: string,
  options?: CIParserOptions
): Promise<CIParseOutcome> {
  return createCircleCIParser(options).parse(content, filePath);
}
