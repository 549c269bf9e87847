/**
 * Travis CI Parser
 * @module parsers/travis/travis-parser
 *
 * Parses Travis CI configuration (.travis.yml). Travis has no job
 * concept at the top level, so each phase gets a fixed job label.
 */

import { BaseCIParser, CIParseOutcome, CIParserOptions, ParsedCIConfig } from '../base/parser';
import { StepCollector } from '../base/step-collector';
import { loadYamlMapping, toCommandList } from '../base/yaml-loader';

export const TRAVIS_SCRIPT_JOB = 'travis_script';
export const TRAVIS_AFTER_SUCCESS_JOB = 'travis_after_success';

/**
 * Phases read from the top level, in extraction order
 */
const TRAVIS_PHASES: ReadonlyArray<{ key: string; jobName: string }> = [
  { key: 'script', jobName: TRAVIS_SCRIPT_JOB },
  { key: 'after_success', jobName: TRAVIS_AFTER_SUCCESS_JOB },
];

export class TravisCIParser extends BaseCIParser {
  readonly name = 'travis-ci-parser';
  readonly version = '1.0.0';
  readonly platform = 'travis_ci' as const;

  protected async doParse(content: string, filePath: string): Promise<ParsedCIConfig> {
    const collector = new StepCollector();
    const config = loadYamlMapping(content, filePath);

    if (!config) {
      return collector.toParsed();
    }

    for (const { key, jobName } of TRAVIS_PHASES) {
      for (const command of toCommandList(config[key])) {
        collector.addCommand(jobName, command);
      }
    }

    return collector.toParsed();
  }
}

/**
 * Create a Travis CI parser
 */
export function createTravisCIParser(options?: CIParserOptions): TravisCIParser {
  return new TravisCIParser(options);
}

/**
 * Parse a Travis CI configuration directly
 */
export async function parseTravisConfig(
  content: string,
  filePath: string,
  options?: CIParserOptions
): Promise<CIParseOutcome> {
  return createTravisCIParser(options).parse(content, filePath);
}
