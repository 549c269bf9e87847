/**
 * Jenkins Parser
 * @module parsers/jenkins/jenkins-parser
 *
 * Text scan of a Jenkinsfile. The pipeline DSL is not evaluated: only the
 * quoted argument of `sh '...'` and `bat '...'` steps is read, so commands
 * hidden inside wrapper scripts are not seen.
 */

import { BaseCIParser, CIParseOutcome, CIParserOptions, ParsedCIConfig } from '../base/parser';
import { StepCollector } from '../base/step-collector';

export const JENKINS_JOB_NAME = 'jenkins_pipeline';

/** `sh 'cmd'` or `sh "cmd"` */
const SH_STEP_PATTERN = /\bsh\s+['"]([^'"]+)['"]/gi;

/** `bat 'cmd'` or `bat "cmd"` */
const BAT_STEP_PATTERN = /\bbat\s+['"]([^'"]+)['"]/gi;

export class JenkinsParser extends BaseCIParser {
  readonly name = 'jenkins-parser';
  readonly version = '1.0.0';
  readonly platform = 'jenkins' as const;

  protected async doParse(content: string): Promise<ParsedCIConfig> {
    const collector = new StepCollector();

    // All sh steps first, then all bat steps
    for (const pattern of [SH_STEP_PATTERN, BAT_STEP_PATTERN]) {
      for (const match of content.matchAll(pattern)) {
        collector.addCommand(JENKINS_JOB_NAME, match[1]);
      }
    }

    return collector.toParsed();
  }
}

/**
 * Create a Jenkins parser
 */
export function createJenkinsParser(options?: CIParserOptions): JenkinsParser {
  return new JenkinsParser(options);
}

/**
 * Parse Jenkinsfile content directly
 */
export async function parseJenkinsfile(
  content: string,
  filePath: string,
  options?: CIParserOptions
): Promise<CIParseOutcome> {
  return createJenkinsParser(options).parse(content, filePath);
}
