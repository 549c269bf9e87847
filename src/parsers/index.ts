/**
 * CI Configuration Parsers
 * @module parsers
 *
 * One parser per supported platform, plus the registry the analyzer
 * dispatches through.
 */

import type { CIPlatform } from '../types/ci-config';
import type { CIConfigParser, CIParserOptions } from './base/parser';
import { GitHubActionsParser } from './github-actions/gha-parser';
import { GitLabCIParser } from './ci/gitlab-ci-parser';
import { CircleCIParser } from './circleci/circleci-parser';
import { TravisCIParser } from './travis/travis-parser';
import { JenkinsParser } from './jenkins/jenkins-parser';

export * from './base';

export {
  GitHubActionsParser,
  createGitHubActionsParser,
  parseGitHubActionsWorkflow,
} from './github-actions/gha-parser';

export {
  GitLabCIParser,
  GITLAB_RESERVED_KEYWORDS,
  afterScriptJobName,
  createGitLabCIParser,
  parseGitLabCI,
} from './ci/gitlab-ci-parser';

export {
  CircleCIParser,
  createCircleCIParser,
  parseCircleCIConfig,
} from './circleci/circleci-parser';

export {
  TravisCIParser,
  TRAVIS_SCRIPT_JOB,
  TRAVIS_AFTER_SUCCESS_JOB,
  createTravisCIParser,
  parseTravisConfig,
} from './travis/travis-parser';

export {
  JenkinsParser,
  JENKINS_JOB_NAME,
  createJenkinsParser,
  parseJenkinsfile,
} from './jenkins/jenkins-parser';

// ============================================================================
// Parser Registry
// ============================================================================

/**
 * One parser per platform
 */
export type CIParserRegistry = Readonly<Record<CIPlatform, CIConfigParser>>;

/**
 * Build the default parser for every supported platform
 */
export function createParserRegistry(options?: CIParserOptions): CIParserRegistry {
  return {
    github_actions: new GitHubActionsParser(options),
    gitlab_ci: new GitLabCIParser(options),
    circleci: new CircleCIParser(options),
    travis_ci: new TravisCIParser(options),
    jenkins: new JenkinsParser(options),
  };
}
