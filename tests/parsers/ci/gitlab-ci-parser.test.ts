/**
 * GitLab CI Parser Tests
 * @module tests/parsers/ci/gitlab-ci-parser.test
 */

import { describe, it, expect } from 'vitest';
import {
  GITLAB_RESERVED_KEYWORDS,
  afterScriptJobName,
  createGitLabCIParser,
  parseGitLabCI,
} from '../../../src/parsers/ci/gitlab-ci-parser';
import { expectMalformed, expectParsed } from '../../helpers';

const PIPELINE_PATH = '.gitlab-ci.yml';

const PIPELINE = `
stages: [test, report]
variables:
  PYTHON_VERSION: "3.12"
before_script:
  - pytest --version
.hidden-template:
  script:
    - pytest hidden/
unit:
  stage: test
  script:
    - pip install -e .
    - pytest --cov=src tests/
  after_script:
    - go test ./...
coverage:
  stage: report
  script: codecov upload
`;

describe('GitLabCIParser', () => {
  const parser = createGitLabCIParser();

  it('identifies itself', () => {
    expect(parser.name).toBe('gitlab-ci-parser');
    expect(parser.platform).toBe('gitlab_ci');
  });

  it('extracts script and after_script test steps', async () => {
    const parsed = expectParsed(await parser.parse(PIPELINE, PIPELINE_PATH));

    expect(parsed.steps).toEqual([
      {
        jobName: 'unit',
        command: 'pytest --cov=src tests/',
        framework: 'pytest',
        hasCoverageFlag: true,
      },
      {
        jobName: 'unit (after_script)',
        command: 'go test ./...',
        framework: 'go_test',
        hasCoverageFlag: false,
      },
    ]);
  });

  it('ignores reserved keywords and hidden jobs', async () => {
    const parsed = expectParsed(await parser.parse(PIPELINE, PIPELINE_PATH));

    expect(parsed.commands).toEqual([
      'pip install -e .',
      'pytest --cov=src tests/',
      'go test ./...',
      'codecov upload',
    ]);
  });

  it('skips top-level keys whose value is not a mapping', async () => {
    const parsed = expectParsed(await parser.parse('note: pytest everywhere\n', PIPELINE_PATH));

    expect(parsed.steps).toEqual([]);
  });

  it('normalises script lists', async () => {
    const content = `
job:
  script:
    - 123
    - ""
    - null
    - "  npm test  "
`;
    const parsed = expectParsed(await parser.parse(content, PIPELINE_PATH));

    expect(parsed.commands).toEqual(['npm test']);
    expect(parsed.steps.map(step => step.command)).toEqual(['npm test']);
  });

  it('flattens scripts that reuse an anchored list', async () => {
    const content = `
.setup: &setup
  - pip install -r requirements.txt
  - pytest tests/
unit:
  script:
    - *setup
    - echo done
`;
    const parsed = expectParsed(await parser.parse(content, PIPELINE_PATH));

    expect(parsed.commands).toEqual(['pip install -r requirements.txt', 'pytest tests/', 'echo done']);
    expect(parsed.steps).toEqual([
      { jobName: 'unit', command: 'pytest tests/', framework: 'pytest', hasCoverageFlag: false },
    ]);
  });

  it('drops mapping items from a script list', async () => {
    const content = `
unit:
  script:
    - name: setup
    - echo hi
    - npm test
`;
    const parsed = expectParsed(await parser.parse(content, PIPELINE_PATH));

    expect(parsed.commands).toEqual(['echo hi', 'npm test']);
    expect(parsed.steps.map(step => step.command)).toEqual(['npm test']);
  });

  it('reports unbalanced brackets as malformed', async () => {
    const malformed = expectMalformed(
      await parser.parse('test:\n  script: [pytest tests/\n', PIPELINE_PATH)
    );

    expect(malformed.error.code).toBe('INVALID_YAML');
  });

  it('treats an empty file as parsed with zero steps', async () => {
    const parsed = expectParsed(await parser.parse('', PIPELINE_PATH));

    expect(parsed.steps).toEqual([]);
  });
});

describe('afterScriptJobName', () => {
  it('tags the job name', () => {
    expect(afterScriptJobName('deploy')).toBe('deploy (after_script)');
  });
});

describe('GITLAB_RESERVED_KEYWORDS', () => {
  it('contains the global keywords', () => {
    for (const keyword of ['image', 'stages', 'variables', 'include', 'workflow', 'default']) {
      expect(GITLAB_RESERVED_KEYWORDS.has(keyword)).toBe(true);
    }
    expect(GITLAB_RESERVED_KEYWORDS.has('test')).toBe(false);
  });
});

describe('parseGitLabCI', () => {
  it('parses with a one-off parser', async () => {
    const parsed = expectParsed(await parseGitLabCI('test:\n  script: npm test\n', PIPELINE_PATH));

    expect(parsed.steps.map(step => step.jobName)).toEqual(['test']);
  });
});
