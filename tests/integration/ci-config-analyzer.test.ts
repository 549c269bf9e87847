/**
 * CI Config Analyzer Integration Tests
 * @module tests/integration/ci-config-analyzer.test
 *
 * End-to-end analysis of temporary repositories: detection, parsing,
 * platform selection, aggregation and scoring.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  CIConfigAnalyzer,
  analyzeCIConfig,
  createAnalyzerFromConfig,
  createCIConfigAnalyzer,
} from '../../src/services/ci-config-analyzer';
import { createParserRegistry, CIConfigParser, CIParseOutcome } from '../../src/parsers';
import { AppConfigSchema } from '../../src/config/schema';
import { RepositoryPathError } from '../../src/errors/domain';
import { emptyCIConfigResult } from '../../src/types/ci-config';
import { createCapturingLogger, createTempRepo, removeTempRepo } from '../helpers';

const PYTEST_WORKFLOW = `
name: CI
on: push
jobs:
  test:
    runs-on: ubuntu-latest
    steps:
      - uses: actions/checkout@v4
      - run: pytest tests/
`;

const UPLOAD_ONLY_WORKFLOW = `
jobs:
  upload:
    steps:
      - uses: codecov/codecov-action@v4
`;

const TWO_JOB_WORKFLOW = `
jobs:
  unit:
    steps:
      - run: pytest tests/unit
  integration:
    steps:
      - run: pytest tests/integration
`;

const GITLAB_WITH_CODECOV = `
stages: [test, report]
unit:
  stage: test
  script:
    - pytest --cov=src tests/
upload:
  stage: report
  script:
    - codecov upload
`;

const CIRCLECI_THREE_JOBS = `
version: 2.1
jobs:
  unit-tests:
    steps:
      - checkout
      - run: pytest tests/unit
  integration-tests:
    steps:
      - run: pytest tests/integration
  e2e-tests:
    steps:
      - run:
          command: npm run test:e2e
`;

const MALFORMED_YAML = 'test:\n  script: [pytest tests/\n';

function crashingParser(platform: CIConfigParser['platform']): CIConfigParser {
  return {
    name: 'crashing-parser',
    version: '0.0.1',
    platform,
    parse: async () => {
      throw new Error('parser crashed');
    },
    parseFile: async () => {
      throw new Error('parser crashed');
    },
  };
}

function vanishingParser(platform: CIConfigParser['platform']): CIConfigParser {
  const notFound = async (filePath: string): Promise<CIParseOutcome> => ({
    status: 'not_found',
    filePath,
    metadata: { filePath, parserName: 'vanishing-parser', parserVersion: '0.0.1', parseTimeMs: 0, fileSize: 0 },
  });

  return {
    name: 'vanishing-parser',
    version: '0.0.1',
    platform,
    parse: (_content, filePath) => notFound(filePath),
    parseFile: notFound,
  };
}

describe('CIConfigAnalyzer', () => {
  const repos: string[] = [];

  async function repoWith(files: Record<string, string>): Promise<string> {
    const repo = await createTempRepo(files);
    repos.push(repo);
    return repo;
  }

  afterEach(async () => {
    await Promise.all(repos.splice(0).map(removeTempRepo));
  });

  describe('single platform scenarios', () => {
    it('scores a GitHub Actions workflow with one pytest job', async () => {
      const repo = await repoWith({ '.github/workflows/ci.yml': PYTEST_WORKFLOW });

      const result = await analyzeCIConfig(repo);

      expect(result).toEqual({
        platform: 'github_actions',
        configFilePath: '.github/workflows/ci.yml',
        hasTestSteps: true,
        testCommands: ['pytest tests/'],
        hasCoverageUpload: false,
        coverageTools: [],
        testJobCount: 1,
        calculatedScore: 5,
        parseErrors: [],
      });
    });

    it('detects Codecov uploads in GitLab CI', async () => {
      const repo = await repoWith({ '.gitlab-ci.yml': GITLAB_WITH_CODECOV });

      const result = await createCIConfigAnalyzer().analyze(repo);

      expect(result.platform).toBe('gitlab_ci');
      expect(result.hasCoverageUpload).toBe(true);
      expect(result.coverageTools).toEqual(['codecov']);
      expect(result.testCommands).toEqual(['pytest --cov=src tests/']);
      expect(result.testJobCount).toBe(1);
      expect(result.calculatedScore).toBe(10);
    });

    it('rewards tests spread over several CircleCI jobs', async () => {
      const repo = await repoWith({ '.circleci/config.yml': CIRCLECI_THREE_JOBS });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('circleci');
      expect(result.testJobCount).toBe(3);
      expect(result.calculatedScore).toBe(8);
    });

    it('returns an empty result for a repository without CI files', async () => {
      const repo = await repoWith({ 'README.md': '# project\n' });

      expect(await analyzeCIConfig(repo)).toEqual(emptyCIConfigResult());
    });

    it('scores a Travis config without test commands as 0', async () => {
      const repo = await repoWith({ '.travis.yml': 'script:\n  - make build\n  - make lint\n' });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('travis_ci');
      expect(result.configFilePath).toBe('.travis.yml');
      expect(result.hasTestSteps).toBe(false);
      expect(result.calculatedScore).toBe(0);
      expect(result.parseErrors).toEqual([]);
    });

    it('reports malformed YAML without throwing', async () => {
      const repo = await repoWith({ '.gitlab-ci.yml': MALFORMED_YAML });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('gitlab_ci');
      expect(result.configFilePath).toBe('.gitlab-ci.yml');
      expect(result.calculatedScore).toBe(0);
      expect(result.parseErrors).toHaveLength(1);
      expect(result.parseErrors[0]).toMatch(/^gitlab_ci: Invalid YAML in .*\.gitlab-ci\.yml/);
    });

    it('marks coverage established only by a flag', async () => {
      const repo = await repoWith({ '.travis.yml': 'script: pytest --cov=pkg\n' });

      const result = await analyzeCIConfig(repo);

      expect(result.hasCoverageUpload).toBe(true);
      expect(result.coverageTools).toEqual(['coverage_flag']);
      expect(result.calculatedScore).toBe(10);
    });

    it('reads Jenkins sh and bat steps', async () => {
      const repo = await repoWith({
        Jenkinsfile: "pipeline {\n  stages {\n    stage('t') { steps { sh 'go test ./...'\n bat 'mvn test' } }\n  }\n}\n",
      });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('jenkins');
      expect(result.testCommands).toEqual(['go test ./...', 'mvn test']);
      expect(result.testJobCount).toBe(1);
      expect(result.calculatedScore).toBe(5);
    });
  });

  describe('multiple platforms', () => {
    it('selects the highest scoring platform', async () => {
      const repo = await repoWith({
        '.github/workflows/ci.yml': PYTEST_WORKFLOW,
        '.gitlab-ci.yml': GITLAB_WITH_CODECOV,
      });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('gitlab_ci');
      expect(result.calculatedScore).toBe(10);
    });

    it('breaks ties by fixed platform order', async () => {
      const repo = await repoWith({
        '.travis.yml': 'script: pytest\n',
        '.github/workflows/ci.yml': PYTEST_WORKFLOW,
      });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('github_actions');
      expect(result.calculatedScore).toBe(5);
    });

    it('prefers a platform that runs tests over an upload-only one on a tie', async () => {
      const repo = await repoWith({
        '.github/workflows/ci.yml': UPLOAD_ONLY_WORKFLOW,
        '.gitlab-ci.yml': 'unit:\n  script: pytest\n',
      });

      const { result, platformEvaluations } = await createCIConfigAnalyzer().analyzeWithEvidence(repo);

      expect(platformEvaluations.map(entry => entry.score?.total)).toEqual([5, 5]);
      expect(result.platform).toBe('gitlab_ci');
      expect(result.testCommands).toEqual(['pytest']);
      expect(result.coverageTools).toEqual(['codecov']);
      expect(result.calculatedScore).toBe(10);
    });

    it('aggregates coverage tools across every parsed platform', async () => {
      const repo = await repoWith({
        '.github/workflows/ci.yml': TWO_JOB_WORKFLOW,
        '.travis.yml': 'script: make\nafter_success: coveralls\n',
      });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('github_actions');
      expect(result.testJobCount).toBe(2);
      expect(result.coverageTools).toEqual(['coveralls']);
      expect(result.calculatedScore).toBe(13);
    });

    it('keeps results of healthy platforms when another is malformed', async () => {
      const repo = await repoWith({
        '.github/workflows/ci.yml': '- not a mapping\n',
        '.travis.yml': 'script: npm test\n',
      });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('travis_ci');
      expect(result.calculatedScore).toBe(5);
      expect(result.parseErrors).toHaveLength(1);
      expect(result.parseErrors[0]).toMatch(/^github_actions: Unexpected structure in /);
    });

    it('reports every failure when all platforms fail', async () => {
      const repo = await repoWith({
        '.gitlab-ci.yml': MALFORMED_YAML,
        '.github/workflows/ci.yml': 'jobs: {unclosed\n',
      });

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('github_actions');
      expect(result.configFilePath).toBe('.github/workflows/ci.yml');
      expect(result.calculatedScore).toBe(0);
      expect(result.hasTestSteps).toBe(false);
      expect(result.parseErrors.map(entry => entry.split(':')[0])).toEqual(['github_actions', 'gitlab_ci']);
    });
  });

  describe('parser failures', () => {
    it('turns a thrown exception into a parse error', async () => {
      const repo = await repoWith({
        Jenkinsfile: "sh 'pytest'\n",
        '.travis.yml': 'script: pytest\n',
      });
      const analyzer = new CIConfigAnalyzer({
        parsers: { ...createParserRegistry(), jenkins: crashingParser('jenkins') },
      });

      const result = await analyzer.analyze(repo);

      expect(result.platform).toBe('travis_ci');
      expect(result.parseErrors).toEqual(['jenkins: parser crashed']);
    });

    it('reports a file that vanished after detection', async () => {
      const repo = await repoWith({ Jenkinsfile: "sh 'pytest'\n" });
      const analyzer = new CIConfigAnalyzer({
        parsers: { ...createParserRegistry(), jenkins: vanishingParser('jenkins') },
      });

      const result = await analyzer.analyze(repo);

      expect(result.platform).toBe('jenkins');
      expect(result.calculatedScore).toBe(0);
      expect(result.parseErrors).toEqual(['jenkins: CI config file not found: Jenkinsfile']);
    });
  });

  describe('unreadable locations', () => {
    it('ignores a self-referencing Jenkinsfile symlink', async () => {
      const repo = await repoWith({ '.travis.yml': 'script: pytest\n' });
      await fs.symlink('Jenkinsfile', path.join(repo, 'Jenkinsfile'));

      const result = await analyzeCIConfig(repo);

      expect(result.platform).toBe('travis_ci');
      expect(result.calculatedScore).toBe(5);
      expect(result.parseErrors).toEqual([]);
    });

    it('reports a location that cannot be probed as a parse error', async () => {
      const repo = await repoWith({
        '.github/workflows/ci.yml': PYTEST_WORKFLOW,
        '.travis.yml': 'script: pytest\n',
      });
      vi.spyOn(fs, 'readdir').mockRejectedValueOnce(
        Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' })
      );

      const { result, platformEvaluations } = await createCIConfigAnalyzer().analyzeWithEvidence(repo);

      expect(result.platform).toBe('travis_ci');
      expect(result.parseErrors).toEqual([
        'github_actions: cannot read .github/workflows: EACCES: permission denied',
      ]);
      expect(platformEvaluations.map(entry => [entry.platform, entry.status])).toEqual([
        ['github_actions', 'error'],
        ['travis_ci', 'parsed'],
      ]);
    });
  });

  describe('usage errors', () => {
    it('rejects a missing repository path', async () => {
      const repo = await repoWith({});
      const missing = path.join(repo, 'does-not-exist');

      const error = await analyzeCIConfig(missing).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RepositoryPathError);
      if (error instanceof RepositoryPathError) {
        expect(error.code).toBe('REPOSITORY_NOT_FOUND');
        expect(error.repoPath).toBe(missing);
      }
    });

    it('rejects a path that is a file', async () => {
      const repo = await repoWith({ 'file.txt': 'x' });

      await expect(analyzeCIConfig(path.join(repo, 'file.txt'))).rejects.toThrow(
        `Repository path is not a directory: ${path.join(repo, 'file.txt')}`
      );
    });
  });

  describe('evidence and logging', () => {
    it('reports every platform evaluation in fixed order', async () => {
      const repo = await repoWith({
        '.travis.yml': 'script: [pytest --cov=pkg, go test ./...]\n',
        '.gitlab-ci.yml': MALFORMED_YAML,
      });

      const evidence = await createCIConfigAnalyzer().analyzeWithEvidence(repo);

      expect(evidence.platformEvaluations.map(entry => [entry.platform, entry.status, entry.stepCount])).toEqual([
        ['gitlab_ci', 'malformed', 0],
        ['travis_ci', 'parsed', 2],
      ]);
      expect(evidence.platformEvaluations[1]?.score?.total).toBe(10);
      expect(evidence.platformEvaluations[0]?.reason).toMatch(/^Invalid YAML in /);
      expect(evidence.frameworks).toEqual(['pytest', 'go_test']);
      expect(evidence.result.platform).toBe('travis_ci');
    });

    it('logs the analysis lifecycle', async () => {
      const repo = await repoWith({ '.travis.yml': 'script: pytest\n' });
      const capture = createCapturingLogger('analyzer');

      await new CIConfigAnalyzer({ logger: capture.logger }).analyze(repo);

      expect(capture.events('analysis_started')).toHaveLength(1);
      expect(capture.events('platform_detected')[0]).toMatchObject({
        platform: 'travis_ci',
        configPath: '.travis.yml',
      });
      expect(capture.events('analysis_completed')[0]).toMatchObject({
        platform: 'travis_ci',
        score: 5,
        parseErrorCount: 0,
      });
      expect(capture.events('performance_metric')).toEqual([
        expect.objectContaining({ operation: 'detect_platforms', status: 'success' }),
      ]);
    });

    it('returns equal results for repeated analyses', async () => {
      const repo = await repoWith({
        '.github/workflows/ci.yml': TWO_JOB_WORKFLOW,
        '.gitlab-ci.yml': GITLAB_WITH_CODECOV,
      });
      const analyzer = createCIConfigAnalyzer();

      expect(await analyzer.analyze(repo)).toEqual(await analyzer.analyze(repo));
    });
  });

  describe('createAnalyzerFromConfig', () => {
    it('applies the analysis limits', async () => {
      const repo = await repoWith({ '.travis.yml': `script: pytest\n# ${'x'.repeat(2000)}\n` });
      const config = AppConfigSchema.parse({
        logging: { level: 'silent' },
        analysis: { maxConfigFileSize: 1024 },
      });

      const result = await createAnalyzerFromConfig(config).analyze(repo);

      expect(result.calculatedScore).toBe(0);
      expect(result.parseErrors).toHaveLength(1);
      expect(result.parseErrors[0]).toMatch(/^travis_ci: File size 2018 exceeds maximum 1024 bytes: /);
    });
  });
});
