/**
 * Structured Logger Tests
 * @module tests/logging/logger.test
 */

import { describe, it, expect } from 'vitest';
import {
  createModuleLogger,
  getLogger,
  initLogger,
  resetLogger,
  withLogging,
} from '../../src/logging/logger';
import { CIConfigParseError } from '../../src/errors/domain';
import { createCapturingLogger } from '../helpers';

describe('StructuredLogger', () => {
  it('writes analysis lifecycle events', () => {
    const capture = createCapturingLogger('analyzer');

    capture.logger.analysisStarted('/repo');
    capture.logger.analysisCompleted('/repo', 12, 'gitlab_ci', 10, 1);

    expect(capture.events('analysis_started')[0]).toMatchObject({
      level: 'info',
      name: 'analyzer',
      repoPath: '/repo',
      msg: 'CI analysis started for /repo',
    });
    expect(capture.events('analysis_completed')[0]).toMatchObject({
      durationMs: 12,
      platform: 'gitlab_ci',
      score: 10,
      parseErrorCount: 1,
    });
  });

  it('attaches service metadata and ISO timestamps', () => {
    const capture = createCapturingLogger();

    capture.logger.info({ event: 'probe' }, 'probe');

    const [entry] = capture.events('probe');
    expect(entry).toMatchObject({ service: 'ci-test-evidence', env: 'test' });
    expect(typeof entry?.time).toBe('string');
  });

  it('logs parser failures with the error code', () => {
    const capture = createCapturingLogger();
    const error = CIConfigParseError.invalidStructure('ci.yml', 'bad root');

    capture.logger.parserFailed('gitlab-ci-parser', 'ci.yml', error);

    const [entry] = capture.events('parser_failed');
    expect(entry).toMatchObject({ level: 'warn', parser: 'gitlab-ci-parser', errorCode: 'INVALID_STRUCTURE' });
  });

  it('redacts secret-looking keys', () => {
    const capture = createCapturingLogger();

    capture.logger.info({ event: 'secrets', token: 'test-secret', nested: { password: 'test-secret' } });

    expect(capture.events('secrets')[0]).toMatchObject({
      token: '[REDACTED]',
      nested: { password: '[REDACTED]' },
    });
  });

  it('keeps domain methods on child loggers', () => {
    const capture = createCapturingLogger();

    capture.logger.child({ platform: 'jenkins' }).platformDetected('jenkins', 'Jenkinsfile');

    expect(capture.events('platform_detected')[0]).toMatchObject({
      level: 'debug',
      platform: 'jenkins',
      configPath: 'Jenkinsfile',
    });
  });
});

describe('root logger', () => {
  it('is a singleton until reset', () => {
    const first = getLogger();

    expect(getLogger()).toBe(first);
    resetLogger();
    expect(getLogger()).not.toBe(first);
  });

  it('can be re-initialised', () => {
    const logger = initLogger({ analysisId: 'a-1' }, { level: 'warn' });

    expect(getLogger()).toBe(logger);
    expect(logger.level).toBe('warn');
  });

  it('honours LOG_LEVEL for module loggers', () => {
    expect(createModuleLogger('parsers').level).toBe('silent');
  });
});

describe('withLogging', () => {
  it('records timing for successful operations', async () => {
    const capture = createCapturingLogger();

    await expect(withLogging(capture.logger, 'detect', async () => 42)).resolves.toBe(42);

    expect(capture.events('performance_metric')[0]).toMatchObject({ operation: 'detect', status: 'success' });
  });

  it('records timing and rethrows failures', async () => {
    const capture = createCapturingLogger();

    await expect(
      withLogging(capture.logger, 'detect', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(capture.events('performance_metric')[0]).toMatchObject({ status: 'error' });
  });
});
