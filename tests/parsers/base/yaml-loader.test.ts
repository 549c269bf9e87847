/**
 * YAML Loader Tests
 * @module tests/parsers/base/yaml-loader.test
 */

import { describe, it, expect } from 'vitest';
import {
  isYamlMapping,
  loadYamlMapping,
  mappingEntries,
  toCommandList,
} from '../../../src/parsers/base/yaml-loader';
import { CIConfigParseError } from '../../../src/errors/domain';

describe('loadYamlMapping', () => {
  it('returns the mapping', () => {
    expect(loadYamlMapping('script: pytest\n', 'ci.yml')).toEqual({ script: 'pytest' });
  });

  it('returns null for an empty or comment-only document', () => {
    expect(loadYamlMapping('', 'ci.yml')).toBeNull();
    expect(loadYamlMapping('# only a comment\n', 'ci.yml')).toBeNull();
  });

  it('resolves merge keys', () => {
    const content = `
.defaults: &defaults
  script: [npm test]
job:
  <<: *defaults
`;
    expect(loadYamlMapping(content, 'ci.yml')).toEqual({
      '.defaults': { script: ['npm test'] },
      job: { script: ['npm test'] },
    });
  });

  it('throws CIConfigParseError with the line of a syntax error', () => {
    let caught: unknown;
    try {
      loadYamlMapping('a: 1\nb: [2\n', 'ci.yml');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CIConfigParseError);
    if (caught instanceof CIConfigParseError) {
      expect(caught.code).toBe('INVALID_YAML');
      expect(caught.filePath).toBe('ci.yml');
      expect(caught.message.startsWith('Invalid YAML in ci.yml')).toBe(true);
    }
  });

  it('rejects a scalar root', () => {
    expect(() => loadYamlMapping('42\n', 'ci.yml')).toThrow(
      'Unexpected structure in ci.yml: document root must be a mapping, got number'
    );
  });
});

describe('toCommandList', () => {
  it('wraps a string', () => {
    expect(toCommandList('  pytest  ')).toEqual(['pytest']);
    expect(toCommandList('   ')).toEqual([]);
  });

  it('keeps only non-empty string items', () => {
    expect(toCommandList(['make', null, false, '', 7, '  ', { name: 'x' }])).toEqual(['make']);
  });

  it('flattens nested lists in order', () => {
    expect(toCommandList([['npm ci', ['npm test']], 'echo done'])).toEqual([
      'npm ci',
      'npm test',
      'echo done',
    ]);
  });

  it('ignores other shapes', () => {
    expect(toCommandList({ run: 'pytest' })).toEqual([]);
    expect(toCommandList(undefined)).toEqual([]);
  });
});

describe('mapping helpers', () => {
  it('isYamlMapping accepts only plain objects', () => {
    expect(isYamlMapping({})).toBe(true);
    expect(isYamlMapping([])).toBe(false);
    expect(isYamlMapping(null)).toBe(false);
    expect(isYamlMapping('x')).toBe(false);
  });

  it('mappingEntries lists entries of a mapping only', () => {
    expect(mappingEntries({ a: 1 })).toEqual([['a', 1]]);
    expect(mappingEntries(['a'])).toEqual([]);
  });
});
