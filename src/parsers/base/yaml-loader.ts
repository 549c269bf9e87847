/**
 * YAML Loading Helpers
 * @module parsers/base/yaml-loader
 *
 * Shared YAML handling for the four YAML-based CI formats.
 */

import * as yaml from 'yaml';
import { CIConfigParseError } from '../../errors/domain';

/**
 * Plain YAML mapping
 */
export type YamlMapping = Record<string, unknown>;

export function isYamlMapping(value: unknown): value is YamlMapping {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Parse a YAML document whose root must be a mapping.
 *
 * Returns null for an empty or comment-only document. Throws
 * CIConfigParseError for syntax errors or a non-mapping root.
 */
export function loadYamlMapping(content: string, filePath: string): YamlMapping | null {
  const doc = yaml.parseDocument(content, {
    uniqueKeys: false,
    merge: true,
  });

  if (doc.errors.length > 0) {
    const first = doc.errors[0];
    throw CIConfigParseError.invalidYaml(filePath, first.message, first.linePos?.[0]?.line);
  }

  const value: unknown = doc.toJS();

  if (value === null || value === undefined) {
    return null;
  }

  if (!isYamlMapping(value)) {
    throw CIConfigParseError.invalidStructure(
      filePath,
      `document root must be a mapping, got ${Array.isArray(value) ? 'a sequence' : typeof value}`
    );
  }

  return value;
}

/**
 * Normalise a `script`-style value (string or list) into trimmed,
 * non-empty strings. Nested lists, as produced by reused anchors, are
 * flattened; items that are not strings are dropped.
 */
export function toCommandList(value: unknown): string[] {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? [trimmed] : [];
  }

  if (Array.isArray(value)) {
    return value.flatMap(item =>
      typeof item === 'string' || Array.isArray(item) ? toCommandList(item) : []
    );
  }

  return [];
}

/**
 * Entries of a mapping-valued key, or an empty list
 */
export function mappingEntries(value: unknown): Array<[string, unknown]> {
  return isYamlMapping(value) ? Object.entries(value) : [];
}
