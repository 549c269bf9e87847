/**
 * Base Parser Module
 * @module parsers/base
 */

export {
  BaseCIParser,
  isParsedOutcome,
  isMalformedOutcome,
  isNotFoundOutcome,
} from './parser';

export type {
  ParsedCIConfig,
  ParseMetadata,
  ParsedOutcome,
  MalformedOutcome,
  NotFoundOutcome,
  CIParseOutcome,
  CIParserOptions,
  CIConfigParser,
} from './parser';

export { StepCollector } from './step-collector';

export {
  loadYamlMapping,
  isYamlMapping,
  toCommandList,
  mappingEntries,
} from './yaml-loader';

export type { YamlMapping } from './yaml-loader';
