/**
 * Detectors Module
 * @module detectors
 */

export {
  GITHUB_WORKFLOWS_DIR,
  PLATFORM_CONFIG_FILES,
  findWorkflowFile,
  detectPlatforms,
} from './platform-detector';

export type { ConfigLocation, DetectedPlatform } from './platform-detector';
