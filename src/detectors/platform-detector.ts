/**
 * CI Platform Detector
 * @module detectors/platform-detector
 *
 * Probes a repository root for the configuration files of each supported
 * CI platform. Only fixed locations are checked; nothing is searched
 * recursively.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { getErrorMessage, getSystemErrorCode } from '../errors/base';
import { CI_PLATFORMS, CIPlatform } from '../types/ci-config';

// ============================================================================
// Types
// ============================================================================

/**
 * A platform whose configuration file exists in the repository
 */
export interface DetectedPlatform {
  readonly platform: CIPlatform;
  /** Absolute path of the configuration file */
  readonly configPath: string;
  /** Path relative to the repository root, posix separators */
  readonly relativePath: string;
  /** Why the location could not be probed, null when it was */
  readonly probeError: string | null;
}

/**
 * Where a platform's configuration was found, relative to the root
 */
export interface ConfigLocation {
  readonly relativePath: string;
  readonly probeError: string | null;
}

type ProbeResult =
  | { readonly kind: 'file' }
  | { readonly kind: 'absent' }
  | { readonly kind: 'unreadable'; readonly reason: string };

// ============================================================================
// Known Locations
// ============================================================================

/** Directory holding GitHub Actions workflows */
export const GITHUB_WORKFLOWS_DIR = '.github/workflows';

const WORKFLOW_FILE_PATTERN = /\.ya?ml$/;

/**
 * Fixed configuration file locations, relative to the repository root
 */
export const PLATFORM_CONFIG_FILES: Readonly<Record<Exclude<CIPlatform, 'github_actions'>, string>> = {
  gitlab_ci: '.gitlab-ci.yml',
  circleci: '.circleci/config.yml',
  travis_ci: '.travis.yml',
  jenkins: 'Jenkinsfile',
};

// ============================================================================
// Detection
// ============================================================================

/** Error codes meaning "nothing usable at this path" */
const ABSENT_CODES: ReadonlySet<string> = new Set(['ENOENT', 'ENOTDIR', 'ELOOP']);

function isAbsent(error: unknown): boolean {
  const code = getSystemErrorCode(error);
  return code !== undefined && ABSENT_CODES.has(code);
}

async function probeFile(filePath: string): Promise<ProbeResult> {
  try {
    return (await fs.stat(filePath)).isFile() ? { kind: 'file' } : { kind: 'absent' };
  } catch (error) {
    if (isAbsent(error)) {
      return { kind: 'absent' };
    }
    return { kind: 'unreadable', reason: getErrorMessage(error) };
  }
}

/**
 * First workflow file under .github/workflows in lexical order, or null.
 * A location that cannot be probed is returned with its error.
 */
export async function findWorkflowFile(repoPath: string): Promise<ConfigLocation | null> {
  const workflowsDir = path.join(repoPath, ...GITHUB_WORKFLOWS_DIR.split('/'));

  let names: string[];
  try {
    names = await fs.readdir(workflowsDir);
  } catch (error) {
    if (isAbsent(error)) {
      return null;
    }
    return { relativePath: GITHUB_WORKFLOWS_DIR, probeError: getErrorMessage(error) };
  }

  const candidates = names
    .filter(name => WORKFLOW_FILE_PATTERN.test(name))
    .sort();

  for (const name of candidates) {
    const relativePath = `${GITHUB_WORKFLOWS_DIR}/${name}`;
    const probe = await probeFile(path.join(workflowsDir, name));
    if (probe.kind === 'file') {
      return { relativePath, probeError: null };
    }
    if (probe.kind === 'unreadable') {
      return { relativePath, probeError: probe.reason };
    }
  }

  return null;
}

async function findConfigFile(repoPath: string, platform: CIPlatform): Promise<ConfigLocation | null> {
  if (platform === 'github_actions') {
    return findWorkflowFile(repoPath);
  }

  const relativePath = PLATFORM_CONFIG_FILES[platform];
  const probe = await probeFile(path.join(repoPath, ...relativePath.split('/')));
  switch (probe.kind) {
    case 'file':
      return { relativePath, probeError: null };
    case 'unreadable':
      return { relativePath, probeError: probe.reason };
    case 'absent':
      return null;
  }
}

/**
 * Every platform with a configuration file in the repository root,
 * in fixed platform order. Broken symlinks and loops count as absent;
 * any other probe failure is reported on the entry.
 */
export async function detectPlatforms(repoPath: string): Promise<DetectedPlatform[]> {
  const root = path.resolve(repoPath);

  const found = await Promise.all(
    CI_PLATFORMS.map(async (platform) => ({
      platform,
      location: await findConfigFile(root, platform),
    }))
  );

  const detected: DetectedPlatform[] = [];
  for (const { platform, location } of found) {
    if (location !== null) {
      detected.push({
        platform,
        relativePath: location.relativePath,
        configPath: path.join(root, ...location.relativePath.split('/')),
        probeError: location.probeError,
      });
    }
  }

  return detected;
}
