import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type {
  OperationResult,
  UpdaterConfigFile,
  UpdaterSettings,
} from './types.ts';

export const DEFAULT_REMOTE = 'origin';
export const DEFAULT_BRANCH = 'main';
export const DEFAULT_RELEASE_REPO = 'GutMutCode/opencode';
export const DEFAULT_ARTIFACT_NAME = 'opencode';
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_FETCH_FAILURES = 5;

const BIN_DIR_NAME = '.opencode';

export function getDefaultRootDir(): string {
  const envRoot = process.env.AGENTATION_ROOT;
  if (envRoot) return envRoot;
  return fileURLToPath(new URL('..', import.meta.url));
}

export function getConfigPath(rootDir: string): string {
  return join(rootDir, BIN_DIR_NAME, 'update.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || (typeof value === 'string' && value !== '');
}

function isOptionalCount(value: unknown): boolean {
  return (
    value === undefined ||
    (typeof value === 'number' && Number.isInteger(value) && value >= 0)
  );
}

function isUpdaterConfigFile(value: unknown): value is UpdaterConfigFile {
  if (!isRecord(value) || Array.isArray(value)) return false;
  if (!isOptionalString(value.remote)) return false;
  if (!isOptionalString(value.branch)) return false;
  if (!isOptionalString(value.artifactName)) return false;
  if (value.releaseRepo !== undefined) {
    if (typeof value.releaseRepo !== 'string') return false;
    if (!/^[\w.-]+\/[\w.-]+$/.test(value.releaseRepo)) return false;
  }
  if (!isOptionalCount(value.timeoutMs)) return false;
  if (!isOptionalCount(value.maxConsecutiveFetchFailures)) return false;
  if (
    value.nativeFetch !== undefined &&
    typeof value.nativeFetch !== 'boolean'
  ) {
    return false;
  }
  return true;
}

export async function readConfig(
  configPath: string
): Promise<OperationResult<UpdaterConfigFile>> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch {
    return { success: true, data: {} };
  }

  try {
    const content: unknown = JSON.parse(text);
    if (!isUpdaterConfigFile(content)) {
      return { success: false, error: 'Invalid config file format' };
    }
    return { success: true, data: content };
  } catch {
    return { success: false, error: 'Failed to parse config file' };
  }
}

export function resolveSettings(
  rootDir: string,
  config: UpdaterConfigFile = {}
): UpdaterSettings {
  const binDir = join(rootDir, BIN_DIR_NAME);
  return {
    rootDir,
    binDir,
    versionFile: join(binDir, 'version'),
    statePath: join(binDir, 'update-state.json'),
    remote: config.remote ?? DEFAULT_REMOTE,
    branch: config.branch ?? DEFAULT_BRANCH,
    releaseRepo: config.releaseRepo ?? DEFAULT_RELEASE_REPO,
    artifactName: config.artifactName ?? DEFAULT_ARTIFACT_NAME,
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxConsecutiveFetchFailures:
      config.maxConsecutiveFetchFailures ?? DEFAULT_MAX_FETCH_FAILURES,
    nativeFetch: config.nativeFetch ?? true,
  };
}

export async function loadSettings(
  rootDir: string = getDefaultRootDir()
): Promise<OperationResult<UpdaterSettings>> {
  const configResult = await readConfig(getConfigPath(rootDir));
  if (!configResult.success) return configResult;
  return { success: true, data: resolveSettings(rootDir, configResult.data) };
}
