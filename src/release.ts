import { formatPlatform } from './platform.ts';
import type { HttpTransport } from './transport.ts';
import type { OperationResult, PlatformId } from './types.ts';

export type ArchiveFormat = 'tar.gz' | 'zip';

type GitHubRelease = {
  tag_name: string;
};

function isGitHubRelease(data: unknown): data is GitHubRelease {
  if (typeof data !== 'object' || data === null) return false;
  if (!('tag_name' in data)) return false;
  return typeof data.tag_name === 'string';
}

export function getLatestReleaseApiUrl(releaseRepo: string): string {
  return `https://api.github.com/repos/${releaseRepo}/releases/latest`;
}

export function getArchiveFormat(platform: PlatformId): ArchiveFormat {
  return platform.os === 'windows' ? 'zip' : 'tar.gz';
}

export function getInstallDirName(
  artifactName: string,
  platform: PlatformId
): string {
  return `${artifactName}-${formatPlatform(platform)}`;
}

export function getArchiveName(
  artifactName: string,
  platform: PlatformId
): string {
  return `${getInstallDirName(artifactName, platform)}.${getArchiveFormat(platform)}`;
}

export function getDownloadUrl(releaseRepo: string, archiveName: string): string {
  return `https://github.com/${releaseRepo}/releases/latest/download/${archiveName}`;
}

export function parseLatestTag(body: string): OperationResult<string> {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return { success: false, error: 'Invalid response from release feed' };
  }

  // Some endpoints return a list of releases, newest first.
  const release: unknown = Array.isArray(data) ? data[0] : data;
  if (!isGitHubRelease(release)) {
    return { success: false, error: 'Release feed has no tag name' };
  }

  const tag = release.tag_name.trim();
  if (!tag) {
    return { success: false, error: 'Release feed has an empty tag name' };
  }
  return { success: true, data: tag };
}

export async function fetchLatestTag(
  transport: HttpTransport,
  releaseRepo: string
): Promise<OperationResult<string>> {
  const response = await transport.getText(getLatestReleaseApiUrl(releaseRepo));
  if (!response.success) {
    return { success: false, error: `Release feed error: ${response.error}` };
  }
  return parseLatestTag(response.data);
}
