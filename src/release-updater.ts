import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type { ArchiveExtractor } from './archive.ts';
import type { Reporter } from './output.ts';
import {
  formatPlatform,
  isKnownPlatform,
  isUnsupportedPlatform,
} from './platform.ts';
import {
  fetchLatestTag,
  getArchiveName,
  getDownloadUrl,
  getInstallDirName,
} from './release.ts';
import type { HttpTransport } from './transport.ts';
import type {
  PlatformId,
  UpdateOptions,
  UpdateOutcome,
  UpdaterSettings,
} from './types.ts';
import {
  isCurrentVersion,
  readVersionMarker,
  writeVersionMarker,
} from './version-marker.ts';

export type ReleaseUpdaterContext = {
  transport: HttpTransport | null;
  extractor: ArchiveExtractor;
  reporter: Reporter;
  settings: Pick<
    UpdaterSettings,
    'binDir' | 'versionFile' | 'releaseRepo' | 'artifactName'
  >;
};

/**
 * Installs the latest OpenCode release for `platform` under `binDir`.
 *
 * The existing install directory is only removed once the new archive is
 * fully on disk, and the version marker is only written after extraction.
 */
export async function updateRelease(
  ctx: ReleaseUpdaterContext,
  platform: PlatformId,
  { force }: UpdateOptions
): Promise<UpdateOutcome> {
  const { transport, extractor, reporter, settings } = ctx;

  if (!isKnownPlatform(platform)) {
    reporter.warn('Unknown platform, skipping OpenCode update');
    return { status: 'skipped', reason: 'unknown platform' };
  }

  if (isUnsupportedPlatform(platform)) {
    reporter.warn(
      `${formatPlatform(platform)} requires building OpenCode from source, skipping binary update`
    );
    return {
      status: 'skipped',
      reason: `no prebuilt binary for ${formatPlatform(platform)}`,
    };
  }

  if (!transport) {
    const error = 'Neither fetch, curl nor wget is available';
    reporter.error(error);
    return { status: 'failed', error };
  }

  reporter.info('Checking for OpenCode updates...');
  const currentVersion = await readVersionMarker(settings.versionFile);

  const latestResult = await fetchLatestTag(transport, settings.releaseRepo);
  if (!latestResult.success) {
    reporter.warn('Could not fetch latest version, skipping OpenCode update');
    return { status: 'skipped', reason: latestResult.error };
  }
  const latestVersion = latestResult.data;

  if (isCurrentVersion(currentVersion, latestVersion) && !force) {
    reporter.info(`OpenCode is up-to-date (${currentVersion})`);
    return { status: 'upToDate', current: currentVersion };
  }

  reporter.info(`Updating OpenCode: ${currentVersion} -> ${latestVersion}`);

  const archiveName = getArchiveName(settings.artifactName, platform);
  const archivePath = join(settings.binDir, archiveName);
  const installDir = join(
    settings.binDir,
    getInstallDirName(settings.artifactName, platform)
  );

  await mkdir(settings.binDir, { recursive: true });

  reporter.info(`Downloading ${archiveName}...`);
  const downloadResult = await transport.download(
    getDownloadUrl(settings.releaseRepo, archiveName),
    archivePath
  );
  if (!downloadResult.success) {
    const error = `Download failed: ${downloadResult.error}`;
    reporter.error(error);
    return { status: 'failed', error };
  }

  await rm(installDir, { recursive: true, force: true });

  reporter.info('Extracting...');
  const extractResult = await extractor.extract(archivePath, settings.binDir);
  await rm(archivePath, { force: true });
  if (!extractResult.success) {
    reporter.error(extractResult.error);
    return { status: 'failed', error: extractResult.error };
  }

  const markerResult = await writeVersionMarker(
    settings.versionFile,
    latestVersion
  );
  if (!markerResult.success) {
    reporter.error(markerResult.error);
    return { status: 'failed', error: markerResult.error };
  }

  reporter.success(`OpenCode updated to ${latestVersion}`);
  return { status: 'updated', from: currentVersion, to: latestVersion };
}
