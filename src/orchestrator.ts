import { createArchiveExtractor, type ArchiveExtractor } from './archive.ts';
import { createPackageManagerBuild, type BuildBackend } from './build.ts';
import { createGitBackend, type VcsBackend } from './git/index.ts';
import type { Reporter } from './output.ts';
import { resolvePlatform } from './platform.ts';
import { updateRelease } from './release-updater.ts';
import { updateSource } from './source-updater.ts';
import { resolveTransport, type HttpTransport } from './transport.ts';
import type {
  PlatformId,
  UpdateOptions,
  UpdateOutcome,
  UpdaterSettings,
} from './types.ts';

export type UpdaterContext = {
  settings: UpdaterSettings;
  reporter: Reporter;
  vcs: VcsBackend;
  build: BuildBackend;
  transport: HttpTransport | null;
  extractor: ArchiveExtractor;
  resolvePlatform: () => PlatformId;
};

export type RunSummary = {
  platform: PlatformId;
  source: UpdateOutcome;
  release: UpdateOutcome;
  exitCode: 0 | 1;
};

export async function createUpdaterContext(
  settings: UpdaterSettings,
  reporter: Reporter
): Promise<UpdaterContext> {
  return {
    settings,
    reporter,
    vcs: createGitBackend(settings.rootDir, { timeoutMs: settings.timeoutMs }),
    build: createPackageManagerBuild(settings.rootDir),
    transport: await resolveTransport({
      timeoutMs: settings.timeoutMs,
      fetchFn: settings.nativeFetch ? globalThis.fetch : null,
    }),
    extractor: createArchiveExtractor(),
    resolvePlatform: () => resolvePlatform(),
  };
}

export function getExitCode(outcomes: UpdateOutcome[]): 0 | 1 {
  return outcomes.some((outcome) => outcome.status === 'failed') ? 1 : 0;
}

// A pipeline that throws is reported as failed so the other still runs.
async function settle(
  reporter: Reporter,
  pipeline: () => Promise<UpdateOutcome>
): Promise<UpdateOutcome> {
  try {
    return await pipeline();
  } catch (err) {
    const error = err instanceof Error ? err.message : 'Unknown error';
    reporter.error(error);
    return { status: 'failed', error };
  }
}

export async function runUpdate(
  ctx: UpdaterContext,
  options: UpdateOptions
): Promise<RunSummary> {
  const platform = ctx.resolvePlatform();

  const source = await settle(ctx.reporter, () => updateSource(ctx, options));
  const release = await settle(ctx.reporter, () =>
    updateRelease(ctx, platform, options)
  );

  return {
    platform,
    source,
    release,
    exitCode: getExitCode([source, release]),
  };
}
