import type { BuildBackend } from './build.ts';
import type { VcsBackend } from './git/index.ts';
import type { Reporter } from './output.ts';
import {
  hasExceededFetchFailures,
  recordFetchFailure,
  resetFetchFailures,
} from './update-state.ts';
import type {
  OperationResult,
  SourceState,
  UpdateOptions,
  UpdateOutcome,
  UpdaterSettings,
} from './types.ts';

export const STASH_LABEL = 'auto-stash before update';

export type SourceUpdaterContext = {
  vcs: VcsBackend;
  build: BuildBackend;
  reporter: Reporter;
  settings: Pick<
    UpdaterSettings,
    'remote' | 'branch' | 'statePath' | 'maxConsecutiveFetchFailures'
  >;
};

type Revisions = Pick<SourceState, 'localRevision' | 'remoteRevision'>;

async function readRevisions(
  ctx: SourceUpdaterContext
): Promise<OperationResult<Revisions>> {
  const { vcs, settings } = ctx;

  const local = await vcs.currentRevision();
  if (!local.success) return local;

  const remote = await vcs.remoteRevision(settings.remote, settings.branch);
  if (!remote.success) return remote;

  return {
    success: true,
    data: { localRevision: local.data, remoteRevision: remote.data },
  };
}

async function handleFetchFailure(
  ctx: SourceUpdaterContext,
  error: string
): Promise<UpdateOutcome> {
  const { reporter, settings } = ctx;
  const failures = await recordFetchFailure(settings.statePath);

  if (
    hasExceededFetchFailures(failures, settings.maxConsecutiveFetchFailures)
  ) {
    const message = `Failed to fetch from ${settings.remote} ${failures} times in a row: ${error}`;
    reporter.error(message);
    return { status: 'failed', error: message };
  }

  reporter.warn(`Failed to fetch from ${settings.remote}, skipping git update`);
  return { status: 'skipped', reason: `fetch failed: ${error}` };
}

// Pull, then rebuild when the checkout has a build descriptor.
async function applyRemote(
  ctx: SourceUpdaterContext
): Promise<OperationResult> {
  const { vcs, build, reporter, settings } = ctx;

  const pullResult = await vcs.pull(settings.remote, settings.branch);
  if (!pullResult.success) {
    return {
      success: false,
      error: `Failed to pull updates: ${pullResult.error}`,
    };
  }

  if (!(await build.hasDescriptor())) {
    return { success: true, data: undefined };
  }

  reporter.info('Rebuilding agentation...');
  const installResult = await build.install();
  if (!installResult.success) {
    return { success: false, error: `Build failed: ${installResult.error}` };
  }

  const buildResult = await build.build();
  if (!buildResult.success) {
    return { success: false, error: `Build failed: ${buildResult.error}` };
  }

  return { success: true, data: undefined };
}

/**
 * Brings the agentation checkout up to date with its remote branch.
 *
 * Uncommitted work is stashed before the pull and popped exactly once
 * afterwards, whether the pull and rebuild succeeded or not.
 */
export async function updateSource(
  ctx: SourceUpdaterContext,
  { force }: UpdateOptions
): Promise<UpdateOutcome> {
  const { vcs, reporter, settings } = ctx;

  if (!(await vcs.isRepository())) {
    reporter.warn('Not a git repository, skipping agentation update');
    return { status: 'skipped', reason: 'not a git repository' };
  }

  reporter.info('Checking for agentation updates...');
  const fetchResult = await vcs.fetch(settings.remote, settings.branch);
  if (!fetchResult.success) {
    return handleFetchFailure(ctx, fetchResult.error);
  }
  await resetFetchFailures(settings.statePath);

  const revisionsResult = await readRevisions(ctx);
  if (!revisionsResult.success) {
    reporter.error(`Failed to read repository state: ${revisionsResult.error}`);
    return { status: 'failed', error: revisionsResult.error };
  }
  const revisions = revisionsResult.data;

  if (revisions.localRevision === revisions.remoteRevision && !force) {
    reporter.info('Agentation is up-to-date');
    return { status: 'upToDate', current: revisions.localRevision };
  }

  const dirtyResult = await vcs.hasUncommittedChanges();
  if (!dirtyResult.success) {
    reporter.error(`Failed to read repository state: ${dirtyResult.error}`);
    return { status: 'failed', error: dirtyResult.error };
  }
  const state: SourceState = {
    ...revisions,
    hasLocalUncommittedChanges: dirtyResult.data,
  };

  reporter.info('Updating agentation...');

  // Only a stash entry created by this run may be popped.
  let stashed = false;
  if (state.hasLocalUncommittedChanges) {
    reporter.warn('Uncommitted changes detected, stashing...');
    const stashResult = await vcs.stashPush(STASH_LABEL);
    if (!stashResult.success) {
      reporter.error(`Failed to stash changes: ${stashResult.error}`);
      return { status: 'failed', error: stashResult.error };
    }
    stashed = stashResult.data;
    if (!stashed) {
      reporter.warn('Nothing was stashed, continuing without a stash');
    }
  }

  let applied: OperationResult;
  try {
    applied = await applyRemote(ctx);
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    applied = { success: false, error: message };
  }

  const restored: OperationResult = stashed
    ? await vcs.stashPop()
    : { success: true, data: undefined };

  if (!applied.success) {
    reporter.error(applied.error);
  }
  if (!restored.success) {
    reporter.error(
      `Failed to restore stashed changes, they are still in "git stash list": ${restored.error}`
    );
  }

  if (!applied.success) {
    return { status: 'failed', error: applied.error };
  }
  if (!restored.success) {
    return { status: 'failed', error: restored.error };
  }

  reporter.success('Agentation updated successfully');
  return {
    status: 'updated',
    from: state.localRevision,
    to: state.remoteRevision,
  };
}
