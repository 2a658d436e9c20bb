import { runGitCommand } from './core.ts';
import { fetchBranch, pullBranch } from './remote.ts';
import { getRevision, hasUncommittedChanges, isGitRepo } from './repository.ts';
import { stashPop, stashPush } from './stash.ts';
import type { GitRunner, VcsBackend } from './types.ts';

type GitBackendOptions = {
  timeoutMs?: number;
  run?: GitRunner;
};

export function createGitBackend(
  repoDir: string,
  options: GitBackendOptions = {}
): VcsBackend {
  const git = {
    repoDir,
    timeoutMs: options.timeoutMs,
    run: options.run ?? runGitCommand,
  };

  return {
    isRepository: () => isGitRepo(repoDir),
    fetch: (remote, branch) => fetchBranch(git, remote, branch),
    currentRevision: () => getRevision(git, 'HEAD'),
    remoteRevision: (remote, branch) => getRevision(git, `${remote}/${branch}`),
    hasUncommittedChanges: () => hasUncommittedChanges(git),
    stashPush: (label) => stashPush(git, label),
    stashPop: () => stashPop(git),
    pull: (remote, branch) => pullBranch(git, remote, branch),
  };
}
