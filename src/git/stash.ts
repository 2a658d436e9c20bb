import type { OperationResult } from '../types.ts';
import type { GitContext } from './types.ts';

async function getStashTip(git: GitContext): Promise<string> {
  const result = await git.run(
    ['rev-parse', '-q', '--verify', 'refs/stash'],
    git.repoDir
  );
  return result.exitCode === 0 ? result.stdout : '';
}

/**
 * Stashes the working tree, untracked files included. The data is whether
 * a new stash entry was created: `git stash push` exits 0 without creating
 * one when the only changes are inside a submodule.
 */
export async function stashPush(
  git: GitContext,
  label: string
): Promise<OperationResult<boolean>> {
  const before = await getStashTip(git);

  const result = await git.run(
    ['stash', 'push', '--include-untracked', '-m', label, '--quiet'],
    git.repoDir
  );

  if (result.exitCode !== 0) {
    return { success: false, error: result.stderr || 'Failed to stash' };
  }

  const after = await getStashTip(git);
  return { success: true, data: after !== '' && after !== before };
}

export async function stashPop(git: GitContext): Promise<OperationResult> {
  const result = await git.run(['stash', 'pop', '--quiet'], git.repoDir);

  if (result.exitCode !== 0) {
    return {
      success: false,
      error: result.stderr || 'Failed to restore stashed changes',
    };
  }

  return { success: true, data: undefined };
}
