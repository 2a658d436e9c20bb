import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { OperationResult } from '../types.ts';
import type { GitContext } from './types.ts';

// `.git` is a directory in a normal clone and a file in a worktree.
export async function isGitRepo(repoDir: string): Promise<boolean> {
  try {
    await stat(join(repoDir, '.git'));
    return true;
  } catch {
    return false;
  }
}

export async function getRevision(
  git: GitContext,
  ref: string
): Promise<OperationResult<string>> {
  const result = await git.run(['rev-parse', '--verify', ref], git.repoDir);

  if (result.exitCode !== 0 || !result.stdout) {
    return {
      success: false,
      error: result.stderr || `Failed to resolve ${ref}`,
    };
  }

  return { success: true, data: result.stdout };
}

export async function hasUncommittedChanges(
  git: GitContext
): Promise<OperationResult<boolean>> {
  const result = await git.run(['status', '--porcelain'], git.repoDir);

  if (result.exitCode !== 0) {
    return { success: false, error: result.stderr || 'Failed to check status' };
  }

  return { success: true, data: result.stdout.length > 0 };
}
