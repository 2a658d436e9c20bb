import type { OperationResult } from '../types.ts';
import type { GitContext } from './types.ts';

export async function fetchBranch(
  git: GitContext,
  remote: string,
  branch: string
): Promise<OperationResult> {
  const result = await git.run(
    ['fetch', remote, branch, '--quiet'],
    git.repoDir,
    git.timeoutMs
  );

  if (result.exitCode !== 0) {
    return { success: false, error: result.stderr || 'Failed to fetch' };
  }

  return { success: true, data: undefined };
}

export async function pullBranch(
  git: GitContext,
  remote: string,
  branch: string
): Promise<OperationResult> {
  const result = await git.run(
    ['pull', remote, branch, '--quiet'],
    git.repoDir,
    git.timeoutMs
  );

  if (result.exitCode !== 0) {
    return { success: false, error: result.stderr || 'Failed to pull' };
  }

  return { success: true, data: undefined };
}
