import type { CommandResult } from '../process.ts';
import type { OperationResult } from '../types.ts';

export type GitCommandResult = CommandResult;

export type GitRunner = (
  args: string[],
  cwd: string,
  timeoutMs?: number
) => Promise<GitCommandResult>;

export type GitContext = {
  repoDir: string;
  timeoutMs?: number;
  run: GitRunner;
};

/**
 * Version-control operations the source updater depends on. Every method
 * reports failure through its result instead of throwing.
 */
export type VcsBackend = {
  isRepository(): Promise<boolean>;
  fetch(remote: string, branch: string): Promise<OperationResult>;
  currentRevision(): Promise<OperationResult<string>>;
  remoteRevision(
    remote: string,
    branch: string
  ): Promise<OperationResult<string>>;
  hasUncommittedChanges(): Promise<OperationResult<boolean>>;
  stashPush(label: string): Promise<OperationResult<boolean>>;
  stashPop(): Promise<OperationResult>;
  pull(remote: string, branch: string): Promise<OperationResult>;
};
