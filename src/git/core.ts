import { runCommand } from '../process.ts';
import type { GitCommandResult } from './types.ts';

export async function runGitCommand(
  args: string[],
  cwd: string,
  timeoutMs?: number
): Promise<GitCommandResult> {
  return runCommand('git', args, {
    cwd,
    timeoutMs,
    // fail instead of blocking on a credential prompt
    env: { GIT_TERMINAL_PROMPT: '0' },
  });
}
