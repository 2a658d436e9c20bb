import { execa } from 'execa';

export type CommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type CommandOptions = {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
};

export type CommandRunner = (
  file: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Runs an external program to completion and captures its output.
 *
 * Never rejects: a missing executable, a timeout or a signal all come back
 * as a non-zero `exitCode` with the reason in `stderr`.
 */
export const runCommand: CommandRunner = async (file, args, options = {}) => {
  const result = await execa(file, args, {
    cwd: options.cwd,
    env: options.env,
    timeout: options.timeoutMs,
    stdin: 'ignore',
    reject: false,
  });

  const stderr = result.stderr.trim();
  if (result.timedOut) {
    return {
      stdout: result.stdout.trim(),
      stderr: stderr || `${file} timed out after ${options.timeoutMs}ms`,
      exitCode: 1,
    };
  }

  if (result.exitCode === undefined) {
    return {
      stdout: result.stdout.trim(),
      stderr: stderr || `Failed to run ${file}`,
      exitCode: 1,
    };
  }

  return { stdout: result.stdout.trim(), stderr, exitCode: result.exitCode };
};

export async function commandExists(
  file: string,
  run: CommandRunner = runCommand
): Promise<boolean> {
  const result = await run(file, ['--version']);
  return result.exitCode === 0;
}
