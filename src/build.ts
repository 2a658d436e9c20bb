import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { commandExists, runCommand, type CommandRunner } from './process.ts';
import type { OperationResult } from './types.ts';

export const BUILD_DESCRIPTOR = 'package.json';

export type PackageManager = 'pnpm' | 'npm';

export type BuildBackend = {
  hasDescriptor(): Promise<boolean>;
  install(): Promise<OperationResult>;
  build(): Promise<OperationResult>;
};

export async function detectPackageManager(
  run: CommandRunner = runCommand
): Promise<PackageManager> {
  return (await commandExists('pnpm', run)) ? 'pnpm' : 'npm';
}

async function runStep(
  run: CommandRunner,
  rootDir: string,
  packageManager: PackageManager,
  args: string[],
  label: string
): Promise<OperationResult> {
  const result = await run(packageManager, args, { cwd: rootDir });

  if (result.exitCode !== 0) {
    const detail = result.stderr ? `: ${lastLine(result.stderr)}` : '';
    return {
      success: false,
      error: `${packageManager} ${label} failed${detail}`,
    };
  }

  return { success: true, data: undefined };
}

function lastLine(text: string): string {
  const lines = text.split('\n').filter((line) => line.trim().length > 0);
  return lines[lines.length - 1] ?? text;
}

/**
 * Rebuilds a checkout with whichever package manager is installed,
 * preferring pnpm. Output is captured, never streamed.
 */
export function createPackageManagerBuild(
  rootDir: string,
  run: CommandRunner = runCommand
): BuildBackend {
  let packageManager: Promise<PackageManager> | undefined;

  const step = async (args: string[], label: string) => {
    packageManager ??= detectPackageManager(run);
    return runStep(run, rootDir, await packageManager, args, label);
  };

  return {
    async hasDescriptor() {
      try {
        return (await stat(join(rootDir, BUILD_DESCRIPTOR))).isFile();
      } catch {
        return false;
      }
    },
    install: () => step(['install'], 'install'),
    build: () => step(['run', 'build'], 'build'),
  };
}
