import * as tar from 'tar';
import { runCommand, type CommandRunner } from './process.ts';
import type { OperationResult } from './types.ts';

export type ArchiveExtractor = {
  extract(archivePath: string, destDir: string): Promise<OperationResult>;
};

export function createArchiveExtractor(
  run: CommandRunner = runCommand
): ArchiveExtractor {
  return {
    async extract(archivePath, destDir) {
      if (archivePath.endsWith('.zip')) {
        const result = await run('unzip', [
          '-o',
          '-q',
          archivePath,
          '-d',
          destDir,
        ]);
        if (result.exitCode !== 0) {
          return {
            success: false,
            error: result.stderr || `unzip exited with ${result.exitCode}`,
          };
        }
        return { success: true, data: undefined };
      }

      try {
        await tar.x({ file: archivePath, cwd: destDir, strict: true });
        return { success: true, data: undefined };
      } catch (err) {
        const message = err instanceof Error ? err.message : 'Unknown error';
        return { success: false, error: `Failed to extract: ${message}` };
      }
    },
  };
}
