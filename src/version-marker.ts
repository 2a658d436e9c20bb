import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { OperationResult } from './types.ts';

export const UNKNOWN_VERSION = 'unknown';

export async function readVersionMarker(versionFile: string): Promise<string> {
  try {
    const content = await readFile(versionFile, 'utf8');
    return content.trim() || UNKNOWN_VERSION;
  } catch {
    return UNKNOWN_VERSION;
  }
}

export async function writeVersionMarker(
  versionFile: string,
  version: string
): Promise<OperationResult> {
  try {
    await mkdir(dirname(versionFile), { recursive: true });
    await writeFile(versionFile, version + '\n');
    return { success: true, data: undefined };
  } catch (err) {
    const message = err instanceof Error ? err.message : 'Unknown error';
    return { success: false, error: `Failed to write version: ${message}` };
  }
}

// The unknown marker never matches, so a missing file always means stale.
export function isCurrentVersion(current: string, latest: string): boolean {
  return current !== UNKNOWN_VERSION && current === latest;
}
