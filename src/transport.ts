import { rm, writeFile } from 'node:fs/promises';
import { commandExists, runCommand, type CommandRunner } from './process.ts';
import type { OperationResult } from './types.ts';

export type TransportName = 'fetch' | 'curl' | 'wget';

export type HttpTransport = {
  name: TransportName;
  getText(url: string): Promise<OperationResult<string>>;
  download(url: string, destination: string): Promise<OperationResult>;
};

type FetchFn = typeof globalThis.fetch;

const USER_AGENT = 'agentation-updater';

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'TimeoutError' ? 'Request timed out' : err.message;
  }
  return 'Unknown error';
}

function timeoutSignal(timeoutMs: number): AbortSignal | undefined {
  return timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}

export function createFetchTransport(
  timeoutMs: number,
  fetchFn: FetchFn = globalThis.fetch
): HttpTransport {
  return {
    name: 'fetch',
    async getText(url) {
      try {
        const response = await fetchFn(url, {
          headers: {
            Accept: 'application/vnd.github.v3+json',
            'User-Agent': USER_AGENT,
          },
          signal: timeoutSignal(timeoutMs),
        });
        if (!response.ok) {
          return { success: false, error: `HTTP ${response.status}` };
        }
        return { success: true, data: await response.text() };
      } catch (err) {
        return { success: false, error: describeError(err) };
      }
    },
    async download(url, destination) {
      try {
        const response = await fetchFn(url, {
          headers: { 'User-Agent': USER_AGENT },
          redirect: 'follow',
          signal: timeoutSignal(timeoutMs),
        });
        if (!response.ok) {
          if (response.status === 404) {
            return {
              success: false,
              error: 'Archive not found for this platform',
            };
          }
          return { success: false, error: `HTTP ${response.status}` };
        }
        const arrayBuffer = await response.arrayBuffer();
        await writeFile(destination, Buffer.from(arrayBuffer));
        return { success: true, data: undefined };
      } catch (err) {
        await rm(destination, { force: true });
        return { success: false, error: describeError(err) };
      }
    },
  };
}

function commandArgs(
  tool: 'curl' | 'wget',
  url: string,
  timeoutMs: number,
  destination?: string
): string[] {
  const seconds = Math.ceil(timeoutMs / 1000);
  if (tool === 'curl') {
    const limit = timeoutMs > 0 ? ['--max-time', String(seconds)] : [];
    const output = destination ? ['-o', destination] : [];
    return ['-fsSL', ...limit, url, ...output];
  }
  const limit = timeoutMs > 0 ? [`--timeout=${seconds}`] : [];
  return ['-q', ...limit, '-O', destination ?? '-', url];
}

export function createCommandTransport(
  tool: 'curl' | 'wget',
  timeoutMs: number,
  run: CommandRunner = runCommand
): HttpTransport {
  return {
    name: tool,
    async getText(url) {
      const result = await run(tool, commandArgs(tool, url, timeoutMs));
      if (result.exitCode !== 0) {
        return {
          success: false,
          error: result.stderr || `${tool} exited with ${result.exitCode}`,
        };
      }
      return { success: true, data: result.stdout };
    },
    async download(url, destination) {
      const result = await run(
        tool,
        commandArgs(tool, url, timeoutMs, destination)
      );
      if (result.exitCode !== 0) {
        await rm(destination, { force: true });
        return {
          success: false,
          error: result.stderr || `${tool} exited with ${result.exitCode}`,
        };
      }
      return { success: true, data: undefined };
    },
  };
}

type ResolveTransportOptions = {
  timeoutMs: number;
  fetchFn?: FetchFn | null;
  run?: CommandRunner;
};

/**
 * Picks the first available HTTP client: the runtime's `fetch`, then
 * `curl`, then `wget`. Returns null when none is usable.
 *
 * Node always has `fetch`; the command-line clients are only tried when
 * `fetchFn` is null, which `nativeFetch: false` in the config file selects.
 */
export async function resolveTransport({
  timeoutMs,
  fetchFn = globalThis.fetch,
  run = runCommand,
}: ResolveTransportOptions): Promise<HttpTransport | null> {
  if (fetchFn) {
    return createFetchTransport(timeoutMs, fetchFn);
  }
  for (const tool of ['curl', 'wget'] as const) {
    if (await commandExists(tool, run)) {
      return createCommandTransport(tool, timeoutMs, run);
    }
  }
  return null;
}
