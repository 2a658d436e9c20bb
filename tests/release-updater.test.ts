import { describe, expect, test, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { updateRelease } from '../src/release-updater.ts';
import { createFetchTransport } from '../src/transport.ts';
import type { PlatformId } from '../src/types.ts';
import {
  createFakeExtractor,
  createFakeTransport,
  createRecordingReporter,
  writeTextFile,
} from './fakes.ts';

const LINUX_X64: PlatformId = { os: 'linux', arch: 'x64' };
const FEED_URL =
  'https://api.github.com/repos/GutMutCode/opencode/releases/latest';
const DOWNLOAD_BASE =
  'https://github.com/GutMutCode/opencode/releases/latest/download';

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe('updateRelease', () => {
  let testDir: string;
  let binDir: string;
  let versionFile: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'release-updater-'));
    binDir = join(testDir, '.opencode');
    versionFile = join(binDir, 'version');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  const settings = () => ({
    binDir,
    versionFile,
    releaseRepo: 'GutMutCode/opencode',
    artifactName: 'opencode',
  });

  test('replaces the install and records the new tag', async () => {
    const installDir = join(binDir, 'opencode-linux-x64');
    await writeTextFile(versionFile, 'v1.2.0\n');
    await writeTextFile(join(installDir, 'bin', 'opencode'), 'old binary');
    await writeTextFile(join(installDir, 'stale.txt'), 'left over');

    const transport = createFakeTransport({ archiveContent: 'new binary' });
    const extractor = createFakeExtractor('opencode-linux-x64');
    const reporter = createRecordingReporter();

    const outcome = await updateRelease(
      { transport, extractor, reporter, settings: settings() },
      LINUX_X64,
      { force: false }
    );

    expect(outcome).toEqual({ status: 'updated', from: 'v1.2.0', to: 'v1.3.0' });
    expect(transport.requests).toEqual([
      `GET ${FEED_URL}`,
      `DOWNLOAD ${DOWNLOAD_BASE}/opencode-linux-x64.tar.gz`,
    ]);
    expect(extractor.extracted).toEqual([
      join(binDir, 'opencode-linux-x64.tar.gz'),
    ]);
    expect(await readFile(join(installDir, 'bin', 'opencode'), 'utf8')).toBe(
      'new binary'
    );
    expect(await exists(join(installDir, 'stale.txt'))).toBe(false);
    expect(await exists(join(binDir, 'opencode-linux-x64.tar.gz'))).toBe(false);
    expect(await readFile(versionFile, 'utf8')).toBe('v1.3.0\n');
    expect(reporter.entries.at(-1)).toEqual({
      level: 'success',
      message: 'OpenCode updated to v1.3.0',
    });
  });

  test('reports up-to-date on a second run with no new release', async () => {
    const ctx = {
      transport: createFakeTransport(),
      extractor: createFakeExtractor('opencode-linux-x64'),
      reporter: createRecordingReporter(),
      settings: settings(),
    };

    const first = await updateRelease(ctx, LINUX_X64, { force: false });
    const markerAfterFirst = await readFile(versionFile, 'utf8');
    const second = await updateRelease(ctx, LINUX_X64, { force: false });

    expect(first).toEqual({ status: 'updated', from: 'unknown', to: 'v1.3.0' });
    expect(second).toEqual({ status: 'upToDate', current: 'v1.3.0' });
    expect(await readFile(versionFile, 'utf8')).toBe(markerAfterFirst);
    expect(ctx.extractor.extracted).toHaveLength(1);
  });

  test('force reinstalls the current release', async () => {
    await writeTextFile(versionFile, 'v1.3.0');
    const transport = createFakeTransport();

    const outcome = await updateRelease(
      {
        transport,
        extractor: createFakeExtractor('opencode-linux-x64'),
        reporter: createRecordingReporter(),
        settings: settings(),
      },
      LINUX_X64,
      { force: true }
    );

    expect(outcome).toEqual({ status: 'updated', from: 'v1.3.0', to: 'v1.3.0' });
    expect(transport.requests).toHaveLength(2);
  });

  test('leaves the previous install untouched when the download fails', async () => {
    const installDir = join(binDir, 'opencode-linux-x64');
    await writeTextFile(versionFile, 'v1.2.0\n');
    await writeTextFile(join(installDir, 'bin', 'opencode'), 'old binary');

    const extractor = createFakeExtractor('opencode-linux-x64');
    const reporter = createRecordingReporter();

    const outcome = await updateRelease(
      {
        transport: createFakeTransport({
          download: { success: false, error: 'HTTP 500' },
        }),
        extractor,
        reporter,
        settings: settings(),
      },
      LINUX_X64,
      { force: false }
    );

    expect(outcome).toEqual({
      status: 'failed',
      error: 'Download failed: HTTP 500',
    });
    expect(await readFile(join(installDir, 'bin', 'opencode'), 'utf8')).toBe(
      'old binary'
    );
    expect(await readFile(versionFile, 'utf8')).toBe('v1.2.0\n');
    expect(extractor.extracted).toEqual([]);
    expect(reporter.entries.at(-1)).toEqual({
      level: 'error',
      message: 'Download failed: HTTP 500',
    });
  });

  test('names the HTTP status of a failed fetch download once', async () => {
    await writeTextFile(versionFile, 'v1.2.0\n');
    const fetchFn = vi.fn(
      async (input: string | URL | Request, _init?: RequestInit) =>
        String(input) === FEED_URL
          ? new Response(JSON.stringify({ tag_name: 'v1.3.0' }))
          : new Response('', { status: 500 })
    );
    const reporter = createRecordingReporter();

    const outcome = await updateRelease(
      {
        transport: createFetchTransport(5000, fetchFn),
        extractor: createFakeExtractor('opencode-linux-x64'),
        reporter,
        settings: settings(),
      },
      LINUX_X64,
      { force: false }
    );

    expect(outcome).toEqual({
      status: 'failed',
      error: 'Download failed: HTTP 500',
    });
    expect(fetchFn.mock.calls.map(([input]) => String(input))).toEqual([
      FEED_URL,
      `${DOWNLOAD_BASE}/opencode-linux-x64.tar.gz`,
    ]);
  });

  test('does not record the tag when extraction fails', async () => {
    await writeTextFile(versionFile, 'v1.2.0\n');

    const outcome = await updateRelease(
      {
        transport: createFakeTransport(),
        extractor: createFakeExtractor('opencode-linux-x64', {
          success: false,
          error: 'Failed to extract: TAR_BAD_ARCHIVE',
        }),
        reporter: createRecordingReporter(),
        settings: settings(),
      },
      LINUX_X64,
      { force: false }
    );

    expect(outcome).toEqual({
      status: 'failed',
      error: 'Failed to extract: TAR_BAD_ARCHIVE',
    });
    expect(await readFile(versionFile, 'utf8')).toBe('v1.2.0\n');
    expect(await exists(join(binDir, 'opencode-linux-x64.tar.gz'))).toBe(false);
  });

  test('downloads a zip archive on windows', async () => {
    const transport = createFakeTransport();
    const extractor = createFakeExtractor('opencode-windows-x64');

    await updateRelease(
      {
        transport,
        extractor,
        reporter: createRecordingReporter(),
        settings: settings(),
      },
      { os: 'windows', arch: 'x64' },
      { force: false }
    );

    expect(transport.requests[1]).toBe(
      `DOWNLOAD ${DOWNLOAD_BASE}/opencode-windows-x64.zip`
    );
    expect(extractor.extracted).toEqual([
      join(binDir, 'opencode-windows-x64.zip'),
    ]);
  });

  test('skips an unknown platform without any request', async () => {
    const transport = createFakeTransport();

    const outcome = await updateRelease(
      {
        transport,
        extractor: createFakeExtractor('unused'),
        reporter: createRecordingReporter(),
        settings: settings(),
      },
      { os: 'linux', arch: 'unknown' },
      { force: true }
    );

    expect(outcome).toEqual({ status: 'skipped', reason: 'unknown platform' });
    expect(transport.requests).toEqual([]);
  });

  test('skips darwin-x64 without any request', async () => {
    const transport = createFakeTransport();
    const reporter = createRecordingReporter();

    const outcome = await updateRelease(
      {
        transport,
        extractor: createFakeExtractor('unused'),
        reporter,
        settings: settings(),
      },
      { os: 'darwin', arch: 'x64' },
      { force: false }
    );

    expect(outcome).toEqual({
      status: 'skipped',
      reason: 'no prebuilt binary for darwin-x64',
    });
    expect(transport.requests).toEqual([]);
    expect(reporter.entries).toEqual([
      {
        level: 'warn',
        message:
          'darwin-x64 requires building OpenCode from source, skipping binary update',
      },
    ]);
  });

  test('fails when no HTTP client is available', async () => {
    const reporter = createRecordingReporter();

    const outcome = await updateRelease(
      {
        transport: null,
        extractor: createFakeExtractor('unused'),
        reporter,
        settings: settings(),
      },
      LINUX_X64,
      { force: false }
    );

    expect(outcome).toEqual({
      status: 'failed',
      error: 'Neither fetch, curl nor wget is available',
    });
    expect(reporter.entries).toEqual([
      { level: 'error', message: 'Neither fetch, curl nor wget is available' },
    ]);
  });

  test('skips when the release feed is unreachable', async () => {
    const outcome = await updateRelease(
      {
        transport: createFakeTransport({
          latest: { success: false, error: 'HTTP 403' },
        }),
        extractor: createFakeExtractor('unused'),
        reporter: createRecordingReporter(),
        settings: settings(),
      },
      LINUX_X64,
      { force: false }
    );

    expect(outcome).toEqual({
      status: 'skipped',
      reason: 'Release feed error: HTTP 403',
    });
  });

  test('skips when the release feed returns no tag', async () => {
    const transport = createFakeTransport({
      latest: { success: true, data: '<html>rate limited</html>' },
    });

    const outcome = await updateRelease(
      {
        transport,
        extractor: createFakeExtractor('unused'),
        reporter: createRecordingReporter(),
        settings: settings(),
      },
      LINUX_X64,
      { force: false }
    );

    expect(outcome).toEqual({
      status: 'skipped',
      reason: 'Invalid response from release feed',
    });
    expect(transport.requests).toEqual([`GET ${FEED_URL}`]);
    expect(await exists(versionFile)).toBe(false);
  });
});
