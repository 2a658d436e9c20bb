import { describe, expect, test } from 'vitest';
import {
  fetchLatestTag,
  getArchiveFormat,
  getArchiveName,
  getDownloadUrl,
  getInstallDirName,
  getLatestReleaseApiUrl,
  parseLatestTag,
} from '../src/release.ts';
import { createFakeTransport } from './fakes.ts';

describe('getArchiveName', () => {
  test('uses tar.gz for linux and darwin', () => {
    expect(getArchiveName('opencode', { os: 'linux', arch: 'x64' })).toBe(
      'opencode-linux-x64.tar.gz'
    );
    expect(getArchiveName('opencode', { os: 'darwin', arch: 'arm64' })).toBe(
      'opencode-darwin-arm64.tar.gz'
    );
  });

  test('uses zip for windows', () => {
    expect(getArchiveName('tool', { os: 'windows', arch: 'arm64' })).toBe(
      'tool-windows-arm64.zip'
    );
    expect(getArchiveFormat({ os: 'windows', arch: 'x64' })).toBe('zip');
  });
});

describe('getInstallDirName', () => {
  test('combines artifact and platform', () => {
    expect(getInstallDirName('opencode', { os: 'linux', arch: 'arm64' })).toBe(
      'opencode-linux-arm64'
    );
  });
});

describe('release URLs', () => {
  test('builds the latest release API URL', () => {
    expect(getLatestReleaseApiUrl('acme/tool')).toBe(
      'https://api.github.com/repos/acme/tool/releases/latest'
    );
  });

  test('builds the asset download URL', () => {
    expect(getDownloadUrl('acme/tool', 'tool-linux-x64.tar.gz')).toBe(
      'https://github.com/acme/tool/releases/latest/download/tool-linux-x64.tar.gz'
    );
  });
});

describe('parseLatestTag', () => {
  test('reads tag_name from a release object', () => {
    expect(
      parseLatestTag(JSON.stringify({ tag_name: 'v1.3.0', name: 'Release' }))
    ).toEqual({ success: true, data: 'v1.3.0' });
  });

  test('reads the first release of a list', () => {
    expect(
      parseLatestTag(
        JSON.stringify([{ tag_name: 'v2.0.0' }, { tag_name: 'v1.9.0' }])
      )
    ).toEqual({ success: true, data: 'v2.0.0' });
  });

  test('rejects invalid JSON', () => {
    expect(parseLatestTag('not json')).toEqual({
      success: false,
      error: 'Invalid response from release feed',
    });
  });

  test('rejects a body without tag_name', () => {
    expect(parseLatestTag(JSON.stringify({ message: 'Not Found' }))).toEqual({
      success: false,
      error: 'Release feed has no tag name',
    });
  });

  test('rejects an empty tag', () => {
    expect(parseLatestTag(JSON.stringify({ tag_name: '  ' }))).toEqual({
      success: false,
      error: 'Release feed has an empty tag name',
    });
  });
});

describe('fetchLatestTag', () => {
  test('queries the feed of the configured repository', async () => {
    const transport = createFakeTransport();

    expect(await fetchLatestTag(transport, 'acme/tool')).toEqual({
      success: true,
      data: 'v1.3.0',
    });
    expect(transport.requests).toEqual([
      'GET https://api.github.com/repos/acme/tool/releases/latest',
    ]);
  });

  test('wraps transport errors', async () => {
    const transport = createFakeTransport({
      latest: { success: false, error: 'Request timed out' },
    });

    expect(await fetchLatestTag(transport, 'acme/tool')).toEqual({
      success: false,
      error: 'Release feed error: Request timed out',
    });
  });
});
