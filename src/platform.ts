import * as os from 'node:os';
import type {
  Architecture,
  HostInfo,
  OperatingSystem,
  PlatformId,
} from './types.ts';

// No prebuilt release ships for these; they have to build from source.
const UNSUPPORTED_PLATFORMS: readonly string[] = ['darwin-x64'];

export function getHostInfo(): HostInfo {
  return { system: os.type(), machine: os.machine() };
}

export function getOperatingSystem(system: string): OperatingSystem {
  if (system === 'Darwin') return 'darwin';
  if (system === 'Linux') return 'linux';
  if (
    system.startsWith('MINGW') ||
    system.startsWith('MSYS') ||
    system.startsWith('CYGWIN') ||
    system === 'Windows_NT'
  ) {
    return 'windows';
  }
  return 'unknown';
}

export function getArchitecture(machineName: string): Architecture {
  if (machineName === 'x86_64' || machineName === 'amd64') return 'x64';
  if (machineName === 'arm64' || machineName === 'aarch64') return 'arm64';
  return 'unknown';
}

export function resolvePlatform(host: HostInfo = getHostInfo()): PlatformId {
  return Object.freeze({
    os: getOperatingSystem(host.system),
    arch: getArchitecture(host.machine),
  });
}

export function isKnownPlatform(platform: PlatformId): boolean {
  return platform.os !== 'unknown' && platform.arch !== 'unknown';
}

export function formatPlatform(platform: PlatformId): string {
  if (!isKnownPlatform(platform)) return 'unknown';
  return `${platform.os}-${platform.arch}`;
}

export function isUnsupportedPlatform(platform: PlatformId): boolean {
  return UNSUPPORTED_PLATFORMS.includes(formatPlatform(platform));
}
