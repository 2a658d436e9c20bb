export type OperationResult<T = void> =
  | { success: true; data: T }
  | { success: false; error: string };

export type OperatingSystem = 'darwin' | 'linux' | 'windows' | 'unknown';
export type Architecture = 'x64' | 'arm64' | 'unknown';

export type PlatformId = {
  readonly os: OperatingSystem;
  readonly arch: Architecture;
};

export type HostInfo = {
  system: string;
  machine: string;
};

export type UpdateOutcome =
  | { status: 'skipped'; reason: string }
  | { status: 'upToDate'; current: string }
  | { status: 'updated'; from: string; to: string }
  | { status: 'failed'; error: string };

export type SourceState = {
  localRevision: string;
  remoteRevision: string;
  hasLocalUncommittedChanges: boolean;
};

export type UpdateOptions = {
  force: boolean;
};

export type UpdateState = {
  consecutiveFetchFailures: number;
  lastFetchFailureAt?: number;
};

export type UpdaterSettings = {
  rootDir: string;
  binDir: string;
  versionFile: string;
  statePath: string;
  remote: string;
  branch: string;
  releaseRepo: string;
  artifactName: string;
  timeoutMs: number;
  maxConsecutiveFetchFailures: number;
  nativeFetch: boolean;
};

export type UpdaterConfigFile = {
  remote?: string;
  branch?: string;
  releaseRepo?: string;
  artifactName?: string;
  timeoutMs?: number;
  maxConsecutiveFetchFailures?: number;
  nativeFetch?: boolean;
};
