// packages/core/src/utils/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A command could not be started at all (missing executable, bad cwd). */
export class SpawnError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'SpawnError';
  }
}

export type SyncStep = 'inspect' | 'init' | 'remote' | 'status' | 'fetch' | 'checkout' | 'tag' | 'verify';

export class FetchError extends Error {
  constructor(
    message: string,
    public readonly step: SyncStep,
    public readonly outputTail?: string,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class DirtyWorkingTreeError extends Error {
  constructor(
    public readonly path: string,
    public readonly modified: readonly string[],
  ) {
    super(
      `Working tree at ${path} has ${modified.length} locally modified file(s); rerun with --force to discard them`,
    );
    this.name = 'DirtyWorkingTreeError';
  }
}

export class SdkNotFoundError extends Error {
  constructor(
    message: string,
    public readonly candidates: readonly string[] = [],
  ) {
    super(message);
    this.name = 'SdkNotFoundError';
  }
}

export type BuildStep = 'configure' | 'compile';

export class BuildFailedError extends Error {
  constructor(
    message: string,
    public readonly step: BuildStep,
    public readonly exitCode: number | null,
    public readonly outputTail: string,
  ) {
    super(message);
    this.name = 'BuildFailedError';
  }
}

export class BuildOutputMissingError extends Error {
  constructor(public readonly buildDir: string) {
    super(`Build output directory ${buildDir} does not exist; run the build first`);
    this.name = 'BuildOutputMissingError';
  }
}
