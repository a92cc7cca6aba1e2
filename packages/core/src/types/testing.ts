// packages/core/src/types/testing.ts — Test discovery, skip policy and run summary types

export interface TestBinary {
  readonly path: string;
  /** File name without a Windows `.exe` suffix */
  readonly name: string;
}

export type NameMatcher =
  | { exact: string }
  | { glob: string }
  | { notIn: readonly string[] };

export interface SkipScope {
  platforms?: readonly NodeJS.Platform[];
  /** Applies when any active target is listed. */
  targets?: readonly string[];
}

export interface SkipRule {
  id: string;
  match: NameMatcher;
  scope?: SkipScope;
  reason: string;
}

export interface SkipContext {
  platform: NodeJS.Platform;
  targets: readonly string[];
}

export type SkipDecision =
  | { action: 'run' }
  | { action: 'skip'; ruleId: string; reason: string };

export type TestMode = 'full' | 'smoke';

export type TestStatus = 'passed' | 'failed' | 'skipped';

export interface TestOutcome {
  name: string;
  path: string;
  status: TestStatus;
  /** Skip reason, or why a test failed without an exit code */
  reason?: string;
  ruleId?: string;
  output?: string;
  exitCode?: number | null;
  signal?: NodeJS.Signals | null;
  durationMs: number;
}

export interface FailureDetail {
  name: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Output tail */
  output: string;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  durationMs: number;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  outcomes: TestOutcome[];
  failures: FailureDetail[];
  logFile?: string;
}
