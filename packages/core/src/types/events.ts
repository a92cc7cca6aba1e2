// packages/core/src/types/events.ts

/**
 * Pipeline progress events.
 * Emitted by the core components and rendered by the CLI.
 * Type names are dot-separated `<component>.<what>`.
 */

import type { SyncAction } from './source.js';
import type { RootSource, TargetSource } from './accelerator.js';
import type { TestOutcome, RunSummary } from './testing.js';

// -- Source sync --
export interface SyncStartedEvent {
  type: 'sync.started';
  url: string;
  path: string;
  ref: string;
  timestamp: string;
}

export interface SyncCompletedEvent {
  type: 'sync.completed';
  path: string;
  revision: string;
  action: SyncAction;
  timestamp: string;
}

// -- Probe --
export interface ProbeCompletedEvent {
  type: 'probe.completed';
  sdkRoot: string;
  rootSource: RootSource;
  targets: readonly string[];
  targetSource: TargetSource;
  timestamp: string;
}

// -- Build --
export type BuildPhase = 'clean' | 'configure' | 'compile';

export interface BuildPhaseEvent {
  type: 'build.phase';
  phase: BuildPhase;
  /** Rendered command line, or the removed path for `clean` */
  detail: string;
  timestamp: string;
}

export interface BuildOutputEvent {
  type: 'build.output';
  chunk: string;
  timestamp: string;
}

export interface BuildCompletedEvent {
  type: 'build.completed';
  buildDir: string;
  dryRun: boolean;
  durationMs: number;
  timestamp: string;
}

// -- Tests --
export interface TestDiscoveredEvent {
  type: 'test.discovered';
  binDir: string;
  count: number;
  timestamp: string;
}

export interface TestStartedEvent {
  type: 'test.started';
  name: string;
  index: number;
  total: number;
  timestamp: string;
}

export interface TestCompletedEvent {
  type: 'test.completed';
  outcome: TestOutcome;
  timestamp: string;
}

export interface RunCompletedEvent {
  type: 'run.completed';
  summary: RunSummary;
  timestamp: string;
}

export type PipelineEvent =
  | SyncStartedEvent
  | SyncCompletedEvent
  | ProbeCompletedEvent
  | BuildPhaseEvent
  | BuildOutputEvent
  | BuildCompletedEvent
  | TestDiscoveredEvent
  | TestStartedEvent
  | TestCompletedEvent
  | RunCompletedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Event payload as components construct it; the bus stamps the time. */
export type PipelineEventInput = DistributiveOmit<PipelineEvent, 'timestamp'> & { timestamp?: string };
