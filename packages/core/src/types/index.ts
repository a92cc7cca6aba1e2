// packages/core/src/types/index.ts -- barrel re-export

export type { SourceReference, SyncAction, SyncResult } from './source.js';
export type { AcceleratorContext, RootSource, TargetSource } from './accelerator.js';
export type {
  BuildType,
  FeatureToggles,
  BuildConfiguration,
  BuildOverrides,
  BuildCommand,
  BuildPlan,
  BuildResult,
} from './build.js';
export type {
  TestBinary,
  NameMatcher,
  SkipScope,
  SkipRule,
  SkipContext,
  SkipDecision,
  TestMode,
  TestStatus,
  TestOutcome,
  FailureDetail,
  RunSummary,
} from './testing.js';
export type {
  SyncStartedEvent,
  SyncCompletedEvent,
  ProbeCompletedEvent,
  BuildPhase,
  BuildPhaseEvent,
  BuildOutputEvent,
  BuildCompletedEvent,
  TestDiscoveredEvent,
  TestStartedEvent,
  TestCompletedEvent,
  RunCompletedEvent,
  PipelineEvent,
  PipelineEventInput,
} from './events.js';
