// @accelbuild/core - Source sync, SDK probing, native build and test orchestration

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Source
  SourceReference,
  SyncAction,
  SyncResult,
  // Accelerator
  AcceleratorContext,
  RootSource,
  TargetSource,
  // Build
  BuildType,
  FeatureToggles,
  BuildConfiguration,
  BuildOverrides,
  BuildCommand,
  BuildPlan,
  BuildResult,
  // Tests
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
  // Events
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
} from './types/index.js';

// Utilities
export {
  generateRunId,
  ConfigError,
  SpawnError,
  FetchError,
  DirtyWorkingTreeError,
  SdkNotFoundError,
  BuildFailedError,
  BuildOutputMissingError,
  createLogger,
  silentLogger,
  tailLines,
} from './utils/index.js';
export type { Logger, LoggerOptions, LogLevel, SyncStep, BuildStep } from './utils/index.js';
export {
  DEFAULT_SOURCE_URL,
  DEFAULT_SOURCE_REF,
  DEFAULT_SOURCE_PATH,
  DEFAULT_SDK_ROOT,
  DEFAULT_FALLBACK_TARGET,
  BUILD_DIR_ENV,
  TEST_TYPE_ENV,
  SDK_ROOT_ENV,
  CONFIG_FILENAME,
  MIN_NODE_MAJOR,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  projectConfigSchema,
  validateConfig,
  buildTypeSchema,
  testModeSchema,
  skipRuleSchema,
  loadConfig,
  writeConfig,
  deepMerge,
  configFromEnv,
  resolveConfigPath,
  resolvePaths,
  binaryDirFor,
} from './config/index.js';
export type { ProjectConfig, ProjectConfigInput, LoadConfigOptions, ResolvedPaths } from './config/index.js';

// Process execution
export { runCommand, formatCommand } from './exec/index.js';
export type { CommandRunner, CommandResult, RunCommandOptions, RunCallbacks } from './exec/index.js';

// Source sync
export { SourceSync, inspectWorkingTree } from './sync/index.js';
export type { SourceSyncOptions, WorkingTreeState } from './sync/index.js';

// Capability probe
export {
  CapabilityProbe,
  createAcceleratorContext,
  parseAgentTargets,
  isValidSdkRoot,
  hipCompilerPath,
  agentEnumeratorPath,
} from './probe/index.js';
export type { ProbeOptions, CapabilityProbeOptions } from './probe/index.js';

// Build
export {
  BuildOrchestrator,
  DEFAULT_FEATURES,
  buildEnvironment,
  compileCommand,
  configureCommand,
  deriveBuildConfiguration,
  planBuild,
  validateBuildConfiguration,
} from './build/index.js';
export type { BuildOrchestratorOptions } from './build/index.js';

// Tests
export {
  discoverTests,
  scanDirFor,
  SkipPolicy,
  DEFAULT_SKIP_RULES,
  SMOKE_TESTS,
  SMOKE_RULE_ID,
  smokeRule,
  buildSkipRules,
  TestRunner,
  exitCodeFor,
} from './testing/index.js';
export type { DiscoverOptions, SkipRuleOptions, TestRunnerOptions, RunTestsOptions } from './testing/index.js';

// Engine
export {
  EventBus,
  runPipeline,
  probeTargets,
  sourceReferenceFromConfig,
  probeOptionsFromConfig,
  buildOverridesFromConfig,
  skipRulesFromConfig,
} from './engine/index.js';
export type { PipelineOptions, PipelineResult, PipelineSteps } from './engine/index.js';
