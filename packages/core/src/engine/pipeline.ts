// packages/core/src/engine/pipeline.ts — Compose sync, probe, build and tests into one run

import { BuildOrchestrator, deriveBuildConfiguration } from '../build/build-orchestrator.js';
import { resolvePaths, type ResolvedPaths } from '../config/paths.js';
import type { ProjectConfig } from '../config/schema.js';
import { runCommand, type CommandRunner } from '../exec/process-runner.js';
import { CapabilityProbe, type ProbeOptions } from '../probe/capability-probe.js';
import { SourceSync } from '../sync/source-sync.js';
import { buildSkipRules, SkipPolicy } from '../testing/skip-policy.js';
import { exitCodeFor, TestRunner } from '../testing/test-runner.js';
import type { AcceleratorContext } from '../types/accelerator.js';
import type { BuildOverrides, BuildResult } from '../types/build.js';
import type { SourceReference, SyncResult } from '../types/source.js';
import type { RunSummary, SkipRule } from '../types/testing.js';
import { SdkNotFoundError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { EventBus } from './event-bus.js';

export function sourceReferenceFromConfig(config: ProjectConfig, paths: ResolvedPaths): SourceReference {
  return {
    url: config.source.url,
    path: paths.sourceDir,
    ref: config.source.ref,
    depth: config.source.depth ?? undefined,
    jobs: config.source.jobs,
    diffbaseTag: config.source.diffbaseTag ?? undefined,
  };
}

export function probeOptionsFromConfig(config: ProjectConfig): ProbeOptions {
  return {
    sdkRoot: config.sdk.root,
    defaultRoot: config.sdk.defaultRoot,
    fallbackTarget: config.sdk.fallbackTarget,
  };
}

export function buildOverridesFromConfig(config: ProjectConfig, paths: ResolvedPaths): BuildOverrides {
  return {
    buildDir: paths.buildDir,
    buildType: config.build.type,
    targets: config.build.targets,
    jobs: config.build.jobs === 'auto' ? undefined : config.build.jobs,
    features: config.build.features,
    clean: config.build.clean,
  };
}

export function skipRulesFromConfig(config: ProjectConfig): SkipRule[] {
  return buildSkipRules({
    mode: config.test.mode,
    extraRules: config.test.skipRules,
    useDefaults: config.test.useDefaultSkipRules,
    smokeTests: config.test.smokeTests,
  });
}

export interface PipelineSteps {
  sync?: boolean;
  build?: boolean;
  tests?: boolean;
}

export interface PipelineOptions {
  projectDir: string;
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
  logger?: Logger;
  bus?: EventBus;
  /** Discard local modifications in the source tree. */
  force?: boolean;
  dryRun?: boolean;
  /** Steps to leave out; all run by default. */
  skip?: PipelineSteps;
  platform?: NodeJS.Platform;
  /** Binary directory to test, ahead of LLAMACPP_BUILD_DIR and the configured build dir. */
  testBinDir?: string;
}

export interface PipelineResult {
  paths: ResolvedPaths;
  sync?: SyncResult;
  context?: AcceleratorContext;
  build?: BuildResult;
  tests?: RunSummary;
  exitCode: number;
}

/**
 * Runs SourceSync, CapabilityProbe, BuildOrchestrator and the tests in that
 * order. Errors from any step propagate and stop the run; test failures do
 * not, they only set the exit code.
 */
export async function runPipeline(config: ProjectConfig, options: PipelineOptions): Promise<PipelineResult> {
  const logger = options.logger ?? silentLogger;
  const runner = options.runner ?? runCommand;
  const skip = options.skip ?? {};
  const resolved = resolvePaths(config, options.projectDir, options.env);
  const paths = options.testBinDir ? { ...resolved, testBinDir: options.testBinDir } : resolved;
  const result: PipelineResult = { paths, exitCode: 0 };

  if (!skip.sync) {
    const sync = new SourceSync({ runner, logger: logger.child('sync'), bus: options.bus, force: options.force });
    result.sync = await sync.sync(sourceReferenceFromConfig(config, paths));
  }

  const probe = new CapabilityProbe({ runner, logger: logger.child('probe'), bus: options.bus });

  if (!skip.build) {
    const context = await probe.probe({ ...probeOptionsFromConfig(config), platform: options.platform });
    result.context = context;
    const buildConfig = deriveBuildConfiguration(
      context,
      paths.sourceDir,
      buildOverridesFromConfig(config, paths),
      logger.child('build'),
    );
    const orchestrator = new BuildOrchestrator({
      runner,
      logger: logger.child('build'),
      bus: options.bus,
      platform: options.platform,
    });
    result.build = await orchestrator.build(buildConfig, { dryRun: options.dryRun });
  }

  if (skip.tests) return result;
  if (options.dryRun) {
    logger.info('Dry run: tests not executed');
    return result;
  }

  const targets = config.build.targets ?? result.context?.targets ?? (await probeTargets(probe, config, logger));
  const testRunner = new TestRunner({
    runner,
    logger: logger.child('test'),
    bus: options.bus,
    policy: new SkipPolicy(skipRulesFromConfig(config)),
  });
  const binaries = testRunner.discover(paths.testBinDir, { prefix: config.test.prefix, platform: options.platform });
  result.tests = await testRunner.run(
    binaries,
    { platform: options.platform ?? process.platform, targets },
    { logFile: config.test.logFile, timeoutSec: config.test.timeoutSec },
  );
  result.exitCode = exitCodeFor(result.tests);
  return result;
}

/**
 * Targets for scoping skip rules when no build ran. A machine without the
 * SDK still runs its tests; target-scoped rules just never apply.
 */
export async function probeTargets(
  probe: CapabilityProbe,
  config: ProjectConfig,
  logger: Logger,
): Promise<readonly string[]> {
  try {
    const context = await probe.probe(probeOptionsFromConfig(config));
    return context.targets;
  } catch (err) {
    if (!(err instanceof SdkNotFoundError)) throw err;
    logger.warn(`${err.message}; target-scoped skip rules will not apply`);
    return [];
  }
}
