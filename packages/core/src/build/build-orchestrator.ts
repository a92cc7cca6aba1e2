// packages/core/src/build/build-orchestrator.ts — Derive build parameters and drive CMake

import { existsSync, mkdirSync, rmSync, statSync } from 'node:fs';
import { availableParallelism } from 'node:os';
import { isAbsolute, join, parse, relative, resolve } from 'node:path';
import type { EventBus } from '../engine/event-bus.js';
import { formatCommand, runCommand, type CommandResult, type CommandRunner } from '../exec/process-runner.js';
import { hipCompilerPath } from '../probe/capability-probe.js';
import type { AcceleratorContext } from '../types/accelerator.js';
import type {
  BuildCommand,
  BuildConfiguration,
  BuildOverrides,
  BuildPlan,
  BuildResult,
  FeatureToggles,
} from '../types/build.js';
import { BUILD_TAIL_LINES, DEFAULT_BUILD_SUBDIR } from '../utils/constants.js';
import { BuildFailedError, ConfigError, SpawnError, type BuildStep } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { tailLines } from '../utils/text.js';

export const DEFAULT_FEATURES: Readonly<FeatureToggles> = Object.freeze({
  curl: false,
  openssl: false,
  llguidance: false,
});

/** CMake cache variable driven by each feature toggle */
const FEATURE_DEFINES: ReadonlyArray<[keyof FeatureToggles, string]> = [
  ['curl', 'LLAMA_CURL'],
  ['openssl', 'LLAMA_OPENSSL'],
  ['llguidance', 'LLAMA_LLGUIDANCE'],
];

function onOff(value: boolean): string {
  return value ? 'ON' : 'OFF';
}

/**
 * Merge probe output, caller overrides and defaults into a frozen
 * configuration. Overrides win field by field; explicit targets are taken
 * as given and flagged, and targets the probe did not report are logged.
 */
export function deriveBuildConfiguration(
  context: AcceleratorContext,
  sourceDir: string,
  overrides: BuildOverrides = {},
  logger: Logger = silentLogger,
): BuildConfiguration {
  const targetsOverridden = overrides.targets !== undefined;
  const targets = [...(overrides.targets ?? context.targets)];
  if (targetsOverridden) {
    for (const target of targets) {
      if (!context.targets.includes(target)) {
        logger.warn(`Target ${target} was not reported by the SDK (${context.targets.join(', ')}); building it anyway`);
      }
    }
  }

  const absSource = resolve(sourceDir);
  return Object.freeze({
    sdkRoot: context.sdkRoot,
    sourceDir: absSource,
    buildDir: resolve(overrides.buildDir ?? join(absSource, DEFAULT_BUILD_SUBDIR)),
    buildType: overrides.buildType ?? 'Release',
    targets: Object.freeze(targets),
    targetsOverridden,
    features: Object.freeze({ ...DEFAULT_FEATURES, ...overrides.features }),
    jobs: overrides.jobs ?? availableParallelism(),
    clean: overrides.clean ?? false,
  });
}

/** Environment the SDK's compiler needs, layered over the inherited one. */
export function buildEnvironment(
  config: BuildConfiguration,
  platform: NodeJS.Platform = process.platform,
): Record<string, string> {
  return {
    ROCM_PATH: config.sdkRoot,
    HIP_DEVICE_LIB_PATH: join(config.sdkRoot, 'lib', 'llvm', 'amdgcn', 'bitcode'),
    HIPCXX: hipCompilerPath(config.sdkRoot, platform),
  };
}

export function configureCommand(config: BuildConfiguration): BuildCommand {
  const sdkLib = join(config.sdkRoot, 'lib');
  const featureArgs = FEATURE_DEFINES.map(
    ([feature, define]) => `-D${define}=${onOff(config.features[feature])}`,
  );
  return {
    command: 'cmake',
    args: [
      '-S',
      config.sourceDir,
      '-B',
      config.buildDir,
      `-DGPU_TARGETS=${config.targets.join(';')}`,
      `-DCMAKE_BUILD_TYPE=${config.buildType}`,
      ...featureArgs,
      '-DHIP_PLATFORM=amd',
      '-DGGML_HIP=ON',
      // rocWMMA fused attention does not build against every SDK release
      '-DGGML_HIP_ROCWMMA_FATTN=OFF',
      `-DCMAKE_BUILD_RPATH=${sdkLib}`,
      `-DCMAKE_INSTALL_RPATH=${sdkLib}`,
    ],
  };
}

export function compileCommand(config: BuildConfiguration): BuildCommand {
  return {
    command: 'cmake',
    args: ['--build', config.buildDir, '--config', config.buildType, '--', `-j${config.jobs}`],
  };
}

export function planBuild(config: BuildConfiguration, platform: NodeJS.Platform = process.platform): BuildPlan {
  return {
    config,
    env: buildEnvironment(config, platform),
    configure: configureCommand(config),
    compile: compileCommand(config),
  };
}

/** True when `path` is `candidate` itself or lies beneath it. */
function isSameOrAncestor(candidate: string, path: string): boolean {
  const rel = relative(candidate, path);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

/** Reject configurations that cannot work before anything is touched. */
export function validateBuildConfiguration(config: BuildConfiguration): void {
  if (!existsSync(config.sourceDir) || !statSync(config.sourceDir).isDirectory()) {
    throw new ConfigError(`Source directory ${config.sourceDir} does not exist; run sync first`, 'sourceDir');
  }
  if (!existsSync(join(config.sourceDir, 'CMakeLists.txt'))) {
    throw new ConfigError(`${config.sourceDir} has no CMakeLists.txt`, 'sourceDir');
  }
  if (config.targets.length === 0) {
    throw new ConfigError('At least one hardware target is required', 'targets');
  }
  if (!Number.isInteger(config.jobs) || config.jobs < 1) {
    throw new ConfigError(`Build jobs must be a positive integer, got ${config.jobs}`, 'jobs');
  }
  if (config.clean) {
    const buildDir = resolve(config.buildDir);
    if (buildDir === parse(buildDir).root || isSameOrAncestor(buildDir, config.sourceDir)) {
      throw new ConfigError(
        `Refusing to clean ${buildDir}: it contains the source tree`,
        'buildDir',
      );
    }
  }
}

export interface BuildOrchestratorOptions {
  runner?: CommandRunner;
  logger?: Logger;
  bus?: EventBus;
  platform?: NodeJS.Platform;
}

/**
 * Runs the native configure and compile steps for a derived configuration.
 *
 * With `clean` set the build directory is deleted first. That removal is
 * irreversible: everything under the build directory is lost, including
 * artifacts from other configurations.
 */
export class BuildOrchestrator {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly bus?: EventBus;
  private readonly platform: NodeJS.Platform;

  constructor(options: BuildOrchestratorOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? silentLogger;
    this.bus = options.bus;
    this.platform = options.platform ?? process.platform;
  }

  async build(config: BuildConfiguration, options: { dryRun?: boolean } = {}): Promise<BuildResult> {
    validateBuildConfiguration(config);
    const plan = planBuild(config, this.platform);
    const start = Date.now();

    this.logger.info(`Targets: ${config.targets.join(', ')} (${config.buildType}, -j${config.jobs})`);
    for (const [key, value] of Object.entries(plan.env)) {
      this.logger.debug(`  ${key}=${value}`);
    }

    if (options.dryRun) {
      this.logger.info(`[dry-run] ${formatCommand(plan.configure.command, plan.configure.args)}`);
      this.logger.info(`[dry-run] ${formatCommand(plan.compile.command, plan.compile.args)}`);
      this.bus?.emitEvent({ type: 'build.completed', buildDir: config.buildDir, dryRun: true, durationMs: 0 });
      return { plan, dryRun: true, configureMs: 0, compileMs: 0, durationMs: 0 };
    }

    if (config.clean && existsSync(config.buildDir)) {
      this.logger.warn(`Removing build directory ${config.buildDir}`);
      this.bus?.emitEvent({ type: 'build.phase', phase: 'clean', detail: config.buildDir });
      rmSync(config.buildDir, { recursive: true, force: true });
    }
    mkdirSync(config.buildDir, { recursive: true });

    const configureMs = await this.runStep('configure', plan.configure, plan.env, config.sourceDir);
    const compileMs = await this.runStep('compile', plan.compile, plan.env, config.sourceDir);

    const durationMs = Date.now() - start;
    this.logger.info(`Built ${config.sourceDir} in ${config.buildDir}`);
    this.bus?.emitEvent({ type: 'build.completed', buildDir: config.buildDir, dryRun: false, durationMs });
    return { plan, dryRun: false, configureMs, compileMs, durationMs };
  }

  private async runStep(
    step: BuildStep,
    cmd: BuildCommand,
    env: Record<string, string>,
    cwd: string,
  ): Promise<number> {
    const rendered = formatCommand(cmd.command, cmd.args);
    this.logger.info(`Running ${step}: ${rendered}`);
    this.bus?.emitEvent({ type: 'build.phase', phase: step, detail: rendered });

    let result: CommandResult;
    try {
      result = await this.runner(cmd.command, cmd.args, {
        cwd,
        env: { ...process.env, ...env },
        onOutput: (chunk) => this.bus?.emitEvent({ type: 'build.output', chunk }),
      });
    } catch (err) {
      if (err instanceof SpawnError) {
        throw new BuildFailedError(`${step} could not start: ${err.message}`, step, null, '');
      }
      throw err;
    }

    if (result.exitCode !== 0) {
      const status = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `exit code ${result.exitCode}`;
      throw new BuildFailedError(
        `${step} failed with ${status}`,
        step,
        result.exitCode,
        tailLines(result.output, BUILD_TAIL_LINES),
      );
    }
    return result.durationMs;
  }
}
