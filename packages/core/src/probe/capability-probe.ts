// packages/core/src/probe/capability-probe.ts — Discover the accelerator SDK and its usable targets

import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { EventBus } from '../engine/event-bus.js';
import { runCommand, type CommandRunner } from '../exec/process-runner.js';
import type { AcceleratorContext, RootSource, TargetSource } from '../types/accelerator.js';
import { DEFAULT_FALLBACK_TARGET, DEFAULT_SDK_ROOT, PROBE_TIMEOUT_MS } from '../utils/constants.js';
import { SdkNotFoundError, SpawnError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/** The enumerator reports the host CPU as this pseudo-target. */
const CPU_AGENT = 'gfx000';
const TARGET_PATTERN = /^gfx[0-9a-z]+$/i;

export interface ProbeOptions {
  /** Explicit SDK root; wins over discovery and must be valid. */
  sdkRoot?: string;
  /** Conventional install location tried last */
  defaultRoot?: string;
  /** Used when the SDK reports no targets */
  fallbackTarget?: string;
  platform?: NodeJS.Platform;
}

export interface CapabilityProbeOptions {
  runner?: CommandRunner;
  logger?: Logger;
  bus?: EventBus;
}

/** Path of the HIP compiler inside an SDK root. */
export function hipCompilerPath(root: string, platform: NodeJS.Platform = process.platform): string {
  return join(root, 'llvm', 'bin', platform === 'win32' ? 'clang.exe' : 'clang');
}

/** Path of the agent enumerator inside an SDK root. */
export function agentEnumeratorPath(root: string): string {
  return join(root, 'bin', 'rocm_agent_enumerator');
}

/** A directory that ships the HIP compiler. */
export function isValidSdkRoot(root: string, platform: NodeJS.Platform = process.platform): boolean {
  try {
    return statSync(root).isDirectory() && existsSync(hipCompilerPath(root, platform));
  } catch {
    return false;
  }
}

/** Extract usable targets from enumerator output, first-seen order, CPU agent dropped. */
export function parseAgentTargets(output: string): string[] {
  const targets: string[] = [];
  for (const line of output.split('\n')) {
    const candidate = line.trim().toLowerCase();
    if (!TARGET_PATTERN.test(candidate) || candidate === CPU_AGENT) continue;
    if (!targets.includes(candidate)) targets.push(candidate);
  }
  return targets;
}

export function createAcceleratorContext(context: AcceleratorContext): AcceleratorContext {
  if (context.targets.length === 0) {
    throw new SdkNotFoundError('An accelerator context needs at least one target');
  }
  return Object.freeze({ ...context, targets: Object.freeze([...context.targets]) });
}

/**
 * Resolves the SDK root (explicit override > `hipconfig --rocmpath` >
 * conventional default) and enumerates the hardware targets present on this
 * machine, falling back to a single configured target when none are reported.
 */
export class CapabilityProbe {
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly bus?: EventBus;

  constructor(options: CapabilityProbeOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? silentLogger;
    this.bus = options.bus;
  }

  async probe(options: ProbeOptions = {}): Promise<AcceleratorContext> {
    const platform = options.platform ?? process.platform;
    const { root, source: rootSource } = await this.resolveRoot(options, platform);
    const { targets, source: targetSource } = await this.discoverTargets(
      root,
      options.fallbackTarget ?? DEFAULT_FALLBACK_TARGET,
    );

    const context = createAcceleratorContext({ sdkRoot: root, rootSource, targets, targetSource, platform });
    this.bus?.emitEvent({
      type: 'probe.completed',
      sdkRoot: context.sdkRoot,
      rootSource: context.rootSource,
      targets: context.targets,
      targetSource: context.targetSource,
    });
    return context;
  }

  async resolveRoot(
    options: Pick<ProbeOptions, 'sdkRoot' | 'defaultRoot'>,
    platform: NodeJS.Platform = process.platform,
  ): Promise<{ root: string; source: RootSource }> {
    if (options.sdkRoot) {
      if (!isValidSdkRoot(options.sdkRoot, platform)) {
        throw new SdkNotFoundError(
          `SDK root ${options.sdkRoot} is not a valid installation (missing ${hipCompilerPath(options.sdkRoot, platform)})`,
          [options.sdkRoot],
        );
      }
      this.logger.debug(`SDK root from override: ${options.sdkRoot}`);
      return { root: options.sdkRoot, source: 'override' };
    }

    const tried: string[] = [];
    const discovered = await this.queryHipconfig();
    if (discovered) {
      tried.push(discovered);
      if (isValidSdkRoot(discovered, platform)) {
        this.logger.debug(`SDK root from hipconfig: ${discovered}`);
        return { root: discovered, source: 'discovery' };
      }
      this.logger.warn(`hipconfig reported ${discovered}, which is not a valid SDK installation`);
    }

    const fallback = options.defaultRoot ?? DEFAULT_SDK_ROOT;
    tried.push(fallback);
    if (isValidSdkRoot(fallback, platform)) {
      this.logger.debug(`SDK root from default location: ${fallback}`);
      return { root: fallback, source: 'default' };
    }

    throw new SdkNotFoundError(
      `No accelerator SDK found (tried: ${tried.join(', ')}); pass --sdk-root or set ROCM_PATH`,
      tried,
    );
  }

  async discoverTargets(
    root: string,
    fallbackTarget: string,
  ): Promise<{ targets: string[]; source: TargetSource }> {
    const enumerator = agentEnumeratorPath(root);
    try {
      const result = await this.runner(enumerator, [], { timeoutMs: PROBE_TIMEOUT_MS });
      if (result.exitCode === 0) {
        const targets = parseAgentTargets(result.output);
        if (targets.length > 0) {
          this.logger.info(`Detected targets: ${targets.join(', ')}`);
          return { targets, source: 'probe' };
        }
        this.logger.warn(`${enumerator} reported no accelerator targets`);
      } else {
        this.logger.warn(`${enumerator} exited with code ${result.exitCode}`);
      }
    } catch (err) {
      if (!(err instanceof SpawnError)) throw err;
      this.logger.warn(`Target enumeration unavailable: ${err.message}`);
    }
    this.logger.warn(`Falling back to target ${fallbackTarget}`);
    return { targets: [fallbackTarget], source: 'fallback' };
  }

  private async queryHipconfig(): Promise<string | undefined> {
    try {
      const result = await this.runner('hipconfig', ['--rocmpath'], { timeoutMs: PROBE_TIMEOUT_MS });
      if (result.exitCode !== 0) return undefined;
      const path = result.output.trim().split('\n')[0]?.trim();
      return path ? path : undefined;
    } catch (err) {
      if (err instanceof SpawnError) {
        this.logger.debug('hipconfig not found in PATH');
        return undefined;
      }
      throw err;
    }
  }
}
