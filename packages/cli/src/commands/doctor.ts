// packages/cli/src/commands/doctor.ts — Preflight diagnostics for the build host

import { existsSync } from 'node:fs';

import {
  agentEnumeratorPath,
  CapabilityProbe,
  hipCompilerPath,
  loadConfig,
  MIN_NODE_MAJOR,
  probeOptionsFromConfig,
  resolveConfigPath,
  runCommand,
  SpawnError,
  VERSION,
  type CommandRunner,
  type ProjectConfig,
} from '@accelbuild/core';
import chalk from 'chalk';

import type { GlobalOptions } from '../utils.js';

export interface Check {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

async function toolVersion(runner: CommandRunner, command: string): Promise<string | undefined> {
  try {
    const result = await runner(command, ['--version'], { timeoutMs: 15_000 });
    if (result.exitCode !== 0) return undefined;
    return result.output.trim().split('\n')[0];
  } catch (err) {
    if (err instanceof SpawnError) return undefined;
    throw err;
  }
}

export interface DoctorContext {
  cwd: string;
  runner?: CommandRunner;
  nodeVersion?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export async function runChecks(ctx: DoctorContext): Promise<Check[]> {
  const runner = ctx.runner ?? runCommand;
  const checks: Check[] = [];

  // 1. Config file
  const configPath = resolveConfigPath(ctx.cwd, ctx.configPath);
  let config: ProjectConfig | undefined;
  try {
    config = loadConfig({ projectDir: ctx.cwd, configPath: ctx.configPath, env: ctx.env });
    checks.push(
      existsSync(configPath)
        ? { name: 'config', status: 'pass', message: `${configPath} is valid` }
        : { name: 'config', status: 'warn', message: `${configPath} not found, using defaults`, fix: 'accelbuild init' },
    );
  } catch (err) {
    checks.push({
      name: 'config',
      status: 'fail',
      message: err instanceof Error ? err.message : String(err),
      fix: `Fix or regenerate ${configPath} (accelbuild init --force)`,
    });
  }

  // 2. git and cmake
  for (const [tool, fix] of [
    ['git', 'Install git'],
    ['cmake', 'Install CMake 3.21 or newer'],
  ] as const) {
    const version = await toolVersion(runner, tool);
    checks.push(
      version
        ? { name: tool, status: 'pass', message: version }
        : { name: tool, status: 'fail', message: `${tool} not found in PATH`, fix },
    );
  }

  // 3. SDK root, compiler and enumerator
  if (config) {
    const probe = new CapabilityProbe({ runner });
    try {
      const { root, source } = await probe.resolveRoot(probeOptionsFromConfig(config));
      checks.push({ name: 'sdk-root', status: 'pass', message: `${root} (${source})` });
      checks.push({ name: 'hip-compiler', status: 'pass', message: hipCompilerPath(root) });

      const enumerator = agentEnumeratorPath(root);
      if (existsSync(enumerator)) {
        const { targets, source: targetSource } = await probe.discoverTargets(root, config.sdk.fallbackTarget);
        checks.push({
          name: 'targets',
          status: targetSource === 'probe' ? 'pass' : 'warn',
          message: targetSource === 'probe' ? targets.join(', ') : `none detected, would fall back to ${targets.join(', ')}`,
        });
      } else {
        checks.push({
          name: 'targets',
          status: 'warn',
          message: `${enumerator} not found, would fall back to ${config.sdk.fallbackTarget}`,
          fix: 'Pass --targets explicitly when building',
        });
      }
    } catch (err) {
      checks.push({
        name: 'sdk-root',
        status: 'fail',
        message: err instanceof Error ? err.message : String(err),
        fix: 'Install the SDK or set ROCM_PATH',
      });
    }
  }

  // 4. Node version
  const nodeVersion = ctx.nodeVersion ?? process.version;
  const major = Number.parseInt(nodeVersion.replace(/^v/, '').split('.')[0] ?? '0', 10);
  if (major >= MIN_NODE_MAJOR) {
    checks.push({ name: 'node', status: 'pass', message: `Node.js ${nodeVersion}` });
  } else {
    checks.push({
      name: 'node',
      status: 'fail',
      message: `Node.js ${nodeVersion}, requires >= ${MIN_NODE_MAJOR}`,
      fix: `Install Node.js ${MIN_NODE_MAJOR}+`,
    });
  }

  return checks;
}

export async function doctorCommand(options: GlobalOptions): Promise<void> {
  console.error(chalk.cyan(`\n  accelbuild doctor v${VERSION}\n`));
  const checks = await runChecks({ cwd: process.cwd(), configPath: options.config });

  // Print results
  let hasFailure = false;
  for (const check of checks) {
    const icon = check.status === 'pass'
      ? chalk.green('PASS')
      : check.status === 'warn'
        ? chalk.yellow('WARN')
        : chalk.red('FAIL');
    console.error(`  ${icon} ${check.name}: ${check.message}`);
    if (check.fix) {
      console.error(chalk.dim(`       → ${check.fix}`));
    }
    if (check.status === 'fail') hasFailure = true;
  }

  console.error('');

  // JSON output
  const output = {
    version: VERSION,
    checks,
    healthy: !hasFailure,
  };
  console.log(JSON.stringify(output, null, 2));

  if (hasFailure) {
    process.exit(1);
  }
}
