// packages/cli/src/utils.ts — Shared plumbing for command actions

import {
  BuildFailedError,
  createLogger,
  DirtyWorkingTreeError,
  loadConfig,
  SdkNotFoundError,
  type Logger,
  type ProjectConfig,
  type ProjectConfigInput,
} from '@accelbuild/core';
import chalk from 'chalk';
import { Command } from 'commander';

import { stopActiveSpinner } from './render.js';

/** Options defined on the root program, visible to every command. */
export interface GlobalOptions {
  verbose?: boolean;
  config?: string;
}

export function loadCliConfig(options: GlobalOptions, overrides: ProjectConfigInput = {}): ProjectConfig {
  return loadConfig({
    projectDir: process.cwd(),
    configPath: options.config,
    overrides,
    logger: createLogger(options.verbose ? 'debug' : 'warn'),
  });
}

export function createCliLogger(config: ProjectConfig, options: GlobalOptions): Logger {
  return createLogger(options.verbose ? 'debug' : config.logLevel);
}

/** Human-readable description of an error, with the context the error type carries. */
export function formatError(error: unknown): string[] {
  const lines = [`Error: ${error instanceof Error ? error.message : String(error)}`];
  if (error instanceof DirtyWorkingTreeError) {
    for (const file of error.modified) lines.push(`  modified: ${file}`);
  } else if (error instanceof SdkNotFoundError && error.candidates.length > 0) {
    lines.push(`  tried: ${error.candidates.join(', ')}`);
  } else if (error instanceof BuildFailedError && error.outputTail) {
    lines.push(`  last output of ${error.step}:`);
    for (const line of error.outputTail.split('\n')) lines.push(`    ${line}`);
  }
  return lines;
}

export function exitWithError(error: unknown): never {
  stopActiveSpinner(false);
  const [headline, ...details] = formatError(error);
  console.error(chalk.red(headline));
  for (const line of details) console.error(chalk.dim(line));
  process.exit(1);
}

/**
 * Adapt a command function to a commander action: merges global options into
 * the command's own and turns any thrown error into a red message and exit 1.
 */
export function action<T extends GlobalOptions>(
  fn: (options: T) => Promise<void>,
): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const command = args[args.length - 1];
    if (!(command instanceof Command)) {
      throw new Error('Command action invoked without its Command instance');
    }
    try {
      await fn(command.optsWithGlobals<T>());
    } catch (error) {
      exitWithError(error);
    }
  };
}
