// packages/cli/src/render.ts — Terminal rendering for pipeline events

import type { AcceleratorContext, EventBus, PipelineEvent, RunSummary, TestStatus } from '@accelbuild/core';
import chalk from 'chalk';
import ora from 'ora';

const statusColors: Record<TestStatus, (text: string) => string> = {
  passed: chalk.green,
  failed: chalk.red,
  skipped: chalk.yellow,
};

const statusLabels: Record<TestStatus, string> = {
  passed: 'PASS',
  failed: 'FAIL',
  skipped: 'SKIP',
};

// Spinner for the step currently running
let activeSpinner: ReturnType<typeof ora> | null = null;

function startSpinner(text: string): void {
  if (activeSpinner) {
    activeSpinner.text = text;
    return;
  }
  activeSpinner = ora({ text, color: 'cyan', stream: process.stderr }).start();
}

export function stopActiveSpinner(success: boolean, text?: string): void {
  if (activeSpinner) {
    if (success) {
      activeSpinner.succeed(text);
    } else {
      activeSpinner.fail(text);
    }
    activeSpinner = null;
  }
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export interface RenderOptions {
  /** Stream raw build output instead of showing a spinner. */
  verbose?: boolean;
}

/**
 * Render a single pipeline event to stderr.
 */
export function renderEvent(event: PipelineEvent, options: RenderOptions = {}): void {
  switch (event.type) {
    case 'sync.started':
      startSpinner(`Syncing ${event.url} (${event.ref}) into ${event.path}`);
      break;

    case 'sync.completed':
      stopActiveSpinner(true, `Source at ${event.revision.slice(0, 12)} (${event.action})`);
      break;

    case 'probe.completed':
      console.error(chalk.gray(`  SDK ${event.sdkRoot} (${event.rootSource})`));
      console.error(chalk.gray(`  Targets: ${event.targets.join(', ')} (${event.targetSource})`));
      break;

    case 'build.phase':
      if (options.verbose) {
        console.error(chalk.cyan(`\n▶ ${event.phase}: ${event.detail}`));
      } else {
        startSpinner(event.phase === 'clean' ? `Removing ${event.detail}` : `Build ${event.phase}...`);
      }
      break;

    case 'build.output':
      if (options.verbose) process.stderr.write(chalk.dim(event.chunk));
      break;

    case 'build.completed':
      if (event.dryRun) {
        console.error(chalk.yellow('  Dry run: nothing was built'));
      } else {
        stopActiveSpinner(true, `Built ${event.buildDir} in ${seconds(event.durationMs)}`);
        if (options.verbose) console.error(chalk.green(`  ✓ Built ${event.buildDir}`));
      }
      break;

    case 'test.discovered':
      console.error(chalk.gray(`\n  ${event.count} test binaries in ${event.binDir}`));
      break;

    case 'test.started':
      startSpinner(`[${event.index + 1}/${event.total}] ${event.name}`);
      break;

    case 'test.completed': {
      const { outcome } = event;
      const wasRunning = activeSpinner !== null;
      if (wasRunning) {
        activeSpinner?.stop();
        activeSpinner = null;
      }
      const label = statusColors[outcome.status](statusLabels[outcome.status]);
      const detail = outcome.status === 'skipped'
        ? chalk.dim(` (${outcome.reason ?? 'skipped'})`)
        : chalk.dim(` ${seconds(outcome.durationMs)}`);
      console.error(`  ${label} ${outcome.name}${detail}`);
      break;
    }

    case 'run.completed':
      break;
  }
}

/** Subscribe the renderer to a bus; returns the unsubscribe function. */
export function attachRenderer(bus: EventBus, options: RenderOptions = {}): () => void {
  const listener = (event: PipelineEvent) => renderEvent(event, options);
  bus.on('event', listener);
  return () => {
    bus.off('event', listener);
  };
}

export function printProbeResult(context: AcceleratorContext): void {
  console.error(chalk.bold('\nAccelerator'));
  console.error(chalk.gray('-'.repeat(40)));
  console.error(`  SDK root:  ${chalk.white(context.sdkRoot)} ${chalk.dim(`(${context.rootSource})`)}`);
  console.error(`  Targets:   ${chalk.cyan(context.targets.join(', '))} ${chalk.dim(`(${context.targetSource})`)}`);
  console.error(`  Platform:  ${context.platform}`);
  console.error(chalk.gray('-'.repeat(40)));
}

/**
 * Print the final test summary with failure output.
 */
export function printRunSummary(summary: RunSummary): void {
  for (const failure of summary.failures) {
    const status = failure.signal ? `signal ${failure.signal}` : `exit code ${failure.exitCode ?? 'unknown'}`;
    console.error(chalk.red(`\n━━━ ${failure.name} failed (${status}) ━━━`));
    if (failure.output) console.error(failure.output);
  }

  console.error(chalk.bold('\nTest Summary'));
  console.error(chalk.gray('-'.repeat(40)));
  console.error(`  Run:       ${chalk.white(summary.runId)}`);
  console.error(`  Total:     ${summary.total}`);
  console.error(`  Passed:    ${chalk.green(String(summary.passed))}`);
  console.error(`  Failed:    ${summary.failed > 0 ? chalk.red(String(summary.failed)) : '0'}`);
  console.error(`  Skipped:   ${chalk.yellow(String(summary.skipped))}`);
  console.error(`  Duration:  ${chalk.cyan(seconds(summary.durationMs))}`);
  if (summary.logFile) console.error(`  Log:       ${summary.logFile}`);
  console.error(chalk.gray('-'.repeat(40)));
}
