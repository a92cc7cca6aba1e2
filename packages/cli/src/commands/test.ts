// packages/cli/src/commands/test.ts — Discover, filter and run the built test binaries

import { resolve } from 'node:path';

import {
  binaryDirFor,
  CapabilityProbe,
  EventBus,
  exitCodeFor,
  probeTargets,
  resolvePaths,
  SkipPolicy,
  skipRulesFromConfig,
  TestRunner,
  type ProjectConfigInput,
  type TestMode,
} from '@accelbuild/core';

import { attachRenderer, printRunSummary } from '../render.js';
import { createCliLogger, loadCliConfig, type GlobalOptions } from '../utils.js';

export interface TestOptions extends GlobalOptions {
  buildDir?: string;
  logFile?: string;
  mode?: TestMode;
  targets?: string[];
  timeout?: number;
  json?: boolean;
}

export function testOverrides(options: TestOptions): ProjectConfigInput {
  return {
    build: { targets: options.targets },
    test: { mode: options.mode, logFile: options.logFile, timeoutSec: options.timeout },
  };
}

/** Binary directory named by `--build-dir`, which wins over LLAMACPP_BUILD_DIR and the config. */
export function flagBinDir(buildDir: string | undefined): string | undefined {
  return buildDir ? binaryDirFor(resolve(buildDir)) : undefined;
}

export async function testCommand(options: TestOptions): Promise<void> {
  const config = loadCliConfig(options, testOverrides(options));
  const logger = createCliLogger(config, options);
  const bus = new EventBus();
  const detach = attachRenderer(bus, { verbose: options.verbose });

  try {
    const paths = resolvePaths(config, process.cwd());
    const binDir = flagBinDir(options.buildDir) ?? paths.testBinDir;
    const targets =
      config.build.targets ??
      (await probeTargets(new CapabilityProbe({ logger: logger.child('probe') }), config, logger));

    const runner = new TestRunner({ logger, bus, policy: new SkipPolicy(skipRulesFromConfig(config)) });
    const binaries = runner.discover(binDir, { prefix: config.test.prefix });
    const summary = await runner.run(
      binaries,
      { platform: process.platform, targets },
      { logFile: config.test.logFile ? resolve(config.test.logFile) : undefined, timeoutSec: config.test.timeoutSec },
    );

    if (options.json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      printRunSummary(summary);
    }
    process.exitCode = exitCodeFor(summary);
  } finally {
    detach();
  }
}
