// packages/cli/src/commands/pipeline.ts — Sync, build and test in one go

import { EventBus, runPipeline, type BuildType, type ProjectConfigInput, type TestMode } from '@accelbuild/core';

import { attachRenderer, printRunSummary } from '../render.js';
import { createCliLogger, loadCliConfig, type GlobalOptions } from '../utils.js';
import { buildConfigOverrides } from './build.js';
import { syncOverrides } from './sync.js';
import { flagBinDir, testOverrides } from './test.js';

export interface PipelineCommandOptions extends GlobalOptions {
  // sync
  path?: string;
  ref?: string;
  url?: string;
  depth?: number;
  fullHistory?: boolean;
  fetchJobs?: number;
  force?: boolean;
  tag?: boolean;
  // build
  sdkRoot?: string;
  buildDir?: string;
  buildType?: BuildType;
  targets?: string[];
  jobs?: number;
  curl?: boolean;
  openssl?: boolean;
  llguidance?: boolean;
  clean?: boolean;
  dryRun?: boolean;
  // test
  logFile?: string;
  mode?: TestMode;
  timeout?: number;
  // steps
  skipSync?: boolean;
  skipBuild?: boolean;
  skipTests?: boolean;
  json?: boolean;
}

export function pipelineOverrides(options: PipelineCommandOptions): ProjectConfigInput {
  const sync = syncOverrides({ ...options, jobs: options.fetchJobs });
  const build = buildConfigOverrides({ ...options, sourceDir: options.path });
  const test = testOverrides(options);
  return {
    source: { ...build.source, ...sync.source },
    sdk: build.sdk,
    build: build.build,
    test: test.test,
  };
}

export async function pipelineCommand(options: PipelineCommandOptions): Promise<void> {
  const config = loadCliConfig(options, pipelineOverrides(options));
  const logger = createCliLogger(config, options);
  const bus = new EventBus();
  const detach = attachRenderer(bus, { verbose: options.verbose });

  try {
    const result = await runPipeline(config, {
      projectDir: process.cwd(),
      logger,
      bus,
      testBinDir: flagBinDir(options.buildDir),
      force: options.force,
      dryRun: options.dryRun,
      skip: { sync: options.skipSync, build: options.skipBuild, tests: options.skipTests },
    });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.tests) {
      printRunSummary(result.tests);
    }
    process.exitCode = result.exitCode;
  } finally {
    detach();
  }
}
