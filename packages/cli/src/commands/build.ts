// packages/cli/src/commands/build.ts — Configure and compile against the detected SDK

import {
  BuildOrchestrator,
  buildOverridesFromConfig,
  CapabilityProbe,
  deriveBuildConfiguration,
  EventBus,
  formatCommand,
  probeOptionsFromConfig,
  resolvePaths,
  type BuildType,
  type ProjectConfigInput,
} from '@accelbuild/core';
import chalk from 'chalk';

import { attachRenderer } from '../render.js';
import { createCliLogger, loadCliConfig, type GlobalOptions } from '../utils.js';

export interface BuildOptions extends GlobalOptions {
  sdkRoot?: string;
  sourceDir?: string;
  buildDir?: string;
  buildType?: BuildType;
  targets?: string[];
  jobs?: number;
  curl?: boolean;
  openssl?: boolean;
  llguidance?: boolean;
  clean?: boolean;
  dryRun?: boolean;
  json?: boolean;
}

export function buildConfigOverrides(options: BuildOptions): ProjectConfigInput {
  return {
    source: { path: options.sourceDir },
    sdk: { root: options.sdkRoot },
    build: {
      dir: options.buildDir,
      type: options.buildType,
      targets: options.targets,
      jobs: options.jobs,
      features: { curl: options.curl, openssl: options.openssl, llguidance: options.llguidance },
      clean: options.clean,
    },
  };
}

export async function buildCommand(options: BuildOptions): Promise<void> {
  const config = loadCliConfig(options, buildConfigOverrides(options));
  const logger = createCliLogger(config, options);
  const bus = new EventBus();
  const detach = attachRenderer(bus, { verbose: options.verbose });

  try {
    const paths = resolvePaths(config, process.cwd());
    const context = await new CapabilityProbe({ logger: logger.child('probe'), bus }).probe(
      probeOptionsFromConfig(config),
    );
    const buildConfig = deriveBuildConfiguration(
      context,
      paths.sourceDir,
      buildOverridesFromConfig(config, paths),
      logger,
    );
    const result = await new BuildOrchestrator({ logger, bus }).build(buildConfig, { dryRun: options.dryRun });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.dryRun) {
      console.error(chalk.bold('\nPlanned commands'));
      console.error(`  ${formatCommand(result.plan.configure.command, result.plan.configure.args)}`);
      console.error(`  ${formatCommand(result.plan.compile.command, result.plan.compile.args)}`);
    }
  } finally {
    detach();
  }
}
