// packages/cli/src/commands/probe.ts — Report the accelerator SDK and its targets

import { CapabilityProbe, EventBus, probeOptionsFromConfig } from '@accelbuild/core';

import { printProbeResult } from '../render.js';
import { createCliLogger, loadCliConfig, type GlobalOptions } from '../utils.js';

export interface ProbeCommandOptions extends GlobalOptions {
  sdkRoot?: string;
  fallbackTarget?: string;
  json?: boolean;
}

export async function probeCommand(options: ProbeCommandOptions): Promise<void> {
  const config = loadCliConfig(options, {
    sdk: { root: options.sdkRoot, fallbackTarget: options.fallbackTarget },
  });
  const logger = createCliLogger(config, options);
  const probe = new CapabilityProbe({ logger, bus: new EventBus() });

  const context = await probe.probe(probeOptionsFromConfig(config));
  if (options.json) {
    console.log(JSON.stringify(context, null, 2));
  } else {
    printProbeResult(context);
  }
}
