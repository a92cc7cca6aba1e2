// packages/cli/src/commands/sync.ts — Bring the source tree to the pinned ref

import {
  EventBus,
  resolvePaths,
  sourceReferenceFromConfig,
  SourceSync,
  type ProjectConfigInput,
} from '@accelbuild/core';

import { attachRenderer } from '../render.js';
import { createCliLogger, loadCliConfig, type GlobalOptions } from '../utils.js';

export interface SyncOptions extends GlobalOptions {
  path?: string;
  ref?: string;
  url?: string;
  depth?: number;
  fullHistory?: boolean;
  jobs?: number;
  force?: boolean;
  /** false when --no-tag is given */
  tag?: boolean;
  json?: boolean;
}

export function syncOverrides(options: SyncOptions): ProjectConfigInput {
  return {
    source: {
      path: options.path,
      ref: options.ref,
      url: options.url,
      depth: options.fullHistory ? null : options.depth,
      jobs: options.jobs,
      diffbaseTag: options.tag === false ? null : undefined,
    },
  };
}

export async function syncCommand(options: SyncOptions): Promise<void> {
  const config = loadCliConfig(options, syncOverrides(options));
  const logger = createCliLogger(config, options);
  const bus = new EventBus();
  const detach = attachRenderer(bus, { verbose: options.verbose });

  const paths = resolvePaths(config, process.cwd());
  const sync = new SourceSync({ logger, bus, force: options.force });
  try {
    const result = await sync.sync(sourceReferenceFromConfig(config, paths));
    if (options.json) console.log(JSON.stringify(result, null, 2));
  } finally {
    detach();
  }
}
