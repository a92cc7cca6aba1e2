// packages/core/src/testing/discovery.ts — Find runnable test executables in a build tree

import { constants, accessSync, existsSync, readdirSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { binaryDirFor } from '../config/paths.js';
import type { TestBinary } from '../types/testing.js';
import { TEST_BINARY_PREFIX } from '../utils/constants.js';
import { BuildOutputMissingError } from '../utils/errors.js';

export interface DiscoverOptions {
  platform?: NodeJS.Platform;
  prefix?: string;
  /** Receives entries that carry the prefix but are not runnable. */
  onReject?: (path: string, reason: string) => void;
}

function isExecutable(path: string, platform: NodeJS.Platform): boolean {
  if (platform === 'win32') return path.toLowerCase().endsWith('.exe');
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function testName(fileName: string, platform: NodeJS.Platform): string {
  return platform === 'win32' && fileName.toLowerCase().endsWith('.exe') ? fileName.slice(0, -4) : fileName;
}

function isDirectory(path: string): boolean {
  return existsSync(path) && statSync(path).isDirectory();
}

/**
 * Directory actually scanned for `dir`. A build root handed over in place of
 * its binary directory holds no test entries of its own but has a `bin/`.
 */
export function scanDirFor(dir: string, prefix: string = TEST_BINARY_PREFIX): string {
  const nested = binaryDirFor(dir);
  if (!isDirectory(nested)) return dir;
  return readdirSync(dir).some((entry) => entry.startsWith(prefix)) ? dir : nested;
}

/**
 * List test binaries in the binary directory `binDir`, sorted by name.
 *
 * A missing directory is an error, since the build never produced it; an
 * existing one without matching entries yields an empty list.
 */
export function discoverTests(binDir: string, options: DiscoverOptions = {}): TestBinary[] {
  const platform = options.platform ?? process.platform;
  const prefix = options.prefix ?? TEST_BINARY_PREFIX;

  if (!isDirectory(binDir)) {
    throw new BuildOutputMissingError(binDir);
  }
  const dir = scanDirFor(binDir, prefix);

  const binaries: TestBinary[] = [];
  for (const entry of readdirSync(dir)) {
    if (!entry.startsWith(prefix)) continue;
    const path = join(dir, entry);
    const name = testName(entry, platform);
    if (name.length <= prefix.length) {
      options.onReject?.(path, 'name is only the prefix');
      continue;
    }

    let isFile: boolean;
    try {
      isFile = statSync(path).isFile();
    } catch {
      options.onReject?.(path, 'broken link');
      continue;
    }
    if (!isFile) {
      options.onReject?.(path, 'not a regular file');
      continue;
    }
    if (!isExecutable(path, platform)) {
      options.onReject?.(path, 'not executable');
      continue;
    }
    binaries.push({ path, name });
  }

  return binaries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
