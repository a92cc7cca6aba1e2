// packages/core/src/config/paths.ts — Resolve the directories a run works in

import { isAbsolute, join, resolve } from 'node:path';
import { BUILD_DIR_ENV, DEFAULT_BUILD_SUBDIR } from '../utils/constants.js';
import type { ProjectConfig } from './schema.js';

export interface ResolvedPaths {
  sourceDir: string;
  /** Where the build writes */
  buildDir: string;
  /** Directory holding the test executables; `LLAMACPP_BUILD_DIR` names it directly */
  testBinDir: string;
}

function absolute(base: string, p: string): string {
  return isAbsolute(p) ? p : resolve(base, p);
}

export function binaryDirFor(buildDir: string): string {
  return join(buildDir, 'bin');
}

export function resolvePaths(
  config: ProjectConfig,
  projectDir: string,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedPaths {
  const sourceDir = absolute(projectDir, config.source.path);
  const buildDir = config.build.dir
    ? absolute(projectDir, config.build.dir)
    : join(sourceDir, DEFAULT_BUILD_SUBDIR);
  const envBinDir = env[BUILD_DIR_ENV];
  const testBinDir = envBinDir ? absolute(projectDir, envBinDir) : binaryDirFor(buildDir);
  return { sourceDir, buildDir, testBinDir };
}
