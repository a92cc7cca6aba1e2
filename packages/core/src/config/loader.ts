// packages/core/src/config/loader.ts

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { CONFIG_FILENAME, SDK_ROOT_ENV, TEST_TYPE_ENV } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { testModeSchema, validateConfig, type ProjectConfig, type ProjectConfigInput } from './schema.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged; undefined source values are ignored.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (srcVal === undefined) continue;
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Config fragment contributed by recognised environment variables.
 * `TEST_TYPE` is matched case-insensitively; other values are ignored with a warning.
 */
export function configFromEnv(env: NodeJS.ProcessEnv, logger: Logger = silentLogger): PlainObject {
  const fragment: PlainObject = {};
  const sdkRoot = env[SDK_ROOT_ENV];
  if (sdkRoot) fragment.sdk = { root: sdkRoot };
  const testType = env[TEST_TYPE_ENV];
  if (testType) {
    const mode = testModeSchema.safeParse(testType.trim().toLowerCase());
    if (mode.success) {
      fragment.test = { mode: mode.data };
    } else {
      logger.warn(`Ignoring ${TEST_TYPE_ENV}=${testType}; expected one of ${testModeSchema.options.join(', ')}`);
    }
  }
  return fragment;
}

export interface LoadConfigOptions {
  projectDir?: string;
  /** Explicit config file; relative paths resolve against projectDir. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ProjectConfigInput;
  skipFile?: boolean;
  /** Receives warnings about ignored environment values. */
  logger?: Logger;
}

/**
 * Load config with precedence: overrides > environment > config file > defaults.
 *
 * 1. Start with schema defaults
 * 2. Merge the YAML file (default `.accelbuild.yml` in projectDir) on top
 * 3. Merge environment variables (ROCM_PATH, TEST_TYPE) on top
 * 4. Merge programmatic overrides on top
 * 5. Validate the final result
 */
export function loadConfig(options: LoadConfigOptions = {}): ProjectConfig {
  const projectDir = options.projectDir ?? process.cwd();
  let merged: PlainObject = structuredClone(DEFAULT_CONFIG);

  const configPath = resolveConfigPath(projectDir, options.configPath);
  if (!options.skipFile) {
    if (existsSync(configPath)) {
      let fileConfig: unknown;
      try {
        fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(
          `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
      if (isPlainObject(fileConfig)) {
        merged = deepMerge(merged, fileConfig);
      } else if (fileConfig !== null && fileConfig !== undefined) {
        throw new ConfigError(`${configPath} must contain a YAML mapping`);
      }
    } else if (options.configPath) {
      throw new ConfigError(`Config file ${configPath} not found`, 'configPath');
    }
  }

  merged = deepMerge(merged, configFromEnv(options.env ?? process.env, options.logger));

  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

export function resolveConfigPath(projectDir: string, configPath?: string): string {
  if (!configPath) return join(projectDir, CONFIG_FILENAME);
  return isAbsolute(configPath) ? configPath : join(projectDir, configPath);
}

/**
 * Write a config to `.accelbuild.yml` in the given directory.
 * Refuses to overwrite an existing file unless `force` is set.
 */
export function writeConfig(config: ProjectConfig, dir: string, options?: { force?: boolean }): string {
  const configPath = join(dir, CONFIG_FILENAME);
  if (existsSync(configPath) && !options?.force) {
    throw new ConfigError(`${configPath} already exists (use --force to overwrite)`);
  }
  const yamlContent = stringifyYaml(config, { lineWidth: 100 });
  writeFileSync(configPath, yamlContent, 'utf-8');
  return configPath;
}
