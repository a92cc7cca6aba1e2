// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export {
  projectConfigSchema,
  validateConfig,
  buildTypeSchema,
  nameMatcherSchema,
  skipRuleSchema,
  testModeSchema,
} from './schema.js';
export type { ProjectConfig, ProjectConfigInput } from './schema.js';
export { loadConfig, writeConfig, deepMerge, configFromEnv, resolveConfigPath } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export { resolvePaths, binaryDirFor } from './paths.js';
export type { ResolvedPaths } from './paths.js';
