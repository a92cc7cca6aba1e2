// packages/core/src/utils/index.ts -- barrel re-export

export { generateRunId } from './id.js';
export {
  ConfigError,
  SpawnError,
  FetchError,
  DirtyWorkingTreeError,
  SdkNotFoundError,
  BuildFailedError,
  BuildOutputMissingError,
} from './errors.js';
export type { SyncStep, BuildStep } from './errors.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';
export { tailLines } from './text.js';
