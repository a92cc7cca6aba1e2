// packages/core/src/build/index.ts — barrel re-export

export {
  BuildOrchestrator,
  DEFAULT_FEATURES,
  buildEnvironment,
  compileCommand,
  configureCommand,
  deriveBuildConfiguration,
  planBuild,
  validateBuildConfiguration,
} from './build-orchestrator.js';
export type { BuildOrchestratorOptions } from './build-orchestrator.js';
