// packages/core/src/engine -- Event bus and pipeline composition

export { EventBus } from './event-bus.js';
export {
  runPipeline,
  probeTargets,
  sourceReferenceFromConfig,
  probeOptionsFromConfig,
  buildOverridesFromConfig,
  skipRulesFromConfig,
} from './pipeline.js';
export type { PipelineOptions, PipelineResult, PipelineSteps } from './pipeline.js';
