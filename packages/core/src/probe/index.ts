// packages/core/src/probe/index.ts -- barrel re-export

export {
  CapabilityProbe,
  createAcceleratorContext,
  parseAgentTargets,
  isValidSdkRoot,
  hipCompilerPath,
  agentEnumeratorPath,
} from './capability-probe.js';
export type { ProbeOptions, CapabilityProbeOptions } from './capability-probe.js';
