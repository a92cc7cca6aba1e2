// packages/core/src/types/accelerator.ts — Accelerator SDK discovery types

export type RootSource = 'override' | 'discovery' | 'default';
export type TargetSource = 'probe' | 'fallback';

/** Immutable snapshot of what the installed SDK offers on this machine. */
export interface AcceleratorContext {
  readonly sdkRoot: string;
  readonly rootSource: RootSource;
  /** Never empty. */
  readonly targets: readonly string[];
  readonly targetSource: TargetSource;
  readonly platform: NodeJS.Platform;
}
