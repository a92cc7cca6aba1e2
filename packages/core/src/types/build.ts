// packages/core/src/types/build.ts — Native build types

export type BuildType = 'Release' | 'Debug' | 'RelWithDebInfo' | 'MinSizeRel';

export interface FeatureToggles {
  /** HTTP transfer support (libcurl) */
  curl: boolean;
  /** TLS via the system OpenSSL */
  openssl: boolean;
  /** Constrained decoding (LLGuidance) */
  llguidance: boolean;
}

export interface BuildConfiguration {
  readonly sdkRoot: string;
  readonly sourceDir: string;
  readonly buildDir: string;
  readonly buildType: BuildType;
  readonly targets: readonly string[];
  /** True when targets came from the caller rather than the probe. */
  readonly targetsOverridden: boolean;
  readonly features: Readonly<FeatureToggles>;
  readonly jobs: number;
  /** Remove buildDir entirely before configuring. */
  readonly clean: boolean;
}

export interface BuildOverrides {
  buildDir?: string;
  buildType?: BuildType;
  targets?: readonly string[];
  jobs?: number;
  features?: Partial<FeatureToggles>;
  clean?: boolean;
}

export interface BuildCommand {
  command: string;
  args: string[];
}

export interface BuildPlan {
  config: BuildConfiguration;
  env: Record<string, string>;
  configure: BuildCommand;
  compile: BuildCommand;
}

export interface BuildResult {
  plan: BuildPlan;
  dryRun: boolean;
  configureMs: number;
  compileMs: number;
  durationMs: number;
}
