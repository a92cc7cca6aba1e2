// packages/core/src/config/schema.ts

import { z } from 'zod';
import {
  DEFAULT_DIFFBASE_TAG,
  DEFAULT_FALLBACK_TARGET,
  DEFAULT_FETCH_DEPTH,
  DEFAULT_FETCH_JOBS,
  DEFAULT_SDK_ROOT,
  DEFAULT_SOURCE_PATH,
  DEFAULT_SOURCE_REF,
  DEFAULT_SOURCE_URL,
  TEST_BINARY_PREFIX,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const targetSchema = z.string().regex(/^[A-Za-z0-9_:+-]+$/, 'Invalid hardware target identifier');

const sourceConfigSchema = z.object({
  url: z.string().min(1).default(DEFAULT_SOURCE_URL),
  path: z.string().min(1).default(DEFAULT_SOURCE_PATH),
  ref: z.string().min(1).default(DEFAULT_SOURCE_REF),
  /** null fetches full history */
  depth: z.number().int().positive().nullable().default(DEFAULT_FETCH_DEPTH),
  jobs: z.number().int().positive().default(DEFAULT_FETCH_JOBS),
  /** null disables tagging */
  diffbaseTag: z.string().min(1).nullable().default(DEFAULT_DIFFBASE_TAG),
});

const sdkConfigSchema = z.object({
  root: z.string().min(1).optional(),
  defaultRoot: z.string().min(1).default(DEFAULT_SDK_ROOT),
  fallbackTarget: targetSchema.default(DEFAULT_FALLBACK_TARGET),
});

export const buildTypeSchema = z.enum(['Release', 'Debug', 'RelWithDebInfo', 'MinSizeRel']);

const featureTogglesSchema = z.object({
  curl: z.boolean().default(false),
  openssl: z.boolean().default(false),
  llguidance: z.boolean().default(false),
});

const buildConfigSchema = z.object({
  /** Defaults to `<source.path>/build` */
  dir: z.string().min(1).optional(),
  type: buildTypeSchema.default('Release'),
  /** Explicit targets override discovery */
  targets: z.array(targetSchema).min(1).optional(),
  jobs: z.union([z.literal('auto'), z.number().int().positive()]).default('auto'),
  features: featureTogglesSchema.default({}),
  clean: z.boolean().default(false),
});

const platformSchema = z.enum([
  'aix',
  'android',
  'darwin',
  'freebsd',
  'haiku',
  'linux',
  'openbsd',
  'sunos',
  'win32',
  'cygwin',
  'netbsd',
]);

export const nameMatcherSchema = z.union([
  z.object({ exact: z.string().min(1) }).strict(),
  z.object({ glob: z.string().min(1) }).strict(),
  z.object({ notIn: z.array(z.string().min(1)) }).strict(),
]);

export const skipRuleSchema = z.object({
  id: z.string().min(1),
  match: nameMatcherSchema,
  scope: z
    .object({
      platforms: z.array(platformSchema).min(1).optional(),
      targets: z.array(targetSchema).min(1).optional(),
    })
    .optional(),
  reason: z.string().min(1),
});

export const testModeSchema = z.enum(['full', 'smoke']);

const testConfigSchema = z.object({
  mode: testModeSchema.default('full'),
  prefix: z.string().min(1).default(TEST_BINARY_PREFIX),
  timeoutSec: z.number().int().positive().optional(),
  logFile: z.string().min(1).optional(),
  /** Evaluated before the built-in rules */
  skipRules: z.array(skipRuleSchema).default([]),
  useDefaultSkipRules: z.boolean().default(true),
  /** Replaces the built-in smoke list when set */
  smokeTests: z.array(z.string().min(1)).min(1).optional(),
});

export const projectConfigSchema = z
  .object({
    configVersion: z.number().int().positive().optional(),
    source: sourceConfigSchema.default({}),
    sdk: sdkConfigSchema.default({}),
    build: buildConfigSchema.default({}),
    test: testConfigSchema.default({}),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.test.skipRules.forEach((rule, index) => {
      if (seen.has(rule.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['test', 'skipRules', index, 'id'],
          message: `Duplicate skip rule id "${rule.id}"`,
        });
      }
      seen.add(rule.id);
    });
  });

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;
export type ProjectConfig = z.output<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): ProjectConfig {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
