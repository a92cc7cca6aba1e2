// packages/core/src/testing/index.ts -- barrel re-export

export { discoverTests, scanDirFor } from './discovery.js';
export type { DiscoverOptions } from './discovery.js';
export {
  SkipPolicy,
  DEFAULT_SKIP_RULES,
  SMOKE_TESTS,
  SMOKE_RULE_ID,
  smokeRule,
  buildSkipRules,
} from './skip-policy.js';
export type { SkipRuleOptions } from './skip-policy.js';
export { TestRunner, exitCodeFor } from './test-runner.js';
export type { TestRunnerOptions, RunTestsOptions } from './test-runner.js';
