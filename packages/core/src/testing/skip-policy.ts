// packages/core/src/testing/skip-policy.ts — Ordered skip rules for known-bad tests

import ignore, { type Ignore } from 'ignore';
import type { NameMatcher, SkipContext, SkipDecision, SkipRule, TestMode } from '../types/testing.js';

const NEEDS_EXTERNAL_DATA = 'needs model or data files the build does not provide';

export const DEFAULT_SKIP_RULES: readonly SkipRule[] = [
  { id: 'tokenizer-1-spm', match: { exact: 'test-tokenizer-1-spm' }, reason: NEEDS_EXTERNAL_DATA },
  { id: 'gbnf-validator', match: { exact: 'test-gbnf-validator' }, reason: NEEDS_EXTERNAL_DATA },
  {
    id: 'json-schema-to-grammar',
    match: { exact: 'test-json-schema-to-grammar' },
    reason: NEEDS_EXTERNAL_DATA,
  },
  { id: 'quantize-stats', match: { exact: 'test-quantize-stats' }, reason: NEEDS_EXTERNAL_DATA },
  { id: 'tokenizer-0', match: { exact: 'test-tokenizer-0' }, reason: NEEDS_EXTERNAL_DATA },
  { id: 'chat', match: { exact: 'test-chat' }, reason: NEEDS_EXTERNAL_DATA },
  { id: 'tokenizer-1-bpe', match: { exact: 'test-tokenizer-1-bpe' }, reason: NEEDS_EXTERNAL_DATA },
  { id: 'thread-safety', match: { exact: 'test-thread-safety' }, reason: NEEDS_EXTERNAL_DATA },
  {
    id: 'backend-ops-gfx1030',
    match: { exact: 'test-backend-ops' },
    scope: { targets: ['gfx1030'] },
    reason: 'floating point exception in flash attention ops on gfx1030',
  },
];

export const SMOKE_TESTS: readonly string[] = [
  'test-llama-grammar',
  'test-arg-parser',
  'test-log',
  'test-c',
  'test-alloc',
  'test-gguf',
];

export const SMOKE_RULE_ID = 'smoke-mode';

/** Rule that skips everything outside the smoke list. */
export function smokeRule(tests: readonly string[] = SMOKE_TESTS): SkipRule {
  return {
    id: SMOKE_RULE_ID,
    match: { notIn: [...tests] },
    reason: 'not part of the smoke set',
  };
}

export interface SkipRuleOptions {
  mode?: TestMode;
  /** Evaluated ahead of the built-in rules */
  extraRules?: readonly SkipRule[];
  useDefaults?: boolean;
  smokeTests?: readonly string[];
}

/** Assemble the effective rule table: extra rules, defaults, then the smoke filter. */
export function buildSkipRules(options: SkipRuleOptions = {}): SkipRule[] {
  const rules = [...(options.extraRules ?? [])];
  if (options.useDefaults ?? true) rules.push(...DEFAULT_SKIP_RULES);
  if (options.mode === 'smoke') rules.push(smokeRule(options.smokeTests));
  return rules;
}

interface CompiledRule {
  rule: SkipRule;
  matches: (name: string) => boolean;
}

function compileMatcher(match: NameMatcher): (name: string) => boolean {
  if ('exact' in match) {
    return (name) => name === match.exact;
  }
  if ('glob' in match) {
    const ig: Ignore = ignore().add(match.glob);
    return (name) => ig.ignores(name);
  }
  const allowed = new Set(match.notIn);
  return (name) => !allowed.has(name);
}

function inScope(rule: SkipRule, context: SkipContext): boolean {
  const scope = rule.scope;
  if (!scope) return true;
  if (scope.platforms && !scope.platforms.includes(context.platform)) return false;
  if (scope.targets && !scope.targets.some((t) => context.targets.includes(t))) return false;
  return true;
}

export class SkipPolicy {
  private readonly compiled: CompiledRule[];

  constructor(rules: readonly SkipRule[] = DEFAULT_SKIP_RULES) {
    this.compiled = rules.map((rule) => ({ rule, matches: compileMatcher(rule.match) }));
  }

  get rules(): SkipRule[] {
    return this.compiled.map((c) => c.rule);
  }

  evaluate(name: string, context: SkipContext): SkipDecision {
    for (const { rule, matches } of this.compiled) {
      if (matches(name) && inScope(rule, context)) {
        return { action: 'skip', ruleId: rule.id, reason: rule.reason };
      }
    }
    return { action: 'run' };
  }
}
