import type { KnownIntent } from '@cmdtrust/shared';
import { isKnownIntent, toIntent } from '@cmdtrust/shared';
import type { IntentRules } from './types.js';

// ============================================================================
// Per-Intent Rule Table
// ============================================================================

export const INTENT_RULES: Readonly<Record<KnownIntent, IntentRules>> = {
  test: {
    mustContain: ['test', 'spec', 'check', 'pytest', 'jest', 'mocha', 'jasmine'],
    mustNotContain: ['rm', 'delete', 'format', 'install'],
    expectedDurationMs: [100, 300_000],
    modifiesFiles: false,
    expectedOutputPatterns: [/test/i, /pass/i, /fail/i, /ok/i, /error/i],
  },
  lint: {
    mustContain: ['lint', 'check', 'ruff', 'flake', 'eslint', 'pylint', 'rubocop'],
    mustNotContain: ['rm', 'delete', 'install'],
    expectedDurationMs: [100, 60_000],
    modifiesFiles: false,
    expectedOutputPatterns: [/error/i, /warning/i, /found/i, /issue/i, /problem/i, /ok/i, /clean/i],
  },
  format: {
    mustContain: ['format', 'black', 'prettier', 'fmt', 'autopep', 'standard'],
    mustNotContain: ['rm', 'test', 'install'],
    expectedDurationMs: [100, 60_000],
    modifiesFiles: true,
    expectedOutputPatterns: [/reformat/i, /fixed/i, /changed/i, /modified/i],
  },
  coverage: {
    mustContain: ['cov', 'coverage', 'cover'],
    mustNotContain: ['rm', 'delete', 'install'],
    expectedDurationMs: [500, 600_000],
    modifiesFiles: false,
    expectedOutputPatterns: [/\d+%/, /coverage/i, /lines/i, /statements/i],
  },
  build: {
    mustContain: ['build', 'compile', 'bundle', 'webpack', 'rollup', 'tsc'],
    mustNotContain: ['rm -rf', 'sudo'],
    expectedDurationMs: [500, 600_000],
    modifiesFiles: true,
    expectedOutputPatterns: [/built/i, /compiled/i, /bundle/i, /success/i, /complete/i],
  },
};

/** Conservative rules for intents outside the table. */
export const DEFAULT_INTENT_RULES: IntentRules = {
  mustContain: [],
  mustNotContain: ['rm', 'delete', 'sudo'],
  expectedDurationMs: [10, 600_000],
  modifiesFiles: false,
  expectedOutputPatterns: [],
};

/**
 * Rules for an intent or ledger key (`lint`, `LINT_CMD`).
 */
export function getIntentRules(intent: string): IntentRules {
  const normalized = toIntent(intent);
  return isKnownIntent(normalized) ? INTENT_RULES[normalized] : DEFAULT_INTENT_RULES;
}
