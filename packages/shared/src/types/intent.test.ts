import { describe, expect, it } from 'vitest';
import { IntentSchema, isKnownIntent, toCommandType, toIntent } from './intent.js';
import { TeachCommandRequestSchema } from './protocol.js';

describe('intent naming', () => {
  it('maps intents to ledger keys and back', () => {
    expect(toCommandType('test')).toBe('TEST_CMD');
    expect(toCommandType('Lint')).toBe('LINT_CMD');
    expect(toCommandType('FORMAT_CMD')).toBe('FORMAT_CMD');
    expect(toIntent('COVERAGE_CMD')).toBe('coverage');
    expect(toIntent('build')).toBe('build');
  });

  it('separates known intents from custom ones', () => {
    expect(isKnownIntent('coverage')).toBe(true);
    expect(isKnownIntent('typecheck')).toBe(false);
  });

  it('accepts single-word intent names only', () => {
    expect(IntentSchema.safeParse('type-check').success).toBe(true);
    expect(IntentSchema.safeParse('run tests').success).toBe(false);
    expect(IntentSchema.safeParse('').success).toBe(false);
  });
});

describe('teach request schema', () => {
  it('defaults save and source', () => {
    const parsed = TeachCommandRequestSchema.parse({ intent: 'lint', command: 'eslint .' });
    expect(parsed).toEqual({ intent: 'lint', command: 'eslint .', save: true, source: 'agent' });
  });

  it('rejects a blank command', () => {
    const parsed = TeachCommandRequestSchema.safeParse({ intent: 'lint', command: '   ' });
    expect(parsed.success).toBe(false);
  });
});
