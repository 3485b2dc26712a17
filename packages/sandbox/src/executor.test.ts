import { describe, expect, it } from 'vitest';
import { CommandExecutor, normalizeConfig } from './executor.js';

describe('CommandExecutor', () => {
  const executor = new CommandExecutor();

  it('captures stdout and the exit code', async () => {
    const result = await executor.execute('echo hello');
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('hello\n');
    expect(result.stderr).toBe('');
    expect(result.killed).toBe(false);
  });

  it('captures stderr and non-zero exits', async () => {
    const result = await executor.execute('echo oops 1>&2; exit 3');
    expect(result.exitCode).toBe(3);
    expect(result.stderr).toBe('oops\n');
  });

  it('passes extra environment variables', async () => {
    const result = await executor.execute('echo "$CMDTRUST_PROBE"', {
      env: { CMDTRUST_PROBE: 'probe-value' },
    });
    expect(result.stdout).toBe('probe-value\n');
  });

  it('kills commands that outlive their timeout', async () => {
    const result = await executor.execute('sleep 5', { timeout: 200 });
    expect(result.killed).toBe(true);
    expect(result.exitCode).toBe(124);
    expect(result.duration).toBeLessThan(4000);
  });

  it('kills a group member that ignores SIGTERM and keeps the pipes open', async () => {
    // The shell dies on SIGTERM; the subshell's sleep ignores it and holds stdout.
    const result = await executor.execute("(trap '' TERM; sleep 5) & wait", { timeout: 200 });
    expect(result.killed).toBe(true);
    expect(result.exitCode).toBe(124);
    expect(result.duration).toBeLessThan(4000);
  });

  it('truncates oversized output', async () => {
    const small = new CommandExecutor({ maxOutputBytes: 10 });
    const result = await small.execute("printf '%s' 0123456789abcdef");
    expect(result.stdout).toBe('0123456789\n[Output truncated]');
  });

  it('merges config updates', () => {
    const configured = new CommandExecutor({ verificationTimeoutMs: 5000 });
    configured.updateConfig({ trustedRunTimeoutMs: 1000 });
    expect(configured.getConfig()).toMatchObject({
      verificationTimeoutMs: 5000,
      trustedRunTimeoutMs: 1000,
    });
  });
});

describe('normalizeConfig', () => {
  it('fills defaults', () => {
    expect(normalizeConfig().verificationTimeoutMs).toBe(10_000);
  });

  it('rejects invalid values', () => {
    expect(() => normalizeConfig({ verificationTimeoutMs: -1 })).toThrow(/Invalid sandbox config/);
  });
});
