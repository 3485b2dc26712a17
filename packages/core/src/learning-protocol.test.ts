// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ProjectFacts } from '@cmdtrust/shared';
import type { CommandRunner, ExecutionOptions, ExecutionResult } from '@cmdtrust/sandbox';
import { TrustLedger } from '@cmdtrust/storage';
import { LearningProtocol } from './learning-protocol.js';
import { HeuristicCommandProvider, StaticCommandProvider } from './providers/index.js';
import type { ProjectDetector } from './types.js';

type Responder = (command: string, options?: ExecutionOptions) => Partial<ExecutionResult> | Error;

class ScriptedRunner implements CommandRunner {
  readonly calls: Array<{ command: string; options?: ExecutionOptions }> = [];

  constructor(private readonly respond: Responder) {}

  async execute(command: string, options?: ExecutionOptions): Promise<ExecutionResult> {
    this.calls.push({ command, options });
    const response = this.respond(command, options);
    if (response instanceof Error) {
      throw response;
    }
    return { exitCode: 0, stdout: '', stderr: '', duration: 1200, killed: false, ...response };
  }
}

class FixedDetector implements ProjectDetector {
  constructor(private readonly facts: ProjectFacts) {}

  async detect(): Promise<ProjectFacts> {
    return { ...this.facts };
  }
}

const isVerification = (options?: ExecutionOptions) => options?.env?.CI === '1';

describe('LearningProtocol', () => {
  let root: string;
  let ledger: TrustLedger;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'cmdtrust-protocol-'));
    ledger = await TrustLedger.open(root);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  function createProtocol(runner: CommandRunner, facts: ProjectFacts = {}): LearningProtocol {
    return new LearningProtocol(root, ledger, { runner, detector: new FixedDetector(facts) });
  }

  describe('askCommand', () => {
    it('asks with language suggestions minus tried commands', async () => {
      await ledger.setProjectFacts({ language: 'python' });
      const protocol = createProtocol(new ScriptedRunner(() => ({})));

      const response = await protocol.askCommand({ intent: 'test', tried: ['pytest'] });

      expect(response).toEqual({
        status: 'need_answer',
        intent: 'test',
        question: 'What command should I use for test?',
        suggestions: ['python -m pytest', 'uv run pytest', 'python -m unittest'],
        message: 'Please provide the command to use',
      });
    });

    it('passes the caller question and context through', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({})));

      const response = await protocol.askCommand({
        intent: 'deploy',
        question: 'How do we ship?',
        context: { branch: 'main' },
      });

      expect(response).toMatchObject({
        status: 'need_answer',
        question: 'How do we ship?',
        context: { branch: 'main' },
        suggestions: [],
      });
    });

    it('rejects malformed intents', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({})));

      const response = await protocol.askCommand({ intent: 'run tests' });

      expect(response.status).toBe('error');
      expect(response).toMatchObject({ code: 'VALIDATION_ERROR' });
    });
  });

  describe('teachCommand', () => {
    it('rejects a dangerous command without running it', async () => {
      const runner = new ScriptedRunner(() => ({}));
      const protocol = createProtocol(runner);

      const response = await protocol.teachCommand({ intent: 'test', command: 'rm -rf /' });

      expect(response).toEqual({
        status: 'rejected',
        intent: 'test',
        command: 'rm -rf /',
        reason: 'Command contains dangerous pattern: recursive force-delete outside the project',
        message: 'Command rejected for safety reasons',
      });
      expect(runner.calls).toHaveLength(0);
      expect(ledger.getRejectedCommands()).toMatchObject([{ command: 'rm -rf /', source: 'agent' }]);
      expect(ledger.getEntry('TEST_CMD')).toBeUndefined();
    });

    it('learns a lint command that verifies', async () => {
      const runner = new ScriptedRunner(() => ({ stdout: 'clean', duration: 1200 }));
      const protocol = createProtocol(runner);

      const response = await protocol.teachCommand({ intent: 'lint', command: 'eslint .' });

      expect(response).toEqual({
        status: 'learned',
        intent: 'lint',
        command: 'eslint .',
        verified: true,
        saved: true,
        durationMs: 1200,
        message: "Thanks! I'll use 'eslint .' for lint",
      });
      expect(await ledger.getCommand('LINT_CMD')).toBe('eslint .');
      expect(ledger.getEntry('LINT_CMD')).toMatchObject({
        learnedFrom: 'agent',
        confidence: 0.7,
        verification: { method: 'agent_provided', durationMs: 1200 },
      });

      const asked = await protocol.askCommand({ intent: 'lint' });
      expect(asked).toMatchObject({ status: 'already_known', command: 'eslint .' });
    });

    it('learns a formatter that changed nothing', async () => {
      const runner = new ScriptedRunner(() => ({ stdout: 'All done! 3 files would be left unchanged', duration: 700 }));
      const protocol = createProtocol(runner);

      const response = await protocol.teachCommand({ intent: 'format', command: 'black .' });

      expect(runner.calls[0]?.command).toBe('black . --check');
      expect(response.status).toBe('learned');
    });

    it('verifies without saving when asked to', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'clean' })));

      const response = await protocol.teachCommand({ intent: 'lint', command: 'eslint .', save: false });

      expect(response).toMatchObject({ status: 'learned', saved: false });
      expect(ledger.getEntry('LINT_CMD')).toBeUndefined();
    });

    it('reports invalid commands with diagnostics', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'nothing here', duration: 900 })));

      const response = await protocol.teachCommand({ intent: 'test', command: 'npm test', source: 'reviewer' });

      expect(response).toEqual({
        status: 'invalid',
        intent: 'test',
        command: 'npm test',
        reason: "Output doesn't match expected patterns",
        outputSample: 'nothing here',
        durationMs: 900,
        filesModified: 0,
        message: "Command doesn't appear to work correctly",
      });
      expect(ledger.getRejectedCommands()).toMatchObject([
        { command: 'npm test', source: 'reviewer', reason: "Output doesn't match expected patterns" },
      ]);
    });

    it('reports commands that fail intent validation', async () => {
      const runner = new ScriptedRunner(() => ({}));
      const protocol = createProtocol(runner);

      const response = await protocol.teachCommand({ intent: 'lint', command: 'echo hi' });

      expect(response).toMatchObject({ status: 'invalid', filesModified: 0 });
      expect(runner.calls).toHaveLength(0);
    });

    it('rejects blank commands', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({})));

      const response = await protocol.teachCommand({ intent: 'lint', command: '   ' });

      expect(response).toMatchObject({ status: 'error', code: 'VALIDATION_ERROR' });
    });
  });

  describe('runCommand', () => {
    async function teachLint(protocol: LearningProtocol): Promise<void> {
      const taught = await protocol.teachCommand({ intent: 'lint', command: 'eslint .' });
      expect(taught.status).toBe('learned');
    }

    it('asks to be taught an unknown intent', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({})));

      expect(await protocol.runCommand({ intent: 'build' })).toEqual({
        status: 'unknown_command',
        intent: 'build',
        message: "I don't know how to build yet. Please teach me first.",
      });
    });

    it('runs the trusted command and records the success', async () => {
      const runner = new ScriptedRunner((_command, options) =>
        isVerification(options) ? { stdout: 'clean' } : { stdout: 'no problems', duration: 900 },
      );
      const protocol = createProtocol(runner);
      await teachLint(protocol);

      const response = await protocol.runCommand({ intent: 'lint' });

      expect(response).toEqual({
        status: 'success',
        intent: 'lint',
        command: 'eslint .',
        exitCode: 0,
        stdout: 'no problems',
        stderr: '',
        durationMs: 900,
      });
      expect(runner.calls[1]?.options).toEqual({ cwd: root, timeout: 300_000 });
      expect(ledger.getEntry('LINT_CMD')).toMatchObject({
        successCount: 1,
        confidence: 0.5,
        typicalDurationMs: 900,
      });
    });

    it('falls below the trust gate after the first run of a new command', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'clean' })));
      await teachLint(protocol);

      await protocol.runCommand({ intent: 'lint' });

      expect(await protocol.runCommand({ intent: 'lint' })).toMatchObject({ status: 'unknown_command' });
      expect(await protocol.askCommand({ intent: 'lint' })).toMatchObject({ status: 'need_answer' });
    });

    it('returns the tail of long output on failure', async () => {
      const longOutput = `${'a'.repeat(500)}${'b'.repeat(1000)}`;
      const runner = new ScriptedRunner((_command, options) =>
        isVerification(options) ? { stdout: 'clean' } : { exitCode: 2, stdout: longOutput, stderr: 'lint errors' },
      );
      const protocol = createProtocol(runner);
      await teachLint(protocol);

      const response = await protocol.runCommand({ intent: 'lint' });

      expect(response).toMatchObject({
        status: 'failure',
        exitCode: 2,
        stdout: 'b'.repeat(1000),
        stderr: 'lint errors',
      });
      expect(ledger.getEntry('LINT_CMD')).toMatchObject({ failureCount: 1, confidence: 0 });
    });

    it('counts a timeout as a failure', async () => {
      const runner = new ScriptedRunner((_command, options) =>
        isVerification(options) ? { stdout: 'clean' } : { killed: true, exitCode: 124, duration: 300_000 },
      );
      const protocol = createProtocol(runner);
      await teachLint(protocol);

      expect(await protocol.runCommand({ intent: 'lint' })).toEqual({
        status: 'timeout',
        intent: 'lint',
        command: 'eslint .',
        message: 'Command timed out after 300s',
      });
      expect(ledger.getEntry('LINT_CMD')?.failureCount).toBe(1);
    });

    it('counts an execution error as a failure', async () => {
      const runner = new ScriptedRunner((_command, options) =>
        isVerification(options) ? { stdout: 'clean' } : new Error('spawn /bin/sh ENOENT'),
      );
      const protocol = createProtocol(runner);
      await teachLint(protocol);

      expect(await protocol.runCommand({ intent: 'lint' })).toEqual({
        status: 'error',
        error: 'spawn /bin/sh ENOENT',
        code: 'UNKNOWN_ERROR',
        intent: 'lint',
        command: 'eslint .',
      });
      expect(ledger.getEntry('LINT_CMD')?.failureCount).toBe(1);
    });

    it('refuses a stored command that is now dangerous', async () => {
      const runner = new ScriptedRunner(() => ({}));
      const protocol = createProtocol(runner);
      await ledger.learnCommand('TEST_CMD', 'rm -rf ~', 'manual');
      await ledger.markVerified('TEST_CMD', 'manual');

      const response = await protocol.runCommand({ intent: 'test' });

      expect(response).toMatchObject({ status: 'rejected', command: 'rm -rf ~' });
      expect(runner.calls).toHaveLength(0);
      expect(ledger.getRejectedCommands()).toMatchObject([{ command: 'rm -rf ~', source: 'ledger' }]);
    });
  });

  describe('learnProject', () => {
    it('lists untaught intents with the detected facts', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'clean' })), {
        language: 'javascript',
        packageManager: 'npm',
      });
      await protocol.teachCommand({ intent: 'lint', command: 'eslint .' });

      const response = await protocol.learnProject();

      expect(response).toEqual({
        status: 'need_teaching',
        detected: { language: 'javascript', packageManager: 'npm' },
        knownCommands: { LINT_CMD: 'eslint .' },
        questions: {
          test: 'What command should I use for test?',
          format: 'What command should I use for format?',
          coverage: 'What command should I use for coverage?',
          build: 'What command should I use for build?',
        },
        message: 'Please teach me these commands for your project',
      });
      expect(ledger.getProjectFacts()).toEqual({ language: 'javascript', packageManager: 'npm' });
    });

    it('reports a fully configured project', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({})));
      for (const type of ['TEST_CMD', 'LINT_CMD', 'FORMAT_CMD', 'COVERAGE_CMD', 'BUILD_CMD']) {
        await ledger.learnCommand(type, `make ${type.toLowerCase()}`, 'manual');
        await ledger.markVerified(type, 'manual');
      }

      const response = await protocol.learnProject();

      expect(response.status).toBe('already_configured');
    });
  });

  describe('getMemoryStatus and clearCommand', () => {
    it('reports everything the ledger holds', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'clean' })));
      await protocol.teachCommand({ intent: 'lint', command: 'eslint .' });
      await protocol.teachCommand({ intent: 'test', command: 'rm -rf /' });

      const status = await protocol.getMemoryStatus();

      expect(status).toMatchObject({
        status: 'memory_status',
        projectId: ledger.getProjectId(),
        knownCommands: { LINT_CMD: 'eslint .' },
        ledgerPath: join(root, '.cmdtrust', 'ledger.json'),
      });
      if (status.status !== 'memory_status') throw new Error('unexpected status');
      expect(Object.keys(status.commands)).toEqual(['LINT_CMD']);
      expect(status.rejectedCommands.map((entry) => entry.command)).toEqual(['rm -rf /']);
    });

    it('forgets a command', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'clean' })));
      await protocol.teachCommand({ intent: 'lint', command: 'eslint .' });

      expect(await protocol.clearCommand({ intent: 'lint' })).toMatchObject({
        status: 'cleared',
        commandType: 'LINT_CMD',
      });
      expect(await protocol.clearCommand({ intent: 'lint' })).toMatchObject({ status: 'unknown_command' });
      expect(await protocol.askCommand({ intent: 'lint' })).toMatchObject({ status: 'need_answer' });
    });
  });

  describe('bootstrap', () => {
    it('teaches proposals and stops at refusals the provider cannot replace', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'clean' })));
      const provider = new StaticCommandProvider({ lint: 'eslint .', test: 'rm -rf /' });

      const response = await protocol.bootstrap(provider, { intents: ['lint', 'test', 'format'] });

      expect(response).toEqual({
        status: 'bootstrap_complete',
        provider: 'static',
        outcomes: [
          { intent: 'lint', status: 'learned', command: 'eslint .', attempts: 1, reasons: [] },
          {
            intent: 'test',
            status: 'no_proposal',
            attempts: 1,
            reasons: ['rm -rf /: Command contains dangerous pattern: recursive force-delete outside the project'],
          },
          { intent: 'format', status: 'no_proposal', attempts: 0, reasons: [] },
        ],
      });
    });

    it('retries heuristic suggestions until one verifies', async () => {
      await ledger.setProjectFacts({ language: 'python' });
      const runner = new ScriptedRunner((command) =>
        command === 'pytest --collect-only' ? { stdout: 'nothing here' } : { stdout: '3 tests collected' },
      );
      const protocol = createProtocol(runner);

      const response = await protocol.bootstrap(new HeuristicCommandProvider(), { intents: ['test'] });

      expect(response).toEqual({
        status: 'bootstrap_complete',
        provider: 'heuristic',
        outcomes: [
          {
            intent: 'test',
            status: 'learned',
            command: 'python -m pytest',
            attempts: 2,
            reasons: ["pytest: Output doesn't match expected patterns"],
          },
        ],
      });
      expect(ledger.getEntry('TEST_CMD')?.learnedFrom).toBe('heuristic');
    });

    it('gives up after the attempt limit', async () => {
      await ledger.setProjectFacts({ language: 'python' });
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'nothing here' })));

      const response = await protocol.bootstrap(new HeuristicCommandProvider(), {
        intents: ['test'],
        maxAttempts: 2,
      });

      expect(response).toMatchObject({
        outcomes: [{ intent: 'test', status: 'exhausted', attempts: 2 }],
      });
    });

    it('skips intents that are already known', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({ stdout: 'clean' })));
      await protocol.teachCommand({ intent: 'lint', command: 'eslint .' });

      const response = await protocol.bootstrap(new HeuristicCommandProvider(), { intents: ['lint'] });

      expect(response).toMatchObject({
        outcomes: [{ intent: 'lint', status: 'already_known', command: 'eslint .', attempts: 0 }],
      });
    });

    it('rejects an invalid attempt limit', async () => {
      const protocol = createProtocol(new ScriptedRunner(() => ({})));

      const response = await protocol.bootstrap(new HeuristicCommandProvider(), { maxAttempts: 0 });

      expect(response).toMatchObject({ status: 'error', code: 'VALIDATION_ERROR' });
    });
  });
});
