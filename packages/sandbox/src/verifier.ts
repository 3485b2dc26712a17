// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { resolve } from 'path';
import { getErrorMessage, head } from '@cmdtrust/shared';
import type { VerificationResult } from '@cmdtrust/shared';
import { addDryRunFlags } from './dry-run.js';
import { CommandExecutor, normalizeConfig } from './executor.js';
import { classifyCommand } from './safety.js';
import { countSnapshotChanges, takeFileSnapshot } from './snapshot.js';
import type { CommandRunner, IntentRules, SandboxConfig } from './types.js';
import { IntentValidator } from './validator.js';

export const VERIFICATION_REASONS = {
  timedOut: 'Command timed out during verification',
  outputMismatch: "Output doesn't match expected patterns",
  tooFast: 'Command completed too quickly, might not be doing real work',
  tooSlow: 'Command took too long, might be stuck',
} as const;

/** Keeps test runners and bundlers out of interactive/watch modes. */
const VERIFICATION_ENV: Record<string, string> = { CI: '1' };

export interface VerificationOptions {
  runner?: CommandRunner;
  config?: Partial<SandboxConfig>;
}

export interface CommandVerifierOptions extends VerificationOptions {
  validator?: IntentValidator;
}

export function dangerousReason(reason: string | undefined): string {
  return `Command contains dangerous pattern: ${reason ?? 'unspecified'}`;
}

/**
 * Run a command in its inert form under the verification timeout and judge
 * whether it behaved like the intent says it should.
 */
export async function executeForVerification(
  command: string,
  rules: IntentRules,
  projectRoot: string,
  options: VerificationOptions = {},
): Promise<VerificationResult> {
  const config = normalizeConfig(options.config);
  const runner = options.runner ?? new CommandExecutor(config);
  const root = resolve(projectRoot);
  const executedCommand = addDryRunFlags(command);

  try {
    const before = await takeFileSnapshot(root);

    const result = await runner.execute(executedCommand, {
      cwd: root,
      timeout: config.verificationTimeoutMs,
      env: VERIFICATION_ENV,
    });

    if (result.killed) {
      return {
        safe: true,
        valid: false,
        reason: VERIFICATION_REASONS.timedOut,
        durationMs: result.duration,
        filesModified: 0,
        executedCommand,
      };
    }

    const after = await takeFileSnapshot(root);
    const filesModified = countSnapshotChanges(before, after);
    const output = result.stdout + result.stderr;
    const observed = {
      safe: true,
      outputSample: head(output, config.outputSampleLength),
      durationMs: result.duration,
      filesModified,
      executedCommand,
      exitCode: result.exitCode,
    };

    if (
      rules.expectedOutputPatterns.length > 0 &&
      !rules.expectedOutputPatterns.some((pattern) => pattern.test(output))
    ) {
      return { ...observed, valid: false, reason: VERIFICATION_REASONS.outputMismatch };
    }

    // One-directional: a mutating intent that leaves files alone still passes.
    if (!rules.modifiesFiles && filesModified > 0) {
      return {
        ...observed,
        valid: false,
        reason: `Command modified ${filesModified} files when it shouldn't`,
      };
    }

    const [minDuration, maxDuration] = rules.expectedDurationMs;
    if (result.duration < minDuration) {
      return { ...observed, valid: false, reason: VERIFICATION_REASONS.tooFast };
    }
    if (result.duration > maxDuration) {
      return { ...observed, valid: false, reason: VERIFICATION_REASONS.tooSlow };
    }

    return { ...observed, valid: true };
  } catch (error) {
    return {
      safe: true,
      valid: false,
      reason: `Error during verification: ${getErrorMessage(error)}`,
      filesModified: 0,
      executedCommand,
    };
  }
}

// ============================================================================
// Command Verifier
// ============================================================================

export class CommandVerifier {
  private readonly projectRoot: string;
  private readonly validator: IntentValidator;
  private readonly runner: CommandRunner;
  private readonly config: SandboxConfig;

  constructor(projectRoot: string, options: CommandVerifierOptions = {}) {
    this.projectRoot = resolve(projectRoot);
    this.config = normalizeConfig(options.config);
    this.validator = options.validator ?? new IntentValidator();
    this.runner = options.runner ?? new CommandExecutor(this.config);
  }

  /**
   * Safety classifier, then intent validation, then the sandboxed run. Each
   * stage only runs when the previous one passed.
   */
  async verifyCommand(intent: string, command: string): Promise<VerificationResult> {
    const verdict = classifyCommand(command);
    if (verdict.dangerous) {
      return {
        safe: false,
        valid: false,
        reason: dangerousReason(verdict.reason),
        filesModified: 0,
      };
    }

    const validation = this.validator.validate(command, intent);
    if (!validation.valid) {
      return { safe: true, valid: false, reason: validation.reason, filesModified: 0 };
    }

    return this.executeForVerification(command, this.validator.rulesFor(intent));
  }

  executeForVerification(command: string, rules: IntentRules): Promise<VerificationResult> {
    return executeForVerification(command, rules, this.projectRoot, {
      runner: this.runner,
      config: this.config,
    });
  }

  /**
   * Verify several intents one after another; concurrent runs would see each
   * other's file changes.
   */
  async verifyBatch(commands: Record<string, string>): Promise<Record<string, VerificationResult>> {
    const results: Record<string, VerificationResult> = {};
    for (const [intent, command] of Object.entries(commands)) {
      console.error(`[CommandVerifier] Verifying ${intent}: ${command}`);
      results[intent] = await this.verifyCommand(intent, command);
    }
    return results;
  }
}
