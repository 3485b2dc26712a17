// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { platform } from 'os';
import { ExecutionError, ValidationError } from '@cmdtrust/shared';
import type {
  CommandRunner,
  ExecutionOptions,
  ExecutionResult,
  SandboxConfig,
} from './types.js';
import { DEFAULT_SANDBOX_CONFIG, SandboxConfigSchema } from './types.js';

const KILL_GRACE_MS = 1000;
const TIMEOUT_EXIT_CODE = 124;
const TRUNCATION_MARKER = '\n[Output truncated]';

export function normalizeConfig(config: Partial<SandboxConfig> = {}): SandboxConfig {
  const parsed = SandboxConfigSchema.safeParse({ ...DEFAULT_SANDBOX_CONFIG, ...config });
  if (!parsed.success) {
    throw ValidationError.invalid(
      'sandbox config',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }
  return parsed.data;
}

// ============================================================================
// Command Executor
// ============================================================================

export class CommandExecutor implements CommandRunner {
  private config: SandboxConfig;

  constructor(config: Partial<SandboxConfig> = {}) {
    this.config = normalizeConfig(config);
  }

  /**
   * Execute a shell command, capturing stdout and stderr. A command that
   * outlives its timeout is terminated together with its process group and
   * reported with `killed: true`.
   */
  async execute(command: string, options: ExecutionOptions = {}): Promise<ExecutionResult> {
    const {
      cwd = process.cwd(),
      env = {},
      timeout = this.config.trustedRunTimeoutMs,
      shell = true,
    } = options;

    const spawnOptions: SpawnOptions = {
      cwd,
      env: { ...process.env, ...env },
      shell: shell === true ? this.getDefaultShell() : shell,
      // Own process group so a timeout takes down grandchildren too.
      detached: platform() !== 'win32',
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    return this.executeNormal(command, spawnOptions, timeout);
  }

  private async executeNormal(
    command: string,
    options: SpawnOptions,
    timeout: number,
  ): Promise<ExecutionResult> {
    return new Promise((resolvePromise, reject) => {
      const startTime = Date.now();
      const maxOutput = this.config.maxOutputBytes;
      let stdout = '';
      let stderr = '';
      let stdoutTruncated = false;
      let stderrTruncated = false;
      let killed = false;
      let graceTimer: NodeJS.Timeout | undefined;

      const child = spawn(command, [], options);

      const timeoutId = setTimeout(() => {
        killed = true;
        this.killTree(child, 'SIGTERM');
        // Cleared on close; until then something in the group still holds the pipes.
        graceTimer = setTimeout(() => this.killTree(child, 'SIGKILL'), KILL_GRACE_MS);
      }, timeout);

      child.stdout?.on('data', (data: Buffer) => {
        if (stdoutTruncated) return;
        stdout += data.toString();
        if (stdout.length > maxOutput) {
          stdout = stdout.slice(0, maxOutput) + TRUNCATION_MARKER;
          stdoutTruncated = true;
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        if (stderrTruncated) return;
        stderr += data.toString();
        if (stderr.length > maxOutput) {
          stderr = stderr.slice(0, maxOutput) + TRUNCATION_MARKER;
          stderrTruncated = true;
        }
      });

      child.on('close', (code, signal) => {
        clearTimeout(timeoutId);
        if (graceTimer) clearTimeout(graceTimer);

        resolvePromise({
          exitCode: code ?? (killed ? TIMEOUT_EXIT_CODE : 1),
          stdout,
          stderr,
          duration: Date.now() - startTime,
          killed,
          signal: signal ?? undefined,
        });
      });

      child.on('error', (error) => {
        clearTimeout(timeoutId);
        if (graceTimer) clearTimeout(graceTimer);

        reject(ExecutionError.executionFailed(command, error.message));
      });
    });
  }

  /**
   * Signal the child's whole process group, falling back to the child alone.
   */
  private killTree(child: ChildProcess, signal: NodeJS.Signals): void {
    if (child.pid !== undefined && platform() !== 'win32') {
      try {
        process.kill(-child.pid, signal);
        return;
      } catch (error) {
        console.error(`[CommandExecutor] Could not signal process group ${child.pid}:`, error);
      }
    }
    child.kill(signal);
  }

  /**
   * Get the default shell for the current platform.
   */
  private getDefaultShell(): string {
    if (platform() === 'win32') {
      return process.env.COMSPEC || 'cmd.exe';
    }
    return '/bin/sh';
  }

  /**
   * Update the sandbox configuration.
   */
  updateConfig(config: Partial<SandboxConfig>): void {
    this.config = normalizeConfig({ ...this.config, ...config });
  }

  /**
   * Get the current configuration.
   */
  getConfig(): SandboxConfig {
    return { ...this.config };
  }
}
