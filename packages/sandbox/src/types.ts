import { z } from 'zod';

// ============================================================================
// Execution Types
// ============================================================================

export interface ExecutionOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number;
  shell?: string | boolean;
}

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  /** Set when the command was terminated for exceeding its timeout. */
  killed: boolean;
  signal?: string;
}

/**
 * Anything that can run a shell command string. `CommandExecutor` is the
 * production implementation.
 */
export interface CommandRunner {
  execute(command: string, options?: ExecutionOptions): Promise<ExecutionResult>;
}

// ============================================================================
// Sandbox Configuration
// ============================================================================

export const SandboxConfigSchema = z.object({
  /** Hard wall-clock limit for verification runs. */
  verificationTimeoutMs: z.number().int().positive().default(10_000),
  /** Limit for running an already-trusted command. */
  trustedRunTimeoutMs: z.number().int().positive().default(300_000),
  maxOutputBytes: z.number().int().positive().default(1024 * 1024),
  /** Leading characters of output kept as a verification sample. */
  outputSampleLength: z.number().int().positive().default(500),
  /** Trailing characters of stdout/stderr returned from a trusted run. */
  outputTailLength: z.number().int().positive().default(1000),
});

export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;

export const DEFAULT_SANDBOX_CONFIG: SandboxConfig = SandboxConfigSchema.parse({});

// ============================================================================
// Intent Rules
// ============================================================================

export interface IntentRules {
  /** At least one must appear in the command (empty: no requirement). */
  mustContain: readonly string[];
  /** None may appear in the command. */
  mustNotContain: readonly string[];
  /** Inclusive `[min, max]` window in milliseconds. */
  expectedDurationMs: readonly [number, number];
  modifiesFiles: boolean;
  /** At least one must match the combined output (empty: no requirement). */
  expectedOutputPatterns: readonly RegExp[];
}

// ============================================================================
// Safety Patterns
// ============================================================================

export interface SafetyPattern {
  readonly pattern: RegExp;
  readonly reason: string;
}

export interface SafetyVerdict {
  dangerous: boolean;
  pattern?: string;
  reason?: string;
}

// ============================================================================
// Dry-Run Rewrites
// ============================================================================

export interface DryRunRule {
  /** Matched against the whole command. */
  readonly tool: RegExp;
  /** Appended when absent. */
  readonly flag?: string;
  /** Flag swapped for an inert equivalent instead of appending. */
  readonly replace?: { readonly from: string; readonly to: string };
  /** Flag belongs after the tool's ` -- ` argument separator. */
  readonly passthrough?: boolean;
}
