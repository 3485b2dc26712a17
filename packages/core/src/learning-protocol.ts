// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { resolve } from 'path';
import type { z } from 'zod';
import {
  AskCommandRequestSchema,
  BootstrapRequestSchema,
  ClearCommandRequestSchema,
  KNOWN_INTENTS,
  RunCommandRequestSchema,
  TeachCommandRequestSchema,
  ValidationError,
  compact,
  getErrorMessage,
  tail,
  toCommandType,
  wrapError,
} from '@cmdtrust/shared';
import type {
  AskCommandRequest,
  AskCommandResponse,
  BootstrapOutcome,
  BootstrapRequest,
  BootstrapResult,
  ClearCommandRequest,
  ClearCommandResponse,
  ErrorResponse,
  LearnProjectResponse,
  MemoryStatusResult,
  RunCommandRequest,
  RunCommandResponse,
  TeachCommandRequest,
  TeachCommandResponse,
} from '@cmdtrust/shared';
import {
  CommandExecutor,
  CommandVerifier,
  classifyCommand,
  dangerousReason,
  normalizeConfig,
} from '@cmdtrust/sandbox';
import type { CommandRunner, SandboxConfig } from '@cmdtrust/sandbox';
import { TrustLedger } from '@cmdtrust/storage';
import type { LedgerOptions } from '@cmdtrust/storage';
import { MarkerFileDetector } from './detect.js';
import { getCommandSuggestions } from './suggestions.js';
import type { CommandProvider, ProjectDetector } from './types.js';

/** Verification method recorded for commands accepted through `teachCommand`. */
export const AGENT_PROVIDED = 'agent_provided';

export interface LearningProtocolOptions {
  /** Runs both verification and trusted commands. */
  runner?: CommandRunner;
  detector?: ProjectDetector;
  config?: Partial<SandboxConfig>;
}

export interface CreateLearningProtocolOptions extends LearningProtocolOptions {
  ledger?: LedgerOptions;
}

function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.invalid(
      'request',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`).join('; '),
    );
  }
  return parsed.data;
}

function toErrorResponse(error: unknown, extra: { intent?: string; command?: string } = {}): ErrorResponse {
  const wrapped = wrapError(error);
  return { status: 'error', error: wrapped.message, code: wrapped.code, ...compact(extra) };
}

function questionFor(intent: string): string {
  return `What command should I use for ${intent}?`;
}

// ============================================================================
// Learning Protocol
// ============================================================================

/**
 * Request/response surface an agent drives to teach and use project
 * commands. State lives only in the trust ledger. Every method resolves to a
 * tagged response; none rejects.
 */
export class LearningProtocol {
  private readonly projectRoot: string;
  private readonly ledger: TrustLedger;
  private readonly verifier: CommandVerifier;
  private readonly runner: CommandRunner;
  private readonly detector: ProjectDetector;
  private readonly config: SandboxConfig;

  constructor(projectRoot: string, ledger: TrustLedger, options: LearningProtocolOptions = {}) {
    this.projectRoot = resolve(projectRoot);
    this.ledger = ledger;
    this.config = normalizeConfig(options.config);
    this.runner = options.runner ?? new CommandExecutor(this.config);
    this.detector = options.detector ?? new MarkerFileDetector();
    this.verifier = new CommandVerifier(this.projectRoot, { runner: this.runner, config: this.config });
  }

  static async create(
    projectRoot: string,
    options: CreateLearningProtocolOptions = {},
  ): Promise<LearningProtocol> {
    const ledger = await TrustLedger.open(projectRoot, options.ledger);
    return new LearningProtocol(projectRoot, ledger, options);
  }

  getLedger(): TrustLedger {
    return this.ledger;
  }

  /**
   * The trusted command for an intent, or a question with suggestions when
   * there is none.
   */
  async askCommand(input: AskCommandRequest): Promise<AskCommandResponse> {
    try {
      const request = parseRequest(AskCommandRequestSchema, input);
      const existing = await this.ledger.getCommand(toCommandType(request.intent));

      if (existing) {
        return {
          status: 'already_known',
          intent: request.intent,
          command: existing,
          message: `I already know to use: ${existing}`,
        };
      }

      return {
        status: 'need_answer',
        intent: request.intent,
        question: request.question ?? questionFor(request.intent),
        context: request.context,
        suggestions: getCommandSuggestions(
          request.intent,
          this.ledger.getProjectFacts().language,
          request.tried,
        ),
        message: 'Please provide the command to use',
      };
    } catch (error) {
      return toErrorResponse(error);
    }
  }

  /**
   * Verify a proposed command and, when it passes, store it as trusted.
   * Refused commands are recorded in the ledger's rejection buffer.
   */
  async teachCommand(input: TeachCommandRequest): Promise<TeachCommandResponse> {
    let request: z.output<typeof TeachCommandRequestSchema>;
    try {
      request = parseRequest(TeachCommandRequestSchema, input);
    } catch (error) {
      return toErrorResponse(error);
    }

    const { intent, command, source } = request;
    try {
      const verification = await this.verifier.verifyCommand(intent, command);
      const reason = verification.reason ?? 'unspecified';

      if (!verification.safe) {
        await this.ledger.reject(command, source, reason);
        return {
          status: 'rejected',
          intent,
          command,
          reason,
          message: 'Command rejected for safety reasons',
        };
      }

      if (!verification.valid) {
        await this.ledger.reject(command, source, reason);
        return {
          status: 'invalid',
          intent,
          command,
          reason,
          outputSample: verification.outputSample,
          durationMs: verification.durationMs,
          filesModified: verification.filesModified,
          message: "Command doesn't appear to work correctly",
        };
      }

      if (request.save) {
        const commandType = toCommandType(intent);
        await this.ledger.learnCommand(commandType, command, source);
        await this.ledger.markVerified(commandType, AGENT_PROVIDED, {
          durationMs: verification.durationMs,
        });
      }

      return {
        status: 'learned',
        intent,
        command,
        verified: true,
        saved: request.save,
        durationMs: verification.durationMs,
        message: `Thanks! I'll use '${command}' for ${intent}`,
      };
    } catch (error) {
      return toErrorResponse(error, { intent, command });
    }
  }

  /**
   * Run the trusted command for an intent with the long timeout and fold the
   * outcome into its confidence.
   */
  async runCommand(input: RunCommandRequest): Promise<RunCommandResponse> {
    let intent: string;
    try {
      intent = parseRequest(RunCommandRequestSchema, input).intent;
    } catch (error) {
      return toErrorResponse(error);
    }

    const commandType = toCommandType(intent);
    let command: string | undefined;
    try {
      command = await this.ledger.getCommand(commandType);
    } catch (error) {
      return toErrorResponse(error, { intent });
    }

    if (!command) {
      return {
        status: 'unknown_command',
        intent,
        message: `I don't know how to ${intent} yet. Please teach me first.`,
      };
    }

    // Re-check against the current pattern list before running.
    const verdict = classifyCommand(command);
    if (verdict.dangerous) {
      return this.refuseStoredCommand(intent, command, dangerousReason(verdict.reason));
    }

    try {
      const result = await this.runner.execute(command, {
        cwd: this.projectRoot,
        timeout: this.config.trustedRunTimeoutMs,
      });

      if (result.killed) {
        await this.ledger.updateResult(commandType, false, result.duration);
        return {
          status: 'timeout',
          intent,
          command,
          message: `Command timed out after ${this.config.trustedRunTimeoutMs / 1000}s`,
        };
      }

      const success = result.exitCode === 0;
      await this.ledger.updateResult(commandType, success, result.duration);

      return {
        status: success ? 'success' : 'failure',
        intent,
        command,
        exitCode: result.exitCode,
        stdout: tail(result.stdout, this.config.outputTailLength),
        stderr: tail(result.stderr, this.config.outputTailLength),
        durationMs: result.duration,
      };
    } catch (error) {
      return this.recordRunFailure(commandType, error, intent, command);
    }
  }

  private async refuseStoredCommand(
    intent: string,
    command: string,
    reason: string,
  ): Promise<RunCommandResponse> {
    try {
      await this.ledger.reject(command, 'ledger', reason);
    } catch (error) {
      return toErrorResponse(error, { intent, command });
    }
    return {
      status: 'rejected',
      intent,
      command,
      reason,
      message: 'Stored command rejected for safety reasons',
    };
  }

  private async recordRunFailure(
    commandType: string,
    error: unknown,
    intent: string,
    command: string,
  ): Promise<ErrorResponse> {
    try {
      await this.ledger.updateResult(commandType, false);
    } catch (ledgerError) {
      console.error(`[LearningProtocol] Could not record failure for ${commandType}:`, ledgerError);
    }
    return toErrorResponse(error, { intent, command });
  }

  /**
   * Detect project facts and list the standard intents still untaught.
   */
  async learnProject(): Promise<LearnProjectResponse> {
    try {
      const detected = compact(await this.detector.detect(this.projectRoot));
      await this.ledger.setProjectFacts(detected);

      const knownCommands = this.ledger.getKnownCommands();
      const needed = KNOWN_INTENTS.filter((intent) => !(toCommandType(intent) in knownCommands));

      if (needed.length === 0) {
        return {
          status: 'already_configured',
          knownCommands,
          message: 'I already know all the commands for this project!',
        };
      }

      return {
        status: 'need_teaching',
        detected,
        knownCommands,
        questions: Object.fromEntries(needed.map((intent) => [intent, questionFor(intent)])),
        message: 'Please teach me these commands for your project',
      };
    } catch (error) {
      return toErrorResponse(error);
    }
  }

  async getMemoryStatus(): Promise<MemoryStatusResult> {
    try {
      return {
        status: 'memory_status',
        projectId: this.ledger.getProjectId(),
        projectInfo: this.ledger.getProjectFacts(),
        knownCommands: this.ledger.getKnownCommands(),
        commands: this.ledger.getAllEntries(),
        rejectedCommands: this.ledger.getRejectedCommands(),
        ledgerPath: this.ledger.getLedgerPath(),
        message: 'This is what I know about the project',
      };
    } catch (error) {
      return toErrorResponse(error);
    }
  }

  async clearCommand(input: ClearCommandRequest): Promise<ClearCommandResponse> {
    try {
      const { intent } = parseRequest(ClearCommandRequestSchema, input);
      const commandType = toCommandType(intent);

      if (!(await this.ledger.clear(commandType))) {
        return {
          status: 'unknown_command',
          intent,
          message: `I don't know how to ${intent} yet.`,
        };
      }

      return {
        status: 'cleared',
        intent,
        commandType,
        message: `Forgot the ${intent} command; teach me again when ready`,
      };
    } catch (error) {
      return toErrorResponse(error);
    }
  }

  /**
   * Ask a provider for every untaught intent and teach its proposals,
   * retrying with the refused commands as `tried`. Intents are handled one
   * at a time.
   */
  async bootstrap(provider: CommandProvider, input: BootstrapRequest = {}): Promise<BootstrapResult> {
    try {
      const request = parseRequest(BootstrapRequestSchema, input);
      const intents = request.intents ?? [...KNOWN_INTENTS];
      const outcomes: BootstrapOutcome[] = [];

      for (const intent of intents) {
        const outcome = await this.bootstrapIntent(provider, intent, request.maxAttempts);
        console.error(`[LearningProtocol] ${provider.name} -> ${intent}: ${outcome.status}`);
        outcomes.push(outcome);
      }

      return { status: 'bootstrap_complete', provider: provider.name, outcomes };
    } catch (error) {
      return toErrorResponse(error);
    }
  }

  private async bootstrapIntent(
    provider: CommandProvider,
    intent: string,
    maxAttempts: number,
  ): Promise<BootstrapOutcome> {
    const tried: string[] = [];
    const reasons: string[] = [];

    while (tried.length < maxAttempts) {
      const asked = await this.askCommand({ intent, tried });
      if (asked.status === 'already_known') {
        return { intent, status: 'already_known', command: asked.command, attempts: tried.length, reasons };
      }
      if (asked.status === 'error') {
        return { intent, status: 'error', attempts: tried.length, reasons: [...reasons, asked.error] };
      }

      let proposal: string | undefined;
      try {
        proposal = await provider.proposeCommand({
          intent,
          question: asked.question,
          tried,
          suggestions: asked.suggestions,
          projectInfo: this.ledger.getProjectFacts(),
        });
      } catch (error) {
        return {
          intent,
          status: 'error',
          attempts: tried.length,
          reasons: [...reasons, `Provider failed: ${getErrorMessage(error)}`],
        };
      }

      if (!proposal || tried.includes(proposal)) {
        return { intent, status: 'no_proposal', attempts: tried.length, reasons };
      }

      tried.push(proposal);
      const taught = await this.teachCommand({ intent, command: proposal, source: provider.name });

      if (taught.status === 'learned') {
        return { intent, status: 'learned', command: proposal, attempts: tried.length, reasons };
      }
      if (taught.status === 'error') {
        return { intent, status: 'error', command: proposal, attempts: tried.length, reasons: [...reasons, taught.error] };
      }
      reasons.push(`${proposal}: ${taught.reason}`);
    }

    return { intent, status: 'exhausted', attempts: tried.length, reasons };
  }
}
