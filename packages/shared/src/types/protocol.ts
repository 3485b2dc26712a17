import { z } from 'zod';
import { IntentSchema } from './intent.js';
import type { CommandEntry, ProjectFacts, RejectedCommand } from './ledger.js';

// ============================================================================
// Requests
// ============================================================================

export const AskCommandRequestSchema = z.object({
  intent: IntentSchema,
  context: z.record(z.unknown()).optional(),
  tried: z.array(z.string()).default([]),
  question: z.string().optional(),
});
export type AskCommandRequest = z.input<typeof AskCommandRequestSchema>;

export const TeachCommandRequestSchema = z.object({
  intent: IntentSchema,
  command: z.string().trim().min(1, 'Command must not be empty'),
  save: z.boolean().default(true),
  source: z.string().trim().min(1).default('agent'),
});
export type TeachCommandRequest = z.input<typeof TeachCommandRequestSchema>;

export const RunCommandRequestSchema = z.object({
  intent: IntentSchema,
});
export type RunCommandRequest = z.input<typeof RunCommandRequestSchema>;

export const ClearCommandRequestSchema = z.object({
  intent: IntentSchema,
});
export type ClearCommandRequest = z.input<typeof ClearCommandRequestSchema>;

export const BootstrapRequestSchema = z.object({
  intents: z.array(IntentSchema).optional(),
  maxAttempts: z.number().int().positive().max(10).default(3),
});
export type BootstrapRequest = z.input<typeof BootstrapRequestSchema>;

// ============================================================================
// Responses
// ============================================================================

export interface ErrorResponse {
  status: 'error';
  error: string;
  code: string;
  intent?: string;
  command?: string;
}

export interface AlreadyKnownResponse {
  status: 'already_known';
  intent: string;
  command: string;
  message: string;
}

export interface NeedAnswerResponse {
  status: 'need_answer';
  intent: string;
  question?: string;
  context?: Record<string, unknown>;
  suggestions: string[];
  message: string;
}

export type AskCommandResponse = AlreadyKnownResponse | NeedAnswerResponse | ErrorResponse;

export interface RejectedResponse {
  status: 'rejected';
  intent: string;
  command: string;
  reason: string;
  message: string;
}

export interface InvalidResponse {
  status: 'invalid';
  intent: string;
  command: string;
  reason: string;
  outputSample?: string;
  durationMs?: number;
  filesModified: number;
  message: string;
}

export interface LearnedResponse {
  status: 'learned';
  intent: string;
  command: string;
  verified: true;
  saved: boolean;
  durationMs?: number;
  message: string;
}

export type TeachCommandResponse =
  | RejectedResponse
  | InvalidResponse
  | LearnedResponse
  | ErrorResponse;

export interface UnknownCommandResponse {
  status: 'unknown_command';
  intent: string;
  message: string;
}

export interface CompletedRunResponse {
  status: 'success' | 'failure';
  intent: string;
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface TimeoutResponse {
  status: 'timeout';
  intent: string;
  command: string;
  message: string;
}

export type RunCommandResponse =
  | UnknownCommandResponse
  | RejectedResponse
  | CompletedRunResponse
  | TimeoutResponse
  | ErrorResponse;

export interface AlreadyConfiguredResponse {
  status: 'already_configured';
  knownCommands: Record<string, string>;
  message: string;
}

export interface NeedTeachingResponse {
  status: 'need_teaching';
  detected: ProjectFacts;
  knownCommands: Record<string, string>;
  questions: Record<string, string>;
  message: string;
}

export type LearnProjectResponse = AlreadyConfiguredResponse | NeedTeachingResponse | ErrorResponse;

export interface MemoryStatusResponse {
  status: 'memory_status';
  projectId: string;
  projectInfo: ProjectFacts;
  knownCommands: Record<string, string>;
  commands: Record<string, CommandEntry>;
  rejectedCommands: RejectedCommand[];
  ledgerPath: string;
  message: string;
}

export interface ClearedResponse {
  status: 'cleared';
  intent: string;
  commandType: string;
  message: string;
}

export type ClearCommandResponse = ClearedResponse | UnknownCommandResponse | ErrorResponse;

export type BootstrapOutcomeStatus =
  | 'already_known'
  | 'learned'
  | 'no_proposal'
  | 'exhausted'
  | 'error';

export interface BootstrapOutcome {
  intent: string;
  status: BootstrapOutcomeStatus;
  command?: string;
  attempts: number;
  reasons: string[];
}

export interface BootstrapResponse {
  status: 'bootstrap_complete';
  provider: string;
  outcomes: BootstrapOutcome[];
}

export type MemoryStatusResult = MemoryStatusResponse | ErrorResponse;

export type BootstrapResult = BootstrapResponse | ErrorResponse;
