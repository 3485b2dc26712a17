// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { z } from 'zod';
import {
  AskCommandRequestSchema,
  BootstrapRequestSchema,
  ClearCommandRequestSchema,
  RunCommandRequestSchema,
  TeachCommandRequestSchema,
  ValidationError,
  getErrorMessage,
} from '@cmdtrust/shared';
import {
  HeuristicCommandProvider,
  StaticCommandProvider,
  type CommandProvider,
  type LearningProtocol,
} from '@cmdtrust/core';
import { IPCRequestSchema } from './types.js';
import type { CommandHandler, IPCRequest, IPCResponse, RequestHandler } from './types.js';

const SidecarBootstrapSchema = BootstrapRequestSchema.extend({
  /** Fixed intent -> command answers; the heuristic provider is used otherwise. */
  commands: z.record(z.string().trim().min(1)).optional(),
});

/**
 * Validate params against a schema before handing them to the handler.
 */
function withParams<S extends z.ZodTypeAny>(
  schema: S,
  handler: (params: z.output<S>) => Promise<unknown>,
): CommandHandler {
  return async (params) => {
    const parsed = schema.safeParse(params);
    if (!parsed.success) {
      throw ValidationError.invalid(
        'params',
        parsed.error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`).join('; '),
      );
    }
    return handler(parsed.data);
  };
}

// ============================================================================
// Request Router
// ============================================================================

/**
 * Build the request handler for one learning protocol instance.
 */
export function createRequestHandler(protocol: LearningProtocol): RequestHandler {
  const handlers: Map<string, CommandHandler> = new Map();

  function registerHandler(command: string, handler: CommandHandler): void {
    if (handlers.has(command)) {
      console.error(`[Sidecar] Handler for ${command} registered twice; keeping the last one`);
    }
    handlers.set(command, handler);
  }

  registerHandler('ping', async () => ({ pong: true, timestamp: Date.now() }));

  registerHandler(
    'ask_command',
    withParams(AskCommandRequestSchema, (params) => protocol.askCommand(params)),
  );

  registerHandler(
    'teach_command',
    withParams(TeachCommandRequestSchema, (params) => protocol.teachCommand(params)),
  );

  registerHandler(
    'run_command',
    withParams(RunCommandRequestSchema, (params) => protocol.runCommand(params)),
  );

  registerHandler('learn_project', async () => protocol.learnProject());

  registerHandler('get_memory_status', async () => protocol.getMemoryStatus());

  registerHandler(
    'clear_command',
    withParams(ClearCommandRequestSchema, (params) => protocol.clearCommand(params)),
  );

  registerHandler(
    'bootstrap',
    withParams(SidecarBootstrapSchema, (params) => {
      const { commands, ...request } = params;
      const provider: CommandProvider = commands
        ? new StaticCommandProvider(commands)
        : new HeuristicCommandProvider();
      return protocol.bootstrap(provider, request);
    }),
  );

  return async function handleRequest(request: IPCRequest): Promise<IPCResponse> {
    const parsed = IPCRequestSchema.safeParse(request);
    if (!parsed.success) {
      return {
        id: typeof request.id === 'string' ? request.id : 'unknown',
        success: false,
        error: 'Invalid request',
      };
    }

    const { id, command, params } = parsed.data;
    const handler = handlers.get(command);
    if (!handler) {
      return { id, success: false, error: `Unknown command: ${command}` };
    }

    try {
      const result = await handler(params);
      return { id, success: true, result };
    } catch (error) {
      const message = getErrorMessage(error);
      console.error(`[Sidecar] ${command} failed: ${message}`);
      return { id, success: false, error: message };
    }
  };
}
