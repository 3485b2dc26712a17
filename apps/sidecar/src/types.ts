import { z } from 'zod';

// ============================================================================
// IPC Types
// ============================================================================

export const IPCRequestSchema = z.object({
  id: z.string(),
  command: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export type IPCRequest = z.input<typeof IPCRequestSchema>;

export interface IPCResponse {
  id: string;
  success: boolean;
  result?: unknown;
  error?: string;
}

export type CommandHandler = (params: Record<string, unknown>) => Promise<unknown>;

export type RequestHandler = (request: IPCRequest) => Promise<IPCResponse>;
