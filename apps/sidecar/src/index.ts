import { createInterface } from 'readline';
import { LearningProtocol } from '@cmdtrust/core';
import { getErrorMessage } from '@cmdtrust/shared';
import { loadConfig } from './config.js';
import { createRequestHandler } from './ipc-handler.js';
import { IPCRequestSchema } from './types.js';
import type { IPCResponse, RequestHandler } from './types.js';

// ============================================================================
// Sidecar Entry Point
// ============================================================================

/**
 * Communication happens via stdio:
 * - stdin: one JSON request per line `{ id, command, params }`
 * - stdout: one JSON response per line, in request order
 * - stderr: diagnostics (never mixed into the protocol stream)
 */

function writeResponse(response: IPCResponse): void {
  process.stdout.write(JSON.stringify(response) + '\n');
}

async function processLine(handleRequest: RequestHandler, line: string): Promise<void> {
  if (!line.trim()) return;

  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    writeResponse({ id: 'unknown', success: false, error: 'Failed to parse request' });
    return;
  }

  const request = IPCRequestSchema.safeParse(raw);
  if (!request.success) {
    writeResponse({ id: 'unknown', success: false, error: 'Invalid request' });
    return;
  }

  writeResponse(await handleRequest(request.data));
}

async function main(): Promise<void> {
  const config = loadConfig();
  const protocol = await LearningProtocol.create(config.projectRoot, config.protocol);
  const handleRequest = createRequestHandler(protocol);
  console.error(`[Sidecar] Ready for ${config.projectRoot} (ledger ${protocol.getLedger().getLedgerPath()})`);

  // Do NOT set output to stdout; it would interleave with responses.
  const rl = createInterface({ input: process.stdin, terminal: false });

  // Requests are handled one at a time so responses keep request order.
  let pending: Promise<void> = Promise.resolve();
  let isShuttingDown = false;

  rl.on('line', (line) => {
    if (isShuttingDown) return;
    pending = pending
      .then(() => processLine(handleRequest, line))
      .catch((error: unknown) => {
        console.error('[Sidecar] Failed to process request:', error);
      });
  });

  const shutdown = (): void => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    rl.close();
    pending
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[Sidecar] Shutdown error:', error);
        process.exit(1);
      });
  };

  rl.on('close', shutdown);
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  console.error(`[Sidecar] Failed to start: ${getErrorMessage(error)}`);
  process.exit(1);
});
