// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { AuditEntry, AuditEventType, AuditFields } from '@cmdtrust/shared';
import { appendJsonLine } from './files.js';

export const AUDIT_LOG_FILE_NAME = 'audit.jsonl';
const MAX_STRING_LENGTH = 1000;

export function truncateString(value: string): string {
  if (value.length <= MAX_STRING_LENGTH) {
    return value;
  }
  return `${value.slice(0, MAX_STRING_LENGTH)}…[truncated:${value.length - MAX_STRING_LENGTH}]`;
}

function truncatingReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'string' ? truncateString(value) : value;
}

/**
 * Append-only JSONL record of ledger events. Entries are written and never
 * read back.
 */
export class AuditLog {
  private readonly filePath: string;
  private readonly clock: () => Date;

  constructor(filePath: string, clock: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.clock = clock;
  }

  async log(event: AuditEventType, fields: AuditFields = {}): Promise<void> {
    const entry: AuditEntry = {
      timestamp: this.clock().toISOString(),
      event,
      ...fields,
    };

    try {
      await appendJsonLine(this.filePath, entry, truncatingReplacer);
    } catch (error) {
      // Auditing must never fail the ledger operation it describes.
      console.error(`[AuditLog] Failed to append ${event} to ${this.filePath}:`, error);
    }
  }

  getPath(): string {
    return this.filePath;
  }
}
