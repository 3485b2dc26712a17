import { z } from 'zod';

// ============================================================================
// Audit Log Types
// ============================================================================

export const AuditEventTypeSchema = z.enum([
  'LEARN_CMD',
  'EXEC_CMD',
  'VERIFY_CMD',
  'REJECT_CMD',
  'CLEAR_CMD',
  'USE_LEARNED_CMD',
  'SET_PROJECT_INFO',
]);
export type AuditEventType = z.infer<typeof AuditEventTypeSchema>;

/** Event-specific keys written next to `timestamp` and `event`. */
export interface AuditFields {
  type?: string;
  command?: string;
  source?: string;
  reason?: string;
  confidence?: number;
  result?: string;
  duration_ms?: number;
  method?: string;
  verified?: boolean;
  detected?: Record<string, string>;
}

export interface AuditEntry extends AuditFields {
  timestamp: string;
  event: AuditEventType;
}
