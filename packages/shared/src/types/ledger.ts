import { z } from 'zod';

// ============================================================================
// Trust Constants
// ============================================================================

/** Minimum confidence a verified command needs before it is handed out. */
export const TRUST_THRESHOLD = 0.7;

/** Confidence ceiling; no command is ever fully trusted. */
export const MAX_CONFIDENCE = 0.98;

/** Successful runs needed before the insufficient-evidence penalty lifts. */
export const MIN_SUCCESSES_FOR_FULL_CONFIDENCE = 3;

export const MAX_REJECTED_COMMANDS = 50;

export const LEDGER_VERSION = '1.0';

// ============================================================================
// Domain Types
// ============================================================================

export interface VerificationInfo {
  method: string;
  verifiedAt: string;
  durationMs?: number;
  details?: Record<string, unknown>;
}

export interface CommandEntry {
  command: string;
  learnedAt: string;
  learnedFrom: string;
  verified: boolean;
  successCount: number;
  failureCount: number;
  confidence: number;
  lastSuccess?: string;
  lastFailure?: string;
  typicalDurationMs?: number;
  verification?: VerificationInfo;
}

export interface RejectedCommand {
  readonly command: string;
  readonly source: string;
  readonly reason: string;
  readonly rejectedAt: string;
}

export const ProjectFactsSchema = z.object({
  language: z.string().optional(),
  framework: z.string().optional(),
  packageManager: z.string().optional(),
  testFramework: z.string().optional(),
});
export type ProjectFacts = z.infer<typeof ProjectFactsSchema>;

// ============================================================================
// Persisted Document
// ============================================================================

export const VerificationRecordSchema = z
  .object({
    method: z.string(),
    verified_at: z.string(),
    duration_ms: z.number().int().nonnegative().optional(),
  })
  .catchall(z.unknown());
export type VerificationRecord = z.infer<typeof VerificationRecordSchema>;

export const CommandRecordSchema = z.object({
  command: z.string(),
  learned_at: z.string(),
  learned_from: z.string(),
  verified: z.boolean().default(false),
  success_count: z.number().int().nonnegative().default(0),
  failure_count: z.number().int().nonnegative().default(0),
  confidence: z.number().min(0).max(MAX_CONFIDENCE).default(0),
  last_success: z.string().optional(),
  last_failure: z.string().optional(),
  typical_duration_ms: z.number().int().nonnegative().optional(),
  verification: VerificationRecordSchema.optional(),
});
export type CommandRecord = z.infer<typeof CommandRecordSchema>;

export const RejectedRecordSchema = z.object({
  command: z.string(),
  suggested_by: z.string(),
  reason: z.string(),
  rejected_at: z.string(),
});
export type RejectedRecord = z.infer<typeof RejectedRecordSchema>;

export const DetectedRecordSchema = z.object({
  language: z.string().optional(),
  framework: z.string().optional(),
  package_manager: z.string().optional(),
  test_framework: z.string().optional(),
});
export type DetectedRecord = z.infer<typeof DetectedRecordSchema>;

export const LedgerDocumentSchema = z.object({
  version: z.string(),
  project_id: z.string().min(1),
  created: z.string(),
  last_updated: z.string(),
  last_updated_by: z.string(),
  detected: DetectedRecordSchema.default({}),
  commands: z.record(CommandRecordSchema).default({}),
  rejected_commands: z.array(RejectedRecordSchema).default([]),
  environment: z.record(z.unknown()).default({}),
});
export type LedgerDocument = z.infer<typeof LedgerDocumentSchema>;
