// ============================================================================
// Verification Types
// ============================================================================

/**
 * Outcome of one verification attempt. Never persisted as-is; folded into a
 * ledger update and an audit line.
 */
export interface VerificationResult {
  /** Passed the safety classifier. */
  safe: boolean;
  /** Passed intent validation and the sandboxed run. */
  valid: boolean;
  reason?: string;
  outputSample?: string;
  durationMs?: number;
  filesModified: number;
  /** Command actually executed, after the dry-run rewrite. */
  executedCommand?: string;
  exitCode?: number;
}

export interface IntentValidation {
  valid: boolean;
  reason?: string;
}
