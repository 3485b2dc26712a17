// Types
export type {
  CommandRunner,
  DryRunRule,
  ExecutionOptions,
  ExecutionResult,
  IntentRules,
  SafetyPattern,
  SafetyVerdict,
  SandboxConfig,
} from './types.js';

export { DEFAULT_SANDBOX_CONFIG, SandboxConfigSchema } from './types.js';

// Safety classifier
export { DANGEROUS_PATTERNS, classifyCommand, isDangerous } from './safety.js';

// Intent validation
export { DEFAULT_INTENT_RULES, INTENT_RULES, getIntentRules } from './intent-rules.js';
export { IntentValidator, validateAgainstRules, validateIntent } from './validator.js';

// Sandboxed execution
export { DRY_RUN_RULES, addDryRunFlags } from './dry-run.js';
export { countSnapshotChanges, takeFileSnapshot, type FileSnapshot } from './snapshot.js';
export { CommandExecutor, normalizeConfig } from './executor.js';
export {
  CommandVerifier,
  VERIFICATION_REASONS,
  dangerousReason,
  executeForVerification,
  type CommandVerifierOptions,
  type VerificationOptions,
} from './verifier.js';
