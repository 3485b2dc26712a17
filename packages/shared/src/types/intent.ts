import { z } from 'zod';

// ============================================================================
// Intents
// ============================================================================

export const KnownIntentSchema = z.enum(['test', 'lint', 'format', 'coverage', 'build']);
export type KnownIntent = z.infer<typeof KnownIntentSchema>;

export const KNOWN_INTENTS: readonly KnownIntent[] = KnownIntentSchema.options;

/** Free-form intent name; anything outside the known set gets the default rules. */
export const IntentSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, 'Intent must be a single word');
export type Intent = z.infer<typeof IntentSchema>;

const COMMAND_TYPE_SUFFIX = '_CMD';

/**
 * Ledger key for an intent: `test` -> `TEST_CMD`.
 * Already-suffixed input is returned upper-cased.
 */
export function toCommandType(intent: string): string {
  const upper = intent.trim().toUpperCase();
  return upper.endsWith(COMMAND_TYPE_SUFFIX) ? upper : `${upper}${COMMAND_TYPE_SUFFIX}`;
}

/**
 * Intent for a ledger key: `TEST_CMD` -> `test`.
 */
export function toIntent(commandType: string): string {
  const lower = commandType.trim().toLowerCase();
  const suffix = COMMAND_TYPE_SUFFIX.toLowerCase();
  return lower.endsWith(suffix) ? lower.slice(0, -suffix.length) : lower;
}

export function isKnownIntent(intent: string): intent is KnownIntent {
  return KnownIntentSchema.safeParse(intent).success;
}
