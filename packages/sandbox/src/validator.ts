// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { IntentValidation } from '@cmdtrust/shared';
import { getIntentRules } from './intent-rules.js';
import type { IntentRules } from './types.js';

// ============================================================================
// Intent Validator
// ============================================================================

/**
 * Keyword-level check that a command plausibly serves its declared intent.
 * Purely syntactic; runs before anything is executed.
 */
export class IntentValidator {
  private readonly resolveRules: (intent: string) => IntentRules;

  constructor(resolveRules: (intent: string) => IntentRules = getIntentRules) {
    this.resolveRules = resolveRules;
  }

  rulesFor(intent: string): IntentRules {
    return this.resolveRules(intent);
  }

  validate(command: string, intent: string): IntentValidation {
    return validateAgainstRules(command, this.resolveRules(intent));
  }
}

/**
 * Check a command against one rule set. Matching is case-insensitive
 * substring matching.
 */
export function validateAgainstRules(command: string, rules: IntentRules): IntentValidation {
  const normalized = command.toLowerCase();

  if (
    rules.mustContain.length > 0 &&
    !rules.mustContain.some((keyword) => normalized.includes(keyword))
  ) {
    return {
      valid: false,
      reason: `Command doesn't appear to be a ${rules.mustContain.join(' or ')} command`,
    };
  }

  for (const forbidden of rules.mustNotContain) {
    if (normalized.includes(forbidden)) {
      return {
        valid: false,
        reason: `Command contains forbidden keyword: ${forbidden}`,
      };
    }
  }

  return { valid: true };
}

/**
 * Validate with the default rule table.
 */
export function validateIntent(command: string, intent: string): IntentValidation {
  return validateAgainstRules(command, getIntentRules(intent));
}
