import { MAX_CONFIDENCE, MIN_SUCCESSES_FOR_FULL_CONFIDENCE } from '@cmdtrust/shared';

/**
 * Confidence from run counters: the success ratio, halved until the command
 * has succeeded three times, and capped below 1.
 */
export function calculateConfidence(successCount: number, failureCount: number): number {
  const total = successCount + failureCount;
  if (total === 0) {
    return 0;
  }

  let empirical = successCount / total;
  if (successCount < MIN_SUCCESSES_FOR_FULL_CONFIDENCE) {
    empirical *= 0.5;
  }

  return Math.min(empirical, MAX_CONFIDENCE);
}
