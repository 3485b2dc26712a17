import { readFileSync } from 'fs';
import { z } from 'zod';
import { toIntent } from '@cmdtrust/shared';

const SuggestionTableSchema = z.record(z.record(z.array(z.string())));
export type SuggestionTable = z.infer<typeof SuggestionTableSchema>;

/**
 * Intent -> language -> candidate commands, in order of preference.
 */
export const COMMAND_SUGGESTIONS: SuggestionTable = SuggestionTableSchema.parse(
  JSON.parse(readFileSync(new URL('./data/suggestions.json', import.meta.url), 'utf-8')),
);

/**
 * Candidate commands for an intent in a given language, minus any already
 * tried. Unknown intents and languages yield nothing.
 */
export function getCommandSuggestions(
  intent: string,
  language: string | undefined,
  tried: readonly string[] = [],
  table: SuggestionTable = COMMAND_SUGGESTIONS,
): string[] {
  if (!language) {
    return [];
  }
  const candidates = table[toIntent(intent)]?.[language.toLowerCase()] ?? [];
  const attempted = new Set(tried.map((command) => command.trim()));
  return candidates.filter((command) => !attempted.has(command));
}
