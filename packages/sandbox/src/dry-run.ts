import type { DryRunRule } from './types.js';

/**
 * Inert equivalents for common tools, first match wins. Tools without an
 * entry run unmodified.
 */
export const DRY_RUN_RULES: readonly DryRunRule[] = [
  { tool: /\bpytest\b/, flag: '--collect-only' },
  { tool: /\bruff\s+format\b/, flag: '--check' },
  { tool: /\bruff\b/, flag: '--no-fix' },
  { tool: /\bblack\b/, flag: '--check' },
  { tool: /\bprettier\b/, flag: '--check', replace: { from: '--write', to: '--check' } },
  { tool: /\beslint\b/, replace: { from: '--fix', to: '--fix-dry-run' } },
  { tool: /\bnpm\s+(?:run\s+)?test\b/, flag: '--listTests', passthrough: true },
  { tool: /\bcargo\s+test\b/, flag: '--no-run' },
  { tool: /\bcargo\s+fmt\b/, flag: '--check' },
  { tool: /\bgofmt\b/, replace: { from: '-w', to: '-l' } },
  { tool: /(?:^|[\s;&|])make\b/, flag: '-n' },
];

const SEPARATOR = ' -- ';

function hasToken(command: string, token: string): boolean {
  return command.split(/\s+/).includes(token);
}

function replaceToken(command: string, from: string, to: string): string {
  return command
    .split(/(\s+)/)
    .map((part) => (part === from ? to : part))
    .join('');
}

/**
 * Rewrite a command into its dry-run form where a known flag exists.
 */
export function addDryRunFlags(command: string, rules: readonly DryRunRule[] = DRY_RUN_RULES): string {
  const rule = rules.find((candidate) => candidate.tool.test(command));
  if (!rule) {
    return command;
  }

  if (rule.replace && hasToken(command, rule.replace.from)) {
    return replaceToken(command, rule.replace.from, rule.replace.to);
  }

  if (!rule.flag || hasToken(command, rule.flag)) {
    return command;
  }

  if (rule.passthrough) {
    return command.includes(SEPARATOR)
      ? `${command} ${rule.flag}`
      : `${command}${SEPARATOR}${rule.flag}`;
  }

  if (command.includes(SEPARATOR)) {
    return command.replace(SEPARATOR, ` ${rule.flag}${SEPARATOR}`);
  }

  return `${command} ${rule.flag}`;
}
