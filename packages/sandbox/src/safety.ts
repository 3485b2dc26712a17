// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { SafetyPattern, SafetyVerdict } from './types.js';

const RECURSIVE_FLAG = String.raw`(?:-[a-z]*r|--recursive)`;
const FORCE_FLAG = String.raw`(?:-[a-z]*f|--force)`;
const OPTIONS = String.raw`(?:-{1,2}[\w-]+\s+)*`;
const COMMAND_END = String.raw`(?=\s|$|[;&|])`;
const OPERANDS = String.raw`(?:[^\s;&|]+\s+)*?`;

/**
 * Catastrophic operations, checked in order, case-insensitively.
 */
export const DANGEROUS_PATTERNS: readonly SafetyPattern[] = [
  {
    // Any absolute or home-relative target; scratch space under /tmp/ is allowed.
    pattern: new RegExp(
      String.raw`\brm\s+(?=${OPTIONS}${RECURSIVE_FLAG})(?=${OPTIONS}${FORCE_FLAG})${OPTIONS}${OPERANDS}(?:\/(?!tmp\/)|~|\$HOME)`,
      'i',
    ),
    reason: 'recursive force-delete outside the project',
  },
  {
    pattern: new RegExp(
      String.raw`\brm\s+(?=${OPTIONS}${RECURSIVE_FLAG})(?=${OPTIONS}${FORCE_FLAG})${OPTIONS}\*${COMMAND_END}`,
      'i',
    ),
    reason: 'recursive force-delete of everything in the working directory',
  },
  {
    pattern: />\s*\/dev\/(?:sd|hd|nvme|xvd|vd|disk|mmcblk)/i,
    reason: 'raw write to a block device',
  },
  {
    pattern: /\bdd\s+.*\bof=\/dev\//i,
    reason: 'raw disk write with dd',
  },
  {
    pattern: new RegExp(
      String.raw`\bch(?:mod|own)\s+(?:\S+\s+)*?${RECURSIVE_FLAG}[a-z]*\s+(?:\S+\s+)*?\/${COMMAND_END}`,
      'i',
    ),
    reason: 'recursive permission change from the filesystem root',
  },
  {
    pattern: /\b(?:curl|wget|fetch)\b.*\|\s*(?:sudo\s+(?:-\S+\s+)*)?(?:ba|z|da|k|fi)?sh\b/i,
    reason: 'network download piped into a shell',
  },
  {
    pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/,
    reason: 'fork bomb',
  },
  {
    pattern: /\bmkfs\b/i,
    reason: 'filesystem format',
  },
  {
    pattern: /(?:>\s*|\btee\s+(?:-\w+\s+)*)\/(?:etc|boot|usr)\//i,
    reason: 'write into a system configuration directory',
  },
];

/**
 * Classify a command against the destructive pattern list. The first match
 * wins.
 */
export function classifyCommand(command: string): SafetyVerdict {
  for (const { pattern, reason } of DANGEROUS_PATTERNS) {
    if (pattern.test(command)) {
      console.warn(`[SafetyClassifier] Dangerous pattern detected (${reason}): ${pattern}`);
      return { dangerous: true, pattern: pattern.toString(), reason };
    }
  }
  return { dangerous: false };
}

export function isDangerous(command: string): boolean {
  return classifyCommand(command).dangerous;
}
