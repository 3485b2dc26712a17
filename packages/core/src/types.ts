// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import type { ProjectFacts } from '@cmdtrust/shared';

// ============================================================================
// Command Providers
// ============================================================================

/** What a provider sees when asked for a command. */
export interface ProposalRequest {
  intent: string;
  question?: string;
  context?: Record<string, unknown>;
  /** Commands already proposed for this intent and refused. */
  tried: readonly string[];
  /** Table suggestions not yet tried. */
  suggestions: readonly string[];
  projectInfo: ProjectFacts;
}

/**
 * Anything that can answer "which command runs <intent> here?": an agent,
 * a person, or a lookup table. Resolves `undefined` when it has no answer.
 */
export interface CommandProvider {
  readonly name: string;
  proposeCommand(request: ProposalRequest): Promise<string | undefined>;
}

// ============================================================================
// Project Detection
// ============================================================================

export interface ProjectDetector {
  detect(projectRoot: string): Promise<ProjectFacts>;
}
