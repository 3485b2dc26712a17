import { resolve } from 'path';
import { z } from 'zod';
import { ValidationError } from '@cmdtrust/shared';
import type { CreateLearningProtocolOptions } from '@cmdtrust/core';

const SidecarEnvSchema = z.object({
  CMDTRUST_PROJECT_ROOT: z.string().trim().min(1).optional(),
  CMDTRUST_DATA_DIR: z.string().trim().min(1).optional(),
  CMDTRUST_VERIFY_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  CMDTRUST_RUN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export interface SidecarConfig {
  projectRoot: string;
  protocol: CreateLearningProtocolOptions;
}

/**
 * Read sidecar settings from the environment. The project root defaults to
 * the working directory.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): SidecarConfig {
  const parsed = SidecarEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw ValidationError.invalid(
      'environment',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }

  const settings = parsed.data;
  return {
    projectRoot: resolve(cwd, settings.CMDTRUST_PROJECT_ROOT ?? '.'),
    protocol: {
      ledger: { dataDirName: settings.CMDTRUST_DATA_DIR },
      config: {
        verificationTimeoutMs: settings.CMDTRUST_VERIFY_TIMEOUT_MS,
        trustedRunTimeoutMs: settings.CMDTRUST_RUN_TIMEOUT_MS,
      },
    },
  };
}
