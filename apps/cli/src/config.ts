import type { LogLevel } from '@codetable/logger';
import type { ProviderCredentials } from '@codetable/shared';

import { z } from 'zod';

import { ConfigError } from './errors';

export const DEFAULT_MODEL_ID = 'google/gemini-2.5-pro';
export const DEFAULT_OUTPUT_DIR = 'cpt_output';

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  CODETABLE_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL_ID),
  CODETABLE_OUTPUT_DIR: z.string().trim().min(1).default(DEFAULT_OUTPUT_DIR),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  OPENAI_API_KEY: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,
  GOOGLE_GENERATIVE_AI_API_KEY: optionalSecret,
  TOGETHER_AI_API_KEY: optionalSecret,
});

/**
 * Settings read from the environment (and `.env`)
 */
export interface CliConfig {
  modelId: string;
  outputDir: string;
  logLevel: LogLevel;
  credentials: ProviderCredentials;
}

/**
 * Validate the environment
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${details}`, {
      cause: result.error,
    });
  }

  const parsed = result.data;
  return {
    modelId: parsed.CODETABLE_MODEL,
    outputDir: parsed.CODETABLE_OUTPUT_DIR,
    logLevel: parsed.LOG_LEVEL,
    credentials: {
      openai: parsed.OPENAI_API_KEY,
      anthropic: parsed.ANTHROPIC_API_KEY,
      google: parsed.GOOGLE_GENERATIVE_AI_API_KEY,
      together: parsed.TOGETHER_AI_API_KEY,
    },
  };
}
