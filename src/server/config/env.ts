/**
 * Environment Variable Validation
 *
 * Centralized validation of the environment variables the extractor reads,
 * using Zod. CLI flags take precedence over the values resolved here.
 */

// Load dotenv early so the schema sees values from .env
import * as dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

export const overwritePolicySchema = z.enum(['low', 'max']);

const booleanStringSchema = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: booleanStringSchema,
  // Defaults for -o/--outdir and -s/--safety
  ATTACHMENTS_OUTDIR: z.string().min(1).optional(),
  ATTACHMENTS_SAFETY: overwritePolicySchema.default('max'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment record. Empty strings count as unset.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}

let cachedEnv: Env | undefined;

export function getEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = parseEnv(process.env);
  }
  return cachedEnv;
}
