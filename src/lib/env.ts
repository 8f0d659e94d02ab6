/**
 * Environment Configuration
 *
 * Validates process.env once with Zod. Numeric settings are coerced from
 * strings; unset optional values fall back to the pipeline defaults.
 */

import { z } from 'zod';

// =============================================================================
// Schema
// =============================================================================

// `KEY=` in a .env file arrives as '', which means unset
function setting<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const envSchema = z.object({
  NODE_ENV: setting(z.enum(['development', 'production', 'test']).default('development')),
  LOG_LEVEL: setting(
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional()
  ),

  OPENAI_API_KEY: setting(z.string().min(1).optional()),
  OPENAI_BASE_URL: setting(z.string().url().optional()),
  OPENAI_MODEL: setting(z.string().min(1).default('gpt-4o-mini')),
  LLM_TIMEOUT_MS: setting(z.coerce.number().int().positive().default(60_000)),

  EMBEDDING_MODEL: setting(z.string().min(1).default('text-embedding-3-small')),
  EMBEDDING_DIMENSIONS: setting(z.coerce.number().int().positive().default(1536)),
  EMBEDDING_BATCH_SIZE: setting(z.coerce.number().int().min(1).max(100).default(100)),
  EMBEDDING_COST_PER_MILLION_TOKENS: setting(z.coerce.number().nonnegative().default(0.02)),

  DATABASE_URL: setting(z.string().min(1).optional()),
});

export type Env = z.infer<typeof envSchema>;

// =============================================================================
// Accessors
// =============================================================================

let cachedEnv: Env | null = null;

/**
 * Parse an environment map. Throws with every invalid key listed.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return result.data;
}

/**
 * Validated process environment, parsed on first use.
 */
export function getEnv(): Env {
  if (!cachedEnv) {
    cachedEnv = parseEnv(process.env);
  }
  return cachedEnv;
}

/**
 * Drop the cached environment (tests change process.env between cases).
 */
export function resetEnvCache(): void {
  cachedEnv = null;
}

/**
 * Read a required setting, failing with the variable name when it is unset.
 */
export function requireEnv<K extends 'OPENAI_API_KEY' | 'DATABASE_URL'>(key: K): string {
  const value = getEnv()[key];
  if (!value) {
    throw new Error(`${key} is not set`);
  }
  return value;
}
