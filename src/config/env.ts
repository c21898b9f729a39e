/**
 * Environment Configuration
 *
 * Validates and exports typed environment variables using Zod.
 * Parsed on first access and cached for the life of the process, so the
 * values seen before a map restart are the values seen after it.
 *
 * Usage:
 *   import { getEnv } from '../config/env';
 *   if (getEnv().GAME_MODE_VOTING) { ... }
 */

import { z } from 'zod';
import { AppError } from '../errors/AppError';

// ─────────────────────────────────────────────────────────────────────────────
// Schema Definition
// ─────────────────────────────────────────────────────────────────────────────

const booleanFlag = z
  .string()
  .transform((val) => ['true', '1', 'yes', 'on'].includes(val.trim().toLowerCase()));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional(),

  // Game-mode configuration file (sections + autoEnable list)
  GAME_MODES_CONFIG_PATH: z.string().min(1).default('config/server.json'),

  // Replace the host's vote table with configured game modes
  GAME_MODE_VOTING: booleanFlag.default(true),
});

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/**
 * Get the validated environment configuration.
 * Parses on first call and caches the result.
 * Throws a CONFIG_INVALID AppError if validation fails.
 */
export function getEnv(): Env {
  if (_env) {
    return _env;
  }

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw AppError.configInvalid(`Environment validation failed:\n${errors}`);
  }

  _env = result.data;
  return _env;
}

/**
 * Resolve the pino level for the current environment.
 * An explicit LOG_LEVEL wins; tests stay silent unless asked otherwise.
 */
export function resolveLogLevel(env: Env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}
