/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables read by
 * the terminal host, validates them, and exports the inferred types.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import { MAX_WIN_LENGTH, MIN_WIN_LENGTH, DEFAULT_WIN_LENGTH } from '../../shared/engine/rulesConfig';

export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Treat an empty string the same as an unset variable, so `FOO=` in a .env
 * file falls back to the default instead of failing coercion.
 */
const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('warn'),

  /** json for machine-readable lines, pretty for a single readable line */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path of an additional JSON log file */
  LOG_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),

  // ===================================================================
  // GAME RULES
  // ===================================================================

  /** Cells in a row needed to win */
  FTF_WIN_LENGTH: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(MIN_WIN_LENGTH).max(MAX_WIN_LENGTH).default(DEFAULT_WIN_LENGTH)
  ),

  /** Enables a draw once this many moves have been played without a win */
  FTF_MAX_MOVES: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().optional()),

  // ===================================================================
  // TERMINAL RENDERING
  // ===================================================================

  /** Empty cells drawn around the occupied area */
  FTF_VIEWPORT_PADDING: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(0).max(10).default(1)
  ),

  /** Most rows and columns drawn per turn */
  FTF_VIEWPORT_MAX_SIZE: z.preprocess(
    emptyAsUndefined,
    z.coerce.number().int().min(3).max(99).default(21)
  ),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return { success: false, errors };
  }

  return { success: true, data: result.data };
}

/**
 * Under Jest the effective environment is always 'test', even when a .env
 * file says otherwise.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
