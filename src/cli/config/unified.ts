/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object for the terminal host.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import { NodeEnvSchema, LogFormatSchema, LogLevelSchema, RawEnv, parseEnv, getEffectiveNodeEnv } from './env';

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().min(1).optional(),
    silent: z.boolean(),
  }),
  rules: z.object({
    winLength: z.number().int().positive(),
    maxMoves: z.number().int().positive().optional(),
  }),
  display: z.object({
    viewportPadding: z.number().int().min(0),
    maxViewportSize: z.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the typed config from an already-validated raw environment.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);
  const isTest = nodeEnv === 'test';

  const assembled = ConfigSchema.parse({
    nodeEnv,
    isProduction: nodeEnv === 'production',
    isTest,
    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
      // Keep Jest output clean; tests assert on values, not log lines.
      silent: isTest && isJestRuntime(),
    },
    rules: {
      winLength: env.FTF_WIN_LENGTH,
      maxMoves: env.FTF_MAX_MOVES,
    },
    display: {
      viewportPadding: env.FTF_VIEWPORT_PADDING,
      maxViewportSize: env.FTF_VIEWPORT_MAX_SIZE,
    },
  });

  return Object.freeze(assembled);
}

/**
 * Load .env, validate process.env and build the config. Prints every
 * problem and exits when the environment is invalid.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  // Skip in test mode so a developer's .env cannot override test settings.
  if (env.NODE_ENV !== 'test' && !isJestRuntime()) {
    dotenv.config();
  }

  const envResult = parseEnv(env);
  if (!envResult.success || !envResult.data) {
    console.error('Invalid environment configuration:');
    for (const error of envResult.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return buildConfig(envResult.data);
}

export const config: AppConfig = loadConfig();
