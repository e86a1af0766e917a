/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * console program reads, validates it, and exports a typed parse helper.
 * Variables left unset fall back to the defaults declared here, or to CLI
 * flags and interactive prompts for the game settings.
 */

import { z } from 'zod';
import { PlayerKind } from '../../shared/ai/players';
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from '../../shared/types/game';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels the program uses).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const PlayerKindSchema = z.nativeEnum(PlayerKind);

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Minimum level written by the logger */
  LOG_LEVEL: LogLevelSchema.default('warn'),

  /** Console log format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional file that receives every log entry as JSON */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // GAME DEFAULTS (CLI flags take precedence, prompts fill the gaps)
  // ===================================================================

  /** Board size n for an n×n board */
  SOS_BOARD_SIZE: z.coerce.number().int().min(MIN_BOARD_SIZE).max(MAX_BOARD_SIZE).optional(),

  /** Player 1 kind */
  SOS_PLAYER_1: PlayerKindSchema.optional(),

  /** Player 2 kind */
  SOS_PLAYER_2: PlayerKindSchema.optional(),

  /** Search depth for minimax players */
  SOS_SEARCH_DEPTH: z.coerce.number().int().positive().optional(),

  /** Seed for random players */
  SOS_RNG_SEED: z.coerce.number().int().nonnegative().optional(),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
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
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
