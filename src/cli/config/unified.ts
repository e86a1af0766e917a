/**
 * Console program configuration.
 *
 * Reads `.env` (outside tests), validates the environment against the
 * schema in `env.ts`, and exposes the result as one frozen, typed `config`.
 * Import it through `./index`.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  PlayerKindSchema,
  getEffectiveNodeEnv,
  parseEnv,
} from './env';

// Load .env into process.env before we read anything from it. Skipped in
// test mode so a developer's .env cannot leak into test runs.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env =
  envResult.data ??
  (() => {
    throw new Error('Missing env data after successful parse');
  })();

const nodeEnv = getEffectiveNodeEnv(env);

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isTest: z.boolean(),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().min(1).optional(),
  }),
  game: z.object({
    boardSize: z.number().int().optional(),
    player1: PlayerKindSchema.optional(),
    player2: PlayerKindSchema.optional(),
    searchDepth: z.number().int().positive().optional(),
    rngSeed: z.number().int().nonnegative().optional(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig = {
  nodeEnv,
  isTest: nodeEnv === 'test',
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  game: {
    boardSize: env.SOS_BOARD_SIZE,
    player1: env.SOS_PLAYER_1,
    player2: env.SOS_PLAYER_2,
    searchDepth: env.SOS_SEARCH_DEPTH,
    rngSeed: env.SOS_RNG_SEED,
  },
};

export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
