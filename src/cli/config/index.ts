/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from './config';
 */

export { config } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  PlayerKindSchema,
  getEffectiveNodeEnv,
  parseEnv,
} from './env';
export type { EnvValidationResult, LogFormat, LogLevel, NodeEnv, RawEnv } from './env';
