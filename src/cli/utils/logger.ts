import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';
import { isEngineError } from '../../shared/engine/errors';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Per-game context stored in AsyncLocalStorage so every log line written
 * while a game runs carries its id without threading it through calls.
 */
export interface GameLogContext {
  gameId: string;
  boardSize?: number;
}

// ============================================================================
// Game Context (AsyncLocalStorage)
// ============================================================================

export const gameContextStorage = new AsyncLocalStorage<GameLogContext>();

export const getGameContext = (): GameLogContext | undefined => {
  return gameContextStorage.getStore();
};

/**
 * Run a function within a game context. All logs written inside the
 * callback, including after awaits, include the context fields.
 */
export const runWithGameContext = <T>(context: GameLogContext, fn: () => T): T => {
  return gameContextStorage.run(context, fn);
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'sos-cli';

/**
 * Custom format to add the game context from AsyncLocalStorage.
 */
const addGameContext = winston.format((info) => {
  const context = getGameContext();
  if (context) {
    info.gameId = context.gameId;
    if (context.boardSize !== undefined) {
      info.boardSize = context.boardSize;
    }
  }
  return info;
});

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }
  if (!info.environment) {
    info.environment = config.nodeEnv;
  }

  // Engine errors serialise themselves; anything else is flattened.
  if (isEngineError(info.error)) {
    info.error = info.error.toJSON();
  } else if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }
  return info;
});

/**
 * Format for structured JSON logging (file transport, LOG_FORMAT=json).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addGameContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addGameContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, gameId, ...meta }) => {
    const gameStr = typeof gameId === 'string' ? ` [${gameId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${gameStr}: ${String(message)}${metaStr}`;
  })
);

/**
 * Create the Winston logger instance.
 *
 * The board and prompts own stdout, so the console transport writes every
 * level to stderr.
 */
const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

if (config.logging.file) {
  const logFilePath = path.resolve(config.logging.file);
  const logDir = path.dirname(logFilePath);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(
    new winston.transports.File({
      filename: logFilePath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

// ============================================================================
// Exports
// ============================================================================

export { logger };
