#!/usr/bin/env node
/**
 * Console entry point: `sos [--size=N] [--player1=KIND] [--player2=KIND]
 * [--depth=N] [--seed=N]`.
 *
 * Settings are resolved in order: command line, then environment (see
 * config/env.ts), then an interactive prompt for whatever is still missing.
 */

import { randomUUID } from 'crypto';
import { GameState } from '../shared/engine/GameState';
import { isEngineError } from '../shared/engine/errors';
import { Player, PlayerKind, createPlayer } from '../shared/ai/players';
import { RandomSource, createSeededSource } from '../shared/utils/rng';
import { moveToString, PlayerNumber } from '../shared/types/game';
import { CliArgs, CliUsageError, USAGE, parseCliArgs } from './args';
import { config } from './config';
import { GameObserver, GameSession } from './GameSession';
import {
  Prompter,
  askBoardSize,
  askDepth,
  askPlayerKind,
  createConsoleMoveSource,
  createReadlinePrompter,
} from './prompts';
import { renderBoard, renderOutcome, renderScores } from './render';
import { logger, runWithGameContext } from './utils/logger';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_ENGINE_FAILURE = 2;

export interface MainOptions {
  /** Defaults to a readline prompter on stdin/stdout. */
  prompter?: Prompter;
  /** Defaults to the environment configuration. */
  defaults?: typeof config.game;
}

async function resolvePlayers(
  args: CliArgs,
  defaults: typeof config.game,
  prompter: Prompter,
  boardSize: number
): Promise<Record<PlayerNumber, Player>> {
  const kinds: Record<PlayerNumber, PlayerKind> = {
    1: args.player1 ?? defaults.player1 ?? (await askPlayerKind(prompter, 1)),
    2: args.player2 ?? defaults.player2 ?? (await askPlayerKind(prompter, 2)),
  };

  const seed = args.seed ?? defaults.rngSeed;
  const rng: RandomSource = seed === undefined ? Math.random : createSeededSource(seed);
  const moveSource = createConsoleMoveSource(prompter);

  const build = async (playerNumber: PlayerNumber): Promise<Player> => {
    switch (kinds[playerNumber]) {
      case PlayerKind.HUMAN:
        return createPlayer({ kind: PlayerKind.HUMAN, input: moveSource });
      case PlayerKind.RANDOM:
        return createPlayer({ kind: PlayerKind.RANDOM, rng });
      case PlayerKind.MINIMAX: {
        const depth =
          args.depth ?? defaults.searchDepth ?? (await askDepth(prompter, playerNumber, boardSize));
        return createPlayer({ kind: PlayerKind.MINIMAX, depth });
      }
    }
  };

  return { 1: await build(1), 2: await build(2) };
}

function consoleObserver(prompter: Prompter): GameObserver {
  return {
    onMoveApplied: (result) => {
      const scored =
        result.formations.length > 0
          ? ` and scores ${result.formations.length} (plays again)`
          : '';
      prompter.write(`Player ${result.player} plays ${moveToString(result.move)}${scored}`);
    },
    onInvalidMove: (error) => {
      prompter.write(`Invalid move: ${error.message}`);
    },
    onGameOver: (summary, state) => {
      prompter.write(renderBoard(state.getBoard()));
      prompter.write(renderScores(summary.scores));
      prompter.write(renderOutcome(summary.outcome));
    },
  };
}

/**
 * Run one game and return the process exit code: 0 when the game completed,
 * 1 on a usage error, 2 when the engine failed.
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const prompter = options.prompter ?? createReadlinePrompter();
  const defaults = options.defaults ?? config.game;

  try {
    let args: CliArgs;
    try {
      args = parseCliArgs(argv);
    } catch (error) {
      if (error instanceof CliUsageError) {
        prompter.write(error.message);
        prompter.write(USAGE);
        return EXIT_USAGE;
      }
      throw error;
    }

    if (args.help) {
      prompter.write(USAGE);
      return EXIT_OK;
    }

    const boardSize = args.size ?? defaults.boardSize ?? (await askBoardSize(prompter));
    const players = await resolvePlayers(args, defaults, prompter, boardSize);
    const session = new GameSession(
      GameState.create(boardSize),
      players,
      consoleObserver(prompter)
    );

    await runWithGameContext({ gameId: randomUUID(), boardSize }, () => session.run());
    return EXIT_OK;
  } catch (error) {
    if (isEngineError(error)) {
      logger.error('Game aborted by engine error', { error });
      prompter.write(`Engine error: ${error.message}`);
      return EXIT_ENGINE_FAILURE;
    }
    throw error;
  } finally {
    prompter.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('Unexpected failure', { error });
      process.exitCode = EXIT_ENGINE_FAILURE;
    });
}
