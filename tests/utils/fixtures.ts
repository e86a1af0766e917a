/**
 * Test Fixtures and Utilities
 * Common test data and helper functions for SOS engine tests
 */

import { GameState } from '../../src/shared/engine/GameState';
import type { Letter, Move } from '../../src/shared/types/game';
import type { MoveInputSource } from '../../src/shared/ai/players';
import type { Prompter } from '../../src/cli/prompts';
import { SeededRNG } from '../../src/shared/utils/rng';

/**
 * Move helper - creates a move object
 */
export function mv(row: number, col: number, letter: Letter): Move {
  return { row, col, letter };
}

/**
 * Creates a state on a size×size board and applies the moves in order.
 */
export function playMoves(size: number, moves: readonly Move[]): GameState {
  const state = GameState.create(size);
  for (const move of moves) {
    state.applyMove(move);
  }
  return state;
}

/**
 * Plays `count` uniformly random legal moves (fewer if the board fills)
 * from a fresh board, driven by a seeded RNG.
 */
export function playRandomPrefix(size: number, seed: number, count: number): GameState {
  const rng = new SeededRNG(seed);
  const state = GameState.create(size);
  for (let i = 0; i < count && !state.isTerminal(); i++) {
    const moves = state.legalMoves();
    state.applyMove(moves[rng.nextInt(moves.length)]);
  }
  return state;
}

/**
 * 3x3 game where player 1 completes the top row on the third move and the
 * board then fills with O without any further formation:
 *
 *   S O S
 *   O O O
 *   O O O
 */
export const ONE_FORMATION_GAME: readonly Move[] = [
  mv(0, 0, 'S'), // P1
  mv(0, 1, 'O'), // P2
  mv(0, 2, 'S'), // P1 scores, moves again
  mv(1, 0, 'O'), // P1
  mv(1, 1, 'O'), // P2
  mv(1, 2, 'O'), // P1
  mv(2, 0, 'O'), // P2
  mv(2, 1, 'O'), // P1
  mv(2, 2, 'O'), // P2
];

/**
 * 3x3 board filled row by row with no S-O-S line anywhere:
 *
 *   S S S
 *   O O O
 *   O O O
 */
export const NO_FORMATION_GAME: readonly Move[] = [
  mv(0, 0, 'S'),
  mv(0, 1, 'S'),
  mv(0, 2, 'S'),
  mv(1, 0, 'O'),
  mv(1, 1, 'O'),
  mv(1, 2, 'O'),
  mv(2, 0, 'O'),
  mv(2, 1, 'O'),
  mv(2, 2, 'O'),
];

/**
 * Human move source that replays the scripted moves, then falls back to the
 * first legal move once the script runs out.
 */
export function scriptedMoveSource(script: readonly Move[]): MoveInputSource & {
  requests: number;
} {
  const queue = [...script];
  const source = {
    requests: 0,
    requestMove: async (state: GameState): Promise<Move> => {
      source.requests++;
      return queue.shift() ?? state.legalMoves()[0];
    },
  };
  return source;
}

export interface ScriptedPrompter extends Prompter {
  readonly questions: string[];
  readonly output: string[];
  closed: boolean;
}

/**
 * Prompter that answers questions from a script and records everything
 * written to it.
 */
export function scriptedPrompter(answers: readonly string[]): ScriptedPrompter {
  const queue = [...answers];
  const prompter: ScriptedPrompter = {
    questions: [],
    output: [],
    closed: false,
    ask: async (question) => {
      prompter.questions.push(question);
      const answer = queue.shift();
      if (answer === undefined) {
        throw new Error(`No scripted answer for: ${question}`);
      }
      return answer;
    },
    write: (text) => {
      prompter.output.push(text);
    },
    close: () => {
      prompter.closed = true;
    },
  };
  return prompter;
}
