/**
 * Player variants.
 *
 * Every player answers one question, `chooseMove(state)`, and never mutates
 * the state it is shown; the game loop applies the move (and the engine
 * validates it regardless of who chose it). The set of variants is closed
 * and tagged by `kind` so hosts can switch on it exhaustively.
 *
 * @module players
 */

import type { Move, PlayerNumber } from '../types/game';
import type { GameState } from '../engine/GameState';
import type { HeuristicWeights } from '../engine/heuristicEvaluation';
import { EngineErrorCode, IllegalStateTransitionError } from '../engine/errors';
import type { RandomSource } from '../utils/rng';
import { SearchAgent, SearchResult } from './SearchAgent';

export enum PlayerKind {
  HUMAN = 'human',
  RANDOM = 'random',
  MINIMAX = 'minimax',
}

/**
 * External source of moves for a human player (console prompt, UI, test
 * script). It should already reject obviously malformed input, but the
 * engine re-validates whatever it returns.
 */
export interface MoveInputSource {
  requestMove(state: GameState, player: PlayerNumber): Promise<Move>;
}

export interface HumanPlayer {
  readonly kind: PlayerKind.HUMAN;
  chooseMove(state: GameState): Promise<Move>;
}

export interface RandomPlayer {
  readonly kind: PlayerKind.RANDOM;
  chooseMove(state: GameState): Promise<Move>;
}

export interface MinimaxPlayer {
  readonly kind: PlayerKind.MINIMAX;
  readonly depth: number;
  chooseMove(state: GameState): Promise<Move>;
  /** Result of the most recent search, for logging and diagnostics. */
  getLastSearch(): SearchResult | null;
}

export type Player = HumanPlayer | RandomPlayer | MinimaxPlayer;

export type PlayerSpec =
  | { kind: PlayerKind.HUMAN; input: MoveInputSource }
  | { kind: PlayerKind.RANDOM; rng: RandomSource }
  | { kind: PlayerKind.MINIMAX; depth: number; weights?: HeuristicWeights };

export function createHumanPlayer(input: MoveInputSource): HumanPlayer {
  return {
    kind: PlayerKind.HUMAN,
    chooseMove: (state) => input.requestMove(state, state.getCurrentPlayer()),
  };
}

/**
 * Uniform choice over `state.legalMoves()`.
 */
export function createRandomPlayer(rng: RandomSource): RandomPlayer {
  return {
    kind: PlayerKind.RANDOM,
    chooseMove: async (state) => {
      const moves = state.legalMoves();
      const index = Math.min(moves.length - 1, Math.floor(rng() * moves.length));
      const move = moves[index];
      if (!move) {
        throw new IllegalStateTransitionError(
          EngineErrorCode.STATE_GAME_OVER,
          'Random player asked to move in a finished game',
          {},
          'Player'
        );
      }
      return move;
    },
  };
}

export function createMinimaxPlayer(depth: number, weights?: HeuristicWeights): MinimaxPlayer {
  const agent = new SearchAgent(weights ? { weights } : {});
  let lastSearch: SearchResult | null = null;

  return {
    kind: PlayerKind.MINIMAX,
    depth,
    chooseMove: async (state) => {
      lastSearch = agent.search(state, depth);
      return lastSearch.move;
    },
    getLastSearch: () => lastSearch,
  };
}

export function createPlayer(spec: PlayerSpec): Player {
  switch (spec.kind) {
    case PlayerKind.HUMAN:
      return createHumanPlayer(spec.input);
    case PlayerKind.RANDOM:
      return createRandomPlayer(spec.rng);
    case PlayerKind.MINIMAX:
      return createMinimaxPlayer(spec.depth, spec.weights);
  }
}
