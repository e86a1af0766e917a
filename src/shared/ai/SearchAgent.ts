/**
 * Search Agent - depth-bounded minimax with alpha-beta pruning
 *
 * The agent plays for whoever is to move in the state it is handed. Each
 * ply is a maximising or minimising node according to the player to move
 * *in that node*, which the GameState derives from the bonus-move rule, so a
 * move that scores keeps the same role at the next ply instead of flipping.
 *
 * The search runs on a private clone of the caller's state and backtracks
 * with applyMove/undoMove; the caller's GameState is never touched.
 *
 * Usage:
 * ```typescript
 * const agent = new SearchAgent();
 * const move = agent.chooseMove(state, 3);
 * ```
 *
 * @module SearchAgent
 */

import type { Move, PlayerNumber } from '../types/game';
import { GameState } from '../engine/GameState';
import { EngineErrorCode, IllegalStateTransitionError } from '../engine/errors';
import {
  HEURISTIC_WEIGHTS_DEFAULT,
  HeuristicWeights,
  evaluatePosition,
} from '../engine/heuristicEvaluation';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface SearchOptions {
  /** Alpha-beta cutoffs (default true). Off gives plain minimax. */
  pruning?: boolean;
  /** Evaluator weights (default {@link HEURISTIC_WEIGHTS_DEFAULT}). */
  weights?: HeuristicWeights;
}

export interface SearchStats {
  /** Nodes entered below the root, leaves included. */
  nodesVisited: number;
  /** Static evaluations performed. */
  leafEvaluations: number;
  /** Times a node stopped early on a beta <= alpha cutoff. */
  cutoffs: number;
}

export interface SearchResult {
  move: Move;
  /** Minimax value of `move` from the searching player's perspective. */
  score: number;
  /** Plies actually searched after clamping the requested depth. */
  depth: number;
  player: PlayerNumber;
  stats: SearchStats;
}

interface SearchContext {
  perspective: PlayerNumber;
  pruning: boolean;
  weights: HeuristicWeights;
  stats: SearchStats;
}

// ═══════════════════════════════════════════════════════════════════════════
// DEPTH HELPERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Depth used when none is configured: log2 of the board size, at least 1.
 */
export function defaultSearchDepth(boardSize: number): number {
  return Math.max(1, Math.floor(Math.log2(boardSize)));
}

/**
 * Plies the agent will actually search. Every ply fills one cell, so the
 * search can never go deeper than the number of empty cells; the root always
 * looks at least one ply ahead so there is something to choose between.
 */
export function effectiveSearchDepth(depthLimit: number, emptyCells: number): number {
  const requested = Number.isFinite(depthLimit) ? Math.floor(depthLimit) : emptyCells;
  return Math.max(1, Math.min(requested, emptyCells));
}

// ═══════════════════════════════════════════════════════════════════════════
// AGENT
// ═══════════════════════════════════════════════════════════════════════════

export class SearchAgent {
  private readonly pruning: boolean;
  private readonly weights: HeuristicWeights;

  constructor(options: SearchOptions = {}) {
    this.pruning = options.pruning ?? true;
    this.weights = options.weights ?? HEURISTIC_WEIGHTS_DEFAULT;
  }

  chooseMove(state: GameState, depthLimit: number): Move {
    return this.search(state, depthLimit).move;
  }

  /**
   * Search `state` for the player to move and report the chosen move with
   * its value and statistics.
   *
   * @throws IllegalStateTransitionError when `state` is terminal
   */
  search(state: GameState, depthLimit: number): SearchResult {
    if (state.isTerminal()) {
      throw new IllegalStateTransitionError(
        EngineErrorCode.STATE_SEARCH_ON_TERMINAL,
        'Cannot search a finished game',
        { depthLimit },
        'Search'
      );
    }

    const work = state.clone();
    const depth = effectiveSearchDepth(depthLimit, work.getBoard().emptyCells().length);
    const ctx: SearchContext = {
      perspective: work.getCurrentPlayer(),
      pruning: this.pruning,
      weights: this.weights,
      stats: { nodesVisited: 0, leafEvaluations: 0, cutoffs: 0 },
    };

    let alpha = -Infinity;
    let bestMove: Move | null = null;
    let bestScore = -Infinity;

    // The root is always a maximising node: the agent is the player to move.
    for (const move of work.legalMoves()) {
      const prior = work.snapshot();
      work.applyMove(move);
      const score = this.minimax(work, depth - 1, alpha, Infinity, ctx);
      work.undoMove(move, prior);

      if (bestMove === null || score > bestScore) {
        bestMove = move;
        bestScore = score;
      }
      if (ctx.pruning) {
        alpha = Math.max(alpha, bestScore);
      }
    }

    if (bestMove === null) {
      // Non-terminal states always have legal moves.
      throw new IllegalStateTransitionError(
        EngineErrorCode.STATE_SEARCH_ON_TERMINAL,
        'No legal moves to search',
        { depthLimit },
        'Search'
      );
    }

    return {
      move: bestMove,
      score: bestScore,
      depth,
      player: ctx.perspective,
      stats: ctx.stats,
    };
  }

  private minimax(
    state: GameState,
    depth: number,
    alpha: number,
    beta: number,
    ctx: SearchContext
  ): number {
    ctx.stats.nodesVisited++;

    if (depth <= 0 || state.isTerminal()) {
      ctx.stats.leafEvaluations++;
      return evaluatePosition(state, ctx.perspective, ctx.weights);
    }

    const maximizing = state.getCurrentPlayer() === ctx.perspective;
    let best = maximizing ? -Infinity : Infinity;

    for (const move of state.legalMoves()) {
      const prior = state.snapshot();
      state.applyMove(move);
      const score = this.minimax(state, depth - 1, alpha, beta, ctx);
      state.undoMove(move, prior);

      if (maximizing) {
        best = Math.max(best, score);
        alpha = Math.max(alpha, best);
      } else {
        best = Math.min(best, score);
        beta = Math.min(beta, best);
      }

      if (ctx.pruning && beta <= alpha) {
        ctx.stats.cutoffs++;
        break;
      }
    }

    return best;
  }
}
