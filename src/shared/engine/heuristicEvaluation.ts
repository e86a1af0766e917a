import type { PlayerNumber } from '../types/game';
import { otherPlayer } from '../types/game';
import type { GameState } from './GameState';
import { findOpenWindows } from './formationDetection';

/**
 * Weight profile for {@link evaluatePosition}.
 */
export interface HeuristicWeights {
  /** Value of one formation of score difference. */
  formation: number;
  /**
   * Value of one window a single placement away from S-O-S. Credited to the
   * player to move, who can cash it in and keep the turn.
   */
  openWindow: number;
}

export const HEURISTIC_WEIGHTS_DEFAULT: HeuristicWeights = {
  formation: 100,
  openWindow: 10,
};

/**
 * Only score difference counts; used where search should see raw material.
 */
export const HEURISTIC_WEIGHTS_MATERIAL_ONLY: HeuristicWeights = {
  formation: 1,
  openWindow: 0,
};

/** The part of GameState the evaluator reads. */
export type EvaluationView = Pick<
  GameState,
  'getBoard' | 'getScore' | 'getCurrentPlayer' | 'isTerminal'
>;

/**
 * Static evaluation from `perspective`'s point of view.
 *
 * - Terminal positions: `formation × (own score − opponent score)`, which is
 *   the ground truth the heuristic approximates.
 * - Running positions add `±openWindow × open windows`, positive when
 *   `perspective` is to move and negative otherwise.
 *
 * Both terms flip sign when the perspective flips, so
 * `evaluatePosition(s, 1) === -evaluatePosition(s, 2)` for every state.
 */
export function evaluatePosition(
  state: EvaluationView,
  perspective: PlayerNumber,
  weights: HeuristicWeights = HEURISTIC_WEIGHTS_DEFAULT
): number {
  const opponent = otherPlayer(perspective);
  const material = weights.formation * (state.getScore(perspective) - state.getScore(opponent));

  if (state.isTerminal() || weights.openWindow === 0) {
    return material;
  }

  const tempo = state.getCurrentPlayer() === perspective ? 1 : -1;
  const openWindows = findOpenWindows(state.getBoard()).length;

  return material + tempo * weights.openWindow * openWindows;
}
