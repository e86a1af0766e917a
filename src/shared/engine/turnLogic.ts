import type { GamePhase, PlayerNumber } from '../types/game';
import { otherPlayer } from '../types/game';

/**
 * Turn sequencing for SOS.
 *
 * A move that completes at least one formation keeps the turn with the
 * mover (a bonus move, which may chain); any other move passes the turn.
 * Both the GameState and the search recursion go through this function, so
 * there is no ply-parity assumption anywhere in the engine.
 */
export function nextPlayerAfterMove(mover: PlayerNumber, formationsScored: number): PlayerNumber {
  return formationsScored > 0 ? mover : otherPlayer(mover);
}

/**
 * Phase after a move: the game ends exactly when the board fills.
 */
export function phaseAfterMove(boardFull: boolean): GamePhase {
  return boardFull ? 'terminal' : 'in_progress';
}
