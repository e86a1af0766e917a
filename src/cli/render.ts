import type { ReadonlyBoard } from '../shared/engine/Board';
import { EMPTY_CELL_CHAR } from '../shared/engine/Board';
import type { GameOutcome, PlayerTally } from '../shared/types/game';

/**
 * Text grid with 0-based row and column indices, e.g. for a 3x3 board:
 *
 * ```
 *      0   1   2
 *  0 | S | . | . |
 *  1 | . | O | . |
 *  2 | . | . | . |
 * ```
 */
export function renderBoard(board: ReadonlyBoard): string {
  const indices: string[] = [];
  for (let c = 0; c < board.size; c++) {
    indices.push(String(c).padEnd(4));
  }
  const header = `     ${indices.join('')}`.trimEnd();

  const lines = [header];
  for (let r = 0; r < board.size; r++) {
    const cells: string[] = [];
    for (let c = 0; c < board.size; c++) {
      cells.push(board.get(r, c) ?? EMPTY_CELL_CHAR);
    }
    lines.push(`${String(r).padStart(2)} | ${cells.join(' | ')} |`);
  }
  return lines.join('\n');
}

export function renderScores(scores: PlayerTally): string {
  return `Score - Player 1: ${scores[1]}  Player 2: ${scores[2]}`;
}

export function renderOutcome(outcome: GameOutcome): string {
  return outcome.kind === 'win' ? `Player ${outcome.winner} wins` : "It's a draw";
}
