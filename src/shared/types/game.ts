/**
 * Core value types shared by the SOS engine, the search agent and the
 * console host.
 *
 * Coordinates are zero-based `(row, col)` pairs with row 0 at the top of the
 * board. A cell holds a {@link Letter} or `null` when empty.
 */

export type Letter = 'S' | 'O';

/** Letters a player may place, in the order move generation emits them. */
export const LETTERS: readonly Letter[] = ['S', 'O'];

export type Cell = Letter | null;

/** Smallest board on which a three-cell formation fits. */
export const MIN_BOARD_SIZE = 3;

/** Largest board the engine allocates. */
export const MAX_BOARD_SIZE = 50;

export type PlayerNumber = 1 | 2;

export interface Position {
  row: number;
  col: number;
}

export interface Move {
  row: number;
  col: number;
  letter: Letter;
}

export type FormationDirection =
  | 'horizontal'
  | 'vertical'
  | 'diagonal_down_right'
  | 'diagonal_down_left';

/**
 * A completed S-O-S line. `positions` is ordered along `direction`, so the
 * letters at those positions read S, O, S.
 */
export interface Formation {
  positions: readonly [Position, Position, Position];
  direction: FormationDirection;
}

export type GamePhase = 'in_progress' | 'terminal';

export type GameOutcome = { kind: 'win'; winner: PlayerNumber } | { kind: 'draw' };

/** Per-player counters (scores, move counts). */
export type PlayerTally = Record<PlayerNumber, number>;

export function isLetter(value: unknown): value is Letter {
  return value === 'S' || value === 'O';
}

export function otherPlayer(player: PlayerNumber): PlayerNumber {
  return player === 1 ? 2 : 1;
}

export function positionToString(position: Position): string {
  return `${position.row},${position.col}`;
}

export function moveToString(move: Move): string {
  return `${move.letter}@${move.row},${move.col}`;
}

export function movesEqual(a: Move, b: Move): boolean {
  return a.row === b.row && a.col === b.col && a.letter === b.letter;
}

/** Identity key of a formation: its ordered coordinate triple. */
export function formationKey(formation: Formation): string {
  return formation.positions.map(positionToString).join('|');
}
