import {
  Formation,
  FormationDirection,
  Letter,
  Position,
  formationKey,
} from '../types/game';
import type { ReadonlyBoard } from './Board';

/**
 * Formation geometry for SOS.
 *
 * A formation is any three consecutive cells along one of four orientations
 * reading S, O, S. Each orientation is listed once with a canonical step
 * vector, so every geometric line has exactly one ordered triple and the
 * reversed reading never appears as a second formation.
 */

export interface DirectionVector {
  direction: FormationDirection;
  dRow: number;
  dCol: number;
}

export const FORMATION_DIRECTIONS: readonly DirectionVector[] = [
  { direction: 'horizontal', dRow: 0, dCol: 1 },
  { direction: 'vertical', dRow: 1, dCol: 0 },
  { direction: 'diagonal_down_right', dRow: 1, dCol: 1 },
  { direction: 'diagonal_down_left', dRow: 1, dCol: -1 },
];

/** Letters a window must read, in line order. */
export const FORMATION_PATTERN: readonly [Letter, Letter, Letter] = ['S', 'O', 'S'];

/** Window offsets (in steps) that keep a given cell inside a 3-cell window. */
const WINDOW_OFFSETS = [-2, -1, 0] as const;

type Window = [Position, Position, Position];

function windowFrom(start: Position, vector: DirectionVector): Window {
  return [
    start,
    { row: start.row + vector.dRow, col: start.col + vector.dCol },
    { row: start.row + 2 * vector.dRow, col: start.col + 2 * vector.dCol },
  ];
}

function windowInRange(board: ReadonlyBoard, window: Window): boolean {
  return window.every((p) => board.isInRange(p.row, p.col));
}

function windowIsFormation(board: ReadonlyBoard, window: Window): boolean {
  return window.every((p, i) => board.get(p.row, p.col) === FORMATION_PATTERN[i]);
}

/**
 * Every in-range window of the board, each exactly once, grouped by the
 * direction table order and then row-major by start cell.
 */
function allWindows(board: ReadonlyBoard): Array<{ window: Window; vector: DirectionVector }> {
  const result: Array<{ window: Window; vector: DirectionVector }> = [];
  for (const vector of FORMATION_DIRECTIONS) {
    for (let row = 0; row < board.size; row++) {
      for (let col = 0; col < board.size; col++) {
        const window = windowFrom({ row, col }, vector);
        if (windowInRange(board, window)) {
          result.push({ window, vector });
        }
      }
    }
  }
  return result;
}

/**
 * Formations that include the just-played cell.
 *
 * A formation not touching `played` existed before the move, so only the
 * windows through `played` are inspected: for each direction, the three
 * windows that place `played` at index 2, 1 or 0, skipping any window that
 * leaves the board. The board is not modified.
 */
export function findNewFormations(board: ReadonlyBoard, played: Position): Formation[] {
  const formations: Formation[] = [];
  const seen = new Set<string>();

  for (const vector of FORMATION_DIRECTIONS) {
    for (const offset of WINDOW_OFFSETS) {
      const start = {
        row: played.row + offset * vector.dRow,
        col: played.col + offset * vector.dCol,
      };
      const window = windowFrom(start, vector);
      if (!windowInRange(board, window) || !windowIsFormation(board, window)) {
        continue;
      }

      const formation: Formation = { positions: window, direction: vector.direction };
      const key = formationKey(formation);
      if (!seen.has(key)) {
        seen.add(key);
        formations.push(formation);
      }
    }
  }

  return formations;
}

/**
 * Full-board scan for every completed formation. Used to cross-check the
 * incremental scoring in tests and soak runs.
 */
export function findAllFormations(board: ReadonlyBoard): Formation[] {
  return allWindows(board)
    .filter(({ window }) => windowIsFormation(board, window))
    .map(({ window, vector }) => ({ positions: window, direction: vector.direction }));
}

export function countFormations(board: ReadonlyBoard): number {
  return findAllFormations(board).length;
}

/**
 * A window one placement away from completion (`SO_`, `_OS` or `S_S`).
 */
export interface OpenWindow {
  positions: readonly [Position, Position, Position];
  direction: FormationDirection;
  /** The empty cell that completes the window. */
  completeAt: Position;
  /** Letter that must be placed at `completeAt`. */
  letter: Letter;
}

export function findOpenWindows(board: ReadonlyBoard): OpenWindow[] {
  const open: OpenWindow[] = [];

  for (const { window, vector } of allWindows(board)) {
    let emptyIndex = -1;
    let matches = true;

    for (let i = 0; i < window.length; i++) {
      const p = window[i];
      const cell = p ? board.get(p.row, p.col) : null;
      if (cell === null) {
        if (emptyIndex !== -1) {
          matches = false;
          break;
        }
        emptyIndex = i;
      } else if (cell !== FORMATION_PATTERN[i]) {
        matches = false;
        break;
      }
    }

    const completeAt = window[emptyIndex];
    const letter = FORMATION_PATTERN[emptyIndex];
    if (matches && completeAt && letter) {
      open.push({ positions: window, direction: vector.direction, completeAt, letter });
    }
  }

  return open;
}
