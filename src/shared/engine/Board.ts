import { Cell, Letter, MAX_BOARD_SIZE, MIN_BOARD_SIZE, Position, isLetter } from '../types/game';
import {
  BoardConstraintViolation,
  EngineError,
  EngineErrorCode,
  InvalidMoveError,
  OutOfRangeError,
} from './errors';

/** Character used for an empty cell by {@link Board.toRows} / {@link Board.fromRows}. */
export const EMPTY_CELL_CHAR = '.';

/**
 * Read-only view of a board. Everything outside the engine (evaluator,
 * players, rendering) works against this interface.
 */
export interface ReadonlyBoard {
  readonly size: number;
  get(row: number, col: number): Cell;
  isInRange(row: number, col: number): boolean;
  isEmpty(row: number, col: number): boolean;
  isFull(): boolean;
  emptyCells(): Position[];
  filledCount(): number;
  toRows(): string[];
}

/**
 * n×n SOS grid. Cells are stored row-major; a placed letter is never
 * overwritten.
 */
export class Board implements ReadonlyBoard {
  readonly size: number;
  private readonly cells: Cell[];
  private filled = 0;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_SIZE,
        `Board size must be an integer from ${MIN_BOARD_SIZE} to ${MAX_BOARD_SIZE}, got ${size}`,
        { size }
      );
    }
    this.size = size;
    this.cells = new Array<Cell>(size * size).fill(null);
  }

  /**
   * Build a board from one string per row, `S`, `O` or `.` per cell.
   * Mostly used by fixtures and tests.
   */
  static fromRows(rows: readonly string[]): Board {
    const board = new Board(rows.length);
    rows.forEach((line, row) => {
      if (line.length !== rows.length) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_LAYOUT,
          `Row ${row} has ${line.length} cells, expected ${rows.length}`,
          { row, line }
        );
      }
      for (let col = 0; col < line.length; col++) {
        const ch = line.charAt(col);
        if (ch === EMPTY_CELL_CHAR) continue;
        if (!isLetter(ch)) {
          throw new BoardConstraintViolation(
            EngineErrorCode.BOARD_INVALID_LAYOUT,
            `Unexpected character '${ch}' at (${row}, ${col})`,
            { row, col, ch }
          );
        }
        board.place(row, col, ch);
      }
    });
    return board;
  }

  isInRange(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < this.size &&
      col >= 0 &&
      col < this.size
    );
  }

  get(row: number, col: number): Cell {
    if (!this.isInRange(row, col)) {
      throw new OutOfRangeError(row, col, this.size);
    }
    return this.cells[this.index(row, col)] ?? null;
  }

  isEmpty(row: number, col: number): boolean {
    return this.get(row, col) === null;
  }

  place(row: number, col: number, letter: Letter): void {
    if (!this.isInRange(row, col)) {
      throw new InvalidMoveError(
        EngineErrorCode.MOVE_OUT_OF_RANGE,
        `Position (${row}, ${col}) is outside the ${this.size}x${this.size} board`,
        { row, col, size: this.size }
      );
    }
    if (!isLetter(letter)) {
      throw new InvalidMoveError(
        EngineErrorCode.MOVE_INVALID_LETTER,
        `Letter must be S or O, got ${String(letter)}`,
        { row, col, letter }
      );
    }
    const idx = this.index(row, col);
    const existing = this.cells[idx];
    if (existing) {
      throw new InvalidMoveError(
        EngineErrorCode.MOVE_CELL_OCCUPIED,
        `Cell (${row}, ${col}) already holds ${existing}`,
        { row, col, existing }
      );
    }
    this.cells[idx] = letter;
    this.filled++;
  }

  /**
   * Retract a placed letter. Only GameState.undoMove calls this, to back out
   * of a search line.
   */
  removeLetter(row: number, col: number): void {
    if (!this.isInRange(row, col)) {
      throw new OutOfRangeError(row, col, this.size);
    }
    const idx = this.index(row, col);
    if (this.cells[idx] === null) {
      throw new EngineError(
        EngineErrorCode.INTERNAL_ASSERTION_FAILED,
        `Cannot remove a letter from empty cell (${row}, ${col})`,
        { row, col },
        'Board'
      );
    }
    this.cells[idx] = null;
    this.filled--;
  }

  isFull(): boolean {
    return this.filled === this.cells.length;
  }

  filledCount(): number {
    return this.filled;
  }

  /** Empty positions in row-major order. */
  emptyCells(): Position[] {
    const result: Position[] = [];
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        if (this.cells[this.index(row, col)] === null) {
          result.push({ row, col });
        }
      }
    }
    return result;
  }

  toRows(): string[] {
    const rows: string[] = [];
    for (let row = 0; row < this.size; row++) {
      let line = '';
      for (let col = 0; col < this.size; col++) {
        line += this.cells[this.index(row, col)] ?? EMPTY_CELL_CHAR;
      }
      rows.push(line);
    }
    return rows;
  }

  clone(): Board {
    const copy = new Board(this.size);
    for (let i = 0; i < this.cells.length; i++) {
      copy.cells[i] = this.cells[i] ?? null;
    }
    copy.filled = this.filled;
    return copy;
  }

  private index(row: number, col: number): number {
    return row * this.size + col;
  }
}
