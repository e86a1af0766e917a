import {
  Formation,
  GameOutcome,
  GamePhase,
  LETTERS,
  Move,
  PlayerNumber,
  PlayerTally,
  isLetter,
  moveToString,
  movesEqual,
} from '../types/game';
import { Board, ReadonlyBoard } from './Board';
import {
  EngineErrorCode,
  IllegalStateTransitionError,
  InvalidMoveError,
} from './errors';
import { findNewFormations } from './formationDetection';
import { nextPlayerAfterMove, phaseAfterMove } from './turnLogic';

/**
 * Outcome of a single applied move.
 */
export interface MoveResult {
  move: Move;
  player: PlayerNumber;
  /** Formations completed by this move (empty when none). */
  formations: Formation[];
  nextPlayer: PlayerNumber;
  /** True when the mover keeps the turn. */
  bonusMove: boolean;
  terminal: boolean;
}

/**
 * One entry of the move history.
 */
export interface MoveRecord {
  move: Move;
  player: PlayerNumber;
  formations: number;
}

/**
 * Everything about a GameState except the board, captured before a move so
 * {@link GameState.undoMove} can restore it exactly.
 */
export interface GameSnapshot {
  readonly currentPlayer: PlayerNumber;
  readonly scores: Readonly<PlayerTally>;
  readonly moveCounts: Readonly<PlayerTally>;
  readonly historyLength: number;
}

/**
 * Mutable state of one SOS game: board, player to move, scores and history.
 *
 * Phase machine: `in_progress` → `in_progress` on every legal move that
 * leaves an empty cell, `in_progress` → `terminal` on the move that fills the
 * board. `terminal` is absorbing: {@link applyMove} rejects every move.
 */
export class GameState {
  private readonly board: Board;
  private currentPlayer: PlayerNumber;
  private scores: PlayerTally;
  private moveCounts: PlayerTally;
  private readonly history: MoveRecord[];

  private constructor(
    board: Board,
    currentPlayer: PlayerNumber,
    scores: PlayerTally,
    moveCounts: PlayerTally,
    history: MoveRecord[]
  ) {
    this.board = board;
    this.currentPlayer = currentPlayer;
    this.scores = scores;
    this.moveCounts = moveCounts;
    this.history = history;
  }

  /** New game on an empty `size`×`size` board with player 1 to move. */
  static create(size: number): GameState {
    return new GameState(new Board(size), 1, { 1: 0, 2: 0 }, { 1: 0, 2: 0 }, []);
  }

  getBoard(): ReadonlyBoard {
    return this.board;
  }

  getCurrentPlayer(): PlayerNumber {
    return this.currentPlayer;
  }

  getScore(player: PlayerNumber): number {
    return this.scores[player];
  }

  getScores(): Readonly<PlayerTally> {
    return { ...this.scores };
  }

  getMoveCount(player: PlayerNumber): number {
    return this.moveCounts[player];
  }

  getHistory(): readonly MoveRecord[] {
    return this.history;
  }

  getPhase(): GamePhase {
    return phaseAfterMove(this.board.isFull());
  }

  isTerminal(): boolean {
    return this.board.isFull();
  }

  /**
   * Every legal move: each empty cell in row-major order, S before O.
   */
  legalMoves(): Move[] {
    if (this.isTerminal()) {
      return [];
    }
    const moves: Move[] = [];
    for (const { row, col } of this.board.emptyCells()) {
      for (const letter of LETTERS) {
        moves.push({ row, col, letter });
      }
    }
    return moves;
  }

  snapshot(): GameSnapshot {
    return {
      currentPlayer: this.currentPlayer,
      scores: { ...this.scores },
      moveCounts: { ...this.moveCounts },
      historyLength: this.history.length,
    };
  }

  /**
   * Apply a move for the player to move.
   *
   * @throws IllegalStateTransitionError when the game is already over
   * @throws InvalidMoveError when the move is off the board, targets an
   *   occupied cell or carries a letter other than S/O
   */
  applyMove(move: Move): MoveResult {
    if (this.isTerminal()) {
      throw new IllegalStateTransitionError(
        EngineErrorCode.STATE_GAME_OVER,
        `Game is over; cannot apply ${moveToString(move)}`,
        { move }
      );
    }
    if (!isLetter(move.letter)) {
      throw new InvalidMoveError(
        EngineErrorCode.MOVE_INVALID_LETTER,
        `Letter must be S or O, got ${String(move.letter)}`,
        { move },
        'GameState'
      );
    }

    // Board.place validates before writing, so a rejected move leaves the
    // state untouched.
    this.board.place(move.row, move.col, move.letter);

    const mover = this.currentPlayer;
    const formations = findNewFormations(this.board, { row: move.row, col: move.col });
    const recorded: Move = { row: move.row, col: move.col, letter: move.letter };

    this.scores = { ...this.scores, [mover]: this.scores[mover] + formations.length };
    this.moveCounts = { ...this.moveCounts, [mover]: this.moveCounts[mover] + 1 };
    this.history.push({ move: recorded, player: mover, formations: formations.length });
    this.currentPlayer = nextPlayerAfterMove(mover, formations.length);

    return {
      move: recorded,
      player: mover,
      formations,
      nextPlayer: this.currentPlayer,
      bonusMove: this.currentPlayer === mover,
      terminal: this.isTerminal(),
    };
  }

  /**
   * Back out the last applied move, restoring the state captured by
   * {@link snapshot} right before it. Used by the search agent.
   *
   * @throws IllegalStateTransitionError when `move` is not the last move
   *   applied or `prior` was not taken right before it
   */
  undoMove(move: Move, prior: GameSnapshot): void {
    const last = this.history[this.history.length - 1];
    if (!last || !movesEqual(last.move, move) || prior.historyLength !== this.history.length - 1) {
      throw new IllegalStateTransitionError(
        EngineErrorCode.STATE_UNDO_MISMATCH,
        `Cannot undo ${moveToString(move)}: it is not the last applied move`,
        { move, lastMove: last?.move, historyLength: this.history.length }
      );
    }

    this.board.removeLetter(move.row, move.col);
    this.history.pop();
    this.currentPlayer = prior.currentPlayer;
    this.scores = { ...prior.scores };
    this.moveCounts = { ...prior.moveCounts };
  }

  /**
   * Final result once the board is full; `null` while the game is running.
   * Equal scores are a draw.
   */
  winner(): GameOutcome | null {
    if (!this.isTerminal()) {
      return null;
    }
    const one = this.scores[1];
    const two = this.scores[2];
    if (one === two) {
      return { kind: 'draw' };
    }
    return { kind: 'win', winner: one > two ? 1 : 2 };
  }

  clone(): GameState {
    return new GameState(
      this.board.clone(),
      this.currentPlayer,
      { ...this.scores },
      { ...this.moveCounts },
      this.history.map((record) => ({ ...record, move: { ...record.move } }))
    );
  }
}
