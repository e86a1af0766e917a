/**
 * Engine Domain Errors - Structured error types for the SOS engine
 *
 * Every failure the engine reports is an {@link EngineError} carrying a
 * machine-readable code, a context bag for debugging and the domain that
 * raised it. Callers (the game session, the human input loop, tests) branch
 * on the concrete class or on `code`; none of these errors leave a
 * GameState partially mutated.
 *
 * Error Categories:
 * - **InvalidMoveError**: out-of-range coordinates, occupied cell, bad letter
 * - **OutOfRangeError**: a coordinate query outside the grid
 * - **BoardConstraintViolation**: board construction problems
 * - **IllegalStateTransitionError**: mutating a finished game, searching a
 *   finished game, undoing the wrong move
 *
 * Usage:
 * ```typescript
 * import { InvalidMoveError, isEngineError } from './errors';
 *
 * try {
 *   state.applyMove({ row: 0, col: 0, letter: 'S' });
 * } catch (error) {
 *   if (error instanceof InvalidMoveError) {
 *     // ask the player again
 *   }
 * }
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine error codes.
 *
 * Error codes are prefixed by category:
 * - MOVE_*: Rejected moves
 * - BOARD_*: Board geometry issues
 * - STATE_*: Invalid game state transitions
 * - INTERNAL_*: Bugs
 */
export enum EngineErrorCode {
  /** Move coordinates fall outside the board */
  MOVE_OUT_OF_RANGE = 'MOVE_OUT_OF_RANGE',
  /** Target cell already holds a letter */
  MOVE_CELL_OCCUPIED = 'MOVE_CELL_OCCUPIED',
  /** Letter is not S or O */
  MOVE_INVALID_LETTER = 'MOVE_INVALID_LETTER',

  /** Coordinate query outside the board */
  BOARD_OUT_OF_RANGE = 'BOARD_OUT_OF_RANGE',
  /** Board size is not an integer >= 3 */
  BOARD_INVALID_SIZE = 'BOARD_INVALID_SIZE',
  /** Row layout handed to Board.fromRows is malformed */
  BOARD_INVALID_LAYOUT = 'BOARD_INVALID_LAYOUT',

  /** Mutation attempted after the board filled up */
  STATE_GAME_OVER = 'STATE_GAME_OVER',
  /** undoMove called with a move other than the last one applied */
  STATE_UNDO_MISMATCH = 'STATE_UNDO_MISMATCH',
  /** Search requested on a finished game */
  STATE_SEARCH_ON_TERMINAL = 'STATE_SEARCH_ON_TERMINAL',

  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  MOVE_: 'Rejected move',
  BOARD_: 'Board geometry constraint violation',
  STATE_: 'Invalid game state transition',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Component that raised the error (e.g. 'Board', 'GameState', 'Search') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * A move the rules reject: coordinates off the board, an occupied cell, or a
 * letter other than S/O. The caller may retry with a corrected move.
 */
export class InvalidMoveError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

/**
 * A read of a coordinate outside the grid.
 */
export class OutOfRangeError extends EngineError {
  constructor(row: number, col: number, size: number, domain: string = 'Board') {
    super(
      EngineErrorCode.BOARD_OUT_OF_RANGE,
      `Position (${row}, ${col}) is outside the ${size}x${size} board`,
      { row, col, size },
      domain
    );
    this.name = 'OutOfRangeError';
    Object.setPrototypeOf(this, OutOfRangeError.prototype);
  }
}

/**
 * Board construction problems (size below the minimum, malformed layouts).
 */
export class BoardConstraintViolation extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Board'
  ) {
    super(code, message, context, domain);
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

/**
 * An operation not allowed in the current phase: any mutation of a finished
 * game, a search started on a finished game, or an undo that does not match
 * the last applied move.
 */
export class IllegalStateTransitionError extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'GameState'
  ) {
    super(code, message, context, domain);
    this.name = 'IllegalStateTransitionError';
    Object.setPrototypeOf(this, IllegalStateTransitionError.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidMoveError(error: unknown): error is InvalidMoveError {
  return error instanceof InvalidMoveError;
}

export function isIllegalStateTransitionError(
  error: unknown
): error is IllegalStateTransitionError {
  return error instanceof IllegalStateTransitionError;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Used at host boundaries to normalise whatever was thrown before logging.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
