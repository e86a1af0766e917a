// =============================================================================
// SOS ENGINE - PUBLIC API
// =============================================================================
// Hosts (the console program, scripts, tests) import the engine from here.
// Everything exported is synchronous and free of I/O; logging belongs to the
// host.
// =============================================================================

export type {
  Cell,
  Formation,
  FormationDirection,
  GameOutcome,
  GamePhase,
  Letter,
  Move,
  PlayerNumber,
  PlayerTally,
  Position,
} from '../types/game';
export {
  LETTERS,
  MAX_BOARD_SIZE,
  MIN_BOARD_SIZE,
  formationKey,
  isLetter,
  moveToString,
  movesEqual,
  otherPlayer,
  positionToString,
} from '../types/game';

// Board
export { Board, EMPTY_CELL_CHAR, type ReadonlyBoard } from './Board';

// Formations
export {
  FORMATION_DIRECTIONS,
  FORMATION_PATTERN,
  countFormations,
  findAllFormations,
  findNewFormations,
  findOpenWindows,
  type DirectionVector,
  type OpenWindow,
} from './formationDetection';

// Game state & turn sequencing
export {
  GameState,
  type GameSnapshot,
  type MoveRecord,
  type MoveResult,
} from './GameState';
export { nextPlayerAfterMove, phaseAfterMove } from './turnLogic';

// Evaluation
export {
  HEURISTIC_WEIGHTS_DEFAULT,
  HEURISTIC_WEIGHTS_MATERIAL_ONLY,
  evaluatePosition,
  type EvaluationView,
  type HeuristicWeights,
} from './heuristicEvaluation';

// Errors
export {
  BoardConstraintViolation,
  ERROR_CATEGORY_DESCRIPTIONS,
  EngineError,
  EngineErrorCode,
  IllegalStateTransitionError,
  InvalidMoveError,
  OutOfRangeError,
  isEngineError,
  isIllegalStateTransitionError,
  isInvalidMoveError,
  wrapEngineError,
  type EngineErrorJSON,
} from './errors';
