/**
 * Shared AI Module
 *
 * Adversarial search and the player variants built on top of it.
 *
 * @module ai
 */

export {
  SearchAgent,
  defaultSearchDepth,
  effectiveSearchDepth,
  type SearchOptions,
  type SearchResult,
  type SearchStats,
} from './SearchAgent';

export {
  PlayerKind,
  createHumanPlayer,
  createMinimaxPlayer,
  createPlayer,
  createRandomPlayer,
  type HumanPlayer,
  type MinimaxPlayer,
  type MoveInputSource,
  type Player,
  type PlayerSpec,
  type RandomPlayer,
} from './players';
