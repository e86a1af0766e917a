/**
 * Game Session - drives one SOS game from the first move to a full board
 *
 * The session owns the GameState and asks whichever player is to move for a
 * move, applies it, and repeats until the board is full. Bonus moves need no
 * special handling here: after a scoring move the state simply reports the
 * same player to move again.
 *
 * Presentation is left to an optional {@link GameObserver}; the session
 * itself only logs.
 */

import { GameState, MoveResult } from '../shared/engine/GameState';
import { InvalidMoveError, wrapEngineError } from '../shared/engine/errors';
import { Player, PlayerKind } from '../shared/ai/players';
import {
  GameOutcome,
  PlayerNumber,
  PlayerTally,
  moveToString,
} from '../shared/types/game';
import { isSearchTraceEnabled } from '../shared/utils/envFlags';
import { logger } from './utils/logger';

export type PlayerSeats = Record<PlayerNumber, Player>;

export interface GameSummary {
  scores: PlayerTally;
  outcome: GameOutcome;
  /** Moves applied, bonus moves included. */
  moves: number;
  /** Moves after which the mover kept the turn. */
  bonusMoves: number;
}

export interface GameObserver {
  onMoveApplied?(result: MoveResult, state: GameState): void;
  onInvalidMove?(error: InvalidMoveError, player: PlayerNumber): void;
  onGameOver?(summary: GameSummary, state: GameState): void;
}

export class GameSession {
  private readonly state: GameState;
  private readonly players: PlayerSeats;
  private readonly observer: GameObserver;
  private bonusMoves = 0;

  constructor(state: GameState, players: PlayerSeats, observer: GameObserver = {}) {
    this.state = state;
    this.players = players;
    this.observer = observer;
  }

  getState(): GameState {
    return this.state;
  }

  /**
   * Play until the board is full and report the result.
   *
   * An illegal move from a human player is reported and the same player is
   * asked again. An illegal move from a random or minimax player is a bug
   * and is rethrown.
   */
  async run(): Promise<GameSummary> {
    logger.info('Game started', {
      boardSize: this.state.getBoard().size,
      player1: this.players[1].kind,
      player2: this.players[2].kind,
    });

    while (!this.state.isTerminal()) {
      await this.playTurn();
    }

    const outcome = this.state.winner();
    if (!outcome) {
      throw wrapEngineError(new Error('Game loop ended before the board was full'), 'GameSession');
    }

    const summary: GameSummary = {
      scores: { ...this.state.getScores() },
      outcome,
      moves: this.state.getHistory().length,
      bonusMoves: this.bonusMoves,
    };

    logger.info('Game finished', {
      scores: summary.scores,
      outcome: summary.outcome,
      moves: summary.moves,
      bonusMoves: summary.bonusMoves,
    });
    this.observer.onGameOver?.(summary, this.state);

    return summary;
  }

  private async playTurn(): Promise<void> {
    const playerNumber = this.state.getCurrentPlayer();
    const player = this.players[playerNumber];
    const move = await player.chooseMove(this.state);

    let result: MoveResult;
    try {
      result = this.state.applyMove(move);
    } catch (error) {
      if (error instanceof InvalidMoveError && player.kind === PlayerKind.HUMAN) {
        logger.warn('Engine rejected move', {
          playerNumber,
          move,
          code: error.code,
          reason: error.message,
        });
        this.observer.onInvalidMove?.(error, playerNumber);
        return;
      }
      logger.error('Engine rejected move from automated player', {
        playerNumber,
        playerKind: player.kind,
        move,
        error,
      });
      throw error;
    }

    if (result.bonusMove) {
      this.bonusMoves++;
    }

    if (player.kind === PlayerKind.MINIMAX) {
      const search = player.getLastSearch();
      if (search) {
        const meta = {
          playerNumber,
          depth: search.depth,
          score: search.score,
          ...search.stats,
        };
        if (isSearchTraceEnabled()) {
          logger.info('Search completed', meta);
        } else {
          logger.debug('Search completed', meta);
        }
      }
    }

    logger.debug('Move applied', {
      playerNumber,
      move: moveToString(result.move),
      formations: result.formations.length,
      nextPlayer: result.nextPlayer,
      terminal: result.terminal,
    });
    this.observer.onMoveApplied?.(result, this.state);
  }
}
