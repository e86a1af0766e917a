import {
  PlayerKind,
  createHumanPlayer,
  createMinimaxPlayer,
  createPlayer,
  createRandomPlayer,
} from '../../src/shared/ai/players';
import { SearchAgent } from '../../src/shared/ai/SearchAgent';
import { IllegalStateTransitionError } from '../../src/shared/engine/errors';
import { GameState } from '../../src/shared/engine/GameState';
import type { Move, PlayerNumber } from '../../src/shared/types/game';
import { NO_FORMATION_GAME, mv, playMoves, playRandomPrefix } from '../utils/fixtures';

describe('players', () => {
  describe('random player', () => {
    it('should map the low end of the range to the first legal move', async () => {
      const player = createRandomPlayer(() => 0);
      await expect(player.chooseMove(GameState.create(3))).resolves.toEqual(mv(0, 0, 'S'));
    });

    it('should map the high end of the range to the last legal move', async () => {
      const player = createRandomPlayer(() => 0.999);
      await expect(player.chooseMove(GameState.create(3))).resolves.toEqual(mv(2, 2, 'O'));
    });

    it('should only pick from the remaining legal moves', async () => {
      const state = playMoves(3, NO_FORMATION_GAME.slice(0, 8));
      const player = createRandomPlayer(() => 0.5);
      await expect(player.chooseMove(state)).resolves.toEqual(mv(2, 2, 'O'));
    });

    it('should fail when the game is already over', async () => {
      const player = createRandomPlayer(() => 0);
      await expect(player.chooseMove(playMoves(3, NO_FORMATION_GAME))).rejects.toBeInstanceOf(
        IllegalStateTransitionError
      );
    });
  });

  describe('minimax player', () => {
    it('should play the move the search agent chooses and keep the result', async () => {
      const state = playRandomPrefix(4, 3, 4);
      const player = createMinimaxPlayer(2);
      expect(player.getLastSearch()).toBeNull();

      const move = await player.chooseMove(state);
      const expected = new SearchAgent().search(state, 2);

      expect(move).toEqual(expected.move);
      expect(player.getLastSearch()).toMatchObject({
        move: expected.move,
        depth: 2,
        player: state.getCurrentPlayer(),
      });
    });
  });

  describe('human player', () => {
    it('should ask the input source on behalf of the player to move', async () => {
      const calls: PlayerNumber[] = [];
      const player = createHumanPlayer({
        requestMove: async (_state, playerNumber) => {
          calls.push(playerNumber);
          return mv(1, 1, 'O');
        },
      });
      const state = playMoves(3, [mv(0, 0, 'S')]);

      await expect(player.chooseMove(state)).resolves.toEqual(mv(1, 1, 'O'));
      expect(calls).toEqual([2]);
    });
  });

  describe('createPlayer', () => {
    it('should build each kind from its spec', () => {
      const input = { requestMove: async (): Promise<Move> => mv(0, 0, 'S') };
      expect(createPlayer({ kind: PlayerKind.HUMAN, input }).kind).toBe(PlayerKind.HUMAN);
      expect(createPlayer({ kind: PlayerKind.RANDOM, rng: () => 0 }).kind).toBe(PlayerKind.RANDOM);

      const minimax = createPlayer({ kind: PlayerKind.MINIMAX, depth: 3 });
      expect(minimax).toMatchObject({ kind: PlayerKind.MINIMAX, depth: 3 });
    });
  });
});
