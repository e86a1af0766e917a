import {
  askBoardSize,
  askDepth,
  askPlayerKind,
  createConsoleMoveSource,
  parseMoveInput,
} from '../../src/cli/prompts';
import { PlayerKind } from '../../src/shared/ai/players';
import { mv, playMoves, scriptedPrompter } from '../utils/fixtures';

describe('prompts', () => {
  describe('parseMoveInput', () => {
    it('should parse row, column and letter', () => {
      expect(parseMoveInput('0 2 s', 3)).toEqual({ ok: true, move: mv(0, 2, 'S') });
      expect(parseMoveInput('  1   1   O ', 3)).toEqual({ ok: true, move: mv(1, 1, 'O') });
    });

    it('should explain the expected shape', () => {
      expect(parseMoveInput('1 1', 3)).toEqual({
        ok: false,
        reason: 'Enter a move as: row col letter (e.g. 0 2 S)',
      });
    });

    it('should reject coordinates that are not whole numbers', () => {
      expect(parseMoveInput('-1 0 S', 3)).toEqual({
        ok: false,
        reason: 'Row and column must be whole numbers',
      });
      expect(parseMoveInput('a b S', 3)).toMatchObject({ ok: false });
    });

    it('should reject coordinates off the board', () => {
      expect(parseMoveInput('3 0 S', 3)).toEqual({
        ok: false,
        reason: 'Row and column must be between 0 and 2',
      });
    });

    it('should reject other letters', () => {
      expect(parseMoveInput('0 0 X', 3)).toEqual({ ok: false, reason: 'Letter must be S or O' });
    });
  });

  describe('setup questions', () => {
    it('should keep asking until the board size is valid', async () => {
      const prompter = scriptedPrompter(['2', 'abc', '51', '4']);
      await expect(askBoardSize(prompter)).resolves.toBe(4);
      expect(prompter.questions).toHaveLength(4);
      expect(prompter.output).toEqual([
        'Please enter a whole number from 3 to 50.',
        'Please enter a whole number from 3 to 50.',
        'Please enter a whole number from 3 to 50.',
      ]);
    });

    it('should map the menu choice to a player kind', async () => {
      const prompter = scriptedPrompter(['0', '3']);
      await expect(askPlayerKind(prompter, 2)).resolves.toBe(PlayerKind.MINIMAX);
      expect(prompter.questions[0]).toBe('Player 2 - 1) Human  2) Random  3) Minimax: ');
      expect(prompter.output).toEqual(['Please choose 1 to 3.']);
    });

    it('should default the depth from the board size on empty input', async () => {
      const prompter = scriptedPrompter(['']);
      await expect(askDepth(prompter, 1, 4)).resolves.toBe(2);
      expect(prompter.questions[0]).toBe('Search depth for player 1 [2]: ');
    });

    it('should accept an explicit depth', async () => {
      const prompter = scriptedPrompter(['0', '3']);
      await expect(askDepth(prompter, 1, 4)).resolves.toBe(3);
      expect(prompter.output).toEqual(['Please enter a whole number of at least 1.']);
    });
  });

  describe('console move source', () => {
    it('should show the board and re-ask until the input parses', async () => {
      const prompter = scriptedPrompter(['bad', '0 1 o']);
      const state = playMoves(3, [mv(0, 0, 'S')]);
      const source = createConsoleMoveSource(prompter);

      await expect(source.requestMove(state, 2)).resolves.toEqual(mv(0, 1, 'O'));
      expect(prompter.output).toEqual([
        '     0   1   2\n 0 | S | . | . |\n 1 | . | . | . |\n 2 | . | . | . |',
        'Score - Player 1: 0  Player 2: 0',
        'Enter a move as: row col letter (e.g. 0 2 S)',
      ]);
      expect(prompter.questions).toEqual([
        'Player 2, your move (row col letter): ',
        'Player 2, your move (row col letter): ',
      ]);
    });
  });
});
