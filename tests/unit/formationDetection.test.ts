import fc from 'fast-check';

import { Board } from '../../src/shared/engine/Board';
import {
  countFormations,
  findAllFormations,
  findNewFormations,
  findOpenWindows,
} from '../../src/shared/engine/formationDetection';
import { LETTERS, positionToString } from '../../src/shared/types/game';
import { SeededRNG } from '../../src/shared/utils/rng';

describe('formationDetection', () => {
  describe('findAllFormations', () => {
    it('should find a single horizontal formation', () => {
      const formations = findAllFormations(Board.fromRows(['SOS', '...', '...']));
      expect(formations).toEqual([
        {
          positions: [
            { row: 0, col: 0 },
            { row: 0, col: 1 },
            { row: 0, col: 2 },
          ],
          direction: 'horizontal',
        },
      ]);
    });

    it('should count each geometric line once in every direction', () => {
      const board = Board.fromRows(['SOS', 'OOO', 'SOS']);
      const formations = findAllFormations(board);
      expect(formations.map((f) => f.direction)).toEqual([
        'horizontal',
        'horizontal',
        'vertical',
        'vertical',
        'diagonal_down_right',
        'diagonal_down_left',
      ]);
      expect(countFormations(board)).toBe(6);
    });

    it('should not count lines that do not read S-O-S', () => {
      expect(countFormations(Board.fromRows(['SSO', 'OSO', 'OOS']))).toBe(0);
      expect(countFormations(Board.fromRows(['OSO', 'SOS', '...']))).toBe(1);
    });
  });

  describe('findNewFormations', () => {
    const board = Board.fromRows(['SOS', 'OOO', 'SOS']);

    it('should find both diagonals through the centre', () => {
      const formations = findNewFormations(board, { row: 1, col: 1 });
      expect(formations.map((f) => f.direction)).toEqual([
        'diagonal_down_right',
        'diagonal_down_left',
      ]);
    });

    it('should find every line starting at a corner', () => {
      const formations = findNewFormations(board, { row: 0, col: 0 });
      expect(formations.map((f) => f.direction)).toEqual([
        'horizontal',
        'vertical',
        'diagonal_down_right',
      ]);
    });

    it('should ignore formations that do not include the played cell', () => {
      const formations = findNewFormations(board, { row: 1, col: 0 });
      expect(formations.map((f) => f.direction)).toEqual(['vertical']);
    });

    it('should not modify the board', () => {
      findNewFormations(board, { row: 1, col: 1 });
      expect(board.toRows()).toEqual(['SOS', 'OOO', 'SOS']);
    });

    it('should match a full re-scan when letters are placed one by one', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 3, max: 6 }),
          fc.integer({ min: 0, max: 1_000_000 }),
          (size, seed) => {
            const rng = new SeededRNG(seed);
            const board = new Board(size);
            let incremental = 0;

            while (!board.isFull()) {
              const empty = board.emptyCells();
              const cell = empty[rng.nextInt(empty.length)];
              board.place(cell.row, cell.col, LETTERS[rng.nextInt(LETTERS.length)]);

              const formations = findNewFormations(board, cell);
              for (const formation of formations) {
                expect(formation.positions.map(positionToString)).toContain(positionToString(cell));
              }
              incremental += formations.length;
            }

            expect(incremental).toBe(countFormations(board));
          }
        ),
        { numRuns: 50 }
      );
    });
  });

  describe('findOpenWindows', () => {
    it('should report each window one letter short of S-O-S', () => {
      const windows = findOpenWindows(Board.fromRows(['SO.', '...', 'S..']));
      const summary = windows.map(({ direction, completeAt, letter }) => ({
        direction,
        completeAt,
        letter,
      }));
      expect(summary).toEqual([
        { direction: 'horizontal', completeAt: { row: 0, col: 2 }, letter: 'S' },
        { direction: 'vertical', completeAt: { row: 1, col: 0 }, letter: 'O' },
      ]);
    });

    it('should find nothing on an empty board', () => {
      expect(findOpenWindows(new Board(4))).toEqual([]);
    });

    it('should ignore completed and blocked windows', () => {
      expect(findOpenWindows(Board.fromRows(['SOS', '...', '...']))).toEqual([]);
      expect(findOpenWindows(Board.fromRows(['OO.', '...', '...']))).toEqual([]);
    });
  });
});
