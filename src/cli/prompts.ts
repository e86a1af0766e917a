/**
 * Console prompts for setting up and playing a game.
 *
 * Everything here talks to a {@link Prompter} rather than to readline
 * directly, so tests can drive the prompts with scripted answers.
 */

import * as readline from 'readline/promises';
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE, Move, isLetter } from '../shared/types/game';
import type { GameState } from '../shared/engine/GameState';
import { MoveInputSource, PlayerKind } from '../shared/ai/players';
import { defaultSearchDepth } from '../shared/ai/SearchAgent';
import { renderBoard, renderScores } from './render';

export interface Prompter {
  ask(question: string): Promise<string>;
  write(text: string): void;
  close(): void;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = readline.createInterface({ input, output });
  return {
    ask: (question) => rl.question(question),
    write: (text) => {
      output.write(`${text}\n`);
    },
    close: () => rl.close(),
  };
}

export const PLAYER_MENU: readonly PlayerKind[] = [
  PlayerKind.HUMAN,
  PlayerKind.RANDOM,
  PlayerKind.MINIMAX,
];

const PLAYER_MENU_LABELS: Record<PlayerKind, string> = {
  [PlayerKind.HUMAN]: 'Human',
  [PlayerKind.RANDOM]: 'Random',
  [PlayerKind.MINIMAX]: 'Minimax',
};

export type ParsedMoveInput = { ok: true; move: Move } | { ok: false; reason: string };

/**
 * Parse "row col letter" (0-based, letter case-insensitive) against a board
 * of the given size. Only the shape and range are checked; whether the cell
 * is free is left to the engine.
 */
export function parseMoveInput(text: string, size: number): ParsedMoveInput {
  const parts = text.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length !== 3) {
    return { ok: false, reason: 'Enter a move as: row col letter (e.g. 0 2 S)' };
  }

  const [rowText, colText, letterText] = parts;
  if (!/^\d+$/.test(rowText) || !/^\d+$/.test(colText)) {
    return { ok: false, reason: 'Row and column must be whole numbers' };
  }

  const row = Number(rowText);
  const col = Number(colText);
  if (row >= size || col >= size) {
    return { ok: false, reason: `Row and column must be between 0 and ${size - 1}` };
  }

  const letter = letterText.toUpperCase();
  if (!isLetter(letter)) {
    return { ok: false, reason: 'Letter must be S or O' };
  }

  return { ok: true, move: { row, col, letter } };
}

export async function askBoardSize(prompter: Prompter): Promise<number> {
  for (;;) {
    const answer = (await prompter.ask(`Board size (${MIN_BOARD_SIZE} to ${MAX_BOARD_SIZE}): `)).trim();
    const size = Number(answer);
    if (/^\d+$/.test(answer) && size >= MIN_BOARD_SIZE && size <= MAX_BOARD_SIZE) {
      return size;
    }
    prompter.write(`Please enter a whole number from ${MIN_BOARD_SIZE} to ${MAX_BOARD_SIZE}.`);
  }
}

export async function askPlayerKind(prompter: Prompter, playerNumber: number): Promise<PlayerKind> {
  const menu = PLAYER_MENU.map((kind, i) => `${i + 1}) ${PLAYER_MENU_LABELS[kind]}`).join('  ');
  for (;;) {
    const answer = (await prompter.ask(`Player ${playerNumber} - ${menu}: `)).trim();
    const choice = /^\d+$/.test(answer) ? PLAYER_MENU[Number(answer) - 1] : undefined;
    if (choice) {
      return choice;
    }
    prompter.write(`Please choose 1 to ${PLAYER_MENU.length}.`);
  }
}

/** Empty input takes the default depth for the board size. */
export async function askDepth(
  prompter: Prompter,
  playerNumber: number,
  boardSize: number
): Promise<number> {
  const fallback = defaultSearchDepth(boardSize);
  for (;;) {
    const answer = (
      await prompter.ask(`Search depth for player ${playerNumber} [${fallback}]: `)
    ).trim();
    if (answer === '') {
      return fallback;
    }
    if (/^\d+$/.test(answer) && Number(answer) >= 1) {
      return Number(answer);
    }
    prompter.write('Please enter a whole number of at least 1.');
  }
}

/**
 * Human move source that shows the board and scores and keeps asking until
 * the input parses. Occupied cells are reported back by the game session.
 */
export function createConsoleMoveSource(prompter: Prompter): MoveInputSource {
  return {
    requestMove: async (state: GameState, player) => {
      const board = state.getBoard();
      prompter.write(renderBoard(board));
      prompter.write(renderScores(state.getScores()));
      for (;;) {
        const answer = await prompter.ask(`Player ${player}, your move (row col letter): `);
        const parsed = parseMoveInput(answer, board.size);
        if (parsed.ok) {
          return parsed.move;
        }
        prompter.write(parsed.reason);
      }
    },
  };
}
