#!/usr/bin/env ts-node
/**
 * Self-play soak & invariant harness.
 *
 * Plays many seeded games directly against the shared engine and checks
 * after every move that:
 * - a move keeps the turn exactly when it scored;
 * - scores equal a full re-scan of the board for S-O-S lines;
 * - every filled cell is accounted for by exactly one player's move count;
 * - the evaluator stays zero-sum;
 * and at the end that the board is full with no legal moves left.
 *
 * Usage:
 *   ts-node scripts/run-selfplay-soak.ts --games=200 --sizes=3,4,5 --seed=42
 *     [--minimaxDepth=2] [--outputPath=results/selfplay_soak_summary.json]
 *     [--failOnViolation]
 */

import fs from 'fs';
import path from 'path';

import { GameState } from '../src/shared/engine/GameState';
import { countFormations } from '../src/shared/engine/formationDetection';
import { evaluatePosition } from '../src/shared/engine/heuristicEvaluation';
import { Player, createMinimaxPlayer, createRandomPlayer } from '../src/shared/ai/players';
import { SeededRNG } from '../src/shared/utils/rng';
import { PlayerNumber, moveToString } from '../src/shared/types/game';

interface SoakConfig {
  games: number;
  sizes: number[];
  seed: number;
  /** When set, player 2 is a minimax player searching this deep. */
  minimaxDepth?: number;
  outputPath: string;
  failOnViolation: boolean;
}

interface InvariantViolation {
  id: string;
  gameIndex: number;
  boardSize: number;
  gameSeed: number;
  moveIndex: number;
  message: string;
}

interface SizeStats {
  boardSize: number;
  gamesRun: number;
  wins: Record<PlayerNumber, number>;
  draws: number;
  totalMoves: number;
  bonusMoves: number;
}

type ParsedArgs = Record<string, string | boolean>;

function parseArgs(argv: string[]): SoakConfig {
  const args: ParsedArgs = {};
  for (const raw of argv.slice(2)) {
    if (!raw.startsWith('--')) {
      continue;
    }
    const eqIndex = raw.indexOf('=');
    if (eqIndex === -1) {
      args[raw.slice(2)] = true;
    } else {
      args[raw.slice(2, eqIndex)] = raw.slice(eqIndex + 1);
    }
  }

  const games = Number(args.games ?? 100);
  const seed = Number(args.seed ?? Date.now() & 0x7fffffff);
  const sizes = String(args.sizes ?? '3,4,5')
    .split(',')
    .map((s) => Number(s.trim()))
    .filter((n) => Number.isInteger(n) && n >= 3);
  const minimaxDepth = args.minimaxDepth !== undefined ? Number(args.minimaxDepth) : undefined;

  return {
    games: Number.isInteger(games) && games > 0 ? games : 100,
    sizes: sizes.length > 0 ? sizes : [3, 4, 5],
    seed: Number.isInteger(seed) ? seed : 1,
    minimaxDepth:
      minimaxDepth !== undefined && Number.isInteger(minimaxDepth) && minimaxDepth > 0
        ? minimaxDepth
        : undefined,
    outputPath:
      typeof args.outputPath === 'string'
        ? args.outputPath
        : 'results/selfplay_soak_summary.json',
    failOnViolation: args.failOnViolation === true || args.failOnViolation === 'true',
  };
}

async function playGame(
  boardSize: number,
  gameSeed: number,
  gameIndex: number,
  config: SoakConfig,
  stats: SizeStats,
  violations: InvariantViolation[]
): Promise<void> {
  const rng = new SeededRNG(gameSeed);
  const players: Record<PlayerNumber, Player> = {
    1: createRandomPlayer(() => rng.next()),
    2:
      config.minimaxDepth !== undefined
        ? createMinimaxPlayer(config.minimaxDepth)
        : createRandomPlayer(() => rng.next()),
  };
  const state = GameState.create(boardSize);

  const report = (id: string, moveIndex: number, message: string): void => {
    violations.push({ id, gameIndex, boardSize, gameSeed, moveIndex, message });
  };

  let moveIndex = 0;
  while (!state.isTerminal()) {
    const mover = state.getCurrentPlayer();
    const move = await players[mover].chooseMove(state);
    const result = state.applyMove(move);
    const board = state.getBoard();

    const scored = result.formations.length > 0;
    if (scored !== (result.nextPlayer === mover)) {
      report(
        'BONUS_MOVE',
        moveIndex,
        `${moveToString(move)} scored ${result.formations.length} but next player is ${result.nextPlayer}`
      );
    }
    if (scored) {
      stats.bonusMoves++;
    }

    const scoreSum = state.getScore(1) + state.getScore(2);
    const fullScan = countFormations(board);
    if (scoreSum !== fullScan) {
      report('SCORE_SCAN', moveIndex, `score sum ${scoreSum} but board holds ${fullScan}`);
    }

    const moveSum = state.getMoveCount(1) + state.getMoveCount(2);
    if (moveSum !== board.filledCount()) {
      report('TURN_SUM', moveIndex, `${moveSum} moves for ${board.filledCount()} filled cells`);
    }

    const zeroSum = evaluatePosition(state, 1) + evaluatePosition(state, 2);
    if (zeroSum !== 0) {
      report('ZERO_SUM', moveIndex, `evaluations sum to ${zeroSum}`);
    }

    moveIndex++;
  }

  if (!state.getBoard().isFull() || state.legalMoves().length > 0) {
    report('TERMINAL', moveIndex, 'terminal state with empty cells or legal moves');
  }

  const outcome = state.winner();
  stats.gamesRun++;
  stats.totalMoves += moveIndex;
  if (outcome?.kind === 'win') {
    stats.wins[outcome.winner]++;
  } else if (outcome?.kind === 'draw') {
    stats.draws++;
  } else {
    report('OUTCOME', moveIndex, 'finished game has no outcome');
  }
}

async function run(): Promise<void> {
  const config = parseArgs(process.argv);

  console.log('Self-play soak harness starting with config:');
  console.log(JSON.stringify(config, null, 2));
  console.log('');

  const rootRng = new SeededRNG(config.seed);
  const violations: InvariantViolation[] = [];
  const sizeStats: SizeStats[] = [];

  for (const boardSize of config.sizes) {
    const stats: SizeStats = {
      boardSize,
      gamesRun: 0,
      wins: { 1: 0, 2: 0 },
      draws: 0,
      totalMoves: 0,
      bonusMoves: 0,
    };
    for (let gameIndex = 0; gameIndex < config.games; gameIndex++) {
      const gameSeed = rootRng.nextInt(0x7fffffff);
      await playGame(boardSize, gameSeed, gameIndex, config, stats, violations);
    }
    sizeStats.push(stats);
    console.log(
      `size ${boardSize}: ${stats.gamesRun} games, P1 ${stats.wins[1]} / P2 ${stats.wins[2]} / draw ${stats.draws}`
    );
  }

  const summary = {
    config,
    sizes: sizeStats,
    violationCount: violations.length,
    violations: violations.slice(0, 50),
  };

  const outputPath = path.resolve(config.outputPath);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(summary, null, 2));
  console.log(`\nSummary written to ${outputPath}`);

  if (violations.length > 0) {
    console.error(`${violations.length} invariant violation(s) detected`);
    if (config.failOnViolation) {
      process.exitCode = 1;
    }
  }
}

run().catch((error: unknown) => {
  console.error('Self-play soak failed:', error);
  process.exitCode = 1;
});
