import { z } from 'zod';
import { MAX_BOARD_SIZE, MIN_BOARD_SIZE } from '../shared/types/game';
import { PlayerKind } from '../shared/ai/players';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = [
  'Usage: sos [options]',
  '',
  'Options:',
  `  --size=N        Board size (integer, ${MIN_BOARD_SIZE} to ${MAX_BOARD_SIZE})`,
  '  --player1=KIND  human | random | minimax',
  '  --player2=KIND  human | random | minimax',
  '  --depth=N       Search depth for minimax players',
  '  --seed=N        Seed for random players',
  '  --help          Show this message',
].join('\n');

const CliArgsSchema = z
  .object({
    size: z.coerce.number().int().min(MIN_BOARD_SIZE).max(MAX_BOARD_SIZE).optional(),
    player1: z.nativeEnum(PlayerKind).optional(),
    player2: z.nativeEnum(PlayerKind).optional(),
    depth: z.coerce.number().int().positive().optional(),
    seed: z.coerce.number().int().nonnegative().optional(),
    help: z.boolean().default(false),
  })
  .strict();

export type CliArgs = z.infer<typeof CliArgsSchema>;

const VALUE_OPTIONS = new Set(['size', 'player1', 'player2', 'depth', 'seed']);

/**
 * Parse `--key=value` options (and the bare `--help` flag). Anything not
 * recognised, or a value that fails validation, raises a CliUsageError.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const raw: Record<string, string | boolean> = {};

  for (const arg of argv) {
    if (arg === '--help' || arg === '-h') {
      raw.help = true;
      continue;
    }
    const match = /^--([a-z0-9]+)=(.*)$/.exec(arg);
    if (!match || !VALUE_OPTIONS.has(match[1])) {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }
    if (match[2] === '') {
      throw new CliUsageError(`Missing value for --${match[1]}`);
    }
    raw[match[1]] = match[2].toLowerCase();
  }

  const result = CliArgsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new CliUsageError(`Invalid arguments: ${details}`);
  }
  return result.data;
}
