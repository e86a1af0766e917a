import { CliUsageError, parseCliArgs } from '../../src/cli/args';
import { PlayerKind } from '../../src/shared/ai/players';

describe('parseCliArgs', () => {
  it('should accept an empty command line', () => {
    expect(parseCliArgs([])).toEqual({ help: false });
  });

  it('should parse every option', () => {
    expect(
      parseCliArgs(['--size=5', '--player1=human', '--player2=MINIMAX', '--depth=3', '--seed=7'])
    ).toEqual({
      size: 5,
      player1: PlayerKind.HUMAN,
      player2: PlayerKind.MINIMAX,
      depth: 3,
      seed: 7,
      help: false,
    });
  });

  it('should recognise --help', () => {
    expect(parseCliArgs(['--help']).help).toBe(true);
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('should reject unknown arguments', () => {
    expect(() => parseCliArgs(['--colour=red'])).toThrow(
      new CliUsageError('Unknown argument: --colour=red')
    );
    expect(() => parseCliArgs(['5'])).toThrow(CliUsageError);
  });

  it('should reject options without a value', () => {
    expect(() => parseCliArgs(['--size='])).toThrow('Missing value for --size');
  });

  it('should reject values that fail validation', () => {
    expect(() => parseCliArgs(['--size=2'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--size=100000'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--size=abc'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--depth=0'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['--player1=robot'])).toThrow(CliUsageError);
  });

  it('should name the offending option', () => {
    expect(() => parseCliArgs(['--seed=-1'])).toThrow(/--seed:/);
  });
});
