import { config, getEffectiveNodeEnv, parseEnv } from '../../src/cli/config';
import { PlayerKind } from '../../src/shared/ai/players';

describe('config', () => {
  describe('parseEnv', () => {
    it('should apply defaults to an empty environment', () => {
      const result = parseEnv({});
      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        NODE_ENV: 'development',
        LOG_LEVEL: 'warn',
        LOG_FORMAT: 'pretty',
      });
    });

    it('should coerce game defaults', () => {
      const result = parseEnv({
        SOS_BOARD_SIZE: '5',
        SOS_PLAYER_1: 'human',
        SOS_PLAYER_2: 'minimax',
        SOS_SEARCH_DEPTH: '3',
        SOS_RNG_SEED: '0',
      });
      expect(result.data).toMatchObject({
        SOS_BOARD_SIZE: 5,
        SOS_PLAYER_1: PlayerKind.HUMAN,
        SOS_PLAYER_2: PlayerKind.MINIMAX,
        SOS_SEARCH_DEPTH: 3,
        SOS_RNG_SEED: 0,
      });
    });

    it('should reject a board size above 50', () => {
      const result = parseEnv({ SOS_BOARD_SIZE: '100000' });
      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.path)).toEqual(['SOS_BOARD_SIZE']);
    });

    it('should report invalid values by variable name', () => {
      const result = parseEnv({ SOS_BOARD_SIZE: '2', LOG_LEVEL: 'verbose' });
      expect(result.success).toBe(false);
      expect(result.errors?.map((e) => e.path).sort()).toEqual(['LOG_LEVEL', 'SOS_BOARD_SIZE']);
    });
  });

  describe('getEffectiveNodeEnv', () => {
    it('should report test under Jest whatever NODE_ENV says', () => {
      const result = parseEnv({ NODE_ENV: 'production' });
      expect(result.data).toBeDefined();
      if (result.data) {
        expect(getEffectiveNodeEnv(result.data)).toBe('test');
      }
    });
  });

  describe('config', () => {
    it('should be frozen and reflect the test environment', () => {
      expect(Object.isFrozen(config)).toBe(true);
      expect(config.isTest).toBe(true);
      expect(config.logging.level).toBe('error');
    });

    it('should hold only the sections the console program reads', () => {
      expect(Object.keys(config).sort()).toEqual(['game', 'isTest', 'logging', 'nodeEnv']);
    });
  });
});
