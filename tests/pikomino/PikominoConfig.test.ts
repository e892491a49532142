import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  STRATEGY_NAMES,
  createSeededRng,
  createStrategy,
  parsePlayerSpec,
  parseSessionConfig,
  parseStrategyConfig,
  parseTournamentConfig,
} from '../../games/pikomino/PikominoConfig';
import { RandomStrategy, TargetedStrategy } from '../../games/pikomino/AiStrategy';

/** Run `fn` and return the ConfigError it throws. */
function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('Expected a ConfigError');
}

describe('PikominoConfig', () => {
  describe('parseStrategyConfig', () => {
    it('should accept every strategy kind', () => {
      for (const kind of STRATEGY_NAMES) {
        expect(parseStrategyConfig({ kind }).kind).toBe(kind);
      }
    });

    it('should accept targeted options', () => {
      expect(
        parseStrategyConfig({ kind: 'targeted', targetPlayer: ' Bob ', minTargetValue: 27 }),
      ).toEqual({ kind: 'targeted', targetPlayer: 'Bob', minTargetValue: 27 });
    });

    it('should reject a target value outside the tile range', () => {
      const error = configErrorOf(() =>
        parseStrategyConfig({ kind: 'targeted', minTargetValue: 40 }),
      );
      expect(error.issues).toEqual([
        'minTargetValue: Number must be less than or equal to 36',
      ]);
    });

    it('should reject a probability above one', () => {
      const error = configErrorOf(() =>
        parseStrategyConfig({ kind: 'random', continueProbability: 1.5 }),
      );
      expect(error.issues).toEqual([
        'continueProbability: Number must be less than or equal to 1',
      ]);
    });

    it('should reject an unknown kind', () => {
      const error = configErrorOf(() => parseStrategyConfig({ kind: 'psychic' }));
      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^kind: Invalid discriminator value/);
    });
  });

  describe('createStrategy', () => {
    it('should name each strategy after its kind', () => {
      for (const kind of STRATEGY_NAMES) {
        expect(createStrategy(parseStrategyConfig({ kind })).name).toBe(kind);
      }
    });

    it('should build parameterized strategies as fresh instances', () => {
      const a = createStrategy({ kind: 'targeted', targetPlayer: 'Bob' });
      const b = createStrategy({ kind: 'targeted', targetPlayer: 'Bob' });
      expect(a).toBeInstanceOf(TargetedStrategy);
      expect(a).not.toBe(b);
      expect(createStrategy({ kind: 'random' }, () => 0.5)).toBeInstanceOf(RandomStrategy);
    });
  });

  describe('parseSessionConfig', () => {
    it('should default each player to the default strategy', () => {
      const config = parseSessionConfig({ players: [{ name: 'Alice' }, { name: 'Bob' }] });
      expect(config.players).toEqual([
        { name: 'Alice', strategy: { kind: 'default' } },
        { name: 'Bob', strategy: { kind: 'default' } },
      ]);
    });

    it('should reject duplicate names at the second occurrence', () => {
      const error = configErrorOf(() =>
        parseSessionConfig({ players: [{ name: 'Alice' }, { name: 'Alice' }] }),
      );
      expect(error.issues).toEqual(['players.1.name: Duplicate player name "Alice"']);
    });

    it('should reject an empty name', () => {
      const error = configErrorOf(() => parseSessionConfig({ players: [{ name: '   ' }] }));
      expect(error.issues).toEqual(['players.0.name: Player name must not be empty']);
    });

    it('should reject an empty table and an oversized one', () => {
      expect(configErrorOf(() => parseSessionConfig({ players: [] })).issues).toEqual([
        'players: At least one player is required',
      ]);

      const nine = Array.from({ length: 9 }, (_, i) => ({ name: `P${i}` }));
      expect(configErrorOf(() => parseSessionConfig({ players: nine })).issues).toEqual([
        'players: At most 8 players are allowed',
      ]);
    });

    it('should reject a first player without a seat', () => {
      const error = configErrorOf(() =>
        parseSessionConfig({ players: [{ name: 'Alice' }], firstPlayerIndex: 1 }),
      );
      expect(error.issues).toEqual(['firstPlayerIndex: firstPlayerIndex must name a seat']);
    });

    it('should report a missing players list at its path', () => {
      const error = configErrorOf(() => parseSessionConfig({}));
      expect(error.issues).toEqual(['players: Required']);
      expect(error.message).toBe('Invalid configuration:\n  players: Required');
    });

    it('should use (root) for a value that is not an object', () => {
      const error = configErrorOf(() => parseSessionConfig('Alice'));
      expect(error.issues).toEqual(['(root): Expected object, received string']);
    });
  });

  describe('parseTournamentConfig', () => {
    it('should accept a full tournament', () => {
      const config = parseTournamentConfig({
        players: [{ name: 'Alice', strategy: { kind: 'optimal' } }],
        games: 20,
        maxTurns: 300,
        seed: 7,
      });
      expect(config.games).toBe(20);
      expect(config.players[0].strategy).toEqual({ kind: 'optimal' });
    });

    it('should reject zero games', () => {
      const error = configErrorOf(() =>
        parseTournamentConfig({ players: [{ name: 'Alice' }], games: 0 }),
      );
      expect(error.issues).toEqual(['games: Number must be greater than or equal to 1']);
    });
  });

  describe('parsePlayerSpec', () => {
    it('should give a bare name the default strategy', () => {
      expect(parsePlayerSpec('Alice')).toEqual({ name: 'Alice', strategy: { kind: 'default' } });
    });

    it('should split at the last colon', () => {
      expect(parsePlayerSpec('Team:Bob:aggressive')).toEqual({
        name: 'Team:Bob',
        strategy: { kind: 'aggressive' },
      });
    });

    it('should reject an unknown strategy', () => {
      const error = configErrorOf(() => parsePlayerSpec('Alice:lucky'));
      expect(error.issues[0]).toMatch(/^strategy\.kind: Invalid discriminator value/);
    });
  });

  describe('createSeededRng', () => {
    it('should repeat its sequence for the same seed', () => {
      const a = createSeededRng(99);
      const b = createSeededRng(99);
      const first = [a(), a(), a()];
      expect([b(), b(), b()]).toEqual(first);
      for (const value of first) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('should start from the LCG increment for seed 0', () => {
      expect(createSeededRng(0)()).toBe(1013904223 / 4294967296);
    });
  });
});
