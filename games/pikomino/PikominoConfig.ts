/**
 * Configuration schemas for Pikomino sessions and tournaments.
 *
 * Everything that arrives from outside the engine (CLI arguments,
 * JSON files) is parsed here with zod; the engine itself only ever
 * sees validated values. Parse failures throw ConfigError with one
 * `path: message` line per issue.
 */

import { z } from 'zod';
import { TILE_MAX_VALUE, TILE_MIN_VALUE } from '../../src/dice-system/Tile';
import type { PikominoStrategy } from './Strategy';
import { DefaultStrategy } from './Strategy';
import {
  AggressiveStrategy,
  BalancedStrategy,
  ConservativeStrategy,
  OptimalStrategy,
  RandomStrategy,
  TargetedStrategy,
} from './AiStrategy';
import { MAX_PLAYERS } from './PikominoGame';

// ── Errors ──────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** One `path: message` line per zod issue. */
export function formatConfigIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatConfigIssues(result.error));
  }
  return result.data;
}

// ── Strategy ────────────────────────────────────────────────

export const strategyConfigSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('default') }),
  z.object({ kind: z.literal('conservative') }),
  z.object({ kind: z.literal('aggressive') }),
  z.object({ kind: z.literal('balanced') }),
  z.object({ kind: z.literal('optimal') }),
  z.object({
    kind: z.literal('targeted'),
    targetPlayer: z.string().trim().min(1).optional(),
    minTargetValue: z
      .number()
      .int()
      .min(TILE_MIN_VALUE)
      .max(TILE_MAX_VALUE)
      .optional(),
  }),
  z.object({
    kind: z.literal('random'),
    continueProbability: z.number().min(0).max(1).optional(),
  }),
]);

export type StrategyConfig = z.infer<typeof strategyConfigSchema>;
export type StrategyName = StrategyConfig['kind'];

export const STRATEGY_NAMES: readonly StrategyName[] = [
  'default',
  'conservative',
  'aggressive',
  'balanced',
  'optimal',
  'targeted',
  'random',
];

export function parseStrategyConfig(input: unknown): StrategyConfig {
  return parseWith(strategyConfigSchema, input);
}

/**
 * Build a fresh strategy instance. `rng` is used only by the random
 * strategy.
 */
export function createStrategy(
  config: StrategyConfig,
  rng: () => number = Math.random,
): PikominoStrategy {
  switch (config.kind) {
    case 'default':
      return DefaultStrategy;
    case 'conservative':
      return ConservativeStrategy;
    case 'aggressive':
      return AggressiveStrategy;
    case 'balanced':
      return BalancedStrategy;
    case 'optimal':
      return OptimalStrategy;
    case 'targeted':
      return new TargetedStrategy({
        targetPlayer: config.targetPlayer,
        minTargetValue: config.minTargetValue,
      });
    case 'random':
      return new RandomStrategy({
        continueProbability: config.continueProbability,
        rng,
      });
    default: {
      const unknownKind: never = config;
      throw new Error(`Unknown strategy config: ${JSON.stringify(unknownKind)}`);
    }
  }
}

// ── Players and sessions ────────────────────────────────────

export const playerConfigSchema = z.object({
  name: z.string().trim().min(1, 'Player name must not be empty'),
  strategy: strategyConfigSchema.default({ kind: 'default' }),
});

export type PlayerConfig = z.infer<typeof playerConfigSchema>;

const playersSchema = z
  .array(playerConfigSchema)
  .min(1, 'At least one player is required')
  .max(MAX_PLAYERS, `At most ${MAX_PLAYERS} players are allowed`)
  .superRefine((players, ctx) => {
    const seen = new Set<string>();
    players.forEach((player, index) => {
      if (seen.has(player.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `Duplicate player name "${player.name}"`,
        });
      }
      seen.add(player.name);
    });
  });

export const sessionConfigSchema = z
  .object({
    players: playersSchema,
    firstPlayerIndex: z.number().int().min(0).optional(),
    seed: z.number().int().min(0).optional(),
  })
  .refine(
    (config) =>
      config.firstPlayerIndex === undefined ||
      config.firstPlayerIndex < config.players.length,
    { message: 'firstPlayerIndex must name a seat', path: ['firstPlayerIndex'] },
  );

export type SessionConfig = z.infer<typeof sessionConfigSchema>;

export function parseSessionConfig(input: unknown): SessionConfig {
  return parseWith(sessionConfigSchema, input);
}

export const tournamentConfigSchema = z.object({
  players: playersSchema,
  games: z.number().int().min(1).max(10000),
  maxTurns: z.number().int().min(1).optional(),
  seed: z.number().int().min(0).optional(),
});

export type TournamentConfig = z.infer<typeof tournamentConfigSchema>;

export function parseTournamentConfig(input: unknown): TournamentConfig {
  return parseWith(tournamentConfigSchema, input);
}

// ── CLI helpers ─────────────────────────────────────────────

/**
 * Parse `"Name"` or `"Name:kind"` into a player config, e.g.
 * `"Alice:targeted"`. A bare name gets the default strategy.
 *
 * @throws ConfigError for an empty name or an unknown strategy.
 */
export function parsePlayerSpec(spec: string): PlayerConfig {
  const sep = spec.lastIndexOf(':');
  const name = sep === -1 ? spec : spec.slice(0, sep);
  const kind = sep === -1 ? 'default' : spec.slice(sep + 1).trim();
  return parseWith(playerConfigSchema, { name, strategy: { kind } });
}

// ── Randomness ──────────────────────────────────────────────

/**
 * Deterministic LCG in `[0, 1)`; the same seed always gives the same
 * sequence.
 */
export function createSeededRng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}
