/**
 * Tournament runner: many independent games between the same seats,
 * aggregated into per-player figures.
 *
 * Every game gets fresh strategy instances and a fresh table; only
 * the RNG carries over, so a seeded tournament is reproducible.
 */

import type { StrategyConfig } from './PikominoConfig';
import { createSeededRng, createStrategy } from './PikominoConfig';
import { createSession } from './createPikominoSession';

export interface TournamentPlayer {
  name: string;
  strategy: StrategyConfig;
}

export interface TournamentOptions {
  players: TournamentPlayer[];
  /** Number of games to play. */
  games: number;
  /** RNG shared by all games. Overrides `seed`. */
  rng?: () => number;
  seed?: number;
  /** Per-game turn limit. */
  maxTurns?: number;
  /** Called after each game with its 0-based index and winner. */
  onGameEnd?: (gameIndex: number, winnerName: string) => void;
}

export interface PlayerTournamentStats {
  name: string;
  strategyName: string;
  wins: number;
  /** wins / games. */
  winRate: number;
  /** Mean worms held at game end. */
  averageWorms: number;
  /** Mean tiles held at game end. */
  averageTiles: number;
  successfulTurns: number;
  failedTurns: number;
  /** successfulTurns / (successfulTurns + failedTurns); 0 with no turns. */
  turnSuccessRate: number;
}

export interface TournamentResult {
  games: number;
  /** Mean number of turns per game, over all players. */
  averageTurnsPerGame: number;
  players: PlayerTournamentStats[];
}

interface Totals {
  wins: number;
  worms: number;
  tiles: number;
  successfulTurns: number;
  failedTurns: number;
}

/**
 * Play `games` games and aggregate the results.
 *
 * @throws If `games` is not a positive integer or no players are given.
 */
export function runTournament(options: TournamentOptions): TournamentResult {
  const { players, games, maxTurns, onGameEnd } = options;

  if (!Number.isInteger(games) || games < 1) {
    throw new Error(`A tournament needs at least one game, got ${games}`);
  }
  if (players.length === 0) {
    throw new Error('A tournament needs at least one player');
  }

  const rng =
    options.rng ??
    (options.seed !== undefined ? createSeededRng(options.seed) : Math.random);

  const totals: Totals[] = players.map(() => ({
    wins: 0,
    worms: 0,
    tiles: 0,
    successfulTurns: 0,
    failedTurns: 0,
  }));
  const strategyNames: string[] = [];
  let totalTurns = 0;

  for (let g = 0; g < games; g++) {
    const strategies = players.map((p) => createStrategy(p.strategy, rng));
    if (g === 0) strategyNames.push(...strategies.map((s) => s.name));

    const game = createSession(
      players.map((p) => p.name),
      strategies,
      { rng, maxTurns },
    );
    const winner = game.playToEnd();
    totals[winner.index].wins++;
    totalTurns += game.history.length;

    const state = game.state();
    players.forEach((p, i) => {
      const t = totals[i];
      t.worms += state.scores[p.name];
      t.tiles += state.playerTiles[p.name].length;
      const stats = game.history.getPlayerStatistics(p.name);
      if (stats) {
        t.successfulTurns += stats.successfulTurns;
        t.failedTurns += stats.failedTurns;
      }
    });

    onGameEnd?.(g, winner.name);
  }

  return {
    games,
    averageTurnsPerGame: totalTurns / games,
    players: players.map((p, i) => {
      const t = totals[i];
      const turns = t.successfulTurns + t.failedTurns;
      return {
        name: p.name,
        strategyName: strategyNames[i],
        wins: t.wins,
        winRate: t.wins / games,
        averageWorms: t.worms / games,
        averageTiles: t.tiles / games,
        successfulTurns: t.successfulTurns,
        failedTurns: t.failedTurns,
        turnSuccessRate: turns > 0 ? t.successfulTurns / turns : 0,
      };
    }),
  };
}
