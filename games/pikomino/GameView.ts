/**
 * The read-only game context handed to strategies.
 *
 * A GameView is built fresh at every decision point from the live
 * table. It holds copies: arrays, the turn snapshot and the history
 * are detached from engine-owned state, so a strategy that keeps a
 * view around sees the table as it was when the view was made.
 * Tile objects themselves are shared, since strategies answer with
 * the exact tile instance they want.
 */

import type { Tile } from '../../src/dice-system/Tile';
import type { TilePool } from '../../src/dice-system/TilePool';
import type { TurnSnapshot, TurnState } from './TurnState';
import type { ReadonlyGameHistory } from './GameHistory';
import { GameHistory } from './GameHistory';
import type { Seat } from './PikominoRules';
import { findEligibleCenterTiles, findStealableTiles } from './PikominoRules';

// ── View types ──────────────────────────────────────────────

export interface PlayerView {
  readonly index: number;
  readonly name: string;
  /** Stack bottom to top. */
  readonly tiles: readonly Tile[];
  readonly topTile: Tile | null;
  readonly worms: number;
}

export interface StealView {
  readonly tile: Tile;
  readonly owner: PlayerView;
}

export interface GameView {
  readonly turn: TurnSnapshot;
  readonly actingPlayer: PlayerView;
  readonly players: readonly PlayerView[];
  readonly center: readonly Tile[];
  readonly removed: readonly Tile[];
  /** Opponents' top tiles matching the current score exactly. */
  readonly stealable: readonly StealView[];
  /** Center tiles the current score reaches. */
  readonly eligibleCenter: readonly Tile[];
  readonly history: ReadonlyGameHistory;
  readonly turnNumber: number;
}

export interface GameViewInput {
  turn: TurnState;
  seats: readonly Seat[];
  actingIndex: number;
  center: TilePool;
  removed: TilePool;
  history: ReadonlyGameHistory;
  turnNumber: number;
}

// ── Factory ─────────────────────────────────────────────────

export function createGameView(input: GameViewInput): GameView {
  const turn = input.turn.snapshot();

  const players: PlayerView[] = input.seats.map((seat, index) => ({
    index,
    name: seat.name,
    tiles: seat.tiles.toArray(),
    topTile: seat.tiles.peek() ?? null,
    worms: seat.tiles.totalWorms(),
  }));

  const stealable = findStealableTiles(
    input.seats,
    input.actingIndex,
    turn.score,
  ).map((s) => ({ tile: s.tile, owner: players[s.ownerIndex] }));

  return {
    turn,
    actingPlayer: players[input.actingIndex],
    players,
    center: input.center.toArray(),
    removed: input.removed.toArray(),
    stealable,
    eligibleCenter: findEligibleCenterTiles(input.center, turn.score),
    history: GameHistory.copyOf(input.history),
    turnNumber: input.turnNumber,
  };
}

// ── Queries ─────────────────────────────────────────────────

/** Worm totals of everyone but the acting player. */
export function opponentScores(view: GameView): Record<string, number> {
  const scores: Record<string, number> = {};
  for (const p of view.players) {
    if (p.index !== view.actingPlayer.index) scores[p.name] = p.worms;
  }
  return scores;
}

/** Highest worm total among opponents (0 when playing alone). */
export function maxOpponentWorms(view: GameView): number {
  return Math.max(0, ...Object.values(opponentScores(view)));
}

/** The player with the most worms; the lowest seat wins ties. */
export function leadingPlayer(view: GameView): PlayerView {
  let best = view.players[0];
  for (const p of view.players) {
    if (p.worms > best.worms) best = p;
  }
  return best;
}

export function isActingPlayerLeading(view: GameView): boolean {
  return leadingPlayer(view).index === view.actingPlayer.index;
}

/** Center tiles with `min <= value <= max`. */
export function centerTilesInRange(
  view: GameView,
  min: number,
  max: number,
): Tile[] {
  return view.center.filter((t) => t.value >= min && t.value <= max);
}

/** Every tile the acting player may claim: eligible center, then stealable. */
export function targetableTiles(view: GameView): Tile[] {
  return [...view.eligibleCenter, ...view.stealable.map((s) => s.tile)];
}
