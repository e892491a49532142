/**
 * Tile allocation rules for Pikomino.
 *
 * Pure functions over the table (players' stacks, center pool,
 * removed pool):
 *   - which tiles a score can claim (exact-match steals, center picks)
 *   - the default pick when no strategy overrides it
 *   - moving a claimed tile to the acting player
 *   - the failure penalty
 *   - winner determination
 */

import type { Tile } from '../../src/dice-system/Tile';
import type { TileStack } from '../../src/dice-system/TileStack';
import type { TilePool } from '../../src/dice-system/TilePool';

// ── Table types ─────────────────────────────────────────────

/** A player's seat as the rules see it. */
export interface Seat {
  readonly name: string;
  readonly tiles: TileStack;
}

/** Everything that holds tiles. */
export interface Table {
  readonly seats: readonly Seat[];
  readonly center: TilePool;
  readonly removed: TilePool;
}

/** An opponent's top tile that the current score matches exactly. */
export interface StealOption {
  readonly tile: Tile;
  readonly ownerIndex: number;
}

/** Where a claimed tile came from. */
export type TileSource =
  | { kind: 'center' }
  | { kind: 'steal'; fromIndex: number };

/** Tiles moved out of play by a failure penalty. */
export interface PenaltyResult {
  /** The acting player's former top tile, if they had one. */
  lostTile: Tile | null;
  /** The center's highest tile, if the center was non-empty. */
  discardedCenterTile: Tile | null;
}

// ── Targets ─────────────────────────────────────────────────

/**
 * Opponents' top tiles whose value equals `score` exactly.
 * Off-by-one values never qualify.
 */
export function findStealableTiles(
  seats: readonly Seat[],
  actingIndex: number,
  score: number,
): StealOption[] {
  const options: StealOption[] = [];
  seats.forEach((seat, index) => {
    if (index === actingIndex) return;
    const top = seat.tiles.peek();
    if (top && top.value === score) {
      options.push({ tile: top, ownerIndex: index });
    }
  });
  return options;
}

/** Center tiles whose value does not exceed `score`. */
export function findEligibleCenterTiles(center: TilePool, score: number): Tile[] {
  return center.eligible(score);
}

/**
 * The pick made when no strategy chooses otherwise: steal the
 * stealable tile with the most worms, else take the highest eligible
 * center tile, else nothing. The first candidate wins ties.
 */
export function defaultTargetTile(
  stealable: readonly { readonly tile: Tile }[],
  eligible: readonly Tile[],
): Tile | null {
  let steal: Tile | null = null;
  for (const option of stealable) {
    if (!steal || option.tile.worms > steal.worms) steal = option.tile;
  }
  if (steal) return steal;

  let center: Tile | null = null;
  for (const tile of eligible) {
    if (!center || tile.value > center.value) center = tile;
  }
  return center;
}

/** Whether `tile` is one of the legal targets (by identity). */
export function isLegalTarget(
  tile: Tile,
  stealable: readonly { readonly tile: Tile }[],
  eligible: readonly Tile[],
): boolean {
  return stealable.some((s) => s.tile === tile) || eligible.includes(tile);
}

// ── Mutations ───────────────────────────────────────────────

/**
 * Move `tile` onto the acting player's stack, popping it from an
 * opponent's top or removing it from the center.
 *
 * @throws If the instance is neither an opponent's top tile nor in
 *         the center.
 */
export function transferTile(
  table: Table,
  actingIndex: number,
  tile: Tile,
): TileSource {
  const acting = table.seats[actingIndex];

  for (let i = 0; i < table.seats.length; i++) {
    if (i === actingIndex) continue;
    const owner = table.seats[i];
    if (owner.tiles.peek() === tile) {
      acting.tiles.push(owner.tiles.popOrThrow());
      return { kind: 'steal', fromIndex: i };
    }
  }

  if (table.center.remove(tile)) {
    acting.tiles.push(tile);
    return { kind: 'center' };
  }

  throw new Error(
    `Tile ${tile.value} is neither an opponent's top tile nor in the center`,
  );
}

/**
 * Apply the failure penalty for the acting player.
 *
 * Two independent removals, both into the removed pool:
 *   1. the player's top tile, if they hold any;
 *   2. the center's highest tile, if the center is non-empty.
 */
export function applyFailurePenalty(
  table: Table,
  actingIndex: number,
): PenaltyResult {
  const lostTile = table.seats[actingIndex].tiles.pop() ?? null;
  if (lostTile) {
    table.removed.add(lostTile);
  }

  const discardedCenterTile = table.center.highest() ?? null;
  if (discardedCenterTile) {
    table.center.removeOrThrow(discardedCenterTile);
    table.removed.add(discardedCenterTile);
  }

  return { lostTile, discardedCenterTile };
}

// ── Accounting ──────────────────────────────────────────────

/** Number of tiles across every container on the table. */
export function countTiles(table: Table): number {
  return (
    table.center.size() +
    table.removed.size() +
    table.seats.reduce((acc, s) => acc + s.tiles.size(), 0)
  );
}

/**
 * Index of the player with the most worms. Ties go to the lowest
 * seat index.
 */
export function determineWinnerIndex(seats: readonly Seat[]): number {
  let best = 0;
  for (let i = 1; i < seats.length; i++) {
    if (seats[i].tiles.totalWorms() > seats[best].tiles.totalWorms()) {
      best = i;
    }
  }
  return best;
}
