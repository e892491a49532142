/**
 * Shared transcript snapshot types for the Pikomino engine.
 *
 * Provides the canonical TileSnapshot interface, the turn outcome
 * taxonomy, and the snapshotTile() helper used by the game history,
 * the event payloads and the serializable session state.
 */

import type { Tile } from '../dice-system/Tile';

// ── Outcomes ────────────────────────────────────────────────

/**
 * How a turn resolved. All four are ordinary game results, returned
 * as values from turn resolution and never thrown.
 *
 * - `success`                   -- a tile was claimed or stolen.
 * - `failed-no-worm`            -- the turn ended without a reserved worm.
 * - `failed-insufficient-score` -- no legal tile (or the strategy declined one).
 * - `failed-no-valid-choice`    -- a roll offered nothing reservable, or the
 *                                  strategy picked a face it could not reserve.
 */
export type TurnOutcome =
  | 'success'
  | 'failed-no-worm'
  | 'failed-insufficient-score'
  | 'failed-no-valid-choice';

/** All outcomes, success first. */
export const TURN_OUTCOMES: readonly TurnOutcome[] = [
  'success',
  'failed-no-worm',
  'failed-insufficient-score',
  'failed-no-valid-choice',
] as const;

// ── Snapshot types ──────────────────────────────────────────

/**
 * Serializable tile snapshot (no identity).
 */
export interface TileSnapshot {
  readonly value: number;
  readonly worms: number;
}

// ── Helpers ─────────────────────────────────────────────────

export function snapshotTile(tile: Tile): TileSnapshot {
  return { value: tile.value, worms: tile.worms };
}

export function snapshotTiles(tiles: readonly Tile[]): TileSnapshot[] {
  return tiles.map(snapshotTile);
}
