/**
 * Tile types and factory functions for the Pikomino engine.
 *
 * Each tile carries the score needed to claim it (21 to 36) and a
 * worm count derived from that value. Tiles are compared by identity:
 * the engine moves specific tile objects between the center, the
 * players' stacks and the removed pool, never copies of them.
 */

/** Lowest tile value in the standard set. */
export const TILE_MIN_VALUE = 21;

/** Highest tile value in the standard set. */
export const TILE_MAX_VALUE = 36;

/**
 * A Pikomino tile. Both fields are fixed at creation.
 */
export interface Tile {
  readonly value: number;
  readonly worms: number;
}

/**
 * Worm count for a tile value: four bands of four values each
 * (21-24 -> 1, 25-28 -> 2, 29-32 -> 3, 33-36 -> 4). Values outside
 * the standard range carry no worms.
 */
export function wormCountFor(value: number): number {
  if (!Number.isInteger(value) || value < TILE_MIN_VALUE || value > TILE_MAX_VALUE) {
    return 0;
  }
  return Math.floor((value - TILE_MIN_VALUE) / 4) + 1;
}

/**
 * Create a single tile. Every call returns a new object, even for
 * a value that already exists elsewhere.
 */
export function createTile(value: number): Tile {
  return { value, worms: wormCountFor(value) };
}

/**
 * Create the sixteen tiles of a fresh game, ordered by value.
 */
export function createTileSet(): Tile[] {
  const tiles: Tile[] = [];
  for (let value = TILE_MIN_VALUE; value <= TILE_MAX_VALUE; value++) {
    tiles.push(createTile(value));
  }
  return tiles;
}

/** Total worms across a list of tiles. */
export function sumWorms(tiles: readonly Tile[]): number {
  return tiles.reduce((acc, t) => acc + t.worms, 0);
}
