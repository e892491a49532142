/**
 * TilePool -- an unordered set of tile instances.
 *
 * Used for the shared center (tiles still up for grabs) and for the
 * removed pool (tiles permanently out of play). Membership is by
 * identity, so two tiles of equal value are still two entries.
 * Iteration follows insertion order.
 */

import type { Tile } from './Tile';

export class TilePool {
  private readonly tiles: Tile[] = [];

  constructor(tiles: readonly Tile[] = []) {
    for (const tile of tiles) {
      this.add(tile);
    }
  }

  /**
   * Add a tile instance.
   *
   * @throws If this exact instance is already in the pool.
   */
  add(tile: Tile): void {
    if (this.has(tile)) {
      throw new Error(`Tile ${tile.value} is already in this pool`);
    }
    this.tiles.push(tile);
  }

  /**
   * Remove a specific tile instance.
   * @returns Whether the instance was present.
   */
  remove(tile: Tile): boolean {
    const index = this.tiles.indexOf(tile);
    if (index === -1) return false;
    this.tiles.splice(index, 1);
    return true;
  }

  removeOrThrow(tile: Tile): void {
    if (!this.remove(tile)) {
      throw new Error(`Tile ${tile.value} is not in this pool`);
    }
  }

  has(tile: Tile): boolean {
    return this.tiles.includes(tile);
  }

  /**
   * The tile with the highest value (first one on ties), or
   * `undefined` if the pool is empty.
   */
  highest(): Tile | undefined {
    let best: Tile | undefined;
    for (const tile of this.tiles) {
      if (!best || tile.value > best.value) best = tile;
    }
    return best;
  }

  /** Tiles whose value does not exceed `score`. */
  eligible(score: number): Tile[] {
    return this.tiles.filter((t) => t.value <= score);
  }

  /** The highest-value tile not exceeding `score`. */
  maxEligible(score: number): Tile | undefined {
    let best: Tile | undefined;
    for (const tile of this.tiles) {
      if (tile.value <= score && (!best || tile.value > best.value)) {
        best = tile;
      }
    }
    return best;
  }

  /** The lowest-value tile at or above `threshold`. */
  minAtLeast(threshold: number): Tile | undefined {
    let best: Tile | undefined;
    for (const tile of this.tiles) {
      if (tile.value >= threshold && (!best || tile.value < best.value)) {
        best = tile;
      }
    }
    return best;
  }

  isEmpty(): boolean {
    return this.tiles.length === 0;
  }

  size(): number {
    return this.tiles.length;
  }

  /** Shallow copy in insertion order. */
  toArray(): Tile[] {
    return [...this.tiles];
  }
}
