/**
 * TileStack -- a player's claimed tiles.
 *
 * A TileStack is LIFO: the most recently claimed tile sits on top,
 * and it is the only tile that can be stolen or lost on a failed turn.
 */

import type { Tile } from './Tile';
import { sumWorms } from './Tile';

export class TileStack {
  private readonly tiles: Tile[];

  /**
   * Create a stack, optionally pre-populated.
   * The last element of the array is treated as the top.
   */
  constructor(tiles: Tile[] = []) {
    this.tiles = [...tiles];
  }

  /** Push a tile onto the top of the stack. */
  push(tile: Tile): void {
    this.tiles.push(tile);
  }

  /**
   * Remove and return the top tile.
   * @returns The top tile, or `undefined` if the stack is empty.
   */
  pop(): Tile | undefined {
    return this.tiles.pop();
  }

  /**
   * Remove and return the top tile, throwing if the stack is empty.
   */
  popOrThrow(): Tile {
    const tile = this.tiles.pop();
    if (tile === undefined) {
      throw new Error('Cannot pop from an empty tile stack');
    }
    return tile;
  }

  /**
   * Look at the top tile without removing it.
   */
  peek(): Tile | undefined {
    return this.tiles.length > 0
      ? this.tiles[this.tiles.length - 1]
      : undefined;
  }

  isEmpty(): boolean {
    return this.tiles.length === 0;
  }

  size(): number {
    return this.tiles.length;
  }

  /** Total worms on all tiles in the stack. */
  totalWorms(): number {
    return sumWorms(this.tiles);
  }

  /**
   * Return a shallow copy of all tiles (bottom to top).
   */
  toArray(): Tile[] {
    return [...this.tiles];
  }
}
