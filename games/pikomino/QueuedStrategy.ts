/**
 * QueuedStrategy -- decisions delivered from outside the engine.
 *
 * The engine is synchronous, so a human player's choices have to be
 * in hand before a turn is resolved. An interactive layer collects
 * them (dice face, roll-again, tile), queues them here, then calls
 * `resolveTurn`. Each protocol call consumes the next queued answer
 * of its kind; when a queue runs dry the fallback strategy answers.
 */

import type { DieFace } from '../../src/dice-system/Dice';
import type { Tile } from '../../src/dice-system/Tile';
import type { GameView } from './GameView';
import type { PikominoStrategy } from './Strategy';
import { DefaultStrategy } from './Strategy';

export interface QueuedStrategyOptions {
  /** Name reported for the player (default 'queued'). */
  name?: string;
  /** Strategy consulted when a queue is empty (default DefaultStrategy). */
  fallback?: PikominoStrategy;
}

/** Number of queued answers of each kind. */
export interface PendingDecisions {
  faces: number;
  continues: number;
  tiles: number;
}

export class QueuedStrategy implements PikominoStrategy {
  readonly name: string;
  private readonly fallback: PikominoStrategy;
  private readonly faces: Array<DieFace | null> = [];
  private readonly continues: boolean[] = [];
  private readonly tiles: Array<Tile | null> = [];

  constructor(options: QueuedStrategyOptions = {}) {
    this.name = options.name ?? 'queued';
    this.fallback = options.fallback ?? DefaultStrategy;
  }

  /** Queue face choices; null gives up the turn at that roll. */
  enqueueFace(...faces: Array<DieFace | null>): this {
    this.faces.push(...faces);
    return this;
  }

  enqueueContinue(...decisions: boolean[]): this {
    this.continues.push(...decisions);
    return this;
  }

  /** Queue a tile choice; null forfeits even when a tile is legal. */
  enqueueTile(tile: Tile | null): this {
    this.tiles.push(tile);
    return this;
  }

  pending(): PendingDecisions {
    return {
      faces: this.faces.length,
      continues: this.continues.length,
      tiles: this.tiles.length,
    };
  }

  clear(): void {
    this.faces.length = 0;
    this.continues.length = 0;
    this.tiles.length = 0;
  }

  chooseDieFace(view: GameView): DieFace | null {
    if (this.faces.length > 0) {
      return this.faces.shift() ?? null;
    }
    return this.fallback.chooseDieFace(view);
  }

  shouldContinue(view: GameView): boolean {
    const next = this.continues.shift();
    return next ?? this.fallback.shouldContinue(view);
  }

  chooseTargetTile(view: GameView): Tile | null {
    if (this.tiles.length > 0) {
      return this.tiles.shift() ?? null;
    }
    return this.fallback.chooseTargetTile(view);
  }
}
