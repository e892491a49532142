/**
 * Shared helpers for the Pikomino tests.
 */

import { DIE_FACES } from '../../src/dice-system/Dice';
import type { DieFace } from '../../src/dice-system/Dice';
import { createTile } from '../../src/dice-system/Tile';
import type { Tile } from '../../src/dice-system/Tile';
import { TilePool } from '../../src/dice-system/TilePool';
import { TileStack } from '../../src/dice-system/TileStack';
import { TurnState } from '../../games/pikomino/TurnState';
import { GameHistory } from '../../games/pikomino/GameHistory';
import { createGameView } from '../../games/pikomino/GameView';
import type { GameView } from '../../games/pikomino/GameView';
import type { Seat } from '../../games/pikomino/PikominoRules';

/** Deterministic LCG RNG for reproducible tests. */
export function createTestRng(seed: number = 42): () => number {
  let s = seed;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

/**
 * RNG that makes rollDie produce exactly the given faces, in order.
 * Throws once the script runs out, so a test notices extra rolls.
 */
export function faceRng(faces: DieFace[]): () => number {
  let i = 0;
  return () => {
    if (i >= faces.length) {
      throw new Error(`Scripted dice exhausted after ${faces.length} faces`);
    }
    return (DIE_FACES.indexOf(faces[i++]) + 0.5) / DIE_FACES.length;
  };
}

/** A seat holding tiles of the given values, bottom to top. */
export function seat(name: string, values: number[] = []): Seat {
  return { name, tiles: new TileStack(values.map(createTile)) };
}

/** A pool holding tiles of the given values. */
export function pool(values: number[]): TilePool {
  return new TilePool(values.map(createTile));
}

/**
 * Drive a fresh TurnState through the given rolls, reserving the
 * paired face after each one. Leaves the turn awaiting a choice when
 * the last roll has no paired face.
 */
export function playTurn(
  steps: Array<{ roll: DieFace[]; reserve?: DieFace }>,
): TurnState {
  const turn = new TurnState();
  steps.forEach((step, i) => {
    turn.applyRoll(step.roll);
    if (step.reserve) {
      turn.reserve(step.reserve);
      if (i < steps.length - 1) turn.continueRolling();
    }
  });
  return turn;
}

export interface ViewFixture {
  turn?: TurnState;
  seats?: Seat[];
  actingIndex?: number;
  center?: number[];
  removed?: number[];
}

/** Build a GameView over a hand-made table. */
export function makeView(fixture: ViewFixture = {}): GameView {
  return createGameView({
    turn: fixture.turn ?? new TurnState(),
    seats: fixture.seats ?? [seat('Alice'), seat('Bob')],
    actingIndex: fixture.actingIndex ?? 0,
    center: pool(fixture.center ?? []),
    removed: pool(fixture.removed ?? []),
    history: new GameHistory(),
    turnNumber: 1,
  });
}

export function values(tiles: readonly Tile[]): number[] {
  return tiles.map((t) => t.value);
}
