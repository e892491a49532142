/**
 * The decision protocol every Pikomino player is driven by.
 *
 * A strategy answers three questions during a turn, each given a
 * fresh GameView:
 *   1. which face to reserve from the roll on the table;
 *   2. whether to roll again (asked only while dice remain);
 *   3. which tile to claim (asked once, only when a worm is reserved).
 *
 * The engine validates every answer. A face that cannot be reserved
 * fails the turn; a tile outside the legal targets counts as no tile.
 *
 * DefaultStrategy is what a player without an explicit strategy uses.
 */

import type { DieFace } from '../../src/dice-system/Dice';
import type { Tile } from '../../src/dice-system/Tile';
import type { GameView } from './GameView';
import type { TurnSnapshot } from './TurnState';
import { defaultTargetTile } from './PikominoRules';

// ── Strategy interface ──────────────────────────────────────

export interface PikominoStrategy {
  /** Human-readable strategy name. */
  readonly name: string;

  /**
   * Choose a face to reserve from `view.turn.currentRoll`.
   *
   * @returns A face satisfying `view.turn.canReserve`, or null to
   *          give up the turn.
   */
  chooseDieFace(view: GameView): DieFace | null;

  /**
   * Decide whether to roll the remaining dice again.
   */
  shouldContinue(view: GameView): boolean;

  /**
   * Choose a tile from `view.stealable` or `view.eligibleCenter`.
   *
   * @returns The tile instance to claim, or null to forfeit.
   */
  chooseTargetTile(view: GameView): Tile | null;
}

// ── Shared heuristics ───────────────────────────────────────

/**
 * The reservable face appearing most often in the roll. The face
 * seen first in the roll wins ties.
 */
export function mostFrequentFace(turn: TurnSnapshot): DieFace | null {
  let best: DieFace | null = null;
  let bestCount = 0;
  for (const face of turn.reservableFaces()) {
    const count = turn.countInRoll(face);
    if (count > bestCount) {
      best = face;
      bestCount = count;
    }
  }
  return best;
}

/**
 * The candidate with the highest score; the first one wins ties.
 */
export function maxBy<T>(items: readonly T[], score: (item: T) => number): T | null {
  let best: T | null = null;
  let bestScore = -Infinity;
  for (const item of items) {
    const s = score(item);
    if (s > bestScore) {
      best = item;
      bestScore = s;
    }
  }
  return best;
}

/**
 * The candidate with the lowest score; the first one wins ties.
 */
export function minBy<T>(items: readonly T[], score: (item: T) => number): T | null {
  return maxBy(items, (item) => -score(item));
}

/**
 * Steal-first pick: the stealable tile with the most worms, else the
 * highest center tile in reach.
 */
export function defaultTargetTileFor(view: GameView): Tile | null {
  return defaultTargetTile(view.stealable, view.eligibleCenter);
}

/** Smallest score that can claim any tile. */
export const MIN_CLAIM_SCORE = 21;

/** Whether the turn as it stands could claim a tile from a full center. */
export function canClaimTile(turn: TurnSnapshot): boolean {
  return turn.score >= MIN_CLAIM_SCORE && turn.hasWorm;
}

// ── DefaultStrategy ─────────────────────────────────────────

/** Score at which DefaultStrategy stops rolling. */
export const DEFAULT_STOP_SCORE = 25;

/**
 * Reserves the most frequent face, keeps rolling below 25 points,
 * and steals the best stealable tile before falling back to the
 * highest center tile in reach.
 */
export const DefaultStrategy: PikominoStrategy = {
  name: 'default',

  chooseDieFace(view: GameView): DieFace | null {
    return mostFrequentFace(view.turn);
  },

  shouldContinue(view: GameView): boolean {
    return view.turn.score < DEFAULT_STOP_SCORE;
  },

  chooseTargetTile(view: GameView): Tile | null {
    return defaultTargetTileFor(view);
  },
};
