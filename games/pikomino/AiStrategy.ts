/**
 * AI strategies for Pikomino.
 *
 * Provides:
 *   - ConservativeStrategy: secures a worm, stops as soon as a tile is in reach
 *   - AggressiveStrategy: chases high faces and a score of 30
 *   - BalancedStrategy: weighs frequency against value, adapts to the standings
 *   - TargetedStrategy: aims for a minimum tile value or a named opponent
 *   - RandomStrategy: random legal choices
 *   - OptimalStrategy: remaining-dice thresholds and steal-vs-center impact
 *
 * These are sample heuristics over the PikominoStrategy contract;
 * none of them searches ahead.
 */

import type { DieFace } from '../../src/dice-system/Dice';
import { pointValue } from '../../src/dice-system/Dice';
import type { Tile } from '../../src/dice-system/Tile';
import type { GameView } from './GameView';
import {
  isActingPlayerLeading,
  maxOpponentWorms,
  targetableTiles,
} from './GameView';
import type { PikominoStrategy } from './Strategy';
import {
  MIN_CLAIM_SCORE,
  canClaimTile,
  defaultTargetTileFor,
  maxBy,
  minBy,
  mostFrequentFace,
} from './Strategy';

/** Return the first face of `order` that can be reserved. */
function firstReservable(
  view: GameView,
  order: readonly DieFace[],
): DieFace | null {
  return order.find((face) => view.turn.canReserve(face)) ?? null;
}

// ── ConservativeStrategy ────────────────────────────────────

/**
 * Takes a worm as soon as one shows, then the most frequent face.
 * Stops the moment a tile can be claimed and prefers the lowest
 * center tile; steals only when the center offers nothing.
 */
export const ConservativeStrategy: PikominoStrategy = {
  name: 'conservative',

  chooseDieFace(view: GameView): DieFace | null {
    const { turn } = view;
    if (!turn.hasWorm && turn.canReserve('WORM')) return 'WORM';
    return mostFrequentFace(turn);
  },

  shouldContinue(view: GameView): boolean {
    return !canClaimTile(view.turn);
  },

  chooseTargetTile(view: GameView): Tile | null {
    if (!view.turn.hasWorm) return null;
    const center = minBy(view.eligibleCenter, (t) => t.value);
    if (center) return center;
    return minBy(view.stealable, (s) => s.tile.worms)?.tile ?? null;
  },
};

// ── AggressiveStrategy ──────────────────────────────────────

const AGGRESSIVE_ORDER: readonly DieFace[] = [
  'WORM',
  'FIVE',
  'FOUR',
  'THREE',
  'TWO',
  'ONE',
];

/** Score AggressiveStrategy keeps rolling towards. */
export const AGGRESSIVE_TARGET_SCORE = 30;

/**
 * Always takes the highest face available and keeps rolling below 30.
 * Steals whenever it can.
 */
export const AggressiveStrategy: PikominoStrategy = {
  name: 'aggressive',

  chooseDieFace(view: GameView): DieFace | null {
    return firstReservable(view, AGGRESSIVE_ORDER);
  },

  shouldContinue(view: GameView): boolean {
    return (
      view.turn.score < AGGRESSIVE_TARGET_SCORE && view.turn.remainingDice > 0
    );
  },

  chooseTargetTile(view: GameView): Tile | null {
    if (!view.turn.hasWorm) return null;
    return defaultTargetTileFor(view);
  },
};

// ── BalancedStrategy ────────────────────────────────────────

const HIGH_FACES: readonly DieFace[] = ['FOUR', 'FIVE', 'WORM'];

/**
 * Balances how many dice a face takes against what they are worth,
 * and adapts tile choice to whether it is ahead or behind.
 */
export const BalancedStrategy: PikominoStrategy = {
  name: 'balanced',

  chooseDieFace(view: GameView): DieFace | null {
    const { turn } = view;
    const faces = turn.reservableFaces();
    if (faces.length === 0) return null;

    if (faces.includes('WORM') && !turn.hasWorm && turn.remainingDice > 4) {
      return 'WORM';
    }

    if (turn.remainingDice <= 3) {
      const high = faces.filter((f) => HIGH_FACES.includes(f));
      const best = maxBy(high, pointValue);
      if (best) return best;
    }

    return maxBy(faces, (f) => turn.countInRoll(f) * pointValue(f));
  },

  shouldContinue(view: GameView): boolean {
    const { turn } = view;
    if (canClaimTile(turn) && turn.remainingDice <= 2) return false;
    if (turn.remainingDice >= 4 && turn.score < 28) return true;
    return !canClaimTile(turn);
  },

  chooseTargetTile(view: GameView): Tile | null {
    if (!view.turn.hasWorm) return null;

    const own = view.actingPlayer.worms;
    const opponents = maxOpponentWorms(view);

    if (own < opponents) {
      const steal = maxBy(view.stealable, (s) => s.tile.worms);
      if (steal) return steal.tile;
    }

    if (own > opponents && view.eligibleCenter.length > 0) {
      const sorted = [...view.eligibleCenter].sort((a, b) => a.value - b.value);
      return sorted[Math.floor(sorted.length / 2)];
    }

    // A steal is worth one extra worm: it also costs the opponent.
    const options: Array<{ tile: Tile; worth: number }> = [
      ...view.eligibleCenter.map((tile) => ({ tile, worth: tile.worms })),
      ...view.stealable.map((s) => ({ tile: s.tile, worth: s.tile.worms + 1 })),
    ];
    return maxBy(options, (o) => o.worth)?.tile ?? null;
  },
};

// ── TargetedStrategy ────────────────────────────────────────

export interface TargetedStrategyOptions {
  /** Opponent whose top tile is stolen whenever possible. */
  targetPlayer?: string;
  /** Lowest tile value worth aiming for (default 25). */
  minTargetValue?: number;
}

const TARGETED_PRIORITY: readonly DieFace[] = ['WORM', 'FIVE', 'FOUR'];

/**
 * Rolls on until a minimum tile value is reached, then prefers
 * stealing from a named opponent, then tiles at or above the target.
 */
export class TargetedStrategy implements PikominoStrategy {
  readonly name = 'targeted';
  readonly targetPlayer: string | null;
  readonly minTargetValue: number;

  constructor(options: TargetedStrategyOptions = {}) {
    this.targetPlayer = options.targetPlayer ?? null;
    this.minTargetValue = options.minTargetValue ?? 25;
  }

  chooseDieFace(view: GameView): DieFace | null {
    const { turn } = view;
    if (turn.score < this.minTargetValue) {
      const preferred = firstReservable(view, TARGETED_PRIORITY);
      if (preferred) return preferred;
    }
    return mostFrequentFace(turn);
  }

  shouldContinue(view: GameView): boolean {
    const { turn } = view;
    if (turn.score < this.minTargetValue && turn.remainingDice > 1) return true;
    return !canClaimTile(turn);
  }

  chooseTargetTile(view: GameView): Tile | null {
    if (!view.turn.hasWorm) return null;

    if (this.targetPlayer !== null) {
      const hit = view.stealable.find((s) => s.owner.name === this.targetPlayer);
      if (hit) return hit.tile;
    }

    const highValue = [
      ...view.stealable.map((s) => s.tile),
      ...view.eligibleCenter,
    ].filter((t) => t.value >= this.minTargetValue);
    const best = maxBy(highValue, (t) => t.value);
    if (best) return best;

    return defaultTargetTileFor(view);
  }
}

// ── RandomStrategy ──────────────────────────────────────────

export interface RandomStrategyOptions {
  /** Chance of rolling again once a tile is in reach (default 0.5). */
  continueProbability?: number;
  /** Random number generator (default Math.random). */
  rng?: () => number;
}

/**
 * Picks uniformly among the reservable dice (so a face showing on
 * three dice is three times as likely as one showing once), rolls on
 * until a tile is in reach and then with a fixed probability, and
 * claims a random legal tile.
 */
export class RandomStrategy implements PikominoStrategy {
  readonly name = 'random';
  readonly continueProbability: number;
  private readonly rng: () => number;

  constructor(options: RandomStrategyOptions = {}) {
    this.continueProbability = options.continueProbability ?? 0.5;
    this.rng = options.rng ?? Math.random;
  }

  chooseDieFace(view: GameView): DieFace | null {
    const { turn } = view;
    const dice = turn.currentRoll.filter((f) => turn.canReserve(f));
    return this.pick(dice);
  }

  shouldContinue(view: GameView): boolean {
    const { turn } = view;
    if (turn.remainingDice === 0) return false;
    if (turn.score < MIN_CLAIM_SCORE || !turn.hasWorm) return true;
    return this.rng() < this.continueProbability;
  }

  chooseTargetTile(view: GameView): Tile | null {
    if (!view.turn.hasWorm) return null;
    return this.pick(targetableTiles(view));
  }

  private pick<T>(items: readonly T[]): T | null {
    if (items.length === 0) return null;
    return items[Math.floor(this.rng() * items.length)];
  }
}

// ── OptimalStrategy ─────────────────────────────────────────

/** Weight of a steal relative to a center pick of equal worms. */
export const STEAL_IMPACT_FACTOR = 2;

/** Extra weight on stealing while not ahead. */
export const TRAILING_STEAL_BONUS = 1.2;

/**
 * Heuristic tuned on simulated play:
 *   1. secure a worm first;
 *   2. with few dice left, take the most points per die;
 *   3. otherwise score count x points plus a small frequency bonus;
 *   4. stop thresholds scale with the remaining dice and the worm gap;
 *   5. a steal counts double, since it also costs the opponent.
 */
export const OptimalStrategy: PikominoStrategy = {
  name: 'optimal',

  chooseDieFace(view: GameView): DieFace | null {
    const { turn } = view;
    const faces = turn.reservableFaces();
    if (faces.length === 0) return null;

    if (faces.includes('WORM') && !turn.hasWorm) return 'WORM';

    if (turn.remainingDice <= 3) {
      return maxBy(faces, pointValue);
    }

    const trailing = !isActingPlayerLeading(view);
    return maxBy(faces, (face) => {
      const count = turn.countInRoll(face);
      const base = count * pointValue(face);
      const frequencyBonus = (count - 1) * 0.5;
      const positionBonus =
        trailing && (face === 'WORM' || face === 'FIVE') ? 1 : 0;
      return base + frequencyBonus + positionBonus;
    });
  },

  shouldContinue(view: GameView): boolean {
    const { turn } = view;
    if (turn.remainingDice === 0) return false;
    if (!canClaimTile(turn)) return true;

    const own = view.actingPlayer.worms;
    const opponents = maxOpponentWorms(view);

    let base: number;
    if (own < opponents - 5) {
      base = 30;
    } else if (own > opponents + 3) {
      base = 23;
    } else {
      base = 26;
    }

    let target: number;
    if (turn.remainingDice >= 5) {
      target = base + 2;
    } else if (turn.remainingDice >= 3) {
      target = base;
    } else if (turn.remainingDice >= 2) {
      target = base - 3;
    } else {
      target = MIN_CLAIM_SCORE;
    }

    return turn.score < target;
  },

  chooseTargetTile(view: GameView): Tile | null {
    if (!view.turn.hasWorm) return null;

    const bestSteal = maxBy(view.stealable, (s) => s.tile.worms);
    const bestCenter = maxBy(view.eligibleCenter, (t) => t.worms);

    if (bestSteal && bestCenter) {
      const leading = view.actingPlayer.worms >= maxOpponentWorms(view);
      let stealImpact = bestSteal.tile.worms * STEAL_IMPACT_FACTOR;
      if (!leading) stealImpact *= TRAILING_STEAL_BONUS;
      return stealImpact > bestCenter.worms ? bestSteal.tile : bestCenter;
    }

    return bestSteal?.tile ?? bestCenter;
  },
};
