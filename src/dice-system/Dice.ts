/**
 * Die faces and rolling for the Pikomino engine.
 *
 * A Pikomino die has the numbers one to five plus a worm symbol.
 * The worm scores five points but is its own face: reserving fives
 * never counts as reserving worms, and vice versa.
 */

/** The six faces of a die. */
export type DieFace = 'ONE' | 'TWO' | 'THREE' | 'FOUR' | 'FIVE' | 'WORM';

/** All faces, in ascending order with the worm last. */
export const DIE_FACES: readonly DieFace[] = [
  'ONE',
  'TWO',
  'THREE',
  'FOUR',
  'FIVE',
  'WORM',
] as const;

/** Number of dice a player starts each turn with. */
export const DICE_PER_TURN = 8;

const POINT_VALUES: Record<DieFace, number> = {
  ONE: 1,
  TWO: 2,
  THREE: 3,
  FOUR: 4,
  FIVE: 5,
  WORM: 5,
};

/**
 * Points a single die showing `face` contributes to a turn score.
 */
export function pointValue(face: DieFace): number {
  return POINT_VALUES[face];
}

/**
 * Roll one die. The generator must return a value in [0, 1)
 * (same contract as Math.random).
 */
export function rollDie(rng: () => number = Math.random): DieFace {
  return DIE_FACES[Math.floor(rng() * DIE_FACES.length)];
}

/**
 * Roll `count` independent dice.
 *
 * @throws If `count` is negative or not an integer.
 */
export function rollDice(
  count: number,
  rng: () => number = Math.random,
): DieFace[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Cannot roll ${count} dice`);
  }
  const faces: DieFace[] = [];
  for (let i = 0; i < count; i++) {
    faces.push(rollDie(rng));
  }
  return faces;
}

/**
 * Count how many times `face` appears in a roll.
 */
export function countFace(roll: readonly DieFace[], face: DieFace): number {
  let count = 0;
  for (const f of roll) {
    if (f === face) count++;
  }
  return count;
}
