import { describe, it, expect } from 'vitest';
import {
  DefaultStrategy,
  canClaimTile,
  maxBy,
  minBy,
  mostFrequentFace,
} from '../../games/pikomino/Strategy';
import { TurnState } from '../../games/pikomino/TurnState';
import { makeView, playTurn, seat } from './helpers';

/** Score 25 with a worm, three dice left. */
function turnOf25(): TurnState {
  return playTurn([
    { roll: ['WORM', 'WORM', 'WORM', 'ONE', 'ONE', 'TWO', 'TWO', 'THREE'], reserve: 'WORM' },
    { roll: ['FIVE', 'FIVE', 'ONE', 'ONE', 'ONE'], reserve: 'FIVE' },
  ]);
}

describe('Strategy helpers', () => {
  describe('mostFrequentFace', () => {
    it('should give ties to the face seen first', () => {
      const turn = playTurn([{ roll: ['ONE', 'FOUR', 'FOUR', 'ONE', 'TWO', 'THREE', 'FIVE', 'WORM'] }]);
      expect(mostFrequentFace(turn.snapshot())).toBe('ONE');
    });

    it('should skip faces already reserved', () => {
      const turn = playTurn([
        { roll: ['WORM', 'WORM', 'ONE', 'ONE', 'ONE', 'ONE', 'TWO', 'TWO'], reserve: 'ONE' },
        { roll: ['ONE', 'ONE', 'ONE', 'TWO'] },
      ]);
      expect(mostFrequentFace(turn.snapshot())).toBe('TWO');
    });

    it('should return null when nothing is reservable', () => {
      const turn = playTurn([
        { roll: ['WORM', 'WORM', 'ONE', 'ONE', 'ONE', 'ONE', 'TWO', 'TWO'], reserve: 'WORM' },
        { roll: ['WORM', 'WORM', 'WORM', 'WORM', 'WORM', 'WORM'] },
      ]);
      expect(mostFrequentFace(turn.snapshot())).toBeNull();
    });
  });

  describe('maxBy / minBy', () => {
    it('should give ties to the first item', () => {
      const items = [{ id: 'a', n: 2 }, { id: 'b', n: 2 }, { id: 'c', n: 1 }];
      expect(maxBy(items, (i) => i.n)?.id).toBe('a');
      expect(minBy(items, (i) => i.n)?.id).toBe('c');
    });

    it('should return null for no items', () => {
      expect(maxBy([], () => 0)).toBeNull();
      expect(minBy([], () => 0)).toBeNull();
    });
  });

  describe('canClaimTile', () => {
    it('should need 21 points and a worm', () => {
      expect(canClaimTile(turnOf25().snapshot())).toBe(true);

      const noWorm = playTurn([
        { roll: ['FIVE', 'FIVE', 'FIVE', 'FIVE', 'FOUR', 'FOUR', 'FOUR', 'FOUR'], reserve: 'FIVE' },
        { roll: ['FOUR', 'FOUR', 'FOUR', 'FOUR'], reserve: 'FOUR' },
      ]);
      expect(noWorm.totalScore()).toBe(36);
      expect(canClaimTile(noWorm.snapshot())).toBe(false);
    });
  });
});

describe('DefaultStrategy', () => {
  it('should be named default', () => {
    expect(DefaultStrategy.name).toBe('default');
  });

  it('should reserve the most frequent face', () => {
    const turn = playTurn([{ roll: ['TWO', 'THREE', 'THREE', 'THREE', 'WORM', 'WORM', 'ONE', 'ONE'] }]);
    expect(DefaultStrategy.chooseDieFace(makeView({ turn }))).toBe('THREE');
  });

  it('should keep rolling below 25', () => {
    const low = playTurn([
      { roll: ['WORM', 'WORM', 'WORM', 'ONE', 'ONE', 'TWO', 'TWO', 'THREE'], reserve: 'WORM' },
    ]);
    expect(DefaultStrategy.shouldContinue(makeView({ turn: low }))).toBe(true);
    expect(DefaultStrategy.shouldContinue(makeView({ turn: turnOf25() }))).toBe(false);
  });

  it('should steal before taking from the center', () => {
    const view = makeView({
      turn: turnOf25(),
      seats: [seat('Alice'), seat('Bob', [25])],
      center: [21, 24, 25],
    });
    expect(DefaultStrategy.chooseTargetTile(view)).toBe(view.stealable[0].tile);
  });

  it('should take the highest center tile in reach', () => {
    const view = makeView({ turn: turnOf25(), center: [21, 24, 26] });
    expect(DefaultStrategy.chooseTargetTile(view)?.value).toBe(24);
  });

  it('should return null with nothing in reach', () => {
    const view = makeView({ turn: turnOf25(), center: [26, 27] });
    expect(DefaultStrategy.chooseTargetTile(view)).toBeNull();
  });
});
