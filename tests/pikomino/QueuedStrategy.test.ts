import { describe, it, expect } from 'vitest';
import { QueuedStrategy } from '../../games/pikomino/QueuedStrategy';
import { ConservativeStrategy } from '../../games/pikomino/AiStrategy';
import { createTile } from '../../src/dice-system/Tile';
import { makeView, playTurn } from './helpers';

function view() {
  return makeView({
    turn: playTurn([{ roll: ['ONE', 'ONE', 'ONE', 'FOUR', 'FOUR', 'TWO', 'WORM', 'FIVE'] }]),
    center: [21, 22],
  });
}

describe('QueuedStrategy', () => {
  it('should default its name to queued', () => {
    expect(new QueuedStrategy().name).toBe('queued');
    expect(new QueuedStrategy({ name: 'Alice at the keyboard' }).name).toBe(
      'Alice at the keyboard',
    );
  });

  it('should answer from the queues in order', () => {
    const strategy = new QueuedStrategy()
      .enqueueFace('FOUR', 'WORM')
      .enqueueContinue(true, false);
    const v = view();

    expect(strategy.chooseDieFace(v)).toBe('FOUR');
    expect(strategy.chooseDieFace(v)).toBe('WORM');
    expect(strategy.shouldContinue(v)).toBe(true);
    expect(strategy.shouldContinue(v)).toBe(false);
  });

  it('should deliver a queued null face', () => {
    const strategy = new QueuedStrategy().enqueueFace(null);
    expect(strategy.chooseDieFace(view())).toBeNull();
  });

  it('should deliver queued tiles, including a forfeit', () => {
    const tile = createTile(22);
    const strategy = new QueuedStrategy().enqueueTile(tile).enqueueTile(null);

    expect(strategy.chooseTargetTile(view())).toBe(tile);
    expect(strategy.chooseTargetTile(view())).toBeNull();
  });

  it('should fall back to the default strategy on empty queues', () => {
    const strategy = new QueuedStrategy();
    const v = view();

    expect(strategy.chooseDieFace(v)).toBe('ONE');
    expect(strategy.shouldContinue(v)).toBe(true);
  });

  it('should use the configured fallback', () => {
    const strategy = new QueuedStrategy({ fallback: ConservativeStrategy });
    expect(strategy.chooseDieFace(view())).toBe('WORM');
  });

  it('should report and clear pending decisions', () => {
    const strategy = new QueuedStrategy()
      .enqueueFace('ONE', 'TWO')
      .enqueueContinue(false)
      .enqueueTile(null);

    expect(strategy.pending()).toEqual({ faces: 2, continues: 1, tiles: 1 });
    strategy.clear();
    expect(strategy.pending()).toEqual({ faces: 0, continues: 0, tiles: 0 });
  });
});
