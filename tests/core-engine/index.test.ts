import { describe, it, expect } from 'vitest';
import {
  ENGINE_VERSION,
  createGameState,
  beginTurn,
  advanceTurn,
  transitionTo,
  startGame,
  endGame,
  GameEventEmitter,
  TURN_OUTCOMES,
  snapshotTile,
} from '../../src/core-engine/index';

describe('core-engine barrel exports', () => {
  it('should export the module version', () => {
    expect(ENGINE_VERSION).toBe('0.1.0');
  });

  it('should export the event emitter and snapshot helpers', () => {
    expect(typeof GameEventEmitter).toBe('function');
    expect(typeof snapshotTile).toBe('function');
    expect(TURN_OUTCOMES).toHaveLength(4);
  });

  it('should drive a two-seat game through the barrel', () => {
    const state = createGameState<null>({
      players: [
        { name: 'P1', strategyName: 'default' },
        { name: 'P2', strategyName: 'random' },
      ],
      createPlayerState: () => null,
    });

    startGame(state);
    expect(beginTurn(state)).toBe(1);
    advanceTurn(state);
    expect(state.currentPlayerIndex).toBe(1);

    endGame(state);
    expect(state.phase).toBe('ended');
    expect(() => transitionTo(state, 'playing')).toThrow('Invalid phase transition');
  });
});
