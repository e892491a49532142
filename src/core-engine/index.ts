/**
 * Core Engine Module
 *
 * Game-agnostic turn machinery: player seating, phase transitions,
 * turn counting and rotation, lifecycle events, and the snapshot
 * types shared by histories and event payloads.
 */
export const ENGINE_VERSION = '0.1.0';

// Game state types and factory
export type { GamePhase, PlayerInfo, GameState, GameStateOptions } from './GameState';
export { createGameState } from './GameState';

// Turn sequencer functions
export {
  beginTurn,
  advanceTurn,
  transitionTo,
  startGame,
  endGame,
} from './TurnSequencer';

// Game event system
export type {
  TurnStartedPayload,
  DiceRolledPayload,
  DiceReservedPayload,
  TurnCompletedPayload,
  GameEndedPayload,
  GameEventMap,
  GameEventName,
  GameEventListener,
} from './GameEventEmitter';
export { GameEventEmitter } from './GameEventEmitter';

// Shared transcript snapshot types
export type { TileSnapshot, TurnOutcome } from './TranscriptTypes';
export { TURN_OUTCOMES, snapshotTile, snapshotTiles } from './TranscriptTypes';
