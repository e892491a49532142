/**
 * Typed Event Emitter for the Pikomino engine.
 *
 * Provides a type-safe, zero-dependency event emitter for turn lifecycle
 * events. The engine is synchronous, so listeners run inline while a
 * turn is being resolved.
 *
 * Sessions emit these events at key lifecycle points. Tools (a stepping
 * UI, the simulation CLI, tests) subscribe to them to follow a turn
 * round by round.
 */

import type { DieFace } from '../dice-system/Dice';
import type { GamePhase } from './GameState';
import type { TileSnapshot, TurnOutcome } from './TranscriptTypes';

// ── Event Payloads ──────────────────────────────────────────

/**
 * Emitted when a new turn begins.
 */
export interface TurnStartedPayload {
  /** Turn number (1-based). */
  readonly turnNumber: number;
  /** Index of the player whose turn is starting. */
  readonly playerIndex: number;
  /** Name of the player whose turn is starting. */
  readonly playerName: string;
  /** Name of the strategy deciding for this player. */
  readonly strategyName: string;
}

/**
 * Emitted after each roll of the remaining dice.
 */
export interface DiceRolledPayload {
  readonly turnNumber: number;
  readonly playerIndex: number;
  /** Faces rolled, in roll order. */
  readonly dice: readonly DieFace[];
}

/**
 * Emitted after a face has been reserved.
 */
export interface DiceReservedPayload {
  readonly turnNumber: number;
  readonly playerIndex: number;
  readonly face: DieFace;
  /** How many dice showed the reserved face. */
  readonly count: number;
  /** Dice left to roll after the reservation. */
  readonly remainingDice: number;
  /** Running total of the reserved dice. */
  readonly score: number;
}

/**
 * Emitted when a turn's outcome has been applied.
 */
export interface TurnCompletedPayload {
  readonly turnNumber: number;
  readonly playerIndex: number;
  readonly playerName: string;
  readonly outcome: TurnOutcome;
  /** Final score of the reserved dice. */
  readonly score: number;
  /** Tile claimed this turn, or null on failure. */
  readonly tile: TileSnapshot | null;
  /** Current game phase after the turn. */
  readonly phase: GamePhase;
}

/**
 * Emitted when the game has ended.
 */
export interface GameEndedPayload {
  /** Final turn number. */
  readonly finalTurnNumber: number;
  /** Index of the winning player. */
  readonly winnerIndex: number;
  /** Name of the winning player. */
  readonly winnerName: string;
  /** Worm totals by player name. */
  readonly scores: Readonly<Record<string, number>>;
}

// ── Event Map ───────────────────────────────────────────────

/**
 * Maps event names to their payload types.
 *
 * Subscribing to an event name not in this map produces a
 * compile-time TypeScript error.
 */
export interface GameEventMap {
  'turn-started': TurnStartedPayload;
  'dice-rolled': DiceRolledPayload;
  'dice-reserved': DiceReservedPayload;
  'turn-completed': TurnCompletedPayload;
  'game-ended': GameEndedPayload;
}

/** Union of all valid game event names. */
export type GameEventName = keyof GameEventMap;

// ── Listener types ──────────────────────────────────────────

/** A callback for a specific event type. */
export type GameEventListener<K extends GameEventName> = (
  payload: GameEventMap[K],
) => void;

/** Registered listeners, one list per event. */
type ListenerTable = {
  [K in GameEventName]: Array<GameEventListener<K>>;
};

// ── Emitter ─────────────────────────────────────────────────

/**
 * A minimal, typed event emitter for game lifecycle events.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter();
 * emitter.on('dice-reserved', (payload) => {
 *   console.log(`${payload.count} x ${payload.face}, score ${payload.score}`);
 * });
 * ```
 */
export class GameEventEmitter {
  private readonly listeners: ListenerTable = {
    'turn-started': [],
    'dice-rolled': [],
    'dice-reserved': [],
    'turn-completed': [],
    'game-ended': [],
  };

  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): () => void {
    this.listeners[event].push(listener);
    return () => this.off(event, listener);
  }

  /** Remove one registration of `listener`; unknown listeners are ignored. */
  off<K extends GameEventName>(
    event: K,
    listener: GameEventListener<K>,
  ): void {
    const list = this.listeners[event];
    const at = list.indexOf(listener);
    if (at !== -1) list.splice(at, 1);
  }

  /**
   * Call every listener of `event` synchronously, in registration
   * order. Listeners added or removed while emitting take effect from
   * the next emission.
   */
  emit<K extends GameEventName>(event: K, payload: GameEventMap[K]): void {
    for (const listener of [...this.listeners[event]]) {
      listener(payload);
    }
  }
}
