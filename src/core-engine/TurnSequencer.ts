/**
 * Turn sequencer for the Pikomino engine.
 *
 * Provides functions to manage turn order, phase transitions,
 * and player rotation within a GameState. Operates on the
 * GameState directly (mutation-based); the game loop is the
 * only writer.
 *
 * Starting a turn and rotating to the next player are separate
 * steps so that a caller can pace the two independently.
 */

import type { GamePhase, GameState } from './GameState';

// ── Mutation functions ──────────────────────────────────────

/**
 * Mark the start of a new turn for the current player.
 *
 * @returns The new turn number (1-based).
 * @throws If the game is not in the `playing` phase.
 */
export function beginTurn<T>(state: GameState<T>): number {
  assertPlaying(state, 'begin turn');
  state.turnNumber++;
  return state.turnNumber;
}

/**
 * Advance to the next player.
 *
 * Rotates `currentPlayerIndex` to the next player in seat order
 * (wrapping around). Does not touch the turn counter.
 *
 * @throws If the game is not in the `playing` phase.
 */
export function advanceTurn<T>(state: GameState<T>): void {
  assertPlaying(state, 'advance turn');
  state.currentPlayerIndex =
    (state.currentPlayerIndex + 1) % state.players.length;
}

function assertPlaying<T>(state: GameState<T>, action: string): void {
  if (state.phase === 'ended') {
    throw new Error(`Cannot ${action}: game has ended`);
  }
  if (state.phase === 'setup') {
    throw new Error(
      `Cannot ${action} during setup phase; transition to playing first`,
    );
  }
}

/**
 * Transition the game to a new phase.
 *
 * Valid transitions:
 * - `setup`   -> `playing`
 * - `playing` -> `ended`
 *
 * @throws If the transition is invalid (e.g. `ended` -> `playing`).
 * @throws If transitioning to the same phase.
 */
export function transitionTo<T>(
  state: GameState<T>,
  newPhase: GamePhase,
): void {
  const current = state.phase;

  if (current === newPhase) {
    throw new Error(`Game is already in phase "${current}"`);
  }

  const allowed = VALID_TRANSITIONS[current];
  if (!allowed.includes(newPhase)) {
    throw new Error(
      `Invalid phase transition: "${current}" -> "${newPhase}". ` +
        `Allowed transitions from "${current}": ${allowed.join(', ') || 'none'}`,
    );
  }

  state.phase = newPhase;
}

/** Map of valid phase transitions. */
const VALID_TRANSITIONS: Record<GamePhase, GamePhase[]> = {
  setup: ['playing'],
  playing: ['ended'],
  ended: [],
};

// ── Convenience ─────────────────────────────────────────────

/**
 * Start the game (transition from setup to playing).
 */
export function startGame<T>(state: GameState<T>): void {
  transitionTo(state, 'playing');
}

/**
 * End the game (transition from playing to ended).
 */
export function endGame<T>(state: GameState<T>): void {
  transitionTo(state, 'ended');
}
