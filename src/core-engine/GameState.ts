/**
 * Game phase and state types for the Pikomino engine.
 *
 * GamePhase represents the high-level lifecycle of a game session.
 * GameState is a generic container that tracks players, turn order,
 * and phase transitions.
 */

/**
 * High-level phases of a game session.
 *
 * - `setup`   -- Players seated, tiles laid out, no turn played yet.
 * - `playing` -- Active gameplay with turn-based actions.
 * - `ended`   -- The center pool is exhausted; results phase.
 */
export type GamePhase = 'setup' | 'playing' | 'ended';

/**
 * Identifies a seated player.
 */
export interface PlayerInfo {
  /** Display name for the player (unique within a session). */
  readonly name: string;
  /** Name of the decision strategy driving this player. */
  readonly strategyName: string;
}

/**
 * Generic game state container.
 *
 * @typeParam T  Game-specific per-player state (a tile stack and
 *               its bound strategy, for Pikomino).
 */
export interface GameState<T> {
  /** Information about each player, indexed by seat. */
  readonly players: readonly PlayerInfo[];
  /** Per-player game-specific state, parallel to `players`. */
  readonly playerStates: T[];
  /** Index into `players` / `playerStates` for the active player. */
  currentPlayerIndex: number;
  /** Current high-level phase. */
  phase: GamePhase;
  /** Number of turns started so far (starts at 0). */
  turnNumber: number;
}

/**
 * Options for creating a new GameState.
 */
export interface GameStateOptions<T> {
  /** Player info (must have at least 1 entry). */
  players: PlayerInfo[];
  /** Initial per-player state factory. Called once per player. */
  createPlayerState: (playerIndex: number) => T;
  /** Index of the first player to act (defaults to 0). */
  firstPlayerIndex?: number;
}

/**
 * Create a new GameState from options.
 *
 * @throws If no players are provided.
 * @throws If two players share a name.
 * @throws If `firstPlayerIndex` is out of bounds.
 */
export function createGameState<T>(options: GameStateOptions<T>): GameState<T> {
  const {
    players,
    createPlayerState,
    firstPlayerIndex = 0,
  } = options;

  if (players.length < 1) {
    throw new Error('A game requires at least 1 player, got 0');
  }

  const names = new Set(players.map((p) => p.name));
  if (names.size !== players.length) {
    throw new Error(
      `Player names must be unique, got ${players.map((p) => p.name).join(', ')}`,
    );
  }

  if (firstPlayerIndex < 0 || firstPlayerIndex >= players.length) {
    throw new Error(
      `firstPlayerIndex ${firstPlayerIndex} is out of bounds for ${players.length} players`,
    );
  }

  const playerStates = players.map((_, i) => createPlayerState(i));

  return {
    players,
    playerStates,
    currentPlayerIndex: firstPlayerIndex,
    phase: 'setup',
    turnNumber: 0,
  };
}
