/**
 * Factory for a Pikomino game session.
 * Used by the simulation script, the tournament runner and tests.
 */
import type { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { ReadonlyGameHistory } from './GameHistory';
import type { PikominoStrategy } from './Strategy';
import type {
  PikominoSession,
  SessionState,
  TurnResult,
  WinnerInfo,
} from './PikominoGame';
import {
  DEFAULT_MAX_TURNS,
  advancePlayer,
  getSessionState,
  getWinner,
  isGameOver,
  playGame,
  resolveTurn,
  setupPikominoGame,
} from './PikominoGame';
import type { SessionConfig } from './PikominoConfig';
import { createSeededRng, createStrategy } from './PikominoConfig';

export interface SessionOptions {
  /** RNG for dice (and random strategies). Overrides `seed`. */
  rng?: () => number;
  /** Seed for a deterministic RNG. Default: Math.random. */
  seed?: number;
  /** Seat of the first player. Default: 0 */
  firstPlayerIndex?: number;
  events?: GameEventEmitter;
  /** Turn limit for `playToEnd`. Default: 1000 */
  maxTurns?: number;
}

/**
 * A running game with a method surface for the host: read the state,
 * resolve and rotate turns, or play through to the end.
 */
export class GameSession {
  readonly session: PikominoSession;
  private readonly maxTurns: number;

  constructor(session: PikominoSession, maxTurns: number = DEFAULT_MAX_TURNS) {
    this.session = session;
    this.maxTurns = maxTurns;
  }

  get history(): ReadonlyGameHistory {
    return this.session.history;
  }

  get events(): GameEventEmitter {
    return this.session.events;
  }

  state(): SessionState {
    return getSessionState(this.session);
  }

  isGameOver(): boolean {
    return isGameOver(this.session);
  }

  /** Resolve the current player's turn without rotating. */
  resolveTurn(): TurnResult {
    return resolveTurn(this.session);
  }

  advancePlayer(): void {
    advancePlayer(this.session);
  }

  playToEnd(): WinnerInfo {
    return playGame(this.session, this.maxTurns);
  }

  winner(): WinnerInfo {
    return getWinner(this.session);
  }
}

function resolveRng(options: SessionOptions): () => number {
  if (options.rng) return options.rng;
  if (options.seed !== undefined) return createSeededRng(options.seed);
  return Math.random;
}

/**
 * Seat the named players with their strategies (a missing or null
 * strategy means the default one) and lay out the tiles.
 */
export function createSession(
  playerNames: string[],
  strategies: Array<PikominoStrategy | null | undefined> = [],
  options: SessionOptions = {},
): GameSession {
  const session = setupPikominoGame({
    playerNames,
    strategies,
    rng: resolveRng(options),
    firstPlayerIndex: options.firstPlayerIndex,
    events: options.events,
  });
  return new GameSession(session, options.maxTurns);
}

/**
 * Build a session from a validated configuration. Random strategies
 * draw from the same seeded RNG as the dice.
 */
export function createSessionFromConfig(
  config: SessionConfig,
  options: Omit<SessionOptions, 'seed' | 'firstPlayerIndex'> = {},
): GameSession {
  const rng = resolveRng({ rng: options.rng, seed: config.seed });
  return createSession(
    config.players.map((p) => p.name),
    config.players.map((p) => createStrategy(p.strategy, rng)),
    { ...options, rng, firstPlayerIndex: config.firstPlayerIndex },
  );
}
