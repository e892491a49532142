/**
 * Pikomino game orchestration -- ties together the dice, the tile
 * pools, the strategies, the rules and the turn sequencer into a
 * playable session.
 *
 * Provides:
 *   - PikominoPlayerState / PikominoSession: the table and its players
 *   - Game setup (sixteen tiles in the center, strategies bound)
 *   - Turn resolution: roll -> choose -> reserve rounds, then tile
 *     allocation or the failure penalty, then a history record
 *   - Rotation, termination, winner, and a serializable state view
 *
 * Everything here is synchronous; one call to `resolveTurn` owns the
 * session until it returns.
 */

import type { GameState } from '../../src/core-engine/GameState';
import { createGameState } from '../../src/core-engine/GameState';
import {
  advanceTurn,
  beginTurn,
  endGame,
  startGame,
} from '../../src/core-engine/TurnSequencer';
import { GameEventEmitter } from '../../src/core-engine/GameEventEmitter';
import type { TileSnapshot, TurnOutcome } from '../../src/core-engine/TranscriptTypes';
import { snapshotTile, snapshotTiles } from '../../src/core-engine/TranscriptTypes';
import type { DieFace } from '../../src/dice-system/Dice';
import { rollDice } from '../../src/dice-system/Dice';
import type { Tile } from '../../src/dice-system/Tile';
import { createTileSet } from '../../src/dice-system/Tile';
import { TilePool } from '../../src/dice-system/TilePool';
import { TileStack } from '../../src/dice-system/TileStack';
import { TurnState } from './TurnState';
import type { GameView } from './GameView';
import { createGameView } from './GameView';
import type {
  GameStateSnapshot,
  PenaltySnapshot,
  RollRecord,
  TurnRecord,
} from './GameHistory';
import { GameHistory } from './GameHistory';
import type { PikominoStrategy } from './Strategy';
import { DefaultStrategy } from './Strategy';
import type { PenaltyResult, Table, TileSource } from './PikominoRules';
import {
  applyFailurePenalty,
  countTiles,
  determineWinnerIndex,
  isLegalTarget,
  transferTile,
} from './PikominoRules';

// ── Per-player state ────────────────────────────────────────

/** Per-player state in a Pikomino game. */
export interface PikominoPlayerState {
  readonly name: string;
  /** Claimed tiles, most recent on top. */
  readonly tiles: TileStack;
  /** Strategy answering this player's decisions. */
  readonly strategy: PikominoStrategy;
}

// ── Session ─────────────────────────────────────────────────

/** The full game state type for Pikomino. */
export type PikominoGameState = GameState<PikominoPlayerState>;

/** A complete Pikomino session. */
export interface PikominoSession {
  gameState: PikominoGameState;
  /** Tiles still available to everyone. */
  readonly center: TilePool;
  /** Tiles permanently out of play. */
  readonly removed: TilePool;
  readonly history: GameHistory;
  readonly events: GameEventEmitter;
  /** RNG for dice rolls. */
  readonly rng: () => number;
  /** Tiles on the table at setup; constant for the whole game. */
  readonly totalTiles: number;
}

// ── Setup ───────────────────────────────────────────────────

export interface PikominoSetupOptions {
  /** Number of players when no names are given (default 2). */
  playerCount?: number;
  /** Player names (defaults to "Player 1", "Player 2", etc.). */
  playerNames?: string[];
  /**
   * Strategy per player, parallel to the names. A missing or null
   * entry means DefaultStrategy.
   */
  strategies?: Array<PikominoStrategy | null | undefined>;
  /** RNG for dice rolls (default Math.random). */
  rng?: () => number;
  /** Seat of the first player to act (default 0). */
  firstPlayerIndex?: number;
  /** Emitter to publish lifecycle events on (default: a new one). */
  events?: GameEventEmitter;
}

/** Most players a table seats. */
export const MAX_PLAYERS = 8;

/**
 * Set up a new Pikomino session: all sixteen tiles in the center,
 * empty stacks, strategies bound, phase `playing`.
 *
 * @throws If there are more than eight players or an empty name.
 * @throws If more strategies than players are given.
 */
export function setupPikominoGame(
  options: PikominoSetupOptions = {},
): PikominoSession {
  const {
    playerCount = 2,
    playerNames,
    strategies = [],
    rng = Math.random,
    firstPlayerIndex = 0,
    events = new GameEventEmitter(),
  } = options;

  const names =
    playerNames ?? Array.from({ length: playerCount }, (_, i) => `Player ${i + 1}`);

  if (names.length > MAX_PLAYERS) {
    throw new Error(`A game seats at most ${MAX_PLAYERS} players, got ${names.length}`);
  }
  if (names.some((name) => name.trim() === '')) {
    throw new Error('Player names must not be empty');
  }
  if (strategies.length > names.length) {
    throw new Error(
      `Got ${strategies.length} strategies for ${names.length} players`,
    );
  }

  const bound = names.map((_, i) => strategies[i] ?? DefaultStrategy);

  const gameState = createGameState<PikominoPlayerState>({
    players: names.map((name, i) => ({ name, strategyName: bound[i].name })),
    createPlayerState: (i) => ({
      name: names[i],
      tiles: new TileStack(),
      strategy: bound[i],
    }),
    firstPlayerIndex,
  });

  startGame(gameState);

  const center = new TilePool(createTileSet());

  return {
    gameState,
    center,
    removed: new TilePool(),
    history: new GameHistory(),
    events,
    rng,
    totalTiles: center.size(),
  };
}

// ── Queries ─────────────────────────────────────────────────

/** The session's tile containers, as the rules see them. */
export function tableOf(session: PikominoSession): Table {
  return {
    seats: session.gameState.playerStates,
    center: session.center,
    removed: session.removed,
  };
}

/** The game ends exactly when the center is empty. */
export function isGameOver(session: PikominoSession): boolean {
  return session.center.isEmpty();
}

export function getCurrentPlayerState(session: PikominoSession): PikominoPlayerState {
  return session.gameState.playerStates[session.gameState.currentPlayerIndex];
}

export interface WinnerInfo {
  index: number;
  name: string;
  worms: number;
}

/**
 * The player with the most worms. Ties go to the lowest seat index.
 * Meaningful at any point, final once the game is over.
 */
export function getWinner(session: PikominoSession): WinnerInfo {
  const seats = session.gameState.playerStates;
  const index = determineWinnerIndex(seats);
  return { index, name: seats[index].name, worms: seats[index].tiles.totalWorms() };
}

/**
 * @throws If tiles were created or lost since setup.
 */
export function assertTileConservation(session: PikominoSession): void {
  const count = countTiles(tableOf(session));
  if (count !== session.totalTiles) {
    throw new Error(
      `Tile accounting mismatch: expected ${session.totalTiles} tiles on the table, found ${count}`,
    );
  }
}

/** Worm totals by player name. */
export function playerScores(session: PikominoSession): Record<string, number> {
  const scores: Record<string, number> = {};
  for (const p of session.gameState.playerStates) {
    scores[p.name] = p.tiles.totalWorms();
  }
  return scores;
}

/** Plain, serializable view of the session. */
export interface SessionState {
  currentPlayer: string;
  currentPlayerIndex: number;
  centerTiles: TileSnapshot[];
  /** Each player's stack, bottom to top. */
  playerTiles: Record<string, TileSnapshot[]>;
  scores: Record<string, number>;
  removedTiles: TileSnapshot[];
  turnNumber: number;
  gameOver: boolean;
}

export function getSessionState(session: PikominoSession): SessionState {
  const { gameState } = session;
  const playerTiles: Record<string, TileSnapshot[]> = {};
  for (const p of gameState.playerStates) {
    playerTiles[p.name] = snapshotTiles(p.tiles.toArray());
  }
  return {
    currentPlayer: getCurrentPlayerState(session).name,
    currentPlayerIndex: gameState.currentPlayerIndex,
    centerTiles: snapshotTiles(session.center.toArray()),
    playerTiles,
    scores: playerScores(session),
    removedTiles: snapshotTiles(session.removed.toArray()),
    turnNumber: gameState.turnNumber,
    gameOver: isGameOver(session),
  };
}

/** Snapshot of the whole table for the history. */
export function snapshotGameState(session: PikominoSession): GameStateSnapshot {
  const state = getSessionState(session);
  return {
    turnNumber: state.turnNumber,
    currentPlayerName: state.currentPlayer,
    center: state.centerTiles,
    playerTiles: state.playerTiles,
    removed: state.removedTiles,
    playerScores: state.scores,
  };
}

// ── Turn resolution ─────────────────────────────────────────

/** Result of resolving a turn. */
export interface TurnResult {
  outcome: TurnOutcome;
  /** The history record, including the round-by-round trace. */
  details: TurnRecord;
  stateAfter: SessionState;
}

function viewFor(
  session: PikominoSession,
  turn: TurnState,
  turnNumber: number,
): GameView {
  return createGameView({
    turn,
    seats: session.gameState.playerStates,
    actingIndex: session.gameState.currentPlayerIndex,
    center: session.center,
    removed: session.removed,
    history: session.history,
    turnNumber,
  });
}

/**
 * Run roll -> choose -> reserve rounds until the turn stops.
 *
 * @returns The terminal turn phase.
 */
function playRounds(
  session: PikominoSession,
  turn: TurnState,
  rolls: RollRecord[],
  turnNumber: number,
): 'ended' | 'no-valid-choice' {
  const playerIndex = session.gameState.currentPlayerIndex;
  const { strategy } = getCurrentPlayerState(session);

  // Each pass reserves at least one die, so this ends within eight rounds.
  while (true) {
    const remaining = turn.remainingDice;
    const dice = rollDice(remaining, session.rng);
    turn.applyRoll(dice);
    session.events.emit('dice-rolled', { turnNumber, playerIndex, dice: [...dice] });

    const face = strategy.chooseDieFace(viewFor(session, turn, turnNumber));
    if (face === null || !turn.canReserve(face)) {
      if (face !== null) {
        console.warn(
          `[PikominoGame] Strategy "${strategy.name}" chose ${face}, which cannot be reserved from [${dice.join(', ')}]`,
        );
      }
      rolls.push({ dice, remaining, chosenFace: null, chosenCount: 0 });
      turn.rejectChoice();
      return 'no-valid-choice';
    }

    const count = turn.reserve(face);
    rolls.push({ dice, remaining, chosenFace: face, chosenCount: count });
    session.events.emit('dice-reserved', {
      turnNumber,
      playerIndex,
      face,
      count,
      remainingDice: turn.remainingDice,
      score: turn.totalScore(),
    });

    if (
      turn.remainingDice === 0 ||
      !strategy.shouldContinue(viewFor(session, turn, turnNumber))
    ) {
      turn.stop();
      return 'ended';
    }
    turn.continueRolling();
  }
}

/**
 * Ask the strategy for a tile and validate the answer.
 *
 * @returns The chosen legal tile, or null.
 */
function chooseTile(
  session: PikominoSession,
  turn: TurnState,
  turnNumber: number,
): Tile | null {
  const { strategy } = getCurrentPlayerState(session);
  const view = viewFor(session, turn, turnNumber);
  const tile = strategy.chooseTargetTile(view);
  if (tile === null) return null;

  if (!isLegalTarget(tile, view.stealable, view.eligibleCenter)) {
    console.warn(
      `[PikominoGame] Strategy "${strategy.name}" chose tile ${tile.value}, which score ${view.turn.score} cannot claim`,
    );
    return null;
  }
  return tile;
}

function reservedCounts(turn: TurnState): Partial<Record<DieFace, number>> {
  const counts: Partial<Record<DieFace, number>> = {};
  for (const [face, count] of turn.reservedDice) {
    counts[face] = count;
  }
  return counts;
}

function snapshotPenalty(penalty: PenaltyResult): PenaltySnapshot {
  return {
    lostTile: penalty.lostTile ? snapshotTile(penalty.lostTile) : null,
    discardedCenterTile: penalty.discardedCenterTile
      ? snapshotTile(penalty.discardedCenterTile)
      : null,
  };
}

/**
 * Resolve one complete turn for the current player.
 *
 * Steps:
 *   1. Roll, ask for a face, reserve; repeat while the strategy wants
 *      to and dice remain. An unreservable choice fails the turn.
 *   2. Without a worm the turn fails.
 *   3. Otherwise the strategy picks a tile among exact-score steals and
 *      reachable center tiles; no (legal) tile fails the turn.
 *   4. A failure sends the player's top tile and the center's highest
 *      tile out of play.
 *   5. Record the turn, verify tile accounting, end the game if the
 *      center is empty.
 *
 * Does not rotate to the next player; call `advancePlayer` for that.
 *
 * @throws If the game is already over.
 */
export function resolveTurn(session: PikominoSession): TurnResult {
  if (isGameOver(session)) {
    throw new Error('Cannot resolve a turn: the game is over');
  }

  const { gameState } = session;
  const table = tableOf(session);
  const playerIndex = gameState.currentPlayerIndex;
  const player = gameState.playerStates[playerIndex];
  const turnNumber = beginTurn(gameState);
  const stateBefore = snapshotGameState(session);

  session.events.emit('turn-started', {
    turnNumber,
    playerIndex,
    playerName: player.name,
    strategyName: player.strategy.name,
  });

  const turn = new TurnState();
  const rolls: RollRecord[] = [];
  const ending = playRounds(session, turn, rolls, turnNumber);

  let outcome: TurnOutcome;
  let tile: Tile | null = null;
  let source: TileSource | null = null;

  if (ending === 'no-valid-choice') {
    outcome = 'failed-no-valid-choice';
  } else if (!turn.hasWorm()) {
    outcome = 'failed-no-worm';
  } else {
    tile = chooseTile(session, turn, turnNumber);
    if (tile) {
      source = transferTile(table, playerIndex, tile);
      outcome = 'success';
    } else {
      outcome = 'failed-insufficient-score';
    }
  }

  const penalty =
    outcome === 'success' ? null : snapshotPenalty(applyFailurePenalty(table, playerIndex));

  const details: TurnRecord = {
    turnNumber,
    playerIndex,
    playerName: player.name,
    rolls,
    reservedDice: reservedCounts(turn),
    finalScore: turn.totalScore(),
    finalHasWorm: turn.hasWorm(),
    tileTaken: tile ? snapshotTile(tile) : null,
    stolenFrom:
      source?.kind === 'steal' ? gameState.playerStates[source.fromIndex].name : null,
    outcome,
    penalty,
    stateBefore,
    stateAfter: snapshotGameState(session),
  };
  session.history.addTurn(details);

  assertTileConservation(session);

  if (isGameOver(session)) {
    endGame(gameState);
  }

  session.events.emit('turn-completed', {
    turnNumber,
    playerIndex,
    playerName: player.name,
    outcome,
    score: details.finalScore,
    tile: details.tileTaken,
    phase: gameState.phase,
  });

  if (gameState.phase === 'ended') {
    const winner = getWinner(session);
    session.events.emit('game-ended', {
      finalTurnNumber: turnNumber,
      winnerIndex: winner.index,
      winnerName: winner.name,
      scores: playerScores(session),
    });
  }

  return { outcome, details, stateAfter: getSessionState(session) };
}

/**
 * Rotate to the next player.
 *
 * @throws If the game is over.
 */
export function advancePlayer(session: PikominoSession): void {
  advanceTurn(session.gameState);
}

/** Upper bound on turns in `playGame`. */
export const DEFAULT_MAX_TURNS = 1000;

/**
 * Play until the center is empty: resolve a turn, rotate, repeat.
 *
 * @returns The winner.
 * @throws If the game is still running after `maxTurns` turns.
 */
export function playGame(
  session: PikominoSession,
  maxTurns: number = DEFAULT_MAX_TURNS,
): WinnerInfo {
  let played = 0;
  while (!isGameOver(session)) {
    if (played >= maxTurns) {
      throw new Error(`Game did not end after ${maxTurns} turns`);
    }
    resolveTurn(session);
    played++;
    if (!isGameOver(session)) {
      advancePlayer(session);
    }
  }
  return getWinner(session);
}
