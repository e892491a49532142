/**
 * Game history for Pikomino.
 *
 * An append-only log of resolved turns. Each record captures every
 * roll of the turn, what was reserved, how the turn ended, and the
 * full table before and after. Statistics are computed from the
 * records on demand; nothing is accumulated separately.
 *
 * The game loop appends a record at the end of every turn. Strategies
 * only ever see a copy, typed as ReadonlyGameHistory.
 */

import type { DieFace } from '../../src/dice-system/Dice';
import type { TileSnapshot, TurnOutcome } from '../../src/core-engine/TranscriptTypes';

// ── Record types ────────────────────────────────────────────

/** The whole table at one point in time. */
export interface GameStateSnapshot {
  readonly turnNumber: number;
  readonly currentPlayerName: string;
  readonly center: readonly TileSnapshot[];
  /** Each player's stack, bottom to top. */
  readonly playerTiles: Readonly<Record<string, readonly TileSnapshot[]>>;
  readonly removed: readonly TileSnapshot[];
  /** Worm totals by player name. */
  readonly playerScores: Readonly<Record<string, number>>;
}

/** One roll within a turn and what was done with it. */
export interface RollRecord {
  /** Faces rolled, in roll order. */
  readonly dice: readonly DieFace[];
  /** Dice available before this roll. */
  readonly remaining: number;
  /** Face reserved from this roll, or null if none could be. */
  readonly chosenFace: DieFace | null;
  /** Dice moved into the reservation (0 when nothing was reserved). */
  readonly chosenCount: number;
}

/** Tiles sent out of play by a failed turn. */
export interface PenaltySnapshot {
  readonly lostTile: TileSnapshot | null;
  readonly discardedCenterTile: TileSnapshot | null;
}

/**
 * A resolved turn. Records are frozen when they enter a history, so
 * neither strategies nor event listeners can rewrite them.
 */
export interface TurnRecord {
  readonly turnNumber: number;
  readonly playerIndex: number;
  readonly playerName: string;
  readonly rolls: readonly RollRecord[];
  readonly reservedDice: Readonly<Partial<Record<DieFace, number>>>;
  readonly finalScore: number;
  readonly finalHasWorm: boolean;
  readonly tileTaken: TileSnapshot | null;
  /** Owner of a stolen tile; null for center picks and failures. */
  readonly stolenFrom: string | null;
  readonly outcome: TurnOutcome;
  /** What the failure penalty removed; null on success. */
  readonly penalty: PenaltySnapshot | null;
  readonly stateBefore: GameStateSnapshot;
  readonly stateAfter: GameStateSnapshot;
}

export type FailureOutcome = Exclude<TurnOutcome, 'success'>;

/** Derived per-player figures. */
export interface PlayerStatistics {
  totalTurns: number;
  successfulTurns: number;
  failedTurns: number;
  /** successfulTurns / totalTurns. */
  successRate: number;
  /** Mean final score over successful turns (0 if none). */
  averageScoreOnSuccess: number;
  tilesTaken: TileSnapshot[];
  totalWormsGained: number;
  failuresByOutcome: Record<FailureOutcome, number>;
}

/** Serializable form of a history. */
export interface HistoryTranscript {
  version: 1;
  turns: readonly TurnRecord[];
}

/** Query-only surface of a history. */
export interface ReadonlyGameHistory {
  readonly turns: readonly TurnRecord[];
  readonly gameStates: readonly GameStateSnapshot[];
  readonly length: number;
  getPlayerTurns(playerName: string): TurnRecord[];
  getRecentTurns(count?: number): TurnRecord[];
  getPlayerStatistics(playerName: string): PlayerStatistics | null;
  toJSON(): HistoryTranscript;
}

// ── GameHistory ─────────────────────────────────────────────

/** Freeze `value` and everything reachable from it. */
function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class GameHistory implements ReadonlyGameHistory {
  private readonly records: TurnRecord[] = [];

  /**
   * An independent copy of another history's records. The copy does
   * not see turns appended to the original afterwards.
   */
  static copyOf(history: ReadonlyGameHistory): GameHistory {
    const copy = new GameHistory();
    for (const turn of history.turns) {
      copy.addTurn(turn);
    }
    return copy;
  }

  /** Append a record. The record and everything in it are frozen. */
  addTurn(turn: TurnRecord): void {
    this.records.push(deepFreeze(turn));
  }

  get turns(): readonly TurnRecord[] {
    return this.records;
  }

  /** The table after each recorded turn, in order. */
  get gameStates(): readonly GameStateSnapshot[] {
    return this.records.map((t) => t.stateAfter);
  }

  get length(): number {
    return this.records.length;
  }

  getPlayerTurns(playerName: string): TurnRecord[] {
    return this.records.filter((t) => t.playerName === playerName);
  }

  /**
   * The last `count` turns, oldest first. Returns everything when
   * fewer turns exist and nothing when `count` is not positive.
   */
  getRecentTurns(count: number = 5): TurnRecord[] {
    if (count <= 0) return [];
    return this.records.slice(-count);
  }

  /**
   * Statistics for one player, or null if they have not played a turn.
   */
  getPlayerStatistics(playerName: string): PlayerStatistics | null {
    const turns = this.getPlayerTurns(playerName);
    if (turns.length === 0) return null;

    const successful = turns.filter((t) => t.outcome === 'success');
    const tilesTaken = successful
      .map((t) => t.tileTaken)
      .filter((t): t is TileSnapshot => t !== null);

    const failuresByOutcome: Record<FailureOutcome, number> = {
      'failed-no-worm': 0,
      'failed-insufficient-score': 0,
      'failed-no-valid-choice': 0,
    };
    for (const turn of turns) {
      if (turn.outcome !== 'success') failuresByOutcome[turn.outcome]++;
    }

    const scoreSum = successful.reduce((acc, t) => acc + t.finalScore, 0);

    return {
      totalTurns: turns.length,
      successfulTurns: successful.length,
      failedTurns: turns.length - successful.length,
      successRate: successful.length / turns.length,
      averageScoreOnSuccess:
        successful.length > 0 ? scoreSum / successful.length : 0,
      tilesTaken,
      totalWormsGained: tilesTaken.reduce((acc, t) => acc + t.worms, 0),
      failuresByOutcome,
    };
  }

  toJSON(): HistoryTranscript {
    return { version: 1, turns: [...this.records] };
  }
}
