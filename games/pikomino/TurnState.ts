/**
 * Per-turn dice reservation state for Pikomino.
 *
 * A turn cycles through roll -> choose -> reserve until the player
 * stops, runs out of dice, or rolls nothing they can reserve. Each
 * face may be reserved at most once per turn; reserving a face takes
 * every die showing it.
 *
 * TurnState is created fresh for each turn and is mutated only by
 * the game loop. Strategies see it through an immutable TurnSnapshot.
 */

import type { DieFace } from '../../src/dice-system/Dice';
import { DICE_PER_TURN, countFace, pointValue } from '../../src/dice-system/Dice';

// ── Phases ──────────────────────────────────────────────────

/**
 * - `rolling`         -- waiting for the remaining dice to be rolled.
 * - `awaiting-choice` -- a roll is on the table; a face must be chosen.
 * - `reserved`        -- a face was reserved; roll again or stop.
 * - `no-valid-choice` -- the choice could not be honoured (terminal).
 * - `ended`           -- the player stopped or used every die (terminal).
 */
export type TurnPhase =
  | 'rolling'
  | 'awaiting-choice'
  | 'reserved'
  | 'no-valid-choice'
  | 'ended';

const VALID_TRANSITIONS: Record<TurnPhase, TurnPhase[]> = {
  rolling: ['awaiting-choice'],
  'awaiting-choice': ['reserved', 'no-valid-choice'],
  reserved: ['rolling', 'ended'],
  'no-valid-choice': [],
  ended: [],
};

// ── Snapshot ────────────────────────────────────────────────

/**
 * Read-only view of a turn, handed to strategies.
 */
export interface TurnSnapshot {
  readonly phase: TurnPhase;
  readonly remainingDice: number;
  readonly reservedDice: ReadonlyMap<DieFace, number>;
  readonly usedFaces: ReadonlySet<DieFace>;
  readonly currentRoll: readonly DieFace[];
  /** Sum of the reserved dice (worms count five). */
  readonly score: number;
  readonly hasWorm: boolean;
  canReserve(face: DieFace): boolean;
  countInRoll(face: DieFace): number;
  /** Distinct reservable faces, in order of first appearance in the roll. */
  reservableFaces(): DieFace[];
}

// ── TurnState ───────────────────────────────────────────────

export class TurnState {
  private _phase: TurnPhase = 'rolling';
  private _remainingDice: number;
  private readonly reserved = new Map<DieFace, number>();
  private roll: DieFace[] = [];

  constructor(diceCount: number = DICE_PER_TURN) {
    if (!Number.isInteger(diceCount) || diceCount < 1) {
      throw new Error(`A turn needs at least one die, got ${diceCount}`);
    }
    this._remainingDice = diceCount;
  }

  get phase(): TurnPhase {
    return this._phase;
  }

  get remainingDice(): number {
    return this._remainingDice;
  }

  get reservedDice(): ReadonlyMap<DieFace, number> {
    return this.reserved;
  }

  /** Faces committed this turn; always the keys of `reservedDice`. */
  get usedFaces(): ReadonlySet<DieFace> {
    return new Set(this.reserved.keys());
  }

  get currentRoll(): readonly DieFace[] {
    return this.roll;
  }

  /** Whether the turn can no longer change. */
  get isFinished(): boolean {
    return this._phase === 'ended' || this._phase === 'no-valid-choice';
  }

  // ── Queries ───────────────────────────────────────────────

  totalScore(): number {
    let total = 0;
    for (const [face, count] of this.reserved) {
      total += pointValue(face) * count;
    }
    return total;
  }

  hasWorm(): boolean {
    return this.reserved.has('WORM');
  }

  canReserve(face: DieFace): boolean {
    return this.roll.includes(face) && !this.reserved.has(face);
  }

  countInRoll(face: DieFace): number {
    return countFace(this.roll, face);
  }

  reservableFaces(): DieFace[] {
    const faces: DieFace[] = [];
    for (const face of this.roll) {
      if (!faces.includes(face) && !this.reserved.has(face)) {
        faces.push(face);
      }
    }
    return faces;
  }

  // ── Mutations ─────────────────────────────────────────────

  /**
   * Put a fresh roll of the remaining dice on the table.
   *
   * @throws If not in the `rolling` phase.
   * @throws If the number of faces differs from the remaining dice.
   */
  applyRoll(faces: readonly DieFace[]): void {
    if (faces.length !== this._remainingDice) {
      throw new Error(
        `Expected a roll of ${this._remainingDice} dice, got ${faces.length}`,
      );
    }
    this.transition('awaiting-choice');
    this.roll = [...faces];
  }

  /**
   * Reserve every die in the current roll showing `face`.
   *
   * @returns The number of dice reserved.
   * @throws If the face is absent from the roll or already used.
   */
  reserve(face: DieFace): number {
    if (this._phase !== 'awaiting-choice') {
      throw new Error(`Cannot reserve during phase "${this._phase}"`);
    }
    if (!this.canReserve(face)) {
      throw new Error(`Face ${face} cannot be reserved from this roll`);
    }
    const count = this.countInRoll(face);
    const remaining = this._remainingDice - count;
    if (remaining < 0) {
      throw new Error(
        `Reserving ${count} x ${face} would leave ${remaining} dice`,
      );
    }
    this.transition('reserved');
    this.reserved.set(face, count);
    this._remainingDice = remaining;
    return count;
  }

  /** Record that the chosen face could not be reserved. */
  rejectChoice(): void {
    this.transition('no-valid-choice');
  }

  /**
   * Go back to rolling after a reservation.
   *
   * @throws If no dice remain.
   */
  continueRolling(): void {
    if (this._remainingDice === 0) {
      throw new Error('Cannot keep rolling: no dice remain');
    }
    this.transition('rolling');
  }

  /** End the turn with whatever has been reserved. */
  stop(): void {
    this.transition('ended');
  }

  /**
   * Capture an immutable view of the turn as it stands.
   */
  snapshot(): TurnSnapshot {
    const reservedDice: ReadonlyMap<DieFace, number> = new Map(this.reserved);
    const usedFaces: ReadonlySet<DieFace> = new Set(this.reserved.keys());
    const currentRoll: readonly DieFace[] = [...this.roll];

    const canReserve = (face: DieFace): boolean =>
      currentRoll.includes(face) && !usedFaces.has(face);

    return {
      phase: this._phase,
      remainingDice: this._remainingDice,
      reservedDice,
      usedFaces,
      currentRoll,
      score: this.totalScore(),
      hasWorm: usedFaces.has('WORM'),
      canReserve,
      countInRoll: (face) => countFace(currentRoll, face),
      reservableFaces: () => {
        const faces: DieFace[] = [];
        for (const face of currentRoll) {
          if (!faces.includes(face) && canReserve(face)) faces.push(face);
        }
        return faces;
      },
    };
  }

  private transition(next: TurnPhase): void {
    const allowed = VALID_TRANSITIONS[this._phase];
    if (!allowed.includes(next)) {
      throw new Error(
        `Invalid turn transition: "${this._phase}" -> "${next}"`,
      );
    }
    this._phase = next;
  }
}
