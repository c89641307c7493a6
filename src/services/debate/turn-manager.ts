/**
 * Turn Manager
 *
 * Strict rotation over the participants. The slot index counts every turn
 * slot consumed, accepted or skipped, so a skipped turn still hands the
 * floor to the next participant. Only full rotations are ever scheduled.
 */

/**
 * One scheduled turn
 */
export interface TurnSlot {
  agentId: string;
  roundNumber: number;
  /** Position within the rotation (0-based) */
  positionInRound: number;
  /** Slots consumed before this one */
  slotIndex: number;
}

/**
 * Turn progress information
 */
export interface TurnProgress {
  roundNumber: number;
  maxRounds: number;
  slotIndex: number;
  totalSlots: number;
  currentSlot: TurnSlot | null;
  isComplete: boolean;
}

export interface AdvanceResult {
  /** True when this advance finished a full rotation */
  roundCompleted: boolean;
  /** Round the next slot belongs to */
  roundNumber: number;
}

export class TurnManager {
  private slotIndex = 0;

  constructor(
    private readonly participants: readonly string[],
    private readonly maxRounds: number
  ) {}

  /**
   * The slot to play now, or null once every round has been played
   */
  getCurrentSlot(): TurnSlot | null {
    if (this.isComplete()) {
      return null;
    }

    const count = this.participants.length;
    const positionInRound = this.slotIndex % count;
    const agentId = this.participants[positionInRound];
    if (agentId === undefined) {
      return null;
    }

    return {
      agentId,
      roundNumber: Math.floor(this.slotIndex / count),
      positionInRound,
      slotIndex: this.slotIndex,
    };
  }

  /**
   * Consume the current slot
   */
  advanceTurn(): AdvanceResult {
    if (this.isComplete()) {
      return { roundCompleted: false, roundNumber: this.maxRounds };
    }

    this.slotIndex++;
    const count = this.participants.length;
    return {
      roundCompleted: this.slotIndex % count === 0,
      roundNumber: Math.floor(this.slotIndex / count),
    };
  }

  isComplete(): boolean {
    return this.participants.length === 0 || this.slotIndex >= this.totalSlots();
  }

  getTurnProgress(): TurnProgress {
    return {
      roundNumber: this.participants.length === 0 ? 0 : Math.floor(this.slotIndex / this.participants.length),
      maxRounds: this.maxRounds,
      slotIndex: this.slotIndex,
      totalSlots: this.totalSlots(),
      currentSlot: this.getCurrentSlot(),
      isComplete: this.isComplete(),
    };
  }

  private totalSlots(): number {
    return this.participants.length * this.maxRounds;
  }
}
