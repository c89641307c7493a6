/**
 * In-memory sink that keeps every event it receives
 */

import type {
  DebateSnapshot,
  PhaseTransitionEvent,
  RejectedAttempt,
  Turn,
  TurnFailureRecord,
} from '../../types/debate.js';
import type { TranscriptSink } from './transcript-sink.js';

export class CollectingSink implements TranscriptSink {
  readonly acceptedTurns: Turn[] = [];
  readonly rejectedAttempts: RejectedAttempt[] = [];
  readonly turnFailures: TurnFailureRecord[] = [];
  readonly transitions: PhaseTransitionEvent[] = [];
  readonly completedRounds: number[] = [];
  finalSnapshot: DebateSnapshot | null = null;

  onTurnAccepted(turn: Turn): void {
    this.acceptedTurns.push(turn);
  }

  onTurnRejected(attempt: RejectedAttempt): void {
    this.rejectedAttempts.push(attempt);
  }

  onTurnFailed(failure: TurnFailureRecord): void {
    this.turnFailures.push(failure);
  }

  onPhaseTransition(event: PhaseTransitionEvent): void {
    this.transitions.push(event);
  }

  onRoundComplete(roundNumber: number): void {
    this.completedRounds.push(roundNumber);
  }

  onComplete(snapshot: DebateSnapshot): void {
    this.finalSnapshot = snapshot;
  }
}
