/**
 * Transcript Sink
 *
 * The only channel through which the core hands data outward. Sinks are
 * called at turn boundaries, phase transitions, round ends and completion;
 * a failing sink is logged and never affects the debate.
 */

import type {
  DebateSnapshot,
  PhaseTransitionEvent,
  RejectedAttempt,
  Turn,
  TurnFailureRecord,
} from '../../types/debate.js';

export interface TranscriptSink {
  onTurnAccepted?(turn: Turn): void | Promise<void>;
  onTurnRejected?(attempt: RejectedAttempt): void | Promise<void>;
  onTurnFailed?(failure: TurnFailureRecord): void | Promise<void>;
  onPhaseTransition?(event: PhaseTransitionEvent): void | Promise<void>;
  onRoundComplete?(roundNumber: number, snapshot: DebateSnapshot): void | Promise<void>;
  onComplete?(snapshot: DebateSnapshot): void | Promise<void>;
}
