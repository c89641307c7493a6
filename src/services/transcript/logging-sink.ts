/**
 * Sink that writes a structured log line per event
 */

import type {
  DebateSnapshot,
  PhaseTransitionEvent,
  RejectedAttempt,
  Turn,
  TurnFailureRecord,
} from '../../types/debate.js';
import { createDebateLogger, loggers, type Logger } from '../logging/index.js';
import type { TranscriptSink } from './transcript-sink.js';

export class LoggingSink implements TranscriptSink {
  private readonly logger: Logger;

  constructor(private readonly debateId: string) {
    this.logger = createDebateLogger(debateId);
  }

  onTurnAccepted(turn: Turn): void {
    this.logger.info(
      { agentId: turn.agentId, roundNumber: turn.roundNumber, chars: turn.argumentText.length },
      `${turn.agentId} argued (round ${turn.roundNumber + 1})`
    );
  }

  onTurnRejected(attempt: RejectedAttempt): void {
    this.logger.debug(
      { agentId: attempt.agentId, roundNumber: attempt.roundNumber, attempt: attempt.attempt, check: attempt.check },
      `Candidate from ${attempt.agentId} rejected: ${attempt.reason}`
    );
  }

  onTurnFailed(failure: TurnFailureRecord): void {
    this.logger.warn({ ...failure }, `Turn of ${failure.agentId} ${failure.resolution}`);
  }

  onPhaseTransition(event: PhaseTransitionEvent): void {
    loggers.stateTransition(event.debateId, event.fromPhase, event.toPhase, event.roundNumber);
  }

  onRoundComplete(roundNumber: number, snapshot: DebateSnapshot): void {
    this.logger.info(
      { roundNumber, acceptedTurns: snapshot.turns.length },
      `Round ${roundNumber} of ${snapshot.maxRounds} complete`
    );
  }

  onComplete(snapshot: DebateSnapshot): void {
    this.logger.info(
      {
        outcome: snapshot.verdict?.outcome,
        winner: snapshot.verdict?.winnerAgentId,
        turns: snapshot.turns.length,
      },
      'Transcript complete'
    );
  }
}
