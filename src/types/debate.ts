/**
 * Debate Data Model
 *
 * Shared record threaded through the round controller, memory manager and
 * judge. `turns` only ever holds accepted arguments; rejected candidates and
 * failed turns are kept in separate diagnostic lists.
 */

import type { ValidationCheck } from './validation.js';
import type { TurnFailureCause } from './errors.js';

/**
 * Debate phase enum
 * INIT -> DEBATING -> JUDGING -> COMPLETE, with DEBATING -> COMPLETE on abort
 */
export enum DebatePhase {
  /** Configured but not started */
  INIT = 'INIT',

  /** Agents are taking turns */
  DEBATING = 'DEBATING',

  /** All rounds done, waiting on the judge */
  JUDGING = 'JUDGING',

  /** Terminal state: verdict recorded */
  COMPLETE = 'COMPLETE',
}

/**
 * What happens to the debate when an agent's turn fails
 */
export type TurnFailurePolicy = 'skip' | 'abort';

/**
 * One accepted argument contribution
 */
export interface Turn {
  agentId: string;
  /** Round in progress when the turn was taken (0-based) */
  roundNumber: number;
  argumentText: string;
  /** ISO-8601 timestamp */
  timestamp: string;
  accepted: true;
}

/**
 * A candidate the validator turned down
 */
export interface RejectedAttempt {
  agentId: string;
  roundNumber: number;
  /** 1-based attempt number within the turn */
  attempt: number;
  text: string;
  reason: string;
  check: ValidationCheck;
  timestamp: string;
}

/**
 * A turn that produced no accepted argument
 */
export interface TurnFailureRecord {
  agentId: string;
  roundNumber: number;
  cause: TurnFailureCause;
  message: string;
  attempts: number;
  resolution: 'skipped' | 'aborted';
  timestamp: string;
}

/**
 * DECIDED carries a winner; ABORTED and INCONCLUSIVE are reserved markers
 */
export type VerdictOutcome = 'DECIDED' | 'ABORTED' | 'INCONCLUSIVE';

/**
 * Final judgment, set exactly once when the debate reaches COMPLETE
 */
export interface Verdict {
  outcome: VerdictOutcome;
  /** Null unless outcome is DECIDED */
  winnerAgentId: string | null;
  rationale: string;
  /** Short recap of the debate */
  summary: string;
  perAgentScores: Readonly<Record<string, number>>;
  decidedAt: string;
}

/**
 * Read-only view of the debate handed to sinks and report writers
 */
export interface DebateSnapshot {
  debateId: string;
  topic: string;
  participants: readonly string[];
  maxRounds: number;
  roundNumber: number;
  phase: DebatePhase;
  turns: readonly Turn[];
  rejectedAttempts: readonly RejectedAttempt[];
  turnFailures: readonly TurnFailureRecord[];
  verdict: Verdict | null;
  startedAt: string | null;
  completedAt: string | null;
}

/**
 * Phase transition event payload
 */
export interface PhaseTransitionEvent {
  debateId: string;
  fromPhase: DebatePhase;
  toPhase: DebatePhase;
  roundNumber: number;
  timestamp: string;
}

/**
 * Rejection and failure counts surfaced with the result of a run
 */
export interface DebateDiagnostics {
  acceptedTurns: number;
  rejectedAttempts: number;
  rejectionsByCheck: Record<ValidationCheck, number>;
  turnFailures: number;
  skippedTurns: number;
  judgeAttempts: number;
  durationMs: number;
}
