/**
 * Debate State Machine
 *
 * Owns the shared debate record and enforces its invariants:
 * - phases move INIT -> DEBATING -> JUDGING -> COMPLETE, or DEBATING ->
 *   COMPLETE with an ABORTED verdict; there are no back-edges
 * - `turns` only grows, and every turn is frozen once appended
 * - at most one turn per (agent, round), only from participants
 * - `roundNumber` never exceeds `maxRounds`
 * - a verdict exists exactly when the phase is COMPLETE
 */

import { EventEmitter } from 'events';
import pino from 'pino';
import {
  DebatePhase,
  type DebateSnapshot,
  type PhaseTransitionEvent,
  type RejectedAttempt,
  type Turn,
  type TurnFailureRecord,
  type Verdict,
} from '../../types/debate.js';
import { ConfigurationError, InvalidTransitionError, InvariantViolationError } from '../../types/errors.js';

const logger = pino({
  name: 'debate-state-machine',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Transition map defining valid state transitions
 * Key: from phase, Value: array of allowed destination phases
 */
const TRANSITIONS: Map<DebatePhase, DebatePhase[]> = new Map([
  [DebatePhase.INIT, [DebatePhase.DEBATING]],

  // COMPLETE straight from DEBATING is the abort path
  [DebatePhase.DEBATING, [DebatePhase.JUDGING, DebatePhase.COMPLETE]],

  [DebatePhase.JUDGING, [DebatePhase.COMPLETE]],

  // Terminal
  [DebatePhase.COMPLETE, []],
]);

/**
 * Immutable setup of one debate
 */
export interface DebateSetup {
  topic: string;
  participants: readonly string[];
  maxRounds: number;
}

/**
 * Debate State Machine Events
 */
export interface DebateStateMachineEvents {
  phase_transition: (event: PhaseTransitionEvent) => void;
  turn_accepted: (turn: Turn) => void;
  round_complete: (roundNumber: number) => void;
  completed: (verdict: Verdict) => void;
}

export class DebateStateMachine extends EventEmitter {
  readonly debateId: string;
  private readonly topic: string;
  private readonly participants: readonly string[];
  private readonly maxRounds: number;

  private phase: DebatePhase = DebatePhase.INIT;
  private roundNumber = 0;
  private readonly turns: Turn[] = [];
  private readonly rejectedAttempts: RejectedAttempt[] = [];
  private readonly turnFailures: TurnFailureRecord[] = [];
  private readonly transitions: PhaseTransitionEvent[] = [];
  private verdict: Verdict | null = null;
  private startedAt: string | null = null;
  private completedAt: string | null = null;

  constructor(debateId: string, setup: DebateSetup) {
    super();
    this.debateId = debateId;
    this.topic = setup.topic.trim();
    this.participants = Object.freeze([...setup.participants]);
    this.maxRounds = setup.maxRounds;

    logger.debug({ debateId, participants: this.participants, maxRounds: this.maxRounds }, 'State machine created');
  }

  /**
   * INIT -> DEBATING
   * @throws ConfigurationError when the topic or participants are empty or maxRounds is not positive
   */
  begin(): void {
    const issues: string[] = [];
    if (this.topic.length === 0) issues.push('topic: must not be empty');
    if (this.participants.length === 0) issues.push('participants: at least one participant is required');
    if (!Number.isInteger(this.maxRounds) || this.maxRounds <= 0) {
      issues.push('maxRounds: must be a positive integer');
    }
    if (new Set(this.participants).size !== this.participants.length) {
      issues.push('participants: must be unique');
    }

    if (issues.length > 0) {
      throw new ConfigurationError(`Cannot start debate: ${issues.join('; ')}`, issues);
    }

    this.transition(DebatePhase.DEBATING);
    this.startedAt = new Date().toISOString();
  }

  /**
   * Append an accepted argument for the round in progress
   */
  appendTurn(agentId: string, argumentText: string): Turn {
    this.requirePhase(DebatePhase.DEBATING, 'append a turn');

    if (!this.participants.includes(agentId)) {
      throw new InvariantViolationError(`Agent ${agentId} is not a participant`);
    }
    if (this.roundNumber >= this.maxRounds) {
      throw new InvariantViolationError(`Round ${this.roundNumber} is beyond maxRounds ${this.maxRounds}`);
    }
    if (this.turns.some((turn) => turn.agentId === agentId && turn.roundNumber === this.roundNumber)) {
      throw new InvariantViolationError(`Agent ${agentId} already spoke in round ${this.roundNumber}`);
    }

    const turn: Turn = Object.freeze({
      agentId,
      roundNumber: this.roundNumber,
      argumentText,
      timestamp: new Date().toISOString(),
      accepted: true as const,
    });
    this.turns.push(turn);
    this.emit('turn_accepted', turn);
    return turn;
  }

  /**
   * Keep a rejected candidate for diagnostics, apart from `turns`
   */
  recordRejection(attempt: Omit<RejectedAttempt, 'roundNumber' | 'timestamp'>): RejectedAttempt {
    this.requirePhase(DebatePhase.DEBATING, 'record a rejection');
    const record: RejectedAttempt = Object.freeze({
      ...attempt,
      roundNumber: this.roundNumber,
      timestamp: new Date().toISOString(),
    });
    this.rejectedAttempts.push(record);
    return record;
  }

  recordTurnFailure(failure: Omit<TurnFailureRecord, 'roundNumber' | 'timestamp'>): TurnFailureRecord {
    this.requirePhase(DebatePhase.DEBATING, 'record a turn failure');
    const record: TurnFailureRecord = Object.freeze({
      ...failure,
      roundNumber: this.roundNumber,
      timestamp: new Date().toISOString(),
    });
    this.turnFailures.push(record);
    return record;
  }

  /**
   * Close the round in progress once the rotation has come back to the start
   * @returns the new round number
   */
  completeRound(): number {
    this.requirePhase(DebatePhase.DEBATING, 'complete a round');
    if (this.roundNumber >= this.maxRounds) {
      throw new InvariantViolationError(`All ${this.maxRounds} rounds are already complete`);
    }

    this.roundNumber++;
    logger.debug({ debateId: this.debateId, roundNumber: this.roundNumber }, 'Round complete');
    this.emit('round_complete', this.roundNumber);
    return this.roundNumber;
  }

  /**
   * DEBATING -> JUDGING, only after the final round
   */
  beginJudging(): void {
    if (this.phase === DebatePhase.DEBATING && this.roundNumber !== this.maxRounds) {
      throw new InvariantViolationError(
        `Cannot judge after ${this.roundNumber} of ${this.maxRounds} rounds`
      );
    }
    this.transition(DebatePhase.JUDGING);
  }

  /**
   * Record the verdict and move to COMPLETE. From DEBATING only an ABORTED
   * verdict is accepted.
   */
  complete(verdict: Verdict): void {
    if (this.phase === DebatePhase.DEBATING && verdict.outcome !== 'ABORTED') {
      throw new InvariantViolationError('Only an ABORTED verdict can end a debate before judging');
    }
    if (verdict.outcome === 'DECIDED') {
      if (verdict.winnerAgentId === null || !this.participants.includes(verdict.winnerAgentId)) {
        throw new InvariantViolationError(`Verdict winner ${verdict.winnerAgentId} is not a participant`);
      }
    } else if (verdict.winnerAgentId !== null) {
      throw new InvariantViolationError(`${verdict.outcome} verdict cannot name a winner`);
    }

    this.transition(DebatePhase.COMPLETE);
    this.verdict = Object.freeze({ ...verdict, perAgentScores: Object.freeze({ ...verdict.perAgentScores }) });
    this.completedAt = new Date().toISOString();
    this.emit('completed', this.verdict);
  }

  /**
   * Check if a transition is valid
   */
  isValidTransition(fromPhase: DebatePhase, toPhase: DebatePhase): boolean {
    return TRANSITIONS.get(fromPhase)?.includes(toPhase) ?? false;
  }

  getPhase(): DebatePhase {
    return this.phase;
  }

  getRoundNumber(): number {
    return this.roundNumber;
  }

  getTopic(): string {
    return this.topic;
  }

  getParticipants(): readonly string[] {
    return this.participants;
  }

  getMaxRounds(): number {
    return this.maxRounds;
  }

  getTurns(): readonly Turn[] {
    return [...this.turns];
  }

  /**
   * Text of every accepted argument, in order
   */
  getUsedArguments(): string[] {
    return this.turns.map((turn) => turn.argumentText);
  }

  getVerdict(): Verdict | null {
    return this.verdict;
  }

  /**
   * Phase transitions so far, oldest first
   */
  getTransitions(): readonly PhaseTransitionEvent[] {
    return [...this.transitions];
  }

  /**
   * Read-only copy of the full record
   */
  getSnapshot(): DebateSnapshot {
    return Object.freeze({
      debateId: this.debateId,
      topic: this.topic,
      participants: this.participants,
      maxRounds: this.maxRounds,
      roundNumber: this.roundNumber,
      phase: this.phase,
      turns: Object.freeze([...this.turns]),
      rejectedAttempts: Object.freeze([...this.rejectedAttempts]),
      turnFailures: Object.freeze([...this.turnFailures]),
      verdict: this.verdict,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
    });
  }

  private transition(toPhase: DebatePhase): void {
    const fromPhase = this.phase;

    if (!this.isValidTransition(fromPhase, toPhase)) {
      logger.error({ debateId: this.debateId, fromPhase, toPhase }, 'Invalid transition');
      throw new InvalidTransitionError(fromPhase, toPhase);
    }

    this.phase = toPhase;

    const event: PhaseTransitionEvent = {
      debateId: this.debateId,
      fromPhase,
      toPhase,
      roundNumber: this.roundNumber,
      timestamp: new Date().toISOString(),
    };
    this.transitions.push(event);

    logger.info({ debateId: this.debateId, fromPhase, toPhase, roundNumber: this.roundNumber }, 'Phase transition');
    this.emit('phase_transition', event);
  }

  private requirePhase(phase: DebatePhase, action: string): void {
    if (this.phase !== phase) {
      throw new InvariantViolationError(`Cannot ${action} in phase ${this.phase}`);
    }
  }
}
