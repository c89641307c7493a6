/**
 * Round Controller
 *
 * Drives one debate through its state machine, one turn at a time:
 * - picks the next agent by strict rotation
 * - asks it for a candidate and gates the candidate through the validator,
 *   feeding rejection guidance back for up to `validationRetries` retries
 * - commits accepted turns to the state and the agent's memory
 * - applies the skip/abort policy when a turn fails
 * - prunes every memory at the end of each round
 * - hands the transcript to the judge after the final round
 *
 * Cancellation is checked only at turn boundaries. Apart from
 * ConfigurationError (before DEBATING) and InvariantViolationError
 * (programming errors), every failure ends the run in COMPLETE with a
 * verdict.
 */

import {
  DebatePhase,
  type DebateDiagnostics,
  type DebateSnapshot,
  type RejectedAttempt,
  type Verdict,
} from '../../types/debate.js';
import {
  ConfigurationError,
  DebateCancelledError,
  GenerationError,
  InvariantViolationError,
  JudgeFailure,
  TurnFailure,
  ValidationRejection,
} from '../../types/errors.js';
import type { ValidationCheck } from '../../types/validation.js';
import type { ResolvedDebateConfiguration } from '../../config/debate-config.js';
import { throwIfCancelled } from '../../utils/async.js';
import type { DebateAgent, DebateJudge } from '../agents/types.js';
import type { ArgumentValidator } from '../validation/argument-validator.js';
import type { MemoryManager } from '../memory/memory-manager.js';
import type { MemoryStore } from '../memory/memory-store.js';
import type { TranscriptSink } from '../transcript/transcript-sink.js';
import { createDebateLogger, loggers, type Logger } from '../logging/index.js';
import type { DebateStateMachine } from './state-machine.js';
import { TurnManager, type TurnSlot } from './turn-manager.js';

export interface RoundControllerDependencies {
  state: DebateStateMachine;
  agents: ReadonlyMap<string, DebateAgent>;
  judge: DebateJudge;
  validator: ArgumentValidator;
  memoryStore: MemoryStore;
  memoryManager: MemoryManager;
  config: ResolvedDebateConfiguration;
  sinks?: readonly TranscriptSink[];
}

/**
 * What happened in one step
 */
export type StepResult =
  | { kind: 'accepted'; agentId: string; roundNumber: number; attempts: number }
  | { kind: 'skipped'; agentId: string; roundNumber: number; failure: TurnFailure }
  | { kind: 'aborted'; agentId: string; roundNumber: number; failure: TurnFailure }
  | { kind: 'idle' };

type TurnOutcome =
  | { kind: 'accepted'; text: string; attempts: number }
  | { kind: 'failed'; failure: TurnFailure };

export class RoundController {
  private readonly state: DebateStateMachine;
  private readonly agents: ReadonlyMap<string, DebateAgent>;
  private readonly judge: DebateJudge;
  private readonly validator: ArgumentValidator;
  private readonly memoryStore: MemoryStore;
  private readonly memoryManager: MemoryManager;
  private readonly config: ResolvedDebateConfiguration;
  private readonly sinks: readonly TranscriptSink[];
  private readonly turnManager: TurnManager;
  private readonly logger: Logger;

  private notifiedTransitions = 0;
  private judgeAttempts = 0;
  private startTime: number | null = null;
  private endTime: number | null = null;

  constructor(deps: RoundControllerDependencies) {
    this.state = deps.state;
    this.agents = deps.agents;
    this.judge = deps.judge;
    this.validator = deps.validator;
    this.memoryStore = deps.memoryStore;
    this.memoryManager = deps.memoryManager;
    this.config = deps.config;
    this.sinks = deps.sinks ?? [];
    this.turnManager = new TurnManager(this.state.getParticipants(), this.state.getMaxRounds());
    this.logger = createDebateLogger(this.state.debateId);
  }

  /**
   * Run the debate to COMPLETE
   * @throws ConfigurationError when the debate cannot start
   */
  async run(signal?: AbortSignal): Promise<DebateSnapshot> {
    this.start();

    try {
      while (this.state.getPhase() === DebatePhase.DEBATING) {
        throwIfCancelled(signal);
        await this.step(signal);
      }

      if (this.state.getPhase() === DebatePhase.JUDGING) {
        await this.judgePhase(signal);
      }
    } catch (error) {
      if (!(error instanceof DebateCancelledError)) {
        throw error;
      }
      loggers.debateLifecycle(this.state.debateId, 'cancelled', { roundNumber: this.state.getRoundNumber() });
      await this.finishAborted('Debate cancelled before completion');
    }

    this.endTime = Date.now();
    const snapshot = this.state.getSnapshot();
    await this.notify((sink) => sink.onComplete?.(snapshot));
    return snapshot;
  }

  /**
   * Play the current turn slot
   */
  async step(signal?: AbortSignal): Promise<StepResult> {
    this.start();

    if (this.state.getPhase() !== DebatePhase.DEBATING) {
      return { kind: 'idle' };
    }

    const slot = this.turnManager.getCurrentSlot();
    if (!slot) {
      throw new InvariantViolationError('Debate is still DEBATING but the rotation is exhausted');
    }
    if (slot.roundNumber !== this.state.getRoundNumber()) {
      throw new InvariantViolationError(
        `Rotation is in round ${slot.roundNumber} but the debate is in round ${this.state.getRoundNumber()}`
      );
    }

    const outcome = await this.executeTurn(slot, signal);
    let result: StepResult;

    if (outcome.kind === 'accepted') {
      const turn = this.state.appendTurn(slot.agentId, outcome.text);
      this.memoryStore.append({ roundNumber: turn.roundNumber, agentId: turn.agentId, content: turn.argumentText });
      loggers.turnAccepted(this.state.debateId, slot.agentId, slot.roundNumber, outcome.attempts);
      await this.notify((sink) => sink.onTurnAccepted?.(turn));
      result = { kind: 'accepted', agentId: slot.agentId, roundNumber: slot.roundNumber, attempts: outcome.attempts };
    } else if (this.config.turnFailurePolicy === 'abort') {
      await this.recordFailure(outcome.failure, 'aborted');
      await this.finishAborted(`Debate aborted: ${outcome.failure.message}`);
      return { kind: 'aborted', agentId: slot.agentId, roundNumber: slot.roundNumber, failure: outcome.failure };
    } else {
      await this.recordFailure(outcome.failure, 'skipped');
      result = { kind: 'skipped', agentId: slot.agentId, roundNumber: slot.roundNumber, failure: outcome.failure };
    }

    const { roundCompleted } = this.turnManager.advanceTurn();
    if (roundCompleted) {
      await this.completeRound();
    }

    return result;
  }

  /**
   * Rejection and failure counts for the run so far
   */
  getDiagnostics(): DebateDiagnostics {
    const snapshot = this.state.getSnapshot();
    const rejectionsByCheck: Record<ValidationCheck, number> = {
      length: 0,
      placeholder: 0,
      substance: 0,
      novelty: 0,
      relevance: 0,
    };
    for (const attempt of snapshot.rejectedAttempts) {
      rejectionsByCheck[attempt.check]++;
    }

    const end = this.endTime ?? Date.now();
    return {
      acceptedTurns: snapshot.turns.length,
      rejectedAttempts: snapshot.rejectedAttempts.length,
      rejectionsByCheck,
      turnFailures: snapshot.turnFailures.length,
      skippedTurns: snapshot.turnFailures.filter((failure) => failure.resolution === 'skipped').length,
      judgeAttempts: this.judgeAttempts,
      durationMs: this.startTime === null ? 0 : end - this.startTime,
    };
  }

  getTurnManager(): TurnManager {
    return this.turnManager;
  }

  private start(): void {
    if (this.state.getPhase() !== DebatePhase.INIT) {
      return;
    }

    const missing = this.state.getParticipants().filter((id) => !this.agents.has(id));
    if (missing.length > 0) {
      throw new ConfigurationError(
        `No agent registered for: ${missing.join(', ')}`,
        missing.map((id) => `participants: no agent for "${id}"`)
      );
    }

    this.state.begin();
    this.startTime = Date.now();
    loggers.debateLifecycle(this.state.debateId, 'started', {
      topic: this.state.getTopic(),
      participants: this.state.getParticipants(),
      maxRounds: this.state.getMaxRounds(),
    });
  }

  /**
   * Ask one agent for an admissible argument
   */
  private async executeTurn(slot: TurnSlot, signal?: AbortSignal): Promise<TurnOutcome> {
    const agent = this.agents.get(slot.agentId);
    if (!agent) {
      throw new InvariantViolationError(`No agent for participant ${slot.agentId}`);
    }

    const maxAttempts = this.config.retries.validationRetries + 1;
    let feedback: string | undefined;
    let lastRejection: ValidationRejection | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfCancelled(signal);
      const context = this.memoryStore.buildContext(slot.agentId);

      let candidate: string;
      try {
        candidate = await agent.propose({
          topic: this.state.getTopic(),
          roundNumber: slot.roundNumber,
          maxRounds: this.state.getMaxRounds(),
          ownMemory: context.ownMemory,
          opponentsMemory: context.opponentsMemory,
          rejectionFeedback: feedback,
          signal,
        });
      } catch (error) {
        if (error instanceof DebateCancelledError || signal?.aborted) {
          throw new DebateCancelledError();
        }
        const generationError = GenerationError.fromError(error);
        return {
          kind: 'failed',
          failure: new TurnFailure(
            slot.agentId,
            slot.roundNumber,
            'generation',
            attempt,
            `Generation failed for ${slot.agentId} in round ${slot.roundNumber}: ${generationError.message}`,
            generationError
          ),
        };
      }

      const verdict = this.validator.isValid(candidate, this.state.getUsedArguments());
      if (verdict.ok) {
        return { kind: 'accepted', text: candidate, attempts: attempt };
      }

      lastRejection = new ValidationRejection(verdict.check, verdict.reason, verdict.feedback);
      const record = this.state.recordRejection({
        agentId: slot.agentId,
        attempt,
        text: candidate,
        reason: verdict.reason,
        check: verdict.check,
      });
      await this.notifyRejection(record);
      feedback = verdict.feedback;
    }

    return {
      kind: 'failed',
      failure: new TurnFailure(
        slot.agentId,
        slot.roundNumber,
        'validation',
        maxAttempts,
        `${slot.agentId} was rejected ${maxAttempts} time(s) in round ${slot.roundNumber}` +
          (lastRejection ? `; last reason: ${lastRejection.reason}` : ''),
        lastRejection
      ),
    };
  }

  private async notifyRejection(record: RejectedAttempt): Promise<void> {
    loggers.validationRejected({ debateId: this.state.debateId, ...record });
    await this.notify((sink) => sink.onTurnRejected?.(record));
  }

  private async recordFailure(failure: TurnFailure, resolution: 'skipped' | 'aborted'): Promise<void> {
    const record = this.state.recordTurnFailure({
      agentId: failure.agentId,
      cause: failure.failureCause,
      message: failure.message,
      attempts: failure.attempts,
      resolution,
    });
    this.logger.warn({ agentId: failure.agentId, cause: failure.failureCause, resolution }, failure.message);
    await this.notify((sink) => sink.onTurnFailed?.(record));
  }

  private async completeRound(): Promise<void> {
    const roundNumber = this.state.completeRound();
    this.memoryManager.pruneAll(this.memoryStore);
    const snapshot = this.state.getSnapshot();
    await this.notify((sink) => sink.onRoundComplete?.(roundNumber, snapshot));

    if (roundNumber === this.state.getMaxRounds()) {
      this.state.beginJudging();
      loggers.debateLifecycle(this.state.debateId, 'judging', { turns: snapshot.turns.length });
      await this.flushTransitions();
    }
  }

  private async judgePhase(signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal);
    const participants = this.state.getParticipants();

    let verdict: Verdict;
    try {
      verdict = await this.judge.decide({
        topic: this.state.getTopic(),
        participants,
        turns: this.state.getTurns(),
        signal,
      });
      this.judgeAttempts = this.judge.getLastAttemptCount();
      this.assertVerdictComplete(verdict, participants);
    } catch (error) {
      this.judgeAttempts = this.judge.getLastAttemptCount();
      if (error instanceof DebateCancelledError || error instanceof InvariantViolationError) {
        throw error;
      }

      const failure =
        error instanceof JudgeFailure
          ? error
          : new JudgeFailure(error instanceof Error ? error.message : String(error), this.judgeAttempts, error);
      this.logger.error({ attempts: failure.attempts, err: failure.message }, 'Judge failed; verdict INCONCLUSIVE');

      verdict = {
        outcome: 'INCONCLUSIVE',
        winnerAgentId: null,
        rationale: `No valid judgment could be obtained: ${failure.message}`,
        summary: this.summarize(),
        perAgentScores: {},
        decidedAt: new Date().toISOString(),
      };
    }

    this.state.complete(verdict);
    await this.flushTransitions();
  }

  /**
   * A judge's verdict must name a participant and score every participant
   */
  private assertVerdictComplete(verdict: Verdict, participants: readonly string[]): void {
    if (verdict.outcome !== 'DECIDED') {
      throw new JudgeFailure(`Judge returned ${verdict.outcome} instead of a decision`, this.judgeAttempts);
    }
    if (verdict.winnerAgentId === null || !participants.includes(verdict.winnerAgentId)) {
      throw new JudgeFailure(`Judge winner ${verdict.winnerAgentId} is not a participant`, this.judgeAttempts);
    }
    const unscored = participants.filter((id) => !Number.isFinite(verdict.perAgentScores[id]));
    if (unscored.length > 0) {
      throw new JudgeFailure(`Judge omitted scores for: ${unscored.join(', ')}`, this.judgeAttempts);
    }
  }

  private async finishAborted(reason: string): Promise<void> {
    const phase = this.state.getPhase();
    if (phase === DebatePhase.COMPLETE || phase === DebatePhase.INIT) {
      return;
    }

    loggers.debateLifecycle(this.state.debateId, 'aborted', { reason, phase });
    this.state.complete({
      outcome: 'ABORTED',
      winnerAgentId: null,
      rationale: reason,
      summary: this.summarize(),
      perAgentScores: {},
      decidedAt: new Date().toISOString(),
    });
    await this.flushTransitions();
  }

  private summarize(): string {
    const snapshot = this.state.getSnapshot();
    return `${snapshot.turns.length} accepted argument(s) over ${snapshot.roundNumber} completed round(s) of ${snapshot.maxRounds}.`;
  }

  /**
   * Forward phase transitions the sinks have not seen yet
   */
  private async flushTransitions(): Promise<void> {
    const transitions = this.state.getTransitions();
    while (this.notifiedTransitions < transitions.length) {
      const event = transitions[this.notifiedTransitions];
      this.notifiedTransitions++;
      if (event) {
        await this.callSinks((sink) => sink.onPhaseTransition?.(event));
      }
    }
  }

  private async notify(call: (sink: TranscriptSink) => void | Promise<void>): Promise<void> {
    await this.flushTransitions();
    await this.callSinks(call);
  }

  /**
   * Call every sink; a failing sink is logged and skipped
   */
  private async callSinks(call: (sink: TranscriptSink) => void | Promise<void>): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await call(sink);
      } catch (error) {
        loggers.error('Transcript sink failed', error, { debateId: this.state.debateId });
      }
    }
  }
}
