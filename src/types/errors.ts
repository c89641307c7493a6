/**
 * Debate Error Taxonomy
 *
 * Every failure the orchestration core can raise is a DebateError subclass.
 * `recoverable` tells the caller whether the run can continue past it.
 */

import type { ValidationCheck } from './validation.js';

/**
 * Error codes used across the debate core
 */
export type DebateErrorCode =
  | 'configuration'
  | 'validation_rejection'
  | 'turn_failure'
  | 'generation'
  | 'judge_failure'
  | 'invalid_transition'
  | 'invariant_violation'
  | 'cancelled';

/**
 * Base class for all debate errors
 */
export class DebateError extends Error {
  public readonly code: DebateErrorCode;
  public readonly recoverable: boolean;

  constructor(message: string, code: DebateErrorCode, recoverable: boolean, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DebateError';
    this.code = code;
    this.recoverable = recoverable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Raised before DEBATING when the configuration cannot start a debate
 */
export class ConfigurationError extends DebateError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'configuration', false);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A candidate argument failed one of the validator checks
 */
export class ValidationRejection extends DebateError {
  public readonly check: ValidationCheck;
  public readonly reason: string;
  public readonly feedback: string;

  constructor(check: ValidationCheck, reason: string, feedback: string) {
    super(`Argument rejected: ${reason}`, 'validation_rejection', true);
    this.name = 'ValidationRejection';
    this.check = check;
    this.reason = reason;
    this.feedback = feedback;
  }
}

export type TurnFailureCause = 'validation' | 'generation';

/**
 * An agent could not produce an admissible argument for its turn
 */
export class TurnFailure extends DebateError {
  public readonly agentId: string;
  public readonly roundNumber: number;
  public readonly failureCause: TurnFailureCause;
  public readonly attempts: number;

  constructor(
    agentId: string,
    roundNumber: number,
    failureCause: TurnFailureCause,
    attempts: number,
    message: string,
    cause?: unknown
  ) {
    super(message, 'turn_failure', true, cause);
    this.name = 'TurnFailure';
    this.agentId = agentId;
    this.roundNumber = roundNumber;
    this.failureCause = failureCause;
    this.attempts = attempts;
  }
}

export type GenerationErrorKind = 'timeout' | 'malformed' | 'refused' | 'unavailable';

/**
 * The text-generation collaborator failed to return usable text
 */
export class GenerationError extends DebateError {
  public readonly kind: GenerationErrorKind;
  public readonly statusCode?: number;

  constructor(message: string, kind: GenerationErrorKind, statusCode?: number, cause?: unknown) {
    super(message, 'generation', true, cause);
    this.name = 'GenerationError';
    this.kind = kind;
    this.statusCode = statusCode;
  }

  /**
   * Refusals (bad credentials, rejected content) will fail the same way again
   */
  get retryable(): boolean {
    return this.kind !== 'refused';
  }

  /**
   * Classify an arbitrary thrown value
   */
  static fromError(error: unknown): GenerationError {
    if (error instanceof GenerationError) {
      return error;
    }

    if (error instanceof Error) {
      const message = error.message.toLowerCase();

      if (error.name === 'AbortError' || message.includes('timeout') || message.includes('timed out')) {
        return new GenerationError(error.message, 'timeout', undefined, error);
      }

      if (message.includes('rate limit') || message.includes('429')) {
        return new GenerationError(error.message, 'unavailable', 429, error);
      }

      if (message.includes('unauthorized') || message.includes('authentication') || message.includes('401')) {
        return new GenerationError(error.message, 'refused', 401, error);
      }

      if (message.includes('content policy') || message.includes('refus') || message.includes('400')) {
        return new GenerationError(error.message, 'refused', 400, error);
      }

      if (message.includes('server error') || message.includes('500') || message.includes('503')) {
        return new GenerationError(error.message, 'unavailable', 500, error);
      }

      return new GenerationError(error.message, 'malformed', undefined, error);
    }

    return new GenerationError(String(error), 'malformed');
  }
}

/**
 * The judge could not produce a well-formed verdict
 */
export class JudgeFailure extends DebateError {
  public readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, 'judge_failure', true, cause);
    this.name = 'JudgeFailure';
    this.attempts = attempts;
  }
}

/**
 * An operation would break a data-model invariant (programming error)
 */
export class InvariantViolationError extends DebateError {
  constructor(message: string, code: DebateErrorCode = 'invariant_violation') {
    super(message, code, false);
    this.name = 'InvariantViolationError';
  }
}

/**
 * A phase change the state machine does not allow
 */
export class InvalidTransitionError extends InvariantViolationError {
  public readonly fromPhase: string;
  public readonly toPhase: string;

  constructor(fromPhase: string, toPhase: string) {
    super(`Invalid transition from ${fromPhase} to ${toPhase}`, 'invalid_transition');
    this.name = 'InvalidTransitionError';
    this.fromPhase = fromPhase;
    this.toPhase = toPhase;
  }
}

/**
 * Cancellation observed at a turn boundary
 */
export class DebateCancelledError extends DebateError {
  constructor(message = 'Debate cancelled') {
    super(message, 'cancelled', false);
    this.name = 'DebateCancelledError';
  }
}
