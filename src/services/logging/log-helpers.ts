/**
 * Structured logging helpers for debate events
 * Each helper logs one event type with a consistent shape
 */

import { logger } from './logger.js';

export const loggers = {
  /**
   * Log state machine transitions
   */
  stateTransition(debateId: string, from: string, to: string, roundNumber?: number) {
    logger.info({
      category: 'state_machine',
      debateId,
      from,
      to,
      roundNumber,
      event: 'transition',
    }, `State transition: ${from} -> ${to}`);
  },

  /**
   * Log an accepted turn
   */
  turnAccepted(debateId: string, agentId: string, roundNumber: number, attempts: number) {
    logger.info({
      category: 'turn',
      event: 'turn_accepted',
      debateId,
      agentId,
      roundNumber,
      attempts,
    }, `Turn accepted: ${agentId} (round ${roundNumber}, attempt ${attempts})`);
  },

  /**
   * Log a validator rejection
   */
  validationRejected(params: {
    debateId: string;
    agentId: string;
    roundNumber: number;
    attempt: number;
    check: string;
    reason: string;
  }) {
    logger.warn({
      category: 'validation',
      event: 'argument_rejected',
      ...params,
    }, `Argument from ${params.agentId} rejected: ${params.reason}`);
  },

  /**
   * Log text-generation calls with latency
   */
  agentCall(params: {
    debateId?: string;
    agent: string;
    model?: string;
    latency_ms: number;
    success: boolean;
    error?: string;
  }) {
    const level = params.success ? 'debug' : 'warn';
    logger[level]({
      category: 'agent_call',
      event: 'llm_request',
      ...params,
    }, `Agent ${params.agent} ${params.success ? 'completed' : 'failed'} in ${params.latency_ms}ms`);
  },

  /**
   * Log errors with stack traces
   */
  error(message: string, error: unknown, context?: Record<string, unknown>) {
    const details = error instanceof Error
      ? { message: error.message, stack: error.stack, name: error.name }
      : { message: String(error) };
    logger.error({
      category: 'error',
      event: 'error_occurred',
      error: details,
      ...context,
    }, message);
  },

  /**
   * Log debate lifecycle events
   */
  debateLifecycle(
    debateId: string,
    event: 'started' | 'judging' | 'completed' | 'aborted' | 'cancelled',
    metadata?: Record<string, unknown>
  ) {
    logger.info({
      category: 'debate_lifecycle',
      event: `debate_${event}`,
      debateId,
      ...metadata,
    }, `Debate ${event}`);
  },
};

/**
 * Performance timing helper
 * Returns a function that logs the duration when called
 *
 * @example
 * const endTimer = startTimer();
 * await runDebate(options);
 * endTimer('debate_run', { debateId });
 */
export function startTimer() {
  const start = Date.now();
  return (operation: string, context?: Record<string, unknown>) => {
    const duration = Date.now() - start;
    logger.debug({
      category: 'performance',
      event: 'operation_timed',
      operation,
      duration_ms: duration,
      ...context,
    }, `${operation} completed in ${duration}ms`);
    return duration;
  };
}

/**
 * Async operation wrapper with automatic timing and error logging
 */
export async function loggedOperation<T>(
  operation: string,
  fn: () => Promise<T>,
  context?: Record<string, unknown>
): Promise<T> {
  const timer = startTimer();
  try {
    const result = await fn();
    timer(operation, { ...context, success: true });
    return result;
  } catch (error) {
    timer(operation, { ...context, success: false });
    loggers.error(`Operation failed: ${operation}`, error, context);
    throw error;
  }
}
