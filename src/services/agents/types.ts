/**
 * Agent Type Interfaces
 *
 * Contracts for debate participants and the judge. Both sit on top of the
 * TextGenerator capability; retries and timeouts live in these wrappers.
 */

import type { AgentMemory } from '../../types/memory.js';
import type { Turn, Verdict } from '../../types/debate.js';

/**
 * Everything an agent sees when it proposes its next argument
 */
export interface ProposalRequest {
  topic: string;
  /** Round in progress (0-based) */
  roundNumber: number;
  maxRounds: number;
  /** Agent's own retained memory, oldest first */
  ownMemory: AgentMemory;
  /** Latest entries from the other participants */
  opponentsMemory: AgentMemory;
  /** Guidance from the validator after a rejected attempt */
  rejectionFeedback?: string;
  /** Cancellation for the in-flight call */
  signal?: AbortSignal;
}

/**
 * Agent metadata for logs and reports
 */
export interface AgentMetadata {
  id: string;
  name: string;
  persona: string;
  model: string;
}

/**
 * A debate participant
 */
export interface DebateAgent {
  readonly id: string;

  /**
   * Produce one candidate argument
   * @throws GenerationError after the agent's own retries are exhausted
   */
  propose(request: ProposalRequest): Promise<string>;

  getMetadata(): AgentMetadata;
}

/**
 * Input for a judgment
 */
export interface JudgeRequest {
  topic: string;
  participants: readonly string[];
  turns: readonly Turn[];
  signal?: AbortSignal;
}

/**
 * Produces the final verdict
 */
export interface DebateJudge {
  /**
   * @throws JudgeFailure when no well-formed verdict could be produced
   */
  decide(request: JudgeRequest): Promise<Verdict>;

  /** Attempts used by the most recent decide() call */
  getLastAttemptCount(): number;
}

/**
 * Retry and sampling settings for one generation wrapper
 */
export interface GenerationSettings {
  /** Extra attempts after the first */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  retries: 2,
  baseDelayMs: 500,
  maxDelayMs: 5000,
  timeoutMs: 30000,
  temperature: 0.7,
  maxTokens: 600,
};
