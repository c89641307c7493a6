/**
 * Persona Agent
 *
 * Debate participant backed by the text-generation collaborator. Generation
 * failures (timeouts, empty or malformed output, provider outages) are
 * retried with the same prompt; refusals are not.
 */

import pino from 'pino';
import type { PersonaProfile } from '../../config/personas.js';
import type { TextGenerator } from '../../types/llm.js';
import { DebateCancelledError, GenerationError } from '../../types/errors.js';
import { backoffDelay, sleep, throwIfCancelled } from '../../utils/async.js';
import { loggers } from '../logging/index.js';
import { completeWithTimeout } from './generation.js';
import { buildPersonaSystemPrompt, buildProposalPrompt } from './prompts/persona-prompts.js';
import {
  DEFAULT_GENERATION_SETTINGS,
  type AgentMetadata,
  type DebateAgent,
  type GenerationSettings,
  type ProposalRequest,
} from './types.js';

const logger = pino({
  name: 'persona-agent',
  level: process.env.LOG_LEVEL || 'info',
});

export interface PersonaAgentOptions extends Partial<GenerationSettings> {
  /** Participant id when it differs from the persona id */
  id?: string;
  /** Model name reported in metadata */
  model?: string;
}

export class PersonaAgent implements DebateAgent {
  readonly id: string;
  private readonly settings: GenerationSettings;
  private readonly systemPrompt: string;
  private readonly model: string;

  constructor(
    private readonly profile: PersonaProfile,
    private readonly generator: TextGenerator,
    options: PersonaAgentOptions = {}
  ) {
    const { id, model, ...settings } = options;
    this.id = id ?? profile.id;
    this.model = model ?? 'unknown';
    this.settings = { ...DEFAULT_GENERATION_SETTINGS, ...settings };
    this.systemPrompt = buildPersonaSystemPrompt(profile);
  }

  async propose(request: ProposalRequest): Promise<string> {
    const prompt = buildProposalPrompt(request);
    const { retries, baseDelayMs, maxDelayMs, timeoutMs, temperature, maxTokens } = this.settings;

    let lastError = new GenerationError(`No generation attempted for ${this.id}`, 'malformed');

    for (let attempt = 0; attempt <= retries; attempt++) {
      throwIfCancelled(request.signal);
      const startTime = Date.now();

      try {
        const text = await completeWithTimeout(this.generator, prompt, {
          system: this.systemPrompt,
          temperature,
          maxTokens,
          timeoutMs,
          signal: request.signal,
        });

        const trimmed = text.trim();
        if (trimmed.length === 0) {
          throw new GenerationError(`Empty response for ${this.id}`, 'malformed');
        }

        loggers.agentCall({ agent: this.id, model: this.model, latency_ms: Date.now() - startTime, success: true });
        return trimmed;
      } catch (error) {
        if (error instanceof DebateCancelledError) {
          throw error;
        }

        lastError = GenerationError.fromError(error);
        loggers.agentCall({
          agent: this.id,
          model: this.model,
          latency_ms: Date.now() - startTime,
          success: false,
          error: lastError.message,
        });

        if (!lastError.retryable) {
          break;
        }

        if (attempt < retries) {
          const delay = backoffDelay(attempt, baseDelayMs, maxDelayMs);
          logger.warn({
            agentId: this.id,
            attempt: attempt + 1,
            maxRetries: retries,
            delay,
            kind: lastError.kind,
          }, 'Retrying generation after error');
          await sleep(delay, request.signal);
        }
      }
    }

    throw lastError;
  }

  getMetadata(): AgentMetadata {
    return {
      id: this.id,
      name: this.profile.name,
      persona: this.profile.persona,
      model: this.model,
    };
  }
}
