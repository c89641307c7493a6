/**
 * Mock Agent Implementations
 *
 * Offline stand-ins for the text-generation collaborator, participants and
 * judge. Used by tests and by the CLI's --mock mode.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { getPersona } from '../../config/personas.js';
import type { Verdict } from '../../types/debate.js';
import type { CompletionOptions, TextGenerator } from '../../types/llm.js';
import { ConfigurationError, GenerationError, JudgeFailure } from '../../types/errors.js';
import { countWords, extractKeyTerms } from '../../utils/text.js';
import { selectWinner } from './judge-agent.js';
import type { AgentMetadata, DebateAgent, DebateJudge, JudgeRequest, ProposalRequest } from './types.js';

/**
 * A scripted reply: text, an error to throw, or a function of the prompt
 */
export type ScriptedReply = string | Error | ((prompt: string, options?: CompletionOptions) => string);

/**
 * TextGenerator that replays queued replies and records every call
 */
export class ScriptedTextGenerator implements TextGenerator {
  readonly calls: Array<{ prompt: string; options?: CompletionOptions }> = [];
  private readonly queue: ScriptedReply[];

  constructor(replies: ScriptedReply[] = [], private readonly fallback?: ScriptedReply) {
    this.queue = [...replies];
  }

  enqueue(...replies: ScriptedReply[]): this {
    this.queue.push(...replies);
    return this;
  }

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    this.calls.push({ prompt, options });
    const reply = this.queue.shift() ?? this.fallback;

    if (reply === undefined) {
      throw new GenerationError('Scripted generator has no reply left', 'malformed');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(prompt, options) : reply;
  }
}

/**
 * Participant that replays queued candidates and records every request
 */
export class ScriptedAgent implements DebateAgent {
  readonly requests: ProposalRequest[] = [];
  private readonly queue: Array<string | Error>;

  constructor(
    readonly id: string,
    replies: Array<string | Error> = [],
    private readonly fallback?: (request: ProposalRequest) => string
  ) {
    this.queue = [...replies];
  }

  async propose(request: ProposalRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.queue.shift();

    if (reply instanceof Error) {
      throw reply;
    }
    if (reply !== undefined) {
      return reply;
    }
    if (this.fallback) {
      return this.fallback(request);
    }
    throw new GenerationError(`Scripted agent ${this.id} has no reply left`, 'malformed');
  }

  getMetadata(): AgentMetadata {
    return { id: this.id, name: this.id, persona: 'scripted', model: 'scripted' };
  }
}

const mockArgumentsSchema = z.record(z.array(z.string().min(1)).min(1));

function loadMockArguments(): Record<string, string[]> {
  const raw = readFileSync(new URL('../../../data/mock-arguments.json', import.meta.url), 'utf-8');
  return mockArgumentsSchema.parse(JSON.parse(raw));
}

let mockArguments: Record<string, string[]> | null = null;

/**
 * Persona agent that cycles through canned arguments for its persona.
 * Each call (including retries after a rejection) takes the next template.
 */
export class MockPersonaAgent implements DebateAgent {
  readonly id: string;
  private readonly templates: string[];
  private callCount = 0;

  constructor(private readonly personaId: string, id: string = personaId) {
    mockArguments ??= loadMockArguments();
    const templates = mockArguments[personaId];
    if (!templates) {
      throw new ConfigurationError(`No mock arguments for persona: ${personaId}`, [`participants: ${personaId}`]);
    }
    this.id = id;
    this.templates = templates;
  }

  async propose(request: ProposalRequest): Promise<string> {
    const template = this.templates[this.callCount % this.templates.length] ?? '';
    this.callCount++;
    return template.replace(/\{topic\}/g, () => request.topic);
  }

  getMetadata(): AgentMetadata {
    const profile = getPersona(this.personaId);
    return { id: this.id, name: profile.name, persona: profile.persona, model: 'mock' };
  }
}

/**
 * Judge that scores from the transcript without any model call:
 * two points per accepted turn plus a bonus for distinct vocabulary
 */
export class MockJudge implements DebateJudge {
  private attempts = 0;

  constructor(private readonly failWith?: JudgeFailure) {}

  async decide(request: JudgeRequest): Promise<Verdict> {
    this.attempts = 1;
    if (this.failWith) {
      throw this.failWith;
    }

    const perAgentScores: Record<string, number> = {};
    for (const id of request.participants) {
      const turns = request.turns.filter((turn) => turn.agentId === id);
      const vocabulary = new Set(turns.flatMap((turn) => extractKeyTerms(turn.argumentText))).size;
      perAgentScores[id] = Math.min(10, turns.length * 2 + Math.round(vocabulary / 10));
    }

    const winner = selectWinner(request.participants, perAgentScores);
    const words = request.turns.reduce((sum, turn) => sum + countWords(turn.argumentText), 0);

    return {
      outcome: 'DECIDED',
      winnerAgentId: winner,
      rationale: `${winner} made the broadest case with ${perAgentScores[winner] ?? 0} points.`,
      summary: `${request.turns.length} arguments (${words} words) were exchanged on "${request.topic}".`,
      perAgentScores,
      decidedAt: new Date().toISOString(),
    };
  }

  getLastAttemptCount(): number {
    return this.attempts;
  }
}
