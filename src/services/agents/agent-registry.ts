/**
 * Agent Registry
 *
 * Maps each persona id to the constructor of its participant. Ids are
 * resolved once, at configuration time.
 */

import { PERSONA_CATALOGUE, PERSONA_IDS, isPersonaId, type PersonaId } from '../../config/personas.js';
import type { TextGenerator } from '../../types/llm.js';
import { ConfigurationError } from '../../types/errors.js';
import { MockPersonaAgent } from './mock-agents.js';
import { PersonaAgent, type PersonaAgentOptions } from './persona-agent.js';
import type { DebateAgent } from './types.js';

export type AgentFactory = (generator: TextGenerator, options?: PersonaAgentOptions) => DebateAgent;

/**
 * One factory per persona variant
 */
export const AGENT_REGISTRY: Record<PersonaId, AgentFactory> = {
  scientist: (generator, options) => new PersonaAgent(PERSONA_CATALOGUE.scientist, generator, options),
  philosopher: (generator, options) => new PersonaAgent(PERSONA_CATALOGUE.philosopher, generator, options),
  economist: (generator, options) => new PersonaAgent(PERSONA_CATALOGUE.economist, generator, options),
  lawyer: (generator, options) => new PersonaAgent(PERSONA_CATALOGUE.lawyer, generator, options),
};

/**
 * Build the participant for a persona id
 * @throws ConfigurationError for ids outside the registry
 */
export function createAgent(id: string, generator: TextGenerator, options?: PersonaAgentOptions): DebateAgent {
  if (!isPersonaId(id)) {
    throw new ConfigurationError(`Unknown agent: ${id}. Available: ${PERSONA_IDS.join(', ')}`, [
      `participants: unknown participant "${id}"`,
    ]);
  }
  return AGENT_REGISTRY[id](generator, options);
}

/**
 * Offline participant for a persona id
 */
export function createMockAgent(id: string): DebateAgent {
  if (!isPersonaId(id)) {
    throw new ConfigurationError(`Unknown agent: ${id}. Available: ${PERSONA_IDS.join(', ')}`, [
      `participants: unknown participant "${id}"`,
    ]);
  }
  return new MockPersonaAgent(id);
}

export function getAvailableAgents(): PersonaId[] {
  return [...PERSONA_IDS];
}
