/**
 * Persona Agent Prompts
 *
 * Builds the system and user prompts for debate participants. Memory is
 * injected as short excerpts so the prompt stays bounded whatever the
 * length of the debate.
 */

import type { PersonaProfile } from '../../../config/personas.js';
import type { AgentMemory } from '../../../types/memory.js';

/**
 * Characters kept per remembered argument
 */
const EXCERPT_LENGTH = 240;

function excerpt(text: string): string {
  const flattened = text.replace(/\s+/g, ' ').trim();
  return flattened.length > EXCERPT_LENGTH ? `${flattened.slice(0, EXCERPT_LENGTH)}...` : flattened;
}

/**
 * Persona instructions plus the output rules every participant follows
 */
export function buildPersonaSystemPrompt(profile: PersonaProfile): string {
  return `${profile.systemPrompt}

You are ${profile.name}, ${profile.persona}, taking part in a formal multi-round debate.

OUTPUT RULES:
- Reply with a single argument of 60 to 150 words in plain prose.
- Make one concrete claim and support it with reasoning or evidence.
- Do not repeat points already made by you or anyone else.
- No headings, bullet lists, brackets, placeholders or notes to the editor.`;
}

/**
 * Render remembered arguments as a bulleted section
 */
export function buildMemorySection(title: string, memory: AgentMemory): string {
  if (memory.length === 0) {
    return '';
  }

  const lines = memory.map((entry) => `- (round ${entry.roundNumber + 1}, ${entry.agentId}) ${excerpt(entry.content)}`);
  return `${title}:\n${lines.join('\n')}`;
}

export interface ProposalPromptInput {
  topic: string;
  roundNumber: number;
  maxRounds: number;
  ownMemory: AgentMemory;
  opponentsMemory: AgentMemory;
  rejectionFeedback?: string;
}

/**
 * User prompt for one proposal
 */
export function buildProposalPrompt(input: ProposalPromptInput): string {
  const sections: string[] = [
    `DEBATE TOPIC: ${input.topic}`,
    `This is round ${input.roundNumber + 1} of ${input.maxRounds}.`,
  ];

  const own = buildMemorySection('Your previous arguments', input.ownMemory);
  if (own) sections.push(own);

  const opponents = buildMemorySection('Recent arguments from other participants (DO NOT REPEAT)', input.opponentsMemory);
  if (opponents) sections.push(opponents);

  if (input.rejectionFeedback) {
    sections.push(
      `YOUR PREVIOUS ATTEMPT WAS REJECTED: ${input.rejectionFeedback}\nRevise your argument so it avoids this problem.`
    );
  }

  if (input.roundNumber === 0 && input.opponentsMemory.length === 0) {
    sections.push('Open the debate by stating your position on the topic and your strongest reason for it.');
  } else if (input.roundNumber === input.maxRounds - 1) {
    sections.push('This is the final round. Respond to the strongest opposing point and make your closing case.');
  } else {
    sections.push('Respond to the other participants and advance a new point in support of your position.');
  }

  return sections.join('\n\n');
}
