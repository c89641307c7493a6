/**
 * Agent Services Barrel Export
 */

export type {
  AgentMetadata,
  DebateAgent,
  DebateJudge,
  GenerationSettings,
  JudgeRequest,
  ProposalRequest,
} from './types.js';
export { DEFAULT_GENERATION_SETTINGS } from './types.js';

export { PersonaAgent } from './persona-agent.js';
export type { PersonaAgentOptions } from './persona-agent.js';
export { JudgeAgent, parseJudgment, selectWinner } from './judge-agent.js';
export type { ParsedJudgment } from './judge-agent.js';
export { AGENT_REGISTRY, createAgent, createMockAgent, getAvailableAgents } from './agent-registry.js';
export type { AgentFactory } from './agent-registry.js';
export { MockJudge, MockPersonaAgent, ScriptedAgent, ScriptedTextGenerator } from './mock-agents.js';
export type { ScriptedReply } from './mock-agents.js';
export { completeWithTimeout } from './generation.js';

export { buildPersonaSystemPrompt, buildProposalPrompt, buildMemorySection } from './prompts/persona-prompts.js';
export { JUDGE_SYSTEM_PROMPT, buildJudgePrompt, formatTranscript } from './prompts/judge-prompts.js';
