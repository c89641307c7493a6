/**
 * debate-arena library entry
 */

export * from './types/debate.js';
export * from './types/errors.js';
export type { ValidationCheck, ValidationResult, ValidatorThresholds } from './types/validation.js';
export type { AgentContext, AgentMemory, MemoryEntry, MemoryPolicy } from './types/memory.js';
export type { CompletionOptions, LLMProvider, TextGenerator, TokenUsage } from './types/llm.js';

export {
  debateConfigurationSchema,
  resolveConfiguration,
} from './config/debate-config.js';
export type {
  DebateConfiguration,
  DebateConfigurationInput,
  ResolvedDebateConfiguration,
  ResolveOptions,
} from './config/debate-config.js';
export { PERSONA_CATALOGUE, PERSONA_IDS, getPersona, isPersonaId, listPersonas } from './config/personas.js';
export type { PersonaId, PersonaProfile } from './config/personas.js';

export * from './services/debate/index.js';
export * from './services/agents/index.js';
export * from './services/memory/index.js';
export * from './services/validation/index.js';
export * from './services/transcript/index.js';
export * from './services/export/index.js';
export * from './services/llm/index.js';
export { logger, createLogger, createDebateLogger, loggers } from './services/logging/index.js';

export { SCHEMA_VERSION, debateSnapshotSchema } from './schemas/debate-transcript.schema.js';
