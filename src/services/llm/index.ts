/**
 * LLM Service Barrel Export
 */

export { LLMClient, classifyStatus } from './client.js';
export type { LLMClientOptions } from './client.js';
export type { CompletionOptions, LLMProvider, TextGenerator, TokenUsage } from '../../types/llm.js';
export { loadLLMConfig, hasProviderCredentials } from '../../config/llm.js';
export type { LLMConfig } from '../../config/llm.js';
