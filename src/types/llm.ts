/**
 * Text Generation Types
 *
 * The core only sees the TextGenerator capability. Provider specifics live
 * in services/llm.
 */

export type LLMProvider = 'openai' | 'anthropic';

/**
 * Per-call options for the text-generation collaborator
 */
export interface CompletionOptions {
  /** System prompt (persona instructions) */
  system?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-call timeout in milliseconds */
  timeoutMs?: number;
  /** Abandons the in-flight call */
  signal?: AbortSignal;
}

/**
 * Opaque text-generation capability
 * Fails with GenerationError (timeout | malformed | refused | unavailable)
 */
export interface TextGenerator {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * Token usage reported by a provider
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}
