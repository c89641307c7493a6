/**
 * LLM Client Implementation
 *
 * Unified TextGenerator over OpenAI and Anthropic. Each call carries its own
 * timeout and abort signal; provider failures are mapped to GenerationError
 * kinds. Retries belong to the agent and judge wrappers, not to this client.
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import pino from 'pino';
import type { CompletionOptions, LLMProvider, TextGenerator, TokenUsage } from '../../types/llm.js';
import { GenerationError } from '../../types/errors.js';
import { loadLLMConfig, type LLMConfig } from '../../config/llm.js';

/**
 * Logger instance for LLM operations
 */
const logger = pino({
  name: 'llm-client',
  level: process.env.LOG_LEVEL || 'info',
});

const DEFAULT_MAX_TOKENS = 600;
const DEFAULT_TEMPERATURE = 0.7;

export interface LLMClientOptions {
  /** Override the provider from the environment */
  provider?: LLMProvider;
  /** Override the model for the selected provider */
  model?: string;
}

export class LLMClient implements TextGenerator {
  private openaiClient: OpenAI | null = null;
  private anthropicClient: Anthropic | null = null;
  private readonly provider: LLMProvider;
  private readonly model: string;
  private readonly timeoutMs: number;
  private usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

  constructor(llmConfig: LLMConfig = loadLLMConfig(), options: LLMClientOptions = {}) {
    this.provider = options.provider ?? llmConfig.provider;
    this.model = options.model ?? llmConfig.models[this.provider];
    this.timeoutMs = llmConfig.timeoutMs;

    // SDK retries are disabled; the wrappers own retry policy
    if (llmConfig.openai.apiKey) {
      this.openaiClient = new OpenAI({
        apiKey: llmConfig.openai.apiKey,
        baseURL: llmConfig.openai.baseURL,
        maxRetries: 0,
      });
      logger.info('OpenAI client initialized');
    }

    if (llmConfig.anthropic.apiKey) {
      this.anthropicClient = new Anthropic({
        apiKey: llmConfig.anthropic.apiKey,
        baseURL: llmConfig.anthropic.baseURL,
        maxRetries: 0,
      });
      logger.info('Anthropic client initialized');
    }

    if (!this.openaiClient && !this.anthropicClient) {
      logger.warn('No LLM providers configured - at least one API key required');
    }
  }

  getProvider(): LLMProvider {
    return this.provider;
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Token usage accumulated over every successful call
   */
  getUsage(): TokenUsage {
    return { ...this.usage };
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const startTime = Date.now();

    logger.debug({
      provider: this.provider,
      model: this.model,
      promptChars: prompt.length,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
    }, 'Starting LLM completion request');

    try {
      const content = this.provider === 'openai'
        ? await this.executeOpenAIRequest(prompt, options)
        : await this.executeAnthropicRequest(prompt, options);

      logger.debug({
        provider: this.provider,
        model: this.model,
        duration: Date.now() - startTime,
      }, 'LLM completion successful');

      return content;
    } catch (error) {
      const generationError = this.toGenerationError(error);
      logger.error({
        provider: this.provider,
        model: this.model,
        duration: Date.now() - startTime,
        error: {
          kind: generationError.kind,
          message: generationError.message,
          statusCode: generationError.statusCode,
        },
      }, 'LLM completion failed');
      throw generationError;
    }
  }

  /**
   * Execute OpenAI API request
   */
  private async executeOpenAIRequest(prompt: string, options: CompletionOptions): Promise<string> {
    if (!this.openaiClient) {
      throw new GenerationError('OpenAI client not initialized - missing API key', 'refused');
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    const completion = await this.openaiClient.chat.completions.create(
      {
        model: this.model,
        messages,
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
        stream: false,
      },
      { signal: options.signal, timeout: options.timeoutMs ?? this.timeoutMs }
    );

    const choice = completion.choices[0];
    if (!choice) {
      throw new GenerationError('No completion choices returned from OpenAI', 'malformed');
    }
    if (choice.finish_reason === 'content_filter') {
      throw new GenerationError('OpenAI withheld the completion (content filter)', 'refused');
    }

    this.recordUsage(
      completion.usage?.prompt_tokens ?? 0,
      completion.usage?.completion_tokens ?? 0
    );

    const content = choice.message.content ?? '';
    if (content.trim().length === 0) {
      throw new GenerationError('OpenAI returned an empty completion', 'malformed');
    }
    return content;
  }

  /**
   * Execute Anthropic API request
   */
  private async executeAnthropicRequest(prompt: string, options: CompletionOptions): Promise<string> {
    if (!this.anthropicClient) {
      throw new GenerationError('Anthropic client not initialized - missing API key', 'refused');
    }

    const response = await this.anthropicClient.messages.create(
      {
        model: this.model,
        system: options.system,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      },
      { signal: options.signal, timeout: options.timeoutMs ?? this.timeoutMs }
    );

    this.recordUsage(response.usage.input_tokens, response.usage.output_tokens);

    const textContent = response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n');

    if (textContent.trim().length === 0) {
      throw new GenerationError('Anthropic returned an empty completion', 'malformed');
    }
    return textContent;
  }

  private recordUsage(promptTokens: number, completionTokens: number): void {
    this.usage = {
      promptTokens: this.usage.promptTokens + promptTokens,
      completionTokens: this.usage.completionTokens + completionTokens,
      totalTokens: this.usage.totalTokens + promptTokens + completionTokens,
    };
  }

  /**
   * Map provider SDK errors to GenerationError kinds
   */
  private toGenerationError(error: unknown): GenerationError {
    if (error instanceof GenerationError) {
      return error;
    }

    if (error instanceof OpenAI.APIUserAbortError || error instanceof Anthropic.APIUserAbortError) {
      return new GenerationError('Request aborted', 'timeout', undefined, error);
    }

    if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof Anthropic.APIConnectionTimeoutError) {
      return new GenerationError(error.message, 'timeout', undefined, error);
    }

    if (error instanceof OpenAI.APIError || error instanceof Anthropic.APIError) {
      return classifyStatus(error.message, error.status, error);
    }

    return GenerationError.fromError(error);
  }
}

/**
 * Status code to GenerationError kind
 */
export function classifyStatus(message: string, status: number | undefined, cause?: unknown): GenerationError {
  if (status === undefined) {
    return new GenerationError(message, 'unavailable', undefined, cause);
  }
  if (status === 408) {
    return new GenerationError(message, 'timeout', status, cause);
  }
  if (status === 429 || status >= 500) {
    return new GenerationError(message, 'unavailable', status, cause);
  }
  if (status === 400 || status === 401 || status === 403 || status === 404) {
    return new GenerationError(message, 'refused', status, cause);
  }
  return new GenerationError(message, 'malformed', status, cause);
}
