/**
 * LLM Configuration
 *
 * Provider settings loaded from environment variables. Supports OpenAI and
 * Anthropic; retries are owned by the agent and judge wrappers, not here.
 */

import { config } from 'dotenv';
import type { LLMProvider } from '../types/llm.js';
import { ConfigurationError } from '../types/errors.js';

// Load environment variables
config();

/**
 * LLM configuration interface
 */
export interface LLMConfig {
  openai: {
    apiKey: string;
    baseURL?: string;
  };
  anthropic: {
    apiKey: string;
    baseURL?: string;
  };
  /** Provider used for every call */
  provider: LLMProvider;
  /** Model per provider */
  models: {
    openai: string;
    anthropic: string;
  };
  /** Request timeout in milliseconds */
  timeoutMs: number;
}

type Env = Record<string, string | undefined>;

/**
 * Parse integer from environment variable
 */
function getEnvInt(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Invalid integer value for ${key}: ${value}`, [`${key}: expected a positive integer`]);
  }

  return parsed;
}

/**
 * Validate provider name
 */
function validateProvider(provider: string): LLMProvider {
  if (provider !== 'openai' && provider !== 'anthropic') {
    throw new ConfigurationError(
      `Invalid LLM provider: ${provider}. Must be 'openai' or 'anthropic'`,
      ['LLM_PROVIDER: expected openai or anthropic']
    );
  }
  return provider;
}

/**
 * Build the LLM configuration from an environment map
 */
export function loadLLMConfig(env: Env = process.env): LLMConfig {
  return {
    openai: {
      apiKey: env.OPENAI_API_KEY || '',
      baseURL: env.OPENAI_BASE_URL || undefined,
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || '',
      baseURL: env.ANTHROPIC_BASE_URL || undefined,
    },
    provider: validateProvider(env.LLM_PROVIDER || 'openai'),
    models: {
      openai: env.LLM_MODEL_OPENAI || 'gpt-4o-mini',
      anthropic: env.LLM_MODEL_ANTHROPIC || 'claude-3-5-haiku-20241022',
    },
    timeoutMs: getEnvInt(env, 'LLM_TIMEOUT_MS', 30000),
  };
}

/**
 * Whether the configured provider has credentials
 */
export function hasProviderCredentials(llmConfig: LLMConfig): boolean {
  return llmConfig[llmConfig.provider].apiKey.length > 0;
}
