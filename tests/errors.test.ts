/**
 * Error Taxonomy and Provider Error Mapping Tests
 */

import { describe, it, expect } from 'vitest';
import { loadLLMConfig } from '../src/config/llm.js';
import { LLMClient, classifyStatus } from '../src/services/llm/client.js';
import {
  ConfigurationError,
  DebateError,
  GenerationError,
  InvalidTransitionError,
  InvariantViolationError,
  JudgeFailure,
  TurnFailure,
} from '../src/types/errors.js';

describe('DebateError hierarchy', () => {
  it('should carry a code and recoverability', () => {
    const error = new ConfigurationError('bad config', ['topic: must not be empty']);

    expect(error).toBeInstanceOf(DebateError);
    expect(error).toMatchObject({
      name: 'ConfigurationError',
      code: 'configuration',
      recoverable: false,
      issues: ['topic: must not be empty'],
    });
  });

  it('should keep the cause', () => {
    const root = new Error('socket hang up');
    const failure = new TurnFailure('scientist', 1, 'generation', 2, 'Generation failed', root);

    expect(failure.cause).toBe(root);
    expect(failure).toMatchObject({ agentId: 'scientist', roundNumber: 1, failureCause: 'generation', attempts: 2 });
    expect(new JudgeFailure('no JSON', 3).recoverable).toBe(true);
  });

  it('should make invalid transitions invariant violations', () => {
    const error = new InvalidTransitionError('COMPLETE', 'DEBATING');

    expect(error).toBeInstanceOf(InvariantViolationError);
    expect(error.code).toBe('invalid_transition');
    expect(error.message).toBe('Invalid transition from COMPLETE to DEBATING');
  });
});

describe('GenerationError.fromError', () => {
  const kindOf = (message: string, name?: string) => {
    const error = new Error(message);
    if (name) error.name = name;
    return GenerationError.fromError(error).kind;
  };

  it('should classify by message', () => {
    expect(kindOf('Request timed out')).toBe('timeout');
    expect(kindOf('This operation was aborted', 'AbortError')).toBe('timeout');
    expect(kindOf('Rate limit reached')).toBe('unavailable');
    expect(kindOf('503 Service Unavailable')).toBe('unavailable');
    expect(kindOf('401 Unauthorized')).toBe('refused');
    expect(kindOf('Request refused by content policy')).toBe('refused');
    expect(kindOf('Unexpected token < in JSON')).toBe('malformed');
  });

  it('should pass GenerationErrors through', () => {
    const original = new GenerationError('empty', 'malformed');
    expect(GenerationError.fromError(original)).toBe(original);
  });

  it('should wrap non-errors', () => {
    expect(GenerationError.fromError('boom')).toMatchObject({ message: 'boom', kind: 'malformed' });
  });

  it('should only retry what can succeed next time', () => {
    expect(new GenerationError('x', 'timeout').retryable).toBe(true);
    expect(new GenerationError('x', 'unavailable').retryable).toBe(true);
    expect(new GenerationError('x', 'malformed').retryable).toBe(true);
    expect(new GenerationError('x', 'refused').retryable).toBe(false);
  });
});

describe('classifyStatus', () => {
  it('should map HTTP status codes to kinds', () => {
    expect(classifyStatus('m', undefined).kind).toBe('unavailable');
    expect(classifyStatus('m', 408).kind).toBe('timeout');
    expect(classifyStatus('m', 429).kind).toBe('unavailable');
    expect(classifyStatus('m', 502).kind).toBe('unavailable');
    expect(classifyStatus('m', 401).kind).toBe('refused');
    expect(classifyStatus('m', 404).kind).toBe('refused');
    expect(classifyStatus('m', 422).kind).toBe('malformed');
    expect(classifyStatus('m', 429).statusCode).toBe(429);
  });
});

describe('LLMClient', () => {
  it('should refuse calls for a provider without a key', async () => {
    const client = new LLMClient(loadLLMConfig({}));

    await expect(client.complete('Hello')).rejects.toMatchObject({
      kind: 'refused',
      message: 'OpenAI client not initialized - missing API key',
    });
    expect(client.getUsage()).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
  });

  it('should honour provider and model overrides', () => {
    const client = new LLMClient(loadLLMConfig({ OPENAI_API_KEY: 'test-secret' }), {
      provider: 'anthropic',
      model: 'test-model',
    });

    expect(client.getProvider()).toBe('anthropic');
    expect(client.getModel()).toBe('test-model');
    return expect(client.complete('Hello')).rejects.toMatchObject({ kind: 'refused' });
  });
});
