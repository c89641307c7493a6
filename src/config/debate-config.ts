/**
 * Debate Configuration
 *
 * Defaults are merged once, here, and the result is validated and frozen.
 * The core only ever receives a ResolvedDebateConfiguration.
 */

import { z } from 'zod';
import { ConfigurationError } from '../types/errors.js';
import { PERSONA_IDS } from './personas.js';

const validatorSchema = z.object({
  minWords: z.number().int().min(1).default(10),
  minChars: z.number().int().min(1).default(20),
  minUniqueWords: z.number().int().min(1).default(5),
  maxSimilarity: z.number().gt(0).max(1).default(0.7),
  minTopicOverlap: z.number().int().min(0).default(1),
});

const memorySchema = z.object({
  windowSize: z.number().int().min(1).default(4),
  relevanceFloor: z.number().min(0).max(1).default(0.5),
  maxRelevantEntries: z.number().int().min(0).default(2),
  maxContentChars: z.number().int().min(1).default(4000),
  contextEntries: z.number().int().min(1).default(2),
});

const retriesSchema = z.object({
  validationRetries: z.number().int().min(0).max(10).default(2),
  generationRetries: z.number().int().min(0).max(10).default(2),
  judgeRetries: z.number().int().min(0).max(10).default(2),
  baseDelayMs: z.number().int().min(0).default(500),
  maxDelayMs: z.number().int().min(0).default(5000),
});

const generationSchema = z.object({
  timeoutMs: z.number().int().positive().default(30000),
  temperature: z.number().min(0).max(2).default(0.7),
  judgeTemperature: z.number().min(0).max(2).default(0.3),
  maxTokens: z.number().int().positive().default(600),
});

/**
 * Schema for a debate configuration with every default applied
 */
export const debateConfigurationSchema = z.object({
  topic: z.string().trim().min(1, 'Topic must not be empty'),
  participants: z
    .array(z.string().trim().min(1))
    .min(1, 'At least one participant is required')
    .refine((ids) => new Set(ids).size === ids.length, 'Participants must be unique'),
  maxRounds: z.number().int().positive('maxRounds must be a positive integer').default(3),
  turnFailurePolicy: z.enum(['skip', 'abort']).default('skip'),
  validator: validatorSchema.default({}),
  memory: memorySchema.default({}),
  retries: retriesSchema.default({}),
  generation: generationSchema.default({}),
});

/**
 * Partial configuration accepted from callers (CLI flags, tests)
 */
export type DebateConfigurationInput = z.input<typeof debateConfigurationSchema>;

export type DebateConfiguration = z.output<typeof debateConfigurationSchema>;

/**
 * Fully-resolved, frozen configuration
 */
export interface ResolvedDebateConfiguration extends Readonly<Omit<DebateConfiguration, 'participants'>> {
  readonly participants: readonly string[];
}

export interface ResolveOptions {
  /** Participant ids the caller can build agents for (defaults to the persona catalogue) */
  knownParticipants?: readonly string[];
}

/**
 * Merge defaults, validate and freeze
 * @throws ConfigurationError listing every issue path
 */
export function resolveConfiguration(
  input: DebateConfigurationInput,
  options: ResolveOptions = {}
): ResolvedDebateConfiguration {
  const parsed = debateConfigurationSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid debate configuration: ${issues.join('; ')}`, issues);
  }

  const known: readonly string[] = options.knownParticipants ?? PERSONA_IDS;
  const unknown = parsed.data.participants.filter((id) => !known.includes(id));
  if (unknown.length > 0) {
    const issues = unknown.map((id) => `participants: unknown participant "${id}"`);
    throw new ConfigurationError(
      `Unknown participants: ${unknown.join(', ')}. Available: ${known.join(', ')}`,
      issues
    );
  }

  const config = parsed.data;
  return Object.freeze({
    ...config,
    participants: Object.freeze([...config.participants]),
    validator: Object.freeze(config.validator),
    memory: Object.freeze(config.memory),
    retries: Object.freeze(config.retries),
    generation: Object.freeze(config.generation),
  });
}
