/**
 * JSON Schema for the debate snapshot emitted after COMPLETE (v1.0.0)
 *
 * Field names mirror DebateSnapshot in src/types/debate.ts.
 */

import { DebatePhase } from '../types/debate.js';

const VALIDATION_CHECKS = ['length', 'placeholder', 'substance', 'novelty', 'relevance'];

/**
 * JSON Schema for an accepted Turn
 */
export const turnSchema = {
  type: 'object',
  properties: {
    agentId: { type: 'string', minLength: 1 },
    roundNumber: { type: 'integer', minimum: 0 },
    argumentText: { type: 'string', minLength: 1 },
    timestamp: { type: 'string', format: 'date-time' },
    accepted: { type: 'boolean', const: true },
  },
  required: ['agentId', 'roundNumber', 'argumentText', 'timestamp', 'accepted'],
  additionalProperties: false,
};

/**
 * JSON Schema for a RejectedAttempt
 */
export const rejectedAttemptSchema = {
  type: 'object',
  properties: {
    agentId: { type: 'string', minLength: 1 },
    roundNumber: { type: 'integer', minimum: 0 },
    attempt: { type: 'integer', minimum: 1 },
    text: { type: 'string' },
    reason: { type: 'string', minLength: 1 },
    check: { type: 'string', enum: VALIDATION_CHECKS },
    timestamp: { type: 'string', format: 'date-time' },
  },
  required: ['agentId', 'roundNumber', 'attempt', 'text', 'reason', 'check', 'timestamp'],
  additionalProperties: false,
};

/**
 * JSON Schema for a TurnFailureRecord
 */
export const turnFailureSchema = {
  type: 'object',
  properties: {
    agentId: { type: 'string', minLength: 1 },
    roundNumber: { type: 'integer', minimum: 0 },
    cause: { type: 'string', enum: ['validation', 'generation'] },
    message: { type: 'string' },
    attempts: { type: 'integer', minimum: 0 },
    resolution: { type: 'string', enum: ['skipped', 'aborted'] },
    timestamp: { type: 'string', format: 'date-time' },
  },
  required: ['agentId', 'roundNumber', 'cause', 'message', 'attempts', 'resolution', 'timestamp'],
  additionalProperties: false,
};

/**
 * JSON Schema for a Verdict
 */
export const verdictSchema = {
  type: 'object',
  properties: {
    outcome: { type: 'string', enum: ['DECIDED', 'ABORTED', 'INCONCLUSIVE'] },
    winnerAgentId: { anyOf: [{ type: 'string', minLength: 1 }, { type: 'null' }] },
    rationale: { type: 'string' },
    summary: { type: 'string' },
    perAgentScores: {
      type: 'object',
      additionalProperties: { type: 'number' },
    },
    decidedAt: { type: 'string', format: 'date-time' },
  },
  required: ['outcome', 'winnerAgentId', 'rationale', 'summary', 'perAgentScores', 'decidedAt'],
  additionalProperties: false,
};

/**
 * Complete JSON Schema for DebateSnapshot
 */
export const debateSnapshotSchema = {
  type: 'object',
  properties: {
    debateId: { type: 'string', minLength: 1 },
    topic: { type: 'string', minLength: 1 },
    participants: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
      minItems: 1,
      uniqueItems: true,
    },
    maxRounds: { type: 'integer', minimum: 1 },
    roundNumber: { type: 'integer', minimum: 0 },
    phase: {
      type: 'string',
      enum: [DebatePhase.INIT, DebatePhase.DEBATING, DebatePhase.JUDGING, DebatePhase.COMPLETE],
    },
    turns: { type: 'array', items: turnSchema },
    rejectedAttempts: { type: 'array', items: rejectedAttemptSchema },
    turnFailures: { type: 'array', items: turnFailureSchema },
    verdict: { anyOf: [verdictSchema, { type: 'null' }] },
    startedAt: { anyOf: [{ type: 'string', format: 'date-time' }, { type: 'null' }] },
    completedAt: { anyOf: [{ type: 'string', format: 'date-time' }, { type: 'null' }] },
  },
  required: [
    'debateId',
    'topic',
    'participants',
    'maxRounds',
    'roundNumber',
    'phase',
    'turns',
    'rejectedAttempts',
    'turnFailures',
    'verdict',
    'startedAt',
    'completedAt',
  ],
  additionalProperties: false,
};

/**
 * Schema version constant
 */
export const SCHEMA_VERSION = '1.0.0';

/**
 * Schema registry for version management
 */
export const SCHEMA_REGISTRY = {
  '1.0.0': debateSnapshotSchema,
} as const;

export type SchemaVersion = keyof typeof SCHEMA_REGISTRY;
