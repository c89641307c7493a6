/**
 * Run Report
 *
 * Derives the persisted report (metadata, judgment, performance metrics and
 * full transcript) from a completed snapshot.
 */

import type { DebateSnapshot } from '../../types/debate.js';
import type { ValidationCheck } from '../../types/validation.js';
import { SCHEMA_VERSION } from '../../schemas/debate-transcript.schema.js';
import type { RunReport } from './types.js';

/**
 * Minutes between two ISO timestamps, rounded to two decimals
 */
export function calculateDurationMinutes(startTime: string | null, endTime: string | null): number {
  if (!startTime || !endTime) {
    return 0;
  }
  const start = Date.parse(startTime);
  const end = Date.parse(endTime);
  if (Number.isNaN(start) || Number.isNaN(end) || end < start) {
    return 0;
  }
  return Math.round(((end - start) / 60000) * 100) / 100;
}

/**
 * Accepted turns per participant; participants without turns count 0
 */
export function countContributions(snapshot: DebateSnapshot): Record<string, number> {
  const contributions: Record<string, number> = {};
  for (const id of snapshot.participants) {
    contributions[id] = 0;
  }
  for (const turn of snapshot.turns) {
    contributions[turn.agentId] = (contributions[turn.agentId] ?? 0) + 1;
  }
  return contributions;
}

export function buildRunReport(snapshot: DebateSnapshot): RunReport {
  const verdict = snapshot.verdict;
  const rejectionsByCheck: Record<ValidationCheck, number> = {
    length: 0,
    placeholder: 0,
    substance: 0,
    novelty: 0,
    relevance: 0,
  };
  for (const attempt of snapshot.rejectedAttempts) {
    rejectionsByCheck[attempt.check]++;
  }

  const argumentTexts = snapshot.turns.map((turn) => turn.argumentText);

  return {
    metadata: {
      debateId: snapshot.debateId,
      topic: snapshot.topic,
      maxRounds: snapshot.maxRounds,
      completedRounds: snapshot.roundNumber,
      participants: [...snapshot.participants],
      outcome: verdict?.outcome ?? null,
      winner: verdict?.winnerAgentId ?? null,
      startTime: snapshot.startedAt,
      endTime: snapshot.completedAt,
      durationMinutes: calculateDurationMinutes(snapshot.startedAt, snapshot.completedAt),
      schemaVersion: SCHEMA_VERSION,
    },
    judgment: {
      outcome: verdict?.outcome ?? null,
      winner: verdict?.winnerAgentId ?? null,
      summary: verdict?.summary ?? '',
      rationale: verdict?.rationale ?? '',
      scores: { ...(verdict?.perAgentScores ?? {}) },
    },
    performance: {
      totalArguments: argumentTexts.length,
      uniqueArguments: new Set(argumentTexts).size,
      contributions: countContributions(snapshot),
      rejectedAttempts: snapshot.rejectedAttempts.length,
      rejectionsByCheck,
      turnFailures: snapshot.turnFailures.length,
      skippedTurns: snapshot.turnFailures.filter((failure) => failure.resolution === 'skipped').length,
    },
    transcript: snapshot.turns.map((turn) => ({ ...turn })),
  };
}
