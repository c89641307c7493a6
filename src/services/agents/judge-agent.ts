/**
 * Judge Agent
 *
 * Reads the full transcript and produces the verdict. Malformed output
 * (unparseable JSON, a missing or non-numeric score) is retried a bounded
 * number of times before JudgeFailure is raised.
 *
 * Tie-break when totals are equal: higher mean of the per-round scores
 * (when supplied), then the earlier participant in rotation order. The
 * scores always decide; a named winner that disagrees with them is logged
 * and overridden.
 */

import pino from 'pino';
import { z } from 'zod';
import { getPersona, isPersonaId } from '../../config/personas.js';
import type { Verdict } from '../../types/debate.js';
import type { TextGenerator } from '../../types/llm.js';
import { DebateCancelledError, GenerationError, JudgeFailure } from '../../types/errors.js';
import { backoffDelay, sleep, throwIfCancelled } from '../../utils/async.js';
import { loggers } from '../logging/index.js';
import { completeWithTimeout } from './generation.js';
import { JUDGE_SYSTEM_PROMPT, buildJudgePrompt } from './prompts/judge-prompts.js';
import { DEFAULT_GENERATION_SETTINGS, type DebateJudge, type GenerationSettings, type JudgeRequest } from './types.js';

const logger = pino({
  name: 'judge-agent',
  level: process.env.LOG_LEVEL || 'info',
});

const judgmentSchema = z.object({
  winner: z.string().min(1),
  summary: z.string().default(''),
  rationale: z.string().min(1),
  scores: z.record(z.number().finite()),
  roundScores: z.record(z.array(z.number().finite())).optional(),
});

/**
 * Judge output with ids resolved against the participant list
 */
export interface ParsedJudgment {
  /** Participant the judge named, or null for a tie or an unrecognised name */
  winner: string | null;
  summary: string;
  rationale: string;
  scores: Record<string, number>;
  roundScores?: Record<string, number[]>;
}

const MIN_PARTIAL_NAME_LENGTH = 4;

function participantAliases(id: string): string[] {
  if (!isPersonaId(id)) return [id.toLowerCase()];
  const persona = getPersona(id);
  return [id, persona.name, persona.persona].map((alias) => alias.toLowerCase());
}

/**
 * Map a name the judge wrote to a participant id. Exact matches on the id,
 * display name or role title win; otherwise a substring match in either
 * direction is accepted when it points at exactly one participant.
 */
export function resolveParticipant(name: string, participants: readonly string[]): string | undefined {
  const wanted = name.trim().toLowerCase();
  if (wanted.length === 0) return undefined;

  const exact = participants.find((id) => participantAliases(id).includes(wanted));
  if (exact) return exact;

  const partial = participants.filter((id) =>
    participantAliases(id).some(
      (alias) => wanted.includes(alias) || (wanted.length >= MIN_PARTIAL_NAME_LENGTH && alias.includes(wanted))
    )
  );
  return partial.length === 1 ? partial[0] : undefined;
}

/**
 * Extract and validate the judge's JSON
 * @throws GenerationError (kind 'malformed') when the output is unusable
 */
export function parseJudgment(raw: string, participants: readonly string[]): ParsedJudgment {
  const jsonMatch = raw.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new GenerationError('Judge response contains no JSON object', 'malformed');
  }

  let data: unknown;
  try {
    data = JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new GenerationError(
      `Judge response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      'malformed'
    );
  }

  const parsed = judgmentSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new GenerationError(`Judge response has the wrong shape: ${issues.join('; ')}`, 'malformed');
  }

  const scores: Record<string, number> = {};
  for (const [name, score] of Object.entries(parsed.data.scores)) {
    const id = resolveParticipant(name, participants);
    if (id) scores[id] = score;
  }

  const missing = participants.filter((id) => !(id in scores));
  if (missing.length > 0) {
    throw new GenerationError(`Judge omitted scores for: ${missing.join(', ')}`, 'malformed');
  }

  const winner = resolveParticipant(parsed.data.winner, participants) ?? null;
  if (!winner) {
    logger.warn({ named: parsed.data.winner }, 'Judge named no participant as winner; scores decide');
  }

  let roundScores: Record<string, number[]> | undefined;
  if (parsed.data.roundScores) {
    roundScores = {};
    for (const [name, values] of Object.entries(parsed.data.roundScores)) {
      const id = resolveParticipant(name, participants);
      if (id) roundScores[id] = values;
    }
  }

  return {
    winner,
    summary: parsed.data.summary,
    rationale: parsed.data.rationale,
    scores,
    roundScores,
  };
}

function mean(values: readonly number[] | undefined): number {
  if (!values || values.length === 0) return Number.NEGATIVE_INFINITY;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Deterministic winner: highest score, then highest mean round score, then
 * earliest participant
 */
export function selectWinner(
  participants: readonly string[],
  scores: Readonly<Record<string, number>>,
  roundScores?: Readonly<Record<string, readonly number[]>>
): string {
  const ranked = participants
    .map((id, index) => ({
      id,
      index,
      total: scores[id] ?? Number.NEGATIVE_INFINITY,
      roundMean: mean(roundScores?.[id]),
    }))
    .sort((a, b) => b.total - a.total || compareMeans(a.roundMean, b.roundMean) || a.index - b.index);

  const first = ranked[0];
  if (!first) {
    throw new GenerationError('Cannot select a winner without participants', 'malformed');
  }
  return first.id;
}

function compareMeans(a: number, b: number): number {
  if (a === b) return 0;
  return b > a ? 1 : -1;
}

export class JudgeAgent implements DebateJudge {
  private readonly settings: GenerationSettings;
  private lastAttemptCount = 0;

  constructor(
    private readonly generator: TextGenerator,
    settings: Partial<GenerationSettings> = {}
  ) {
    this.settings = { ...DEFAULT_GENERATION_SETTINGS, temperature: 0.3, ...settings };
  }

  async decide(request: JudgeRequest): Promise<Verdict> {
    const { topic, participants, turns, signal } = request;
    const { retries, baseDelayMs, maxDelayMs, timeoutMs, temperature, maxTokens } = this.settings;
    const prompt = buildJudgePrompt(topic, participants, turns);

    let lastError: unknown;
    this.lastAttemptCount = 0;

    for (let attempt = 0; attempt <= retries; attempt++) {
      throwIfCancelled(signal);
      this.lastAttemptCount = attempt + 1;
      const startTime = Date.now();

      try {
        const raw = await completeWithTimeout(this.generator, prompt, {
          system: JUDGE_SYSTEM_PROMPT,
          temperature,
          maxTokens,
          timeoutMs,
          signal,
        });
        const judgment = parseJudgment(raw, participants);
        loggers.agentCall({ agent: 'judge', latency_ms: Date.now() - startTime, success: true });
        return this.toVerdict(judgment, participants);
      } catch (error) {
        if (error instanceof DebateCancelledError) {
          throw error;
        }

        lastError = error;
        const generationError = GenerationError.fromError(error);
        loggers.agentCall({
          agent: 'judge',
          latency_ms: Date.now() - startTime,
          success: false,
          error: generationError.message,
        });

        if (!generationError.retryable) {
          break;
        }

        if (attempt < retries) {
          await sleep(backoffDelay(attempt, baseDelayMs, maxDelayMs), signal);
        }
      }
    }

    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new JudgeFailure(
      `Judge failed after ${this.lastAttemptCount} attempt(s): ${message}`,
      this.lastAttemptCount,
      lastError
    );
  }

  getLastAttemptCount(): number {
    return this.lastAttemptCount;
  }

  private toVerdict(judgment: ParsedJudgment, participants: readonly string[]): Verdict {
    const winner = selectWinner(participants, judgment.scores, judgment.roundScores);

    if (judgment.winner !== null && winner !== judgment.winner) {
      logger.warn(
        { named: judgment.winner, selected: winner, scores: judgment.scores },
        'Named winner disagrees with scores; scores decide'
      );
    }

    const perAgentScores: Record<string, number> = {};
    for (const id of participants) {
      perAgentScores[id] = judgment.scores[id] ?? 0;
    }

    return {
      outcome: 'DECIDED',
      winnerAgentId: winner,
      rationale: judgment.rationale,
      summary: judgment.summary,
      perAgentScores,
      decidedAt: new Date().toISOString(),
    };
  }
}
