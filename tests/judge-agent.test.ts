/**
 * Judge Agent Tests
 */

import { describe, it, expect } from 'vitest';
import { JudgeAgent, parseJudgment, resolveParticipant, selectWinner } from '../src/services/agents/judge-agent.js';
import { ScriptedTextGenerator } from '../src/services/agents/mock-agents.js';
import { JUDGE_SYSTEM_PROMPT, formatTranscript } from '../src/services/agents/prompts/judge-prompts.js';
import type { Turn } from '../src/types/debate.js';
import { GenerationError, JudgeFailure } from '../src/types/errors.js';

const PARTICIPANTS = ['scientist', 'philosopher'];

const turn = (agentId: string, roundNumber: number, argumentText: string): Turn => ({
  agentId,
  roundNumber,
  argumentText,
  timestamp: new Date().toISOString(),
  accepted: true,
});

const TURNS = [
  turn('scientist', 0, 'Audits catch biased credit models.'),
  turn('philosopher', 0, 'Power without accountability corrodes consent.'),
];

const judgment = (fields: Record<string, unknown>) =>
  JSON.stringify({
    winner: 'scientist',
    summary: 'A close debate.',
    rationale: 'Better evidence.',
    scores: { scientist: 8, philosopher: 6 },
    ...fields,
  });

const FAST = { baseDelayMs: 0, maxDelayMs: 0 };

describe('parseJudgment', () => {
  it('should extract the JSON object from surrounding prose', () => {
    const raw = `Here is my verdict:\n${judgment({})}\nThanks.`;

    expect(parseJudgment(raw, PARTICIPANTS)).toEqual({
      winner: 'scientist',
      summary: 'A close debate.',
      rationale: 'Better evidence.',
      scores: { scientist: 8, philosopher: 6 },
      roundScores: undefined,
    });
  });

  it('should resolve participant names case-insensitively', () => {
    const raw = judgment({ winner: 'Philosopher', scores: { SCIENTIST: 5, philosopher: 7 } });

    const parsed = parseJudgment(raw, PARTICIPANTS);
    expect(parsed.winner).toBe('philosopher');
    expect(parsed.scores).toEqual({ scientist: 5, philosopher: 7 });
  });

  it('should default a missing summary to an empty string', () => {
    const raw = JSON.stringify({ winner: 'scientist', rationale: 'r', scores: { scientist: 1, philosopher: 0 } });
    expect(parseJudgment(raw, PARTICIPANTS).summary).toBe('');
  });

  it('should reject output without JSON', () => {
    expect(() => parseJudgment('The scientist wins.', PARTICIPANTS)).toThrow(
      'Judge response contains no JSON object'
    );
  });

  it('should resolve display names and role titles', () => {
    const raw = judgment({ winner: 'The Scientist', scores: { 'Dr. Sarah Chen': 8, 'Prof. Marcus Webb': 6 } });

    const parsed = parseJudgment(raw, PARTICIPANTS);
    expect(parsed.winner).toBe('scientist');
    expect(parsed.scores).toEqual({ scientist: 8, philosopher: 6 });
  });

  it('should leave a tie or an unknown winner unresolved when every score is present', () => {
    expect(parseJudgment(judgment({ winner: 'Tie' }), PARTICIPANTS).winner).toBeNull();
    expect(parseJudgment(judgment({ winner: 'lawyer' }), PARTICIPANTS).winner).toBeNull();
  });

  it('should reject missing scores', () => {
    expect(() => parseJudgment(judgment({ scores: { scientist: 8 } }), PARTICIPANTS)).toThrow(
      'Judge omitted scores for: philosopher'
    );
  });

  it('should reject non-numeric scores', () => {
    const raw = judgment({ scores: { scientist: 'high', philosopher: 6 } });
    expect(() => parseJudgment(raw, PARTICIPANTS)).toThrow(/^Judge response has the wrong shape: scores\.scientist: /);
  });

  it('should raise malformed generation errors', () => {
    try {
      parseJudgment('{ not json }', PARTICIPANTS);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GenerationError);
      expect(error).toMatchObject({ kind: 'malformed' });
    }
  });
});

describe('resolveParticipant', () => {
  it('should match ids exactly, ignoring case', () => {
    expect(resolveParticipant(' Philosopher ', PARTICIPANTS)).toBe('philosopher');
  });

  it('should match a name that contains a participant id', () => {
    expect(resolveParticipant('Winner: philosopher', PARTICIPANTS)).toBe('philosopher');
  });

  it('should match a fragment of a display name', () => {
    expect(resolveParticipant('Webb', PARTICIPANTS)).toBe('philosopher');
  });

  it('should not guess between several participants', () => {
    expect(resolveParticipant('scientist and philosopher', PARTICIPANTS)).toBeUndefined();
  });

  it('should resolve plain ids outside the persona catalogue', () => {
    expect(resolveParticipant('Team Alpha', ['alpha', 'beta'])).toBe('alpha');
    expect(resolveParticipant('gamma', ['alpha', 'beta'])).toBeUndefined();
  });
});

describe('selectWinner', () => {
  it('should pick the highest score', () => {
    expect(selectWinner(PARTICIPANTS, { scientist: 6, philosopher: 8 })).toBe('philosopher');
  });

  it('should break a tie on the mean round score', () => {
    const scores = { scientist: 7, philosopher: 7 };
    const roundScores = { scientist: [6, 7], philosopher: [7, 8] };

    expect(selectWinner(PARTICIPANTS, scores, roundScores)).toBe('philosopher');
  });

  it('should fall back to rotation order when still tied', () => {
    const scores = { scientist: 7, philosopher: 7 };

    expect(selectWinner(PARTICIPANTS, scores)).toBe('scientist');
    expect(selectWinner(PARTICIPANTS, scores, { scientist: [7], philosopher: [7] })).toBe('scientist');
    expect(selectWinner(['philosopher', 'scientist'], scores)).toBe('philosopher');
  });

  it('should refuse an empty participant list', () => {
    expect(() => selectWinner([], {})).toThrow('Cannot select a winner without participants');
  });
});

describe('formatTranscript', () => {
  it('should group turns by 1-based round', () => {
    expect(formatTranscript(TURNS)).toBe(
      'ROUND 1\n[scientist]: Audits catch biased credit models.\n\n[philosopher]: Power without accountability corrodes consent.'
    );
  });

  it('should mark an empty transcript', () => {
    expect(formatTranscript([])).toBe('(no accepted arguments)');
  });
});

describe('JudgeAgent', () => {
  const request = { topic: 'Should AI be regulated?', participants: PARTICIPANTS, turns: TURNS };

  it('should return a DECIDED verdict scoring every participant', async () => {
    const generator = new ScriptedTextGenerator([judgment({})]);
    const judge = new JudgeAgent(generator, FAST);

    const verdict = await judge.decide(request);

    expect(verdict).toMatchObject({
      outcome: 'DECIDED',
      winnerAgentId: 'scientist',
      rationale: 'Better evidence.',
      summary: 'A close debate.',
      perAgentScores: { scientist: 8, philosopher: 6 },
    });
    expect(judge.getLastAttemptCount()).toBe(1);
    expect(generator.calls[0]?.options).toMatchObject({ system: JUDGE_SYSTEM_PROMPT, temperature: 0.3 });
    expect(generator.calls[0]?.prompt).toContain('PARTICIPANTS: scientist, philosopher');
  });

  it('should let the scores override a disagreeing named winner', async () => {
    const generator = new ScriptedTextGenerator([judgment({ winner: 'philosopher' })]);

    const verdict = await new JudgeAgent(generator, FAST).decide(request);

    expect(verdict.winnerAgentId).toBe('scientist');
  });

  it('should decide from the scores when the named winner is not an id', async () => {
    const generator = new ScriptedTextGenerator([], judgment({ winner: 'The Scientist' }));
    const judge = new JudgeAgent(generator, FAST);

    const verdict = await judge.decide(request);

    expect(verdict).toMatchObject({ outcome: 'DECIDED', winnerAgentId: 'scientist' });
    expect(generator.calls).toHaveLength(1);
  });

  it('should decide from the scores when the judge calls a tie', async () => {
    const generator = new ScriptedTextGenerator([], judgment({ winner: 'Tie', scores: { scientist: 7, philosopher: 7 } }));

    const verdict = await new JudgeAgent(generator, FAST).decide(request);

    expect(verdict.winnerAgentId).toBe('scientist');
    expect(verdict.perAgentScores).toEqual({ scientist: 7, philosopher: 7 });
  });

  it('should retry malformed output', async () => {
    const generator = new ScriptedTextGenerator(['I think the scientist won.', judgment({})]);
    const judge = new JudgeAgent(generator, FAST);

    const verdict = await judge.decide(request);

    expect(verdict.winnerAgentId).toBe('scientist');
    expect(generator.calls).toHaveLength(2);
    expect(judge.getLastAttemptCount()).toBe(2);
  });

  it('should raise JudgeFailure once retries are exhausted', async () => {
    const generator = new ScriptedTextGenerator([], 'no verdict');
    const judge = new JudgeAgent(generator, { ...FAST, retries: 2 });

    const failure = await judge.decide(request).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(JudgeFailure);
    expect(failure).toMatchObject({
      message: 'Judge failed after 3 attempt(s): Judge response contains no JSON object',
      attempts: 3,
    });
    expect(generator.calls).toHaveLength(3);
  });

  it('should not retry a refusal', async () => {
    const generator = new ScriptedTextGenerator([new GenerationError('Content policy violation', 'refused', 400)]);
    const judge = new JudgeAgent(generator, FAST);

    await expect(judge.decide(request)).rejects.toThrow('Judge failed after 1 attempt(s): Content policy violation');
    expect(generator.calls).toHaveLength(1);
  });
});
