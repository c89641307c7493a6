/**
 * Round Controller Tests
 *
 * End-to-end runs over the state machine with scripted agents: rotation,
 * retry-with-feedback, skip and abort policies, generation failures,
 * cancellation, judge failures and sink notification.
 */

import { describe, it, expect, vi } from 'vitest';
import { resolveConfiguration } from '../src/config/debate-config.js';
import { MockJudge, ScriptedAgent } from '../src/services/agents/mock-agents.js';
import type { DebateJudge } from '../src/services/agents/types.js';
import { RoundController } from '../src/services/debate/round-controller.js';
import { DebateStateMachine } from '../src/services/debate/state-machine.js';
import { MemoryManager } from '../src/services/memory/memory-manager.js';
import { MemoryStore } from '../src/services/memory/memory-store.js';
import { CollectingSink } from '../src/services/transcript/collecting-sink.js';
import type { TranscriptSink } from '../src/services/transcript/transcript-sink.js';
import { DebatePhase, type Verdict } from '../src/types/debate.js';
import { GenerationError, JudgeFailure } from '../src/types/errors.js';
import { ArgumentValidator } from '../src/services/validation/argument-validator.js';
import {
  ARGUMENTS,
  LENGTH_FEEDBACK,
  SHORT,
  TOPIC,
  buildController,
  distinctAgents,
} from './helpers/debate-fixtures.js';

const arg = (index: number): string => ARGUMENTS[index] ?? '';

describe('RoundController', () => {
  describe('normal run', () => {
    it('should play 2 rounds of 2 participants and reach a decided verdict', async () => {
      const { controller, state } = buildController(distinctAgents(['scientist', 'philosopher']));
      const rounds: number[] = [];
      state.on('round_complete', (round: number) => rounds.push(round));

      const snapshot = await controller.run();

      expect(snapshot.turns.map((t) => [t.agentId, t.roundNumber])).toEqual([
        ['scientist', 0],
        ['philosopher', 0],
        ['scientist', 1],
        ['philosopher', 1],
      ]);
      expect(rounds).toEqual([1, 2]);
      expect(snapshot.roundNumber).toBe(2);
      expect(snapshot.phase).toBe(DebatePhase.COMPLETE);
      expect(snapshot.verdict).toMatchObject({
        outcome: 'DECIDED',
        winnerAgentId: 'scientist',
        perAgentScores: { scientist: 7, philosopher: 6 },
      });
      expect(snapshot.rejectedAttempts).toEqual([]);
      expect(snapshot.turnFailures).toEqual([]);
    });

    it('should give every participant exactly maxRounds turns', async () => {
      const ids = ['scientist', 'philosopher', 'economist', 'lawyer'];
      const { controller } = buildController(distinctAgents(ids));

      const snapshot = await controller.run();

      for (const id of ids) {
        const turns = snapshot.turns.filter((t) => t.agentId === id);
        expect(turns.map((t) => t.roundNumber)).toEqual([0, 1]);
      }
      expect(snapshot.turns).toHaveLength(8);
    });

    it('should pass own and opponent memory to each agent', async () => {
      const [scientist, philosopher] = distinctAgents(['scientist', 'philosopher']);
      if (!scientist || !philosopher) throw new Error('fixture');
      const { controller } = buildController([scientist, philosopher]);

      await controller.run();

      const secondRound = scientist.requests[1];
      expect(secondRound?.roundNumber).toBe(1);
      expect(secondRound?.topic).toBe(TOPIC);
      expect(secondRound?.maxRounds).toBe(2);
      expect(secondRound?.ownMemory.map((e) => e.content)).toEqual([arg(0)]);
      expect(secondRound?.opponentsMemory.map((e) => e.content)).toEqual([arg(1)]);
      expect(secondRound?.rejectionFeedback).toBeUndefined();
    });

    it('should report diagnostics', async () => {
      const { controller } = buildController(distinctAgents(['scientist', 'philosopher']));
      await controller.run();

      expect(controller.getDiagnostics()).toMatchObject({
        acceptedTurns: 4,
        rejectedAttempts: 0,
        turnFailures: 0,
        skippedTurns: 0,
        judgeAttempts: 1,
      });
      expect(controller.getTurnManager().isComplete()).toBe(true);
    });
  });

  describe('validation retries', () => {
    it('should retry with the rejection feedback and accept the next candidate', async () => {
      const scientist = new ScriptedAgent('scientist', [SHORT, arg(0), arg(2)]);
      const philosopher = new ScriptedAgent('philosopher', [arg(1), arg(3)]);
      const { controller } = buildController([scientist, philosopher]);

      const snapshot = await controller.run();

      expect(scientist.requests).toHaveLength(3);
      expect(scientist.requests[0]?.rejectionFeedback).toBeUndefined();
      expect(scientist.requests[1]?.rejectionFeedback).toBe(LENGTH_FEEDBACK);
      expect(snapshot.turns[0]?.argumentText).toBe(arg(0));
      expect(snapshot.rejectedAttempts).toHaveLength(1);
      expect(snapshot.rejectedAttempts[0]).toMatchObject({
        agentId: 'scientist',
        roundNumber: 0,
        attempt: 1,
        text: SHORT,
        reason: 'too short',
        check: 'length',
      });
    });

    it('should reject a repeat of an opponent argument as not novel', async () => {
      const scientist = new ScriptedAgent('scientist', [arg(0), arg(2)]);
      const philosopher = new ScriptedAgent('philosopher', [arg(0), arg(1), arg(3)]);
      const { controller } = buildController([scientist, philosopher]);

      const snapshot = await controller.run();

      expect(snapshot.rejectedAttempts[0]).toMatchObject({ agentId: 'philosopher', reason: 'not novel' });
      expect(snapshot.turns.map((t) => t.argumentText)).toEqual([arg(0), arg(1), arg(2), arg(3)]);
    });
  });

  describe('exhausted retries', () => {
    const failingPhilosopher = () => new ScriptedAgent('philosopher', [], () => SHORT);

    it('should skip the turn under the skip policy and continue', async () => {
      const scientist = new ScriptedAgent('scientist', [arg(0), arg(2)]);
      const philosopher = failingPhilosopher();
      const { controller } = buildController([scientist, philosopher], { config: { turnFailurePolicy: 'skip' } });

      const snapshot = await controller.run();

      // two retries: three attempts per turn
      expect(philosopher.requests).toHaveLength(6);
      expect(snapshot.turns.map((t) => t.agentId)).toEqual(['scientist', 'scientist']);
      expect(snapshot.turnFailures).toHaveLength(2);
      expect(snapshot.turnFailures[0]).toMatchObject({
        agentId: 'philosopher',
        roundNumber: 0,
        cause: 'validation',
        attempts: 3,
        resolution: 'skipped',
      });
      expect(snapshot.roundNumber).toBe(2);
      expect(snapshot.verdict).toMatchObject({
        outcome: 'DECIDED',
        winnerAgentId: 'scientist',
        perAgentScores: { scientist: 7, philosopher: 0 },
      });
      expect(controller.getDiagnostics()).toMatchObject({
        rejectedAttempts: 6,
        rejectionsByCheck: { length: 6, placeholder: 0, substance: 0, novelty: 0, relevance: 0 },
        turnFailures: 2,
        skippedTurns: 2,
      });
    });

    it('should abort the debate under the abort policy with a verdict set', async () => {
      const scientist = new ScriptedAgent('scientist', [arg(0), arg(2)]);
      const { controller } = buildController([scientist, failingPhilosopher()], {
        config: { turnFailurePolicy: 'abort' },
      });

      const snapshot = await controller.run();

      expect(snapshot.phase).toBe(DebatePhase.COMPLETE);
      expect(snapshot.turns).toHaveLength(1);
      expect(snapshot.roundNumber).toBe(0);
      expect(snapshot.turnFailures[0]).toMatchObject({ agentId: 'philosopher', resolution: 'aborted' });
      expect(snapshot.verdict).toMatchObject({ outcome: 'ABORTED', winnerAgentId: null, perAgentScores: {} });
      expect(snapshot.verdict?.rationale).toBe(
        'Debate aborted: philosopher was rejected 3 time(s) in round 0; last reason: too short'
      );
    });

    it('should honour a custom retry limit', async () => {
      const scientist = new ScriptedAgent('scientist', [arg(0), arg(2)]);
      const philosopher = failingPhilosopher();
      const { controller } = buildController([scientist, philosopher], {
        config: { retries: { validationRetries: 0 } },
      });

      await controller.run();

      expect(philosopher.requests).toHaveLength(2);
    });
  });

  describe('generation failures', () => {
    it('should turn a generation error into a skipped turn', async () => {
      const scientist = new ScriptedAgent('scientist', [
        new GenerationError('Generation timed out after 30000ms', 'timeout'),
        arg(2),
      ]);
      const philosopher = new ScriptedAgent('philosopher', [arg(1), arg(3)]);
      const { controller } = buildController([scientist, philosopher]);

      const snapshot = await controller.run();

      expect(scientist.requests).toHaveLength(2);
      expect(snapshot.turnFailures[0]).toMatchObject({
        agentId: 'scientist',
        roundNumber: 0,
        cause: 'generation',
        attempts: 1,
        resolution: 'skipped',
        message: 'Generation failed for scientist in round 0: Generation timed out after 30000ms',
      });
      expect(snapshot.turns.map((t) => t.agentId)).toEqual(['philosopher', 'scientist', 'philosopher']);
      expect(snapshot.verdict?.outcome).toBe('DECIDED');
    });

    it('should abort on a generation error under the abort policy', async () => {
      const scientist = new ScriptedAgent('scientist', [new Error('socket hang up')]);
      const philosopher = new ScriptedAgent('philosopher', [arg(1)]);
      const { controller } = buildController([scientist, philosopher], { config: { turnFailurePolicy: 'abort' } });

      const snapshot = await controller.run();

      expect(snapshot.turns).toEqual([]);
      expect(snapshot.verdict?.outcome).toBe('ABORTED');
      expect(philosopher.requests).toHaveLength(0);
    });
  });

  describe('cancellation', () => {
    it('should stop at the next turn boundary with an ABORTED verdict', async () => {
      const abort = new AbortController();
      const sink: TranscriptSink = {
        onTurnAccepted: () => abort.abort(),
      };
      const agents = distinctAgents(['scientist', 'philosopher']);
      const { controller } = buildController(agents, { sinks: [sink] });

      const snapshot = await controller.run(abort.signal);

      expect(snapshot.turns).toHaveLength(1);
      expect(agents[1]?.requests).toHaveLength(0);
      expect(snapshot.phase).toBe(DebatePhase.COMPLETE);
      expect(snapshot.verdict).toMatchObject({
        outcome: 'ABORTED',
        winnerAgentId: null,
        rationale: 'Debate cancelled before completion',
      });
    });

    it('should commit a candidate that returns before the boundary check', async () => {
      const abort = new AbortController();
      const scientist = new ScriptedAgent('scientist', [], () => {
        abort.abort();
        return arg(0);
      });
      const philosopher = new ScriptedAgent('philosopher', [arg(1)]);
      const { controller } = buildController([scientist, philosopher]);

      const snapshot = await controller.run(abort.signal);

      expect(snapshot.turns.map((t) => t.agentId)).toEqual(['scientist']);
      expect(snapshot.verdict?.outcome).toBe('ABORTED');
    });
  });

  describe('judging', () => {
    it('should record INCONCLUSIVE when the judge fails', async () => {
      const judge = new MockJudge(new JudgeFailure('Judge failed after 3 attempt(s): no JSON', 3));
      const { controller } = buildController(distinctAgents(['scientist', 'philosopher']), { judge });

      const snapshot = await controller.run();

      expect(snapshot.phase).toBe(DebatePhase.COMPLETE);
      expect(snapshot.turns).toHaveLength(4);
      expect(snapshot.verdict).toMatchObject({
        outcome: 'INCONCLUSIVE',
        winnerAgentId: null,
        perAgentScores: {},
        rationale: 'No valid judgment could be obtained: Judge failed after 3 attempt(s): no JSON',
      });
    });

    it('should record INCONCLUSIVE when the verdict omits a score', async () => {
      const verdict: Verdict = {
        outcome: 'DECIDED',
        winnerAgentId: 'scientist',
        rationale: 'r',
        summary: 's',
        perAgentScores: { scientist: 8 },
        decidedAt: new Date().toISOString(),
      };
      const judge: DebateJudge = {
        decide: vi.fn().mockResolvedValue(verdict),
        getLastAttemptCount: () => 1,
      };
      const { controller } = buildController(distinctAgents(['scientist', 'philosopher']), { judge });

      const snapshot = await controller.run();

      expect(snapshot.verdict?.outcome).toBe('INCONCLUSIVE');
      expect(snapshot.verdict?.rationale).toBe(
        'No valid judgment could be obtained: Judge omitted scores for: philosopher'
      );
    });

    it('should hand the judge the full transcript', async () => {
      const decide = vi.fn<DebateJudge['decide']>().mockResolvedValue({
        outcome: 'DECIDED',
        winnerAgentId: 'philosopher',
        rationale: 'r',
        summary: 's',
        perAgentScores: { scientist: 5, philosopher: 6 },
        decidedAt: new Date().toISOString(),
      });
      const { controller } = buildController(distinctAgents(['scientist', 'philosopher']), {
        judge: { decide, getLastAttemptCount: () => 1 },
      });

      const snapshot = await controller.run();

      expect(decide).toHaveBeenCalledTimes(1);
      const request = decide.mock.calls[0]?.[0];
      expect(request?.topic).toBe(TOPIC);
      expect(request?.participants).toEqual(['scientist', 'philosopher']);
      expect(request?.turns).toHaveLength(4);
      expect(snapshot.verdict?.winnerAgentId).toBe('philosopher');
    });
  });

  describe('sinks', () => {
    it('should receive turns, rounds, transitions and the final snapshot', async () => {
      const sink = new CollectingSink();
      const { controller } = buildController(distinctAgents(['scientist', 'philosopher']), { sinks: [sink] });

      const snapshot = await controller.run();

      expect(sink.acceptedTurns).toHaveLength(4);
      expect(sink.completedRounds).toEqual([1, 2]);
      expect(sink.transitions.map((t) => `${t.fromPhase}->${t.toPhase}`)).toEqual([
        'INIT->DEBATING',
        'DEBATING->JUDGING',
        'JUDGING->COMPLETE',
      ]);
      expect(sink.finalSnapshot).toBe(snapshot);
    });

    it('should keep running when a sink throws', async () => {
      const failing: TranscriptSink = {
        onTurnAccepted: () => {
          throw new Error('disk full');
        },
      };
      const collecting = new CollectingSink();
      const { controller } = buildController(distinctAgents(['scientist', 'philosopher']), {
        sinks: [failing, collecting],
      });

      const snapshot = await controller.run();

      expect(snapshot.verdict?.outcome).toBe('DECIDED');
      expect(collecting.acceptedTurns).toHaveLength(4);
    });
  });

  describe('configuration', () => {
    it('should raise ConfigurationError when a participant has no agent', async () => {
      const [scientist] = distinctAgents(['scientist']);
      if (!scientist) throw new Error('fixture');
      const config = resolveConfiguration(
        { topic: TOPIC, participants: ['scientist', 'philosopher'] },
        { knownParticipants: ['scientist', 'philosopher'] }
      );
      const state = new DebateStateMachine('test-debate', {
        topic: TOPIC,
        participants: config.participants,
        maxRounds: config.maxRounds,
      });
      const controller = new RoundController({
        state,
        agents: new Map([['scientist', scientist]]),
        judge: new MockJudge(),
        validator: new ArgumentValidator(TOPIC),
        memoryStore: new MemoryStore(config.participants),
        memoryManager: new MemoryManager(TOPIC),
        config,
      });

      await expect(controller.run()).rejects.toThrow('No agent registered for: philosopher');
      expect(state.getPhase()).toBe(DebatePhase.INIT);
      expect(scientist.requests).toHaveLength(0);
    });

    it('should return idle from step once the debate is over', async () => {
      const { controller } = buildController(distinctAgents(['scientist', 'philosopher']));
      await controller.run();

      await expect(controller.step()).resolves.toEqual({ kind: 'idle' });
    });
  });
});
