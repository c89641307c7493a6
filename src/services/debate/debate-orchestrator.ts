/**
 * Debate Orchestrator
 *
 * Wires configuration, agents, judge, validator and memory into one round
 * controller and runs it. Everything here happens once per debate; the
 * controller does the turn-by-turn work.
 */

import pino from 'pino';
import { v4 as uuidv4 } from 'uuid';
import {
  resolveConfiguration,
  type DebateConfigurationInput,
  type ResolvedDebateConfiguration,
} from '../../config/debate-config.js';
import { PERSONA_IDS } from '../../config/personas.js';
import type { DebateDiagnostics, DebatePhase, DebateSnapshot, Verdict } from '../../types/debate.js';
import type { TextGenerator } from '../../types/llm.js';
import { ConfigurationError, InvariantViolationError } from '../../types/errors.js';
import { createAgent, createMockAgent } from '../agents/agent-registry.js';
import { JudgeAgent } from '../agents/judge-agent.js';
import { MockJudge } from '../agents/mock-agents.js';
import type { DebateAgent, DebateJudge, GenerationSettings } from '../agents/types.js';
import { loggers, startTimer } from '../logging/index.js';
import { MemoryManager } from '../memory/memory-manager.js';
import { MemoryStore } from '../memory/memory-store.js';
import type { TranscriptSink } from '../transcript/transcript-sink.js';
import { ArgumentValidator } from '../validation/argument-validator.js';
import { RoundController } from './round-controller.js';
import { DebateStateMachine } from './state-machine.js';

const logger = pino({
  name: 'debate-orchestrator',
  level: process.env.LOG_LEVEL || 'info',
});

export interface DebateOrchestratorOptions {
  /** Partial configuration; defaults are merged once here */
  config: DebateConfigurationInput;
  debateId?: string;
  /** Prebuilt participants; their ids become the participant registry */
  agents?: readonly DebateAgent[];
  /** Text generation for registry-built persona agents and the judge */
  generator?: TextGenerator;
  judge?: DebateJudge;
  sinks?: readonly TranscriptSink[];
  /** Offline persona agents and judge */
  mock?: boolean;
}

/**
 * What a caller gets back from a run
 */
export interface DebateRunResult {
  debateId: string;
  phase: DebatePhase;
  verdict: Verdict;
  snapshot: DebateSnapshot;
  diagnostics: DebateDiagnostics;
}

export class DebateOrchestrator {
  readonly debateId: string;
  private readonly config: ResolvedDebateConfiguration;
  private readonly stateMachine: DebateStateMachine;
  private readonly controller: RoundController;

  constructor(options: DebateOrchestratorOptions) {
    this.debateId = options.debateId ?? uuidv4();

    const knownParticipants = options.agents ? options.agents.map((agent) => agent.id) : PERSONA_IDS;
    this.config = resolveConfiguration(options.config, { knownParticipants });

    const agents = this.buildAgents(options);
    const judge = this.buildJudge(options);

    this.stateMachine = new DebateStateMachine(this.debateId, {
      topic: this.config.topic,
      participants: this.config.participants,
      maxRounds: this.config.maxRounds,
    });

    this.controller = new RoundController({
      state: this.stateMachine,
      agents,
      judge,
      validator: new ArgumentValidator(this.config.topic, this.config.validator),
      memoryStore: new MemoryStore(this.config.participants, { contextEntries: this.config.memory.contextEntries }),
      memoryManager: new MemoryManager(this.config.topic, this.config.memory),
      config: this.config,
      sinks: options.sinks,
    });

    logger.info({
      debateId: this.debateId,
      participants: this.config.participants,
      maxRounds: this.config.maxRounds,
      turnFailurePolicy: this.config.turnFailurePolicy,
      mock: options.mock ?? false,
    }, 'Debate orchestrator created');
  }

  /**
   * Run the debate to COMPLETE
   * @throws ConfigurationError when the debate cannot start
   */
  async run(signal?: AbortSignal): Promise<DebateRunResult> {
    const endTimer = startTimer();
    const snapshot = await this.controller.run(signal);
    const duration = endTimer('debate_run', { debateId: this.debateId });

    const verdict = snapshot.verdict;
    if (!verdict) {
      throw new InvariantViolationError(`Debate ${this.debateId} finished in ${snapshot.phase} without a verdict`);
    }

    const diagnostics = this.controller.getDiagnostics();
    loggers.debateLifecycle(this.debateId, 'completed', {
      outcome: verdict.outcome,
      winner: verdict.winnerAgentId,
      turns: snapshot.turns.length,
      rejectedAttempts: diagnostics.rejectedAttempts,
      turnFailures: diagnostics.turnFailures,
      duration_ms: duration,
    });

    return {
      debateId: this.debateId,
      phase: snapshot.phase,
      verdict,
      snapshot,
      diagnostics,
    };
  }

  getConfiguration(): ResolvedDebateConfiguration {
    return this.config;
  }

  getStateMachine(): DebateStateMachine {
    return this.stateMachine;
  }

  getController(): RoundController {
    return this.controller;
  }

  private generationSettings(temperature: number, retries: number): Partial<GenerationSettings> {
    return {
      retries,
      baseDelayMs: this.config.retries.baseDelayMs,
      maxDelayMs: this.config.retries.maxDelayMs,
      timeoutMs: this.config.generation.timeoutMs,
      temperature,
      maxTokens: this.config.generation.maxTokens,
    };
  }

  private buildAgents(options: DebateOrchestratorOptions): Map<string, DebateAgent> {
    const agents = new Map<string, DebateAgent>();

    if (options.agents) {
      for (const agent of options.agents) {
        if (this.config.participants.includes(agent.id)) {
          agents.set(agent.id, agent);
        }
      }
      return agents;
    }

    const { generator } = options;
    if (!options.mock && !generator) {
      throw new ConfigurationError('A text generator is required unless mock mode or explicit agents are used', [
        'generator: missing',
      ]);
    }

    const settings = this.generationSettings(
      this.config.generation.temperature,
      this.config.retries.generationRetries
    );
    for (const id of this.config.participants) {
      agents.set(id, generator && !options.mock ? createAgent(id, generator, settings) : createMockAgent(id));
    }
    return agents;
  }

  private buildJudge(options: DebateOrchestratorOptions): DebateJudge {
    if (options.judge) {
      return options.judge;
    }
    if (options.mock || !options.generator) {
      if (!options.mock) {
        throw new ConfigurationError('A judge or a text generator is required unless mock mode is used', [
          'judge: missing',
        ]);
      }
      return new MockJudge();
    }
    return new JudgeAgent(
      options.generator,
      this.generationSettings(this.config.generation.judgeTemperature, this.config.retries.judgeRetries)
    );
  }
}

/**
 * Build and run one debate
 */
export async function runDebate(
  options: DebateOrchestratorOptions & { signal?: AbortSignal }
): Promise<DebateRunResult> {
  const { signal, ...rest } = options;
  return new DebateOrchestrator(rest).run(signal);
}
