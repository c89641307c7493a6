/**
 * Debate Services
 */

export { DebateStateMachine } from './state-machine.js';
export type { DebateSetup, DebateStateMachineEvents } from './state-machine.js';
export { TurnManager } from './turn-manager.js';
export type { AdvanceResult, TurnProgress, TurnSlot } from './turn-manager.js';
export { RoundController } from './round-controller.js';
export type { RoundControllerDependencies, StepResult } from './round-controller.js';
export { DebateOrchestrator, runDebate } from './debate-orchestrator.js';
export type { DebateOrchestratorOptions, DebateRunResult } from './debate-orchestrator.js';
