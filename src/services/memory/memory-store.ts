/**
 * Memory Store
 *
 * Per-agent bounded history of accepted turns. An agent's memory is written
 * only by its own turn-completion step and rewritten only by the memory
 * manager between rounds.
 */

import type { AgentContext, AgentMemory, MemoryEntry } from '../../types/memory.js';
import { InvariantViolationError } from '../../types/errors.js';

export interface MemoryStoreOptions {
  /** Entries shown per opponent when building context */
  contextEntries: number;
}

export class MemoryStore {
  private readonly memories = new Map<string, MemoryEntry[]>();
  private readonly participants: readonly string[];
  private readonly contextEntries: number;

  constructor(participants: readonly string[], options: MemoryStoreOptions = { contextEntries: 2 }) {
    this.participants = [...participants];
    this.contextEntries = options.contextEntries;
    for (const agentId of participants) {
      this.memories.set(agentId, []);
    }
  }

  /**
   * Record an accepted turn in its author's memory
   */
  append(entry: MemoryEntry): void {
    const memory = this.requireMemory(entry.agentId);
    memory.push(Object.freeze({ ...entry }));
  }

  /**
   * Copy of an agent's retained memory, oldest first
   */
  getMemory(agentId: string): AgentMemory {
    return [...this.requireMemory(agentId)];
  }

  /**
   * Swap in a pruned memory for an agent
   */
  replace(agentId: string, memory: AgentMemory): void {
    this.requireMemory(agentId);
    if (memory.some((entry) => entry.agentId !== agentId)) {
      throw new InvariantViolationError(`Memory for ${agentId} may only hold that agent's entries`);
    }
    this.memories.set(agentId, [...memory]);
  }

  /**
   * Context for an agent's next prompt: its own retained memory plus the
   * latest entries of each opponent, ordered by round then rotation order
   */
  buildContext(agentId: string): AgentContext {
    const ownMemory = this.getMemory(agentId);

    const opponentsMemory = this.participants
      .filter((id) => id !== agentId)
      .flatMap((id) => this.requireMemory(id).slice(-this.contextEntries))
      .sort(
        (a, b) =>
          a.roundNumber - b.roundNumber ||
          this.participants.indexOf(a.agentId) - this.participants.indexOf(b.agentId)
      );

    return { ownMemory, opponentsMemory };
  }

  getParticipants(): readonly string[] {
    return this.participants;
  }

  /**
   * Entries held across all agents
   */
  size(): number {
    let total = 0;
    for (const memory of this.memories.values()) total += memory.length;
    return total;
  }

  private requireMemory(agentId: string): MemoryEntry[] {
    const memory = this.memories.get(agentId);
    if (!memory) {
      throw new InvariantViolationError(`Agent ${agentId} is not a participant`);
    }
    return memory;
  }
}
