/**
 * Agent Memory Types
 */

/**
 * One accepted turn as remembered by the memory store
 */
export interface MemoryEntry {
  roundNumber: number;
  agentId: string;
  content: string;
}

/**
 * Ordered memory of a single agent (oldest first)
 */
export type AgentMemory = readonly MemoryEntry[];

/**
 * Context handed to an agent when it builds its next prompt
 */
export interface AgentContext {
  ownMemory: AgentMemory;
  opponentsMemory: AgentMemory;
}

/**
 * Pruning policy applied between rounds
 */
export interface MemoryPolicy {
  /** Most recent entries always kept (K) */
  windowSize: number;
  /** Topic relevance (0-1) at or above which an older entry is kept */
  relevanceFloor: number;
  /** Cap on older entries kept for relevance */
  maxRelevantEntries: number;
  /** Character budget across retained content */
  maxContentChars: number;
  /** Entries shown per opponent when building context */
  contextEntries: number;
}
