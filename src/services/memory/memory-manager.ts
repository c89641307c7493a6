/**
 * Memory Manager
 *
 * Runs once per completed round for every participant and keeps each
 * agent's memory within its window and character budget.
 *
 * Retention: the most recent `windowSize` entries, plus up to
 * `maxRelevantEntries` older entries whose topic relevance reaches
 * `relevanceFloor`. Entries keep their original order. If the retained
 * content still exceeds `maxContentChars`, the oldest retained entries are
 * dropped. The most recent entry is never removed, and pruning an already
 * pruned memory returns it unchanged.
 */

import pino from 'pino';
import type { AgentMemory, MemoryEntry, MemoryPolicy } from '../../types/memory.js';
import { topicRelevance } from '../../utils/text.js';
import type { MemoryStore } from './memory-store.js';

const logger = pino({
  name: 'memory-manager',
  level: process.env.LOG_LEVEL || 'info',
});

export const DEFAULT_MEMORY_POLICY: MemoryPolicy = {
  windowSize: 4,
  relevanceFloor: 0.5,
  maxRelevantEntries: 2,
  maxContentChars: 4000,
  contextEntries: 2,
};

/**
 * Entry counts before and after pruning, per agent
 */
export type PruneReport = Record<string, { before: number; after: number }>;

export class MemoryManager {
  private readonly policy: MemoryPolicy;

  constructor(
    private readonly topic: string,
    policy: Partial<MemoryPolicy> = {}
  ) {
    const merged = { ...DEFAULT_MEMORY_POLICY, ...policy };
    // The window always holds the most recent entry
    this.policy = {
      ...merged,
      windowSize: Math.max(1, Math.floor(merged.windowSize)),
      maxRelevantEntries: Math.max(0, Math.floor(merged.maxRelevantEntries)),
    };
  }

  prune(memory: AgentMemory): AgentMemory {
    const { windowSize, relevanceFloor, maxRelevantEntries, maxContentChars } = this.policy;

    let retained: MemoryEntry[];
    if (memory.length <= windowSize) {
      retained = [...memory];
    } else {
      const olderCount = memory.length - windowSize;
      const keptOlder = new Set(
        memory
          .slice(0, olderCount)
          .map((entry, index) => ({ index, relevance: this.relevance(entry) }))
          .filter((scored) => scored.relevance >= relevanceFloor)
          .sort((a, b) => b.relevance - a.relevance || b.index - a.index)
          .slice(0, maxRelevantEntries)
          .map((scored) => scored.index)
      );
      retained = memory.filter((_, index) => index >= olderCount || keptOlder.has(index));
    }

    let totalChars = retained.reduce((sum, entry) => sum + entry.content.length, 0);
    while (totalChars > maxContentChars && retained.length > 1) {
      const dropped = retained.shift();
      totalChars -= dropped ? dropped.content.length : 0;
    }

    return retained;
  }

  /**
   * Prune every participant's memory in the store
   */
  pruneAll(store: MemoryStore): PruneReport {
    const report: PruneReport = {};

    for (const agentId of store.getParticipants()) {
      const before = store.getMemory(agentId);
      const after = this.prune(before);
      store.replace(agentId, after);
      report[agentId] = { before: before.length, after: after.length };
    }

    logger.debug({ report }, 'Agent memories pruned');
    return report;
  }

  /**
   * Topic relevance of one entry (0-1)
   */
  relevance(entry: MemoryEntry): number {
    return topicRelevance(entry.content, this.topic);
  }

  getPolicy(): Readonly<MemoryPolicy> {
    return this.policy;
  }
}
