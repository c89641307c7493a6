/**
 * Markdown Export Service
 *
 * Converts a completed debate snapshot into readable Markdown: metadata
 * header, verdict, score table, transcript by round and, optionally, the
 * rejected candidates and failed turns.
 */

import pino from 'pino';
import { PERSONA_CATALOGUE, isPersonaId } from '../../config/personas.js';
import type { DebateSnapshot, RejectedAttempt, Turn, TurnFailureRecord, Verdict } from '../../types/debate.js';
import { SCHEMA_VERSION } from '../../schemas/debate-transcript.schema.js';
import type { ExportMetadata, ExportResult, MarkdownExportOptions } from './types.js';
import { DEFAULT_MARKDOWN_OPTIONS } from './types.js';

/**
 * Logger instance
 */
const logger = pino({
  name: 'markdown-exporter',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Current version of the Markdown exporter
 */
const EXPORTER_VERSION = '1.0.0';

/**
 * Patterns to strip from generated content for cleaner exports
 */
const CONTENT_CLEANUP_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  // Word count notes: "(Word count: 348)", "(word count: 500 words)"
  { pattern: /\s*\(word\s*count:?\s*\d+(?:\s*words?)?\)/gi, replacement: '' },

  // Numbered citations: [1], [2][3], [1, 2, 3]
  { pattern: /\s*\[\d+(?:,?\s*\d+)*\]/g, replacement: '' },
];

export class MarkdownExporter {
  /**
   * Export a debate snapshot to Markdown
   */
  export(snapshot: DebateSnapshot, options: MarkdownExportOptions = {}): ExportResult {
    logger.debug({ debateId: snapshot.debateId, options }, 'Starting Markdown export');

    try {
      const opts = { ...DEFAULT_MARKDOWN_OPTIONS, ...options };
      const sections: string[] = [];

      if (opts.includeMetadata) {
        sections.push(this.formatMetadata(snapshot));
      }

      if (opts.includeVerdict && snapshot.verdict) {
        sections.push(this.formatVerdict(snapshot.verdict));
      }

      if (opts.includeScores && snapshot.verdict && Object.keys(snapshot.verdict.perAgentScores).length > 0) {
        sections.push(this.formatScores(snapshot.participants, snapshot.verdict));
      }

      if (opts.includeTranscript && snapshot.turns.length > 0) {
        sections.push(this.formatTranscript(snapshot.turns));
      }

      if (opts.includeDiagnostics && (snapshot.rejectedAttempts.length > 0 || snapshot.turnFailures.length > 0)) {
        sections.push(this.formatDiagnostics(snapshot.rejectedAttempts, snapshot.turnFailures));
      }

      // Join sections with horizontal rules
      const content = sections.join('\n\n---\n\n');

      const metadata: ExportMetadata = {
        debateId: snapshot.debateId,
        format: 'markdown',
        generatedAt: new Date().toISOString(),
        exporterVersion: EXPORTER_VERSION,
        schemaVersion: SCHEMA_VERSION,
        fileSizeBytes: Buffer.byteLength(content, 'utf8'),
        fileName: this.generateFileName(snapshot),
      };

      logger.debug({ debateId: snapshot.debateId, sizeBytes: metadata.fileSizeBytes }, 'Markdown export completed');

      return { success: true, content, metadata };
    } catch (error) {
      logger.error({ error, debateId: snapshot.debateId }, 'Failed to export Markdown');

      return {
        success: false,
        metadata: {
          debateId: snapshot.debateId,
          format: 'markdown',
          generatedAt: new Date().toISOString(),
          exporterVersion: EXPORTER_VERSION,
          schemaVersion: SCHEMA_VERSION,
        },
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  private formatMetadata(snapshot: DebateSnapshot): string {
    return `# Debate: ${snapshot.topic}

**Debate ID:** ${snapshot.debateId}
**Participants:** ${snapshot.participants.map((id) => this.formatParticipant(id)).join(', ')}
**Rounds:** ${snapshot.roundNumber} of ${snapshot.maxRounds}
**Status:** ${snapshot.phase}
**Started:** ${snapshot.startedAt ?? 'n/a'}
**Completed:** ${snapshot.completedAt ?? 'n/a'}`;
  }

  private formatVerdict(verdict: Verdict): string {
    const winner = verdict.winnerAgentId === null ? 'None' : this.formatParticipant(verdict.winnerAgentId);
    const parts = [`## Verdict\n\n**Outcome:** ${verdict.outcome}\n**Winner:** ${winner}`];

    if (verdict.summary) {
      parts.push(`### Summary\n\n${this.sanitizeContent(verdict.summary)}`);
    }
    if (verdict.rationale) {
      parts.push(`### Rationale\n\n${this.sanitizeContent(verdict.rationale)}`);
    }
    return parts.join('\n\n');
  }

  /**
   * Score table in rotation order
   */
  private formatScores(participants: readonly string[], verdict: Verdict): string {
    const rows = participants.map((id) => {
      const score = verdict.perAgentScores[id];
      return `| ${this.formatParticipant(id)} | ${score === undefined ? '-' : score} |`;
    });
    return ['## Scores', '', '| Participant | Score |', '| --- | --- |', ...rows].join('\n');
  }

  /**
   * Accepted turns grouped under a header per round (rounds shown 1-based)
   */
  private formatTranscript(turns: readonly Turn[]): string {
    const parts: string[] = ['## Transcript'];
    let currentRound = -1;

    for (const turn of turns) {
      if (turn.roundNumber !== currentRound) {
        currentRound = turn.roundNumber;
        parts.push(`### Round ${currentRound + 1}`);
      }
      parts.push(`**${this.formatParticipant(turn.agentId)}:**\n\n${this.sanitizeContent(turn.argumentText)}`);
    }

    return parts.join('\n\n');
  }

  private formatDiagnostics(rejected: readonly RejectedAttempt[], failures: readonly TurnFailureRecord[]): string {
    const parts: string[] = ['## Diagnostics'];

    if (rejected.length > 0) {
      const lines = rejected.map(
        (attempt) =>
          `- Round ${attempt.roundNumber + 1}, ${attempt.agentId}, attempt ${attempt.attempt}: ${attempt.reason}`
      );
      parts.push(`### Rejected Attempts\n\n${lines.join('\n')}`);
    }

    if (failures.length > 0) {
      const lines = failures.map(
        (failure) =>
          `- Round ${failure.roundNumber + 1}, ${failure.agentId}: ${failure.cause} failure, ${failure.resolution}`
      );
      parts.push(`### Failed Turns\n\n${lines.join('\n')}`);
    }

    return parts.join('\n\n');
  }

  /**
   * Display name for catalogue personas, the bare id otherwise
   */
  private formatParticipant(id: string): string {
    return isPersonaId(id) ? `${PERSONA_CATALOGUE[id].name} (${id})` : id;
  }

  /**
   * Descriptive filename for the export
   */
  generateFileName(snapshot: DebateSnapshot): string {
    const date = (snapshot.completedAt ?? new Date().toISOString()).split('T')[0];
    const topic = snapshot.topic
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '')
      .substring(0, 50);

    return `debate-${topic}-${date}.md`;
  }

  /**
   * Remove generation artifacts such as word counts and citation brackets
   */
  private sanitizeContent(content: string): string {
    let sanitized = content;

    for (const { pattern, replacement } of CONTENT_CLEANUP_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }

    sanitized = sanitized.replace(/ {2,}/g, ' ');
    sanitized = sanitized.replace(/[ \t]+$/gm, '');

    return sanitized.trim();
  }
}

/**
 * Create a new MarkdownExporter instance
 */
export function createMarkdownExporter(): MarkdownExporter {
  return new MarkdownExporter();
}
