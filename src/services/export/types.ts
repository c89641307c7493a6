/**
 * Export service type definitions
 *
 * Shapes for the run report and the Markdown export written by the front-end
 * after a debate reaches COMPLETE.
 */

import type { Turn, VerdictOutcome } from '../../types/debate.js';
import type { ValidationCheck } from '../../types/validation.js';

/**
 * Format for exported debates
 */
export type ExportFormat = 'json' | 'markdown';

/**
 * Full report of one run
 */
export interface RunReport {
  metadata: {
    debateId: string;
    topic: string;
    maxRounds: number;
    completedRounds: number;
    participants: string[];
    outcome: VerdictOutcome | null;
    winner: string | null;
    startTime: string | null;
    endTime: string | null;
    /** Rounded to two decimals; 0 when either timestamp is missing */
    durationMinutes: number;
    schemaVersion: string;
  };
  judgment: {
    outcome: VerdictOutcome | null;
    winner: string | null;
    summary: string;
    rationale: string;
    scores: Record<string, number>;
  };
  performance: {
    totalArguments: number;
    uniqueArguments: number;
    /** Accepted turns per participant, every participant listed */
    contributions: Record<string, number>;
    rejectedAttempts: number;
    rejectionsByCheck: Record<ValidationCheck, number>;
    turnFailures: number;
    skippedTurns: number;
  };
  transcript: Turn[];
}

/**
 * Options for Markdown export
 */
export interface MarkdownExportOptions {
  /** Include metadata header (ids, participants, timing) */
  includeMetadata?: boolean;

  /** Include outcome, winner, summary and rationale */
  includeVerdict?: boolean;

  /** Include the per-participant score table */
  includeScores?: boolean;

  /** Include the accepted turns, grouped by round */
  includeTranscript?: boolean;

  /** Include rejected candidates and failed turns */
  includeDiagnostics?: boolean;
}

/**
 * Metadata for exported files
 */
export interface ExportMetadata {
  /** ID of the original debate */
  debateId: string;

  /** Format of the export */
  format: ExportFormat;

  /** When the export was generated */
  generatedAt: string;

  /** Version of the exporter */
  exporterVersion: string;

  /** Schema version of the debate data */
  schemaVersion: string;

  /** File size in bytes (for completed exports) */
  fileSizeBytes?: number;

  /** File name */
  fileName?: string;
}

/**
 * Result of an export operation
 */
export interface ExportResult {
  /** Whether the export was successful */
  success: boolean;

  /** Exported content */
  content?: string;

  /** Export metadata */
  metadata: ExportMetadata;

  /** Error message if export failed */
  error?: string;
}

/**
 * Default Markdown export options
 */
export const DEFAULT_MARKDOWN_OPTIONS: Required<MarkdownExportOptions> = {
  includeMetadata: true,
  includeVerdict: true,
  includeScores: true,
  includeTranscript: true,
  includeDiagnostics: false,
};
