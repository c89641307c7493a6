/**
 * Report Writer
 *
 * Persists a completed debate as a JSON run report and a Markdown export.
 * Snapshots that fail the transcript schema are never written.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import pino from 'pino';
import type { DebateSnapshot } from '../../types/debate.js';
import { schemaValidator, type SchemaValidationError } from '../validation/schema-validator.js';
import { loggedOperation } from '../logging/index.js';
import { createMarkdownExporter } from './markdown-exporter.js';
import { buildRunReport } from './run-report.js';

const logger = pino({
  name: 'report-writer',
  level: process.env.LOG_LEVEL || 'info',
});

export class ReportValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: SchemaValidationError[]
  ) {
    super(message);
    this.name = 'ReportValidationError';
  }
}

export interface WrittenReport {
  jsonPath: string;
  markdownPath: string;
}

/**
 * Compact timestamp for file names: 20250101_120000
 */
export function fileTimestamp(date: Date = new Date()): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, '')
    .replace(/-|:/g, '')
    .replace('T', '_');
}

/**
 * Throw when the snapshot does not match the transcript schema
 */
export function assertWritable(snapshot: DebateSnapshot): void {
  const result = schemaValidator.validateSnapshot(snapshot);
  if (!result.valid) {
    const errors = result.errors ?? [];
    throw new ReportValidationError(
      `Refusing to write invalid transcript for ${snapshot.debateId}: ` +
        errors.map((error) => `${error.path} ${error.message}`).join('; '),
      errors
    );
  }
}

/**
 * Write `debate_report_<stamp>.json` and `.md` into outputDir
 */
export async function writeReport(snapshot: DebateSnapshot, outputDir: string): Promise<WrittenReport> {
  assertWritable(snapshot);

  return loggedOperation(
    'write_report',
    async () => {
      await mkdir(outputDir, { recursive: true });
      const stamp = fileTimestamp();
      const jsonPath = join(outputDir, `debate_report_${stamp}.json`);
      const markdownPath = join(outputDir, `debate_report_${stamp}.md`);

      const report = buildRunReport(snapshot);
      await writeFile(jsonPath, JSON.stringify(report, null, 2), 'utf-8');

      const markdown = createMarkdownExporter().export(snapshot, { includeDiagnostics: true });
      if (!markdown.success || markdown.content === undefined) {
        throw new Error(`Markdown export failed: ${markdown.error ?? 'no content'}`);
      }
      await writeFile(markdownPath, markdown.content, 'utf-8');

      logger.info({ debateId: snapshot.debateId, jsonPath, markdownPath }, 'Debate report written');
      return { jsonPath, markdownPath };
    },
    { debateId: snapshot.debateId }
  );
}
