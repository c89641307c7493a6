/**
 * Export Services
 *
 * Run reports (JSON) and Markdown exports of completed debates, plus the
 * writer that persists both.
 */

export * from './types.js';
export * from './run-report.js';
export * from './markdown-exporter.js';
export * from './report-writer.js';
