/**
 * Transcript Services
 */

export type { TranscriptSink } from './transcript-sink.js';
export { CollectingSink } from './collecting-sink.js';
export { LoggingSink } from './logging-sink.js';
