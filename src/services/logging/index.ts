/**
 * Logging service exports
 */

export {
  logger,
  createDebateLogger,
  createLogger,
  logStartup,
  logShutdown,
} from './logger.js';
export type { Logger } from './logger.js';

export {
  loggers,
  startTimer,
  loggedOperation,
} from './log-helpers.js';
