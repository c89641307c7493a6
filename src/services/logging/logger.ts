/**
 * Logging service using Pino
 * Structured logs with debate and agent context
 */

import pino from 'pino';

/**
 * Development transport configuration with pretty printing
 */
const developmentTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{levelLabel} - {msg}',
  },
};

/**
 * JSON logger configuration for log aggregation (production, tests, CI)
 */
const jsonConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      hostname: bindings.hostname,
      node_version: process.version,
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    env: process.env.NODE_ENV,
  },
};

/**
 * Development logger configuration (human-readable format)
 */
const developmentConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'debug',
  transport: developmentTransport,
};

/**
 * Main logger instance
 */
export const logger = pino(
  process.env.NODE_ENV === 'development' ? developmentConfig : jsonConfig
);

export type Logger = pino.Logger;

/**
 * Child logger carrying the debate id
 */
export function createDebateLogger(debateId: string): Logger {
  return logger.child({ debateId, context: 'debate' });
}

/**
 * Create a child logger with custom context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Log front-end startup information
 */
export function logStartup(command: string): void {
  logger.info(
    {
      command,
      nodeEnv: process.env.NODE_ENV,
      nodeVersion: process.version,
      logLevel: logger.level,
    },
    'Debate arena starting'
  );
}

/**
 * Log shutdown on a signal
 */
export function logShutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down gracefully');
}
