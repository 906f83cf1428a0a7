/**
 * Logger Configuration
 *
 * Configures the pino logger with environment-aware formatting:
 * - Production: JSON output
 * - Development: pretty-printed colorized output
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   const log = createComponentLogger('job-parser');
 *   log.info({ url }, 'Fetching job posting');
 */

import pino, { Logger, LoggerOptions } from 'pino';

// =============================================================================
// Configuration
// =============================================================================

const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_DEVELOPMENT = NODE_ENV === 'development';
const IS_TEST = NODE_ENV === 'test';

function defaultLevel(): string {
  if (IS_TEST) return 'silent';
  return IS_DEVELOPMENT ? 'debug' : 'info';
}

const LOG_LEVEL = process.env.LOG_LEVEL || defaultLevel();

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {
    pid: process.pid,
    env: NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers.cookie',
      'apiKey',
      'token',
      'secret',
      '*.apiKey',
      '*.token',
      '*.secret',
      '*.*.apiKey',
      '*.*.token',
    ],
    censor: '[redacted]',
  },
};

/**
 * Development options with pretty printing
 */
const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '[{component}] {msg}',
      singleLine: false,
    },
  },
};

/**
 * Production options, JSON lines
 */
const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: NODE_ENV,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

export const logger: Logger = pino(
  IS_DEVELOPMENT ? developmentOptions : productionOptions
);

/**
 * Create a child logger for a pipeline component
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Create a child logger bound to one workflow run
 */
export function createRunLogger(runId: string): Logger {
  return logger.child({ component: 'pipeline', runId });
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging.
 * Own enumerable properties of custom error classes are carried along.
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = value;
      }
    }
    return {
      type: err.constructor.name,
      message: err.message,
      stack: IS_DEVELOPMENT ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

/**
 * Log a fatal startup error
 */
export function logFatal(err: unknown, message: string): void {
  logger.fatal({ err: serializeError(err) }, message);
}

export default logger;
