/**
 * Request Logging Middleware
 *
 * pino-http request/response logging with a request id per request.
 * Health checks log at debug.
 */

import pinoHttp from 'pino-http';
import { randomUUID } from 'crypto';
import type { LevelWithSilent } from 'pino';
import type { IncomingMessage, ServerResponse } from 'http';
import { logger } from '../../shared/logging/logger';

/**
 * Reuse a request id set by a proxy
 */
function genReqId(req: IncomingMessage): string {
  const existingId = req.headers['x-request-id'] || req.headers['x-correlation-id'];
  if (typeof existingId === 'string') {
    return existingId;
  }
  return randomUUID();
}

function customLogLevel(req: IncomingMessage, res: ServerResponse, err?: Error): LevelWithSilent {
  if (err || res.statusCode >= 500) {
    return 'error';
  }
  if (res.statusCode >= 400) {
    return 'warn';
  }
  if (req.url === '/api/health') {
    return 'debug';
  }
  return 'info';
}

function customSuccessMessage(req: IncomingMessage, res: ServerResponse, responseTime: number): string {
  return `${req.method} ${req.url} ${res.statusCode} ${responseTime.toFixed(0)}ms`;
}

function customErrorMessage(req: IncomingMessage, res: ServerResponse, err: Error): string {
  return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
}

export const requestLogger = pinoHttp({
  logger: logger.child({ component: 'http' }),
  genReqId,
  customLogLevel,
  customSuccessMessage,
  customErrorMessage,
  serializers: {
    req(req: IncomingMessage & { id?: string }) {
      return {
        id: req.id,
        method: req.method,
        url: req.url,
        contentLength: req.headers['content-length']
      };
    },
    res(res: ServerResponse) {
      return { statusCode: res.statusCode };
    }
  }
});
