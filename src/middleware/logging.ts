/**
 * Structured Logging Middleware
 *
 * Provides request-scoped logging with:
 * - Unique request IDs (UUID v4)
 * - Request/response logging with latency
 * - Redaction of Namecheap credentials and bearer tokens
 */

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import pino from 'pino';

/**
 * Extended Request with logging context
 */
export interface LoggedRequest extends Request {
  id: string;
  startTime: number;
  log: pino.Logger;
}

/**
 * Paths never written to the log, wherever they appear in a log object
 */
export const REDACTED_PATHS = [
  'apiKey',
  '*.apiKey',
  'ApiKey',
  '*.ApiKey',
  'apiUser',
  '*.apiUser',
  'ApiUser',
  '*.ApiUser',
  'clientIp',
  '*.clientIp',
  'ClientIp',
  '*.ClientIp',
  'req.headers.authorization',
  'headers.authorization',
];

/**
 * Create Pino logger instance
 *
 * Built at import from LOG_LEVEL and NODE_ENV so modules can log before
 * configuration is loaded; setLogLevel() applies the configured level.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  transport: process.env.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
});

export function isLogLevel(level: string): boolean {
  return level === 'silent' || Object.prototype.hasOwnProperty.call(pino.levels.values, level);
}

/**
 * Apply the configured level to the root logger.
 * Child loggers copy the level when created, so call this before building components.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unknown log level: ${level}`);
  }
  logger.level = level;
}

function isLoggedRequest(req: Request): req is LoggedRequest {
  return 'log' in req && 'id' in req;
}

/**
 * Logging middleware
 *
 * Attaches unique request ID and logger to each request.
 * Logs request start and completion with latency.
 */
export function loggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const id = randomUUID();
  const startTime = Date.now();

  // Create request-scoped logger
  const log = logger.child({
    reqId: id,
    method: req.method,
    path: req.path,
    ip: req.ip,
  });

  Object.assign(req, { id, startTime, log });

  // Log request start
  log.info({
    event: 'request_start',
    method: req.method,
    url: req.url,
    userAgent: req.get('user-agent'),
  });

  res.on('finish', () => {
    const logContext = {
      event: 'request_finish',
      method: req.method,
      path: req.path,
      status: res.statusCode,
      latency: Date.now() - startTime,
    };

    // Log with appropriate level based on status code
    if (res.statusCode >= 500) {
      log.error(logContext);
    } else if (res.statusCode >= 400) {
      log.warn(logContext);
    } else {
      log.info(logContext);
    }
  });

  next();
}

/**
 * Get logger from request
 */
export function getLogger(req: Request): pino.Logger {
  return isLoggedRequest(req) ? req.log : logger;
}
