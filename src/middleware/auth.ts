/**
 * Authentication Middleware
 *
 * Guards the function endpoints with a single shared API key when one is configured.
 *
 * Header format: Authorization: Bearer <api-key>
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'crypto';
import { UnauthorizedError } from '../lib/errors';
import { getLogger } from './logging';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Compare two keys without leaking their length or content through timing
 */
export function keysMatch(provided: string, expected: string): boolean {
  return timingSafeEqual(digest(provided), digest(expected));
}

/**
 * Authentication middleware factory
 *
 * Without an expected key every request passes; with one, the Bearer token must match.
 */
export function requireApiKey(expectedKey?: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!expectedKey) {
      next();
      return;
    }

    // Extract Authorization header
    const authHeader = req.header('Authorization');
    if (!authHeader) {
      next(new UnauthorizedError('Missing Authorization header', {
        expected: 'Authorization: Bearer <api-key>',
      }));
      return;
    }

    // Parse Bearer token
    const match = authHeader.match(/^Bearer\s+(.+)$/i);
    if (!match) {
      next(new UnauthorizedError('Invalid Authorization header format', {
        expected: 'Authorization: Bearer <api-key>',
      }));
      return;
    }

    if (!keysMatch(match[1].trim(), expectedKey)) {
      getLogger(req).warn({ event: 'auth_failed' });
      next(new UnauthorizedError('Invalid API key'));
      return;
    }

    next();
  };
}
