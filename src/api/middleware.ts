// ============================================================
// HTTP Middleware
// ============================================================

import { randomUUID, timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { errorMessage } from '../errors.js';
import { friendlyError } from '../execution/tradeService.js';
import { createModuleLogger } from '../monitoring/logger.js';

const log = createModuleLogger('HTTP');

export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = randomUUID();
  const start = Date.now();

  res.setHeader('x-request-id', requestId);

  res.on('finish', () => {
    const duration = Date.now() - start;
    log.info(`${requestId} | ${req.method} ${req.path} | status=${res.statusCode} | ${duration}ms`);
  });

  next();
};

/** Token from an "Authorization: Bearer <token>" header, or ''. */
export function bearerToken(header: string | undefined): string {
  if (!header || !header.startsWith('Bearer ')) return '';
  return header.substring(7).trim();
}

export function tokensMatch(given: string, expected: string): boolean {
  if (!expected || given.length !== expected.length) return false;
  return timingSafeEqual(Buffer.from(given), Buffer.from(expected));
}

/** Rejects requests without the configured bearer token. An empty token locks the API. */
export function authGuard(apiToken: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = bearerToken(req.headers.authorization);
    if (!tokensMatch(token, apiToken)) {
      log.warn(`UNAUTHORIZED ip=${req.ip ?? 'unknown'} path=${req.path}`);
      res.status(401).json({ success: false, error: 'Bearer token required' });
      return;
    }
    next();
  };
}

/** Last-resort handler: anything a route threw becomes a 500 with a readable message. */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const message = errorMessage(err);
  log.error(`${req.method} ${req.path} failed: ${message}`);
  if (res.headersSent) return;

  // express.json() parse failures carry a 4xx status
  if (err instanceof SyntaxError) {
    res.status(400).json({ success: false, error: 'Malformed JSON body', reason: 'InvalidRequest' });
    return;
  }
  res.status(500).json({ success: false, error: friendlyError(message) });
}
