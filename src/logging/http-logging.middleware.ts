import type { NextFunction, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { AuthenticatedRequest } from '../interfaces/authenticated-request';
import type { JsonLogger } from './json-logger.service';

function safePath(req: AuthenticatedRequest): string {
  // Query strings are dropped.
  return req.originalUrl?.split('?')[0] ?? req.url ?? '';
}

export function createHttpLoggingMiddleware(logger: JsonLogger) {
  return function httpLoggingMiddleware(req: AuthenticatedRequest, res: Response, next: NextFunction) {
    const start = process.hrtime.bigint();

    const incomingId = req.header('x-request-id')?.trim();
    const requestId = incomingId ? incomingId : uuidv4();
    req.requestId = requestId;
    res.setHeader('x-request-id', requestId);

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      const meta: Record<string, unknown> = {
        requestId,
        method: req.method,
        path: safePath(req),
        statusCode: res.statusCode,
        durationMs: Math.round(durationMs * 10) / 10,
      };
      if (req.user?.sub) meta.userId = req.user.sub;

      if (res.statusCode >= 500) {
        logger.error('HTTP request failed', meta);
      } else if (res.statusCode >= 400) {
        logger.warn('HTTP request client error', meta);
      } else {
        logger.log('HTTP request', meta);
      }
    });

    next();
  };
}
