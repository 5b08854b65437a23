import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { createLogger } from '../utils/logger.js';

const log = createLogger('HTTP');

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Request context middleware - adds tracking info to every request
 *
 * Headers read:
 * - X-Request-Id: Client-provided request ID (falls back to generated UUID)
 *
 * Headers set:
 * - X-Request-Id: Echo back the request ID
 */
export function requestContext() {
  return (req: Request, res: Response, next: NextFunction) => {
    const provided = req.headers['x-request-id'];
    req.requestId = typeof provided === 'string' && provided.length > 0
      ? provided
      : generateRequestId();

    res.setHeader('X-Request-Id', req.requestId);

    const startTime = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startTime) / 1_000_000;
      log.info(
        {
          requestId: req.requestId,
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Number(durationMs.toFixed(2)),
        },
        'request completed'
      );
    });

    next();
  };
}

/**
 * Get the request ID assigned by requestContext()
 */
export function getRequestId(req: Request): string {
  return req.requestId ?? 'unknown';
}

/**
 * Generate a new request ID
 */
export function generateRequestId(): string {
  return `req_${randomUUID().replace(/-/g, '')}`;
}
