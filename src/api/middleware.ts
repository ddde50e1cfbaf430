/**
 * Request middleware: correlation ids and access logging
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { randomUUID } from 'crypto';
import type { Logger } from '../utils/logger.js';

export const CORRELATION_HEADER = 'X-Correlation-ID';

/**
 * Correlation id for the current request, set by correlationId()
 */
export function getCorrelationId(res: Response): string {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : 'unknown';
}

export function correlationId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.header(CORRELATION_HEADER);
    const id = header && header.trim() !== '' ? header : randomUUID();
    res.locals.correlationId = id;
    res.setHeader(CORRELATION_HEADER, id);
    next();
  };
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info('HTTP request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Date.now() - start,
        correlation_id: getCorrelationId(res),
      });
    });
    next();
  };
}
