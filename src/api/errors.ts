/**
 * Maps engine errors and validation failures to HTTP responses
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { z } from 'zod';
import {
  IntegrityError,
  InvalidPassengerTypeError,
  InvalidRequestError,
  NoPathError,
  RouteEngineError,
  SearchBudgetExceededError,
  SnapshotUnavailableError,
  StationNotFoundError,
} from '../engine/errors.js';
import type { Logger } from '../utils/logger.js';
import { getCorrelationId } from './middleware.js';

export function statusFor(error: RouteEngineError): number {
  if (error instanceof InvalidRequestError) return 400;
  if (error instanceof StationNotFoundError || error instanceof NoPathError) return 404;
  if (error instanceof InvalidPassengerTypeError || error instanceof IntegrityError) return 422;
  if (error instanceof SnapshotUnavailableError || error instanceof SearchBudgetExceededError) return 503;
  // FareRuleMissingError is a data gap, not a caller mistake
  return 500;
}

/**
 * Write the response for a failed request
 * Engine errors are already logged by the component that raised them.
 */
export function sendError(res: Response, error: unknown, logger: Logger): void {
  const correlation_id = getCorrelationId(res);

  if (error instanceof z.ZodError) {
    res.status(400).json({
      error: 'Validation error',
      details: error.errors.map((err) => ({
        field: err.path.join('.'),
        message: err.message,
      })),
      correlation_id,
    });
    return;
  }

  if (error instanceof RouteEngineError) {
    res.status(statusFor(error)).json({
      error: error.code,
      message: error.message,
      retryable: error.retryable,
      details: error.details,
      correlation_id,
    });
    return;
  }

  logger.error('Unhandled error', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    correlation_id,
  });
  res.status(500).json({
    error: 'Internal server error',
    correlation_id,
  });
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', correlation_id: getCorrelationId(res) });
      return;
    }
    sendError(res, err, logger);
  };
}
