/**
 * POST /fares/quote - price an explicit station sequence
 *
 * Request body:
 * { "stationIds": ["A", "B", "C"], "passengerTypes": ["adult"], "groupSize": 4 }
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { RoutePlanner } from '../engine/route-planner.js';
import type { Logger } from '../utils/logger.js';
import { sendError } from './errors.js';
import { getCorrelationId } from './middleware.js';

const quoteBodySchema = z.object({
  stationIds: z.array(z.string().min(1)).min(2, 'at least two stations are required'),
  passengerTypes: z.array(z.string().min(1)).min(1).default(['adult']),
  groupSize: z.number().int().min(1).optional(),
});

export interface FaresRouterDeps {
  planner: RoutePlanner;
  logger: Logger;
}

export function createFaresRouter(deps: FaresRouterDeps): Router {
  const { planner, logger } = deps;
  const router = Router();

  router.post('/quote', (req: Request, res: Response): void => {
    try {
      const body = quoteBodySchema.parse(req.body);

      const quote = planner.quote(
        {
          stationIds: body.stationIds,
          passengerTypes: body.passengerTypes,
          group: body.groupSize !== undefined ? { size: body.groupSize } : undefined,
        },
        getCorrelationId(res)
      );

      res.status(200).json(quote);
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  return router;
}
