/**
 * GET /routes - plan and price ranked itineraries
 *
 * Query parameters:
 * - from, to: station ids (required)
 * - preference: fastest | cheapest | fewest-transfers (default fastest)
 * - passengers: comma-separated passenger types (default adult)
 * - alternatives: 3-5 itineraries requested (default from config)
 * - groupSize: party size for group pricing
 * - avoidLines: comma-separated line ids excluded from this search
 * - preferLines: comma-separated line ids; itineraries riding one rank first
 * - maxTransfers, maxWalkingMinutes: limits on the path, unbounded when omitted
 * - departureTime: ISO 8601 timestamp; adds departure/arrival times to segments
 *
 * The current service-status overlay is applied to every search.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { RoutePlanner } from '../engine/route-planner.js';
import type { ServiceStatusStore } from '../services/service-status-store.js';
import { ROUTE_PREFERENCES } from '../types/itinerary.js';
import type { Logger } from '../utils/logger.js';
import { sendError } from './errors.js';
import { getCorrelationId } from './middleware.js';

export const ALTERNATIVES_MIN = 3;
export const ALTERNATIVES_MAX = 5;

const csv = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const planQuerySchema = z.object({
  from: z.string().trim().min(1, 'from is required'),
  to: z.string().trim().min(1, 'to is required'),
  preference: z.enum(ROUTE_PREFERENCES).default('fastest'),
  passengers: csv.default('adult'),
  alternatives: z.coerce.number().int().min(ALTERNATIVES_MIN).max(ALTERNATIVES_MAX).optional(),
  groupSize: z.coerce.number().int().min(1).optional(),
  avoidLines: csv.optional(),
  preferLines: csv.optional(),
  maxTransfers: z.coerce.number().int().min(0).optional(),
  maxWalkingMinutes: z.coerce.number().min(0).optional(),
  departureTime: z.string().datetime({ offset: true }).optional(),
});

export interface RoutesRouterDeps {
  planner: RoutePlanner;
  serviceStatus: ServiceStatusStore;
  logger: Logger;
}

export function createRoutesRouter(deps: RoutesRouterDeps): Router {
  const { planner, serviceStatus, logger } = deps;
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    const correlationId = getCorrelationId(res);

    try {
      const query = planQuerySchema.parse(req.query);

      const itineraries = planner.plan(
        {
          origin: query.from,
          destination: query.to,
          preference: query.preference,
          passengerTypes: query.passengers,
          alternatives: query.alternatives,
          group: query.groupSize !== undefined ? { size: query.groupSize } : undefined,
          overlay: serviceStatus.current(),
          avoidLineIds: query.avoidLines,
          preferLineIds: query.preferLines,
          maxTransfers: query.maxTransfers,
          maxWalkingMinutes: query.maxWalkingMinutes,
          departureTime: query.departureTime ? new Date(query.departureTime) : undefined,
        },
        correlationId
      );

      res.status(200).json({
        origin: query.from,
        destination: query.to,
        preference: query.preference,
        itineraries,
      });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  return router;
}
