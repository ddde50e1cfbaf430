/**
 * GET /passenger-types - passenger categories and group brackets of the snapshot in effect
 */

import { Router, Request, Response } from 'express';
import type { SnapshotSource } from '../engine/snapshot-store.js';
import { PASSENGER_CATEGORIES } from '../types/fare.js';
import type { Logger } from '../utils/logger.js';
import { sendError } from './errors.js';

export interface PassengerTypesRouterDeps {
  store: SnapshotSource;
  logger: Logger;
}

export function createPassengerTypesRouter(deps: PassengerTypesRouterDeps): Router {
  const { store, logger } = deps;
  const router = Router();

  router.get('/', (req: Request, res: Response): void => {
    try {
      const { fares } = store.acquire();
      const passengerTypes = PASSENGER_CATEGORIES.flatMap((category) => {
        const passengerType = fares.passengerTypes.get(category);
        return passengerType ? [passengerType] : [];
      });

      res.status(200).json({
        currency: fares.currency,
        passengerTypes,
        groupDiscounts: fares.groupDiscounts,
      });
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  return router;
}
