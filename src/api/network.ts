/**
 * Network administration
 * POST /network/rebuild reloads topology and swaps the snapshot
 * GET /network/status reports the snapshot in effect and the active overlay
 */

import { Router, Request, Response } from 'express';
import type { SnapshotStore } from '../engine/snapshot-store.js';
import type { NetworkService } from '../services/network-service.js';
import { summarizeSnapshot } from '../services/network-service.js';
import type { ServiceStatusStore } from '../services/service-status-store.js';
import type { Logger } from '../utils/logger.js';
import { sendError } from './errors.js';
import { getCorrelationId } from './middleware.js';

export interface NetworkRouterDeps {
  networkService: NetworkService;
  store: SnapshotStore;
  serviceStatus: ServiceStatusStore;
  logger: Logger;
}

export function createNetworkRouter(deps: NetworkRouterDeps): Router {
  const { networkService, store, serviceStatus, logger } = deps;
  const router = Router();

  router.post('/rebuild', async (req: Request, res: Response): Promise<void> => {
    try {
      const result = await networkService.reload('admin', getCorrelationId(res));
      res.status(200).json(result);
    } catch (error) {
      sendError(res, error, logger);
    }
  });

  router.get('/status', (req: Request, res: Response): void => {
    const snapshot = store.peek();

    res.status(200).json({
      snapshot: snapshot ? summarizeSnapshot(snapshot) : null,
      overlay: serviceStatus.summary(),
    });
  });

  return router;
}
