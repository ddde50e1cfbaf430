/**
 * Health check endpoint
 * Healthy only when a snapshot is loaded and the database answers
 */

import { Router, Request, Response } from 'express';
import type { SnapshotStore } from '../engine/snapshot-store.js';
import type { Queryable } from '../services/topology-repository.js';

export interface HealthRouterDeps {
  db: Queryable;
  store: SnapshotStore;
  serviceName: string;
}

type DependencyStatus = 'healthy' | 'unhealthy' | 'unknown';

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const { db, store, serviceName } = deps;
  const router = Router();

  /**
   * GET /health
   * Returns health status of service and dependencies
   */
  router.get('/', async (req: Request, res: Response): Promise<void> => {
    const snapshot = store.peek();
    const dependencies: { database: DependencyStatus; network_snapshot: DependencyStatus } = {
      database: 'unknown',
      network_snapshot: snapshot ? 'healthy' : 'unhealthy',
    };

    try {
      await db.query('SELECT 1 as health');
      dependencies.database = 'healthy';
    } catch {
      dependencies.database = 'unhealthy';
    }

    const healthy = dependencies.database === 'healthy' && dependencies.network_snapshot === 'healthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      service: serviceName,
      timestamp: new Date().toISOString(),
      snapshot_version: snapshot?.version ?? null,
      dependencies,
    });
  });

  return router;
}
