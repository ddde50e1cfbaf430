/**
 * Express application wiring, shared by the entry point and the HTTP tests
 */

import express, { Express } from 'express';
import type { Registry } from 'prom-client';
import type { RoutePlanner } from './engine/route-planner.js';
import type { SnapshotStore } from './engine/snapshot-store.js';
import type { NetworkService } from './services/network-service.js';
import type { ServiceStatusStore } from './services/service-status-store.js';
import type { Queryable } from './services/topology-repository.js';
import type { Logger } from './utils/logger.js';
import { createMetricsRouter } from './utils/metrics.js';
import { errorHandler } from './api/errors.js';
import { createFaresRouter } from './api/fares.js';
import { createHealthRouter } from './api/health.js';
import { correlationId, requestLogger } from './api/middleware.js';
import { createNetworkRouter } from './api/network.js';
import { createPassengerTypesRouter } from './api/passenger-types.js';
import { createRoutesRouter } from './api/routes.js';

export interface AppDeps {
  serviceName: string;
  db: Queryable;
  store: SnapshotStore;
  planner: RoutePlanner;
  networkService: NetworkService;
  serviceStatus: ServiceStatusStore;
  logger: Logger;
  registry?: Registry;
}

export function createApp(deps: AppDeps): Express {
  const { serviceName, db, store, planner, networkService, serviceStatus, logger, registry } = deps;
  const app = express();

  app.use(correlationId());
  app.use(requestLogger(logger));
  app.use(express.json());

  app.use('/routes', createRoutesRouter({ planner, serviceStatus, logger }));
  app.use('/fares', createFaresRouter({ planner, logger }));
  app.use('/passenger-types', createPassengerTypesRouter({ store, logger }));
  app.use('/network', createNetworkRouter({ networkService, store, serviceStatus, logger }));
  app.use('/health', createHealthRouter({ db, store, serviceName }));
  if (registry) {
    app.use('/metrics', createMetricsRouter(registry));
  }

  app.use(errorHandler(logger));

  return app;
}
