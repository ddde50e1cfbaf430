/**
 * In-process application wired to a fake database and topology provider
 */

import { vi, Mock } from 'vitest';
import type { Express } from 'express';
import { Registry } from 'prom-client';
import { createApp } from '../../src/app.js';
import { createRoutePlanner } from '../../src/engine/route-planner.js';
import { SnapshotStore } from '../../src/engine/snapshot-store.js';
import { createNetworkService, NetworkService } from '../../src/services/network-service.js';
import { ServiceStatusStore } from '../../src/services/service-status-store.js';
import type { TopologyData } from '../../src/types/topology.js';
import { createEngineMetrics } from '../../src/utils/metrics.js';
import { interchangeTopology } from './networks.js';

export interface TestContext {
  app: Express;
  store: SnapshotStore;
  serviceStatus: ServiceStatusStore;
  networkService: NetworkService;
  registry: Registry;
  db: { query: Mock<(text: string) => Promise<{ rows: unknown[] }>> };
  provider: { load: Mock<() => Promise<TopologyData>> };
  logger: { info: Mock; error: Mock; warn: Mock; debug: Mock };
}

export function createTestContext(): TestContext {
  const logger = { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() };
  const db = {
    query: vi.fn<(text: string) => Promise<{ rows: unknown[] }>>().mockResolvedValue({ rows: [{ health: 1 }] }),
  };
  const provider = {
    load: vi.fn<() => Promise<TopologyData>>().mockImplementation(async () => interchangeTopology()),
  };

  const registry = new Registry();
  const metrics = createEngineMetrics(registry);
  const store = new SnapshotStore();
  const serviceStatus = new ServiceStatusStore();
  const networkService = createNetworkService({ store, provider, logger, metrics });
  const planner = createRoutePlanner({ store, logger, metrics });

  const app = createApp({
    serviceName: 'route-fare-engine',
    db,
    store,
    planner,
    networkService,
    serviceStatus,
    logger,
    registry,
  });

  return { app, store, serviceStatus, networkService, registry, db, provider, logger };
}
