/**
 * route-fare-engine service entry point
 */

import pg from 'pg';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createEventConsumer, EventConsumer } from './consumers/event-consumer.js';
import { createRoutePlanner } from './engine/route-planner.js';
import { SnapshotStore } from './engine/snapshot-store.js';
import { createNetworkService } from './services/network-service.js';
import { ServiceStatusStore } from './services/service-status-store.js';
import { TopologyRepository } from './services/topology-repository.js';
import { createLogger } from './utils/logger.js';
import { createEngineMetrics, createMetricsRegistry } from './utils/metrics.js';

const config = loadConfig();

const logger = createLogger({ serviceName: config.serviceName, level: config.logLevel });

const pool = new pg.Pool({
  connectionString: config.database.connectionString,
  max: config.database.poolSize,
});
pool.on('error', (error) => {
  logger.error('Idle database client error', { error: error.message });
});

const registry = createMetricsRegistry(config.serviceName);
const metrics = createEngineMetrics(registry);

const store = new SnapshotStore(config.engine.currency);
const serviceStatus = new ServiceStatusStore();
const networkService = createNetworkService({
  store,
  provider: new TopologyRepository(pool, config.database.schema),
  logger,
  metrics,
});
const planner = createRoutePlanner({
  store,
  logger,
  metrics,
  maxFrontierPops: config.engine.maxFrontierPops,
  defaultAlternatives: config.engine.defaultAlternatives,
});

const app = createApp({
  serviceName: config.serviceName,
  db: pool,
  store,
  planner,
  networkService,
  serviceStatus,
  logger,
  registry,
});

let consumer: EventConsumer | null = null;

async function start(): Promise<void> {
  try {
    // Planning returns 503 until a snapshot loads; an admin rebuild or event can recover
    try {
      await networkService.reload('startup');
    } catch (error) {
      logger.error('Initial network load failed, serving without a snapshot', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (config.kafka.brokers.length > 0) {
      consumer = createEventConsumer({
        serviceName: config.serviceName,
        brokers: config.kafka.brokers,
        groupId: config.kafka.groupId,
        username: config.kafka.username,
        password: config.kafka.password,
        ssl: config.kafka.ssl,
        networkService,
        serviceStatus,
        logger,
      });
      await consumer.start();
    } else {
      logger.warn('KAFKA_BROKERS not set, event consumer disabled');
    }

    const server = app.listen(config.port, () => {
      logger.info(`${config.serviceName} listening`, {
        port: config.port,
        environment: config.nodeEnv,
      });
    });

    const shutdown = async (signal: string): Promise<void> => {
      logger.info(`${signal} received, shutting down gracefully...`);

      try {
        await new Promise<void>((resolve, reject) => {
          server.close((error) => (error ? reject(error) : resolve()));
        });
        if (consumer) {
          await consumer.stop();
        }
        await pool.end();
        logger.info('Shutdown complete');
        process.exit(0);
      } catch (error) {
        logger.error('Error during shutdown', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    };

    process.once('SIGTERM', () => void shutdown('SIGTERM'));
    process.once('SIGINT', () => void shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start service', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

void start();
