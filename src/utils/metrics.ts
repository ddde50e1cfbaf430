/**
 * Prometheus metrics for planning and rebuilds
 */

import { Router, Request, Response } from 'express';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type RebuildOutcome = 'success' | 'failure';

export interface EngineMetrics {
  recordPlan(preference: string, outcome: string, durationSeconds: number): void;
  recordRebuild(outcome: RebuildOutcome): void;
}

export function createEngineMetrics(registry: Registry): EngineMetrics {
  const plans = new Counter({
    name: 'route_plans_total',
    help: 'Route planning requests by preference and outcome',
    labelNames: ['preference', 'outcome'],
    registers: [registry],
  });

  const planDuration = new Histogram({
    name: 'route_plan_duration_seconds',
    help: 'Time spent planning and pricing one request',
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
    registers: [registry],
  });

  const rebuilds = new Counter({
    name: 'network_rebuilds_total',
    help: 'Network snapshot rebuild attempts by outcome',
    labelNames: ['outcome'],
    registers: [registry],
  });

  return {
    recordPlan(preference, outcome, durationSeconds) {
      plans.inc({ preference, outcome });
      planDuration.observe(durationSeconds);
    },
    recordRebuild(outcome) {
      rebuilds.inc({ outcome });
    },
  };
}

export function createMetricsRegistry(serviceName: string): Registry {
  const registry = new Registry();
  registry.setDefaultLabels({ service: serviceName });
  collectDefaultMetrics({ register: registry });
  return registry;
}

export function createMetricsRouter(registry: Registry): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response): Promise<void> => {
    try {
      res.set('Content-Type', registry.contentType);
      res.status(200).send(await registry.metrics());
    } catch (error) {
      res.status(500).json({
        error: 'Failed to collect metrics',
        message: error instanceof Error ? error.message : String(error),
      });
    }
  });

  return router;
}
