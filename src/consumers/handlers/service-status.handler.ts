/**
 * Service Status Handler
 *
 * Handles service-status.updated events. Each event carries the complete set of
 * closures and delays, which replaces the overlay applied to route searches.
 */

import { z } from 'zod';
import type { ServiceStatusStore } from '../../services/service-status-store.js';
import type { KafkaMessage, ServiceStatusUpdatedPayload } from '../../types/events.js';
import type { Logger } from '../../utils/logger.js';
import { decodePayload, resolveCorrelationId } from './message.js';

const ids = z.array(z.string().min(1)).optional();
const delays = z.record(z.number().finite().nonnegative()).optional();

const payloadSchema: z.ZodType<ServiceStatusUpdatedPayload, z.ZodTypeDef, unknown> = z.object({
  closed_line_ids: ids,
  closed_station_ids: ids,
  closed_edge_ids: ids,
  line_delays: delays,
  edge_delays: delays,
  correlation_id: z.string().optional(),
});

interface HandlerDependencies {
  serviceStatus: ServiceStatusStore;
  logger: Logger;
}

export class ServiceStatusHandler {
  private serviceStatus: ServiceStatusStore;
  private logger: Logger;

  constructor(deps: HandlerDependencies) {
    if (!deps.serviceStatus) {
      throw new Error('serviceStatus is required');
    }
    if (!deps.logger) {
      throw new Error('logger is required');
    }
    this.serviceStatus = deps.serviceStatus;
    this.logger = deps.logger;
  }

  async handle(message: KafkaMessage): Promise<void> {
    const payload = decodePayload(message, payloadSchema, this.logger);
    if (!payload) {
      return;
    }

    const correlationId = resolveCorrelationId(message, payload.correlation_id);

    this.serviceStatus.replace({
      closedLineIds: payload.closed_line_ids,
      closedStationIds: payload.closed_station_ids,
      closedEdgeIds: payload.closed_edge_ids,
      lineDelays: payload.line_delays,
      edgeDelays: payload.edge_delays,
    });

    this.logger.info('Service status overlay replaced', {
      ...this.serviceStatus.summary(),
      correlation_id: correlationId,
    });
  }
}

export function createServiceStatusHandler(deps: HandlerDependencies): ServiceStatusHandler {
  return new ServiceStatusHandler(deps);
}
