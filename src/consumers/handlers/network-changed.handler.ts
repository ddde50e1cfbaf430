/**
 * Network Changed Handler
 *
 * Handles network.changed events: topology or fare data was edited upstream,
 * so the snapshot is rebuilt from the repository.
 */

import { z } from 'zod';
import type { NetworkService } from '../../services/network-service.js';
import type { KafkaMessage, NetworkChangedPayload } from '../../types/events.js';
import type { Logger } from '../../utils/logger.js';
import { decodePayload, resolveCorrelationId } from './message.js';

const payloadSchema: z.ZodType<NetworkChangedPayload, z.ZodTypeDef, unknown> = z.object({
  reason: z.string().min(1),
  changed_entity: z.string().optional(),
  correlation_id: z.string().optional(),
});

interface HandlerDependencies {
  networkService: NetworkService;
  logger: Logger;
}

export class NetworkChangedHandler {
  private networkService: NetworkService;
  private logger: Logger;

  constructor(deps: HandlerDependencies) {
    if (!deps.networkService) {
      throw new Error('networkService is required');
    }
    if (!deps.logger) {
      throw new Error('logger is required');
    }
    this.networkService = deps.networkService;
    this.logger = deps.logger;
  }

  async handle(message: KafkaMessage): Promise<void> {
    const payload = decodePayload(message, payloadSchema, this.logger);
    if (!payload) {
      return;
    }

    const correlationId = resolveCorrelationId(message, payload.correlation_id);

    this.logger.info('Processing network.changed event', {
      reason: payload.reason,
      changed_entity: payload.changed_entity,
      correlation_id: correlationId,
      topic: message.topic,
    });

    try {
      const result = await this.networkService.reload(`event:${payload.reason}`, correlationId);
      this.logger.info('Successfully processed network.changed event', {
        version: result.version,
        correlation_id: correlationId,
      });
    } catch (error) {
      // Previous snapshot stays in effect; consumer continues processing
      this.logger.error('error processing network.changed event', {
        error: error instanceof Error ? error.message : String(error),
        topic: message.topic,
        offset: message.message.offset,
        correlation_id: correlationId,
      });
    }
  }
}

export function createNetworkChangedHandler(deps: HandlerDependencies): NetworkChangedHandler {
  return new NetworkChangedHandler(deps);
}
