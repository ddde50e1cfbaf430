/**
 * Event Consumer
 *
 * Manages the kafkajs consumer lifecycle and routes each topic to its handler.
 */

import { Kafka, Consumer, EachMessagePayload, SASLOptions } from 'kafkajs';
import type { NetworkService } from '../services/network-service.js';
import type { ServiceStatusStore } from '../services/service-status-store.js';
import { TOPICS, type Topic, type KafkaMessage } from '../types/events.js';
import type { Logger } from '../utils/logger.js';
import { createNetworkChangedHandler, NetworkChangedHandler } from './handlers/network-changed.handler.js';
import { createServiceStatusHandler, ServiceStatusHandler } from './handlers/service-status.handler.js';

/**
 * EventConsumer configuration
 */
export interface EventConsumerConfig {
  serviceName: string;
  brokers: string[];
  groupId: string;
  username?: string;
  password?: string;
  ssl?: boolean;
  networkService: NetworkService;
  serviceStatus: ServiceStatusStore;
  logger: Logger;
}

interface HandlerStats {
  processedCount: number;
  errorCount: number;
  lastProcessedAt: Date | null;
}

export interface ConsumerStats {
  processedCount: number;
  errorCount: number;
  lastProcessedAt: Date | null;
  isRunning: boolean;
  handlers: Record<Topic, HandlerStats>;
}

function emptyHandlerStats(): HandlerStats {
  return { processedCount: 0, errorCount: 0, lastProcessedAt: null };
}

function isTopic(topic: string): topic is Topic {
  return topic === TOPICS.networkChanged || topic === TOPICS.serviceStatusUpdated;
}

export class EventConsumer {
  private consumer: Consumer;
  private logger: Logger;
  private serviceName: string;
  private started: boolean = false;

  private networkChangedHandler: NetworkChangedHandler;
  private serviceStatusHandler: ServiceStatusHandler;

  private stats: ConsumerStats = {
    processedCount: 0,
    errorCount: 0,
    lastProcessedAt: null,
    isRunning: false,
    handlers: {
      [TOPICS.networkChanged]: emptyHandlerStats(),
      [TOPICS.serviceStatusUpdated]: emptyHandlerStats(),
    },
  };

  constructor(config: EventConsumerConfig) {
    this.logger = config.logger;
    this.serviceName = config.serviceName;

    const sasl: SASLOptions | undefined =
      config.username && config.password
        ? { mechanism: 'plain', username: config.username, password: config.password }
        : undefined;

    const kafka = new Kafka({
      clientId: config.serviceName,
      brokers: config.brokers,
      ssl: config.ssl ?? false,
      sasl,
    });
    this.consumer = kafka.consumer({ groupId: config.groupId });

    this.networkChangedHandler = createNetworkChangedHandler({
      networkService: config.networkService,
      logger: config.logger,
    });
    this.serviceStatusHandler = createServiceStatusHandler({
      serviceStatus: config.serviceStatus,
      logger: config.logger,
    });
  }

  /**
   * Connect, subscribe to every topic, then start consuming
   */
  async start(): Promise<void> {
    this.logger.info('Connecting to Kafka', { serviceName: this.serviceName });

    try {
      await this.consumer.connect();
      this.logger.info('Successfully connected to Kafka', { serviceName: this.serviceName });

      const topics = Object.values(TOPICS);
      this.logger.info('Subscribing to topics', { topics });
      await this.consumer.subscribe({ topics, fromBeginning: false });

      await this.consumer.run({
        eachMessage: (payload: EachMessagePayload) => this.dispatch(payload),
      });

      this.started = true;
      this.stats.isRunning = true;
    } catch (error) {
      this.logger.error('Failed to connect to Kafka', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.started) {
      this.logger.warn('Consumer not running, nothing to stop', { serviceName: this.serviceName });
      return;
    }

    this.logger.info('Shutting down Kafka consumer', { serviceName: this.serviceName });

    try {
      await this.consumer.disconnect();
      this.logger.info('Successfully disconnected from Kafka', { serviceName: this.serviceName });
    } catch (error) {
      // Shutdown continues even if the broker is unreachable
      this.logger.error('Error during shutdown', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.started = false;
      this.stats.isRunning = false;
    }
  }

  getStats(): ConsumerStats {
    return {
      ...this.stats,
      isRunning: this.started,
      handlers: {
        [TOPICS.networkChanged]: { ...this.stats.handlers[TOPICS.networkChanged] },
        [TOPICS.serviceStatusUpdated]: { ...this.stats.handlers[TOPICS.serviceStatusUpdated] },
      },
    };
  }

  isRunning(): boolean {
    return this.started;
  }

  /**
   * Route one message to its topic handler and record the outcome
   */
  async dispatch(message: KafkaMessage): Promise<void> {
    if (!isTopic(message.topic)) {
      this.logger.warn('Message received on unexpected topic', { topic: message.topic });
      return;
    }

    const handlerStats = this.stats.handlers[message.topic];
    try {
      if (message.topic === TOPICS.networkChanged) {
        await this.networkChangedHandler.handle(message);
      } else {
        await this.serviceStatusHandler.handle(message);
      }
      const now = new Date();
      handlerStats.processedCount++;
      handlerStats.lastProcessedAt = now;
      this.stats.processedCount++;
      this.stats.lastProcessedAt = now;
    } catch (error) {
      handlerStats.errorCount++;
      this.stats.errorCount++;
      throw error;
    }
  }
}

/**
 * Factory function to create EventConsumer
 */
export function createEventConsumer(config: EventConsumerConfig): EventConsumer {
  if (!config) {
    throw new Error('config is required');
  }
  if (!config.networkService) {
    throw new Error('networkService is required');
  }
  if (!config.serviceStatus) {
    throw new Error('serviceStatus is required');
  }
  if (!config.logger) {
    throw new Error('logger is required');
  }
  if (!config.brokers || config.brokers.length === 0) {
    throw new Error('brokers is required and must not be empty');
  }
  if (!config.groupId || config.groupId.trim() === '') {
    throw new Error('groupId is required');
  }

  return new EventConsumer(config);
}
