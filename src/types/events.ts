/**
 * Event payloads consumed from Kafka
 */

export const TOPICS = {
  networkChanged: 'network.changed',
  serviceStatusUpdated: 'service-status.updated',
} as const;

export type Topic = (typeof TOPICS)[keyof typeof TOPICS];

/**
 * Kafka message interface compatible with KafkaJS EachMessagePayload.
 * Uses flexible headers type to match KafkaJS IHeaders interface.
 */
export interface KafkaMessage {
  topic: string;
  partition: number;
  message: {
    key: Buffer | null;
    value: Buffer | null;
    offset: string;
    timestamp: string;
    headers?: Record<string, Buffer | string | (Buffer | string)[] | undefined>;
  };
}

/**
 * Topology or fare data changed upstream; the snapshot must be rebuilt
 */
export interface NetworkChangedPayload {
  reason: string;
  changed_entity?: string;
  correlation_id?: string;
}

/**
 * Full replacement of the real-time service status
 */
export interface ServiceStatusUpdatedPayload {
  closed_line_ids?: string[];
  closed_station_ids?: string[];
  closed_edge_ids?: string[];
  line_delays?: Record<string, number>;
  edge_delays?: Record<string, number>;
  correlation_id?: string;
}
