/**
 * Shared decoding for consumed messages
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import type { KafkaMessage } from '../../types/events.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Extract correlation ID from message headers
 */
export function headerCorrelationId(message: KafkaMessage): string | undefined {
  const headerValue = message.message.headers?.['x-correlation-id'];
  if (headerValue === undefined) {
    return undefined;
  }
  const first = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  return first === undefined ? undefined : first.toString();
}

export function resolveCorrelationId(message: KafkaMessage, fromPayload?: string): string {
  return headerCorrelationId(message) ?? fromPayload ?? `generated-${randomUUID()}`;
}

/**
 * Parse and validate the message value; logs and returns null when it is unusable
 */
export function decodePayload<T>(
  message: KafkaMessage,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  logger: Logger
): T | null {
  const meta = { topic: message.topic, offset: message.message.offset };

  if (!message.message.value) {
    logger.error('Empty message value received', meta);
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(message.message.value.toString());
  } catch (parseError) {
    logger.error('Failed to parse message payload', {
      ...meta,
      error: parseError instanceof Error ? parseError.message : String(parseError),
    });
    return null;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    logger.error('Payload validation failed', {
      ...meta,
      field: result.error.errors[0]?.path.join('.') || 'payload',
      details: result.error.errors.map((err) => ({ field: err.path.join('.'), message: err.message })),
    });
    return null;
  }

  return result.data;
}
