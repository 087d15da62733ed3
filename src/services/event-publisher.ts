import { getConnection } from '../queue/connection.js';

const OPERATION_EVENTS_CHANNEL = process.env.OPERATION_EVENTS_CHANNEL || 'hostkeeper:operations';

/**
 * Completion event for one background operation. Exactly one is published per operation.
 */
export interface OperationEvent {
  operationId: string;
  success: boolean;
  output: string;
}

/**
 * The part of a Redis client the publisher needs
 */
export interface PubSubClient {
  publish(channel: string, message: string): Promise<number>;
}

export interface EventPublisher {
  publish(event: OperationEvent): Promise<void>;
}

/**
 * Publishes completion events as JSON on a Redis pub/sub channel
 */
export function createRedisEventPublisher(
  getClient: () => PubSubClient = getConnection,
  channel: string = OPERATION_EVENTS_CHANNEL
): EventPublisher {
  return {
    async publish(event) {
      const receivers = await getClient().publish(channel, JSON.stringify(event));
      if (receivers === 0) {
        console.warn(`Operation ${event.operationId} finished with no subscribers on ${channel}`);
      }
    }
  };
}
