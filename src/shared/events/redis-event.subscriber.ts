import type Redis from 'ioredis';
import { MessageBrokerException } from '../../utils/exceptions';
import { DomainEvent, DomainEventSubscriber, topicForEvent } from './domain-event-bus';

/**
 * Wire form of an event on Redis channels and topic streams.
 */
export interface EventMessage {
  event_type: string;
  data: Record<string, unknown>;
  correlation_id: string | null;
  timestamp: string;
  source: string;
}

export function toEventMessage(event: DomainEvent, source: string): EventMessage {
  return {
    event_type: event.type,
    data: event.payload,
    correlation_id: event.correlationId ?? null,
    timestamp: event.timestamp.toISOString(),
    source,
  };
}

/**
 * Publishes each event on channel `events.<type>` and appends it to its
 * topic stream (`user.events`, `payment.events`, ...).
 */
export class RedisEventSubscriber implements DomainEventSubscriber {
  readonly name = 'redis';

  constructor(
    private readonly redis: Redis,
    private readonly source: string
  ) {}

  async handle(event: DomainEvent): Promise<void> {
    const message = JSON.stringify(toEventMessage(event, this.source));
    let replies: Array<[Error | null, unknown]> | null;
    try {
      replies = await this.redis
        .multi()
        .publish(`events.${event.type}`, message)
        .xadd(topicForEvent(event.type), '*', 'payload', message)
        .exec();
    } catch (error) {
      throw new MessageBrokerException(
        `Failed to publish event ${event.type}`,
        error instanceof Error ? error : undefined
      );
    }

    const failed = replies?.find(([replyError]) => replyError !== null);
    if (failed && failed[0]) {
      throw new MessageBrokerException(`Failed to publish event ${event.type}`, failed[0]);
    }
  }
}
