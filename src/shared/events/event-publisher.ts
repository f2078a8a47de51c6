import type { EventPublisher } from '../../domain/common/event-publisher.port';
import type { DomainEventBus } from './domain-event-bus';

/**
 * EventPublisher port backed by the in-process DomainEventBus.
 */
export class BusEventPublisher implements EventPublisher {
  constructor(private readonly eventBus: DomainEventBus) {}

  async publish(
    eventType: string,
    data: Record<string, unknown>,
    correlationId?: string
  ): Promise<void> {
    await this.eventBus.publish({ type: eventType, payload: data, correlationId });
  }
}
