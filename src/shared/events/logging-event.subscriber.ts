import { logger } from '../../config/logger.config';
import { DomainEvent, DomainEventSubscriber } from './domain-event-bus';

/**
 * Writes every domain event to the application log. Always subscribed.
 */
export class LoggingEventSubscriber implements DomainEventSubscriber {
  readonly name = 'logging';

  handle(event: DomainEvent): void {
    logger.info(`Domain event: ${event.type}`, {
      correlationId: event.correlationId,
      payload: event.payload,
    });
  }
}
