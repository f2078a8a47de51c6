import { logger } from '../../config/logger.config';

/**
 * Represents a domain event that can be published and subscribed to.
 * Events are decoupled from transport (Redis pub/sub, streams, logs).
 */
export interface DomainEvent {
  /** Event type identifier (e.g., 'user.created', 'payment.failed') */
  type: string;
  /** Event payload data */
  payload: Record<string, unknown>;
  /** Correlation id of the command that produced the event */
  correlationId?: string;
  /** Timestamp when event was created */
  timestamp: Date;
}

/**
 * Subscriber interface for handling domain events.
 */
export interface DomainEventSubscriber {
  readonly name: string;
  handle(event: DomainEvent): void | Promise<void>;
}

/**
 * DomainEventBus fans each published event out to every subscriber.
 *
 * - Multiple subscribers: logging, Redis pub/sub and streams
 * - Decoupling: use cases only see the EventPublisher port
 * - Isolation: a failing subscriber is logged and never fails the publisher
 *
 * Usage:
 * ```typescript
 * const eventBus = new DomainEventBus();
 * eventBus.subscribe(new LoggingEventSubscriber());
 * await eventBus.publish({ type: EventTypes.USER_CREATED, payload: { user_id } });
 * ```
 */
export class DomainEventBus {
  private subscribers: DomainEventSubscriber[] = [];

  /**
   * Register a subscriber to receive all published events.
   */
  subscribe(subscriber: DomainEventSubscriber): void {
    this.subscribers.push(subscriber);
  }

  /**
   * Unsubscribe a previously registered subscriber.
   */
  unsubscribe(subscriber: DomainEventSubscriber): void {
    const index = this.subscribers.indexOf(subscriber);
    if (index !== -1) {
      this.subscribers.splice(index, 1);
    }
  }

  getSubscriberNames(): string[] {
    return this.subscribers.map((subscriber) => subscriber.name);
  }

  /**
   * Publish an event to every subscriber and wait for all of them to settle.
   * Never rejects.
   */
  async publish(event: Omit<DomainEvent, 'timestamp'>): Promise<void> {
    const fullEvent: DomainEvent = {
      ...event,
      timestamp: new Date(),
    };

    const outcomes = await Promise.allSettled(
      this.subscribers.map(async (subscriber) => subscriber.handle(fullEvent))
    );

    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'rejected') {
        const reason: unknown = outcome.reason;
        logger.error(`Event subscriber error for ${fullEvent.type}`, {
          subscriber: this.subscribers[index]?.name,
          correlationId: fullEvent.correlationId,
          error: reason instanceof Error ? reason.message : String(reason),
        });
      }
    });
  }
}

/**
 * Event type constants for type-safe event publishing.
 */
export const EventTypes = {
  // User events
  USER_CREATED: 'user.created',
  USER_UPDATED: 'user.updated',
  USER_DELETED: 'user.deleted',

  // Payment events
  PAYMENT_COMPLETED: 'payment.completed',
  PAYMENT_FAILED: 'payment.failed',
  PAYMENT_REFUNDED: 'payment.refunded',

  // Notification events
  NOTIFICATION_SENT: 'notification.sent',
  NOTIFICATION_FAILED: 'notification.failed',
  NOTIFICATION_CANCELLED: 'notification.cancelled',
  NOTIFICATION_DELIVERED: 'notification.delivered',
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Topic stream an event type is appended to.
 */
export function topicForEvent(eventType: string): string {
  if (eventType.startsWith('user.')) return 'user.events';
  if (eventType.startsWith('payment.')) return 'payment.events';
  if (eventType.startsWith('notification.')) return 'notification.events';
  return 'general.events';
}
