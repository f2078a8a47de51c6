export {
  DomainEventBus,
  DomainEvent,
  DomainEventSubscriber,
  EventTypes,
  EventType,
  topicForEvent,
} from './domain-event-bus';

export { BusEventPublisher } from './event-publisher';
export { LoggingEventSubscriber } from './logging-event.subscriber';
export { RedisEventSubscriber, EventMessage, toEventMessage } from './redis-event.subscriber';
