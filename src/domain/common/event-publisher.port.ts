/**
 * Outbound port for domain events.
 *
 * Implementations must not throw: a failing subscriber is logged and the
 * use case that published the event carries on.
 */
export interface EventPublisher {
  publish(eventType: string, data: Record<string, unknown>, correlationId?: string): Promise<void>;
}

export type Metadata = Record<string, unknown>;
