/**
 * Command envelope
 *
 * Every inbound request, whatever its transport, is normalized into a
 * CommandEnvelope before it reaches the dispatcher. Handlers only ever see
 * the envelope's payload and context.
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Top-level operations a handler can be registered for.
 */
export const Operations = {
  USERS: 'users',
  PAYMENTS: 'payments',
  NOTIFICATIONS: 'notifications',
} as const;

export type Operation = (typeof Operations)[keyof typeof Operations];

export const Transports = {
  HTTP: 'http',
  QUEUE: 'queue',
  STREAM: 'stream',
} as const;

export type Transport = (typeof Transports)[keyof typeof Transports];

/**
 * Per-request values handed to a handler next to its payload.
 */
export interface HandlerContext {
  /** Sub-operation within the handler, e.g. `create` or `refund` */
  operation?: string;
  /** Tracing token threaded through handler, use case and published events */
  correlationId: string;
  /** Redelivery key; results are replayed for a key already seen */
  idempotencyKey?: string;
  /** Entity ids taken from an HTTP path */
  userId?: string;
  paymentId?: string;
  notificationId?: string;
}

export interface CommandEnvelope {
  id: string;
  transport: Transport;
  /** Registry key; kept as a plain string so unknown operations reach the registry */
  operation: string;
  payload: Record<string, unknown>;
  context: HandlerContext;
  receivedAt: Date;
}

/**
 * Build an envelope, generating a correlation id when the caller sent none.
 */
export function createEnvelope(
  transport: Transport,
  operation: string,
  payload: Record<string, unknown>,
  context: Partial<HandlerContext> = {}
): CommandEnvelope {
  return {
    id: uuidv4(),
    transport,
    operation,
    payload,
    context: { ...context, correlationId: context.correlationId || uuidv4() },
    receivedAt: new Date(),
  };
}
