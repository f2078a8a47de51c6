/**
 * Handler Registry
 *
 * Static (operation, transport) -> handler factory table. Populated once by
 * the composition root; every resolve builds a fresh handler so no state
 * leaks between requests.
 */

import { logger } from '../../config/logger.config';
import type { HandlerContext, Transport } from '../../domain/commands';
import { HandlerNotFoundException, TransportNotSupportedException } from '../../utils/exceptions';
import type { HandlerResult } from './handler-result';

/**
 * Interface for command handlers.
 * A handler serves one operation over one transport.
 */
export interface CommandHandler {
  handle(data: Record<string, unknown>, context: HandlerContext): Promise<HandlerResult>;
}

export type HandlerFactory = () => CommandHandler;

export interface HandlerRegistration {
  operation: string;
  transport: Transport;
  factory: HandlerFactory;
}

export interface RegisteredOperation {
  operation: string;
  transports: Transport[];
}

export class HandlerRegistry {
  private handlers = new Map<string, Map<Transport, HandlerFactory>>();

  /**
   * Register a handler factory. A second registration for the same pair
   * replaces the first.
   */
  register(operation: string, transport: Transport, factory: HandlerFactory): void {
    let byTransport = this.handlers.get(operation);
    if (!byTransport) {
      byTransport = new Map();
      this.handlers.set(operation, byTransport);
    }
    byTransport.set(transport, factory);
    logger.debug(`Registered command handler for: ${operation}/${transport}`);
  }

  registerAll(registrations: HandlerRegistration[]): void {
    for (const { operation, transport, factory } of registrations) {
      this.register(operation, transport, factory);
    }
  }

  /**
   * @throws HandlerNotFoundException when nothing is registered for the operation
   * @throws TransportNotSupportedException when the operation lacks this transport
   */
  resolve(operation: string, transport: Transport): CommandHandler {
    const byTransport = this.handlers.get(operation);
    if (!byTransport) {
      throw new HandlerNotFoundException(operation);
    }
    const factory = byTransport.get(transport);
    if (!factory) {
      throw new TransportNotSupportedException(operation, transport);
    }
    return factory();
  }

  has(operation: string, transport?: Transport): boolean {
    const byTransport = this.handlers.get(operation);
    if (!byTransport) return false;
    return transport ? byTransport.has(transport) : true;
  }

  listOperations(): RegisteredOperation[] {
    return Array.from(this.handlers.entries()).map(([operation, byTransport]) => ({
      operation,
      transports: Array.from(byTransport.keys()),
    }));
  }
}
