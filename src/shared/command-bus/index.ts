/**
 * Command Bus Module
 *
 * Re-exports the dispatcher, registry and handler registration.
 */

// Core command bus
export { CommandBus, CommandBusOptions, IN_PROGRESS_MESSAGE, UNEXPECTED_ERROR_MESSAGE } from './command-bus';
export {
  HandlerRegistry,
  CommandHandler,
  HandlerFactory,
  HandlerRegistration,
  RegisteredOperation,
} from './handler-registry';
export { HandlerResult, WireResult, successResult, failureResult, toWire } from './handler-result';
export { BaseCommandHandler, OperationRoute, parseCommand, isDomainException } from './base-command.handler';
export { ClaimOutcome, IdempotencyStore, InMemoryIdempotencyStore, RedisIdempotencyStore } from './idempotency.store';

// Handler registration
export { registerAllHandlers, HandlerServices } from './handlers';
