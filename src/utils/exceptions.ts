/**
 * Stable error codes carried by every failed command result.
 * Callers branch on these, never on messages.
 */
export const ErrorCode = {
  // Domain errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  BUSINESS_RULE_VIOLATION: 'BUSINESS_RULE_VIOLATION',

  // Dispatch errors
  HANDLER_NOT_FOUND: 'HANDLER_NOT_FOUND',
  TRANSPORT_NOT_SUPPORTED: 'TRANSPORT_NOT_SUPPORTED',
  INVALID_OPERATION: 'INVALID_OPERATION',
  REQUEST_IN_PROGRESS: 'REQUEST_IN_PROGRESS',

  // Infrastructure errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  DATABASE_ERROR: 'DATABASE_ERROR',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',
  MESSAGE_BROKER_ERROR: 'MESSAGE_BROKER_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.INTERNAL_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Client errors carry a message safe to return to the caller.
   * Server errors are replaced with a generic message.
   */
  get expose(): boolean {
    return this.statusCode < 500;
  }
}

/**
 * Thrown when input fails validation
 */
export class ValidationException extends AppException {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 400, ErrorCode.VALIDATION_ERROR);
  }
}

/**
 * Thrown when resource is not found
 */
export class NotFoundException extends AppException {
  constructor(message: string) {
    super(message, 404, ErrorCode.NOT_FOUND);
  }
}

/**
 * Thrown when a resource with the same unique key already exists
 */
export class AlreadyExistsException extends AppException {
  constructor(message: string) {
    super(message, 409, ErrorCode.ALREADY_EXISTS);
  }
}

/**
 * Thrown when an entity transition or business invariant is violated
 */
export class BusinessRuleViolationException extends AppException {
  constructor(
    public readonly rule: string,
    public readonly details?: string
  ) {
    super(
      details ? `Business rule violation: ${rule} - ${details}` : `Business rule violation: ${rule}`,
      422,
      ErrorCode.BUSINESS_RULE_VIOLATION
    );
  }
}

export class HandlerNotFoundException extends AppException {
  constructor(operation: string) {
    super(`No handler registered for operation: ${operation}`, 404, ErrorCode.HANDLER_NOT_FOUND);
  }
}

export class TransportNotSupportedException extends AppException {
  constructor(operation: string, transport: string) {
    super(
      `Transport ${transport} is not supported for operation: ${operation}`,
      400,
      ErrorCode.TRANSPORT_NOT_SUPPORTED
    );
  }
}

/**
 * Thrown when a handler receives a sub-operation it does not know
 */
export class InvalidOperationException extends AppException {
  constructor(operation: string) {
    super(`Unknown operation: ${operation}`, 400, ErrorCode.INVALID_OPERATION);
  }
}

/**
 * Thrown when a database operation fails.
 * Wraps the original error to prevent schema leakage.
 */
export class DatabaseException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, 500, ErrorCode.DATABASE_ERROR);
    this.originalError = originalError;
  }

  static fromError(error: unknown, operation: string): DatabaseException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new DatabaseException(`Database operation failed: ${operation}`, originalError);
  }
}

/**
 * Thrown when an outbound HTTP call (email provider, payment gateway) fails.
 */
export class ExternalServiceException extends AppException {
  public readonly originalError?: Error;

  constructor(
    public readonly serviceName: string,
    details: string,
    originalError?: Error
  ) {
    super(`External service ${serviceName} error: ${details}`, 502, ErrorCode.EXTERNAL_SERVICE_ERROR);
    this.originalError = originalError;
  }

  static fromError(serviceName: string, error: unknown): ExternalServiceException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new ExternalServiceException(
      serviceName,
      originalError.message || 'Unknown error',
      originalError
    );
  }
}

/**
 * Thrown when Redis (queue, stream, pub/sub) rejects an operation.
 */
export class MessageBrokerException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, 503, ErrorCode.MESSAGE_BROKER_ERROR);
    this.originalError = originalError;
  }
}

// Domain-specific exception factory functions for common scenarios
export const UserErrors = {
  notFound: (userId: string) => new NotFoundException(`User with ID ${userId} not found`),
  alreadyExists: (email: string) =>
    new AlreadyExistsException(`User with email=${email} already exists`),
};

export const PaymentErrors = {
  notFound: (paymentId: string) => new NotFoundException(`Payment with ID ${paymentId} not found`),
  alreadyExists: (paymentId: string) =>
    new AlreadyExistsException(`Payment with ID ${paymentId} already exists`),
};

export const NotificationErrors = {
  notFound: (notificationId: string) =>
    new NotFoundException(`Notification with ID ${notificationId} not found`),
  alreadyExists: (notificationId: string) =>
    new AlreadyExistsException(`Notification with ID ${notificationId} already exists`),
};
