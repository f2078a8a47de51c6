import { ErrorCodeType } from '../../utils/exceptions';

/**
 * Uniform outcome of a dispatched command, whatever the transport.
 */
export interface HandlerResult<T = unknown> {
  success: boolean;
  data: T | null;
  errorCode: ErrorCodeType | null;
  message: string | null;
  /** Float milliseconds, attached by the dispatcher */
  executionTimeMs: number;
}

/**
 * snake_case form written to HTTP bodies, queue result keys and dead letters.
 */
export interface WireResult {
  success: boolean;
  data: unknown;
  error_code: ErrorCodeType | null;
  message: string | null;
  execution_time_ms: number;
}

export function successResult<T>(data: T, message: string | null = null): HandlerResult<T> {
  return { success: true, data, errorCode: null, message, executionTimeMs: 0 };
}

export function failureResult(errorCode: ErrorCodeType, message: string): HandlerResult<never> {
  return { success: false, data: null, errorCode, message, executionTimeMs: 0 };
}

export function toWire(result: HandlerResult): WireResult {
  return {
    success: result.success,
    data: result.data,
    error_code: result.errorCode,
    message: result.message,
    execution_time_ms: result.executionTimeMs,
  };
}
