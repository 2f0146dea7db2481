/**
 * Error classes for the overwrite queue
 */

/**
 * Context information attached to a queue error
 */
export type ErrorContext = Record<string, unknown>;

export type QueueErrorCode = 'INVALID_ARGUMENT' | 'TIMEOUT';

/**
 * Base error class for all queue errors
 */
export class QueueError extends Error {
  constructor(
    message: string,
    public readonly code: QueueErrorCode,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = 'QueueError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a queue is constructed or called with a value it cannot accept,
 * e.g. a capacity that is not a positive integer or a negative timeout
 */
export class InvalidArgumentError extends QueueError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown
  ) {
    super(message, 'INVALID_ARGUMENT', { field, value });
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Returned when a timed pop finds no element before its deadline.
 * The queue is left exactly as it was before the call.
 */
export class QueueTimeoutError extends QueueError {
  constructor(
    public readonly operationName: string,
    public readonly timeoutMs: number
  ) {
    super(
      `${operationName} timed out after ${timeoutMs}ms: no elements in queue`,
      'TIMEOUT',
      { operationName, timeoutMs }
    );
    this.name = 'QueueTimeoutError';
  }
}

export const isQueueError = (error: unknown): error is QueueError =>
  error instanceof QueueError;

export const isTimeoutError = (error: unknown): error is QueueTimeoutError =>
  error instanceof QueueTimeoutError;
