/**
 * Fixed-capacity queue for concurrent producers and consumers that
 * overwrites the oldest element when full
 *
 * @packageDocumentation
 */

export { OverwriteQueue } from './overwrite-queue.mjs';
export type { OverwriteQueueInit, OverwriteQueueOptions } from './overwrite-queue.mjs';
export type { IsStructuredData } from './structured-data.mjs';
export {
  QueueError,
  InvalidArgumentError,
  QueueTimeoutError,
  isQueueError,
  isTimeoutError,
} from './errors.mjs';
export type { ErrorContext, QueueErrorCode } from './errors.mjs';
export { Result } from './result.mjs';
export { defaultLogger } from './logger.mjs';
export type { Logger } from './logger.mjs';
