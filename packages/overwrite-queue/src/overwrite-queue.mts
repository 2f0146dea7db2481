/**
 * Bounded queue for concurrent producers and consumers that drops the
 * oldest unread element when full.
 *
 * Producers never wait: a push into a full queue overwrites the oldest
 * element, which is lost. Consumers either wait for data (`pop`), wait up
 * to a deadline (`popWithTimeout`), or inspect the current state (`count`,
 * `size`) without waiting.
 *
 * @example
 * ```typescript
 * const readings = new OverwriteQueue<number>({ capacity: 128, name: 'sensor' });
 *
 * sensor.on('reading', (value) => readings.push(value));
 *
 * const latest = await readings.popWithTimeout(500);
 * if (!latest.success) {
 *   // nothing arrived for 500ms
 * }
 * ```
 *
 * @packageDocumentation
 */

import { Condition } from './condition.mjs';
import { InvalidArgumentError, QueueTimeoutError } from './errors.mjs';
import { defaultLogger } from './logger.mjs';
import { Result } from './result.mjs';
import { RingStorage } from './ring-storage.mjs';
import { copyStructuredData } from './structured-data.mjs';
import { OptionsValidator } from './validators.mjs';

import type { Logger } from './logger.mjs';
import type { IsStructuredData } from './structured-data.mjs';

export interface OverwriteQueueOptions<T> {
  /** Number of slots; fixed for the lifetime of the queue */
  capacity: number;
  /** Name attached to log records. Defaults to `overwrite-queue` */
  name?: string;
  /** Pino logger; the queue logs through a child bound to its name */
  logger?: Logger;
  /**
   * Produces the copy that is stored for a pushed value, so the producer
   * keeps no reference into the queue. Defaults to a structured clone, which
   * is only available when `T` is plain data; pass `(value) => value` to store
   * values as given.
   */
  clone?: (value: T) => T;
}

/**
 * What the constructor accepts for element type `T`. Plain data may use the
 * default copy, so a bare capacity will do; any other `T` (functions, class
 * instances, promises) needs an options object with `clone`.
 *
 * @example
 * ```typescript
 * new OverwriteQueue<number>(16);
 * new OverwriteQueue<Reading>({ capacity: 16, clone: (r) => new Reading(r.celsius) });
 * ```
 */
export type OverwriteQueueInit<T> =
  IsStructuredData<T> extends true
    ? number | OverwriteQueueOptions<T>
    : OverwriteQueueOptions<T> & Required<Pick<OverwriteQueueOptions<T>, 'clone'>>;

const validator: OptionsValidator = new OptionsValidator('OverwriteQueue');

export class OverwriteQueue<T> {
  private readonly storage: RingStorage<T>;
  // signalled on every push: "the queue became non-empty"
  private readonly nonEmpty = new Condition();
  private readonly clone: (value: T) => T;
  private readonly logger: Logger;
  readonly name: string;

  constructor(init: OverwriteQueueInit<T>) {
    const capacityOrOptions: number | OverwriteQueueOptions<T> = init;
    const options: OverwriteQueueOptions<T> =
      typeof capacityOrOptions === 'number'
        ? { capacity: capacityOrOptions }
        : capacityOrOptions;

    if (typeof options !== 'object' || options === null) {
      throw new InvalidArgumentError(
        `[OverwriteQueue] options must be a capacity or an options object, got ${String(options)}`,
        'options',
        options
      );
    }

    validator.requirePositiveInteger('capacity', options.capacity);
    validator.requireOptionalNonEmptyString('name', options.name);
    validator.requireOptionalFunction('clone', options.clone);

    this.name = options.name ?? 'overwrite-queue';
    this.storage = new RingStorage<T>(options.capacity);
    this.clone = options.clone ?? copyStructuredData;
    this.logger = (options.logger ?? defaultLogger).child({ queue: this.name });

    this.logger.debug({ capacity: options.capacity }, 'queue created');
  }

  /**
   * Append a value. Never waits and never fails.
   *
   * When the queue is full the oldest element is overwritten and the count
   * stays at capacity. Wakes one suspended consumer, if any.
   */
  push(value: T): void {
    this.storage.write(this.clone(value));
    this.nonEmpty.notifyOne();
  }

  /**
   * Remove and return the oldest element, waiting for a push while the
   * queue is empty. Waits indefinitely if nothing is ever pushed; use
   * {@link popWithTimeout} when that is not acceptable.
   */
  async pop(): Promise<T> {
    while (this.storage.isEmpty()) {
      await this.nonEmpty.wait();
    }
    return this.storage.read();
  }

  /**
   * Like {@link pop}, but gives up once `timeoutMs` has elapsed with the
   * queue still empty. A timed-out call leaves the queue untouched.
   *
   * A `timeoutMs` of 0 polls once and never suspends.
   *
   * @throws {InvalidArgumentError} (as a rejection) for negative, NaN or infinite timeouts
   */
  async popWithTimeout(timeoutMs: number): Promise<Result<T, QueueTimeoutError>> {
    validator.requireFiniteNonNegativeNumber('timeoutMs', timeoutMs);

    if (timeoutMs === 0) {
      return this.storage.isEmpty()
        ? this.timedOut(timeoutMs)
        : Result.ok(this.storage.read());
    }

    // monotonic clock: a wall-clock step must not move the deadline
    const deadline = performance.now() + timeoutMs;

    while (this.storage.isEmpty()) {
      const remaining = deadline - performance.now();
      if (remaining <= 0) {
        return this.timedOut(timeoutMs);
      }

      const notified = await this.nonEmpty.wait(remaining);
      if (!notified && this.storage.isEmpty()) {
        return this.timedOut(timeoutMs);
      }
    }

    return Result.ok(this.storage.read());
  }

  /**
   * Number of elements currently in the queue.
   * May be stale as soon as another task pushes or pops.
   */
  count(): number {
    return this.storage.length;
  }

  /**
   * The fixed capacity
   */
  size(): number {
    return this.storage.capacity;
  }

  /**
   * Number of consumers suspended in `pop` or `popWithTimeout`
   */
  get waiting(): number {
    return this.nonEmpty.waiting;
  }

  private timedOut(timeoutMs: number): Result<T, QueueTimeoutError> {
    this.logger.debug({ timeoutMs }, 'timed pop expired on empty queue');
    return Result.err(new QueueTimeoutError('popWithTimeout', timeoutMs));
  }
}
