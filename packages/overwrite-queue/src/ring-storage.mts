/**
 * Fixed-length slot storage with head/tail cursors.
 *
 * Slots are allocated once at construction and never re-allocated.
 * Writing into full storage overwrites the oldest element.
 */

import { OptionsValidator } from './validators.mjs';

const validator: OptionsValidator = new OptionsValidator('RingStorage');

// boxed so an element that is itself undefined is told apart from an empty slot
interface Slot<T> {
  value: T;
}

export class RingStorage<T> {
  private readonly slots: (Slot<T> | undefined)[];
  private head = 0;
  private tail = 0;
  private count = 0;
  readonly capacity: number;

  constructor(capacity: number) {
    validator.requirePositiveInteger('capacity', capacity);
    this.capacity = capacity;
    this.slots = new Array<Slot<T> | undefined>(capacity).fill(undefined);
  }

  /**
   * Write a value at the tail, overwriting the oldest element when full. O(1)
   */
  write(value: T): void {
    if (this.count === this.capacity) {
      // the slot at head is about to be reused by tail
      this.head = (this.head + 1) % this.capacity;
    } else {
      this.count++;
    }

    this.slots[this.tail] = { value };
    this.tail = (this.tail + 1) % this.capacity;
  }

  /**
   * Remove and return the oldest element. O(1)
   *
   * Callers check `length` first; reading empty storage is a bug.
   */
  read(): T {
    const slot = this.slots[this.head];
    if (this.count === 0 || slot === undefined) {
      throw new RangeError('RingStorage is empty');
    }

    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;

    return slot.value;
  }

  get length(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }
}
