/**
 * Waitable condition for async monitors.
 *
 * JavaScript runs each synchronous section to completion, so the section
 * between two awaits already holds the monitor's lock. What is missing is a
 * place for a task to suspend until another task signals that its predicate
 * may now hold. Woken tasks must re-check their predicate: a notification
 * only says "something changed", another task may have consumed it first.
 */

interface Waiter {
  wake: (notified: boolean) => void;
  timer?: ReturnType<typeof setTimeout>;
}

export class Condition {
  // insertion-ordered, so notifyOne wakes the longest waiter
  private waiters = new Set<Waiter>();

  /**
   * Suspend until notified.
   *
   * @param timeoutMs - give up after this many milliseconds; waits forever when omitted
   * @returns true when notified, false when the timeout elapsed first
   */
  wait(timeoutMs?: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = {
        wake: (notified) => {
          if (waiter.timer !== undefined) {
            clearTimeout(waiter.timer);
          }
          this.waiters.delete(waiter);
          resolve(notified);
        },
      };

      if (timeoutMs !== undefined) {
        // a timed-out waiter leaves the set so no notification is spent on it
        waiter.timer = setTimeout(() => waiter.wake(false), timeoutMs);
      }

      this.waiters.add(waiter);
    });
  }

  /**
   * Wake the longest-suspended waiter
   *
   * @returns whether a waiter was woken
   */
  notifyOne(): boolean {
    const next = this.waiters.values().next();
    if (next.done) {
      return false;
    }
    next.value.wake(true);
    return true;
  }

  /**
   * Number of suspended waiters
   */
  get waiting(): number {
    return this.waiters.size;
  }
}
