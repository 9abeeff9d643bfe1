/**
 * Promise-based mutual exclusion.
 *
 * Critical sections run one at a time in the order they were submitted.  A
 * section that throws or rejects still releases the lock; the failure is
 * delivered to that section's caller only.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /** Number of sections running or waiting. */
  get pending(): number {
    return this.queued;
  }

  runExclusive<T>(section: () => T | Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(section).finally(() => {
      this.queued--;
    });
    // The next section waits for this one to settle, whatever the outcome.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
