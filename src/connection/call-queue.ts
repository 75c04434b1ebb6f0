/**
 * FIFO serialization of calls on one connection.
 *
 * @module connection/call-queue
 */

/**
 * Runs tasks one at a time in submission order.
 *
 * A task starts only after the previous one settled, whether it resolved or
 * rejected. Each caller still sees its own task's outcome.
 */
export class CallQueue {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;

    const result = this.tail.then(task);
    const done = () => {
      this.queued--;
    };
    this.tail = result.then(done, done);

    return result;
  }

  /**
   * Number of tasks submitted and not yet settled.
   */
  get size(): number {
    return this.queued;
  }
}
