/**
 * Completion Counter
 * Counts finished tasks for progress output during a single run
 */

export class CompletionCounter {
  private count = 0;

  /**
   * Record one completed task and return the new total.
   * Reading and writing happen in the same synchronous step, so tasks
   * interleaving at await points cannot lose an update.
   */
  increment(): number {
    this.count += 1;
    return this.count;
  }

  get value(): number {
    return this.count;
  }
}
