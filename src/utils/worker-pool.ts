/**
 * Worker Pool
 * Runs async jobs with a fixed number of worker slots and a per-job timeout
 *
 * A job receives an AbortSignal and the id of the slot it runs in. When a job
 * outlives its timeout the signal is aborted, the slot is handed to the next
 * queued job and the submission resolves as "timed-out" straight away. Jobs
 * that ignore the signal keep running in the background; their result is
 * dropped.
 */

import { toError } from "./to-error";

export type PoolJob<T> = (signal: AbortSignal, workerId: number) => Promise<T>;

export type JobResult<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; error: Error }
  | { status: "timed-out" };

interface QueuedJob {
  start: (workerId: number) => void;
  cancel: (error: Error) => void;
}

export interface PoolStats {
  size: number;
  activeWorkers: number;
  queuedJobs: number;
}

export class WorkerPool {
  private readonly queue: QueuedJob[] = [];
  private readonly idleWorkers: number[] = [];
  private readonly running = new Set<AbortController>();
  private closed = false;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    // Popped from the end, so worker 1 is handed out first
    for (let id = size; id >= 1; id--) {
      this.idleWorkers.push(id);
    }
  }

  getStats(): PoolStats {
    return {
      size: this.size,
      activeWorkers: this.size - this.idleWorkers.length,
      queuedJobs: this.queue.length,
    };
  }

  /**
   * Queue a job. Resolves once the job settles or times out; never rejects
   * unless the pool has already been shut down.
   *
   * @param timeoutMs - Measured from the moment the job gets a worker; 0 disables it
   */
  submit<T>(job: PoolJob<T>, timeoutMs = 0): Promise<JobResult<T>> {
    if (this.closed) {
      return Promise.reject(new Error("Worker pool has been shut down"));
    }

    return new Promise((resolve) => {
      this.queue.push({
        start: (workerId) => this.execute(job, timeoutMs, workerId, resolve),
        cancel: (error) => resolve({ status: "rejected", error }),
      });
      this.next();
    });
  }

  /**
   * Abort running jobs and cancel queued ones. Safe to call more than once.
   */
  shutdown(): void {
    this.closed = true;

    for (const queued of this.queue.splice(0)) {
      queued.cancel(new Error("Worker pool shut down before the job started"));
    }
    for (const controller of this.running) {
      controller.abort();
    }
    this.running.clear();
  }

  private next(): void {
    while (this.idleWorkers.length > 0 && this.queue.length > 0) {
      const workerId = this.idleWorkers.pop();
      const queued = this.queue.shift();
      if (workerId === undefined || queued === undefined) return;
      queued.start(workerId);
    }
  }

  private execute<T>(
    job: PoolJob<T>,
    timeoutMs: number,
    workerId: number,
    resolve: (result: JobResult<T>) => void,
  ): void {
    const controller = new AbortController();
    this.running.add(controller);

    let settled = false;
    let timeoutId: NodeJS.Timeout | undefined;

    const finish = (result: JobResult<T>): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      this.running.delete(controller);
      this.idleWorkers.push(workerId);
      resolve(result);
      if (!this.closed) this.next();
    };

    if (timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        controller.abort();
        finish({ status: "timed-out" });
      }, timeoutMs);
    }

    // Deferred so a job that throws synchronously still lands in the rejection handler
    void Promise.resolve()
      .then(() => job(controller.signal, workerId))
      .then(
        (value) => finish({ status: "fulfilled", value }),
        (error: unknown) => finish({ status: "rejected", error: toError(error) }),
      );
  }
}
