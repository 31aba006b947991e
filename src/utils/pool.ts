/**
 * TaskPool - bounded promise pool
 *
 * Runs at most `concurrency` tasks at once; further tasks wait in FIFO order.
 * A concurrency of 1 gives strictly sequential execution.
 */

interface PendingTask {
  start: () => void;
}

export class TaskPool {
  private readonly concurrency: number;
  private active = 0;
  private waiting: PendingTask[] = [];

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
  }

  /**
   * Schedule a task. The returned promise settles with the task's own result;
   * a rejection does not affect other tasks.
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active++;
        Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.next();
          });
      };

      if (this.active < this.concurrency) {
        start();
      } else {
        this.waiting.push({ start });
      }
    });
  }

  /**
   * Run `worker` over every item and wait for all of them to settle.
   * Rejects with the first failure only after every task has finished.
   */
  async map<T, R>(items: readonly T[], worker: (item: T) => Promise<R>): Promise<R[]> {
    const settled = await Promise.allSettled(items.map((item) => this.run(() => worker(item))));
    const results: R[] = [];
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        throw outcome.reason;
      }
      results.push(outcome.value);
    }
    return results;
  }

  /**
   * Returns pending (not yet started) task count
   */
  size(): number {
    return this.waiting.length;
  }

  /**
   * Returns the number of tasks currently executing
   */
  activeCount(): number {
    return this.active;
  }

  private next(): void {
    const task = this.waiting.shift();
    if (task) {
      task.start();
    }
  }
}
