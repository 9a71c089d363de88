/**
 * Bounded worker pool
 *
 * Runs at most `concurrency` tasks at once; further submissions wait in a
 * FIFO queue. Each task settles independently: a rejection is returned to
 * its own caller and never disturbs queued or running siblings.
 */

type QueuedTask = () => void;

export class WorkerPool {
  private readonly queue: QueuedTask[] = [];
  private running = 0;

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`WorkerPool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /** Tasks currently executing */
  get active(): number {
    return this.running;
  }

  /** Tasks waiting for a free slot */
  get pending(): number {
    return this.queue.length;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.running++;
        // Wrap so a synchronous throw inside `task` still rejects this promise
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.next();
          });
      };

      if (this.running < this.concurrency) {
        start();
      } else {
        this.queue.push(start);
      }
    });
  }

  /**
   * Run `fn` over every item through the pool and wait for all of them.
   * Results keep input order regardless of completion order.
   */
  map<I, O>(items: readonly I[], fn: (item: I, index: number) => Promise<O>): Promise<PromiseSettledResult<O>[]> {
    return Promise.allSettled(items.map((item, index) => this.run(() => fn(item, index))));
  }

  private next(): void {
    const start = this.queue.shift();
    if (start) {
      start();
    }
  }
}
