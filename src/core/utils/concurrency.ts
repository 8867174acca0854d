/**
 * Runs at most `concurrency` tasks at once, starting them in submission order.
 *
 * `onIdle` fires after a task settles and nothing is left running or queued.
 * A rejected task rejects its own promise and releases its slot.
 */
export class TaskLimiter {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(
    private readonly concurrency: number,
    private readonly onIdle?: () => void,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError('concurrency must be a positive integer');
    }
  }

  /** Tasks running plus tasks waiting for a slot. */
  get pending(): number {
    return this.active + this.queue.length;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        let task: Promise<T>;
        try {
          task = fn();
        } catch (error) {
          task = Promise.reject(error);
        }
        void task.then(
          (value) => {
            this.release();
            resolve(value);
          },
          (error: unknown) => {
            this.release();
            reject(error);
          },
        );
      });
      this.startNext();
    });
  }

  private release(): void {
    this.active -= 1;
    this.startNext();
    if (this.pending === 0) this.onIdle?.();
  }

  private startNext(): void {
    if (this.active >= this.concurrency) return;
    const start = this.queue.shift();
    if (!start) return;
    this.active += 1;
    start();
  }
}
