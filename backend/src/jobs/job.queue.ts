export type JobTask = () => Promise<void>;

type PendingTask = {
  start: () => void;
  cancel: () => void;
};

export class JobQueue {
  private maxConcurrent: number;
  private maxQueued: number;
  private active = new Set<Promise<void>>();
  private pending: PendingTask[] = [];

  constructor(maxConcurrent: number, maxQueued: number) {
    if (maxConcurrent < 1) {
      throw new Error("maxConcurrent must be at least 1.");
    }
    this.maxConcurrent = maxConcurrent;
    this.maxQueued = Math.max(0, maxQueued);
  }

  get running(): number {
    return this.active.size;
  }

  get waiting(): number {
    return this.pending.length;
  }

  hasCapacity(): boolean {
    return this.active.size + this.pending.length < this.maxConcurrent + this.maxQueued;
  }

  /**
   * Returns a promise that settles once the task has run (or was dropped by
   * `clearPending`), or null when the queue is full.
   */
  enqueue(task: JobTask): Promise<void> | null {
    if (!this.hasCapacity()) return null;
    return new Promise<void>((resolve) => {
      const start = () => {
        const running: Promise<void> = task()
          .catch((err: unknown) => {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[jobs] Worker task failed: ${message}`);
          })
          .finally(() => {
            this.active.delete(running);
            resolve();
            this.startNext();
          });
        this.active.add(running);
      };
      if (this.active.size < this.maxConcurrent) {
        start();
      } else {
        this.pending.push({ start, cancel: resolve });
      }
    });
  }

  clearPending(): number {
    const dropped = this.pending.splice(0);
    for (const task of dropped) task.cancel();
    return dropped.length;
  }

  /** Waits up to `timeoutMs` for each running task; returns how many are still running. */
  async drain(timeoutMs: number): Promise<number> {
    for (const running of [...this.active]) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<void>((r) => {
        timer = setTimeout(r, timeoutMs);
      });
      await Promise.race([running, timeout]);
      clearTimeout(timer);
    }
    return this.active.size;
  }

  private startNext(): void {
    while (this.active.size < this.maxConcurrent && this.pending.length > 0) {
      const next = this.pending.shift();
      next?.start();
    }
  }
}
