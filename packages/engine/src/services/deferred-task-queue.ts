/**
 * Deferred Task Queue
 *
 * Runs work after the current event handler has returned. Tasks run one at
 * a time, in the order they were scheduled, on the same thread; there is no
 * parallelism and no retry.
 */

export type DeferredTask = () => void;

interface PendingTask {
  name: string;
  task: DeferredTask;
}

export class DeferredTaskQueue {
  private queue: PendingTask[] = [];
  private scheduled = false;
  private idleWaiters: Array<() => void> = [];

  /**
   * Number of tasks waiting to run
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Queue a task to run once the current turn completes
   */
  schedule(name: string, task: DeferredTask): void {
    this.queue.push({ name, task });
    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.runPending());
    }
  }

  /**
   * Resolve once every queued task has run
   */
  drain(): Promise<void> {
    if (!this.scheduled && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Drop tasks that have not started
   */
  clear(): void {
    if (this.queue.length > 0) {
      console.warn(`[DeferredTaskQueue] Dropping ${this.queue.length} pending task(s)`);
    }
    this.queue = [];
  }

  private runPending(): void {
    this.scheduled = false;

    let next = this.queue.shift();
    while (next) {
      try {
        next.task();
      } catch (error) {
        console.error(`[DeferredTaskQueue] Task ${next.name} failed:`, error);
      }
      next = this.queue.shift();
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
