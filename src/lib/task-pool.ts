export interface TaskPoolOptions {
  maxConcurrency: number;
  maxQueued: number;
  label?: string;
}

export type PooledTask = (signal: AbortSignal) => Promise<void>;

interface QueuedTask {
  task: PooledTask;
  onDrop?: () => void;
}

export interface TaskPoolStats {
  active: number;
  queued: number;
  completed: number;
  failed: number;
  dropped: number;
}

/**
 * Runs fire-and-forget tasks with a cap on how many run at once and how many
 * may wait. Submitting past the queue cap drops the task instead of growing
 * without bound. `close()` aborts the shared signal handed to every task.
 * `onDrop` runs for a task that is refused or discarded without running.
 */
export class TaskPool {
  private readonly maxConcurrency: number;
  private readonly maxQueued: number;
  private readonly label: string;
  private readonly controller = new AbortController();
  private readonly queue: QueuedTask[] = [];
  private readonly running = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private closed = false;
  private completed = 0;
  private failed = 0;
  private dropped = 0;

  constructor(options: TaskPoolOptions) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency);
    this.maxQueued = Math.max(0, options.maxQueued);
    this.label = options.label ?? 'task-pool';
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  submit(task: PooledTask, onDrop?: () => void): boolean {
    if (this.closed) {
      this.dropped += 1;
      onDrop?.();
      return false;
    }

    if (this.running.size < this.maxConcurrency) {
      this.launch(task);
      return true;
    }

    if (this.queue.length >= this.maxQueued) {
      this.dropped += 1;
      console.warn(
        `[${this.label}] queue full (${this.maxQueued}), dropping task`
      );
      onDrop?.();
      return false;
    }

    this.queue.push({ task, onDrop });
    return true;
  }

  idle(): Promise<void> {
    if (this.running.size === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      const discarded = this.queue.splice(0, this.queue.length);
      this.dropped += discarded.length;
      this.controller.abort(new Error(`${this.label} closed`));
      for (const entry of discarded) {
        entry.onDrop?.();
      }
    }

    await Promise.allSettled([...this.running]);
  }

  stats(): TaskPoolStats {
    return {
      active: this.running.size,
      queued: this.queue.length,
      completed: this.completed,
      failed: this.failed,
      dropped: this.dropped
    };
  }

  private launch(task: PooledTask): void {
    const run = (async () => {
      try {
        await task(this.controller.signal);
        this.completed += 1;
      } catch (error) {
        this.failed += 1;
        console.error(`[${this.label}] task failed:`, error);
      }
    })();

    this.running.add(run);
    void run.finally(() => {
      this.running.delete(run);
      const next = this.queue.shift();
      if (next && !this.closed) {
        this.launch(next.task);
        return;
      }

      this.resolveIdleWaiters();
    });
  }

  private resolveIdleWaiters(): void {
    if (this.running.size > 0 || this.queue.length > 0) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
