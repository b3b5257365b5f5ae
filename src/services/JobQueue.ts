import { ConfigError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export type QueueTask = () => Promise<void>;

type QueuedTask = {
  label: string;
  task: QueueTask;
};

export type JobQueueStats = {
  active: number;
  pending: number;
  concurrency: number;
  maxPending: number;
};

/**
 * JobQueue - in-process bounded worker pool for background generation.
 * At most `concurrency` tasks run at once; at most `maxPending` wait.
 */
export class JobQueue {
  private active = 0;
  private pending: QueuedTask[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(private options: { concurrency: number; maxPending: number }) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new ConfigError('Queue concurrency must be a positive integer', {
        concurrency: options.concurrency,
      });
    }
    if (!Number.isInteger(options.maxPending) || options.maxPending < 0) {
      throw new ConfigError('Queue limit must be a non-negative integer', {
        maxPending: options.maxPending,
      });
    }
  }

  /**
   * True when a new task would either start now or fit in the waiting list
   */
  canAccept(): boolean {
    return (
      this.active < this.options.concurrency || this.pending.length < this.options.maxPending
    );
  }

  /**
   * Schedules a task. Callers check canAccept() first; enqueueing past the
   * limit is a programming error.
   */
  enqueue(label: string, task: QueueTask): void {
    if (!this.canAccept()) {
      throw new ConfigError('Job queue is full', { label, ...this.stats() });
    }
    this.pending.push({ label, task });
    logger.debug('Task queued', { label, ...this.stats() });
    this.drain();
  }

  stats(): JobQueueStats {
    return {
      active: this.active,
      pending: this.pending.length,
      concurrency: this.options.concurrency,
      maxPending: this.options.maxPending,
    };
  }

  /**
   * Resolves once no task is running or waiting
   */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0;
  }

  private drain(): void {
    while (this.active < this.options.concurrency) {
      const next = this.pending.shift();
      if (!next) break;
      this.active += 1;
      void this.run(next);
    }

    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private async run(entry: QueuedTask): Promise<void> {
    // Yield so the enqueueing caller finishes before the task starts
    await new Promise<void>((resolve) => setImmediate(resolve));
    try {
      await entry.task();
    } catch (error) {
      logger.error('Queued task failed', {
        label: entry.label,
        message: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.active -= 1;
      this.drain();
    }
  }
}
