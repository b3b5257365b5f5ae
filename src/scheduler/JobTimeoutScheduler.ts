import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { JobTimeoutService } from '../services/JobTimeoutService.js';
import type { Env } from '../infra/env.js';

/**
 * JobTimeoutScheduler - periodic sweep of stuck jobs using node-cron
 */
export class JobTimeoutScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private env: Pick<Env, 'JOB_TIMEOUT_MINUTES' | 'JOB_TIMEOUT_CHECK_INTERVAL_MINUTES'>,
    private timeoutService: JobTimeoutService
  ) {}

  /**
   * Runs every JOB_TIMEOUT_CHECK_INTERVAL_MINUTES minutes
   */
  start(): void {
    const intervalMinutes = this.env.JOB_TIMEOUT_CHECK_INTERVAL_MINUTES;

    // cron minute steps only go up to 59; longer intervals fall back to hourly
    const cronExpression = intervalMinutes <= 59 ? `*/${intervalMinutes} * * * *` : '0 * * * *';

    this.task = cron.schedule(cronExpression, () => {
      this.runSweep();
    });

    logger.info('JobTimeoutScheduler started', {
      cronExpression,
      timeoutMinutes: this.env.JOB_TIMEOUT_MINUTES,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('JobTimeoutScheduler stopped');
    }
  }

  runSweep(): void {
    try {
      const { jobsFailed } = this.timeoutService.failTimedOutJobs(this.env.JOB_TIMEOUT_MINUTES);
      logger.debug('Job timeout sweep finished', { jobsFailed });
    } catch (error) {
      logger.error('Job timeout sweep failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Factory function to create and start the scheduler
 */
export function startTimeoutScheduler(
  env: Pick<Env, 'JOB_TIMEOUT_MINUTES' | 'JOB_TIMEOUT_CHECK_INTERVAL_MINUTES'>,
  timeoutService: JobTimeoutService
): JobTimeoutScheduler {
  const scheduler = new JobTimeoutScheduler(env, timeoutService);
  scheduler.start();
  return scheduler;
}
