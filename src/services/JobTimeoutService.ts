import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { JobService } from './JobService.js';
import { logger } from '../infra/logger.js';

/**
 * JobTimeoutService - fail jobs that stayed in processing past the allowed time.
 */
export class JobTimeoutService {
  constructor(
    private jobRepo: JobRepository,
    private jobService: JobService
  ) {}

  failTimedOutJobs(timeoutMinutes: number, now: Date = new Date()): { jobsFailed: number } {
    if (timeoutMinutes <= 0) {
      return { jobsFailed: 0 };
    }

    const cutoff = new Date(now.getTime() - timeoutMinutes * 60 * 1000);
    const reason =
      timeoutMinutes === 1
        ? 'Timed out after 1 minute'
        : `Timed out after ${timeoutMinutes} minutes`;

    let jobsFailed = 0;
    for (const job of this.jobRepo.listTimedOutJobs(cutoff)) {
      if (this.jobService.failJobIfActive(job.jobId, reason)) {
        jobsFailed += 1;
      }
    }

    if (jobsFailed > 0) {
      logger.warn('Timed out jobs failed', { jobsFailed, timeoutMinutes });
    }
    return { jobsFailed };
  }
}
