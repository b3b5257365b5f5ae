import { randomUUID } from 'node:crypto';
import type { CompletedJob, FailedJob, Job, JobStatus } from '../domain/entities/Job.js';
import type { Day } from '../domain/entities/Itinerary.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import { ValidationError, NotFoundError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

const jobTransitions: Record<JobStatus, JobStatus[]> = {
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

/**
 * JobService - manages itinerary job lifecycle and status updates
 * Every read and write goes through the repository; nothing is cached here
 */
export class JobService {
  constructor(private jobRepo: JobRepository) {}

  createJob(params: { destination: string; durationDays: number }): Job {
    const job = this.jobRepo.create({
      jobId: randomUUID(),
      destination: params.destination,
      durationDays: params.durationDays,
    });

    logger.info('Job created', {
      jobId: job.jobId,
      destination: job.destination,
      durationDays: job.durationDays,
    });
    return job;
  }

  getJob(jobId: string): Job {
    const job = this.jobRepo.getById(jobId);
    if (!job) {
      throw new NotFoundError('Itinerary', jobId);
    }
    return job;
  }

  completeJob(jobId: string, itinerary: Day[]): CompletedJob {
    const job = this.getJob(jobId);
    this.assertJobTransition(job.status, 'completed');
    if (!this.jobRepo.applyTerminal(jobId, { status: 'completed', itinerary })) {
      throw new ValidationError(`Job ${jobId} left processing before it could complete`);
    }
    logger.info('Job completed', { jobId, days: itinerary.length });

    const updated = this.getJob(jobId);
    if (updated.status !== 'completed') {
      throw new ValidationError(`Expected job ${jobId} to be completed, found ${updated.status}`);
    }
    return updated;
  }

  failJob(jobId: string, reason: string): FailedJob {
    const job = this.getJob(jobId);
    this.assertJobTransition(job.status, 'failed');
    if (!this.jobRepo.applyTerminal(jobId, { status: 'failed', error: reason })) {
      throw new ValidationError(`Job ${jobId} left processing before it could fail`);
    }
    logger.info('Job failed', { jobId, reason });

    const updated = this.getJob(jobId);
    if (updated.status !== 'failed') {
      throw new ValidationError(`Expected job ${jobId} to be failed, found ${updated.status}`);
    }
    return updated;
  }

  /**
   * Fails the job only if it is still processing; used by the timeout sweep
   */
  failJobIfActive(jobId: string, reason: string): boolean {
    const failed = this.jobRepo.applyTerminal(jobId, { status: 'failed', error: reason });
    if (failed) {
      logger.info('Job failed', { jobId, reason });
    }
    return failed;
  }

  private assertJobTransition(from: JobStatus, to: JobStatus): void {
    const allowed = jobTransitions[from];
    if (!allowed.includes(to)) {
      throw new ValidationError(`Invalid job status transition: ${from} -> ${to}`);
    }
  }
}
