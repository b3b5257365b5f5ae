import { logger } from '../infra/logger.js';
import { ServiceUnavailableError } from '../domain/errors.js';
import type { Job } from '../domain/entities/Job.js';
import type { Day } from '../domain/entities/Itinerary.js';
import type { ItineraryGenerator } from './ItineraryGenerator.js';
import type { JobService } from './JobService.js';
import type { JobQueue } from './JobQueue.js';

export interface ItineraryRequest {
  destination: string;
  durationDays: number;
}

/**
 * JobOrchestrator - creates itinerary jobs and runs generation in the background
 * Lifecycle writes are delegated to JobService
 */
export class JobOrchestrator {
  constructor(
    private jobService: JobService,
    private generator: ItineraryGenerator,
    private queue: JobQueue
  ) {}

  /**
   * Writes the processing record and schedules generation.
   * Returns as soon as the record exists; generation is not awaited.
   */
  startItineraryJob(request: ItineraryRequest): Job {
    if (!this.queue.canAccept()) {
      logger.warn('Generation queue full, rejecting request', this.queue.stats());
      throw new ServiceUnavailableError(
        'Too many itineraries are being generated right now. Please try again shortly.',
        this.queue.stats()
      );
    }

    const job = this.jobService.createJob(request);
    this.queue.enqueue(job.jobId, () => this.runGeneration(job.jobId, request));
    return job;
  }

  /**
   * Generates the itinerary and records the outcome. Never rejects.
   */
  async runGeneration(jobId: string, request: ItineraryRequest): Promise<void> {
    if (!this.isStillProcessing(jobId)) return;
    logger.info('Processing job', { jobId });

    let itinerary: Day[];
    try {
      itinerary = await this.generator.generate(request.destination, request.durationDays);
    } catch (error) {
      const reason = this.formatFailureReason(error);
      logger.error('Job generation failed', { jobId, error: reason });
      this.recordFailure(jobId, reason);
      return;
    }

    try {
      this.jobService.completeJob(jobId, itinerary);
    } catch (error) {
      const reason = this.formatFailureReason(error);
      logger.error('Failed to store generated itinerary', {
        jobId,
        days: itinerary.length,
        error: reason,
      });
      this.recordFailure(jobId, `Failed to store generated itinerary: ${reason}`);
    }
  }

  /**
   * A job can wait in the queue past the timeout sweep; skip the model call once it is terminal
   */
  private isStillProcessing(jobId: string): boolean {
    try {
      const job = this.jobService.getJob(jobId);
      if (job.status === 'processing') return true;
      logger.debug('Skipping generation for finished job', { jobId, status: job.status });
      return false;
    } catch (error) {
      logger.error('Failed to load queued job', { jobId, error: this.formatFailureReason(error) });
      return false;
    }
  }

  private recordFailure(jobId: string, reason: string): void {
    try {
      this.jobService.failJob(jobId, reason);
    } catch (error) {
      // Left processing; the timeout sweep fails it later
      logger.error('Failed to record job failure', {
        jobId,
        reason,
        error: this.formatFailureReason(error),
      });
    }
  }

  private formatFailureReason(error: unknown): string {
    if (error instanceof Error && error.message.trim().length > 0) {
      return error.message;
    }
    return 'Unexpected error';
  }
}
