import type { Job } from '../domain/entities/Job.js';

/**
 * Wire shape of a job document
 */
export function mapJobToResponse(job: Job) {
  return {
    jobId: job.jobId,
    status: job.status,
    destination: job.destination,
    durationDays: job.durationDays,
    createdAt: job.createdAt.toISOString(),
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    itinerary: job.itinerary,
    error: job.error,
  };
}
