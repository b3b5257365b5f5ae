import type { Day } from './Itinerary.js';

/**
 * Job entity - one itinerary generation request and its outcome
 * The status discriminant fixes which terminal fields are present
 */
export type JobStatus = 'processing' | 'completed' | 'failed';

interface JobBase {
  jobId: string;
  destination: string;
  durationDays: number;
  createdAt: Date;
}

export interface ProcessingJob extends JobBase {
  status: 'processing';
  completedAt: null;
  itinerary: null;
  error: null;
}

export interface CompletedJob extends JobBase {
  status: 'completed';
  completedAt: Date;
  itinerary: Day[];
  error: null;
}

export interface FailedJob extends JobBase {
  status: 'failed';
  completedAt: Date;
  itinerary: null;
  error: string;
}

export type Job = ProcessingJob | CompletedJob | FailedJob;

export const MIN_DURATION_DAYS = 1;
export const MAX_DURATION_DAYS = 30;

/**
 * Fields written when a job is created. Terminal fields are never part of it.
 */
export interface CreateJobFields {
  jobId: string;
  destination: string;
  durationDays: number;
}

/**
 * The single write that moves a job out of processing
 */
export type TerminalOutcome =
  | { status: 'completed'; itinerary: Day[] }
  | { status: 'failed'; error: string };
