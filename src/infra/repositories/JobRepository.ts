import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type {
  CreateJobFields,
  Job,
  JobStatus,
  TerminalOutcome,
} from '../../domain/entities/Job.js';
import { validateItinerary } from '../../domain/entities/Itinerary.js';
import { DatabaseError } from '../../domain/errors.js';
import { logger } from '../logger.js';

type JobRow = {
  job_id: string;
  status: JobStatus;
  destination: string;
  duration_days: number;
  created_at: string;
  completed_at: string | null;
  itinerary: string | null;
  error: string | null;
};

const NOW_SQL = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

/**
 * Job store - one row per itinerary job, read and written by job id only
 */
export class JobRepository {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Inserts a processing job and returns it as stored, with the database-assigned createdAt
   */
  create(fields: CreateJobFields): Job {
    const sql = `
      INSERT INTO itineraries (job_id, status, destination, duration_days)
      VALUES (?, 'processing', ?, ?)
    `;

    this.db.execute(sql, [fields.jobId, fields.destination, fields.durationDays]);
    logger.debug('Job row created', { jobId: fields.jobId });

    const job = this.getById(fields.jobId);
    if (!job) {
      throw new DatabaseError('Job row missing after insert', { jobId: fields.jobId });
    }
    return job;
  }

  /**
   * Writes status, result and completedAt in one statement.
   * Only a processing row is updated; returns false when no row qualified.
   */
  applyTerminal(jobId: string, outcome: TerminalOutcome): boolean {
    const sql = `
      UPDATE itineraries
      SET status = ?, itinerary = ?, error = ?, completed_at = ${NOW_SQL}
      WHERE job_id = ? AND status = 'processing'
    `;

    const itinerary = outcome.status === 'completed' ? JSON.stringify(outcome.itinerary) : null;
    const error = outcome.status === 'failed' ? outcome.error : null;
    const changes = this.db.execute(sql, [outcome.status, itinerary, error, jobId]);

    logger.debug('Job terminal update', { jobId, status: outcome.status, changes });
    return changes > 0;
  }

  getById(jobId: string): Job | null {
    const sql = `
      SELECT * FROM itineraries
      WHERE job_id = ?
    `;

    const row = this.db.queryOne<JobRow>(sql, [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  listTimedOutJobs(cutoff: Date): Job[] {
    const sql = `
      SELECT * FROM itineraries
      WHERE status = 'processing' AND created_at < ?
      ORDER BY created_at ASC
    `;

    const rows = this.db.query<JobRow>(sql, [cutoff.toISOString()]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  private mapRowToJob(row: JobRow): Job {
    const base = {
      jobId: row.job_id,
      destination: row.destination,
      durationDays: row.duration_days,
      createdAt: new Date(row.created_at),
    };

    switch (row.status) {
      case 'processing':
        return { ...base, status: 'processing', completedAt: null, itinerary: null, error: null };
      case 'completed': {
        if (!row.completed_at || row.itinerary === null) {
          throw new DatabaseError('Completed job row is missing its result', { jobId: row.job_id });
        }
        let stored: unknown;
        try {
          stored = JSON.parse(row.itinerary);
        } catch {
          throw new DatabaseError('Stored itinerary is not valid JSON', { jobId: row.job_id });
        }
        const parsed = validateItinerary(stored);
        if (!parsed.success) {
          throw new DatabaseError('Stored itinerary does not match the schema', {
            jobId: row.job_id,
            issues: parsed.issues,
          });
        }
        return {
          ...base,
          status: 'completed',
          completedAt: new Date(row.completed_at),
          itinerary: parsed.days,
          error: null,
        };
      }
      case 'failed':
        if (!row.completed_at || row.error === null) {
          throw new DatabaseError('Failed job row is missing its error', { jobId: row.job_id });
        }
        return {
          ...base,
          status: 'failed',
          completedAt: new Date(row.completed_at),
          itinerary: null,
          error: row.error,
        };
      default:
        throw new DatabaseError('Unknown job status in store', {
          jobId: row.job_id,
          status: String(row.status),
        });
    }
  }
}
