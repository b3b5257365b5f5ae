import { Layout } from './Layout.js';
import type { ProcessingJob } from '../domain/entities/Job.js';

export const PROCESSING_REFRESH_SECONDS = 5;

interface ProcessingPageProps {
  job: ProcessingJob;
}

export function ProcessingPage({ job }: ProcessingPageProps) {
  return (
    <Layout title="Generating itinerary" refreshSeconds={PROCESSING_REFRESH_SECONDS}>
      <h1>Generating your itinerary</h1>
      <div className="card status-processing">
        <p>{`Planning ${job.durationDays} days in ${job.destination}.`}</p>
        <p className="muted">{`Job ${job.jobId}. This page refreshes automatically.`}</p>
      </div>
    </Layout>
  );
}
