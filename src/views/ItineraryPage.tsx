import { Layout } from './Layout.js';
import { formatTimestamp } from './format.js';
import type { CompletedJob } from '../domain/entities/Job.js';
import type { Day } from '../domain/entities/Itinerary.js';

interface ItineraryPageProps {
  job: CompletedJob;
}

function DaySection({ day }: { day: Day }) {
  return (
    <section className="card day">
      <h2>{`Day ${day.day}: ${day.theme}`}</h2>
      <ul className="activities">
        {day.activities.map((activity, index) => (
          <li key={index}>
            <span className="time">{activity.time}</span>
            <span className="description">{activity.description}</span>
            <span className="location">{activity.location}</span>
          </li>
        ))}
      </ul>
    </section>
  );
}

export function ItineraryPage({ job }: ItineraryPageProps) {
  return (
    <Layout title={`${job.destination} itinerary`}>
      <h1>{`${job.durationDays}-day itinerary for ${job.destination}`}</h1>
      <p className="muted">
        {`Requested ${formatTimestamp(job.createdAt)}, completed ${formatTimestamp(job.completedAt)}`}
      </p>
      {job.itinerary.map((day, index) => (
        <DaySection key={index} day={day} />
      ))}
      <p>
        <a href="/">Plan another trip</a>
      </p>
    </Layout>
  );
}
