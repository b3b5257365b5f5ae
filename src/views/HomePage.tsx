import { Layout } from './Layout.js';
import { MAX_DURATION_DAYS, MIN_DURATION_DAYS } from '../domain/entities/Job.js';

export function HomePage() {
  return (
    <Layout title="Plan a trip">
      <h1>Plan your next trip</h1>
      <form className="card" method="post" action="/generate">
        <label htmlFor="destination">Destination</label>
        <input id="destination" name="destination" type="text" placeholder="Paris" required />

        <label htmlFor="durationDays">Duration (days)</label>
        <input
          id="durationDays"
          name="durationDays"
          type="number"
          min={MIN_DURATION_DAYS}
          max={MAX_DURATION_DAYS}
          defaultValue={3}
          required
        />

        <button type="submit">Generate itinerary</button>
      </form>
    </Layout>
  );
}
