import type { AIAdapter, CompletionOptions } from '../../src/infra/ai/AIAdapter.js';
import { DatabaseAdapter } from '../../src/infra/DatabaseAdapter.js';
import { JobRepository } from '../../src/infra/repositories/JobRepository.js';
import { JobService } from '../../src/services/JobService.js';
import { JobQueue } from '../../src/services/JobQueue.js';
import { ItineraryGenerator } from '../../src/services/ItineraryGenerator.js';
import { JobOrchestrator } from '../../src/services/JobOrchestrator.js';
import type { Day } from '../../src/domain/entities/Itinerary.js';

type Responder = (options: CompletionOptions) => Promise<string>;

/**
 * In-process stand-in for the generation API
 */
export class FakeAIAdapter implements AIAdapter {
  readonly calls: CompletionOptions[] = [];

  constructor(private responder: Responder) {}

  static replying(content: string): FakeAIAdapter {
    return new FakeAIAdapter(async () => content);
  }

  static failing(error: Error): FakeAIAdapter {
    return new FakeAIAdapter(async () => {
      throw error;
    });
  }

  async completion(options: CompletionOptions): Promise<string> {
    this.calls.push(options);
    return this.responder(options);
  }

  getBackendName(): string {
    return 'fake';
  }
}

export function makeDays(count: number): Day[] {
  return Array.from({ length: count }, (_, index) => ({
    day: index + 1,
    theme: `Theme ${index + 1}`,
    activities: [
      { time: '9:00 AM', description: `Morning ${index + 1}`, location: `Place ${index + 1}` },
    ],
  }));
}

export function createTestContext(
  ai: AIAdapter,
  queueOptions: { concurrency: number; maxPending: number } = { concurrency: 2, maxPending: 10 }
) {
  const db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
  const jobRepo = new JobRepository(db);
  const jobService = new JobService(jobRepo);
  const queue = new JobQueue(queueOptions);
  const generator = new ItineraryGenerator(ai);
  const jobOrchestrator = new JobOrchestrator(jobService, generator, queue);
  return { db, jobRepo, jobService, queue, generator, jobOrchestrator };
}
