import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { OpenAIAdapter } from './infra/OpenAIAdapter.js';
import { JobRepository } from './infra/repositories/JobRepository.js';
import { ItineraryGenerator } from './services/ItineraryGenerator.js';
import { JobService } from './services/JobService.js';
import { JobQueue } from './services/JobQueue.js';
import { JobOrchestrator } from './services/JobOrchestrator.js';
import { JobTimeoutService } from './services/JobTimeoutService.js';
import { startTimeoutScheduler } from './scheduler/JobTimeoutScheduler.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// Infrastructure adapters, owned by this entry point and injected below
const db = new DatabaseAdapter(env);
const openai = new OpenAIAdapter(env);

// Repositories
const jobRepo = new JobRepository(db);

// Services
const generator = new ItineraryGenerator(openai);
const jobService = new JobService(jobRepo);
const queue = new JobQueue({
  concurrency: env.GENERATION_CONCURRENCY,
  maxPending: env.GENERATION_QUEUE_LIMIT,
});
const jobOrchestrator = new JobOrchestrator(jobService, generator, queue);
const timeoutService = new JobTimeoutService(jobRepo, jobService);

const app = createApp({ env, db, jobService, jobOrchestrator, queue });

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    model: env.OPENAI_MODEL,
    concurrency: env.GENERATION_CONCURRENCY,
  });
});

const timeoutScheduler = startTimeoutScheduler(env, timeoutService);

// Graceful shutdown: stop accepting requests, let running generations finish
const shutdown = (signal: string): void => {
  loggerInstance.info(`${signal} received, shutting down gracefully`, queue.stats());
  timeoutScheduler.stop();
  server.close(() => {
    queue
      .onIdle()
      .then(() => {
        db.close();
        loggerInstance.info('Server closed');
        process.exit(0);
      })
      .catch((error: unknown) => {
        loggerInstance.error('Shutdown failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app };
