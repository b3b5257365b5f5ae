import express from 'express';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Express, Request, Response, NextFunction } from 'express';
import type { Env } from './infra/env.js';
import type { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import type { JobService } from './services/JobService.js';
import type { JobOrchestrator } from './services/JobOrchestrator.js';
import type { JobQueue } from './services/JobQueue.js';
import { createApiRouter } from './api/index.js';
import { createItineraryRouter } from './api/itineraryRoutes.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { logger } from './infra/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface AppDependencies {
  env: Pick<Env, 'NODE_ENV'>;
  db: DatabaseAdapter;
  jobService: JobService;
  jobOrchestrator: JobOrchestrator;
  queue: JobQueue;
}

/**
 * Builds the Express application; the entry point owns every dependency
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());
  app.use(express.static(path.resolve(__dirname, '../public')));

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  // Liveness
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'healthy' });
  });

  // Readiness: store answers, queue stats for observability
  app.get('/ready', (_req: Request, res: Response) => {
    try {
      if (!deps.db.ping()) {
        res.status(503).json({ status: 'not-ready' });
        return;
      }
      res.json({ status: 'ready', queue: deps.queue.stats() });
    } catch (error) {
      logger.warn('Readiness check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(503).json({ status: 'not-ready' });
    }
  });

  app.use('/api', createApiRouter({ jobService: deps.jobService }));
  app.use(createItineraryRouter(deps.jobService, deps.jobOrchestrator));

  app.use(notFoundHandler);
  app.use(createErrorHandler(deps.env));

  return app;
}
