import { Router } from 'express';
import cors from 'cors';
import { createJobRouter } from './jobRoutes.js';
import type { JobService } from '../services/JobService.js';

/**
 * JSON API router, mounted under /api
 * Dependencies injected from app.ts
 */
export function createApiRouter(deps: { jobService: JobService }): Router {
  const router = Router();

  router.use(cors());
  router.use('/itineraries', createJobRouter(deps.jobService));

  return router;
}
