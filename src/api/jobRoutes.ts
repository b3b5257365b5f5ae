import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { JobService } from '../services/JobService.js';
import { mapJobToResponse } from './jobMapper.js';

/**
 * JSON job status route handler, for clients that poll without rendering pages
 */
export function createJobRouter(jobService: JobService): Router {
  const router = Router();

  /**
   * GET /api/itineraries/:jobId
   */
  router.get('/:jobId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = jobService.getJob(req.params.jobId);
      res.json(mapJobToResponse(job));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
