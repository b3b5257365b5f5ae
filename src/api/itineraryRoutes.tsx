import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { JobService } from '../services/JobService.js';
import type { JobOrchestrator } from '../services/JobOrchestrator.js';
import { parseItineraryForm } from './itineraryRequest.js';
import { renderPage } from '../views/render.js';
import { HomePage } from '../views/HomePage.js';
import { ErrorPage } from '../views/ErrorPage.js';
import { ProcessingPage } from '../views/ProcessingPage.js';
import { ItineraryPage } from '../views/ItineraryPage.js';
import { logger } from '../infra/logger.js';

/**
 * Page routes: submission form, job creation and the status page
 * Delegates job work to the services; only picks the view
 */
export function createItineraryRouter(
  jobService: JobService,
  jobOrchestrator: JobOrchestrator
): Router {
  const router = Router();

  /**
   * GET /
   */
  router.get('/', (_req: Request, res: Response) => {
    res.send(renderPage(<HomePage />));
  });

  /**
   * GET /generate - the form posts here; a plain visit goes back to it
   */
  router.get('/generate', (_req: Request, res: Response) => {
    res.redirect('/');
  });

  /**
   * POST /generate
   */
  router.post('/generate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const form = parseItineraryForm(req.body);
      if (!form.ok) {
        logger.info('Rejected itinerary request', { reason: form.title });
        res.status(200).send(renderPage(<ErrorPage title={form.title} message={form.message} />));
        return;
      }

      const job = jobOrchestrator.startItineraryJob(form.value);
      res.redirect(`/itineraries/${encodeURIComponent(job.jobId)}`);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /itineraries/:jobId
   */
  router.get('/itineraries/:jobId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = jobService.getJob(req.params.jobId);

      switch (job.status) {
        case 'processing':
          res.send(renderPage(<ProcessingPage job={job} />));
          return;
        case 'completed':
          res.send(renderPage(<ItineraryPage job={job} />));
          return;
        case 'failed':
          res.send(renderPage(<ErrorPage title="Generation Failed" message={job.error} />));
          return;
      }
    } catch (error) {
      next(error);
    }
  });

  return router;
}
