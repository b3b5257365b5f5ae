import type { Request, Response, NextFunction } from 'express';
import { isAppError, NotFoundError, type AppError } from '../domain/errors.js';
import { logger, redactSecrets } from '../infra/logger.js';
import type { Env } from '../infra/env.js';
import { renderPage } from '../views/render.js';
import { ErrorPage } from '../views/ErrorPage.js';

const GENERIC_SERVER_MESSAGE = 'An unexpected error occurred while processing your request';

function wantsJson(req: Request): boolean {
  return req.path.startsWith('/api/') || req.originalUrl.startsWith('/api/');
}

function describeAppError(err: AppError): { title: string; message: string } {
  if (err instanceof NotFoundError) {
    return {
      title: `${err.resource} Not Found`,
      message: `No ${err.resource.toLowerCase()} found with ID: ${err.id}`,
    };
  }
  if (err.statusCode === 503) {
    return { title: 'Service Busy', message: err.message };
  }
  if (err.statusCode >= 500) {
    return { title: 'Server Error', message: GENERIC_SERVER_MESSAGE };
  }
  return { title: 'Request Error', message: err.message };
}

/**
 * Global error handler middleware
 * Maps domain errors to HTTP status codes; JSON under /api, an error page elsewhere
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    };

    if (isAppError(err)) {
      logger.log(err.statusCode >= 500 ? 'error' : 'warn', 'Application error', {
        code: err.code,
        message: err.message,
        details: redactSecrets(err.details),
        stack: env.NODE_ENV === 'development' ? err.stack : undefined,
        ...context,
      });

      if (wantsJson(req)) {
        res.status(err.statusCode).json({
          error: err.code,
          message: err.message,
          ...(err.details && err.statusCode < 500 ? { details: redactSecrets(err.details) } : {}),
        });
        return;
      }

      const { title, message } = describeAppError(err);
      res.status(err.statusCode).send(renderPage(<ErrorPage title={title} message={message} />));
      return;
    }

    logger.error('Unexpected error', {
      message: err.message,
      name: err.name,
      stack: err.stack,
      ...context,
    });

    const message = env.NODE_ENV === 'development' ? err.message : GENERIC_SERVER_MESSAGE;
    if (wantsJson(req)) {
      res.status(500).json({ error: 'INTERNAL_SERVER_ERROR', message });
      return;
    }
    res.status(500).send(renderPage(<ErrorPage title="Server Error" message={message} />));
  };
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  if (wantsJson(req)) {
    res.status(404).json({
      error: 'NOT_FOUND',
      message: 'The requested resource was not found',
    });
    return;
  }
  res
    .status(404)
    .send(
      renderPage(
        <ErrorPage title="Page Not Found" message="The requested page does not exist" />
      )
    );
}
