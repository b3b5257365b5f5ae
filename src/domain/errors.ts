/**
 * Application error types
 * Each error type maps to a specific HTTP status code and client action
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Itinerary generation errors (502 Bad Gateway)
 * Never surfaced over HTTP directly: the orchestrator records them on the job
 */
export class GenerationError extends AppError {
  constructor(message: string, code: string, details?: unknown) {
    super(message, code, 502, details);
  }
}

/**
 * The model response held no parseable JSON array
 */
export class ItineraryParseError extends GenerationError {
  constructor(details?: unknown) {
    super('Failed to parse itinerary data', 'ITINERARY_PARSE_ERROR', details);
  }
}

/**
 * A JSON array was found but does not match the itinerary schema
 */
export class ItineraryValidationError extends GenerationError {
  constructor(public readonly issues: string[]) {
    super(
      issues.length > 0
        ? `Invalid itinerary structure: ${issues[0]}`
        : 'Invalid itinerary structure',
      'ITINERARY_VALIDATION_ERROR',
      { issues }
    );
  }
}

/**
 * Any other failure of the generation call or its response
 */
export class GenerationFailedError extends GenerationError {
  constructor(reason: string, details?: unknown) {
    super(`Failed to generate itinerary: ${reason}`, 'GENERATION_FAILED', details);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Validation errors from user input or illegal state changes (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(
    public readonly resource: string,
    public readonly id: string
  ) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Background capacity exhausted (503 Service Unavailable)
 */
export class ServiceUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'SERVICE_UNAVAILABLE', 503, details);
  }
}

/**
 * Configuration errors - fail fast on startup (500 Internal Server Error)
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', 500, details);
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
