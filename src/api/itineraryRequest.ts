import { z } from 'zod';
import { MAX_DURATION_DAYS, MIN_DURATION_DAYS } from '../domain/entities/Job.js';
import type { ItineraryRequest } from '../services/JobOrchestrator.js';

export const MISSING_INFORMATION = {
  title: 'Missing Information',
  message: 'Please provide both destination and duration',
} as const;

export const INVALID_DURATION = {
  title: 'Invalid Duration',
  message: `Please enter a valid number between ${MIN_DURATION_DAYS} and ${MAX_DURATION_DAYS}`,
} as const;

const missing = {
  required_error: MISSING_INFORMATION.message,
  invalid_type_error: MISSING_INFORMATION.message,
};

/**
 * Form fields arrive as strings, JSON bodies may carry a number;
 * durationDays must be a whole number in range either way
 */
const itineraryFormSchema = z.object({
  destination: z.string(missing).trim().min(1, MISSING_INFORMATION.message),
  durationDays: z.preprocess(
    (value) => (typeof value === 'number' ? String(value) : value),
    z
      .string(missing)
      .trim()
      .min(1, MISSING_INFORMATION.message)
      .regex(/^\d+$/, INVALID_DURATION.message)
      .transform(Number)
      .pipe(
        z
          .number()
          .int(INVALID_DURATION.message)
          .min(MIN_DURATION_DAYS, INVALID_DURATION.message)
          .max(MAX_DURATION_DAYS, INVALID_DURATION.message)
      )
  ),
});

export type ItineraryFormResult =
  | { ok: true; value: ItineraryRequest }
  | { ok: false; title: string; message: string };

/**
 * Validates the submitted form. Missing fields take precedence over a bad duration.
 */
export function parseItineraryForm(body: unknown): ItineraryFormResult {
  const result = itineraryFormSchema.safeParse(body ?? {});
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const isMissing = result.error.issues.some(
    (issue) => issue.message === MISSING_INFORMATION.message
  );
  return { ok: false, ...(isMissing ? MISSING_INFORMATION : INVALID_DURATION) };
}
