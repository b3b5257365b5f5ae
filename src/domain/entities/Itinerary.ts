import { z, type ZodIssue } from 'zod';

/**
 * Itinerary schema - shape of a generated day-by-day plan
 * Structural checks only: day numbering, uniqueness and clock formats are not verified
 */
export const activitySchema = z.object({
  time: z.string(),
  description: z.string(),
  location: z.string(),
});

export const daySchema = z.object({
  day: z.number().int(),
  theme: z.string(),
  activities: z.array(activitySchema),
});

export const itinerarySchema = z.array(daySchema);

export type Activity = z.infer<typeof activitySchema>;
export type Day = z.infer<typeof daySchema>;

export type ItineraryValidationResult =
  | { success: true; days: Day[] }
  | { success: false; issues: string[] };

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Validates an untyped value (usually parsed JSON) against the itinerary schema.
 * Unknown keys are dropped, so the returned days are plain data.
 */
export function validateItinerary(value: unknown): ItineraryValidationResult {
  const result = itinerarySchema.safeParse(value);
  if (result.success) {
    return { success: true, days: result.data };
  }
  return { success: false, issues: result.error.issues.map(formatIssue) };
}
