import type { AIAdapter } from '../infra/ai/AIAdapter.js';
import { validateItinerary, type Day } from '../domain/entities/Itinerary.js';
import {
  GenerationError,
  GenerationFailedError,
  ItineraryParseError,
  ItineraryValidationError,
} from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export const SYSTEM_PROMPT = 'You are a professional travel planner.';
export const MAX_OUTPUT_TOKENS = 2000;

const EXAMPLE_ITINERARY: Day[] = [
  {
    day: 1,
    theme: 'Cultural Exploration',
    activities: [
      {
        time: '9:00 AM',
        description: 'Visit local museum',
        location: 'National Museum of History',
      },
      {
        time: '1:00 PM',
        description: 'Lunch at traditional restaurant',
        location: 'Old Town Cafe',
      },
    ],
  },
];

export function buildItineraryPrompt(destination: string, durationDays: number): string {
  return [
    `Generate a detailed ${durationDays}-day travel itinerary to ${destination}.`,
    'Include diverse activities with specific locations and times.',
    '',
    'Output must be in this EXACT JSON format:',
    JSON.stringify(EXAMPLE_ITINERARY, null, 2),
  ].join('\n');
}

/**
 * Slice from the first '[' to the last ']' (inclusive), tolerating prose or
 * code fences around the array. Returns null when there is no such pair.
 */
export function extractJsonArray(content: string): string | null {
  const start = content.indexOf('[');
  const end = content.lastIndexOf(']');
  if (start === -1 || end < start) {
    return null;
  }
  return content.slice(start, end + 1);
}

/**
 * Turns raw model text into validated days
 * @throws ItineraryParseError when no JSON array can be read
 * @throws ItineraryValidationError when the array does not match the schema
 */
export function parseItineraryResponse(content: string): Day[] {
  const candidate = extractJsonArray(content);
  if (candidate === null) {
    logger.error('No JSON array in model response', {
      responseLength: content.length,
      response: content,
    });
    throw new ItineraryParseError({ reason: 'no bracketed array found' });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    logger.error('Invalid JSON format from model', {
      message: error instanceof Error ? error.message : String(error),
    });
    throw new ItineraryParseError({
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const result = validateItinerary(parsed);
  if (!result.success) {
    logger.error('Itinerary validation failed', { issues: result.issues });
    throw new ItineraryValidationError(result.issues);
  }
  return result.days;
}

/**
 * ItineraryGenerator - destination and duration in, validated days out
 */
export class ItineraryGenerator {
  constructor(private ai: AIAdapter) {}

  async generate(destination: string, durationDays: number): Promise<Day[]> {
    try {
      const content = await this.ai.completion({
        instructions: SYSTEM_PROMPT,
        input: buildItineraryPrompt(destination, durationDays),
        maxOutputTokens: MAX_OUTPUT_TOKENS,
      });

      const days = parseItineraryResponse(content);
      logger.info('Itinerary generated', {
        backend: this.ai.getBackendName(),
        destination,
        durationDays,
        days: days.length,
      });
      return days;
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new GenerationFailedError(reason, { backend: this.ai.getBackendName() });
    }
  }
}
