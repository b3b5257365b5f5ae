import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from '../../../src/infra/env.js';

describe('parseEnv', () => {
  it('applies defaults when only the API key is set', () => {
    const env = parseEnv({ OPENAI_API_KEY: 'sk-test' });

    expect(env).toEqual({
      NODE_ENV: 'development',
      PORT: 8080,
      OPENAI_API_KEY: 'sk-test',
      OPENAI_BASE_URL: undefined,
      OPENAI_MODEL: 'gpt-4o',
      OPENAI_TEMPERATURE: 0.7,
      GENERATION_TIMEOUT_MS: 120000,
      GENERATION_CONCURRENCY: 4,
      GENERATION_QUEUE_LIMIT: 100,
      SQLITE_DB_PATH: './data/itineraries.db',
      LOG_LEVEL: 'info',
      LOG_FILE: undefined,
      JOB_TIMEOUT_MINUTES: 30,
      JOB_TIMEOUT_CHECK_INTERVAL_MINUTES: 5,
    });
  });

  it('coerces numeric settings from strings', () => {
    const env = parseEnv({
      OPENAI_API_KEY: 'sk-test',
      PORT: '3001',
      OPENAI_TEMPERATURE: '0.2',
      GENERATION_CONCURRENCY: '8',
    });

    expect(env.PORT).toBe(3001);
    expect(env.OPENAI_TEMPERATURE).toBe(0.2);
    expect(env.GENERATION_CONCURRENCY).toBe(8);
  });

  it('treats an empty base URL as unset', () => {
    const env = parseEnv({ OPENAI_API_KEY: 'sk-test', OPENAI_BASE_URL: '' });
    expect(env.OPENAI_BASE_URL).toBeUndefined();
  });

  it('requires an API key', () => {
    expect(() => parseEnv({})).toThrow(ZodError);
  });

  it('rejects a temperature above 2', () => {
    expect(() => parseEnv({ OPENAI_API_KEY: 'sk-test', OPENAI_TEMPERATURE: '2.5' })).toThrow(
      ZodError
    );
  });

  it('rejects a zero concurrency', () => {
    expect(() => parseEnv({ OPENAI_API_KEY: 'sk-test', GENERATION_CONCURRENCY: '0' })).toThrow(
      'GENERATION_CONCURRENCY must be at least 1'
    );
  });
});
