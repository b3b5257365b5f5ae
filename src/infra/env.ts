import { z, ZodError } from 'zod';

/**
 * Environment variable schema with strict validation
 * Every setting the process reads is declared here with its default
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(8080),

  // OpenAI Chat Completions
  OPENAI_API_KEY: z.string().regex(/^sk-/, { message: 'OPENAI_API_KEY must start with sk-' }),
  OPENAI_BASE_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional()
  ),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

  // Background generation
  GENERATION_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .min(1000, { message: 'GENERATION_TIMEOUT_MS must be at least 1000' })
    .default(120000),
  GENERATION_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1, { message: 'GENERATION_CONCURRENCY must be at least 1' })
    .default(4),
  GENERATION_QUEUE_LIMIT: z.coerce.number().int().min(0).default(100),

  // Job store
  SQLITE_DB_PATH: z.string().min(1).default('./data/itineraries.db'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // Stuck job sweep
  JOB_TIMEOUT_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'JOB_TIMEOUT_MINUTES must be at least 1' })
    .default(30),
  JOB_TIMEOUT_CHECK_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'JOB_TIMEOUT_CHECK_INTERVAL_MINUTES must be at least 1' })
    .default(5),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses environment variables, throwing ZodError on invalid input
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return parseEnv(source);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
