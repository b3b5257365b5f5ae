import winston from 'winston';
import type { Env } from './env.js';

const REDACTED = '***REDACTED***';

/** Model output can be several kilobytes; logs keep the head of it */
const MAX_LOGGED_STRING = 1000;

// Capture group 1, where present, is the secret part of the match
const SECRET_PATTERNS: RegExp[] = [
  /sk-[a-zA-Z0-9_-]{20,}/g,
  /Bearer\s+([a-zA-Z0-9._~+/=-]+)/g,
  /api[_-]?key[=:]\s*["']?([^"'\s]+)/gi,
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
];

// Compared after lowercasing and dropping '_' and '-'
const SECRET_KEYS = new Set(['apikey', 'openaiapikey', 'authorization', 'password', 'secret', 'token']);

const isSecretKey = (key: string): boolean =>
  SECRET_KEYS.has(key.toLowerCase().replace(/[_-]/g, ''));

function redactString(value: string): string {
  const redacted = SECRET_PATTERNS.reduce(
    (text, pattern) =>
      text.replace(pattern, (match: string, secret?: string) =>
        typeof secret === 'string' ? match.replace(secret, REDACTED) : REDACTED
      ),
    value
  );
  if (redacted.length <= MAX_LOGGED_STRING) return redacted;
  return `${redacted.slice(0, MAX_LOGGED_STRING)}... [${redacted.length - MAX_LOGGED_STRING} more chars]`;
}

/**
 * Strips API keys and credentials from anything about to be logged or echoed
 * back to a client. Errors collapse to their name and message.
 */
export function redactSecrets(value: unknown): unknown {
  if (typeof value === 'string') return redactString(value);
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, field]) => [
        key,
        isSecretKey(key) ? REDACTED : redactSecrets(field),
      ])
    );
  }
  return value;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key !== 'level') info[key] = redactSecrets(info[key]);
  }
  return info;
})();

const consoleLine = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const fields = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level} ${String(message)}${fields}`;
});

/**
 * Console in every environment; production also appends JSON lines to LOG_FILE
 */
export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format:
        env.NODE_ENV === 'production'
          ? winston.format.json()
          : winston.format.combine(winston.format.colorize(), consoleLine),
    }),
  ];

  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(new winston.transports.File({ filename: env.LOG_FILE }));
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(
      winston.format.errors({ stack: true }),
      redactFormat,
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Replaced by server.ts once the environment is validated; silent until then
 */
export let logger: winston.Logger = winston.createLogger({ silent: true });

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
