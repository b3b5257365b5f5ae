import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DatabaseError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const IN_MEMORY = ':memory:';
const BUSY_TIMEOUT_MS = 5000;

type Operation = 'query' | 'queryOne' | 'execute';

/**
 * SQLite store for job documents.
 * Opened once by the entry point; repositories receive it by injection.
 */
export class DatabaseAdapter {
  private readonly db: Database.Database;
  private readonly statements = new Map<string, Database.Statement>();

  constructor(env: Pick<Env, 'SQLITE_DB_PATH'>) {
    const location = env.SQLITE_DB_PATH;
    try {
      if (location !== IN_MEMORY) {
        mkdirSync(dirname(location), { recursive: true });
      }
      this.db = new Database(location);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      this.db.exec(readFileSync(join(__dirname, 'db', 'schema.sql'), 'utf-8'));
    } catch (error) {
      throw new DatabaseError('Failed to open job store', { location, error });
    }
    logger.info('Job store ready', { location });
  }

  query<T>(sql: string, params: unknown[] = []): T[] {
    return this.run('query', sql, (stmt) => stmt.all(...params) as T[]);
  }

  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    return this.run('queryOne', sql, (stmt) => (stmt.get(...params) as T | undefined) ?? null);
  }

  /**
   * Runs a write and returns the number of rows it changed
   */
  execute(sql: string, params: unknown[] = []): number {
    return this.run('execute', sql, (stmt) => stmt.run(...params).changes);
  }

  ping(): boolean {
    return this.queryOne<{ ok: number }>('SELECT 1 AS ok')?.ok === 1;
  }

  close(): void {
    this.statements.clear();
    this.db.close();
    logger.info('Job store closed');
  }

  private run<R>(operation: Operation, sql: string, fn: (stmt: Database.Statement) => R): R {
    try {
      return fn(this.prepare(sql));
    } catch (error) {
      logger.error('Job store operation failed', { operation, sql, error });
      throw new DatabaseError(`Job store ${operation} failed`, { sql, error });
    }
  }

  private prepare(sql: string): Database.Statement {
    let stmt = this.statements.get(sql);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.statements.set(sql, stmt);
    }
    return stmt;
  }
}
