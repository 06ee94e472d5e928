import Database from 'better-sqlite3';
import { ConflictError, StorageError } from '../domain/errors.js';
import { describeError, logger } from './logger.js';

export interface ExecuteResult {
  changes: number;
  lastInsertRowid: number;
}

/**
 * SQLite database adapter
 * Owns the process-wide connection; callers only see the query helpers.
 * The schema is created by knex migrations before the adapter opens the file.
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(dbPath: string) {
    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL'); // Write-Ahead Logging for better concurrency
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('busy_timeout = 5000');
      logger.info('Database initialized', { path: dbPath });
    } catch (error) {
      throw new StorageError('Failed to initialize database', { path: dbPath, error });
    }
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      return this.db.prepare<unknown[], T>(sql).all(...params);
    } catch (error) {
      logger.error('Database query failed', { sql, ...describeError(error) });
      throw new StorageError('Query execution failed', { sql, error });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      return this.db.prepare<unknown[], T>(sql).get(...params) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, ...describeError(error) });
      throw new StorageError('QueryOne execution failed', { sql, error });
    }
  }

  /**
   * Execute an INSERT/UPDATE/DELETE statement
   * Unique-constraint violations surface as ConflictError
   */
  execute(sql: string, params: unknown[] = []): ExecuteResult {
    try {
      const result = this.db.prepare(sql).run(...params);
      return { changes: result.changes, lastInsertRowid: Number(result.lastInsertRowid) };
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        logger.warn('Database unique constraint violated', { sql, message: error.message });
        throw new ConflictError('Unique constraint violated');
      }
      logger.error('Database execute failed', { sql, ...describeError(error) });
      throw new StorageError('Execute failed', { sql, error });
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    if (!this.db.open) return;
    this.db.close();
    logger.info('Database connection closed');
  }
}
