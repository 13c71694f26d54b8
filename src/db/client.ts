/**
 * Database Client Module
 *
 * Creates and exports a PostgreSQL connection pool.
 * Handles connection events and errors for monitoring.
 */

import pg from 'pg';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { DatabaseError, StorageConstraintError, toError } from '../errors/index.js';
import { PG_ERROR_CODES } from '../core/constants.js';

/**
 * PostgreSQL connection pool
 *
 * Connections are opened lazily on the first query.
 */
export const db = new pg.Pool({
  host: cfg.database.host,
  port: cfg.database.port,
  user: cfg.database.user,
  password: cfg.database.password,
  database: cfg.database.database,
  ssl: cfg.database.ssl,
  max: cfg.database.max,
  idleTimeoutMillis: cfg.database.idleTimeoutMillis,
  connectionTimeoutMillis: cfg.database.connectionTimeoutMillis
});

// Log connection events for monitoring
db.on('connect', () => {
  logger.debug('Database client connected');
});

db.on('error', (err: Error) => {
  logger.error({ err }, 'Database pool error');
});

/**
 * Wraps a pg failure, surfacing constraint violations as StorageConstraintError
 *
 * @param err - Whatever the query threw
 * @param operation - Repository operation name, used in logs and messages
 */
export function toStorageError(err: unknown, operation: string): DatabaseError {
  const error = toError(err);
  if (err instanceof pg.DatabaseError) {
    if (err.code === PG_ERROR_CODES.UNIQUE_VIOLATION) {
      return new StorageConstraintError(
        `Unique constraint ${err.constraint ?? 'unknown'} violated in ${operation}`,
        operation,
        'unique',
        error
      );
    }
    if (err.code === PG_ERROR_CODES.FOREIGN_KEY_VIOLATION) {
      return new StorageConstraintError(
        `Foreign key ${err.constraint ?? 'unknown'} violated in ${operation}`,
        operation,
        'foreign_key',
        error
      );
    }
  }
  return new DatabaseError(`Failed to ${operation}: ${error.message}`, operation, error);
}

/**
 * Closes all pooled database connections
 */
export async function closeDatabase(): Promise<void> {
  await db.end();
  logger.info('Database connections closed');
}
