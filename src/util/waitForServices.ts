/**
 * Wait for Services Utility
 *
 * Blocks until PostgreSQL accepts connections. The fetch command is started
 * by a scheduler that may fire while the database container is still booting.
 */

import pg from 'pg';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { HEALTH_CHECK } from '../core/constants.js';
import { DatabaseError, toError } from '../errors/index.js';
import { sleep } from './date.js';

async function probe(pool: pg.Pool): Promise<void> {
  const client = await pool.connect();
  try {
    await client.query('SELECT 1');
  } finally {
    client.release();
  }
}

/**
 * Probes the database with a throwaway single-connection pool
 *
 * @throws DatabaseError once HEALTH_CHECK.MAX_RETRIES probes have failed
 */
export async function waitForDatabase(): Promise<void> {
  const { host, port, database } = cfg.database;
  logger.info({ host, port, database }, 'Waiting for PostgreSQL to be ready...');

  const pool = new pg.Pool({
    host,
    port,
    database,
    user: cfg.database.user,
    password: cfg.database.password,
    ssl: cfg.database.ssl,
    connectionTimeoutMillis: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
    max: 1
  });

  try {
    for (let attempt = 1; ; attempt++) {
      try {
        await probe(pool);
        logger.info({ attempt }, 'PostgreSQL is ready');
        return;
      } catch (err) {
        if (attempt >= HEALTH_CHECK.MAX_RETRIES) {
          throw new DatabaseError(
            `PostgreSQL not reachable after ${attempt} attempts: ${toError(err).message}`,
            'health check',
            toError(err)
          );
        }
        logger.debug({ attempt, maxRetries: HEALTH_CHECK.MAX_RETRIES }, 'PostgreSQL not ready, retrying...');
        await sleep(HEALTH_CHECK.RETRY_DELAY_MS);
      }
    }
  } finally {
    await pool.end();
  }
}
