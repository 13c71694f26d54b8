/**
 * Database Migration Runner
 *
 * Applies the SQL files in src/db/migrations in name order, each at most once,
 * recording applied files in a _migrations table.
 */

import { readdirSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { db, closeDatabase } from './client.js';
import { logger } from '../core/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Resolves the migrations directory
 *
 * SQL files are not copied by tsc, so from dist/db/ we read them from the
 * source tree under the working directory.
 */
function migrationsDir(): string {
  const isDist = __dirname.includes('/dist/');
  return isDist ? join(process.cwd(), 'src/db/migrations') : join(__dirname, 'migrations');
}

/**
 * Runs all pending migration files in order
 */
export async function runMigrations(): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await db.query<{ name: string }>('SELECT name FROM _migrations ORDER BY id');
  const appliedSet = new Set(applied.rows.map((r) => r.name));

  const dir = migrationsDir();
  const migrations = readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const migrationFile of migrations) {
    if (appliedSet.has(migrationFile)) {
      logger.debug({ migration: migrationFile }, 'Migration already applied');
      continue;
    }

    const sql = readFileSync(join(dir, migrationFile), 'utf-8');
    const client = await db.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO _migrations (name) VALUES ($1)', [migrationFile]);
      await client.query('COMMIT');
      logger.info({ migration: migrationFile }, 'Migration applied successfully');
    } catch (err) {
      await client.query('ROLLBACK');
      logger.error({ err, migration: migrationFile }, 'Failed to run migration');
      throw err;
    } finally {
      client.release();
    }
  }

  logger.info('All database migrations completed successfully');
}

// Run migrations if this file is executed directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  runMigrations()
    .then(async () => {
      await closeDatabase();
      process.exit(0);
    })
    .catch((err: unknown) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
