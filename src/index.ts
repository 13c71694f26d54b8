#!/usr/bin/env node
/**
 * NHL Score Ingest - Main Entry Point
 *
 * Fetches the NHL scoreboard for the requested date(s), reconciles games,
 * teams, venues and broadcasts into PostgreSQL, and records one audit row per
 * attempt. Meant to be started by cron or a systemd timer; exits when done.
 */

import { logger } from './core/logger.js';
import { closeDatabase } from './db/client.js';
import { runApp } from './services/app.js';

runApp(process.argv.slice(2))
  .then(async (code) => {
    await closeDatabase();
    process.exit(code);
  })
  .catch(async (err: unknown) => {
    logger.error({ err }, 'Fatal error occurred');
    await closeDatabase().catch((closeErr: unknown) => {
      logger.warn({ err: closeErr }, 'Error closing database connections');
    });
    process.exit(1);
  });
