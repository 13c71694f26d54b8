/**
 * Application Service
 *
 * Wires the command line to the pipeline: waits for the database, applies
 * migrations on request, runs each date, prints summaries and picks the exit
 * code.
 */

import { logger } from '../core/logger.js';
import { cfg } from '../core/config.js';
import { parseArgs, USAGE } from '../cli/args.js';
import type { FetchArgs } from '../cli/args.js';
import { formatSummary } from '../cli/summary.js';
import { ValidationError } from '../errors/index.js';
import { createNhlClient } from '../http/nhlApiClient.js';
import { pgStore } from '../db/pgStore.js';
import { runMigrations } from '../db/migrate.js';
import { waitForDatabase } from '../util/waitForServices.js';
import { resolveRunDate, runFetches } from './pipeline.js';

/**
 * Exit codes of the fetch command
 */
export const EXIT = {
  OK: 0,
  RUN_FAILED: 1,
  BAD_ARGUMENTS: 2
} as const;

/**
 * Runs the fetch command
 *
 * @param argv - Arguments after the script name
 * @returns Process exit code: 0 when every date succeeded (zero-game days
 *   included), 1 when any run failed, 2 on bad arguments
 */
export async function runApp(argv: string[]): Promise<number> {
  let args: FetchArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    process.stderr.write(`${err.message}\n\n${USAGE}`);
    return EXIT.BAD_ARGUMENTS;
  }

  if (args.help) {
    process.stdout.write(USAGE);
    return EXIT.OK;
  }

  await waitForDatabase();

  if (args.migrate) {
    await runMigrations();
  }

  const dates = args.dates.length > 0 ? args.dates : [resolveRunDate()];
  const client = createNhlClient({ baseUrl: cfg.nhlApi.baseUrl, timeoutMs: cfg.nhlApi.timeoutMs });
  const summaries = await runFetches({ store: pgStore, client }, dates, { force: args.force });

  for (const summary of summaries) {
    process.stdout.write(`${formatSummary(summary)}\n`);
  }

  const failed = summaries.filter((s) => !s.success).length;
  if (failed > 0) {
    logger.warn({ failed, total: summaries.length }, 'Some fetch runs failed');
    return EXIT.RUN_FAILED;
  }
  return EXIT.OK;
}
