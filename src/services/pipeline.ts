/**
 * Pipeline Driver
 *
 * Runs one ingestion per requested date:
 *
 *   client.fetchScores -> normalizeScores -> reconcile -> logAttempt
 *
 * A client failure (after any configured retries) skips normalization and
 * reconciliation. Whatever happens, exactly one fetch attempt is logged per
 * date.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { InvalidResponseError, NetworkError, TimeoutError, ValidationError, toError } from '../errors/index.js';
import { normalizeScores } from './normalizer.js';
import { reconcile } from './reconciler.js';
import { logAttempt } from './attemptLogger.js';
import { dateInTimeZone, sleep } from '../util/date.js';
import { isValidDateISO } from '../util/validation.js';
import type { ScoreClient, ScoreFetch } from '../http/nhlApiClient.js';
import type { ScoreStore } from '../db/store.js';

export interface PipelineDeps {
  store: ScoreStore;
  client: ScoreClient;
}

export interface RunOptions {
  /** YYYY-MM-DD; defaults to FETCH_DATE, then today in FETCH_TIMEZONE */
  date?: string;
  force?: boolean;
  /** Extra fetch attempts after a transient failure */
  retries?: number;
  retryDelayMs?: number;
}

export interface RunSummary {
  date: string;
  url: string;
  success: boolean;
  force: boolean;
  inserted: number;
  updated: number;
  skipped: number;
  errored: number;
  gamesProcessed: number;
  /** Per-record errors, from normalization and reconciliation */
  errors: string[];
  /** Run-level cause when `success` is false */
  error: string | null;
  attemptId: number | null;
}

/**
 * Resolves the date to fetch when none was given
 */
export function resolveRunDate(date?: string): string {
  return date || cfg.fetch.date || dateInTimeZone(cfg.fetch.timeZone);
}

/**
 * Connection problems, timeouts and 5xx answers are worth another try
 */
function isRetryable(err: unknown): boolean {
  if (err instanceof NetworkError || err instanceof TimeoutError) return true;
  return err instanceof InvalidResponseError && err.statusCode >= 500;
}

async function fetchWithRetry(
  client: ScoreClient,
  date: string,
  retries: number,
  retryDelayMs: number
): Promise<ScoreFetch> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await client.fetchScores(date);
    } catch (err) {
      if (attempt >= retries || !isRetryable(err)) throw err;
      logger.warn({ err, date, attempt: attempt + 1, retries }, 'Scoreboard fetch failed, retrying');
      await sleep(retryDelayMs);
    }
  }
}

function attemptMessage(summary: RunSummary): string | null {
  if (summary.error !== null) return summary.error;
  if (summary.errors.length === 0) return null;
  return `${summary.errors.length} record error(s): ${summary.errors.join('; ')}`;
}

/**
 * Fetches and ingests one date
 *
 * Never throws; the returned summary carries the outcome.
 */
export async function runFetch(deps: PipelineDeps, options: RunOptions = {}): Promise<RunSummary> {
  const date = resolveRunDate(options.date);
  const force = options.force ?? false;
  const summary: RunSummary = {
    date,
    url: '',
    success: false,
    force,
    inserted: 0,
    updated: 0,
    skipped: 0,
    errored: 0,
    gamesProcessed: 0,
    errors: [],
    error: null,
    attemptId: null
  };

  logger.info({ date, force }, 'Fetching NHL scores');

  try {
    if (!isValidDateISO(date)) {
      throw new ValidationError(`Invalid date format: ${date}. Expected YYYY-MM-DD`, 'date');
    }
    summary.url = deps.client.scoreUrl(date);

    const fetched = await fetchWithRetry(
      deps.client,
      date,
      options.retries ?? cfg.fetch.retries,
      options.retryDelayMs ?? cfg.fetch.retryDelayMs
    );

    const normalized = normalizeScores(fetched.payload);
    if (normalized.currentDate !== null && normalized.currentDate !== date) {
      logger.warn({ requestedDate: date, currentDate: normalized.currentDate }, 'Scoreboard date differs from requested date');
    }
    if (normalized.games.length === 0 && normalized.errors.length === 0) {
      logger.warn({ date }, 'No games found');
    }
    summary.errors.push(...normalized.errors.map((e) => e.message));

    const result = await reconcile(deps.store, normalized, { force });
    summary.inserted = result.inserted;
    summary.updated = result.updated;
    summary.skipped = result.skipped;
    summary.errors.push(...result.errors);
    summary.success = true;
  } catch (err) {
    const error = toError(err);
    summary.error = error.message;
    logger.error({ err: error, date, url: summary.url }, 'Fetch run failed');
  }

  summary.errored = summary.errors.length;
  summary.gamesProcessed = summary.inserted + summary.updated;

  const attempt = await logAttempt(deps.store, {
    requestedDate: date,
    sourceUrl: summary.url,
    success: summary.success,
    gamesProcessed: summary.gamesProcessed,
    errorMessage: attemptMessage(summary)
  });
  summary.attemptId = attempt?.id ?? null;

  logger.info(
    {
      date,
      success: summary.success,
      inserted: summary.inserted,
      updated: summary.updated,
      skipped: summary.skipped,
      errored: summary.errored
    },
    'Fetch run finished'
  );

  return summary;
}

/**
 * Runs each date in turn; one attempt is logged per date
 */
export async function runFetches(
  deps: PipelineDeps,
  dates: string[],
  options: Omit<RunOptions, 'date'> = {}
): Promise<RunSummary[]> {
  const summaries: RunSummary[] = [];
  for (const date of dates) {
    summaries.push(await runFetch(deps, { ...options, date }));
  }
  return summaries;
}
