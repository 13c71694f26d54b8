/**
 * Attempt Logger
 *
 * Appends the single FetchAttempt row for a run. Never throws: a lost audit
 * row is reported through the process logger and must not fail an ingestion
 * that otherwise succeeded.
 */

import { logger } from '../core/logger.js';
import type { FetchAttemptDraft, FetchAttemptRecord } from '../models/entities.js';
import type { ScoreStore } from '../db/store.js';

/**
 * @returns The stored attempt, or null when it could not be written
 */
export async function logAttempt(
  store: ScoreStore,
  attempt: FetchAttemptDraft
): Promise<FetchAttemptRecord | null> {
  try {
    const saved = await store.insertFetchAttempt(attempt);
    logger.debug({ attemptId: saved.id, date: attempt.requestedDate, success: attempt.success }, 'Fetch attempt logged');
    return saved;
  } catch (err) {
    logger.error({ err, attempt }, 'Failed to record fetch attempt');
    return null;
  }
}
