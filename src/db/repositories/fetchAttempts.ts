/**
 * Fetch Attempt Repository
 *
 * Append-only audit log: rows are inserted once and never updated or deleted.
 */

import { db, toStorageError } from '../client.js';
import type { FetchAttemptDraft, FetchAttemptRecord } from '../../models/entities.js';
import type { FetchAttemptRow } from '../types.js';

function toAttempt(row: FetchAttemptRow): FetchAttemptRecord {
  return {
    id: row.id,
    requestedDate: row.requested_date,
    sourceUrl: row.source_url,
    success: row.success,
    gamesProcessed: row.games_processed,
    errorMessage: row.error_message,
    createdAt: row.created_at
  };
}

export async function insertFetchAttempt(attempt: FetchAttemptDraft): Promise<FetchAttemptRecord> {
  const query = `
    INSERT INTO fetch_attempts (requested_date, source_url, success, games_processed, error_message)
    VALUES ($1, $2, $3, $4, $5)
    RETURNING *
  `;

  try {
    const result = await db.query<FetchAttemptRow>(query, [
      attempt.requestedDate,
      attempt.sourceUrl,
      attempt.success,
      attempt.gamesProcessed,
      attempt.errorMessage
    ]);
    return toAttempt(result.rows[0]);
  } catch (err) {
    throw toStorageError(err, 'insert fetch attempt');
  }
}

export interface FetchAttemptFilter {
  success?: boolean;
  limit?: number;
}

/**
 * Lists attempts newest first, for the administrative read surface
 */
export async function listFetchAttempts(filter: FetchAttemptFilter = {}): Promise<FetchAttemptRecord[]> {
  const params: unknown[] = [];
  let where = '';
  if (filter.success !== undefined) {
    params.push(filter.success);
    where = 'WHERE success = $1';
  }
  params.push(filter.limit ?? 50);

  try {
    const result = await db.query<FetchAttemptRow>(
      `SELECT * FROM fetch_attempts ${where} ORDER BY created_at DESC, id DESC LIMIT $${params.length}`,
      params
    );
    return result.rows.map(toAttempt);
  } catch (err) {
    throw toStorageError(err, 'list fetch attempts');
  }
}
