/**
 * Broadcast Repository
 *
 * A game's broadcasts are never patched individually: each fetch replaces the
 * whole set inside one transaction. The transaction locks the game row first so
 * overlapping replacements for one game run one after the other.
 */

import { db, toStorageError } from '../client.js';
import { logger } from '../../core/logger.js';
import type { BroadcastDraft, BroadcastRecord } from '../../models/entities.js';
import type { BroadcastRow } from '../types.js';

/**
 * Deletes a game's broadcasts and inserts the given set atomically
 */
export async function replaceBroadcasts(gameId: number, broadcasts: BroadcastDraft[]): Promise<void> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    await client.query('SELECT 1 FROM games WHERE external_id = $1 FOR UPDATE', [gameId]);
    await client.query('DELETE FROM broadcasts WHERE game_id = $1', [gameId]);
    for (const b of broadcasts) {
      await client.query(
        `INSERT INTO broadcasts (game_id, network, country_code, market, sequence_number)
         VALUES ($1, $2, $3, $4, $5)`,
        [gameId, b.network, b.countryCode, b.market, b.sequenceNumber]
      );
    }
    await client.query('COMMIT');
    logger.debug({ gameId, count: broadcasts.length }, 'Broadcasts replaced');
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      logger.error({ err: rollbackErr, gameId }, 'Rollback failed');
    });
    throw toStorageError(err, 'replace broadcasts');
  } finally {
    client.release();
  }
}

/**
 * Gets a game's broadcasts in sequence order
 */
export async function listBroadcasts(gameId: number): Promise<BroadcastRecord[]> {
  try {
    const result = await db.query<BroadcastRow>(
      'SELECT * FROM broadcasts WHERE game_id = $1 ORDER BY sequence_number NULLS LAST, network',
      [gameId]
    );
    return result.rows.map((row) => ({
      gameId: Number(row.game_id),
      network: row.network,
      countryCode: row.country_code,
      market: row.market,
      sequenceNumber: row.sequence_number
    }));
  } catch (err) {
    throw toStorageError(err, 'list broadcasts');
  }
}
