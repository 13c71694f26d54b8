/**
 * Venue Repository
 *
 * Venues are keyed by a slug of their display name.
 */

import { db, toStorageError } from '../client.js';
import { logger } from '../../core/logger.js';
import type { VenueRecord } from '../../models/entities.js';
import type { VenueRow } from '../types.js';

function toVenue(row: VenueRow): VenueRecord {
  return {
    key: row.key,
    name: row.name,
    timezone: row.timezone,
    utcOffset: row.utc_offset
  };
}

export async function findVenue(key: string): Promise<VenueRecord | null> {
  try {
    const result = await db.query<VenueRow>('SELECT * FROM venues WHERE key = $1', [key]);
    return result.rows[0] ? toVenue(result.rows[0]) : null;
  } catch (err) {
    throw toStorageError(err, 'find venue');
  }
}

export async function insertVenue(venue: VenueRecord): Promise<void> {
  try {
    await db.query(
      'INSERT INTO venues (key, name, timezone, utc_offset) VALUES ($1, $2, $3, $4)',
      [venue.key, venue.name, venue.timezone, venue.utcOffset]
    );
    logger.debug({ venue: venue.key }, 'Venue inserted');
  } catch (err) {
    throw toStorageError(err, 'insert venue');
  }
}

export async function updateVenue(venue: VenueRecord): Promise<void> {
  try {
    await db.query(
      'UPDATE venues SET name = $2, timezone = $3, utc_offset = $4, updated_at = NOW() WHERE key = $1',
      [venue.key, venue.name, venue.timezone, venue.utcOffset]
    );
  } catch (err) {
    throw toStorageError(err, 'update venue');
  }
}
