/**
 * Team Repository
 *
 * Lookup and write functions for teams, keyed by NHL team id.
 */

import { db, toStorageError } from '../client.js';
import { logger } from '../../core/logger.js';
import type { TeamRecord } from '../../models/entities.js';
import type { TeamRow } from '../types.js';

function toTeam(row: TeamRow): TeamRecord {
  return {
    externalId: row.external_id,
    name: row.name,
    abbreviation: row.abbreviation,
    logoUrl: row.logo_url
  };
}

/**
 * Gets a team by NHL team id
 */
export async function findTeam(externalId: number): Promise<TeamRecord | null> {
  try {
    const result = await db.query<TeamRow>('SELECT * FROM teams WHERE external_id = $1', [externalId]);
    return result.rows[0] ? toTeam(result.rows[0]) : null;
  } catch (err) {
    throw toStorageError(err, 'find team');
  }
}

/**
 * Inserts a new team; a duplicate id raises StorageConstraintError
 */
export async function insertTeam(team: TeamRecord): Promise<void> {
  const query = `
    INSERT INTO teams (external_id, name, abbreviation, logo_url)
    VALUES ($1, $2, $3, $4)
  `;

  try {
    await db.query(query, [team.externalId, team.name, team.abbreviation, team.logoUrl]);
    logger.debug({ teamId: team.externalId }, 'Team inserted');
  } catch (err) {
    throw toStorageError(err, 'insert team');
  }
}

/**
 * Overwrites a team's descriptive fields
 */
export async function updateTeam(team: TeamRecord): Promise<void> {
  const query = `
    UPDATE teams SET
      name = $2,
      abbreviation = $3,
      logo_url = $4,
      updated_at = NOW()
    WHERE external_id = $1
  `;

  try {
    await db.query(query, [team.externalId, team.name, team.abbreviation, team.logoUrl]);
  } catch (err) {
    throw toStorageError(err, 'update team');
  }
}
