/**
 * Game Repository
 *
 * Lookup, write and listing functions for games, keyed by NHL game id.
 * Writes are plain INSERT/UPDATE; choosing between them and deciding which
 * fields to overwrite is the reconciler's job.
 */

import { db, toStorageError } from '../client.js';
import { logger } from '../../core/logger.js';
import { DatabaseError } from '../../errors/index.js';
import { TERMINAL_STATES, isGameState, isGameType } from '../../models/gameState.js';
import type { GameState } from '../../models/gameState.js';
import type { GameFields, GameListing, GameRecord } from '../../models/entities.js';
import type { GameListingRow, GameRow } from '../types.js';

/**
 * Column list shared by every game SELECT; game_date is read as text
 */
const GAME_COLUMNS = `
  g.external_id, g.season, g.game_type, to_char(g.game_date, 'YYYY-MM-DD') AS game_date,
  g.state, g.remote_state, g.schedule_state,
  g.home_team_id, g.away_team_id, g.home_score, g.away_score, g.home_sog, g.away_sog,
  g.home_record, g.away_record, g.venue_key, g.start_time_utc,
  g.eastern_utc_offset, g.venue_utc_offset, g.neutral_site,
  g.game_center_link, g.tickets_link, g.created_at, g.updated_at
`;

function toGame(row: GameRow): GameRecord {
  if (!isGameState(row.state)) {
    throw new DatabaseError(`Unknown stored game state "${row.state}"`, 'read game');
  }
  if (!isGameType(row.game_type)) {
    throw new DatabaseError(`Unknown stored game type ${row.game_type}`, 'read game');
  }
  return {
    externalId: Number(row.external_id),
    season: row.season,
    gameType: row.game_type,
    gameDate: row.game_date,
    state: row.state,
    remoteState: row.remote_state,
    scheduleState: row.schedule_state,
    homeTeamId: row.home_team_id,
    awayTeamId: row.away_team_id,
    homeScore: row.home_score,
    awayScore: row.away_score,
    homeSog: row.home_sog,
    awaySog: row.away_sog,
    homeRecord: row.home_record,
    awayRecord: row.away_record,
    venueKey: row.venue_key,
    startTimeUtc: row.start_time_utc,
    easternUtcOffset: row.eastern_utc_offset,
    venueUtcOffset: row.venue_utc_offset,
    neutralSite: row.neutral_site,
    gameCenterLink: row.game_center_link,
    ticketsLink: row.tickets_link,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

/**
 * Positional parameters $1..$22 in the column order used by insert and update
 */
function gameParams(game: GameFields): unknown[] {
  return [
    game.externalId,
    game.season,
    game.gameType,
    game.gameDate,
    game.state,
    game.remoteState,
    game.scheduleState,
    game.homeTeamId,
    game.awayTeamId,
    game.homeScore,
    game.awayScore,
    game.homeSog,
    game.awaySog,
    game.homeRecord,
    game.awayRecord,
    game.venueKey,
    game.startTimeUtc,
    game.easternUtcOffset,
    game.venueUtcOffset,
    game.neutralSite,
    game.gameCenterLink,
    game.ticketsLink
  ];
}

/**
 * Gets a game by NHL game id
 */
export async function findGame(externalId: number): Promise<GameRecord | null> {
  try {
    const result = await db.query<GameRow>(`SELECT ${GAME_COLUMNS} FROM games g WHERE g.external_id = $1`, [externalId]);
    return result.rows[0] ? toGame(result.rows[0]) : null;
  } catch (err) {
    if (err instanceof DatabaseError) throw err;
    throw toStorageError(err, 'find game');
  }
}

/**
 * Inserts a new game; a duplicate id raises StorageConstraintError
 */
export async function insertGame(game: GameFields): Promise<void> {
  const query = `
    INSERT INTO games (
      external_id, season, game_type, game_date, state, remote_state, schedule_state,
      home_team_id, away_team_id, home_score, away_score, home_sog, away_sog,
      home_record, away_record, venue_key, start_time_utc,
      eastern_utc_offset, venue_utc_offset, neutral_site, game_center_link, tickets_link
    ) VALUES (
      $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11,
      $12, $13, $14, $15, $16, $17, $18, $19, $20, $21, $22
    )
  `;

  try {
    await db.query(query, gameParams(game));
    logger.debug({ gameId: game.externalId }, 'Game inserted');
  } catch (err) {
    throw toStorageError(err, 'insert game');
  }
}

/**
 * Score and state columns stay put while the stored row is terminal, unless
 * forced. Evaluated against the row being updated, so a result committed by an
 * overlapping run after this run read the game is still protected.
 * $23 is the force flag, $24 the terminal states.
 */
const KEEP_STORED = 'games.state = ANY($24::text[]) AND NOT $23::boolean';

function guarded(column: string, param: number): string {
  return `${column} = CASE WHEN ${KEEP_STORED} THEN games.${column} ELSE $${param} END`;
}

/**
 * Overwrites an existing game with the given values
 *
 * Scheduling, team, venue, record and link columns always take the new
 * values; score and state columns are guarded, see KEEP_STORED.
 */
export async function updateGame(game: GameFields, force: boolean): Promise<void> {
  const query = `
    UPDATE games SET
      season = $2, game_type = $3, game_date = $4,
      ${guarded('state', 5)},
      ${guarded('remote_state', 6)},
      ${guarded('schedule_state', 7)},
      home_team_id = $8, away_team_id = $9,
      ${guarded('home_score', 10)},
      ${guarded('away_score', 11)},
      ${guarded('home_sog', 12)},
      ${guarded('away_sog', 13)},
      home_record = $14, away_record = $15, venue_key = $16, start_time_utc = $17,
      eastern_utc_offset = $18, venue_utc_offset = $19, neutral_site = $20,
      game_center_link = $21, tickets_link = $22,
      updated_at = NOW()
    WHERE external_id = $1
  `;

  try {
    await db.query(query, [...gameParams(game), force, [...TERMINAL_STATES]]);
    logger.debug({ gameId: game.externalId, force }, 'Game updated');
  } catch (err) {
    throw toStorageError(err, 'update game');
  }
}

export interface GameFilter {
  date?: string;
  state?: GameState;
  season?: number;
  /** Team abbreviation, matched on either side */
  team?: string;
  limit?: number;
}

/**
 * Lists games newest first, for the administrative read surface
 */
export async function listGames(filter: GameFilter = {}): Promise<GameListing[]> {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filter.date) {
    params.push(filter.date);
    conditions.push(`g.game_date = $${params.length}`);
  }
  if (filter.state) {
    params.push(filter.state);
    conditions.push(`g.state = $${params.length}`);
  }
  if (filter.season !== undefined) {
    params.push(filter.season);
    conditions.push(`g.season = $${params.length}`);
  }
  if (filter.team) {
    params.push(filter.team.toUpperCase());
    conditions.push(`(home.abbreviation = $${params.length} OR away.abbreviation = $${params.length})`);
  }
  params.push(filter.limit ?? 100);

  const query = `
    SELECT ${GAME_COLUMNS},
      home.abbreviation AS home_abbreviation,
      away.abbreviation AS away_abbreviation
    FROM games g
    JOIN teams home ON home.external_id = g.home_team_id
    JOIN teams away ON away.external_id = g.away_team_id
    ${conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''}
    ORDER BY g.game_date DESC, g.start_time_utc DESC NULLS LAST
    LIMIT $${params.length}
  `;

  try {
    const result = await db.query<GameListingRow>(query, params);
    return result.rows.map((row) => ({
      ...toGame(row),
      homeAbbreviation: row.home_abbreviation,
      awayAbbreviation: row.away_abbreviation
    }));
  } catch (err) {
    if (err instanceof DatabaseError) throw err;
    throw toStorageError(err, 'list games');
  }
}
