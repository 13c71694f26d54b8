/**
 * Normalizer
 *
 * Turns the loosely-typed scoreboard payload into validated drafts.
 *
 * A game missing a required field (id, season, gameType, gameDate, team id or
 * abbreviation) is dropped and reported as a per-record error; the rest of the
 * payload is still normalized. Optional fields that are absent become null,
 * never a sentinel such as 0 or "". Teams and venues are deduplicated by
 * natural key across the whole payload.
 */

import { logger } from '../core/logger.js';
import { MalformedPayloadError } from '../errors/index.js';
import { isGameType, resolveGameState } from '../models/gameState.js';
import { venueKey } from '../models/entities.js';
import type { BroadcastDraft, GameDraft, TeamRecord, VenueRecord } from '../models/entities.js';
import {
  isNonNegativeInteger,
  isPlainObject,
  isPositiveInteger,
  isValidDateISO,
  isValidInstant
} from '../util/validation.js';

export interface NormalizedScores {
  /** Date the remote says the scoreboard is for, when it says so */
  currentDate: string | null;
  teams: TeamRecord[];
  venues: VenueRecord[];
  games: GameDraft[];
  /** Games dropped because a required field was missing or malformed */
  errors: MalformedPayloadError[];
}

type Guard<T> = (value: unknown) => value is T;

type JsonObject = Record<string, unknown>;

const isString: Guard<string> = (value): value is string => typeof value === 'string';

const isNonBlankString: Guard<string> = (value): value is string =>
  typeof value === 'string' && value.trim() !== '';

const isArray: Guard<unknown[]> = (value): value is unknown[] => Array.isArray(value);

const isBoolean: Guard<boolean> = (value): value is boolean => typeof value === 'boolean';

const isInteger: Guard<number> = (value): value is number =>
  typeof value === 'number' && Number.isInteger(value);

function required<T>(obj: JsonObject, key: string, path: string, guard: Guard<T>, expected: string): T {
  const value = obj[key];
  if (value === undefined || value === null) {
    throw new MalformedPayloadError('missing required field', `${path}.${key}`);
  }
  if (!guard(value)) {
    throw new MalformedPayloadError(`expected ${expected}`, `${path}.${key}`);
  }
  return value;
}

function optional<T>(obj: JsonObject, key: string, path: string, guard: Guard<T>, expected: string): T | null {
  const value = obj[key];
  if (value === undefined || value === null) return null;
  if (!guard(value)) {
    throw new MalformedPayloadError(`expected ${expected}`, `${path}.${key}`);
  }
  return value;
}

/**
 * Optional text field; blank strings count as absent
 */
function optionalText(obj: JsonObject, key: string, path: string): string | null {
  const value = optional(obj, key, path, isString, 'a string');
  return value !== null && value.trim() !== '' ? value : null;
}

/**
 * Reads `{ default: "..." }` localized text
 */
function localized(obj: JsonObject, key: string, path: string): string | null {
  const value = optional(obj, key, path, isPlainObject, 'a localized string');
  if (value === null) return null;
  const text = optional(value, 'default', `${path}.${key}`, isString, 'a string');
  return text !== null && text.trim() !== '' ? text.trim() : null;
}

function asObject(value: unknown, path: string): JsonObject {
  if (value === undefined || value === null) {
    throw new MalformedPayloadError('missing required field', path);
  }
  if (!isPlainObject(value)) {
    throw new MalformedPayloadError('expected an object', path);
  }
  return value;
}

interface TeamSide {
  team: TeamRecord;
  score: number | null;
  sog: number | null;
  record: string | null;
}

function normalizeTeam(raw: unknown, path: string): TeamSide {
  const obj = asObject(raw, path);
  const externalId = required(obj, 'id', path, isPositiveInteger, 'a positive integer');
  const abbreviation = required(obj, 'abbrev', path, isNonBlankString, 'a non-empty string').trim();
  const name =
    localized(obj, 'name', path) ??
    localized(obj, 'commonName', path) ??
    localized(obj, 'placeName', path) ??
    abbreviation;

  return {
    team: {
      externalId,
      name,
      abbreviation,
      logoUrl: optionalText(obj, 'logo', path)
    },
    score: optional(obj, 'score', path, isNonNegativeInteger, 'a non-negative integer'),
    sog: optional(obj, 'sog', path, isNonNegativeInteger, 'a non-negative integer'),
    record: optionalText(obj, 'record', path)
  };
}

function normalizeVenue(game: JsonObject, path: string): VenueRecord | null {
  const name = localized(game, 'venue', path);
  if (name === null) return null;
  return {
    key: venueKey(name),
    name,
    timezone: optionalText(game, 'venueTimezone', path),
    utcOffset: optionalText(game, 'venueUTCOffset', path)
  };
}

/**
 * Broadcasts keyed by (network, countryCode); the first sighting wins
 */
function normalizeBroadcasts(game: JsonObject, path: string): BroadcastDraft[] {
  const list = optional(game, 'tvBroadcasts', path, isArray, 'an array');
  if (list === null) return [];

  const seen = new Map<string, BroadcastDraft>();
  list.forEach((entry, i) => {
    const entryPath = `${path}.tvBroadcasts[${i}]`;
    const obj = asObject(entry, entryPath);
    const network = required(obj, 'network', entryPath, isNonBlankString, 'a non-empty string').trim();
    const countryCode = required(obj, 'countryCode', entryPath, isNonBlankString, 'a non-empty string').trim();
    const key = `${network}|${countryCode}`;
    if (seen.has(key)) return;
    seen.set(key, {
      network,
      countryCode,
      market: optionalText(obj, 'market', entryPath),
      sequenceNumber: optional(obj, 'sequenceNumber', entryPath, isNonNegativeInteger, 'a non-negative integer')
    });
  });
  return [...seen.values()];
}

interface NormalizedGame {
  game: GameDraft;
  teams: TeamRecord[];
  venue: VenueRecord | null;
}

/**
 * Normalizes one scoreboard entry
 *
 * @throws MalformedPayloadError naming the first offending field
 */
export function normalizeGame(raw: unknown, path: string): NormalizedGame {
  const obj = asObject(raw, path);

  const externalId = required(obj, 'id', path, isPositiveInteger, 'a positive integer');
  const season = required(obj, 'season', path, isPositiveInteger, 'a positive integer');
  const gameType = required(obj, 'gameType', path, isInteger, 'an integer');
  if (!isGameType(gameType)) {
    throw new MalformedPayloadError(`unknown game type ${gameType}`, `${path}.gameType`);
  }
  const gameDate = required(obj, 'gameDate', path, isString, 'a string');
  if (!isValidDateISO(gameDate)) {
    throw new MalformedPayloadError('expected a YYYY-MM-DD date', `${path}.gameDate`);
  }

  const home = normalizeTeam(obj.homeTeam, `${path}.homeTeam`);
  const away = normalizeTeam(obj.awayTeam, `${path}.awayTeam`);

  // The remote omits gameState only for games that have not started
  const remoteState = optionalText(obj, 'gameState', path) ?? 'FUT';
  const scheduleState = optionalText(obj, 'gameScheduleState', path) ?? 'OK';
  const state = resolveGameState(remoteState, scheduleState);
  if (state === null) {
    throw new MalformedPayloadError(`unknown game state "${remoteState}"`, `${path}.gameState`);
  }

  const startTime = optionalText(obj, 'startTimeUTC', path);
  if (startTime !== null && !isValidInstant(startTime)) {
    throw new MalformedPayloadError('expected an ISO-8601 instant', `${path}.startTimeUTC`);
  }

  const venue = normalizeVenue(obj, path);

  const game: GameDraft = {
    externalId,
    season,
    gameType,
    gameDate,
    state,
    remoteState,
    scheduleState,
    homeTeamId: home.team.externalId,
    awayTeamId: away.team.externalId,
    homeScore: home.score,
    awayScore: away.score,
    homeSog: home.sog,
    awaySog: away.sog,
    homeRecord: home.record,
    awayRecord: away.record,
    venueKey: venue?.key ?? null,
    startTimeUtc: startTime !== null ? new Date(startTime) : null,
    easternUtcOffset: optionalText(obj, 'easternUTCOffset', path),
    venueUtcOffset: optionalText(obj, 'venueUTCOffset', path),
    neutralSite: optional(obj, 'neutralSite', path, isBoolean, 'a boolean') ?? false,
    gameCenterLink: optionalText(obj, 'gameCenterLink', path),
    ticketsLink: optionalText(obj, 'ticketsLink', path),
    broadcasts: normalizeBroadcasts(obj, path)
  };

  return { game, teams: [home.team, away.team], venue };
}

/**
 * Normalizes a whole scoreboard payload
 *
 * @throws MalformedPayloadError only when the payload itself is unusable
 *   (not an object, or `games` is not an array); single bad games are
 *   collected in `errors` instead
 */
export function normalizeScores(payload: unknown): NormalizedScores {
  if (!isPlainObject(payload)) {
    throw new MalformedPayloadError('expected a JSON object', '$');
  }

  const rawGames = payload.games ?? [];
  if (!Array.isArray(rawGames)) {
    throw new MalformedPayloadError('expected an array', 'games');
  }

  const currentDate = typeof payload.currentDate === 'string' ? payload.currentDate : null;
  const teams = new Map<number, TeamRecord>();
  const venues = new Map<string, VenueRecord>();
  const games: GameDraft[] = [];
  const errors: MalformedPayloadError[] = [];

  rawGames.forEach((raw: unknown, index: number) => {
    try {
      const normalized = normalizeGame(raw, `games[${index}]`);
      games.push(normalized.game);
      for (const team of normalized.teams) teams.set(team.externalId, team);
      if (normalized.venue) venues.set(normalized.venue.key, normalized.venue);
    } catch (err) {
      if (!(err instanceof MalformedPayloadError)) throw err;
      const gameId = isPlainObject(raw) ? raw.id : undefined;
      logger.warn({ path: err.path, gameId }, `Dropping malformed game: ${err.message}`);
      errors.push(err);
    }
  });

  return {
    currentDate,
    teams: [...teams.values()],
    venues: [...venues.values()],
    games,
    errors
  };
}
