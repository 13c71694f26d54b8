/**
 * Entity Model
 *
 * Normalized records persisted by the pipeline. Every entity is keyed by an
 * identifier supplied by the remote source; nothing here is generated locally
 * except the FetchAttempt serial id.
 */

import type { GameState, GameType } from './gameState.js';

export interface TeamRecord {
  externalId: number;
  name: string;
  abbreviation: string;
  logoUrl: string | null;
}

export interface VenueRecord {
  /** Derived from the venue's default name, see `venueKey()` */
  key: string;
  name: string;
  timezone: string | null;
  utcOffset: string | null;
}

export interface BroadcastRecord {
  gameId: number;
  network: string;
  countryCode: string;
  market: string | null;
  sequenceNumber: number | null;
}

export type BroadcastDraft = Omit<BroadcastRecord, 'gameId'>;

/**
 * Persisted columns of a game
 */
export interface GameFields {
  externalId: number;
  season: number;
  gameType: GameType;
  gameDate: string; // YYYY-MM-DD
  state: GameState;
  remoteState: string; // Raw gameState code, e.g. "OFF"
  scheduleState: string; // Raw gameScheduleState code, e.g. "OK"
  homeTeamId: number;
  awayTeamId: number;
  homeScore: number | null;
  awayScore: number | null;
  homeSog: number | null;
  awaySog: number | null;
  homeRecord: string | null;
  awayRecord: string | null;
  venueKey: string | null;
  startTimeUtc: Date | null;
  easternUtcOffset: string | null;
  venueUtcOffset: string | null;
  neutralSite: boolean;
  gameCenterLink: string | null;
  ticketsLink: string | null;
}

/**
 * A normalized game as produced from one payload, with the broadcasts it owns
 */
export interface GameDraft extends GameFields {
  broadcasts: BroadcastDraft[];
}

export interface GameRecord extends GameFields {
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Game row joined with its teams' abbreviations, as listed by the read surface
 */
export interface GameListing extends GameRecord {
  homeAbbreviation: string;
  awayAbbreviation: string;
}

export interface FetchAttemptDraft {
  requestedDate: string;
  sourceUrl: string;
  success: boolean;
  gamesProcessed: number;
  errorMessage: string | null;
}

export interface FetchAttemptRecord extends FetchAttemptDraft {
  id: number;
  createdAt: Date;
}

/**
 * Derives a venue's natural key from its display name
 *
 * @example
 * venueKey('  Scotiabank  Arena ') // 'scotiabank-arena'
 */
export function venueKey(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, '-');
}

export function isFinal(game: Pick<GameFields, 'state'>): boolean {
  return game.state === 'FINAL';
}

/**
 * Abbreviation of the winning team, or null when the game is not final,
 * a score is missing, or the scores are level
 */
export function winner(game: GameListing): string | null {
  if (!isFinal(game) || game.homeScore === null || game.awayScore === null) {
    return null;
  }
  if (game.homeScore > game.awayScore) return game.homeAbbreviation;
  if (game.awayScore > game.homeScore) return game.awayAbbreviation;
  return null;
}

/**
 * Scoreboard line, away team first
 *
 * @example
 * scoreDisplay(game) // 'BOS 2 - 4 TOR', or 'BOS @ TOR' before any score
 */
export function scoreDisplay(game: GameListing): string {
  if (game.homeScore !== null && game.awayScore !== null) {
    return `${game.awayAbbreviation} ${game.awayScore} - ${game.homeScore} ${game.homeAbbreviation}`;
  }
  return `${game.awayAbbreviation} @ ${game.homeAbbreviation}`;
}
