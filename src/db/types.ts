/**
 * Database Entity Types
 *
 * TypeScript interfaces matching database schema (snake_case columns).
 */

export interface TeamRow {
  external_id: number;
  name: string;
  abbreviation: string;
  logo_url: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface VenueRow {
  key: string;
  name: string;
  timezone: string | null;
  utc_offset: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface GameRow {
  external_id: string; // BIGINT comes back as a string from pg
  season: number;
  game_type: number;
  game_date: string; // Selected as text (YYYY-MM-DD) to avoid timezone shifts
  state: string;
  remote_state: string;
  schedule_state: string;
  home_team_id: number;
  away_team_id: number;
  home_score: number | null;
  away_score: number | null;
  home_sog: number | null;
  away_sog: number | null;
  home_record: string | null;
  away_record: string | null;
  venue_key: string | null;
  start_time_utc: Date | null;
  eastern_utc_offset: string | null;
  venue_utc_offset: string | null;
  neutral_site: boolean;
  game_center_link: string | null;
  tickets_link: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface GameListingRow extends GameRow {
  home_abbreviation: string;
  away_abbreviation: string;
}

export interface BroadcastRow {
  game_id: string; // BIGINT
  network: string;
  country_code: string;
  market: string | null;
  sequence_number: number | null;
}

export interface FetchAttemptRow {
  id: number;
  requested_date: string;
  source_url: string;
  success: boolean;
  games_processed: number;
  error_message: string | null;
  created_at: Date;
}
