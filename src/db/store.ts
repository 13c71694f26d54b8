/**
 * Score Store
 *
 * The storage operations the reconciler and attempt logger need, keyed by
 * natural key. Implementations must enforce uniqueness of every natural key
 * and report a rejected duplicate insert as a StorageConstraintError with
 * `constraint: 'unique'`. Overlapping runs are coordinated by those
 * constraints, by the write-time guard in `updateGame` and by per-game
 * serialization of `replaceBroadcasts`.
 */

import type {
  BroadcastDraft,
  FetchAttemptDraft,
  FetchAttemptRecord,
  GameFields,
  GameRecord,
  TeamRecord,
  VenueRecord
} from '../models/entities.js';

export interface ScoreStore {
  findTeam(externalId: number): Promise<TeamRecord | null>;
  insertTeam(team: TeamRecord): Promise<void>;
  updateTeam(team: TeamRecord): Promise<void>;

  findVenue(key: string): Promise<VenueRecord | null>;
  insertVenue(venue: VenueRecord): Promise<void>;
  updateVenue(venue: VenueRecord): Promise<void>;

  findGame(externalId: number): Promise<GameRecord | null>;
  insertGame(game: GameFields): Promise<void>;
  /**
   * Overwrites a stored game. Unless `force` is set, score and state fields
   * keep their stored values when the row is terminal at write time.
   */
  updateGame(game: GameFields, force: boolean): Promise<void>;

  /** Atomically swaps a game's broadcasts for the given set */
  replaceBroadcasts(gameId: number, broadcasts: BroadcastDraft[]): Promise<void>;

  insertFetchAttempt(attempt: FetchAttemptDraft): Promise<FetchAttemptRecord>;
}
