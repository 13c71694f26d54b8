/**
 * Reconciler
 *
 * Merges normalized drafts into stored state one record at a time: look up by
 * natural key, insert when absent, merge when present. Teams and venues are
 * reconciled before games so game references resolve.
 *
 * A failure on one record is logged, recorded, and the batch moves on. A
 * duplicate-key rejection on insert means an overlapping run got there first;
 * the record is re-read and retried once as an update.
 */

import { logger } from '../core/logger.js';
import { StorageConstraintError, ValidationError, toError } from '../errors/index.js';
import { isTerminal } from '../models/gameState.js';
import type { GameDraft, GameFields, GameRecord, TeamRecord, VenueRecord } from '../models/entities.js';
import type { ScoreStore } from '../db/store.js';

export type UpsertOutcome = 'inserted' | 'updated';

export interface ReconcileBatch {
  teams: TeamRecord[];
  venues: VenueRecord[];
  games: GameDraft[];
}

export interface ReconcileOptions {
  /** Overwrite score and state even on games already in a terminal state */
  force?: boolean;
}

/**
 * Counts refer to games; team and venue failures still land in `errors`
 */
export interface ReconcileResult {
  inserted: number;
  updated: number;
  skipped: number;
  errors: string[];
}

/**
 * Lookup-then-branch upsert with a single update retry on a unique violation
 */
async function upsert<T>(
  find: () => Promise<T | null>,
  insert: () => Promise<void>,
  update: (existing: T) => Promise<void>
): Promise<UpsertOutcome> {
  const existing = await find();
  if (existing !== null) {
    await update(existing);
    return 'updated';
  }

  try {
    await insert();
    return 'inserted';
  } catch (err) {
    if (!(err instanceof StorageConstraintError) || err.constraint !== 'unique') throw err;
    const current = await find();
    if (current === null) throw err;
    logger.debug({ operation: err.operation }, 'Concurrent insert detected, retrying as update');
    await update(current);
    return 'updated';
  }
}

function gameFields(draft: GameDraft): GameFields {
  const { broadcasts: _broadcasts, ...fields } = draft;
  return fields;
}

/**
 * Computes the row to store for a game that already exists
 *
 * Scheduling, team, venue, record and link fields always take the fresh
 * values. Score and state fields keep their stored values once the stored
 * game is terminal, unless `force` is set.
 */
export function mergeGame(existing: GameRecord, draft: GameDraft, force: boolean): GameFields {
  const fresh = gameFields(draft);
  if (force || !isTerminal(existing.state)) return fresh;

  return {
    ...fresh,
    state: existing.state,
    remoteState: existing.remoteState,
    scheduleState: existing.scheduleState,
    homeScore: existing.homeScore,
    awayScore: existing.awayScore,
    homeSog: existing.homeSog,
    awaySog: existing.awaySog
  };
}

export async function reconcileTeam(store: ScoreStore, team: TeamRecord): Promise<UpsertOutcome> {
  return upsert(
    () => store.findTeam(team.externalId),
    () => store.insertTeam(team),
    () => store.updateTeam(team)
  );
}

export async function reconcileVenue(store: ScoreStore, venue: VenueRecord): Promise<UpsertOutcome> {
  return upsert(
    () => store.findVenue(venue.key),
    () => store.insertVenue(venue),
    () => store.updateVenue(venue)
  );
}

/**
 * Upserts one game and replaces its broadcasts
 *
 * @throws ValidationError when the stored game belongs to a different season
 *   and `force` is not set
 */
export async function reconcileGame(
  store: ScoreStore,
  draft: GameDraft,
  options: ReconcileOptions = {}
): Promise<UpsertOutcome> {
  const force = options.force ?? false;

  const outcome = await upsert(
    () => store.findGame(draft.externalId),
    () => store.insertGame(gameFields(draft)),
    async (existing) => {
      if (existing.season !== draft.season && !force) {
        throw new ValidationError(
          `Game ${draft.externalId} is stored under season ${existing.season}, payload says ${draft.season}`,
          'season'
        );
      }
      if (isTerminal(existing.state) && !force && existing.state !== draft.state) {
        logger.info(
          { gameId: draft.externalId, stored: existing.state, remote: draft.state },
          'Keeping terminal game state'
        );
      }
      await store.updateGame(mergeGame(existing, draft, force), force);
    }
  );

  await store.replaceBroadcasts(draft.externalId, draft.broadcasts);
  return outcome;
}

/**
 * Reconciles a whole batch sequentially, isolating failures per record
 */
export async function reconcile(
  store: ScoreStore,
  batch: ReconcileBatch,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const result: ReconcileResult = { inserted: 0, updated: 0, skipped: 0, errors: [] };

  const record = (label: string, err: unknown) => {
    const error = toError(err);
    logger.error({ err: error, record: label }, 'Failed to reconcile record');
    result.errors.push(`${label}: ${error.message}`);
  };

  for (const team of batch.teams) {
    try {
      await reconcileTeam(store, team);
    } catch (err) {
      record(`team ${team.externalId}`, err);
    }
  }

  for (const venue of batch.venues) {
    try {
      await reconcileVenue(store, venue);
    } catch (err) {
      record(`venue ${venue.key}`, err);
    }
  }

  const seen = new Set<number>();
  for (const game of batch.games) {
    if (seen.has(game.externalId)) {
      logger.warn({ gameId: game.externalId }, 'Game listed twice in payload, skipping repeat');
      result.skipped++;
      continue;
    }
    seen.add(game.externalId);

    try {
      const outcome = await reconcileGame(store, game, options);
      result[outcome]++;
      logger.debug({ gameId: game.externalId, outcome, state: game.state }, 'Game reconciled');
    } catch (err) {
      record(`game ${game.externalId}`, err);
    }
  }

  return result;
}
