/**
 * PostgreSQL-backed ScoreStore
 */

import type { ScoreStore } from './store.js';
import { findTeam, insertTeam, updateTeam } from './repositories/teams.js';
import { findVenue, insertVenue, updateVenue } from './repositories/venues.js';
import { findGame, insertGame, updateGame } from './repositories/games.js';
import { replaceBroadcasts } from './repositories/broadcasts.js';
import { insertFetchAttempt } from './repositories/fetchAttempts.js';

export const pgStore: ScoreStore = {
  findTeam,
  insertTeam,
  updateTeam,
  findVenue,
  insertVenue,
  updateVenue,
  findGame,
  insertGame,
  updateGame,
  replaceBroadcasts,
  insertFetchAttempt
};
