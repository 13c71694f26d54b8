/**
 * Scoreboard fixtures and a scripted ScoreClient
 */

import type { ScoreClient, ScoreFetch } from '../../src/http/nhlApiClient.js';
import type { ScoreGame, ScoreTeam } from './scoreApi.js';

export const BASE_URL = 'https://api.example.test';

export function homeTeam(overrides: Partial<ScoreTeam> = {}): ScoreTeam {
  return {
    id: 10,
    name: { default: 'Maple Leafs' },
    abbrev: 'TOR',
    logo: 'https://assets.example.test/tor.svg',
    ...overrides
  };
}

export function awayTeam(overrides: Partial<ScoreTeam> = {}): ScoreTeam {
  return {
    id: 6,
    name: { default: 'Bruins' },
    abbrev: 'BOS',
    logo: 'https://assets.example.test/bos.svg',
    ...overrides
  };
}

/**
 * A preseason game that has not started, on 2025-09-21
 */
export function scoreGame(overrides: Partial<ScoreGame> = {}): ScoreGame {
  return {
    id: 2025010007,
    season: 20252026,
    gameType: 1,
    gameDate: '2025-09-21',
    gameState: 'FUT',
    gameScheduleState: 'OK',
    startTimeUTC: '2025-09-21T23:00:00Z',
    easternUTCOffset: '-04:00',
    venueUTCOffset: '-04:00',
    venueTimezone: 'America/Toronto',
    neutralSite: false,
    venue: { default: 'Scotiabank Arena' },
    homeTeam: homeTeam(),
    awayTeam: awayTeam(),
    tvBroadcasts: [{ id: 1, market: 'N', countryCode: 'CA', network: 'SN', sequenceNumber: 1 }],
    gameCenterLink: '/gamecenter/bos-vs-tor/2025/09/21/2025010007',
    ...overrides
  };
}

/**
 * Copy of an object with one top-level field removed
 */
export function withoutField(game: Record<string, unknown>, field: string): Record<string, unknown> {
  const copy: Record<string, unknown> = { ...game };
  delete copy[field];
  return copy;
}

export function scoreboard(games: unknown[], currentDate = '2025-09-21'): Record<string, unknown> {
  return { currentDate, games };
}

export interface FakeClient extends ScoreClient {
  calls: string[];
}

/**
 * ScoreClient whose responses come from a callback; throwing from the
 * callback behaves like a failed request
 */
export function fakeClient(respond: (date: string, call: number) => Record<string, unknown>): FakeClient {
  const calls: string[] = [];
  const scoreUrl = (date: string) => `${BASE_URL}/v1/score/${date}`;
  return {
    calls,
    scoreUrl,
    async fetchScores(date: string): Promise<ScoreFetch> {
      calls.push(date);
      const payload = respond(date, calls.length);
      return { url: scoreUrl(date), status: 200, payload };
    }
  };
}
