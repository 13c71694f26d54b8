import { describe, it, expect } from 'vitest';
import { venueKey, isFinal, winner, scoreDisplay } from '../../src/models/entities.js';
import type { GameListing } from '../../src/models/entities.js';

function listing(overrides: Partial<GameListing> = {}): GameListing {
  return {
    externalId: 2025010007,
    season: 20252026,
    gameType: 1,
    gameDate: '2025-09-21',
    state: 'FINAL',
    remoteState: 'OFF',
    scheduleState: 'OK',
    homeTeamId: 10,
    awayTeamId: 6,
    homeScore: 4,
    awayScore: 2,
    homeSog: null,
    awaySog: null,
    homeRecord: null,
    awayRecord: null,
    venueKey: 'scotiabank-arena',
    startTimeUtc: null,
    easternUtcOffset: null,
    venueUtcOffset: null,
    neutralSite: false,
    gameCenterLink: null,
    ticketsLink: null,
    createdAt: new Date('2025-09-21T12:00:00Z'),
    updatedAt: new Date('2025-09-22T04:00:00Z'),
    homeAbbreviation: 'TOR',
    awayAbbreviation: 'BOS',
    ...overrides
  };
}

describe('entities', () => {
  it('should derive venue keys from display names', () => {
    expect(venueKey('  Scotiabank  Arena ')).toBe('scotiabank-arena');
    expect(venueKey('TD Garden')).toBe('td-garden');
  });

  describe('isFinal', () => {
    it('should only hold for final games', () => {
      expect(isFinal(listing())).toBe(true);
      expect(isFinal(listing({ state: 'POSTPONED' }))).toBe(false);
    });
  });

  describe('winner', () => {
    it('should name the team with the higher score once final', () => {
      expect(winner(listing())).toBe('TOR');
      expect(winner(listing({ homeScore: 1, awayScore: 3 }))).toBe('BOS');
    });

    it('should be null before the game is final, on a tie, or without scores', () => {
      expect(winner(listing({ state: 'LIVE' }))).toBeNull();
      expect(winner(listing({ homeScore: 2, awayScore: 2 }))).toBeNull();
      expect(winner(listing({ homeScore: null }))).toBeNull();
    });
  });

  describe('scoreDisplay', () => {
    it('should list the away team first', () => {
      expect(scoreDisplay(listing())).toBe('BOS 2 - 4 TOR');
    });

    it('should fall back to the matchup without scores', () => {
      expect(scoreDisplay(listing({ homeScore: null, awayScore: null }))).toBe('BOS @ TOR');
    });
  });
});
