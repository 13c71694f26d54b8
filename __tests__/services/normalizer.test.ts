import { describe, it, expect } from 'vitest';
import { normalizeScores, normalizeGame } from '../../src/services/normalizer.js';
import { MalformedPayloadError } from '../../src/errors/index.js';
import { scoreGame, scoreboard, withoutField, homeTeam, awayTeam } from '../helpers/fixtures.js';

describe('normalizer', () => {
  describe('normalizeGame', () => {
    it('should map a scheduled game with no scores to nulls', () => {
      const { game, teams, venue } = normalizeGame(scoreGame(), 'games[0]');

      expect(game).toEqual({
        externalId: 2025010007,
        season: 20252026,
        gameType: 1,
        gameDate: '2025-09-21',
        state: 'SCHEDULED',
        remoteState: 'FUT',
        scheduleState: 'OK',
        homeTeamId: 10,
        awayTeamId: 6,
        homeScore: null,
        awayScore: null,
        homeSog: null,
        awaySog: null,
        homeRecord: null,
        awayRecord: null,
        venueKey: 'scotiabank-arena',
        startTimeUtc: new Date('2025-09-21T23:00:00Z'),
        easternUtcOffset: '-04:00',
        venueUtcOffset: '-04:00',
        neutralSite: false,
        gameCenterLink: '/gamecenter/bos-vs-tor/2025/09/21/2025010007',
        ticketsLink: null,
        broadcasts: [{ network: 'SN', countryCode: 'CA', market: 'N', sequenceNumber: 1 }]
      });
      expect(teams).toEqual([
        { externalId: 10, name: 'Maple Leafs', abbreviation: 'TOR', logoUrl: 'https://assets.example.test/tor.svg' },
        { externalId: 6, name: 'Bruins', abbreviation: 'BOS', logoUrl: 'https://assets.example.test/bos.svg' }
      ]);
      expect(venue).toEqual({
        key: 'scotiabank-arena',
        name: 'Scotiabank Arena',
        timezone: 'America/Toronto',
        utcOffset: '-04:00'
      });
    });

    it('should keep scores, shots and records of a final game', () => {
      const { game } = normalizeGame(
        scoreGame({
          gameState: 'OFF',
          homeTeam: homeTeam({ score: 4, sog: 31, record: '1-0-0' }),
          awayTeam: awayTeam({ score: 0, sog: 22, record: '0-1-0' })
        }),
        'games[0]'
      );

      expect(game.state).toBe('FINAL');
      expect(game.remoteState).toBe('OFF');
      expect(game.homeScore).toBe(4);
      expect(game.awayScore).toBe(0);
      expect(game.homeSog).toBe(31);
      expect(game.awaySog).toBe(22);
      expect(game.homeRecord).toBe('1-0-0');
      expect(game.awayRecord).toBe('0-1-0');
    });

    it('should default a missing gameState to scheduled', () => {
      const { game } = normalizeGame(withoutField(scoreGame(), 'gameState'), 'games[0]');

      expect(game.state).toBe('SCHEDULED');
      expect(game.remoteState).toBe('FUT');
    });

    it('should leave venue, start time and broadcasts absent when the payload omits them', () => {
      const raw = withoutField(withoutField(scoreGame({ venue: null }), 'startTimeUTC'), 'tvBroadcasts');
      const { game, venue } = normalizeGame(raw, 'games[0]');

      expect(venue).toBeNull();
      expect(game.venueKey).toBeNull();
      expect(game.startTimeUtc).toBeNull();
      expect(game.broadcasts).toEqual([]);
    });

    it('should fall back through commonName and placeName for team names', () => {
      const { teams } = normalizeGame(
        scoreGame({
          homeTeam: { id: 10, abbrev: 'TOR', commonName: { default: 'Maple Leafs' } },
          awayTeam: { id: 6, abbrev: 'BOS' }
        }),
        'games[0]'
      );

      expect(teams[0].name).toBe('Maple Leafs');
      expect(teams[1].name).toBe('BOS');
      expect(teams[1].logoUrl).toBeNull();
    });

    it('should drop duplicate broadcasts by network and country', () => {
      const { game } = normalizeGame(
        scoreGame({
          tvBroadcasts: [
            { countryCode: 'US', network: 'ESPN+', sequenceNumber: 1 },
            { countryCode: 'CA', network: 'SN', sequenceNumber: 2 },
            { countryCode: 'US', network: 'ESPN+', sequenceNumber: 3 }
          ]
        }),
        'games[0]'
      );

      expect(game.broadcasts).toEqual([
        { network: 'ESPN+', countryCode: 'US', market: null, sequenceNumber: 1 },
        { network: 'SN', countryCode: 'CA', market: null, sequenceNumber: 2 }
      ]);
    });

    it('should name the offending field when a required field is missing', () => {
      expect(() => normalizeGame(withoutField(scoreGame(), 'season'), 'games[4]')).toThrow(
        new MalformedPayloadError('missing required field', 'games[4].season')
      );
    });

    it('should reject a team without an id', () => {
      const raw = { ...scoreGame(), homeTeam: { abbrev: 'TOR' } };

      expect(() => normalizeGame(raw, 'games[0]')).toThrow('games[0].homeTeam.id: missing required field');
    });

    it('should reject unknown game types and states', () => {
      expect(() => normalizeGame(scoreGame({ gameType: 9 }), 'games[0]')).toThrow(
        'games[0].gameType: unknown game type 9'
      );
      expect(() => normalizeGame(scoreGame({ gameState: 'HALF' }), 'games[0]')).toThrow(
        'games[0].gameState: unknown game state "HALF"'
      );
    });

    it('should reject a game state named like an object property', () => {
      expect(() => normalizeGame(scoreGame({ gameState: 'constructor' }), 'games[0]')).toThrow(
        'games[0].gameState: unknown game state "constructor"'
      );
      expect(() => normalizeGame(scoreGame({ gameState: 'toString' }), 'games[0]')).toThrow(
        'games[0].gameState: unknown game state "toString"'
      );
    });

    it('should reject an optional field with the wrong type', () => {
      const raw = { ...scoreGame(), homeTeam: { ...homeTeam(), score: '4' } };

      expect(() => normalizeGame(raw, 'games[0]')).toThrow('games[0].homeTeam.score: expected a non-negative integer');
    });

    it('should reject a malformed date', () => {
      expect(() => normalizeGame(scoreGame({ gameDate: '2025-09-31' }), 'games[0]')).toThrow(
        'games[0].gameDate: expected a YYYY-MM-DD date'
      );
    });
  });

  describe('normalizeScores', () => {
    it('should deduplicate teams and venues across games', () => {
      const result = normalizeScores(
        scoreboard([
          scoreGame(),
          scoreGame({
            id: 2025010008,
            homeTeam: homeTeam({ name: { default: 'Toronto Maple Leafs' } }),
            awayTeam: awayTeam({ id: 8, abbrev: 'MTL', name: { default: 'Canadiens' } })
          })
        ])
      );

      expect(result.games.map((g) => g.externalId)).toEqual([2025010007, 2025010008]);
      expect(result.teams.map((t) => t.externalId)).toEqual([10, 6, 8]);
      // Last sighting wins
      expect(result.teams[0].name).toBe('Toronto Maple Leafs');
      expect(result.venues).toHaveLength(1);
      expect(result.errors).toEqual([]);
      expect(result.currentDate).toBe('2025-09-21');
    });

    it('should drop a malformed game and keep the rest', () => {
      const result = normalizeScores(
        scoreboard([scoreGame(), withoutField(scoreGame({ id: 2025010009 }), 'id'), scoreGame({ id: 2025010010 })])
      );

      expect(result.games.map((g) => g.externalId)).toEqual([2025010007, 2025010010]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].path).toBe('games[1].id');
      expect(result.errors[0].message).toBe('games[1].id: missing required field');
    });

    it('should not register teams of a dropped game', () => {
      const result = normalizeScores(
        scoreboard([scoreGame({ awayTeam: awayTeam({ id: 99, abbrev: '' }) })])
      );

      expect(result.teams).toEqual([]);
      expect(result.games).toEqual([]);
      expect(result.errors[0].message).toBe('games[0].awayTeam.abbrev: expected a non-empty string');
    });

    it('should treat a payload without games as an empty day', () => {
      const result = normalizeScores({ currentDate: '2025-07-04' });

      expect(result).toEqual({ currentDate: '2025-07-04', teams: [], venues: [], games: [], errors: [] });
    });

    it('should fail the whole payload when it is unusable', () => {
      expect(() => normalizeScores('<html></html>')).toThrow('$: expected a JSON object');
      expect(() => normalizeScores({ games: {} })).toThrow('games: expected an array');
    });
  });
});
