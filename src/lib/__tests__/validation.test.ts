/**
 * Unit tests for candidate validation and row parsing
 */

import { InvalidInputError } from '../errors';
import {
  candidateKey,
  isAllowedMarket,
  isPlaceholderTeam,
  isWithinEventWindow,
  parseCandidateRow,
  validateCandidate,
} from '../validation';
import { NOW, makeCandidate } from './factories';

describe('Candidate Validation', () => {
  describe('candidateKey', () => {
    it('should join event, market and selection', () => {
      expect(candidateKey(makeCandidate())).toBe('evt-1:moneyline:Boston Celtics');
    });
  });

  describe('isAllowedMarket', () => {
    it('should accept markets on the sport allow-list', () => {
      expect(isAllowedMarket('basketball', 'player_points_over_under')).toBe(true);
      expect(isAllowedMarket('mixed_martial_arts', 'method_of_victory')).toBe(true);
    });

    it('should reject markets listed only for another sport', () => {
      expect(isAllowedMarket('mixed_martial_arts', 'spread')).toBe(false);
      expect(isAllowedMarket('basketball', 'player_anytime_try_scorer')).toBe(false);
    });
  });

  describe('isPlaceholderTeam', () => {
    it('should flag unconfirmed opponents in any case', () => {
      expect(isPlaceholderTeam('TBA')).toBe(true);
      expect(isPlaceholderTeam(' tbd ')).toBe(true);
      expect(isPlaceholderTeam('To Be Announced')).toBe(true);
      expect(isPlaceholderTeam('')).toBe(true);
    });

    it('should accept real names that contain the letters', () => {
      expect(isPlaceholderTeam('Tbilisi Tigers')).toBe(false);
    });
  });

  describe('isWithinEventWindow', () => {
    it('should accept events up to exactly seven days ahead', () => {
      expect(isWithinEventWindow('2026-10-26T12:00:00.000Z', NOW)).toBe(true);
      expect(isWithinEventWindow('2026-10-26T12:00:00.001Z', NOW)).toBe(false);
    });

    it('should reject events that have already started', () => {
      expect(isWithinEventWindow('2026-10-19T12:00:00.000Z', NOW)).toBe(false);
      expect(isWithinEventWindow('2026-10-18T12:00:00.000Z', NOW)).toBe(false);
    });

    it('should reject unparseable timestamps', () => {
      expect(isWithinEventWindow('next tuesday', NOW)).toBe(false);
    });
  });

  describe('validateCandidate', () => {
    it('should accept a well-formed candidate', () => {
      expect(validateCandidate(makeCandidate(), NOW)).toBeNull();
    });

    it('should reject odds at or below 1.0', () => {
      const error = validateCandidate(makeCandidate({ decimal_odds: 1.0 }), NOW);
      expect(error).toBeInstanceOf(InvalidInputError);
      expect(error?.field).toBe('decimal_odds');
    });

    it('should reject markets outside the allow-list', () => {
      const error = validateCandidate(makeCandidate({ market_type: 'first_basket_scorer' }), NOW);
      expect(error?.field).toBe('market_type');
      expect(error?.message).toBe('market first_basket_scorer is not allowed for basketball');
    });

    it('should reject a TBA opponent', () => {
      const error = validateCandidate(makeCandidate({ away_team: 'TBA' }), NOW);
      expect(error?.field).toBe('away_team');
      expect(error?.code).toBe('INVALID_INPUT');
    });

    it('should reject events beyond the window', () => {
      const error = validateCandidate(makeCandidate({ event_start_time: '2026-11-02T00:00:00.000Z' }), NOW);
      expect(error?.field).toBe('event_start_time');
    });
  });

  describe('parseCandidateRow', () => {
    const row = {
      id: 42,
      sport: 'rugby_league',
      market_type: 'player_anytime_try_scorer',
      event_id: 'nrl-7',
      event_start_time: '2026-10-22T09:00:00.000Z',
      selection: 'Latrell Mitchell',
      decimal_odds: '1.18',
      home_team: 'South Sydney Rabbitohs',
      away_team: 'Parramatta Eels',
      context_features: { win_rate: 0.66, recent_stat_values: [1, 1, 0, 1] },
      line: null,
      bookmaker: 'sportsbet',
    };

    it('should build a candidate from a storage row', () => {
      const candidate = parseCandidateRow(row);

      expect(candidate).toEqual({
        sport: 'rugby_league',
        market_type: 'player_anytime_try_scorer',
        event_id: 'nrl-7',
        event_start_time: '2026-10-22T09:00:00.000Z',
        selection: 'Latrell Mitchell',
        decimal_odds: 1.18,
        home_team: 'South Sydney Rabbitohs',
        away_team: 'Parramatta Eels',
        context_features: { win_rate: 0.66, recent_stat_values: [1, 1, 0, 1] },
        bookmaker: 'sportsbet',
      });
    });

    it('should keep a numeric line', () => {
      expect(parseCandidateRow({ ...row, line: 24.5 }).line).toBe(24.5);
    });

    it('should default missing context features to an empty object', () => {
      expect(parseCandidateRow({ ...row, context_features: null }).context_features).toEqual({});
    });

    it('should name the first bad field', () => {
      expect(() => parseCandidateRow({ ...row, decimal_odds: 'evens' })).toThrow('decimal_odds must be a number');
      expect(() => parseCandidateRow({ ...row, sport: 'cricket' })).toThrow(InvalidInputError);
      expect(() => parseCandidateRow({ ...row, selection: '' })).toThrow('selection must be a non-empty string');
    });

    it('should reject nested objects as feature values', () => {
      expect(() => parseCandidateRow({ ...row, context_features: { form: { last5: 3 } } })).toThrow(
        'context feature form has an unsupported value'
      );
    });

    it('should reject non-object rows', () => {
      expect(() => parseCandidateRow('not a row')).toThrow('row is not an object');
    });
  });
});
