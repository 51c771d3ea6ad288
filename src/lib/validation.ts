/**
 * Candidate validation. Anything rejected here is dropped before Stage 1 with
 * a logged reason; the rest of the pool carries on.
 */

import { addHours, isAfter, isValid, parseISO } from 'date-fns';
import marketAllowList from '../../data/market-allow-list.json';
import { config } from './config';
import { InvalidInputError } from './errors';
import {
  isSport,
  type BetCandidate,
  type ContextFeatures,
  type FeatureValue,
  type Sport,
} from '../types/candidate';

const ALLOWED_MARKETS: Record<Sport, readonly string[]> = marketAllowList;

export function candidateKey(candidate: Pick<BetCandidate, 'event_id' | 'selection' | 'market_type'>): string {
  return `${candidate.event_id}:${candidate.market_type}:${candidate.selection}`;
}

export function isAllowedMarket(sport: Sport, marketType: string): boolean {
  return ALLOWED_MARKETS[sport].includes(marketType);
}

export function isPlaceholderTeam(name: string): boolean {
  const normalized = name.trim().toLowerCase();
  return normalized === '' || config.placeholderOpponents.some(p => normalized === p);
}

/**
 * True when the event starts after `now` and no later than the horizon.
 * Days are fixed 24-hour spans so a DST change cannot move the edge.
 */
export function isWithinEventWindow(
  eventStartTime: string,
  now: Date,
  daysAhead: number = config.maxEventDaysAhead
): boolean {
  const start = parseISO(eventStartTime);
  if (!isValid(start)) return false;
  return isAfter(start, now) && !isAfter(start, addHours(now, daysAhead * 24));
}

/**
 * Returns the first problem found, or null for a valid candidate
 */
export function validateCandidate(candidate: BetCandidate, now: Date): InvalidInputError | null {
  if (!Number.isFinite(candidate.decimal_odds) || candidate.decimal_odds <= 1.0) {
    return new InvalidInputError(`decimal_odds must be > 1.0, got ${candidate.decimal_odds}`, 'decimal_odds');
  }
  if (!isSport(candidate.sport)) {
    return new InvalidInputError(`unsupported sport ${String(candidate.sport)}`, 'sport');
  }
  if (!isAllowedMarket(candidate.sport, candidate.market_type)) {
    return new InvalidInputError(
      `market ${candidate.market_type} is not allowed for ${candidate.sport}`,
      'market_type'
    );
  }
  if (isPlaceholderTeam(candidate.home_team) || isPlaceholderTeam(candidate.away_team)) {
    return new InvalidInputError(
      `unconfirmed opponent in ${candidate.home_team} vs ${candidate.away_team}`,
      'away_team'
    );
  }
  if (!isValid(parseISO(candidate.event_start_time))) {
    return new InvalidInputError(`unparseable event_start_time ${candidate.event_start_time}`, 'event_start_time');
  }
  if (!isWithinEventWindow(candidate.event_start_time, now)) {
    return new InvalidInputError(
      `event_start_time ${candidate.event_start_time} is outside the ${config.maxEventDaysAhead}-day window`,
      'event_start_time'
    );
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFeatureValue(value: unknown): value is FeatureValue {
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'string' || typeof value === 'boolean') return true;
  return Array.isArray(value) && value.every(v => typeof v === 'number' && Number.isFinite(v));
}

function readString(row: Record<string, unknown>, field: string): string {
  const value = row[field];
  if (typeof value !== 'string' || value === '') {
    throw new InvalidInputError(`${field} must be a non-empty string`, field);
  }
  return value;
}

function readNumber(row: Record<string, unknown>, field: string): number {
  const value = row[field];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new InvalidInputError(`${field} must be a number`, field);
  }
  return parsed;
}

function readFeatures(value: unknown): ContextFeatures {
  if (value === null || value === undefined) return {};
  if (!isRecord(value)) {
    throw new InvalidInputError('context_features must be an object', 'context_features');
  }
  const features: Record<string, FeatureValue> = {};
  for (const [name, feature] of Object.entries(value)) {
    if (!isFeatureValue(feature)) {
      throw new InvalidInputError(`context feature ${name} has an unsupported value`, 'context_features');
    }
    features[name] = feature;
  }
  return features;
}

/**
 * Build a BetCandidate from an untyped storage row. Throws InvalidInputError
 * naming the first bad field.
 */
export function parseCandidateRow(row: unknown): BetCandidate {
  if (!isRecord(row)) {
    throw new InvalidInputError('row is not an object', 'row');
  }

  const sport = row.sport;
  if (!isSport(sport)) {
    throw new InvalidInputError(`unsupported sport ${String(sport)}`, 'sport');
  }

  const candidate: BetCandidate = {
    sport,
    market_type: readString(row, 'market_type'),
    event_id: readString(row, 'event_id'),
    event_start_time: readString(row, 'event_start_time'),
    selection: readString(row, 'selection'),
    decimal_odds: readNumber(row, 'decimal_odds'),
    context_features: readFeatures(row.context_features),
    home_team: readString(row, 'home_team'),
    away_team: readString(row, 'away_team'),
    ...(row.line !== null && row.line !== undefined ? { line: readNumber(row, 'line') } : {}),
    ...(typeof row.bookmaker === 'string' ? { bookmaker: row.bookmaker } : {}),
  };

  return candidate;
}
