/**
 * Stage 2: composite scoring, rivalry penalty, ranking and truncation
 */

import { parseISO } from 'date-fns';
import rivalryData from '../../data/rivalries.json';
import { config } from './config';
import { Logger } from './logger';
import { impliedProbability } from './prob';
import {
  compareStrings,
  formatDecimalOdds,
  formatPercentage,
  formatPercentagePoints,
  formatSignedPercentage,
} from './utils';
import type {
  BetCandidate,
  RankedCandidate,
  RecommendedLeg,
  ScoredCandidate,
  Sport,
} from '../types/candidate';

export interface Rivalry {
  teams: readonly string[];
  name: string;
}

export interface CompositeWeights {
  modelProbability: number;
  expectedValue: number;
  edge: number;
  consistency: number;
}

export interface Stage2Options {
  legLimit: number;
  weights: CompositeWeights;
  scaling: { expectedValue: number; edge: number; consistency: number };
  rivalryPenalty: number;
  streakBonus: number;
  minWinningStreak: number;
  maxOpponentStreak: number;
  consistencyWindow: number;
  rivalries: Record<Sport, readonly Rivalry[]>;
}

export const KNOWN_RIVALRIES: Record<Sport, readonly Rivalry[]> = rivalryData;

// Hard cap on the recommended list, whatever the caller asks for
export const MAX_RECOMMENDED_LEGS = config.stage2.legLimit;

export const DEFAULT_STAGE2_OPTIONS: Stage2Options = {
  ...config.stage2,
  rivalries: KNOWN_RIVALRIES,
};

const WEIGHT_TOLERANCE = 1e-9;

export function assertWeightsSumToOne(weights: CompositeWeights): void {
  const total = weights.modelProbability + weights.expectedValue + weights.edge + weights.consistency;
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new Error(`Composite weights must sum to 1.0, got ${total}`);
  }
}

function namesMatch(team: string, rivalTeam: string): boolean {
  const a = team.trim().toLowerCase();
  const b = rivalTeam.trim().toLowerCase();
  return a !== '' && (a.includes(b) || b.includes(a));
}

/**
 * Look the matchup up in the static rivalry set, in either orientation
 */
export function findRivalry(
  candidate: Pick<BetCandidate, 'sport' | 'home_team' | 'away_team'>,
  rivalries: Record<Sport, readonly Rivalry[]> = KNOWN_RIVALRIES
): Rivalry | null {
  for (const rivalry of rivalries[candidate.sport]) {
    const [first, second] = rivalry.teams;
    if (first === undefined || second === undefined) continue;

    const direct = namesMatch(candidate.home_team, first) && namesMatch(candidate.away_team, second);
    const reversed = namesMatch(candidate.home_team, second) && namesMatch(candidate.away_team, first);
    if (direct || reversed) return rivalry;
  }
  return null;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Stability of the underlying stat over the recent window: 1 - coefficient of
 * variation, clamped to [0,1]. Without a series, an explicit
 * consistency_score feature is used, then an estimate from the price.
 */
export function consistencyScore(
  candidate: BetCandidate,
  window: number = config.stage2.consistencyWindow
): number {
  const series = candidate.context_features.recent_stat_values;

  // The only object-shaped feature value is a numeric series
  if (typeof series === 'object' && series.length >= 2 && window >= 2) {
    const recent = series.slice(-window);
    const mean = recent.reduce((a, b) => a + b, 0) / recent.length;
    if (mean !== 0) {
      const variance = recent.reduce((sum, v) => sum + (v - mean) ** 2, 0) / recent.length;
      return clamp01(1 - Math.sqrt(variance) / Math.abs(mean));
    }
  }

  const explicit = candidate.context_features.consistency_score;
  if (typeof explicit === 'number' && Number.isFinite(explicit)) {
    return clamp01(explicit);
  }

  const implied = impliedProbability(candidate.decimal_odds);
  const estimate = candidate.decimal_odds <= config.stage1.maxOdds ? 0.65 + implied * 0.2 : 0.4 + implied * 0.3;
  return Math.min(estimate, 0.95);
}

/**
 * Weighted blend before penalties and bonuses
 */
export function baseCompositeScore(
  candidate: Pick<ScoredCandidate, 'model_probability' | 'expected_value' | 'edge'>,
  consistency: number,
  weights: CompositeWeights = config.stage2.weights,
  scaling: Stage2Options['scaling'] = config.stage2.scaling
): number {
  return (
    candidate.model_probability * weights.modelProbability +
    candidate.expected_value * scaling.expectedValue * weights.expectedValue +
    candidate.edge * scaling.edge * weights.edge +
    consistency * scaling.consistency * weights.consistency
  );
}

function streakBonus(candidate: BetCandidate, options: Stage2Options): number {
  const { current_streak: streak, opponent_streak: opponentStreak } = candidate.context_features;
  let bonus = 0;
  if (typeof streak === 'number' && streak >= options.minWinningStreak) bonus += options.streakBonus;
  if (typeof opponentStreak === 'number' && opponentStreak <= options.maxOpponentStreak) bonus += options.streakBonus;
  return bonus;
}

export function scoreCandidate(candidate: ScoredCandidate, options: Stage2Options = DEFAULT_STAGE2_OPTIONS): RankedCandidate {
  const rivalry = findRivalry(candidate, options.rivalries);
  const consistency = consistencyScore(candidate, options.consistencyWindow);

  let composite = baseCompositeScore(candidate, consistency, options.weights, options.scaling);
  // Penalty lands on the score only; model_probability stays as estimated
  if (rivalry) composite -= options.rivalryPenalty;
  composite += streakBonus(candidate, options);

  return {
    ...candidate,
    rivalry_flag: rivalry !== null,
    rivalry_name: rivalry?.name ?? null,
    consistency_score: consistency,
    composite_score: composite,
  };
}

/**
 * Total order: adjusted score, model probability, odds (all descending),
 * then earliest start, then identifiers.
 */
export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  return (
    b.composite_score - a.composite_score ||
    b.model_probability - a.model_probability ||
    b.decimal_odds - a.decimal_odds ||
    parseISO(a.event_start_time).getTime() - parseISO(b.event_start_time).getTime() ||
    compareStrings(a.event_id, b.event_id) ||
    compareStrings(a.market_type, b.market_type) ||
    compareStrings(a.selection, b.selection)
  );
}

function marketView(odds: number): string {
  if (odds <= 1.1) return 'Heavy favourite (implied >90%)';
  if (odds <= 1.15) return 'Strong favourite (implied 85-90%)';
  if (odds <= 1.2) return 'Clear favourite (implied 80-85%)';
  return 'Moderate favourite (implied 75-80%)';
}

/**
 * Rationale built only from the leg's own fields
 */
export function generateRationale(leg: Omit<RecommendedLeg, 'rationale'>): string {
  const parts = [
    `#${leg.rank} ${leg.selection} @ ${formatDecimalOdds(leg.decimal_odds)}.`,
    `Model ${formatPercentage(leg.model_probability, 1)} vs market implied ${formatPercentage(leg.implied_probability, 1)} = ${formatPercentagePoints(leg.edge)} edge.`,
    `EV ${formatSignedPercentage(leg.expected_value)}.`,
    `Consistency ${formatPercentage(leg.consistency_score, 0)}.`,
  ];

  if (leg.rivalry_flag) {
    parts.push('Rivalry matchup: composite score penalised.');
  }

  parts.push(`Market view: ${marketView(leg.decimal_odds)}.`);

  return parts.join(' ');
}

/**
 * Score, rank and truncate Stage-1 survivors. An empty input gives an empty list.
 */
export function stage2DeepPrune(
  survivors: readonly ScoredCandidate[],
  overrides: Partial<Stage2Options> = {}
): RecommendedLeg[] {
  const options: Stage2Options = { ...DEFAULT_STAGE2_OPTIONS, ...overrides };
  assertWeightsSumToOne(options.weights);

  const logger = new Logger('stage2');
  const limit = Math.max(0, Math.min(options.legLimit, MAX_RECOMMENDED_LEGS));

  const ranked = survivors.map(candidate => scoreCandidate(candidate, options)).sort(compareRanked);

  const seen = new Set<string>();
  const legs: RecommendedLeg[] = [];

  for (const candidate of ranked) {
    if (legs.length >= limit) break;

    const key = [candidate.event_id, candidate.selection].join('|');
    if (seen.has(key)) continue;
    seen.add(key);

    const unexplained = { ...candidate, rank: legs.length + 1 };
    legs.push({ ...unexplained, rationale: generateRationale(unexplained) });
  }

  logger.debug(() => `Stage 2: ${survivors.length} candidates -> ${legs.length} legs`);

  return legs;
}
