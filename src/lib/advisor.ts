/**
 * Read-only query surface over the scoring pipeline. Every query runs the
 * pipeline against the store's current snapshot.
 */

import { config } from './config';
import type { CandidatePoolStore } from './candidate-pool';
import { MAX_RECOMMENDED_LEGS, type Stage2Options } from './deep-pruner';
import { InvalidInputError } from './errors';
import type { ProbabilityEstimator } from './estimator';
import type { Stage1Thresholds } from './filter-diagnostics';
import { buildParlay, type ParlayOptions } from './parlay-builder';
import { runPipeline, type PipelineResult } from './pipeline';
import { combineOdds } from './prob';
import { compareStrings, roundTo } from './utils';
import { candidateKey } from './validation';
import type {
  Parlay,
  PipelineStats,
  RecommendedLeg,
  ScoredCandidate,
  Sport,
} from '../types/candidate';

export interface AdvisorOptions {
  estimator: ProbabilityEstimator;
  store: CandidatePoolStore;
  clock?: () => Date;
  stage1Thresholds?: Stage1Thresholds;
  stage2?: Partial<Stage2Options>;
  parlay?: Partial<ParlayOptions>;
}

export interface ValueBetQuery {
  sport?: Sport;
  limit?: number;
  /** 'all' = every scored candidate with EV above the value floor; 'stage1' = Stage-1 survivors */
  stage?: 'all' | 'stage1';
}

export interface ParlayFilter {
  sport?: Sport;
  market_type?: string;
}

export interface WeeklySummary {
  generated_at: string;
  total_markets_analyzed: number;
  recommended_legs_count: number;
  sports_breakdown: Partial<Record<Sport, number>>;
  average_odds: number;
  average_model_probability: number;
  average_expected_value: number;
  average_composite_score: number;
  sample_four_leg_odds: number | null;
  rivalry_matchups_included: number;
  legs: RecommendedLeg[];
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidInputError(`limit must be a non-negative integer, got ${limit}`, 'limit');
  }
}

function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

function byExpectedValue(a: ScoredCandidate, b: ScoredCandidate): number {
  return b.expected_value - a.expected_value || b.edge - a.edge || compareStrings(candidateKey(a), candidateKey(b));
}

export class ParlayAdvisor {
  private lastStats: PipelineStats | null = null;

  constructor(private readonly options: AdvisorOptions) {}

  private run(): PipelineResult {
    const now = this.options.clock ? this.options.clock() : new Date();
    const result = runPipeline(this.options.store.current(), {
      estimator: this.options.estimator,
      now,
      stage1Thresholds: this.options.stage1Thresholds,
      stage2: this.options.stage2,
    });
    this.lastStats = result.stats;
    return result;
  }

  /** Ranked legs, never more than 20 */
  getRecommendedLegs(limit: number = MAX_RECOMMENDED_LEGS): RecommendedLeg[] {
    assertLimit(limit);
    return this.run().legs.slice(0, Math.min(limit, MAX_RECOMMENDED_LEGS));
  }

  getValueBets(query: ValueBetQuery = {}): ScoredCandidate[] {
    const limit = query.limit ?? config.valueBets.defaultLimit;
    assertLimit(limit);

    const result = this.run();
    const pool = query.stage === 'stage1'
      ? result.stage1
      : result.scored.filter(c => c.expected_value >= config.valueBets.minExpectedValue);

    return pool
      .filter(c => query.sport === undefined || c.sport === query.sport)
      .sort(byExpectedValue)
      .slice(0, limit);
  }

  /** Value bets the model rates at or above the confidence floor */
  getHighConfidenceBets(limit: number = config.valueBets.defaultLimit): ScoredCandidate[] {
    assertLimit(limit);
    return this.run()
      .scored.filter(
        c => c.expected_value >= config.valueBets.minExpectedValue && c.model_probability >= config.valueBets.minConfidence
      )
      .sort(byExpectedValue)
      .slice(0, limit);
  }

  buildParlay(
    targetOdds: number = config.parlay.targetOdds,
    maxLegs: number = config.parlay.maxLegs,
    filter: ParlayFilter = {}
  ): Parlay | null {
    const legs = this.run().legs.filter(
      leg =>
        (filter.sport === undefined || leg.sport === filter.sport) &&
        (filter.market_type === undefined || leg.market_type === filter.market_type)
    );
    return buildParlay(legs, targetOdds, maxLegs, this.options.parlay);
  }

  /** Stats from the most recent run, running once if nothing has run yet */
  getPipelineStats(): PipelineStats {
    return this.lastStats ?? this.run().stats;
  }

  getWeeklySummary(): WeeklySummary {
    const { legs, stats } = this.run();

    const sportsBreakdown: Partial<Record<Sport, number>> = {};
    for (const leg of legs) {
      sportsBreakdown[leg.sport] = (sportsBreakdown[leg.sport] ?? 0) + 1;
    }

    const sample = legs.slice(0, 4);

    return {
      generated_at: stats.generated_at,
      total_markets_analyzed: stats.candidates_in,
      recommended_legs_count: legs.length,
      sports_breakdown: sportsBreakdown,
      average_odds: roundTo(average(legs.map(l => l.decimal_odds)), 2),
      average_model_probability: roundTo(average(legs.map(l => l.model_probability)), 4),
      average_expected_value: roundTo(average(legs.map(l => l.expected_value)), 4),
      average_composite_score: roundTo(average(legs.map(l => l.composite_score)), 3),
      sample_four_leg_odds: sample.length === 4 ? roundTo(combineOdds(sample.map(l => l.decimal_odds)), 2) : null,
      rivalry_matchups_included: legs.filter(l => l.rivalry_flag).length,
      legs,
    };
  }
}
