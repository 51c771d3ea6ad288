/**
 * One pass of the scoring pipeline over a candidate-pool snapshot:
 * validate -> estimate -> value metrics -> Stage 1 -> Stage 2
 */

import { v4 as uuidv4 } from 'uuid';
import { config } from './config';
import { stage2DeepPrune, type Stage2Options } from './deep-pruner';
import { DataQualityError, type InvalidInputError } from './errors';
import type { ProbabilityEstimator } from './estimator';
import { formatDiagnosticSummary, type Stage1DiagnosticSummary, type Stage1Thresholds } from './filter-diagnostics';
import { Logger } from './logger';
import { stage1NumericalFilter } from './numerical-filter';
import { computeValueMetrics, confidenceTier } from './prob';
import { candidateKey, validateCandidate } from './validation';
import type {
  BetCandidate,
  CandidatePoolSnapshot,
  PipelineStats,
  RecommendedLeg,
  ScoredCandidate,
} from '../types/candidate';

export interface PipelineDependencies {
  estimator: ProbabilityEstimator;
  now?: Date;
  stage1Thresholds?: Stage1Thresholds;
  stage2?: Partial<Stage2Options>;
}

export interface DroppedCandidate {
  candidate: BetCandidate;
  error: InvalidInputError;
}

export interface ScoringResult {
  scored: ScoredCandidate[];
  dropped: DroppedCandidate[];
}

export interface PipelineResult extends ScoringResult {
  stage1: ScoredCandidate[];
  legs: RecommendedLeg[];
  diagnostics: Stage1DiagnosticSummary;
  stats: PipelineStats;
}

function safeEstimate(estimator: ProbabilityEstimator, candidate: BetCandidate, logger: Logger): number {
  const key = candidateKey(candidate);
  let probability: number;

  try {
    probability = estimator.estimate(candidate);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    logger.dataQuality(new DataQualityError(`estimator ${estimator.name} failed for ${key}: ${reason}`, key, 'model_output'));
    return config.estimator.fallbackProbability;
  }

  if (!Number.isFinite(probability) || probability < 0 || probability > 1) {
    logger.dataQuality(new DataQualityError(`estimator ${estimator.name} returned ${probability} for ${key}`, key, 'model_output'));
    return Number.isFinite(probability) ? Math.min(1, Math.max(0, probability)) : config.estimator.fallbackProbability;
  }
  return probability;
}

/**
 * Validate and score every candidate. Invalid candidates are dropped with a
 * logged reason; the rest of the batch is unaffected.
 */
export function scoreCandidates(
  candidates: readonly BetCandidate[],
  estimator: ProbabilityEstimator,
  now: Date
): ScoringResult {
  const logger = new Logger('pipeline');
  const scored: ScoredCandidate[] = [];
  const dropped: DroppedCandidate[] = [];

  for (const candidate of candidates) {
    const invalid = validateCandidate(candidate, now);
    if (invalid) {
      logger.warn(`Dropped ${candidateKey(candidate)}: ${invalid.message}`, { code: invalid.code, field: invalid.field });
      dropped.push({ candidate, error: invalid });
      continue;
    }

    const modelProbability = safeEstimate(estimator, candidate, logger);
    const metrics = computeValueMetrics(modelProbability, candidate.decimal_odds);

    scored.push({
      ...candidate,
      model_probability: modelProbability,
      ...metrics,
      confidence_tier: confidenceTier(modelProbability, metrics.edge),
    });
  }

  return { scored, dropped };
}

/**
 * Run every stage against one snapshot. The snapshot is read once and never
 * modified, so concurrent runs on the same snapshot are independent.
 */
export function runPipeline(snapshot: CandidatePoolSnapshot, deps: PipelineDependencies): PipelineResult {
  const logger = new Logger('pipeline');
  const now = deps.now ?? new Date();
  const done = logger.time('pipeline run');

  const { scored, dropped } = scoreCandidates(snapshot.candidates, deps.estimator, now);
  const { survivors, summary } = stage1NumericalFilter(scored, now, deps.stage1Thresholds);
  const legs = stage2DeepPrune(survivors, deps.stage2);

  const stats: PipelineStats = {
    run_id: uuidv4(),
    generated_at: now.toISOString(),
    snapshot_version: snapshot.version,
    candidates_in: snapshot.candidates.length,
    invalid_dropped: dropped.length,
    survivors_stage1: survivors.length,
    final_legs_count: legs.length,
  };

  logger.section('Pipeline run', '🎯');
  logger.summary({ ...stats, estimator: deps.estimator.name });
  logger.debug(() => formatDiagnosticSummary(summary));
  legs.forEach(leg => logger.leg(leg));
  done();

  return { scored, dropped, stage1: survivors, legs, diagnostics: summary, stats };
}
