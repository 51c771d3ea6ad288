/**
 * Parlay engine - main entry point
 * Wires the default estimator and Supabase-backed pool into the advisor
 */

import { ParlayAdvisor, type AdvisorOptions } from './advisor';
import { CandidatePoolStore } from './candidate-pool';
import { createEstimator } from './estimator';

export type { AdvisorOptions, ParlayFilter, ValueBetQuery, WeeklySummary } from './advisor';
export { ParlayAdvisor } from './advisor';
export {
  CandidatePoolStore,
  type CandidatePoolProvider,
  type CandidateQuery,
  type FeatureProvider,
  type RefreshOptions,
} from './candidate-pool';
export { config } from './config';
export {
  DEFAULT_STAGE2_OPTIONS,
  KNOWN_RIVALRIES,
  MAX_RECOMMENDED_LEGS,
  stage2DeepPrune,
  type CompositeWeights,
  type Rivalry,
  type Stage2Options,
} from './deep-pruner';
export { DataQualityError, InvalidInputError, ModelLoadError } from './errors';
export {
  HeuristicEstimator,
  TreeEnsembleEstimator,
  createEstimator,
  loadModelArtifact,
  parseModelArtifact,
  type ModelArtifact,
  type ProbabilityEstimator,
} from './estimator';
export type { Stage1DiagnosticSummary, Stage1Thresholds } from './filter-diagnostics';
export { Logger, clearStoredLogs, getStoredLogs, type LogEntry, type LogLevel } from './logger';
export { stage1NumericalFilter } from './numerical-filter';
export { buildParlay, type ParlayOptions } from './parlay-builder';
export { runPipeline, scoreCandidates, type PipelineDependencies, type PipelineResult } from './pipeline';
export { computeValueMetrics, confidenceTier, edge, expectedValue, impliedProbability } from './prob';
export { SupabaseCandidatePoolProvider, supabase } from './supabase';
export { parseCandidateRow, validateCandidate } from './validation';
export {
  SPORTS,
  isSport,
  type BetCandidate,
  type CandidatePoolSnapshot,
  type ConfidenceTier,
  type ContextFeatures,
  type FeatureValue,
  type Parlay,
  type PipelineStats,
  type RankedCandidate,
  type RecommendedLeg,
  type ScoredCandidate,
  type Sport,
} from '../types/candidate';

/**
 * Advisor over the default model artifact and an empty pool; call
 * `store.refresh(new SupabaseCandidatePoolProvider())` to load candidates.
 */
export function createParlayAdvisor(
  overrides: Partial<AdvisorOptions> = {}
): { advisor: ParlayAdvisor; store: CandidatePoolStore } {
  const store = overrides.store ?? new CandidatePoolStore();
  const estimator = overrides.estimator ?? createEstimator();
  return { advisor: new ParlayAdvisor({ ...overrides, store, estimator }), store };
}
