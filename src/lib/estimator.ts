/**
 * Probability estimators
 *
 * The pipeline only depends on the ProbabilityEstimator interface. The
 * production implementation evaluates a gradient-boosted tree ensemble that
 * was trained offline and exported as JSON; it is loaded once at start-up and
 * shared read-only by every pipeline run.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { config } from './config';
import { DataQualityError, ModelLoadError } from './errors';
import { Logger } from './logger';
import { impliedProbability } from './prob';
import { candidateKey } from './validation';
import type { BetCandidate, FeatureValue } from '../types/candidate';

export interface ProbabilityEstimator {
  readonly name: string;
  /** Win probability in [0,1]. Never throws for a single bad candidate. */
  estimate(candidate: BetCandidate): number;
}

export const MODEL_FEATURES = [
  'win_rate',
  'recent_form',
  'is_favorite',
  'is_home',
  'ranking_diff',
  'implied_prob',
] as const;

export type ModelFeature = (typeof MODEL_FEATURES)[number];
export type ModelFeatureVector = Readonly<Record<ModelFeature, number>>;

export type TreeNode =
  | { readonly leaf: number }
  | {
      readonly feature: ModelFeature;
      readonly threshold: number;
      readonly left: TreeNode;
      readonly right: TreeNode;
    };

export interface ModelArtifact {
  readonly name: string;
  readonly version: string;
  readonly base_score: number;
  readonly learning_rate: number;
  readonly trees: readonly TreeNode[];
}

export interface FeatureExtraction {
  features: ModelFeatureVector;
  issues: DataQualityError[];
  /** A required feature was missing or out of range */
  degraded: boolean;
}

const logger = new Logger('estimator');

function isModelFeature(value: unknown): value is ModelFeature {
  return typeof value === 'string' && MODEL_FEATURES.some(f => f === value);
}

function numericFeature(value: FeatureValue | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function booleanFeature(value: FeatureValue | undefined): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 0 || value === 1) return value === 1;
  return undefined;
}

/**
 * Map context features onto the model's feature vector. Missing and
 * out-of-range values are imputed deterministically and reported as issues.
 */
export function extractModelFeatures(candidate: BetCandidate): FeatureExtraction {
  const key = candidateKey(candidate);
  const raw = candidate.context_features;
  const issues: DataQualityError[] = [];
  let degraded = false;

  const required = (name: 'win_rate' | 'recent_form'): number => {
    const value = numericFeature(raw[name]);
    if (value === undefined || value < 0 || value > 1) {
      issues.push(new DataQualityError(`${name} missing or outside [0,1] for ${key}`, key, name));
      degraded = true;
      return 0.5;
    }
    return value;
  };

  const winRate = required('win_rate');
  const recentForm = required('recent_form');

  let isHome = booleanFeature(raw.is_home);
  if (isHome === undefined) {
    issues.push(new DataQualityError(`is_home missing or not boolean for ${key}, imputed false`, key, 'is_home'));
    isHome = false;
  }

  let rankingDiff = numericFeature(raw.ranking_diff);
  if (rankingDiff === undefined || Math.abs(rankingDiff) > 100) {
    issues.push(new DataQualityError(`ranking_diff missing or outside [-100,100] for ${key}, imputed 0`, key, 'ranking_diff'));
    rankingDiff = 0;
  }

  const implied = impliedProbability(candidate.decimal_odds);

  return {
    features: {
      win_rate: winRate,
      recent_form: recentForm,
      is_favorite: candidate.decimal_odds < 2.0 ? 1 : 0,
      is_home: isHome ? 1 : 0,
      ranking_diff: rankingDiff / 100,
      implied_prob: implied,
    },
    issues,
    degraded,
  };
}

function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

export function evaluateTree(node: TreeNode, features: ModelFeatureVector): number {
  let current = node;
  while (!('leaf' in current)) {
    current = features[current.feature] <= current.threshold ? current.left : current.right;
  }
  return current.leaf;
}

export class TreeEnsembleEstimator implements ProbabilityEstimator {
  readonly name: string;

  constructor(
    private readonly artifact: ModelArtifact,
    private readonly fallbackProbability: number = config.estimator.fallbackProbability
  ) {
    this.name = `tree-ensemble:${artifact.name}@${artifact.version}`;
  }

  estimate(candidate: BetCandidate): number {
    const { features, issues, degraded } = extractModelFeatures(candidate);
    issues.forEach(issue => logger.dataQuality(issue));

    if (degraded) {
      return this.fallbackProbability;
    }

    const margin = this.artifact.trees.reduce(
      (sum, tree) => sum + this.artifact.learning_rate * evaluateTree(tree, features),
      this.artifact.base_score
    );
    const probability = sigmoid(margin);

    if (!Number.isFinite(probability)) {
      const key = candidateKey(candidate);
      logger.dataQuality(new DataQualityError(`non-finite model output for ${key}`, key, 'model_output'));
      return this.fallbackProbability;
    }
    return probability;
  }
}

/**
 * Rule-based model for deployments without a trained artifact: the market's
 * implied probability nudged by win rate, venue and recent form.
 */
export class HeuristicEstimator implements ProbabilityEstimator {
  readonly name = 'heuristic';

  estimate(candidate: BetCandidate): number {
    const features = candidate.context_features;
    const implied = impliedProbability(candidate.decimal_odds);
    const isFavorite = booleanFeature(features.is_favorite) ?? implied > 0.5;
    const winRate = numericFeature(features.win_rate) ?? (isFavorite ? 0.55 : 0.45);
    const recentForm = numericFeature(features.recent_form) ?? (isFavorite ? 0.55 : 0.45);
    const isHome = booleanFeature(features.is_home) ?? false;

    let adjustment: number;
    if (implied >= 0.85) {
      adjustment = winRate >= 0.65 ? 0.05 : winRate >= 0.55 ? 0.03 : 0.01;
    } else if (implied >= 0.75) {
      adjustment = winRate >= 0.6 ? 0.04 : 0.02;
    } else if (implied >= 0.6) {
      adjustment = 0.03;
    } else {
      adjustment = 0.02;
    }

    if (isHome) adjustment += 0.02;
    if (recentForm > 0.6) adjustment += 0.02;

    return Math.min(0.98, Math.max(0.02, implied + adjustment));
  }
}

function parseTree(raw: unknown, path: string, location: string): TreeNode {
  if (typeof raw !== 'object' || raw === null) {
    throw new ModelLoadError(`tree node at ${location} is not an object`, path);
  }
  if ('leaf' in raw) {
    if (typeof raw.leaf !== 'number' || !Number.isFinite(raw.leaf)) {
      throw new ModelLoadError(`leaf at ${location} is not a finite number`, path);
    }
    return { leaf: raw.leaf };
  }
  if (!('feature' in raw) || !isModelFeature(raw.feature)) {
    throw new ModelLoadError(`split at ${location} names an unknown feature`, path);
  }
  if (!('threshold' in raw) || typeof raw.threshold !== 'number' || !Number.isFinite(raw.threshold)) {
    throw new ModelLoadError(`split at ${location} has no finite threshold`, path);
  }
  if (!('left' in raw) || !('right' in raw)) {
    throw new ModelLoadError(`split at ${location} is missing a branch`, path);
  }
  return {
    feature: raw.feature,
    threshold: raw.threshold,
    left: parseTree(raw.left, path, `${location}.left`),
    right: parseTree(raw.right, path, `${location}.right`),
  };
}

/**
 * Validate a decoded artifact. Throws ModelLoadError on any structural problem.
 */
export function parseModelArtifact(raw: unknown, path = '<inline>'): ModelArtifact {
  if (typeof raw !== 'object' || raw === null) {
    throw new ModelLoadError('artifact is not an object', path);
  }
  if (!('name' in raw) || typeof raw.name !== 'string') {
    throw new ModelLoadError('artifact has no name', path);
  }
  if (!('version' in raw) || typeof raw.version !== 'string') {
    throw new ModelLoadError('artifact has no version', path);
  }
  if (!('base_score' in raw) || typeof raw.base_score !== 'number') {
    throw new ModelLoadError('artifact has no numeric base_score', path);
  }
  if (!('learning_rate' in raw) || typeof raw.learning_rate !== 'number' || raw.learning_rate <= 0) {
    throw new ModelLoadError('artifact learning_rate must be a positive number', path);
  }
  if (!('trees' in raw) || !Array.isArray(raw.trees) || raw.trees.length === 0) {
    throw new ModelLoadError('artifact has no trees', path);
  }

  const trees: unknown[] = raw.trees;
  return Object.freeze({
    name: raw.name,
    version: raw.version,
    base_score: raw.base_score,
    learning_rate: raw.learning_rate,
    trees: Object.freeze(trees.map((tree, i) => parseTree(tree, path, `trees[${i}]`))),
  });
}

export function loadModelArtifact(artifactPath: string = config.modelArtifactPath): ModelArtifact {
  const fullPath = resolve(process.cwd(), artifactPath);
  let decoded: unknown;
  try {
    decoded = JSON.parse(readFileSync(fullPath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ModelLoadError(`could not read model artifact: ${reason}`, fullPath);
  }
  return parseModelArtifact(decoded, fullPath);
}

/**
 * Load the model once and hand back the estimator the pipeline should share.
 * Call at process start; a failure here is fatal.
 */
export function createEstimator(artifactPath: string = config.modelArtifactPath): ProbabilityEstimator {
  const artifact = loadModelArtifact(artifactPath);
  logger.info(`Loaded model ${artifact.name}@${artifact.version} (${artifact.trees.length} trees)`);
  return new TreeEnsembleEstimator(artifact);
}
