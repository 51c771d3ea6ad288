/**
 * Value calculations: model probability vs market odds
 */

import { config } from './config';
import type { ConfidenceTier } from '../types/candidate';

export interface ValueMetrics {
  implied_probability: number;
  edge: number;
  expected_value: number;
}

export interface ConfidenceTierThresholds {
  high: { minModelProbability: number; minEdge: number };
  medium: { minModelProbability: number; minEdge: number };
}

/**
 * Convert decimal odds to the market's implied probability
 */
export function impliedProbability(decimalOdds: number): number {
  return 1 / decimalOdds;
}

/**
 * Convert probability to fair decimal odds
 */
export function probabilityToDecimal(probability: number): number {
  return 1 / probability;
}

/**
 * Expected profit per unit stake
 */
export function expectedValue(modelProbability: number, decimalOdds: number): number {
  return modelProbability * decimalOdds - 1;
}

/**
 * Model probability minus market implied probability
 */
export function edge(modelProbability: number, decimalOdds: number): number {
  return modelProbability - impliedProbability(decimalOdds);
}

/**
 * All three metrics from one (probability, odds) pair. Recomputed on every
 * call so the values can never drift apart.
 */
export function computeValueMetrics(modelProbability: number, decimalOdds: number): ValueMetrics {
  return {
    implied_probability: impliedProbability(decimalOdds),
    edge: edge(modelProbability, decimalOdds),
    expected_value: expectedValue(modelProbability, decimalOdds),
  };
}

export function confidenceTier(
  modelProbability: number,
  edgeValue: number,
  thresholds: ConfidenceTierThresholds = config.confidenceTiers
): ConfidenceTier {
  if (modelProbability >= thresholds.high.minModelProbability && edgeValue >= thresholds.high.minEdge) {
    return 'high';
  }
  if (modelProbability >= thresholds.medium.minModelProbability && edgeValue >= thresholds.medium.minEdge) {
    return 'medium';
  }
  return 'low';
}

/**
 * Product of decimal odds across legs
 */
export function combineOdds(odds: readonly number[]): number {
  return odds.reduce((acc, o) => acc * o, 1);
}
