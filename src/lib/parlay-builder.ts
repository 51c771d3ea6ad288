/**
 * Parlay builder: pick legs whose combined odds land near a target price
 */

import { config } from './config';
import { compareRanked } from './deep-pruner';
import { InvalidInputError } from './errors';
import { Logger } from './logger';
import { combineOdds } from './prob';
import { roundTo } from './utils';
import type { Parlay, RecommendedLeg } from '../types/candidate';

export interface ParlayOptions {
  /** Exhaustive results must reach this share of the target */
  minFraction: number;
  /** Products above target × ceilingMultiplier are never accepted */
  ceilingMultiplier: number;
  /** Legs considered by the exhaustive fallback */
  topK: number;
  /** Node budget for the greedy backtracking pass */
  backtrackStepLimit: number;
}

export const DEFAULT_PARLAY_OPTIONS: ParlayOptions = {
  minFraction: config.parlay.minFraction,
  ceilingMultiplier: config.parlay.ceilingMultiplier,
  topK: config.parlay.topK,
  backtrackStepLimit: config.parlay.backtrackStepLimit,
};

export interface Combination {
  legs: RecommendedLeg[];
  product: number;
}

interface SearchBounds {
  target: number;
  floor: number;
  ceiling: number;
  minLegs: number;
  maxLegs: number;
}

/**
 * Legs chosen so far on the current search path. A parlay never repeats an
 * event or a selection.
 */
class LegSet {
  private legs: RecommendedLeg[] = [];
  private events = new Set<string>();
  private selections = new Set<string>();

  get size(): number {
    return this.legs.length;
  }

  conflictsWith(leg: RecommendedLeg): boolean {
    return this.events.has(leg.event_id) || this.selections.has(leg.selection);
  }

  push(leg: RecommendedLeg): void {
    this.legs.push(leg);
    this.events.add(leg.event_id);
    this.selections.add(leg.selection);
  }

  pop(): void {
    const leg = this.legs.pop();
    if (leg) {
      this.events.delete(leg.event_id);
      this.selections.delete(leg.selection);
    }
  }

  toArray(): RecommendedLeg[] {
    return [...this.legs];
  }
}

function validateParameters(targetOdds: number, maxLegs: number, options: ParlayOptions): void {
  if (!Number.isFinite(targetOdds) || targetOdds <= 1) {
    throw new InvalidInputError(`targetOdds must be a finite number > 1, got ${targetOdds}`, 'targetOdds');
  }
  if (!Number.isInteger(maxLegs) || maxLegs < 1) {
    throw new InvalidInputError(`maxLegs must be an integer >= 1, got ${maxLegs}`, 'maxLegs');
  }
  if (!Number.isInteger(options.topK) || options.topK < 1) {
    throw new InvalidInputError(`topK must be a finite integer >= 1, got ${options.topK}`, 'topK');
  }
  if (!(options.minFraction > 0 && options.minFraction <= 1)) {
    throw new InvalidInputError(`minFraction must be in (0, 1], got ${options.minFraction}`, 'minFraction');
  }
  if (!(options.ceilingMultiplier >= 1) || !Number.isFinite(options.ceilingMultiplier)) {
    throw new InvalidInputError(`ceilingMultiplier must be >= 1, got ${options.ceilingMultiplier}`, 'ceilingMultiplier');
  }
}

function totalScore(legs: readonly RecommendedLeg[]): number {
  return legs.reduce((sum, leg) => sum + leg.composite_score, 0);
}

/**
 * Negative when `a` is the better parlay: meets the target, then closer to
 * it, then fewer legs, then higher total score, then earlier ranks.
 */
export function compareCombinations(a: Combination, b: Combination, target: number): number {
  const aMeets = a.product >= target;
  const bMeets = b.product >= target;
  if (aMeets !== bMeets) return aMeets ? -1 : 1;

  const distance = Math.abs(a.product - target) - Math.abs(b.product - target);
  if (distance !== 0) return distance;

  if (a.legs.length !== b.legs.length) return a.legs.length - b.legs.length;

  const score = totalScore(b.legs) - totalScore(a.legs);
  if (score !== 0) return score;

  for (let i = 0; i < a.legs.length; i++) {
    const rank = a.legs[i].rank - b.legs[i].rank;
    if (rank !== 0) return rank;
  }
  return 0;
}

/**
 * Add the best-scoring eligible leg while the price stays under the ceiling;
 * back off and try the next leg when a branch runs out. Every subset at or
 * above the target seen within the step budget is ranked, and the closest
 * one wins.
 */
function greedySearch(ordered: readonly RecommendedLeg[], bounds: SearchBounds, stepLimit: number): Combination | null {
  const chosen = new LegSet();
  const state: { best: Combination | null; steps: number } = { best: null, steps: 0 };

  const visit = (start: number, product: number): void => {
    if (chosen.size >= bounds.minLegs && product >= bounds.target) {
      const candidate = { legs: chosen.toArray(), product };
      if (state.best === null || compareCombinations(candidate, state.best, bounds.target) < 0) {
        state.best = candidate;
      }
      // More legs only move the price further past the target
      return;
    }
    if (chosen.size >= bounds.maxLegs) return;

    for (let i = start; i < ordered.length; i++) {
      if (++state.steps > stepLimit) return;

      const leg = ordered[i];
      if (chosen.conflictsWith(leg)) continue;

      const next = product * leg.decimal_odds;
      if (next > bounds.ceiling) continue;

      chosen.push(leg);
      visit(i + 1, next);
      chosen.pop();
    }
  };

  visit(0, 1);
  return state.best;
}

/**
 * Every combination of minLegs..maxLegs among the given legs, keeping the
 * best one inside [floor, ceiling]
 */
function exhaustiveSearch(pool: readonly RecommendedLeg[], bounds: SearchBounds): Combination | null {
  const chosen = new LegSet();
  const state: { best: Combination | null } = { best: null };

  const visit = (start: number, product: number) => {
    if (chosen.size >= bounds.minLegs && product >= bounds.floor) {
      const candidate = { legs: chosen.toArray(), product };
      if (state.best === null || compareCombinations(candidate, state.best, bounds.target) < 0) {
        state.best = candidate;
      }
    }
    if (chosen.size >= bounds.maxLegs) return;

    for (let i = start; i < pool.length; i++) {
      const leg = pool[i];
      if (chosen.conflictsWith(leg)) continue;

      // Odds are all > 1, so a product past the ceiling only grows
      const next = product * leg.decimal_odds;
      if (next > bounds.ceiling) continue;

      chosen.push(leg);
      visit(i + 1, next);
      chosen.pop();
    }
  };

  visit(0, 1);
  return state.best;
}

function toParlay(combination: Combination, targetOdds: number, search: Parlay['search']): Parlay {
  return {
    legs: combination.legs,
    leg_count: combination.legs.length,
    combined_odds: combineOdds(combination.legs.map(leg => leg.decimal_odds)),
    combined_probability: combination.legs.reduce((p, leg) => p * leg.model_probability, 1),
    potential_return: roundTo(config.parlay.stake * combination.product, 2),
    target_odds: targetOdds,
    search,
  };
}

/**
 * Build one parlay from ranked legs. Returns null when the legs are empty or
 * nothing reaches target × minFraction; throws InvalidInputError for bad
 * parameters.
 */
export function buildParlay(
  legs: readonly RecommendedLeg[],
  targetOdds: number = config.parlay.targetOdds,
  maxLegs: number = config.parlay.maxLegs,
  overrides: Partial<ParlayOptions> = {}
): Parlay | null {
  const options: ParlayOptions = { ...DEFAULT_PARLAY_OPTIONS, ...overrides };
  validateParameters(targetOdds, maxLegs, options);

  const logger = new Logger('parlay');
  if (legs.length === 0) {
    logger.debug('No legs available for a parlay');
    return null;
  }

  const ordered = [...legs].sort(compareRanked);
  const bounds: SearchBounds = {
    target: targetOdds,
    floor: targetOdds * options.minFraction,
    ceiling: targetOdds * options.ceilingMultiplier,
    minLegs: Math.min(2, maxLegs),
    maxLegs,
  };

  const greedy = greedySearch(ordered, bounds, options.backtrackStepLimit);
  if (greedy) {
    logger.debug(() => `Greedy parlay: ${greedy.legs.length} legs @ ${greedy.product.toFixed(3)}`);
    return toParlay(greedy, targetOdds, 'greedy');
  }

  const exhaustive = exhaustiveSearch(ordered.slice(0, options.topK), bounds);
  if (exhaustive) {
    logger.debug(() => `Exhaustive parlay: ${exhaustive.legs.length} legs @ ${exhaustive.product.toFixed(3)}`);
    return toParlay(exhaustive, targetOdds, 'exhaustive');
  }

  logger.info(`No parlay reaches ${(options.minFraction * 100).toFixed(0)}% of target ${targetOdds} within ${maxLegs} legs`);
  return null;
}
