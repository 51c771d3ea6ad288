/**
 * Stage 1: cheap hard-threshold reject filter over the whole scored pool
 */

import { config } from './config';
import {
  diagnoseCandidate,
  summarizeStage1,
  type Stage1DiagnosticSummary,
  type Stage1Thresholds,
} from './filter-diagnostics';
import { Logger } from './logger';
import type { ScoredCandidate } from '../types/candidate';

export interface Stage1Result {
  survivors: ScoredCandidate[];
  summary: Stage1DiagnosticSummary;
}

/**
 * Keep the first occurrence of each (event, selection, market, line)
 */
export function deduplicateCandidates<T extends ScoredCandidate>(candidates: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const candidate of candidates) {
    const key = [candidate.event_id, candidate.selection, candidate.market_type, candidate.line ?? ''].join('|');
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(candidate);
    }
  }

  return unique;
}

/**
 * A candidate survives iff odds, model probability, edge and EV all clear
 * their thresholds (boundaries included) and the event is inside the window.
 */
export function stage1NumericalFilter(
  candidates: readonly ScoredCandidate[],
  now: Date,
  thresholds: Stage1Thresholds = config.stage1
): Stage1Result {
  const logger = new Logger('stage1');
  const diagnostics = candidates.map(candidate => diagnoseCandidate(candidate, now, thresholds));

  for (const diagnostic of diagnostics) {
    if (diagnostic.nearMiss) {
      logger.nearMiss(diagnostic.selection, diagnostic.edge, thresholds.minEdge, diagnostic.thresholdMissReason);
    }
  }

  const passing = candidates.filter((_, i) => diagnostics[i].passed);
  const survivors = deduplicateCandidates(passing);

  logger.debug(() => `Stage 1: ${candidates.length} candidates -> ${survivors.length} survivors`);

  return { survivors, summary: summarizeStage1(diagnostics) };
}
