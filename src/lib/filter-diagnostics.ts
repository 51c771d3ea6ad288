/**
 * Diagnostics for why a candidate did or didn't survive Stage 1
 */

import { config } from './config';
import { isWithinEventWindow } from './validation';
import type { ScoredCandidate } from '../types/candidate';

export interface Stage1Thresholds {
  minOdds: number;
  maxOdds: number;
  minModelProbability: number;
  minEdge: number;
  minExpectedValue: number;
}

export interface FilterDiagnostic {
  event_id: string;
  selection: string;
  decimal_odds: number;
  model_probability: number;
  edge: number;
  expected_value: number;
  passed: boolean;
  missedThresholds: {
    odds: boolean;
    modelProbability: boolean;
    edge: boolean;
    expectedValue: boolean;
    eventWindow: boolean;
  };
  thresholdMissReason: string;
  nearMiss: boolean;
  percentOfThreshold: number;
}

export interface Stage1DiagnosticSummary {
  candidatesEvaluated: number;
  survivors: number;
  nearMisses: number;
  rejectionsByThreshold: Record<keyof FilterDiagnostic['missedThresholds'], number>;
  diagnostics: FilterDiagnostic[];
}

const pct = (value: number) => `${(value * 100).toFixed(2)}%`;

/**
 * Check every Stage-1 threshold for one candidate. The first failing check
 * becomes the reason; near misses are candidates whose only failure is an
 * edge within reach of the threshold.
 */
export function diagnoseCandidate(
  candidate: ScoredCandidate,
  now: Date,
  thresholds: Stage1Thresholds = config.stage1
): FilterDiagnostic {
  const { decimal_odds: odds, model_probability: modelProb, edge, expected_value: ev } = candidate;
  const reasons: string[] = [];

  const missedThresholds = {
    odds: odds < thresholds.minOdds || odds > thresholds.maxOdds,
    modelProbability: modelProb < thresholds.minModelProbability,
    edge: edge < thresholds.minEdge,
    expectedValue: ev < thresholds.minExpectedValue,
    eventWindow: !isWithinEventWindow(candidate.event_start_time, now),
  };

  if (missedThresholds.eventWindow) {
    reasons.push(`Event ${candidate.event_start_time} outside the ${config.maxEventDaysAhead}-day window`);
  }
  if (missedThresholds.odds) {
    reasons.push(`Odds ${odds} outside [${thresholds.minOdds}, ${thresholds.maxOdds}]`);
  }
  if (missedThresholds.modelProbability) {
    reasons.push(`Model probability ${pct(modelProb)} < ${pct(thresholds.minModelProbability)} required`);
  }
  if (missedThresholds.edge) {
    reasons.push(`Edge ${pct(edge)} < ${pct(thresholds.minEdge)} required`);
  }
  if (missedThresholds.expectedValue) {
    reasons.push(`EV ${ev.toFixed(4)} < ${thresholds.minExpectedValue} floor`);
  }

  const passed = reasons.length === 0;
  const onlyEdgeMissed =
    missedThresholds.edge &&
    !missedThresholds.odds &&
    !missedThresholds.modelProbability &&
    !missedThresholds.expectedValue &&
    !missedThresholds.eventWindow;

  return {
    event_id: candidate.event_id,
    selection: candidate.selection,
    decimal_odds: odds,
    model_probability: modelProb,
    edge,
    expected_value: ev,
    passed,
    missedThresholds,
    thresholdMissReason: reasons[0] ?? '',
    nearMiss: onlyEdgeMissed && edge >= thresholds.minEdge * config.nearMissThreshold,
    percentOfThreshold: missedThresholds.edge ? (edge / thresholds.minEdge) * 100 : 100,
  };
}

export function summarizeStage1(diagnostics: FilterDiagnostic[]): Stage1DiagnosticSummary {
  const rejected = diagnostics.filter(d => !d.passed);
  const count = (key: keyof FilterDiagnostic['missedThresholds']) =>
    rejected.filter(d => d.missedThresholds[key]).length;

  return {
    candidatesEvaluated: diagnostics.length,
    survivors: diagnostics.length - rejected.length,
    nearMisses: rejected.filter(d => d.nearMiss).length,
    rejectionsByThreshold: {
      odds: count('odds'),
      modelProbability: count('modelProbability'),
      edge: count('edge'),
      expectedValue: count('expectedValue'),
      eventWindow: count('eventWindow'),
    },
    diagnostics,
  };
}

/**
 * Format diagnostic summary for logging
 */
export function formatDiagnosticSummary(summary: Stage1DiagnosticSummary): string {
  const lines: string[] = [];

  lines.push('🔍 STAGE 1 DIAGNOSTICS');
  lines.push('═'.repeat(35));
  lines.push(`Candidates Evaluated: ${summary.candidatesEvaluated}`);
  lines.push(`Survivors: ${summary.survivors}`);
  lines.push(`Near Misses: ${summary.nearMisses}`);
  lines.push(
    `Rejected by: odds ${summary.rejectionsByThreshold.odds}, probability ${summary.rejectionsByThreshold.modelProbability}, ` +
      `edge ${summary.rejectionsByThreshold.edge}, EV ${summary.rejectionsByThreshold.expectedValue}, ` +
      `window ${summary.rejectionsByThreshold.eventWindow}`
  );

  if (summary.nearMisses > 0) {
    lines.push('\n📊 Near Misses:');
    summary.diagnostics
      .filter(d => d.nearMiss)
      .forEach(d => {
        lines.push(`  • ${d.selection} @ ${d.decimal_odds}: ${pct(d.edge)} edge (${d.percentOfThreshold.toFixed(0)}% of threshold)`);
      });
  }

  return lines.join('\n');
}
