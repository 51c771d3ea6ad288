/**
 * Integration tests for a full pipeline run
 */

import { CandidatePoolStore } from '../candidate-pool';
import type { ProbabilityEstimator } from '../estimator';
import { clearStoredLogs, getStoredLogs } from '../logger';
import { runPipeline, scoreCandidates } from '../pipeline';
import type { BetCandidate } from '../../types/candidate';
import { NOW, makeCandidate } from './factories';

/** Returns a fixed probability per selection */
function tableEstimator(table: Record<string, number>): ProbabilityEstimator {
  return {
    name: 'table',
    estimate: (candidate: BetCandidate) => table[candidate.selection] ?? 0.5,
  };
}

describe('Pipeline', () => {
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(() => {
    clearStoredLogs();
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe('scoreCandidates', () => {
    it('should attach value metrics computed from the estimate', () => {
      const { scored, dropped } = scoreCandidates(
        [makeCandidate({ decimal_odds: 1.15, selection: 'Denver Nuggets', home_team: 'Denver Nuggets' })],
        tableEstimator({ 'Denver Nuggets': 0.8 }),
        NOW
      );

      expect(dropped).toHaveLength(0);
      expect(scored[0].model_probability).toBe(0.8);
      expect(scored[0].implied_probability).toBeCloseTo(0.8696, 4);
      expect(scored[0].edge).toBeCloseTo(-0.0696, 4);
      expect(scored[0].expected_value).toBeCloseTo(-0.08, 4);
      expect(scored[0].confidence_tier).toBe('low');
    });

    it('should drop invalid candidates and keep scoring the rest', () => {
      const { scored, dropped } = scoreCandidates(
        [
          makeCandidate({ event_id: 'tba', away_team: 'TBA' }),
          makeCandidate({ event_id: 'bad-odds', decimal_odds: 0.9 }),
          makeCandidate({ event_id: 'ok' }),
        ],
        tableEstimator({ 'Boston Celtics': 0.9 }),
        NOW
      );

      expect(scored.map(c => c.event_id)).toEqual(['ok']);
      expect(dropped.map(d => d.error.field)).toEqual(['away_team', 'decimal_odds']);
      expect(getStoredLogs({ module: 'pipeline', level: 'warn' })).toHaveLength(2);
    });

    it('should fall back when an estimator throws', () => {
      const failing: ProbabilityEstimator = {
        name: 'broken',
        estimate: () => {
          throw new Error('feature store offline');
        },
      };

      const { scored } = scoreCandidates([makeCandidate()], failing, NOW);

      expect(scored[0].model_probability).toBe(0.5);
      const warnings = getStoredLogs({ module: 'pipeline', level: 'warn' });
      expect(warnings[0].message).toBe(
        'Data quality: estimator broken failed for evt-1:moneyline:Boston Celtics: feature store offline'
      );
    });

    it('should clamp an out-of-range estimate', () => {
      const { scored } = scoreCandidates([makeCandidate()], tableEstimator({ 'Boston Celtics': 1.3 }), NOW);
      expect(scored[0].model_probability).toBe(1);
    });
  });

  describe('runPipeline', () => {
    const candidates = [
      makeCandidate({ event_id: 'e1', selection: 'Boston Celtics', decimal_odds: 1.2 }),
      makeCandidate({
        event_id: 'e2',
        selection: 'Kansas City Chiefs',
        sport: 'american_football',
        home_team: 'Kansas City Chiefs',
        away_team: 'Denver Broncos',
        decimal_odds: 1.15,
      }),
      makeCandidate({ event_id: 'e3', selection: 'Denver Nuggets', home_team: 'Denver Nuggets', decimal_odds: 1.15 }),
      makeCandidate({ event_id: 'e4', selection: 'Long Shot', decimal_odds: 3.5 }),
      makeCandidate({ event_id: 'e5', selection: 'Phantom', away_team: 'TBD' }),
    ];
    const estimator = tableEstimator({
      'Boston Celtics': 0.9,
      'Kansas City Chiefs': 0.93,
      'Denver Nuggets': 0.8,
      'Long Shot': 0.4,
    });

    it('should run every stage and report counts', () => {
      const store = new CandidatePoolStore(candidates, NOW);
      const result = runPipeline(store.current(), { estimator, now: NOW });

      expect(result.stats).toMatchObject({
        generated_at: '2026-10-19T12:00:00.000Z',
        snapshot_version: 0,
        candidates_in: 5,
        invalid_dropped: 1,
        survivors_stage1: 2,
        final_legs_count: 2,
      });
      expect(result.stats.run_id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(result.scored).toHaveLength(4);
      expect(result.legs.map(l => l.selection)).toEqual(['Kansas City Chiefs', 'Boston Celtics']);
      expect(result.legs.map(l => l.rank)).toEqual([1, 2]);
      expect(result.diagnostics.candidatesEvaluated).toBe(4);
    });

    it('should leave the snapshot untouched', () => {
      const store = new CandidatePoolStore(candidates, NOW);
      const snapshot = store.current();
      const before = JSON.stringify(snapshot);

      runPipeline(snapshot, { estimator, now: NOW });

      expect(JSON.stringify(snapshot)).toBe(before);
    });

    it('should give identical legs for identical inputs', () => {
      const store = new CandidatePoolStore(candidates, NOW);
      const first = runPipeline(store.current(), { estimator, now: NOW });
      const second = runPipeline(store.current(), { estimator, now: NOW });

      expect(second.legs).toEqual(first.legs);
      expect(second.stats.run_id).not.toBe(first.stats.run_id);
    });

    it('should produce no legs from an empty pool', () => {
      const result = runPipeline(new CandidatePoolStore([], NOW).current(), { estimator, now: NOW });

      expect(result.legs).toEqual([]);
      expect(result.stats.final_legs_count).toBe(0);
    });

    it('should log a run summary', () => {
      runPipeline(new CandidatePoolStore(candidates, NOW).current(), { estimator, now: NOW });

      const summary = getStoredLogs({ module: 'pipeline', search: 'Survivors Stage1' });
      expect(summary).toHaveLength(1);
      expect(summary[0].message).toContain('  • Final Legs Count: 2');
      expect(summary[0].message).toContain('  • Estimator: table');
    });
  });
});
