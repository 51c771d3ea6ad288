/**
 * Unit tests for value calculations
 */

import {
  impliedProbability,
  probabilityToDecimal,
  expectedValue,
  edge,
  computeValueMetrics,
  confidenceTier,
  combineOdds,
} from '../prob';

describe('Value Calculations', () => {
  describe('impliedProbability', () => {
    it('should convert decimal odds to implied probability', () => {
      expect(impliedProbability(2.0)).toBe(0.5);
      expect(impliedProbability(1.25)).toBe(0.8);
      expect(impliedProbability(1.15)).toBeCloseTo(0.8696, 4);
    });
  });

  describe('probabilityToDecimal', () => {
    it('should convert probability to fair decimal odds', () => {
      expect(probabilityToDecimal(0.5)).toBe(2.0);
      expect(probabilityToDecimal(0.8)).toBeCloseTo(1.25, 10);
    });
  });

  describe('expectedValue', () => {
    it('should be p * odds - 1', () => {
      expect(expectedValue(0.8, 1.15)).toBeCloseTo(-0.08, 10);
      expect(expectedValue(0.82, 1.2)).toBeCloseTo(-0.016, 10);
      expect(expectedValue(0.5, 2.0)).toBe(0);
    });
  });

  describe('edge', () => {
    it('should be model probability minus implied probability', () => {
      expect(edge(0.9, 1.2)).toBeCloseTo(0.9 - 1 / 1.2, 10);
      expect(edge(0.5, 2.0)).toBe(0);
    });
  });

  describe('computeValueMetrics', () => {
    it('should fail a short-priced leg the model does not rate', () => {
      const metrics = computeValueMetrics(0.8, 1.15);

      expect(metrics.implied_probability).toBeCloseTo(0.8696, 4);
      expect(metrics.edge).toBeCloseTo(-0.0696, 4);
      expect(metrics.expected_value).toBeCloseTo(-0.08, 4);
    });

    it('should compute a positive edge with a small negative EV', () => {
      const metrics = computeValueMetrics(0.82, 1.2);

      expect(metrics.implied_probability).toBeCloseTo(0.8333, 4);
      expect(metrics.edge).toBeCloseTo(0.0467, 4);
      expect(metrics.expected_value).toBeCloseTo(-0.016, 4);
    });

    it('should keep all metrics consistent with the inputs', () => {
      for (const [p, odds] of [[0.76, 1.05], [0.93, 1.1], [0.6, 1.9]]) {
        const metrics = computeValueMetrics(p, odds);
        expect(metrics.implied_probability).toBeCloseTo(1 / odds, 12);
        expect(metrics.edge).toBeCloseTo(p - 1 / odds, 12);
        expect(metrics.expected_value).toBeCloseTo(p * odds - 1, 12);
      }
    });
  });

  describe('confidenceTier', () => {
    it('should rate strong probability and edge as high', () => {
      expect(confidenceTier(0.9, 0.06)).toBe('high');
    });

    it('should rate the Stage-1 floor as medium', () => {
      expect(confidenceTier(0.75, 0.02)).toBe('medium');
    });

    it('should rate a high probability with a thin edge as medium', () => {
      expect(confidenceTier(0.9, 0.03)).toBe('medium');
    });

    it('should rate anything below the floor as low', () => {
      expect(confidenceTier(0.74, 0.1)).toBe('low');
      expect(confidenceTier(0.95, 0.01)).toBe('low');
    });
  });

  describe('combineOdds', () => {
    it('should multiply leg odds', () => {
      expect(combineOdds([1.25, 1.2])).toBeCloseTo(1.5, 10);
      expect(combineOdds([])).toBe(1);
    });
  });
});
