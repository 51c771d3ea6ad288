/**
 * Unit tests for probability estimators
 */

import { ModelLoadError } from '../errors';
import {
  HeuristicEstimator,
  TreeEnsembleEstimator,
  createEstimator,
  evaluateTree,
  extractModelFeatures,
  loadModelArtifact,
  parseModelArtifact,
  type ModelArtifact,
} from '../estimator';
import { clearStoredLogs, getStoredLogs } from '../logger';
import { makeCandidate } from './factories';

const sigmoid = (x: number) => 1 / (1 + Math.exp(-x));

const winRateArtifact: ModelArtifact = parseModelArtifact({
  name: 'win-rate-stump',
  version: '1',
  base_score: 0,
  learning_rate: 1,
  trees: [{ feature: 'win_rate', threshold: 0.6, left: { leaf: 0 }, right: { leaf: 2 } }],
});

describe('Probability Estimators', () => {
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(() => {
    clearStoredLogs();
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe('extractModelFeatures', () => {
    it('should map context features onto the model vector', () => {
      const { features, issues, degraded } = extractModelFeatures(makeCandidate());

      expect(features).toEqual({
        win_rate: 0.7,
        recent_form: 0.7,
        is_favorite: 1,
        is_home: 1,
        ranking_diff: -0.2,
        implied_prob: 1 / 1.2,
      });
      expect(issues).toHaveLength(0);
      expect(degraded).toBe(false);
    });

    it('should impute optional features and report each one', () => {
      const { features, issues, degraded } = extractModelFeatures(
        makeCandidate({ context_features: { win_rate: 0.7, recent_form: 0.7, ranking_diff: 250 } })
      );

      expect(features.is_home).toBe(0);
      expect(features.ranking_diff).toBe(0);
      expect(issues.map(i => i.feature)).toEqual(['is_home', 'ranking_diff']);
      expect(degraded).toBe(false);
    });

    it('should mark out-of-range required features as degraded', () => {
      const { issues, degraded } = extractModelFeatures(
        makeCandidate({ context_features: { win_rate: 1.4, recent_form: 0.7, is_home: false, ranking_diff: 0 } })
      );

      expect(degraded).toBe(true);
      expect(issues[0].feature).toBe('win_rate');
      expect(issues[0].code).toBe('DATA_QUALITY');
    });
  });

  describe('evaluateTree', () => {
    it('should send values at the threshold left', () => {
      const features = { win_rate: 0.6, recent_form: 0, is_favorite: 0, is_home: 0, ranking_diff: 0, implied_prob: 0 };
      expect(evaluateTree(winRateArtifact.trees[0], features)).toBe(0);
      expect(evaluateTree(winRateArtifact.trees[0], { ...features, win_rate: 0.61 })).toBe(2);
    });
  });

  describe('TreeEnsembleEstimator', () => {
    it('should apply the logistic link to the summed leaves', () => {
      const estimator = new TreeEnsembleEstimator(winRateArtifact);

      expect(estimator.estimate(makeCandidate())).toBeCloseTo(sigmoid(2), 12);
      expect(estimator.name).toBe('tree-ensemble:win-rate-stump@1');
    });

    it('should return the fallback and log when a required feature is missing', () => {
      const estimator = new TreeEnsembleEstimator(winRateArtifact, 0.5);
      const probability = estimator.estimate(
        makeCandidate({ context_features: { recent_form: 0.7, is_home: true, ranking_diff: 0 } })
      );

      expect(probability).toBe(0.5);
      const warnings = getStoredLogs({ module: 'estimator', level: 'warn' });
      expect(warnings).toHaveLength(1);
      expect(warnings[0].message).toBe('Data quality: win_rate missing or outside [0,1] for evt-1:moneyline:Boston Celtics');
    });

    it('should be deterministic', () => {
      const estimator = new TreeEnsembleEstimator(winRateArtifact);
      const candidate = makeCandidate();
      expect(estimator.estimate(candidate)).toBe(estimator.estimate(candidate));
    });
  });

  describe('default model artifact', () => {
    it('should load and score a short-priced home favourite', () => {
      const estimator = createEstimator('models/default-model.json');

      // 1.65 + 0.35 + 0.2 + 0.12 + 0.1 across the five trees
      expect(estimator.estimate(makeCandidate())).toBeCloseTo(sigmoid(2.42), 10);
      expect(estimator.name).toBe('tree-ensemble:safe-leg-gbt@2026.10.1');
    });

    it('should raise ModelLoadError for a missing file', () => {
      expect(() => loadModelArtifact('models/does-not-exist.json')).toThrow(ModelLoadError);
    });
  });

  describe('parseModelArtifact', () => {
    it('should reject splits on unknown features', () => {
      expect(() =>
        parseModelArtifact({
          name: 'bad',
          version: '1',
          base_score: 0,
          learning_rate: 1,
          trees: [{ feature: 'moon_phase', threshold: 0.5, left: { leaf: 0 }, right: { leaf: 1 } }],
        })
      ).toThrow('split at trees[0] names an unknown feature');
    });

    it('should reject an artifact without trees', () => {
      expect(() => parseModelArtifact({ name: 'bad', version: '1', base_score: 0, learning_rate: 1, trees: [] })).toThrow(
        'artifact has no trees'
      );
    });
  });

  describe('HeuristicEstimator', () => {
    const estimator = new HeuristicEstimator();

    it('should nudge a strong favourite by win rate, venue and form', () => {
      // implied 0.8696 >= 0.85, win_rate 0.7 -> +0.05, home +0.02, form +0.02
      const probability = estimator.estimate(makeCandidate({ decimal_odds: 1.15 }));
      expect(probability).toBeCloseTo(1 / 1.15 + 0.09, 10);
    });

    it('should cap at 0.98', () => {
      expect(estimator.estimate(makeCandidate({ decimal_odds: 1.01 }))).toBe(0.98);
    });

    it('should fall back to favourite defaults without features', () => {
      // implied 0.8 band, default win rate 0.55 -> +0.02, no home or form bonus
      const probability = estimator.estimate(makeCandidate({ decimal_odds: 1.25, context_features: {} }));
      expect(probability).toBeCloseTo(0.82, 10);
    });
  });
});
