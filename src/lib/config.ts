function envFloat(name: string, fallback: string): number {
  return parseFloat(process.env[name] || fallback);
}

function envInt(name: string, fallback: string): number {
  return parseInt(process.env[name] || fallback, 10);
}

export const config = {
  // Supabase Configuration
  supabaseUrl: process.env.SUPABASE_URL || '',
  supabaseAnonKey: process.env.SUPABASE_ANON_KEY || '',
  supabaseServiceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY || '',
  candidatesTable: process.env.CANDIDATES_TABLE || 'bet_candidates',

  // Probability model
  modelArtifactPath: process.env.MODEL_ARTIFACT_PATH || 'models/default-model.json',
  estimator: {
    fallbackProbability: 0.5,
  },

  // Event window
  maxEventDaysAhead: 7,
  placeholderOpponents: ['tba', 'tbd', 'to be announced', 'to be determined'],

  // Stage 1 hard thresholds (closed intervals)
  stage1: {
    minOdds: 1.05,
    maxOdds: 1.25,
    minModelProbability: 0.75,
    minEdge: 0.02,
    minExpectedValue: -0.05,
  },

  // Near-miss tracking
  nearMissThreshold: 0.5, // 50% of the edge threshold counts as near-miss

  // Stage 2 composite score
  stage2: {
    legLimit: 20,
    weights: {
      modelProbability: 0.4,
      expectedValue: 0.3,
      edge: 0.2,
      consistency: 0.1,
    },
    scaling: {
      expectedValue: 20,
      edge: 10,
      consistency: 100,
    },
    rivalryPenalty: envFloat('STAGE2_RIVALRY_PENALTY', '0.056'),
    streakBonus: envFloat('STAGE2_STREAK_BONUS', '0.02'),
    minWinningStreak: 3,
    maxOpponentStreak: -2,
    consistencyWindow: envInt('CONSISTENCY_WINDOW', '10'),
  },

  confidenceTiers: {
    high: { minModelProbability: 0.85, minEdge: 0.05 },
    medium: { minModelProbability: 0.75, minEdge: 0.02 },
  },

  // Value-bet queries
  valueBets: {
    minExpectedValue: 0.02,
    minConfidence: 0.7,
    defaultLimit: 10,
  },

  // Parlay builder
  parlay: {
    targetOdds: envFloat('PARLAY_TARGET_ODDS', '2.0'),
    maxLegs: envInt('PARLAY_MAX_LEGS', '4'),
    minFraction: envFloat('PARLAY_MIN_FRACTION', '0.9'),
    ceilingMultiplier: envFloat('PARLAY_CEILING', '1.1'),
    topK: envInt('PARLAY_TOP_K', '10'),
    backtrackStepLimit: 5000,
    stake: envFloat('PARLAY_STAKE', '10'),
  },
} as const;
