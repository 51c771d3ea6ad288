export type Sport = 'basketball' | 'american_football' | 'mixed_martial_arts' | 'rugby_league';

export const SPORTS: readonly Sport[] = [
  'basketball',
  'american_football',
  'mixed_martial_arts',
  'rugby_league',
];

export type ConfidenceTier = 'low' | 'medium' | 'high';

// Numeric series (e.g. a player's last N stat lines) are allowed alongside scalars
export type FeatureValue = number | string | boolean | readonly number[];
export type ContextFeatures = Readonly<Record<string, FeatureValue>>;

export interface BetCandidate {
  readonly sport: Sport;
  readonly market_type: string;
  readonly event_id: string;
  readonly event_start_time: string;
  readonly selection: string;
  readonly decimal_odds: number;
  readonly context_features: ContextFeatures;
  readonly home_team: string;
  readonly away_team: string;
  readonly line?: number;
  readonly bookmaker?: string;
}

/**
 * Candidate with value metrics attached. All four numbers come from the same
 * (model_probability, decimal_odds) pair.
 */
export interface ScoredCandidate extends BetCandidate {
  readonly model_probability: number;
  readonly implied_probability: number;
  readonly edge: number;
  readonly expected_value: number;
  readonly confidence_tier: ConfidenceTier;
}

export interface RankedCandidate extends ScoredCandidate {
  readonly rivalry_flag: boolean;
  readonly rivalry_name: string | null;
  readonly consistency_score: number;
  readonly composite_score: number;
}

export interface RecommendedLeg extends RankedCandidate {
  readonly rank: number;
  readonly rationale: string;
}

export interface Parlay {
  readonly legs: readonly RecommendedLeg[];
  readonly leg_count: number;
  readonly combined_odds: number;
  readonly combined_probability: number;
  /** Return on the configured stake at the combined odds */
  readonly potential_return: number;
  readonly target_odds: number;
  readonly search: 'greedy' | 'exhaustive';
}

export interface CandidatePoolSnapshot {
  readonly version: number;
  readonly fetched_at: string;
  readonly candidates: readonly BetCandidate[];
}

export interface PipelineStats {
  run_id: string;
  generated_at: string;
  snapshot_version: number;
  candidates_in: number;
  invalid_dropped: number;
  survivors_stage1: number;
  final_legs_count: number;
}

export function isSport(value: unknown): value is Sport {
  return typeof value === 'string' && SPORTS.some((sport) => sport === value);
}
