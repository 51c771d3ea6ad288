/**
 * Candidate pool: providers that supply upcoming markets, and a store that
 * hands each pipeline run an immutable snapshot
 */

import { config } from './config';
import { DataQualityError } from './errors';
import { Logger } from './logger';
import { candidateKey } from './validation';
import type { BetCandidate, CandidatePoolSnapshot, ContextFeatures, Sport } from '../types/candidate';

export interface CandidateQuery {
  sport?: Sport;
  now: Date;
  windowDays: number;
}

export interface CandidatePoolProvider {
  fetchCandidates(query: CandidateQuery): Promise<BetCandidate[]>;
}

/** Supplies extra context features (form, streaks, stat history) per candidate */
export interface FeatureProvider {
  getFeatures(candidate: BetCandidate): Promise<ContextFeatures>;
}

export interface RefreshOptions {
  sport?: Sport;
  now?: Date;
  featureProvider?: FeatureProvider;
}

function freezeCandidate(candidate: BetCandidate): BetCandidate {
  return Object.freeze({ ...candidate, context_features: Object.freeze({ ...candidate.context_features }) });
}

export class CandidatePoolStore {
  private snapshot: CandidatePoolSnapshot;
  private logger = new Logger('candidate-pool');
  // Each replace or refresh takes a ticket when it starts
  private lastTicket = 0;
  private publishedTicket = 0;

  constructor(initial: readonly BetCandidate[] = [], fetchedAt: Date = new Date()) {
    this.snapshot = this.buildSnapshot(0, initial, fetchedAt);
  }

  /** The snapshot a run should read; never modified after it is published */
  current(): CandidatePoolSnapshot {
    return this.snapshot;
  }

  /** Publish a new snapshot in a single reference swap */
  replace(candidates: readonly BetCandidate[], fetchedAt: Date = new Date()): CandidatePoolSnapshot {
    return this.publish(++this.lastTicket, candidates, fetchedAt);
  }

  /**
   * Pull a fresh pool from the provider and publish it. A failed fetch leaves
   * the current snapshot in place and rethrows. A refresh overtaken by a
   * later one returns the newer snapshot and publishes nothing.
   */
  async refresh(provider: CandidatePoolProvider, options: RefreshOptions = {}): Promise<CandidatePoolSnapshot> {
    const ticket = ++this.lastTicket;
    const now = options.now ?? new Date();
    const query: CandidateQuery = { sport: options.sport, now, windowDays: config.maxEventDaysAhead };

    let candidates: BetCandidate[];
    try {
      candidates = await provider.fetchCandidates(query);
    } catch (error) {
      this.logger.error('Candidate pool refresh failed', error instanceof Error ? error.message : error);
      throw error;
    }

    if (options.featureProvider) {
      candidates = await this.enrich(candidates, options.featureProvider);
    }

    if (ticket < this.publishedTicket) {
      this.logger.warn(`Discarding stale candidate pool refresh (${candidates.length} candidates)`, {
        ticket,
        published: this.publishedTicket,
      });
      return this.snapshot;
    }

    return this.publish(ticket, candidates, now);
  }

  private publish(ticket: number, candidates: readonly BetCandidate[], fetchedAt: Date): CandidatePoolSnapshot {
    this.publishedTicket = ticket;
    this.snapshot = this.buildSnapshot(this.snapshot.version + 1, candidates, fetchedAt);
    this.logger.info(`Candidate pool v${this.snapshot.version}: ${candidates.length} candidates`);
    return this.snapshot;
  }

  private async enrich(candidates: BetCandidate[], featureProvider: FeatureProvider): Promise<BetCandidate[]> {
    return Promise.all(
      candidates.map(async candidate => {
        try {
          const extra = await featureProvider.getFeatures(candidate);
          return { ...candidate, context_features: { ...candidate.context_features, ...extra } };
        } catch (error) {
          // Keep the candidate with what it already has; the estimator imputes the rest
          const key = candidateKey(candidate);
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.dataQuality(new DataQualityError(`feature lookup failed for ${key}: ${reason}`, key, 'context_features'));
          return candidate;
        }
      })
    );
  }

  private buildSnapshot(version: number, candidates: readonly BetCandidate[], fetchedAt: Date): CandidatePoolSnapshot {
    return Object.freeze({
      version,
      fetched_at: fetchedAt.toISOString(),
      candidates: Object.freeze(candidates.map(freezeCandidate)),
    });
  }
}
