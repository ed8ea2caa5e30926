/**
 * Ranking Policy
 *
 * Blends semantic similarity with trust signals when priming a session or
 * injecting context. Plain search ranks by similarity alone; this policy is
 * only consulted by context() and prime().
 *
 *   score = similarity
 *         + tierWeight * rank(tier) / 3
 *         + confidenceWeight * confidence
 *         + recencyWeight * 0.5 ^ (ageDays / halfLifeDays)
 *
 * Every term is non-decreasing in its input, so the score is monotonic in
 * similarity, tier, confidence and freshness.
 */

import { TIERS, tierRank } from '../core/tiers.js';
import type { Tier } from '../core/types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MAX_TIER_RANK = TIERS.length - 1;

export interface RankingWeights {
  tierWeight: number;
  confidenceWeight: number;
  recencyWeight: number;
  /** Age at which the recency bonus halves */
  halfLifeDays: number;
}

export const DEFAULT_RANKING_WEIGHTS: RankingWeights = {
  tierWeight: 0.1,
  confidenceWeight: 0.05,
  recencyWeight: 0.05,
  halfLifeDays: 30
};

export interface RankingInput {
  similarity: number;
  tier: Tier;
  confidence: number;
  updatedAt: string;
}

export class RankingPolicy {
  readonly weights: RankingWeights;

  constructor(weights: Partial<RankingWeights> = {}) {
    this.weights = { ...DEFAULT_RANKING_WEIGHTS, ...weights };
    if (!(this.weights.halfLifeDays > 0)) {
      throw new RangeError(`halfLifeDays must be positive, got ${this.weights.halfLifeDays}`);
    }
  }

  score(input: RankingInput, now: Date = new Date()): number {
    const { tierWeight, confidenceWeight, recencyWeight } = this.weights;
    return (
      input.similarity +
      tierWeight * (tierRank(input.tier) / MAX_TIER_RANK) +
      confidenceWeight * input.confidence +
      recencyWeight * this.freshness(input.updatedAt, now)
    );
  }

  /**
   * 1 for a leaf updated now, 0.5 after one half-life. Future timestamps count as
   * fresh, unparseable ones as stale.
   */
  freshness(updatedAt: string, now: Date = new Date()): number {
    const updated = Date.parse(updatedAt);
    if (Number.isNaN(updated)) return 0;
    const ageDays = Math.max(0, (now.getTime() - updated) / MS_PER_DAY);
    return Math.pow(0.5, ageDays / this.weights.halfLifeDays);
  }
}
