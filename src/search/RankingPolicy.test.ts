/**
 * Ranking Policy Tests
 */

import { describe, it, expect } from 'vitest';
import { TIERS } from '../core/tiers.js';
import { RankingPolicy } from './RankingPolicy.js';

const NOW = new Date('2026-06-01T00:00:00.000Z');

describe('RankingPolicy', () => {
  const policy = new RankingPolicy();

  it('should add tier, confidence and recency bonuses to similarity', () => {
    const score = policy.score(
      { similarity: 0.5, tier: 'roots', confidence: 1, updatedAt: NOW.toISOString() },
      NOW
    );
    expect(score).toBeCloseTo(0.7, 10);

    const bare = policy.score(
      { similarity: 0.5, tier: 'leaves', confidence: 0, updatedAt: 'not a date' },
      NOW
    );
    expect(bare).toBeCloseTo(0.5, 10);
  });

  it('should halve freshness every half-life', () => {
    expect(policy.freshness('2026-05-02T00:00:00.000Z', NOW)).toBeCloseTo(0.5, 10);
    expect(policy.freshness('2026-04-02T00:00:00.000Z', NOW)).toBeCloseTo(0.25, 10);
    expect(policy.freshness('2027-01-01T00:00:00.000Z', NOW)).toBe(1);
  });

  it('should never rank a higher tier below a lower one, all else equal', () => {
    const scores = TIERS.map(tier =>
      policy.score({ similarity: 0.4, tier, confidence: 0.5, updatedAt: '2026-03-01T00:00:00.000Z' }, NOW)
    );
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeGreaterThan(scores[i - 1]);
    }
  });

  it('should be monotonic in similarity', () => {
    let previous = Number.NEGATIVE_INFINITY;
    for (let similarity = -1; similarity <= 1; similarity += 0.25) {
      const score = policy.score({ similarity, tier: 'trunk', confidence: 0.7, updatedAt: NOW.toISOString() }, NOW);
      expect(score).toBeGreaterThan(previous);
      previous = score;
    }
  });

  it('should accept custom weights and reject a non-positive half-life', () => {
    const flat = new RankingPolicy({ tierWeight: 0, confidenceWeight: 0, recencyWeight: 0 });
    expect(flat.score({ similarity: 0.3, tier: 'roots', confidence: 1, updatedAt: NOW.toISOString() }, NOW)).toBe(0.3);
    expect(() => new RankingPolicy({ halfLifeDays: 0 })).toThrow(RangeError);
  });
});
