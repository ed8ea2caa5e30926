/**
 * Tier & Confidence Model
 *
 * Tiers are strictly ordered: leaves < branches < trunk < roots.
 * Transitions are always explicit; nothing here promotes a leaf on its own.
 * Confidence is an independent scalar in [0.0, 1.0].
 */

import { InvalidConfidenceError, InvalidTierError } from './errors.js';
import type { Tier } from './types.js';

export const TIERS = ['leaves', 'branches', 'trunk', 'roots'] as const satisfies readonly Tier[];

export const DEFAULT_TIER: Tier = 'leaves';
export const DEFAULT_CONFIDENCE = 0.5;

const TIER_MARKERS: Record<Tier, string> = {
  roots: '[R]',
  trunk: '[T]',
  branches: '[B]',
  leaves: '[L]'
};

export function isTier(value: unknown): value is Tier {
  return TIERS.some(tier => tier === value);
}

/**
 * @throws {InvalidTierError} If the value is not one of the four tiers
 */
export function parseTier(value: unknown): Tier {
  if (!isTier(value)) {
    throw new InvalidTierError(value);
  }
  return value;
}

/**
 * 0 for leaves up to 3 for roots
 */
export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

export function compareTiers(a: Tier, b: Tier): number {
  return tierRank(a) - tierRank(b);
}

export function tierMarker(tier: Tier): string {
  return TIER_MARKERS[tier];
}

/**
 * @throws {InvalidConfidenceError} If the value is not a finite number in [0, 1]
 */
export function validateConfidence(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidConfidenceError(value);
  }
  return value;
}

export function emptyTierCounts(): Record<Tier, number> {
  return { leaves: 0, branches: 0, trunk: 0, roots: 0 };
}
