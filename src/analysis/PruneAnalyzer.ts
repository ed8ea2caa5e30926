/**
 * Prune Analyzer
 *
 * Advisory maintenance report. Flags leaves that look stale or were never
 * validated, pairs that contradict each other, and (on request) near-duplicate
 * leaves filed under different branches. Nothing is ever deleted here; the
 * report only names candidates for a human or agent to review.
 */

import { validateConfidence } from '../core/tiers.js';
import type { IndexedLeaf, Tier } from '../core/types.js';
import type { IndexStore } from '../storage/IndexStore.js';
import { cosineSimilarity } from '../vector/similarity.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface PruneOptions {
  tree?: string;
  branch?: string;
  /** Flag leaves not updated for this many days (default 90) */
  staleDays?: number;
  /** Flag leaves below this confidence (default 0.3) */
  minConfidence?: number;
  /** Compare every pair across branches (quadratic) */
  detectConflicts?: boolean;
  /** Similarity above which two leaves count as overlapping (default 0.85) */
  similarityThreshold?: number;
}

export type PruneReason =
  | { kind: 'stale'; days: number }
  | { kind: 'low_confidence'; confidence: number };

export interface PruneCandidate {
  path: string;
  title: string;
  tier: Tier;
  confidence: number;
  updatedAt: string;
  reasons: PruneReason[];
}

export interface ContradictionPair {
  from: string;
  to: string;
}

export interface SimilarPair {
  a: string;
  b: string;
  similarity: number;
}

export interface PruneReport {
  scanned: number;
  candidates: PruneCandidate[];
  contradictions: ContradictionPair[];
  similar: SimilarPair[];
  /** Leaves left out of the similarity pass because their embedding is pending */
  skipped: number;
}

export const PRUNE_DEFAULTS = {
  staleDays: 90,
  minConfidence: 0.3,
  similarityThreshold: 0.85
} as const;

export function describeReason(reason: PruneReason): string {
  return reason.kind === 'stale'
    ? `stale (${reason.days} days)`
    : `low confidence (${reason.confidence.toFixed(2)})`;
}

export class PruneAnalyzer {
  private readonly index: IndexStore;
  private readonly activeModel: string;
  private readonly now: () => Date;

  constructor(index: IndexStore, activeModel: string, now: () => Date = () => new Date()) {
    this.index = index;
    this.activeModel = activeModel;
    this.now = now;
  }

  analyze(options: PruneOptions = {}): PruneReport {
    const staleDays = options.staleDays ?? PRUNE_DEFAULTS.staleDays;
    const minConfidence = validateConfidence(options.minConfidence ?? PRUNE_DEFAULTS.minConfidence);
    const threshold = options.similarityThreshold ?? PRUNE_DEFAULTS.similarityThreshold;

    const leaves = this.index.queryLeaves({ tree: options.tree, branch: options.branch });
    const now = this.now().getTime();

    const candidates: PruneCandidate[] = [];
    for (const leaf of leaves) {
      const reasons: PruneReason[] = [];

      const updated = Date.parse(leaf.updatedAt);
      const ageDays = Number.isNaN(updated) ? Infinity : Math.floor((now - updated) / MS_PER_DAY);
      if (ageDays > staleDays) {
        reasons.push({ kind: 'stale', days: ageDays });
      }
      if (leaf.confidence < minConfidence) {
        reasons.push({ kind: 'low_confidence', confidence: leaf.confidence });
      }

      if (reasons.length > 0) {
        candidates.push({
          path: leaf.path,
          title: leaf.title,
          tier: leaf.tier,
          confidence: leaf.confidence,
          updatedAt: leaf.updatedAt,
          reasons
        });
      }
    }

    const inScope = new Set(leaves.map(leaf => leaf.path));
    const contradictions = this.index
      .linksByRelation('contradicts')
      .filter(link => inScope.has(link.from) || inScope.has(link.to))
      .map(link => ({ from: link.from, to: link.to }));

    let similar: SimilarPair[] = [];
    let skipped = 0;
    if (options.detectConflicts) {
      const embedded = leaves.filter(leaf => leaf.embedding !== null && leaf.embeddingModel === this.activeModel);
      skipped = leaves.length - embedded.length;
      similar = this.findSimilar(embedded, threshold);
    }

    return { scanned: leaves.length, candidates, contradictions, similar, skipped };
  }

  /**
   * Pairs in different branches whose similarity exceeds the threshold,
   * most similar first
   */
  private findSimilar(leaves: IndexedLeaf[], threshold: number): SimilarPair[] {
    const pairs: SimilarPair[] = [];

    for (let i = 0; i < leaves.length; i++) {
      const a = leaves[i];
      for (let j = i + 1; j < leaves.length; j++) {
        const b = leaves[j];
        if (a.tree === b.tree && a.branch === b.branch) continue;
        if (a.embedding === null || b.embedding === null) continue;

        const similarity = cosineSimilarity(a.embedding, b.embedding);
        if (similarity > threshold) {
          pairs.push({ a: a.path, b: b.path, similarity });
        }
      }
    }

    return pairs.sort((x, y) => y.similarity - x.similarity || (x.a < y.a ? -1 : x.a > y.a ? 1 : 0));
  }
}
