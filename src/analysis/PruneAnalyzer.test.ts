/**
 * Prune Analyzer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { KnowledgeBase } from '../core/KnowledgeBase.js';
import { InvalidConfidenceError } from '../core/errors.js';
import { describeReason } from './PruneAnalyzer.js';

const OLD = 'trading/gotchas/gap-fills-are-unreliable.md';
const SHAKY = 'trading/indicators/rsi-divergence-predicts-reversals.md';

describe('PruneAnalyzer', () => {
  let dir: string;
  let now: Date;
  let kb: KnowledgeBase;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-prune-'));
    now = new Date('2026-01-01T00:00:00.000Z');
    kb = await KnowledgeBase.open({ storePath: dir, autoRepair: true }, { now: () => now });

    await kb.addLeaf({ branch: 'trading/gotchas', content: 'Gap fills are unreliable', confidence: 0.6 });
    now = new Date('2026-06-01T00:00:00.000Z');
    await kb.addLeaf({ branch: 'trading/indicators', content: 'RSI divergence predicts reversals', confidence: 0.2 });
  });

  afterEach(async () => {
    await kb.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should flag stale and low-confidence leaves', () => {
    const report = kb.analyzePrune();

    expect(report.scanned).toBe(2);
    expect(report.candidates.map(c => ({ path: c.path, reasons: c.reasons }))).toEqual([
      { path: OLD, reasons: [{ kind: 'stale', days: 151 }] },
      { path: SHAKY, reasons: [{ kind: 'low_confidence', confidence: 0.2 }] }
    ]);
    expect(report.similar).toEqual([]);
  });

  it('should honour custom thresholds and scope', () => {
    expect(kb.analyzePrune({ staleDays: 200, minConfidence: 0.1 }).candidates).toEqual([]);
    expect(kb.analyzePrune({ branch: 'indicators' }).candidates.map(c => c.path)).toEqual([SHAKY]);
    expect(kb.analyzePrune({ tree: 'research' }).scanned).toBe(0);
  });

  it('should reject a confidence threshold outside [0, 1]', () => {
    expect(() => kb.analyzePrune({ minConfidence: Number('abc') })).toThrow(InvalidConfidenceError);
    expect(() => kb.analyzePrune({ minConfidence: -0.1 })).toThrow(InvalidConfidenceError);
  });

  it('should list contradictions touching the scope', async () => {
    await kb.link(SHAKY, OLD, 'contradicts');

    expect(kb.analyzePrune({ branch: 'gotchas' }).contradictions).toEqual([{ from: SHAKY, to: OLD }]);
  });

  it('should find near-duplicates across branches only when asked', async () => {
    await kb.addLeaf({ branch: 'trading/indicators', content: 'Gap fills are unreliable', confidence: 0.9 });
    await kb.addLeaf({ branch: 'trading/gotchas', content: 'Gap fills are unreliable', name: 'gap-fill-copy', confidence: 0.9 });

    const report = kb.analyzePrune({ detectConflicts: true });

    expect(report.skipped).toBe(0);
    expect(report.similar.map(pair => [pair.a, pair.b])).toEqual([
      ['trading/gotchas/gap-fill-copy.md', 'trading/indicators/gap-fills-are-unreliable.md'],
      [OLD, 'trading/indicators/gap-fills-are-unreliable.md']
    ]);
    for (const pair of report.similar) {
      expect(pair.similarity).toBeCloseTo(1, 5);
    }
    expect(kb.analyzePrune().similar).toEqual([]);
  });

  it('should describe reasons for people', () => {
    expect(describeReason({ kind: 'stale', days: 151 })).toBe('stale (151 days)');
    expect(describeReason({ kind: 'low_confidence', confidence: 0.2 })).toBe('low confidence (0.20)');
  });
});
