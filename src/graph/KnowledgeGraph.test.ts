/**
 * Knowledge Graph Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { KnowledgeBase } from '../core/KnowledgeBase.js';
import { InvalidRelationError, NotFoundError } from '../core/errors.js';
import { isKnownRelation, validateRelation } from './KnowledgeGraph.js';

const MACD = 'trading/indicators/macd-works-in-trends.md';
const VOLUME = 'trading/gotchas/macd-fails-in-chop.md';
const NOTE = 'research/papers/trend-filters.md';

describe('KnowledgeGraph', () => {
  let dir: string;
  let kb: KnowledgeBase;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'arbor-graph-'));
    kb = await KnowledgeBase.open(
      { storePath: dir, autoRepair: true },
      { now: () => new Date('2026-06-01T00:00:00.000Z') }
    );
    await kb.addLeaf({ branch: 'trading/indicators', content: 'MACD works in trends', tier: 'trunk' });
    await kb.addLeaf({ branch: 'trading/gotchas', content: 'MACD fails in chop' });
    await kb.addLeaf({ branch: 'research/papers', content: 'Trend filters' });
  });

  afterEach(async () => {
    await kb.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should show a link from both ends', async () => {
    const result = await kb.link(MACD, VOLUME, 'contradicts');
    expect(result).toEqual({ from: MACD, to: VOLUME, relation: 'contradicts', created: true });

    expect(await kb.related(MACD)).toEqual([
      { direction: 'outgoing', relation: 'contradicts', path: VOLUME, title: 'MACD fails in chop', excerpt: 'MACD fails in chop', tier: 'leaves' }
    ]);
    expect(await kb.related(VOLUME)).toEqual([
      { direction: 'incoming', relation: 'contradicts', path: MACD, title: 'MACD works in trends', excerpt: 'MACD works in trends', tier: 'trunk' }
    ]);
  });

  it('should store the link in the source leaf file', async () => {
    await kb.link(MACD, VOLUME, 'contradicts');

    const raw = readFileSync(join(dir, MACD), 'utf-8');
    expect(raw).toContain(`to: ${VOLUME}`);
    expect(raw).toContain('relation: contradicts');
    expect((await kb.getLeaf(MACD)).links).toEqual([
      { to: VOLUME, relation: 'contradicts', createdAt: '2026-06-01T00:00:00.000Z' }
    ]);
  });

  it('should treat a repeated link as a no-op', async () => {
    await kb.link(MACD, VOLUME, 'supports');
    const again = await kb.link(MACD, VOLUME, 'supports');

    expect(again.created).toBe(false);
    expect((await kb.getLeaf(MACD)).links).toHaveLength(1);
    expect(kb.stats().links).toBe(1);
  });

  it('should allow several relations, cycles and custom relations', async () => {
    await kb.link(MACD, VOLUME, 'supports');
    await kb.link(MACD, VOLUME, 'refines');
    await kb.link(VOLUME, MACD, 'inspired_by');

    expect((await kb.related(MACD)).map(r => `${r.direction}:${r.relation}`)).toEqual([
      'incoming:inspired_by',
      'outgoing:refines',
      'outgoing:supports'
    ]);
  });

  it('should default to related_to and accept paths without the extension', async () => {
    const result = await kb.link('trading/indicators/macd-works-in-trends', 'research/papers/trend-filters');
    expect(result).toEqual({ from: MACD, to: NOTE, relation: 'related_to', created: true });
  });

  it('should refuse missing endpoints and malformed relations', async () => {
    await expect(kb.link(MACD, 'trading/gotchas/missing.md')).rejects.toBeInstanceOf(NotFoundError);
    await expect(kb.link(MACD, VOLUME, 'Bad Relation')).rejects.toBeInstanceOf(InvalidRelationError);
    await expect(kb.link(MACD, VOLUME, '')).rejects.toBeInstanceOf(InvalidRelationError);
  });

  it('should remove a link and report a missing one', async () => {
    await kb.link(MACD, VOLUME, 'contradicts');

    await kb.unlink(MACD, VOLUME, 'contradicts');

    expect(await kb.related(MACD)).toEqual([]);
    await expect(kb.unlink(MACD, VOLUME, 'contradicts')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should strip incoming links when the target is deleted', async () => {
    await kb.link(MACD, VOLUME, 'contradicts');
    await kb.link(NOTE, VOLUME, 'supports');
    await kb.link(MACD, NOTE, 'related_to');

    await kb.deleteLeaf(VOLUME);

    expect((await kb.getLeaf(MACD)).links.map(l => l.to)).toEqual([NOTE]);
    expect((await kb.getLeaf(NOTE)).links).toEqual([]);
    expect(kb.stats().links).toBe(1);
  });

  it('should restore links from the files on reindex', async () => {
    await kb.link(MACD, VOLUME, 'contradicts');

    await kb.reindex();

    expect((await kb.related(VOLUME)).map(r => r.path)).toEqual([MACD]);
  });
});

describe('relations', () => {
  it('should validate the relation charset', () => {
    expect(validateRelation('depends_on')).toBe('depends_on');
    expect(validateRelation('see-also')).toBe('see-also');
    expect(() => validateRelation('1st')).toThrow(InvalidRelationError);
    expect(() => validateRelation('a'.repeat(33))).toThrow(InvalidRelationError);
  });

  it('should know the built-in relations', () => {
    expect(isKnownRelation('supersedes')).toBe(true);
    expect(isKnownRelation('inspired_by')).toBe(false);
  });
});
